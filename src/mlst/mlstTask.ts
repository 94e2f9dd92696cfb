import { promises as fs } from "fs";
import path from "path";
import { PipelineError, errnoCode, errorMessage } from "../core/errors.js";
import type { ExecutionResult, RunnerBackend } from "../execution/backends/types.js";
import type { SampleWithInput } from "../samples/sampleWalker.js";

export const DEFAULT_MLST_COMMAND = "mlst";
export const DEFAULT_MLST_OUTPUT_SUFFIX = "_mlst_output";

const STDERR_TAIL_CHARS = 2000;

/** One self-contained invocation of the typing tool for one sample. */
export interface MlstTask {
  readonly sampleId: string;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly argv: readonly string[];
}

export interface MlstTaskOptions {
  outputDir: string;
  command?: string;
  extraArgs?: readonly string[];
  outputSuffix?: string;
}

export interface MlstTaskResult {
  task: MlstTask;
  exec: ExecutionResult;
  outputBytes: number;
}

export function createMlstTask(sample: SampleWithInput, opts: MlstTaskOptions): MlstTask {
  const command = opts.command ?? DEFAULT_MLST_COMMAND;
  if (command.trim().length === 0) throw new Error("mlst command must be non-empty");

  const outputName = `${sample.sampleId}${opts.outputSuffix ?? DEFAULT_MLST_OUTPUT_SUFFIX}`;
  return Object.freeze({
    sampleId: sample.sampleId,
    inputPath: sample.inputPath,
    outputPath: path.join(path.resolve(opts.outputDir), outputName),
    argv: Object.freeze([command, ...(opts.extraArgs ?? []), sample.inputPath])
  });
}

function isMissingExecutable(err: unknown): boolean {
  if (errnoCode(err) !== "ENOENT" || typeof err !== "object" || err === null || !("syscall" in err)) return false;
  return typeof err.syscall === "string" && err.syscall.startsWith("spawn");
}

function stderrTail(stderr: string): string {
  const trimmed = stderr.trim();
  return trimmed.length > STDERR_TAIL_CHARS ? `...${trimmed.slice(-STDERR_TAIL_CHARS)}` : trimmed;
}

/**
 * Runs the tool with stdout streamed verbatim into `task.outputPath`. A spawn
 * failure, non-zero exit or timeout removes the partial output and raises
 * `collaborator_failure`.
 */
export async function runMlstTask(
  task: MlstTask,
  backend: RunnerBackend<"local_process">,
  opts: { timeoutSeconds: number | null }
): Promise<MlstTaskResult> {
  let exec: ExecutionResult;
  try {
    exec = await backend.execute(
      { kind: "local_process", argv: [...task.argv], stdoutPath: task.outputPath },
      { timeoutSeconds: opts.timeoutSeconds }
    );
  } catch (err) {
    await fs.rm(task.outputPath, { force: true });
    const detail = isMissingExecutable(err) ? `executable not found: ${task.argv[0]}` : errorMessage(err);
    throw new PipelineError("collaborator_failure", `mlst failed for ${task.sampleId}: ${detail}`, { cause: err });
  }

  if (exec.timedOut || exec.exitCode !== 0) {
    await fs.rm(task.outputPath, { force: true });
    const why = exec.timedOut ? `timed out after ${opts.timeoutSeconds}s` : `exit ${exec.exitCode}`;
    const tail = stderrTail(exec.stderr);
    throw new PipelineError("collaborator_failure", `mlst failed for ${task.sampleId} (${why})${tail ? `: ${tail}` : ""}`);
  }

  const { size } = await fs.stat(task.outputPath);
  return { task, exec, outputBytes: size };
}
