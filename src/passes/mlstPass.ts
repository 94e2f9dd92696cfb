import { promises as fs } from "fs";
import path from "path";
import { PipelineError, errorMessage } from "../core/errors.js";
import { LocalProcessRunner } from "../execution/backends/localProcess.js";
import type { RunnerBackend } from "../execution/backends/types.js";
import { createMlstTask, runMlstTask } from "../mlst/mlstTask.js";
import { PassRun, type EventSink, type PassReport } from "../runs/passRun.js";
import { SampleDirectoryWalker } from "../samples/sampleWalker.js";
import type { PipelineConfig } from "../config/config.js";
import { forEachSample } from "./sampleLoop.js";

export interface MlstPassOptions {
  rootDir: string;
  config: PipelineConfig;
  /** Overrides `mlst.output_dir`; both default to the root. */
  outputDir?: string | null;
  backend?: RunnerBackend<"local_process">;
  sink?: EventSink;
}

async function createOutputDir(outputDir: string): Promise<PipelineError | null> {
  try {
    await fs.mkdir(outputDir, { recursive: true });
    return null;
  } catch (err) {
    return new PipelineError("write_failure", `cannot create mlst output dir ${outputDir}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Types every sample that has `<sample>/<input_file>`. When the output
 * directory cannot be created, each such sample fails with `write_failure`
 * and the pass still finishes with a report.
 */
export async function runMlstPass(opts: MlstPassOptions): Promise<PassReport> {
  const { mlst } = opts.config;
  const backend = opts.backend ?? new LocalProcessRunner();
  const rootDir = path.resolve(opts.rootDir);
  const outputDir = path.resolve(rootDir, opts.outputDir ?? mlst.output_dir ?? rootDir);
  const walker = new SampleDirectoryWalker({
    rootDir,
    inputFileName: mlst.input_file,
    exclude: [outputDir, ...(opts.config.reports_dir === null ? [] : [opts.config.reports_dir])]
  });

  const run = new PassRun({
    pass: "mlst",
    rootDir: walker.rootDir,
    params: {
      command: mlst.command,
      extra_args: mlst.extra_args,
      input_file: mlst.input_file,
      output_dir: outputDir,
      output_suffix: mlst.output_suffix,
      timeout_seconds: mlst.timeout_seconds
    },
    reportsDir: opts.config.reports_dir,
    sink: opts.sink
  });

  run.start();
  const outputDirError = await createOutputDir(outputDir);
  if (outputDirError) {
    run.event("run.warning", outputDirError.message, { output_dir: outputDir, code: outputDirError.code });
  }

  await forEachSample(walker, run, async (sample) => {
    if (outputDirError) throw outputDirError;
    const task = createMlstTask(sample, {
      outputDir,
      command: mlst.command,
      extraArgs: mlst.extra_args,
      outputSuffix: mlst.output_suffix
    });

    run.event("mlst.exec", `${task.sampleId}: ${task.argv.join(" ")}`, { sample_id: task.sampleId, argv: [...task.argv] });
    const result = await runMlstTask(task, backend, { timeoutSeconds: mlst.timeout_seconds });
    run.recordOk(task.sampleId, "mlst.result", `wrote ${task.outputPath}`, {
      output_path: task.outputPath,
      output_bytes: result.outputBytes,
      started_at: result.exec.startedAt,
      finished_at: result.exec.finishedAt
    });
  });
  return run.finish();
}
