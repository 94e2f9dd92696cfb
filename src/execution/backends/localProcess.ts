import { spawn } from "child_process";
import { createWriteStream } from "fs";
import { pipeline } from "stream/promises";
import type { ExecutionResources, ExecutionResult, LocalProcessSpec, RunnerBackend } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export class LocalProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;

  async execute(spec: LocalProcessSpec, resources: ExecutionResources): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("local_process argv must be non-empty");
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] as const });

    const stderrChunks: Buffer[] = [];
    const stderrState = { bytes: 0, truncated: false };

    // Settles once stdout is drained; a failed file write is kept and raised after exit.
    let stdoutError: unknown = null;
    const stdoutDone: Promise<void> = pipeline(child.stdout, createWriteStream(spec.stdoutPath)).catch((err: unknown) => {
      stdoutError = err;
    });
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

    let timedOut = false;
    const timeoutMs = resources.timeoutSeconds === null ? 0 : Math.max(0, Math.floor(resources.timeoutSeconds * 1000));
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : null;

    try {
      const exitCode = await new Promise<number>((resolve, reject) => {
        child.on("error", reject);
        child.on("close", (code: number | null) => resolve(code ?? (timedOut ? 137 : 1)));
      });
      await stdoutDone;
      if (stdoutError !== null) throw stdoutError;

      const finishedAt = new Date().toISOString();
      const stderr =
        Buffer.concat(stderrChunks).toString("utf8") +
        (stderrState.truncated ? "\n[stderr truncated]\n" : "") +
        (timedOut ? "\n[timeout]\n" : "");

      return { exitCode, stderr, timedOut, startedAt, finishedAt };
    } catch (err) {
      child.stdout.destroy();
      await stdoutDone;
      throw err;
    } finally {
      if (timeout) clearTimeout(timeout);
    }
  }
}
