import { PipelineError, errorMessage } from "../core/errors.js";
import type { PassRun } from "../runs/passRun.js";
import type { SampleDirectoryWalker, SampleWithInput } from "../samples/sampleWalker.js";

/**
 * Visits samples one at a time. Entries that are not directories are passed
 * over, samples without an input file are recorded as skipped, and an error
 * from inspecting an entry or from `task` is recorded against that sample
 * before the loop moves on. Only failing to list the root escapes.
 */
export async function forEachSample(
  walker: SampleDirectoryWalker,
  run: PassRun,
  task: (sample: SampleWithInput) => Promise<void>
): Promise<void> {
  for (const entry of await walker.listEntries()) {
    const sampleId = walker.sampleIdOf(entry);
    try {
      const sample = await walker.inspectSample(entry);
      if (sample === null) continue;
      const { inputPath } = sample;
      if (inputPath === null) {
        run.recordSkipped(sampleId);
        continue;
      }
      await task({ ...sample, inputPath });
    } catch (err) {
      const code = err instanceof PipelineError ? err.code : "unexpected";
      run.recordFailure(sampleId, code, errorMessage(err));
    }
  }
}
