import path from "path";
import { filterContigFile } from "../filtering/contigFilter.js";
import { PassRun, type EventSink, type PassReport } from "../runs/passRun.js";
import { SampleDirectoryWalker } from "../samples/sampleWalker.js";
import type { PipelineConfig } from "../config/config.js";
import { forEachSample } from "./sampleLoop.js";

export interface FilterPassOptions {
  rootDir: string;
  config: PipelineConfig;
  sink?: EventSink;
}

/** Writes `<sample>/<output_file>` for every sample that has `<sample>/<input_file>`. */
export async function runFilterPass(opts: FilterPassOptions): Promise<PassReport> {
  const { filter } = opts.config;
  const walker = new SampleDirectoryWalker({
    rootDir: opts.rootDir,
    inputFileName: filter.input_file,
    exclude: opts.config.reports_dir === null ? [] : [opts.config.reports_dir]
  });
  const run = new PassRun({
    pass: "filter_contigs",
    rootDir: walker.rootDir,
    params: { min_length: filter.min_length, input_file: filter.input_file, output_file: filter.output_file },
    reportsDir: opts.config.reports_dir,
    sink: opts.sink
  });

  run.start();
  await forEachSample(walker, run, async (sample) => {
    const outputPath = path.join(sample.dir, filter.output_file);
    const stats = await filterContigFile({ inputPath: sample.inputPath, outputPath, minLength: filter.min_length });

    if (stats.emptyHeaderRecords > 0) {
      run.event("sample.warning", `${sample.sampleId}: ${stats.emptyHeaderRecords} record(s) with an empty header`, {
        sample_id: sample.sampleId,
        code: "malformed_record",
        count: stats.emptyHeaderRecords
      });
    }
    run.recordOk(sample.sampleId, "sample.filtered", `kept ${stats.keptRecords}/${stats.inputRecords} contigs`, {
      output_path: outputPath,
      input_records: stats.inputRecords,
      kept_records: stats.keptRecords,
      dropped_records: stats.droppedRecords,
      kept_bases: stats.keptBases
    });
  });
  return run.finish();
}
