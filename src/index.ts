export { FASTA_MARKER, type FastaRecord } from "./fasta/record.js";
export { FastaLineAssembler, FastaRecordSequence, parseFasta, readFastaFile } from "./fasta/parser.js";
export { DEFAULT_MIN_CONTIG_LENGTH, characterCount, createLengthFilter, passesLengthFilter } from "./fasta/lengthFilter.js";
export { formatFastaRecord, writeFastaFile } from "./fasta/writer.js";
export { filterContigFile, type ContigFilterOptions, type ContigFilterStats } from "./filtering/contigFilter.js";
export {
  SampleDirectoryWalker,
  type SampleDirectory,
  type SampleWalkerOptions,
  type SampleWithInput
} from "./samples/sampleWalker.js";
export {
  createMlstTask,
  runMlstTask,
  DEFAULT_MLST_COMMAND,
  DEFAULT_MLST_OUTPUT_SUFFIX,
  type MlstTask,
  type MlstTaskOptions,
  type MlstTaskResult
} from "./mlst/mlstTask.js";
export { LocalProcessRunner } from "./execution/backends/localProcess.js";
export type { ExecutionResources, ExecutionResult, LocalProcessSpec, RunnerBackend } from "./execution/backends/types.js";
export { PassRun, renderEvent, stderrSink, type EventSink, type PassReport, type RunEvent, type SampleOutcome } from "./runs/passRun.js";
export { runFilterPass, type FilterPassOptions } from "./passes/filterPass.js";
export { runMlstPass, type MlstPassOptions } from "./passes/mlstPass.js";
export { loadPipelineConfig, zPipelineConfig, DEFAULT_CONFIG_FILE, type PipelineConfig } from "./config/config.js";
export { PipelineError, type PipelineErrorCode } from "./core/errors.js";
