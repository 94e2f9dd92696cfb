import { readFastaFile } from "../fasta/parser.js";
import { createLengthFilter, characterCount, DEFAULT_MIN_CONTIG_LENGTH } from "../fasta/lengthFilter.js";
import type { FastaRecord } from "../fasta/record.js";
import { writeFastaFile } from "../fasta/writer.js";

export interface ContigFilterStats {
  inputRecords: number;
  keptRecords: number;
  droppedRecords: number;
  emptyHeaderRecords: number;
  keptBases: number;
}

export interface ContigFilterOptions {
  inputPath: string;
  outputPath: string;
  minLength?: number;
}

export async function filterContigFile(opts: ContigFilterOptions): Promise<ContigFilterStats> {
  const keep = createLengthFilter(opts.minLength ?? DEFAULT_MIN_CONTIG_LENGTH);
  const stats: ContigFilterStats = {
    inputRecords: 0,
    keptRecords: 0,
    droppedRecords: 0,
    emptyHeaderRecords: 0,
    keptBases: 0
  };

  async function* kept(): AsyncGenerator<FastaRecord> {
    for await (const record of readFastaFile(opts.inputPath)) {
      stats.inputRecords++;
      if (record.header.length === 0) stats.emptyHeaderRecords++;
      if (!keep(record)) {
        stats.droppedRecords++;
        continue;
      }
      stats.keptRecords++;
      stats.keptBases += characterCount(record.sequence);
      yield record;
    }
  }

  await writeFastaFile(opts.outputPath, kept());
  return stats;
}
