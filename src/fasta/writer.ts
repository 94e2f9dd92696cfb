import { createWriteStream, promises as fs } from "fs";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { PipelineError, errorMessage } from "../core/errors.js";
import { FASTA_MARKER, type FastaRecord } from "./record.js";

export function formatFastaRecord(record: FastaRecord): string {
  return `${FASTA_MARKER}${record.header}\n${record.sequence}\n`;
}

async function* formatted(records: Iterable<FastaRecord> | AsyncIterable<FastaRecord>): AsyncGenerator<string> {
  for await (const record of records) {
    yield formatFastaRecord(record);
  }
}

/**
 * Writes records in iteration order. Output goes to a temporary sibling first
 * and is renamed over `filePath`, so the destination is either fully replaced
 * or left as it was.
 *
 * Errors raised while producing records propagate unchanged; errors creating,
 * writing or renaming the file become `write_failure`.
 */
export async function writeFastaFile(
  filePath: string,
  records: Iterable<FastaRecord> | AsyncIterable<FastaRecord>
): Promise<void> {
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  let sourceError: unknown = null;

  const source = Readable.from(
    (async function* () {
      try {
        yield* formatted(records);
      } catch (err) {
        sourceError = err;
        throw err;
      }
    })()
  );

  try {
    await pipeline(source, createWriteStream(tmpPath, { encoding: "utf8" }));
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    if (sourceError !== null) throw sourceError;
    throw new PipelineError("write_failure", `failed to write ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}
