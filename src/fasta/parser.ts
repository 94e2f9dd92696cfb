import { createReadStream } from "fs";
import { PipelineError, errorMessage } from "../core/errors.js";
import { FASTA_MARKER, type FastaRecord } from "./record.js";

const LINE_BREAK = /\r\n|\n|\r/;
const WHITESPACE = /\s+/g;
const BYTE_ORDER_MARK = "\uFEFF";

function stripByteOrderMark(text: string): string {
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

/**
 * Line-at-a-time record builder shared by the string and file readers.
 *
 * A record starts at every line beginning with the marker; anything before
 * the first marker line is dropped. Sequence lines lose all whitespace, so
 * blank lines inside a record add nothing.
 */
export class FastaLineAssembler {
  private header: string | null = null;
  private segments: string[] = [];

  push(line: string): FastaRecord | null {
    if (line.startsWith(FASTA_MARKER)) {
      const done = this.flush();
      this.header = line.slice(FASTA_MARKER.length);
      return done;
    }
    if (this.header === null) return null;

    const segment = line.replace(WHITESPACE, "");
    if (segment.length > 0) this.segments.push(segment);
    return null;
  }

  finish(): FastaRecord | null {
    return this.flush();
  }

  private flush(): FastaRecord | null {
    if (this.header === null) return null;
    const record: FastaRecord = { header: this.header, sequence: this.segments.join("") };
    this.header = null;
    this.segments = [];
    return record;
  }
}

/**
 * Records of an in-memory FASTA document. Iteration is lazy and may be
 * repeated; every pass re-reads the same text and yields the same records.
 * A leading byte-order mark is ignored.
 */
export class FastaRecordSequence implements Iterable<FastaRecord> {
  private readonly text: string;

  constructor(text: string) {
    this.text = stripByteOrderMark(text);
  }

  *[Symbol.iterator](): Iterator<FastaRecord> {
    const assembler = new FastaLineAssembler();
    const breaks = new RegExp(LINE_BREAK.source, "g");
    let start = 0;
    for (;;) {
      breaks.lastIndex = start;
      const match = breaks.exec(this.text);
      const end = match ? match.index : this.text.length;
      const record = assembler.push(this.text.slice(start, end));
      if (record) yield record;
      if (!match) break;
      start = end + match[0].length;
    }
    const last = assembler.finish();
    if (last) yield last;
  }

  toArray(): FastaRecord[] {
    return [...this];
  }
}

export function parseFasta(text: string): FastaRecordSequence {
  return new FastaRecordSequence(text);
}

/**
 * Streams records from a FASTA file. Each iteration opens its own stream,
 * which is closed when the loop completes, breaks or throws.
 *
 * Only the newest chunk is scanned for line breaks; an unterminated line is
 * kept as pieces and joined once its break arrives.
 */
export async function* readFastaFile(filePath: string): AsyncGenerator<FastaRecord> {
  const input = createReadStream(filePath, { encoding: "utf8" });
  const assembler = new FastaLineAssembler();
  const breaks = new RegExp(LINE_BREAK.source, "g");
  let partial: string[] = [];
  let firstChunk = true;
  // A chunk ending in \r may be the first half of a \r\n split across chunks.
  let skipLeadingLf = false;

  try {
    for await (const raw of input) {
      let chunk = String(raw);
      if (firstChunk) {
        chunk = stripByteOrderMark(chunk);
        firstChunk = false;
      }

      let start = skipLeadingLf && chunk.startsWith("\n") ? 1 : 0;
      skipLeadingLf = false;
      breaks.lastIndex = start;
      for (let match = breaks.exec(chunk); match; match = breaks.exec(chunk)) {
        partial.push(chunk.slice(start, match.index));
        const line = partial.join("");
        partial = [];
        start = match.index + match[0].length;
        if (match[0] === "\r" && start === chunk.length) skipLeadingLf = true;

        const record = assembler.push(line);
        if (record) yield record;
        breaks.lastIndex = start;
      }
      if (start < chunk.length) partial.push(chunk.slice(start));
    }
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    throw new PipelineError("read_failure", `failed to read ${filePath}: ${errorMessage(err)}`, { cause: err });
  } finally {
    input.destroy();
  }

  if (partial.length > 0) {
    const record = assembler.push(partial.join(""));
    if (record) yield record;
  }
  const last = assembler.finish();
  if (last) yield last;
}
