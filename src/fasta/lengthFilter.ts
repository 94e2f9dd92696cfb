import type { FastaRecord } from "./record.js";

export const DEFAULT_MIN_CONTIG_LENGTH = 1000;

const SURROGATE = /[\uD800-\uDFFF]/;

/** Code point count; equal to `.length` for the ASCII text FASTA files normally hold. */
export function characterCount(text: string): number {
  if (!SURROGATE.test(text)) return text.length;
  return Array.from(text).length;
}

export function passesLengthFilter(record: FastaRecord, minLength: number): boolean {
  return characterCount(record.sequence) >= minLength;
}

export function createLengthFilter(minLength: number = DEFAULT_MIN_CONTIG_LENGTH): (record: FastaRecord) => boolean {
  if (!Number.isSafeInteger(minLength) || minLength < 0) {
    throw new RangeError(`min length must be a non-negative integer, got ${minLength}`);
  }
  return (record) => passesLengthFilter(record, minLength);
}
