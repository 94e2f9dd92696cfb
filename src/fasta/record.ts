export const FASTA_MARKER = ">";

export interface FastaRecord {
  /** Text after the marker up to the end of the marker line, verbatim. */
  header: string;
  /** All sequence lines of the record joined, with line breaks and whitespace removed. */
  sequence: string;
}
