import { describe, it, expect } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { formatFastaRecord, writeFastaFile } from "../src/fasta/writer.js";
import { parseFasta } from "../src/fasta/parser.js";
import type { FastaRecord } from "../src/fasta/record.js";

describe("formatFastaRecord", () => {
  it("writes marker, header, newline, sequence, newline", () => {
    expect(formatFastaRecord({ header: "NODE_3 circular=true", sequence: "ACGT" })).toBe(">NODE_3 circular=true\nACGT\n");
    expect(formatFastaRecord({ header: "", sequence: "" })).toBe(">\n\n");
  });

  it("round-trips through the parser", () => {
    const record = { header: "contig_7 desc with  spaces", sequence: "ACGTN".repeat(300) };
    expect(parseFasta(formatFastaRecord(record)).toArray()).toEqual([record]);
  });
});

describe("writeFastaFile", () => {
  it("overwrites an existing file in record order", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "contigtyper-writer-"));
    try {
      const out = path.join(dir, "out.fasta");
      await writeFile(out, ">stale\nTTTTTTTTTTTTTTTTTTTTTTTTTTTTTT\n");
      await writeFastaFile(out, [
        { header: "b", sequence: "CC" },
        { header: "a", sequence: "AA" }
      ]);
      expect(await readFile(out, "utf8")).toBe(">b\nCC\n>a\nAA\n");
      expect(await readdir(dir)).toEqual(["out.fasta"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("writes an empty file when no records pass", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "contigtyper-writer-"));
    try {
      const out = path.join(dir, "out.fasta");
      await writeFastaFile(out, []);
      expect(await readFile(out, "utf8")).toBe("");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("raises write_failure and leaves no temporary file when the destination is a directory", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "contigtyper-writer-"));
    try {
      const out = path.join(dir, "out.fasta");
      await mkdir(out);
      await expect(writeFastaFile(out, [{ header: "a", sequence: "A" }])).rejects.toMatchObject({
        name: "PipelineError",
        code: "write_failure"
      });
      expect(await readdir(dir)).toEqual(["out.fasta"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("passes through errors from the record source and keeps the old file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "contigtyper-writer-"));
    try {
      const out = path.join(dir, "out.fasta");
      await writeFile(out, ">old\nA\n");
      async function* failing(): AsyncGenerator<FastaRecord> {
        yield { header: "new", sequence: "C" };
        throw new Error("source broke");
      }
      await expect(writeFastaFile(out, failing())).rejects.toThrow("source broke");
      expect(await readFile(out, "utf8")).toBe(">old\nA\n");
      expect(await readdir(dir)).toEqual(["out.fasta"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
