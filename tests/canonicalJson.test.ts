import { describe, it, expect } from "vitest";
import { canonicalizeJson, hashParams } from "../src/core/canonicalJson.js";

describe("canonicalizeJson", () => {
  it("sorts keys at every level and keeps array order", () => {
    const out = canonicalizeJson({ b: 1, a: { z: [3, { y: true, x: null }], c: "s" } });
    expect(JSON.stringify(out)).toBe('{"a":{"c":"s","z":[3,{"x":null,"y":true}]},"b":1}');
  });

  it("normalizes -0 and non-finite numbers", () => {
    expect(canonicalizeJson([-0, Number.NaN, Number.POSITIVE_INFINITY, 2.5])).toEqual([0, null, null, 2.5]);
  });
});

describe("hashParams", () => {
  it("does not depend on key order", () => {
    const a = hashParams({ min_length: 1000, input_file: "contigs.fasta" });
    const b = hashParams({ input_file: "contigs.fasta", min_length: 1000 });
    expect(a).toBe(b);
    expect(a).toMatch(/^sha256:[a-f0-9]{64}$/);
    expect(hashParams({ min_length: 999, input_file: "contigs.fasta" })).not.toBe(a);
  });
});
