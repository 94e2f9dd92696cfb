import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { loadPipelineConfig, DEFAULT_CONFIG_FILE } from "../src/config/config.js";
import { PipelineError } from "../src/core/errors.js";

describe("loadPipelineConfig", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "contigtyper-config-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("falls back to defaults when no config file exists", async () => {
    const config = await loadPipelineConfig({ rootDir: root, env: {} });
    expect(config).toEqual({
      filter: { min_length: 1000, input_file: "contigs.fasta", output_file: "contigs_filtered.fasta" },
      mlst: {
        command: "mlst",
        extra_args: [],
        input_file: "contigs.fasta",
        output_dir: null,
        output_suffix: "_mlst_output",
        timeout_seconds: null
      },
      reports_dir: null
    });
  });

  it("loads the shipped example config", async () => {
    const config = await loadPipelineConfig({ rootDir: root, configPath: path.resolve(DEFAULT_CONFIG_FILE), env: {} });
    expect(config.filter.min_length).toBe(1000);
    expect(config.mlst.command).toBe("mlst");
  });

  it("reads the default file from the root and resolves paths against it", async () => {
    await writeFile(
      path.join(root, DEFAULT_CONFIG_FILE),
      ["filter:", "  min_length: 500", "mlst:", "  output_dir: typing", "  extra_args: [--nopath]", "reports_dir: ${RUN_REPORTS}"].join("\n")
    );
    const config = await loadPipelineConfig({ rootDir: root, env: { RUN_REPORTS: "/var/reports" } });
    expect(config.filter).toEqual({ min_length: 500, input_file: "contigs.fasta", output_file: "contigs_filtered.fasta" });
    expect(config.mlst.output_dir).toBe(path.join(root, "typing"));
    expect(config.mlst.extra_args).toEqual(["--nopath"]);
    expect(config.reports_dir).toBe("/var/reports");
  });

  it("applies environment overrides", async () => {
    const config = await loadPipelineConfig({
      rootDir: root,
      env: { MIN_CONTIG_LENGTH: "250", MLST_COMMAND: "/opt/mlst/bin/mlst", MLST_TIMEOUT_SECONDS: "90", REPORTS_DIR: "reports" }
    });
    expect(config.filter.min_length).toBe(250);
    expect(config.mlst.command).toBe("/opt/mlst/bin/mlst");
    expect(config.mlst.timeout_seconds).toBe(90);
    expect(config.reports_dir).toBe(path.join(root, "reports"));
  });

  it("rejects invalid values", async () => {
    await writeFile(path.join(root, DEFAULT_CONFIG_FILE), "filter:\n  min_length: -5\n");
    await expect(loadPipelineConfig({ rootDir: root, env: {} })).rejects.toMatchObject({ code: "invalid_config" });

    await writeFile(path.join(root, DEFAULT_CONFIG_FILE), "filter:\n  output_file: contigs.fasta\n");
    await expect(loadPipelineConfig({ rootDir: root, env: {} })).rejects.toBeInstanceOf(PipelineError);

    await writeFile(path.join(root, DEFAULT_CONFIG_FILE), "filter:\n  input_file: ../elsewhere.fasta\n");
    await expect(loadPipelineConfig({ rootDir: root, env: {} })).rejects.toMatchObject({ code: "invalid_config" });
  });

  it("rejects a non-numeric environment threshold", async () => {
    await expect(loadPipelineConfig({ rootDir: root, env: { MIN_CONTIG_LENGTH: "lots" } })).rejects.toMatchObject({
      code: "invalid_config",
      message: 'MIN_CONTIG_LENGTH must be a number, got "lots"'
    });
  });

  it("requires an explicitly named config file to exist", async () => {
    await expect(loadPipelineConfig({ rootDir: root, configPath: "missing.yaml", env: {} })).rejects.toMatchObject({
      code: "invalid_config"
    });
    await expect(loadPipelineConfig({ rootDir: root, env: { CONTIGTYPER_CONFIG: "missing.yaml" } })).rejects.toMatchObject({
      code: "invalid_config"
    });
  });

  it("rejects unset variables in path values", async () => {
    await writeFile(path.join(root, DEFAULT_CONFIG_FILE), "reports_dir: $NOT_SET_ANYWHERE\n");
    await expect(loadPipelineConfig({ rootDir: root, env: {} })).rejects.toMatchObject({
      code: "invalid_config",
      message: "environment variable NOT_SET_ANYWHERE is not set"
    });
  });
});
