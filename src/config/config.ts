import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { PipelineError, errnoCode, errorMessage } from "../core/errors.js";
import { DEFAULT_MIN_CONTIG_LENGTH } from "../fasta/lengthFilter.js";
import { DEFAULT_MLST_COMMAND, DEFAULT_MLST_OUTPUT_SUFFIX } from "../mlst/mlstTask.js";

export const DEFAULT_CONFIG_FILE = "contigtyper.config.yaml";

const zFileName = z
  .string()
  .min(1)
  .refine((v) => v === path.basename(v) && v !== "." && v !== "..", "must be a bare file name");

export const zPipelineConfig = z.object({
  filter: z
    .object({
      min_length: z.number().int().min(0).default(DEFAULT_MIN_CONTIG_LENGTH),
      input_file: zFileName.default("contigs.fasta"),
      output_file: zFileName.default("contigs_filtered.fasta")
    })
    .refine((f) => f.input_file !== f.output_file, "filter.output_file must differ from filter.input_file")
    .prefault({}),
  mlst: z
    .object({
      command: z.string().min(1).default(DEFAULT_MLST_COMMAND),
      extra_args: z.array(z.string()).default([]),
      input_file: zFileName.default("contigs.fasta"),
      output_dir: z.string().min(1).nullable().default(null),
      output_suffix: z.string().min(1).default(DEFAULT_MLST_OUTPUT_SUFFIX),
      timeout_seconds: z.number().positive().nullable().default(null)
    })
    .prefault({}),
  reports_dir: z.string().min(1).nullable().default(null)
});

export type PipelineConfig = z.output<typeof zPipelineConfig>;

export interface LoadConfigOptions {
  /** Explicit config path; when absent the default file in `rootDir` is used if it exists. */
  configPath?: string | null;
  rootDir: string;
  env?: NodeJS.ProcessEnv;
}

function expandEnvToken(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}|\$([A-Z0-9_]+)/g, (whole, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare;
    if (!name) return whole;
    const v = env[name];
    if (v === undefined) throw new PipelineError("invalid_config", `environment variable ${name} is not set`);
    return v;
  });
}

function numberFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new PipelineError("invalid_config", `${name} must be a number, got ${JSON.stringify(raw)}`);
  return n;
}

async function readConfigFile(filePath: string, required: boolean): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (!required && errnoCode(err) === "ENOENT") return {};
    throw new PipelineError("invalid_config", `cannot read config ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  try {
    return YAML.parse(raw) ?? {};
  } catch (err) {
    throw new PipelineError("invalid_config", `invalid YAML in ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

function withEnvOverrides(parsed: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return parsed;
  const obj: Record<string, unknown> = { ...parsed };
  const section = (key: string): Record<string, unknown> => {
    const current = obj[key];
    const copy: Record<string, unknown> =
      current && typeof current === "object" && !Array.isArray(current) ? { ...current } : {};
    obj[key] = copy;
    return copy;
  };

  const minLength = numberFromEnv(env, "MIN_CONTIG_LENGTH");
  if (minLength !== undefined) section("filter").min_length = minLength;

  const command = env.MLST_COMMAND?.trim();
  if (command) section("mlst").command = command;

  const timeout = numberFromEnv(env, "MLST_TIMEOUT_SECONDS");
  if (timeout !== undefined) section("mlst").timeout_seconds = timeout;

  const reportsDir = env.REPORTS_DIR?.trim();
  if (reportsDir) obj.reports_dir = reportsDir;

  return obj;
}

/**
 * Loads, overrides from the environment and validates the pipeline config.
 * Relative `mlst.output_dir` and `reports_dir` resolve against `rootDir`.
 */
export async function loadPipelineConfig(opts: LoadConfigOptions): Promise<PipelineConfig> {
  const env = opts.env ?? process.env;
  const explicit = opts.configPath ?? env.CONTIGTYPER_CONFIG?.trim() ?? null;
  const filePath = explicit ? path.resolve(opts.rootDir, explicit) : path.join(opts.rootDir, DEFAULT_CONFIG_FILE);

  const parsed = withEnvOverrides(await readConfigFile(filePath, Boolean(explicit)), env);
  const result = zPipelineConfig.safeParse(parsed);
  if (!result.success) {
    throw new PipelineError("invalid_config", `invalid config ${filePath}: ${z.prettifyError(result.error)}`);
  }

  const config = result.data;
  const resolvePath = (p: string | null): string | null =>
    p === null ? null : path.resolve(opts.rootDir, expandEnvToken(p, env));

  return {
    ...config,
    mlst: { ...config.mlst, output_dir: resolvePath(config.mlst.output_dir) },
    reports_dir: resolvePath(config.reports_dir)
  };
}
