#!/usr/bin/env node
import path from "path";
import { assertKnownArgs, intArg, parseArgs, stringArg } from "../src/cli/args.js";
import { loadPipelineConfig } from "../src/config/config.js";
import { runFilterPass } from "../src/passes/filterPass.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/filter_contigs.ts [--root <dir>] [--min-length <n>] [--config <file>]",
    "",
    "notes:",
    "  - Every immediate subdirectory of the root (default: current directory) holding contigs.fasta",
    "    gets a contigs_filtered.fasta with only the contigs of at least --min-length (default 1000) bases.",
    "  - Samples that fail are reported on stderr; the exit status stays 0.",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  assertKnownArgs(args, ["root", "min-length", "config"]);

  const rootDir = path.resolve(stringArg(args, "root") ?? process.cwd());
  const config = await loadPipelineConfig({ rootDir, configPath: stringArg(args, "config") });
  const minLength = intArg(args, "min-length");
  if (minLength !== null) config.filter.min_length = minLength;

  await runFilterPass({ rootDir, config });
  process.stdout.write("Filtering complete.\n");
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
