#!/usr/bin/env node
import path from "path";
import { assertKnownArgs, parseArgs, stringArg } from "../src/cli/args.js";
import { loadPipelineConfig } from "../src/config/config.js";
import { runMlstPass } from "../src/passes/mlstPass.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/run_mlst.ts [--root <dir>] [--out <dir>] [--config <file>]",
    "",
    "notes:",
    "  - Runs `mlst <sample>/contigs.fasta` for every immediate subdirectory of the root",
    "    (default: current directory) and saves stdout as <out>/<sample>_mlst_output.",
    "  - The executable, extra arguments and timeout come from the mlst section of the config.",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  assertKnownArgs(args, ["root", "out", "config"]);

  const rootDir = path.resolve(stringArg(args, "root") ?? process.cwd());
  const config = await loadPipelineConfig({ rootDir, configPath: stringArg(args, "config") });
  const out = stringArg(args, "out");

  await runMlstPass({ rootDir, config, outputDir: out === null ? null : path.resolve(out) });
  process.stdout.write("MLST typing complete.\n");
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
