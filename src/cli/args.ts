export type CliArgs = Record<string, string | boolean>;

export function parseArgs(argv: string[], flags: readonly string[] = ["help"]): CliArgs {
  const out: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (flags.includes(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

export function stringArg(args: CliArgs, key: string): string | null {
  const v = args[key];
  return typeof v === "string" ? v : null;
}

export function intArg(args: CliArgs, key: string): number | null {
  const v = stringArg(args, key);
  if (v === null) return null;
  const n = Number(v);
  if (!/^\d+$/.test(v) || !Number.isSafeInteger(n)) {
    throw new Error(`--${key} must be a non-negative integer, got ${JSON.stringify(v)}`);
  }
  return n;
}

export function assertKnownArgs(args: CliArgs, known: readonly string[]): void {
  for (const key of Object.keys(args)) {
    if (!known.includes(key)) throw new Error(`unknown option: --${key}`);
  }
}
