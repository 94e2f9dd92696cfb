import { promises as fs, type Dirent } from "fs";
import path from "path";
import { PipelineError, errnoCode, errorMessage } from "../core/errors.js";

export interface SampleDirectory {
  sampleId: string;
  dir: string;
  /** Absolute path of the sample's input file, or null when the sample has none. */
  inputPath: string | null;
}

export type SampleWithInput = SampleDirectory & { inputPath: string };

export interface SampleWalkerOptions {
  rootDir: string;
  inputFileName: string;
  /** Paths under the root that are never samples, such as a reports directory. */
  exclude?: readonly string[];
}

function assertPlainFileName(name: string): void {
  if (name.length === 0 || name !== path.basename(name) || name === "." || name === "..") {
    throw new Error(`input file name must be a bare file name: ${JSON.stringify(name)}`);
  }
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") return false;
    throw err;
  }
}

/**
 * Finds the immediate child directories of a root and, in each, the input
 * file at a fixed relative name. Children are visited in name order; hidden
 * entries (`.git`, `.snakemake`) are not samples.
 *
 * Only listing the root can fail the walk. Each entry is resolved separately
 * by `inspectSample`, so callers can isolate a child that cannot be read.
 */
export class SampleDirectoryWalker {
  readonly rootDir: string;
  readonly inputFileName: string;
  private readonly excluded: ReadonlySet<string>;

  constructor(opts: SampleWalkerOptions) {
    assertPlainFileName(opts.inputFileName);
    this.rootDir = path.resolve(opts.rootDir);
    this.inputFileName = opts.inputFileName;
    this.excluded = new Set((opts.exclude ?? []).map((p) => path.resolve(this.rootDir, p)));
  }

  /** Candidate entries: child directories and symlinks, which may point at directories. */
  async listEntries(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    } catch (err) {
      throw new PipelineError("root_unavailable", `cannot list ${this.rootDir}: ${errorMessage(err)}`, { cause: err });
    }

    return entries
      .filter((e) => !e.name.startsWith(".") && (e.isDirectory() || e.isSymbolicLink()))
      .map((e) => e.name)
      .sort()
      .map((name) => path.join(this.rootDir, name))
      .filter((full) => !this.excluded.has(full));
  }

  sampleIdOf(entry: string): string {
    return path.basename(entry);
  }

  /**
   * Resolves one entry. Returns null when it is not a directory, including a
   * dangling or looping symlink; any other stat error is a `read_failure`.
   */
  async inspectSample(entry: string): Promise<SampleDirectory | null> {
    try {
      if (!(await fs.stat(entry)).isDirectory()) return null;
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "ENOTDIR" || code === "ELOOP") return null;
      throw new PipelineError("read_failure", `cannot inspect ${entry}: ${errorMessage(err)}`, { cause: err });
    }

    const candidate = path.join(entry, this.inputFileName);
    let hasInput: boolean;
    try {
      hasInput = await isFile(candidate);
    } catch (err) {
      throw new PipelineError("read_failure", `cannot inspect ${candidate}: ${errorMessage(err)}`, { cause: err });
    }
    return { sampleId: this.sampleIdOf(entry), dir: entry, inputPath: hasInput ? candidate : null };
  }
}
