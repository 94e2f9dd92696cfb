export interface ExecutionResources {
  /** Kill the process after this many seconds; null waits indefinitely. */
  timeoutSeconds: number | null;
}

export interface ExecutionResult {
  exitCode: number;
  /** Captured stderr, capped, with markers for truncation and timeout. */
  stderr: string;
  timedOut: boolean;
  startedAt: string;
  finishedAt: string;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  /** stdout is written verbatim to this file. */
  stdoutPath: string;
}

export type ExecutionSpec = LocalProcessSpec;

export interface RunnerBackend<K extends ExecutionSpec["kind"] = ExecutionSpec["kind"]> {
  kind: K;
  execute(spec: Extract<ExecutionSpec, { kind: K }>, resources: ExecutionResources): Promise<ExecutionResult>;
}
