export type PipelineErrorCode =
  | "missing_input"
  | "malformed_record"
  | "read_failure"
  | "write_failure"
  | "collaborator_failure"
  | "root_unavailable"
  | "invalid_config";

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | null {
  if (typeof err !== "object" || err === null || !("code" in err)) return null;
  return typeof err.code === "string" ? err.code : null;
}
