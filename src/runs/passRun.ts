import { promises as fs } from "fs";
import path from "path";
import { hashParams } from "../core/canonicalJson.js";
import { newRunId, type RunId } from "../core/ids.js";
import { errorMessage } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";

export type PassName = "filter_contigs" | "mlst";

export type SampleOutcome =
  | { sampleId: string; status: "ok"; detail: JsonObject }
  | { sampleId: string; status: "skipped"; reason: "missing_input" }
  | { sampleId: string; status: "failed"; code: string; error: string };

export interface RunEvent {
  ts: string;
  kind: string;
  message: string;
  data: JsonObject | null;
}

export interface PassReport {
  runId: RunId;
  pass: PassName;
  rootDir: string;
  paramsHash: `sha256:${string}`;
  params: JsonObject;
  startedAt: string;
  finishedAt: string;
  counts: { ok: number; skipped: number; failed: number };
  samples: SampleOutcome[];
}

export type EventSink = (line: string) => void;

export const stderrSink: EventSink = (line) => {
  console.error(line);
};

export function renderEvent(event: RunEvent): string {
  return `[${event.kind}] ${event.message}`;
}

/**
 * Event log and outcome ledger for one pass over a sample root. Events are
 * persisted as JSON lines and echoed through the sink as they happen.
 */
export class PassRun {
  readonly runId: RunId;
  readonly paramsHash: `sha256:${string}`;
  private readonly eventLog: RunEvent[] = [];
  private readonly outcomes: SampleOutcome[] = [];
  private startedAt: string | null = null;

  constructor(
    private readonly info: {
      pass: PassName;
      rootDir: string;
      params: JsonObject;
      reportsDir?: string | null;
      sink?: EventSink;
    }
  ) {
    this.runId = newRunId();
    this.paramsHash = hashParams(info.params);
  }

  get events(): readonly RunEvent[] {
    return this.eventLog;
  }

  start(): void {
    this.startedAt = new Date().toISOString();
    this.event("run.started", `pass=${this.info.pass} root=${this.info.rootDir}`, {
      run_id: this.runId,
      params_hash: this.paramsHash,
      params: this.info.params
    });
  }

  event(kind: string, message: string, data: JsonObject | null): void {
    const event: RunEvent = { ts: new Date().toISOString(), kind, message, data };
    this.eventLog.push(event);
    (this.info.sink ?? stderrSink)(renderEvent(event));
  }

  recordOk(sampleId: string, kind: string, message: string, detail: JsonObject): void {
    this.outcomes.push({ sampleId, status: "ok", detail });
    this.event(kind, `${sampleId}: ${message}`, { sample_id: sampleId, ...detail });
  }

  recordSkipped(sampleId: string): void {
    this.outcomes.push({ sampleId, status: "skipped", reason: "missing_input" });
    this.event("sample.skipped", `${sampleId}: no input file`, { sample_id: sampleId });
  }

  recordFailure(sampleId: string, code: string, error: string): void {
    this.outcomes.push({ sampleId, status: "failed", code, error });
    this.event("sample.failed", `${sampleId}: ${error}`, { sample_id: sampleId, code });
  }

  async finish(): Promise<PassReport> {
    const counts = { ok: 0, skipped: 0, failed: 0 };
    for (const o of this.outcomes) counts[o.status]++;

    this.event("run.finished", `ok=${counts.ok} skipped=${counts.skipped} failed=${counts.failed}`, counts);

    const finishedAt = new Date().toISOString();
    const report: PassReport = {
      runId: this.runId,
      pass: this.info.pass,
      rootDir: this.info.rootDir,
      paramsHash: this.paramsHash,
      params: this.info.params,
      startedAt: this.startedAt ?? finishedAt,
      finishedAt,
      counts,
      samples: [...this.outcomes]
    };

    if (this.info.reportsDir) {
      await this.persist(this.info.reportsDir, report);
    }
    return report;
  }

  private async persist(reportsDir: string, report: PassReport): Promise<void> {
    try {
      const logText = this.eventLog.map((e) => JSON.stringify(e)).join("\n") + "\n";
      await fs.mkdir(reportsDir, { recursive: true });
      await fs.writeFile(path.join(reportsDir, `${this.runId}.log.jsonl`), logText, "utf8");
      await fs.writeFile(path.join(reportsDir, `${this.runId}.report.json`), JSON.stringify(report, null, 2) + "\n", "utf8");
    } catch (err) {
      console.error(`failed to write run report to ${reportsDir}: ${errorMessage(err)}`);
    }
  }
}
