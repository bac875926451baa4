import { promises as fs } from "fs";
import path from "path";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunStatus } from "../core/run.js";
import type { PostgresStore } from "../store/postgresStore.js";

export interface RunJournalOptions {
  // Written once when the run finishes; null keeps the log in the store only.
  logFilePath: string | null;
  echo?: boolean;
}

/**
 * Structured event log of one run. Every event is stored as a run event and
 * kept as a JSON line; the lines are flushed to the run log file on finish.
 */
export class RunJournal {
  private readonly lines: string[] = [];
  private flushed = 0;

  constructor(
    private readonly store: PostgresStore,
    readonly runId: RunId,
    private readonly opts: RunJournalOptions
  ) {}

  async event(kind: string, message: string, data: JsonObject | null = null, unitId: string | null = null): Promise<void> {
    const line = JSON.stringify({ ts: new Date().toISOString(), kind, unit_id: unitId, message, data });
    this.lines.push(line);
    if (this.opts.echo ?? true) console.error(`[${this.runId}] ${kind}${unitId ? ` ${unitId}` : ""}: ${message}`);
    await this.store.addRunEvent(this.runId, kind, message, data, unitId);
  }

  async started(): Promise<void> {
    const now = new Date().toISOString();
    await this.store.updateRun(this.runId, { status: "running", startedAt: now, finishedAt: null, error: null });
    await this.event("run.started", "run started", { now });
  }

  async finish(status: Exclude<RunStatus, "planned" | "running">, exitCode: number, result: JsonObject, error: string | null): Promise<void> {
    await this.event(`run.${status}`, error ? `${status}: ${error}` : status, { exit_code: exitCode });
    await this.store.updateRun(this.runId, {
      status,
      finishedAt: new Date().toISOString(),
      exitCode,
      error,
      resultJson: result
    });
    await this.flush();
  }

  logText(): string {
    return this.lines.join("\n") + (this.lines.length ? "\n" : "");
  }

  private async flush(): Promise<void> {
    if (!this.opts.logFilePath) return;
    await fs.mkdir(path.dirname(this.opts.logFilePath), { recursive: true });
    const pending = this.lines.slice(this.flushed);
    if (pending.length === 0) return;
    await fs.appendFile(this.opts.logFilePath, pending.join("\n") + "\n", "utf8");
    this.flushed = this.lines.length;
  }
}
