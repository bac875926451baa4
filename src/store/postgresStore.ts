import type { Kysely, Selectable, Updateable } from "kysely";
import type { FanoutErrorKind } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunRecord, RunStatus } from "../core/run.js";
import type { FrameworkKind, UnitState } from "../core/task.js";
import type { DB } from "../db/types.js";
import type { UnitSnapshot } from "../tasks/unitTracker.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

const UNIT_STATES: readonly UnitState[] = ["Planned", "Submitted", "Running", "Succeeded", "Escalating", "PermanentlyFailed"];
const RUN_STATUSES: readonly RunStatus[] = ["planned", "running", "succeeded", "partial", "failed", "cancelled"];
const ERROR_KINDS: readonly FanoutErrorKind[] = [
  "InvalidInputError",
  "ConfigError",
  "StagingError",
  "ResourceExhaustedError",
  "TaskFailedError",
  "ExternalSchedulerError",
  "AggregationConflictError",
  "Cancelled"
];

function oneOf<T extends string>(allowed: readonly T[], value: string, what: string): T {
  const found = allowed.find((a) => a === value);
  if (found === undefined) throw new Error(`unexpected ${what} in store: ${value}`);
  return found;
}

export interface StoredUnit extends UnitSnapshot {
  ordinal: number;
  label: string;
  updatedAt: string;
}

export interface RunEventRecord {
  ts: string;
  kind: string;
  unitId: string | null;
  message: string | null;
  data: JsonObject | null;
}

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createRun(input: {
    runId: RunId;
    template: string;
    inputRoot: string;
    outputRoot: string;
    backend: FrameworkKind;
    configHash: `sha256:${string}`;
    status: RunStatus;
    requestedBy: string | null;
    configSnapshot: JsonObject | null;
    environment: JsonObject | null;
  }): Promise<RunRecord> {
    await this.db
      .insertInto("fanout_runs")
      .values({
        run_id: input.runId,
        template: input.template,
        input_root: input.inputRoot,
        output_root: input.outputRoot,
        backend: input.backend,
        config_hash: input.configHash,
        status: input.status,
        requested_by: input.requestedBy,
        config_snapshot: input.configSnapshot,
        environment: input.environment
      })
      .onConflict((oc) => oc.column("run_id").doNothing())
      .execute();

    const row = await this.db
      .selectFrom("fanout_runs")
      .selectAll()
      .where("run_id", "=", input.runId)
      .executeTakeFirstOrThrow();

    return this.mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("fanout_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    const rows = await this.db
      .selectFrom("fanout_runs")
      .selectAll()
      .orderBy("created_at", "desc")
      .orderBy("run_id", "desc")
      .limit(limit)
      .execute();
    return rows.map((r) => this.mapRun(r));
  }

  async updateRun(
    runId: RunId,
    patch: Partial<Pick<RunRecord, "status" | "startedAt" | "finishedAt" | "exitCode" | "error" | "resultJson">>
  ): Promise<void> {
    const updates: Updateable<DB["fanout_runs"]> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.startedAt !== undefined) updates.started_at = patch.startedAt;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.exitCode !== undefined) updates.exit_code = patch.exitCode;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.resultJson !== undefined) updates.result_json = patch.resultJson;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("fanout_runs").set(updates).where("run_id", "=", runId).execute();
  }

  /** Insert or overwrite one unit's checkpoint. */
  async saveUnit(runId: RunId, unit: UnitSnapshot & { ordinal: number; label: string }): Promise<void> {
    const values = {
      state: unit.state,
      attempt: unit.attempt,
      memory_mb: unit.memoryMb,
      escalations: unit.escalations,
      handle: unit.handle,
      exit_code: unit.exitCode,
      error_kind: unit.errorKind,
      error: unit.error,
      aggregated: unit.aggregated,
      updated_at: new Date().toISOString()
    };

    await this.db
      .insertInto("fanout_units")
      .values({ run_id: runId, unit_id: unit.unitId, ordinal: unit.ordinal, label: unit.label, ...values })
      .onConflict((oc) => oc.columns(["run_id", "unit_id"]).doUpdateSet(values))
      .execute();
  }

  async listUnits(runId: RunId): Promise<StoredUnit[]> {
    const rows = await this.db
      .selectFrom("fanout_units")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("ordinal", "asc")
      .execute();
    return rows.map((r) => this.mapUnit(r));
  }

  async addRunEvent(
    runId: RunId,
    kind: string,
    message: string | null,
    data: JsonObject | null,
    unitId: string | null = null
  ): Promise<void> {
    await this.db
      .insertInto("fanout_run_events")
      .values({
        run_id: runId,
        kind,
        unit_id: unitId,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(runId: RunId, limit: number): Promise<RunEventRecord[]> {
    const rows = await this.db
      .selectFrom("fanout_run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .limit(limit)
      .execute();
    return rows.map((r) => ({
      ts: toIso((r as unknown as { ts: unknown }).ts),
      kind: r.kind,
      unitId: r.unit_id,
      message: r.message,
      data: r.data ? (r.data as JsonObject) : null
    }));
  }

  private mapUnit(row: Selectable<DB["fanout_units"]>): StoredUnit {
    return {
      unitId: row.unit_id,
      ordinal: row.ordinal,
      label: row.label,
      state: oneOf(UNIT_STATES, row.state, "unit state"),
      attempt: row.attempt,
      memoryMb: row.memory_mb,
      escalations: row.escalations,
      handle: row.handle ?? null,
      exitCode: row.exit_code,
      errorKind: row.error_kind === null ? null : oneOf(ERROR_KINDS, row.error_kind, "error kind"),
      error: row.error,
      aggregated: row.aggregated,
      updatedAt: toIso((row as unknown as { updated_at: unknown }).updated_at)
    };
  }

  private mapRun(row: Selectable<DB["fanout_runs"]>): RunRecord {
    return {
      runId: row.run_id as RunId,
      template: row.template,
      inputRoot: row.input_root,
      outputRoot: row.output_root,
      backend: oneOf<FrameworkKind>(["docker", "slurm"], row.backend, "backend"),
      configHash: row.config_hash as `sha256:${string}`,
      status: oneOf(RUN_STATUSES, row.status, "run status"),
      requestedBy: row.requested_by,
      createdAt: toIso((row as unknown as { created_at: unknown }).created_at),
      startedAt: toIsoOrNull((row as unknown as { started_at: unknown }).started_at),
      finishedAt: toIsoOrNull((row as unknown as { finished_at: unknown }).finished_at),
      configSnapshot: row.config_snapshot ? (row.config_snapshot as JsonObject) : null,
      environment: row.environment ? (row.environment as JsonObject) : null,
      exitCode: row.exit_code,
      error: row.error,
      resultJson: row.result_json ? (row.result_json as JsonObject) : null
    };
  }
}
