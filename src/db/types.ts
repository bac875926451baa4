import type { ColumnType, Generated, JSONColumnType } from "kysely";
import type { TaskHandle } from "../core/task.js";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
type HandleColumn = JSONColumnType<TaskHandle | null, TaskHandle | null | undefined, TaskHandle | null>;

export interface FanoutRunsTable {
  run_id: string;
  template: string;
  input_root: string;
  output_root: string;
  backend: string;
  config_hash: string;
  status: string;
  requested_by: OptionalNullable<string>;
  created_at: Generated<string>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
  config_snapshot: JsonNullable;
  environment: JsonNullable;
  exit_code: ColumnType<number | null, number | null | undefined, number | null>;
  error: OptionalNullable<string>;
  result_json: JsonNullable;
}

export interface FanoutUnitsTable {
  run_id: string;
  unit_id: string;
  ordinal: number;
  label: string;
  state: string;
  attempt: number;
  memory_mb: number;
  escalations: number;
  handle: HandleColumn;
  exit_code: ColumnType<number | null, number | null | undefined, number | null>;
  error_kind: OptionalNullable<string>;
  error: OptionalNullable<string>;
  aggregated: boolean;
  updated_at: Generated<string>;
}

export interface FanoutRunEventsTable {
  event_id: Generated<string>;
  run_id: string;
  ts: Generated<string>;
  kind: string;
  unit_id: OptionalNullable<string>;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  fanout_runs: FanoutRunsTable;
  fanout_units: FanoutUnitsTable;
  fanout_run_events: FanoutRunEventsTable;
}
