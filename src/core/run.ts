import type { RunId } from "./ids.js";
import type { JsonObject } from "./json.js";
import type { FrameworkKind } from "./task.js";

export type RunStatus = "planned" | "running" | "succeeded" | "partial" | "failed" | "cancelled";

export interface RunRecord {
  runId: RunId;
  template: string;
  inputRoot: string;
  outputRoot: string;
  backend: FrameworkKind;
  configHash: `sha256:${string}`;
  status: RunStatus;
  requestedBy: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  configSnapshot: JsonObject | null;
  environment: JsonObject | null;
  exitCode: number | null;
  error: string | null;
  resultJson: JsonObject | null;
}
