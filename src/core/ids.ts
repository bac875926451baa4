import { ulid } from "ulid";
import { createHash } from "crypto";
import { encodeCrockfordBase32_128bits } from "./canonicalJson.js";

export type RunId = `run_${string}`;

const UNIT_ID_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const RUN_ID_RE = /^run_[0-9A-HJKMNP-TV-Z]{26}$/;

export function newRunId(): RunId {
  return `run_${ulid()}`;
}

export function deriveRunIdFromParts(parts: string[]): RunId {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return `run_${encodeCrockfordBase32_128bits(h.digest().subarray(0, 16))}`;
}

export function isRunId(value: string): value is RunId {
  return RUN_ID_RE.test(value);
}

export function isSafeUnitId(value: string): boolean {
  return value.length <= 128 && UNIT_ID_RE.test(value) && value !== "." && value !== "..";
}

// Container and Slurm job names accept a narrower alphabet than unit ids.
export function jobNameFor(runId: RunId, unitId: string, attempt: number): string {
  const unit = unitId.replace(/[^A-Za-z0-9_.-]/g, "_");
  return `fanout_${runId.slice(4, 14).toLowerCase()}_${unit}_a${attempt}`.slice(0, 128);
}
