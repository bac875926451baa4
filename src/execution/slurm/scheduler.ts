import { spawnSync } from "child_process";

export type SlurmNormalizedState = "queued" | "running" | "succeeded" | "failed" | "unknown";

export interface SlurmJobInfo {
  source: "sacct" | "squeue";
  stateRaw: string;
  normalizedState: SlurmNormalizedState;
  exitCode: number | null;
  outOfMemory: boolean;
  cancelled: boolean;
}

export interface SlurmQueryResult {
  info: SlurmJobInfo | null;
  warnings: string[];
}

export interface SlurmScheduler {
  query(jobId: string): Promise<SlurmQueryResult>;
}

const FAILED_STATES = ["FAILED", "CANCELLED", "TIMEOUT", "NODE_FAIL", "OUT_OF_MEMORY", "PREEMPTED", "BOOT_FAIL", "DEADLINE"];

export function normalizeSlurmState(stateRaw: string, exitCode: number | null): SlurmNormalizedState {
  const s = stateRaw.trim().toUpperCase();
  if (!s) return "unknown";

  if (s.includes("PENDING") || s === "PD" || s.includes("CONFIGURING") || s.includes("REQUEUED")) return "queued";
  if (s.includes("RUNNING") || s === "R" || s.includes("COMPLETING") || s === "CG") return "running";

  if (s.includes("COMPLETED")) {
    if (exitCode === null) return "unknown";
    return exitCode === 0 ? "succeeded" : "failed";
  }
  if (FAILED_STATES.some((f) => s.includes(f))) return "failed";
  return "unknown";
}

// sacct prints "code:signal".
export function parseExitCodeField(value: string): number | null {
  const first = value.trim().split(":")[0] ?? "";
  if (!first) return null;
  const n = Number.parseInt(first, 10);
  return Number.isInteger(n) ? n : null;
}

function describeInfo(source: SlurmJobInfo["source"], stateRaw: string, exitCode: number | null): SlurmJobInfo {
  const upper = stateRaw.toUpperCase();
  return {
    source,
    stateRaw,
    normalizedState: normalizeSlurmState(stateRaw, exitCode),
    exitCode,
    outOfMemory: upper.includes("OUT_OF_MEMORY"),
    cancelled: upper.includes("CANCELLED")
  };
}

/** Picks the job's own row out of sacct's output, ignoring `.batch`/`.extern` steps. */
export function parseSacctOutput(jobId: string, stdout: string): SlurmJobInfo | null {
  const rows = stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .map((l) => {
      const [job = "", state = "", exit = ""] = l.split("|");
      return { job, state, exit };
    })
    .filter((r) => r.job.length > 0);

  const primary = rows.find((r) => r.job === jobId) ?? rows.find((r) => !r.job.includes(".")) ?? rows[0];
  if (!primary) return null;
  return describeInfo("sacct", primary.state, parseExitCodeField(primary.exit));
}

type ToolOutcome = { ok: true; stdout: string } | { ok: false; warning: string };

function runTool(bin: string, args: string[]): ToolOutcome {
  const res = spawnSync(bin, args, { stdio: ["ignore", "pipe", "pipe"] });
  if (res.error) return { ok: false, warning: `${bin} unavailable: ${res.error.message}` };

  const stderr = res.stderr ? res.stderr.toString("utf8").trim() : "";
  if (res.status !== 0) {
    return { ok: false, warning: `${bin} failed (exit ${res.status})${stderr ? `: ${stderr}` : ""}` };
  }
  return { ok: true, stdout: res.stdout ? res.stdout.toString("utf8") : "" };
}

/** sacct first, squeue when accounting has no record yet. */
export class SystemSlurmScheduler implements SlurmScheduler {
  async query(jobId: string): Promise<SlurmQueryResult> {
    const warnings: string[] = [];

    const sacct = runTool("sacct", ["-j", jobId, "--noheader", "--parsable2", "-o", "JobIDRaw,State,ExitCode"]);
    if (sacct.ok) {
      const info = parseSacctOutput(jobId, sacct.stdout);
      if (info) return { info, warnings };
      warnings.push("sacct returned no rows");
    } else {
      warnings.push(sacct.warning);
    }

    const squeue = runTool("squeue", ["-j", jobId, "-h", "-o", "%T"]);
    if (squeue.ok) {
      const state = squeue.stdout.trim();
      if (state) return { info: describeInfo("squeue", state, null), warnings };
      warnings.push("squeue returned no rows");
    } else {
      warnings.push(squeue.warning);
    }

    return { info: null, warnings };
  }
}
