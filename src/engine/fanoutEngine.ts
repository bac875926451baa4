import { setTimeout as sleep } from "timers/promises";
import { aggregateUnits, type AggregationOptions } from "../aggregate/aggregator.js";
import { FanoutError, type FanoutErrorKind, errorMessage } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunStatus } from "../core/run.js";
import type { MountBinding, PollOutcome, UnitState } from "../core/task.js";
import type { AnalysisUnit } from "../core/unit.js";
import { discoverUnits, type DiscoveryOptions } from "../discovery/discovery.js";
import type { ExecutionFramework } from "../execution/types.js";
import { resetOutputDir } from "../execution/transfers.js";
import type { RunJournal } from "../runs/runJournal.js";
import { planStaging, type StagedUnit, type StagingContext } from "../staging/stagingPlanner.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { validateRetryPolicy, type RetryPolicyConfig } from "../tasks/retryPolicy.js";
import { buildTaskSpec, type TaskDefaults } from "../tasks/taskBuilder.js";
import type { TaskTemplate } from "../tasks/templates.js";
import { UnitTracker } from "../tasks/unitTracker.js";

export interface EngineSettings {
  runId: RunId;
  template: TaskTemplate;
  inputRoot: string;
  discovery: DiscoveryOptions;
  staging: StagingContext;
  defaults: TaskDefaults;
  initialMemoryMb: number;
  retry: RetryPolicyConfig;
  maxInFlight: number;
  pollIntervalMs: number;
  aggregation: AggregationOptions;
  retryFailed: boolean;
}

export interface EngineDeps {
  framework: ExecutionFramework;
  store: PostgresStore;
  journal: RunJournal;
}

export interface PlannedUnit {
  unitId: string;
  label: string;
  state: UnitState;
  argv: string[];
  bindings: MountBinding[];
  outputDir: string;
}

export interface PlanSummary {
  runId: RunId;
  template: string;
  units: PlannedUnit[];
  controlFiles: string[];
  skipped: Array<{ name: string; reason: string }>;
}

export interface UnitReport {
  unitId: string;
  label: string;
  state: UnitState;
  attempt: number;
  memoryMb: number;
  escalations: number;
  exitCode: number | null;
  errorKind: FanoutErrorKind | null;
  error: string | null;
  aggregated: boolean;
}

export interface RunReport {
  runId: RunId;
  status: Exclude<RunStatus, "planned" | "running">;
  exitCode: 0 | 1;
  succeeded: number;
  failed: number;
  units: UnitReport[];
  aggregationFailures: Array<{ unitId: string | null; message: string }>;
}

const KNOWN_KINDS: readonly FanoutErrorKind[] = [
  "InvalidInputError",
  "ConfigError",
  "StagingError",
  "ResourceExhaustedError",
  "TaskFailedError",
  "ExternalSchedulerError",
  "AggregationConflictError"
];

function errorKindOf(err: unknown): FanoutErrorKind {
  if (err instanceof FanoutError) {
    const found = KNOWN_KINDS.find((k) => k === err.name);
    if (found) return found;
  }
  return "ExternalSchedulerError";
}

export function reportToJson(report: RunReport): JsonObject {
  return {
    run_id: report.runId,
    status: report.status,
    exit_code: report.exitCode,
    succeeded: report.succeeded,
    failed: report.failed,
    units: report.units.map((u) => ({
      unit_id: u.unitId,
      label: u.label,
      state: u.state,
      attempt: u.attempt,
      memory_mb: u.memoryMb,
      escalations: u.escalations,
      exit_code: u.exitCode,
      error_kind: u.errorKind,
      error: u.error,
      aggregated: u.aggregated
    })),
    aggregation_failures: report.aggregationFailures.map((f) => ({ unit_id: f.unitId, message: f.message }))
  };
}

// An abort cuts the wait short; the loop then cancels.
async function pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
  if (ms <= 0 || signal?.aborted) return;
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
}

/**
 * Drives one run: plan, submit up to `maxInFlight` tasks, react to terminal
 * results one at a time, and merge outputs once every unit is terminal.
 * Each state change is checkpointed so a later invocation with the same run
 * id resumes instead of resubmitting.
 */
export class FanoutEngine {
  private readonly units: AnalysisUnit[] = [];
  private readonly trackers = new Map<string, UnitTracker>();
  private readonly staged = new Map<string, StagedUnit>();
  private readonly aggregationFailures: RunReport["aggregationFailures"] = [];
  private planned = false;
  private cancelled = false;

  constructor(
    private readonly deps: EngineDeps,
    private readonly settings: EngineSettings
  ) {
    validateRetryPolicy(settings.retry, settings.initialMemoryMb);
    if (!Number.isInteger(settings.maxInFlight) || settings.maxInFlight < 1) {
      throw new Error(`maxInFlight must be an integer >= 1 (got ${settings.maxInFlight})`);
    }
  }

  get runId(): RunId {
    return this.settings.runId;
  }

  async plan(opts: { dryRun?: boolean } = {}): Promise<PlanSummary> {
    const dryRun = opts.dryRun ?? false;
    const discovered = await discoverUnits(this.settings.inputRoot, this.settings.discovery);
    const stored = new Map((await this.deps.store.listUnits(this.runId)).map((u) => [u.unitId, u]));

    this.units.length = 0;
    this.trackers.clear();
    this.staged.clear();

    for (const unit of discovered.units) {
      const staged = await planStaging(unit, this.settings.template, { ...this.settings.staging, dryRun });
      this.units.push(unit);
      this.staged.set(unit.id, staged);

      const previous = stored.get(unit.id);
      const tracker = new UnitTracker(unit.id, this.settings.initialMemoryMb, this.settings.retry, previous);
      if (previous && this.settings.retryFailed && previous.state === "PermanentlyFailed") {
        tracker.reset(this.settings.initialMemoryMb);
      }
      this.trackers.set(unit.id, tracker);
    }

    if (!dryRun) {
      for (const [id, prev] of stored) {
        if (!this.trackers.has(id)) {
          await this.deps.journal.event("unit.orphaned", "checkpointed unit no longer discovered", { state: prev.state }, id);
        }
      }
      for (const unit of this.units) await this.save(unit.id);
      await this.deps.journal.event("run.planned", `${this.units.length} unit(s)`, {
        units: this.units.length,
        resumed: stored.size,
        skipped: discovered.skipped.map((s) => `${s.name}: ${s.reason}`)
      });
      this.planned = true;
    }

    return {
      runId: this.runId,
      template: this.settings.template.name,
      units: this.units.map((u) => {
        const staged = this.requireStaged(u.id);
        return {
          unitId: u.id,
          label: u.label,
          state: this.requireTracker(u.id).state,
          argv: staged.argv,
          bindings: staged.plan.bindings,
          outputDir: staged.plan.outputDir
        };
      }),
      controlFiles: discovered.controlFiles,
      skipped: discovered.skipped
    };
  }

  /** Submits waiting units until `maxInFlight` tasks are outstanding. */
  async submitReady(): Promise<number> {
    this.assertPlanned();
    if (this.cancelled) return 0;

    let outstanding = [...this.trackers.values()].filter((t) => t.isOutstanding()).length;
    let submitted = 0;

    for (const unit of this.units) {
      if (outstanding >= this.settings.maxInFlight) break;
      const tracker = this.requireTracker(unit.id);
      if (!tracker.needsSubmission()) continue;

      const task = buildTaskSpec({
        runId: this.runId,
        unit,
        staged: this.requireStaged(unit.id),
        template: this.settings.template,
        defaults: this.settings.defaults,
        attempt: tracker.nextAttempt(),
        memoryMb: tracker.memoryMb
      });

      try {
        // Files a failed attempt left behind must not reach aggregation.
        await resetOutputDir(task.outputDir);
        const handle = await this.deps.framework.submit(task);
        tracker.markSubmitted(handle);
        outstanding += 1;
        submitted += 1;
        await this.save(unit.id);
        await this.deps.journal.event(
          "unit.submitted",
          `attempt ${task.attempt} as ${handle.ref}`,
          { attempt: task.attempt, memory_mb: task.resources.memoryMb, ref: handle.ref },
          unit.id
        );
      } catch (err) {
        tracker.fail(errorKindOf(err), errorMessage(err));
        await this.save(unit.id);
        await this.deps.journal.event("unit.failed", errorMessage(err), { phase: "submission" }, unit.id);
      }
    }
    return submitted;
  }

  /** Polls every outstanding task once; returns how many observations changed a unit. */
  async pollOnce(): Promise<number> {
    this.assertPlanned();
    let changed = 0;

    for (const unit of this.units) {
      const tracker = this.requireTracker(unit.id);
      const handle = tracker.handle;
      if (!tracker.isOutstanding() || !handle) continue;

      let outcome: PollOutcome;
      try {
        outcome = await this.deps.framework.poll(handle);
      } catch (err) {
        tracker.fail("ExternalSchedulerError", errorMessage(err));
        await this.save(unit.id);
        await this.deps.journal.event("unit.failed", errorMessage(err), { phase: "execution" }, unit.id);
        changed += 1;
        continue;
      }

      if (outcome.kind === "pending") {
        if (outcome.running && tracker.state === "Submitted") {
          tracker.markRunning();
          await this.save(unit.id);
          await this.deps.journal.event("unit.running", `attempt ${handle.attempt} running`, null, unit.id);
        }
        continue;
      }

      const obs = tracker.observe(handle.attempt, outcome.result);
      if (!obs.applied) continue;
      changed += 1;
      await this.save(unit.id);

      const data: JsonObject = { attempt: handle.attempt, exit_code: outcome.result.exitCode };
      switch (obs.decision.action) {
        case "succeed":
          await this.deps.journal.event("unit.succeeded", `attempt ${handle.attempt} succeeded`, data, unit.id);
          break;
        case "escalate":
          await this.deps.journal.event(
            "unit.escalated",
            `out of memory; retrying with ${obs.decision.memoryMb} MB`,
            { ...data, memory_mb: obs.decision.memoryMb },
            unit.id
          );
          break;
        case "fail":
          await this.deps.journal.event(
            "unit.failed",
            obs.decision.reason,
            { ...data, error_kind: obs.decision.errorKind },
            unit.id
          );
          break;
      }
    }
    return changed;
  }

  isSettled(): boolean {
    return [...this.trackers.values()].every((t) => t.isTerminal());
  }

  async aggregate(): Promise<number> {
    this.assertPlanned();
    if (!this.isSettled()) {
      throw new FanoutError("cannot aggregate before every unit is terminal", { phase: "aggregation" });
    }

    const ready = this.units.filter((u) => {
      const t = this.requireTracker(u.id);
      return t.state === "Succeeded" && !t.snapshot().aggregated;
    });
    const report = await aggregateUnits(
      ready.map((u) => ({ unitId: u.id, outputDir: this.requireStaged(u.id).plan.outputDir })),
      this.settings.aggregation
    );

    for (const merged of report.merged) {
      this.requireTracker(merged.unitId).markAggregated();
      await this.save(merged.unitId);
      await this.deps.journal.event(
        "unit.aggregated",
        `${merged.entries} entr${merged.entries === 1 ? "y" : "ies"} from ${merged.apps.length} app dir(s)`,
        { apps: merged.apps, skipped: merged.skipped },
        merged.unitId
      );
    }
    for (const failure of report.failures) {
      this.aggregationFailures.push({ unitId: failure.unitId, message: failure.message });
      await this.deps.journal.event("unit.aggregation_failed", failure.message, null, failure.unitId);
    }
    return report.merged.length;
  }

  /** Forwards cancellation to the framework and fails every unit that has not succeeded. */
  async cancel(): Promise<void> {
    this.cancelled = true;
    for (const unit of this.units) {
      const tracker = this.requireTracker(unit.id);
      if (tracker.isTerminal()) continue;

      const handle = tracker.handle;
      if (tracker.isOutstanding() && handle && this.deps.framework.cancel) {
        try {
          await this.deps.framework.cancel(handle);
        } catch (err) {
          await this.deps.journal.event("unit.cancel_failed", errorMessage(err), null, unit.id);
        }
      }
      tracker.fail("Cancelled", "cancelled by operator");
      await this.save(unit.id);
      await this.deps.journal.event("unit.cancelled", "cancelled by operator", null, unit.id);
    }
  }

  /** Plan (if needed), drive the polling loop to completion, aggregate, and record the outcome. */
  async run(opts: { signal?: AbortSignal } = {}): Promise<RunReport> {
    if (!this.planned) await this.plan();
    await this.deps.journal.started();

    while (!this.isSettled()) {
      if (opts.signal?.aborted && !this.cancelled) await this.cancel();
      await this.submitReady();
      if (this.isSettled()) break;
      await this.pollOnce();
      if (this.isSettled()) break;
      await pause(this.settings.pollIntervalMs, opts.signal);
    }

    await this.aggregate();

    const report = this.report();
    await this.deps.journal.finish(
      report.status,
      report.exitCode,
      reportToJson(report),
      report.exitCode === 0 ? null : `${report.failed} unit(s) failed, ${report.aggregationFailures.length} aggregation failure(s)`
    );
    return report;
  }

  report(): RunReport {
    const units: UnitReport[] = this.units.map((u) => {
      const s = this.requireTracker(u.id).snapshot();
      return {
        unitId: u.id,
        label: u.label,
        state: s.state,
        attempt: s.attempt,
        memoryMb: s.memoryMb,
        escalations: s.escalations,
        exitCode: s.exitCode,
        errorKind: s.errorKind,
        error: s.error,
        aggregated: s.aggregated
      };
    });
    const succeeded = units.filter((u) => u.state === "Succeeded").length;
    const failed = units.filter((u) => u.state === "PermanentlyFailed").length;
    const clean = failed === 0 && this.aggregationFailures.length === 0 && succeeded === units.length;

    let status: RunReport["status"];
    if (this.cancelled) status = "cancelled";
    else if (clean) status = "succeeded";
    else if (succeeded === 0) status = "failed";
    else status = "partial";

    return {
      runId: this.runId,
      status,
      exitCode: clean && !this.cancelled ? 0 : 1,
      succeeded,
      failed,
      units,
      aggregationFailures: [...this.aggregationFailures]
    };
  }

  private async save(unitId: string): Promise<void> {
    const ordinal = this.units.findIndex((u) => u.id === unitId);
    const unit = this.units[ordinal];
    if (!unit) throw new Error(`unknown unit: ${unitId}`);
    await this.deps.store.saveUnit(this.runId, { ...this.requireTracker(unitId).snapshot(), ordinal, label: unit.label });
  }

  private assertPlanned(): void {
    if (!this.planned) throw new Error("plan() must run before submission, polling or aggregation");
  }

  private requireTracker(unitId: string): UnitTracker {
    const t = this.trackers.get(unitId);
    if (!t) throw new Error(`unknown unit: ${unitId}`);
    return t;
  }

  private requireStaged(unitId: string): StagedUnit {
    const s = this.staged.get(unitId);
    if (!s) throw new Error(`unknown unit: ${unitId}`);
    return s;
  }
}
