import type { FanoutErrorKind } from "../core/errors.js";
import type { ExecutionResult, TaskHandle, UnitState } from "../core/task.js";
import { TERMINAL_UNIT_STATES } from "../core/task.js";
import { decideRetry, type RetryDecision, type RetryPolicyConfig } from "./retryPolicy.js";

const TRANSITIONS: Readonly<Record<UnitState, readonly UnitState[]>> = {
  Planned: ["Submitted", "PermanentlyFailed"],
  Submitted: ["Running", "PermanentlyFailed"],
  Running: ["Succeeded", "Escalating", "PermanentlyFailed"],
  Escalating: ["Submitted", "PermanentlyFailed"],
  Succeeded: [],
  PermanentlyFailed: []
};

export class InvalidTransitionError extends Error {
  constructor(unitId: string, from: UnitState, to: UnitState) {
    super(`unit ${unitId}: invalid transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export interface UnitSnapshot {
  unitId: string;
  state: UnitState;
  attempt: number;
  memoryMb: number;
  escalations: number;
  handle: TaskHandle | null;
  exitCode: number | null;
  errorKind: FanoutErrorKind | null;
  error: string | null;
  aggregated: boolean;
}

export type Observation =
  | { applied: true; decision: RetryDecision; state: UnitState }
  // A repeat carries the attempt's recorded decision; a stale result has none.
  | { applied: false; decision: RetryDecision | null; state: UnitState };

/**
 * Per-unit lifecycle: Planned -> Submitted -> Running -> {Succeeded |
 * Escalating | PermanentlyFailed}, with Escalating -> Submitted carrying a
 * larger memory request. A terminal result is applied at most once per attempt.
 */
export class UnitTracker {
  private snap: UnitSnapshot;
  private readonly decisions = new Map<number, RetryDecision>();

  constructor(
    unitId: string,
    initialMemoryMb: number,
    private readonly policy: RetryPolicyConfig,
    restored?: UnitSnapshot
  ) {
    this.snap = restored
      ? { ...restored }
      : {
          unitId,
          state: "Planned",
          attempt: 0,
          memoryMb: initialMemoryMb,
          escalations: 0,
          handle: null,
          exitCode: null,
          errorKind: null,
          error: null,
          aggregated: false
        };
  }

  get unitId(): string {
    return this.snap.unitId;
  }

  get state(): UnitState {
    return this.snap.state;
  }

  get attempt(): number {
    return this.snap.attempt;
  }

  get memoryMb(): number {
    return this.snap.memoryMb;
  }

  get handle(): TaskHandle | null {
    return this.snap.handle;
  }

  isTerminal(): boolean {
    return TERMINAL_UNIT_STATES.has(this.snap.state);
  }

  isOutstanding(): boolean {
    return this.snap.state === "Submitted" || this.snap.state === "Running";
  }

  needsSubmission(): boolean {
    return this.snap.state === "Planned" || this.snap.state === "Escalating";
  }

  snapshot(): UnitSnapshot {
    return { ...this.snap, handle: this.snap.handle ? { ...this.snap.handle } : null };
  }

  private transition(to: UnitState): void {
    if (!TRANSITIONS[this.snap.state].includes(to)) {
      throw new InvalidTransitionError(this.snap.unitId, this.snap.state, to);
    }
    this.snap.state = to;
  }

  /** Attempt number the next submission must carry. */
  nextAttempt(): number {
    return this.snap.attempt + 1;
  }

  markSubmitted(handle: TaskHandle): void {
    if (handle.attempt !== this.nextAttempt()) {
      throw new Error(`unit ${this.snap.unitId}: expected attempt ${this.nextAttempt()}, got ${handle.attempt}`);
    }
    this.transition("Submitted");
    this.snap.attempt = handle.attempt;
    this.snap.handle = handle;
    this.snap.exitCode = null;
  }

  markRunning(): void {
    if (this.snap.state === "Running") return;
    this.transition("Running");
  }

  observe(attempt: number, result: ExecutionResult): Observation {
    const previous = this.decisions.get(attempt);
    if (previous) return { decision: previous, applied: false, state: this.snap.state };
    if (attempt !== this.snap.attempt || !this.isOutstanding()) {
      return { decision: null, applied: false, state: this.snap.state };
    }

    if (this.snap.state === "Submitted") this.transition("Running");

    const decision = decideRetry(result, this.snap.memoryMb, this.policy);
    this.decisions.set(attempt, decision);
    this.snap.exitCode = result.exitCode;

    switch (decision.action) {
      case "succeed":
        this.transition("Succeeded");
        this.snap.errorKind = null;
        this.snap.error = null;
        break;
      case "escalate":
        this.transition("Escalating");
        this.snap.memoryMb = decision.memoryMb;
        this.snap.escalations += 1;
        this.snap.handle = null;
        break;
      case "fail":
        this.transition("PermanentlyFailed");
        this.snap.errorKind = decision.errorKind;
        this.snap.error = decision.reason;
        break;
    }

    return { decision, applied: true, state: this.snap.state };
  }

  /** Failure outside a terminal observation: submission errors and cancellation. */
  fail(errorKind: FanoutErrorKind, reason: string): void {
    if (this.isTerminal()) return;
    this.transition("PermanentlyFailed");
    this.snap.errorKind = errorKind;
    this.snap.error = reason;
  }

  markAggregated(): void {
    this.snap.aggregated = true;
  }

  /** Operator-requested re-run of a failed unit; starts over at the initial memory request. */
  reset(initialMemoryMb: number): void {
    this.snap = {
      ...this.snap,
      state: "Planned",
      memoryMb: initialMemoryMb,
      escalations: 0,
      handle: null,
      exitCode: null,
      errorKind: null,
      error: null,
      aggregated: false
    };
  }
}
