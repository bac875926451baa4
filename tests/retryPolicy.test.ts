import { describe, it, expect } from "vitest";
import { ConfigError } from "../src/core/errors.js";
import type { ExecutionResult, TaskHandle } from "../src/core/task.js";
import {
  decideRetry,
  escalatedMemory,
  maxEscalations,
  validateRetryPolicy,
  type RetryPolicyConfig
} from "../src/tasks/retryPolicy.js";
import { InvalidTransitionError, UnitTracker } from "../src/tasks/unitTracker.js";

const policy: RetryPolicyConfig = { oomExitCode: 137, growthFactor: 2, ceilingMemoryMb: 32768 };

function result(exitCode: number | null, terminalState: ExecutionResult["terminalState"] = "exited"): ExecutionResult {
  return { exitCode, terminalState, outputDir: "/out/u1", detail: null, finishedAt: "2026-01-01T00:00:00.000Z" };
}

function handle(attempt: number): TaskHandle {
  return {
    kind: "docker",
    ref: `job-${attempt}`,
    taskId: `run_x/u1/${attempt}`,
    unitId: "u1",
    attempt,
    outputDir: "/out/u1",
    workspaceDir: "/ws/u1",
    collect: [],
    submittedAt: "2026-01-01T00:00:00.000Z",
    deadlineAt: null
  };
}

describe("retry policy", () => {
  it("escalates by the growth factor and clamps at the ceiling", () => {
    expect(escalatedMemory(8192, policy)).toBe(16384);
    expect(escalatedMemory(20000, policy)).toBe(32768);
    expect(escalatedMemory(1000, { ...policy, growthFactor: 1.5 })).toBe(1500);
    expect(escalatedMemory(1001, { ...policy, growthFactor: 1.5 })).toBe(1502);
  });

  it("bounds the number of escalations", () => {
    expect(maxEscalations(8192, policy)).toBe(2);
    expect(maxEscalations(4096, policy)).toBe(3);
    expect(maxEscalations(32768, policy)).toBe(0);
  });

  it("maps terminal results to decisions", () => {
    expect(decideRetry(result(0), 4096, policy)).toEqual({ action: "succeed" });
    expect(decideRetry(result(137), 4096, policy)).toEqual({ action: "escalate", memoryMb: 8192 });
    expect(decideRetry(result(137), 32768, policy)).toEqual({
      action: "fail",
      errorKind: "ResourceExhaustedError",
      reason: "out of memory at 32768 MB (ceiling 32768 MB)"
    });
    expect(decideRetry(result(2), 4096, policy)).toEqual({
      action: "fail",
      errorKind: "TaskFailedError",
      reason: "exit code 2"
    });
    expect(decideRetry(result(null, "error"), 4096, policy)).toMatchObject({
      action: "fail",
      errorKind: "ExternalSchedulerError"
    });
    expect(decideRetry(result(null, "cancelled"), 4096, policy)).toMatchObject({ action: "fail", errorKind: "Cancelled" });
  });

  it("validates its configuration", () => {
    expect(() => validateRetryPolicy({ ...policy, growthFactor: 1 }, 4096)).toThrow(ConfigError);
    expect(() => validateRetryPolicy(policy, 65536)).toThrow(/ceiling_memory_mb/);
    expect(() => validateRetryPolicy(policy, 0)).toThrow(/initial_memory_mb/);
    expect(() => validateRetryPolicy(policy, 4096)).not.toThrow();
  });
});

describe("UnitTracker", () => {
  it("escalates 8 GB to 32 GB and then fails permanently", () => {
    const t = new UnitTracker("u1", 8192, policy);
    const seen: number[] = [];

    for (let attempt = 1; attempt <= 3; attempt++) {
      seen.push(t.memoryMb);
      t.markSubmitted(handle(attempt));
      t.markRunning();
      const obs = t.observe(attempt, result(137));
      expect(obs.applied).toBe(true);
      if (attempt < 3) expect(obs.state).toBe("Escalating");
    }

    expect(seen).toEqual([8192, 16384, 32768]);
    expect(t.state).toBe("PermanentlyFailed");
    const snap = t.snapshot();
    expect(snap.errorKind).toBe("ResourceExhaustedError");
    expect(snap.escalations).toBe(2);
    expect(snap.attempt).toBe(3);
  });

  it("jumps straight to the ceiling with a growth factor of 4", () => {
    const t = new UnitTracker("u1", 8192, { ...policy, growthFactor: 4 });
    t.markSubmitted(handle(1));
    expect(t.observe(1, result(137)).decision).toEqual({ action: "escalate", memoryMb: 32768 });

    t.markSubmitted(handle(2));
    const last = t.observe(2, result(137));
    expect(last.state).toBe("PermanentlyFailed");
    expect(last.decision).toMatchObject({ action: "fail", errorKind: "ResourceExhaustedError" });
    expect(t.snapshot().escalations).toBe(1);
  });

  it("applies a terminal result at most once per attempt", () => {
    const t = new UnitTracker("u1", 4096, policy);
    t.markSubmitted(handle(1));

    const first = t.observe(1, result(137));
    const again = t.observe(1, result(137));

    expect(first.applied).toBe(true);
    expect(again.applied).toBe(false);
    expect(again.decision).toEqual(first.decision);
    expect(t.memoryMb).toBe(8192);
    expect(t.snapshot().escalations).toBe(1);
  });

  it("ignores a result for an attempt that is not outstanding", () => {
    const t = new UnitTracker("u1", 4096, policy);
    t.markSubmitted(handle(1));
    t.observe(1, result(137));
    t.markSubmitted(handle(2));

    const stale = t.observe(5, result(0));
    expect(stale).toEqual({ applied: false, decision: null, state: "Submitted" });
    expect(t.state).toBe("Submitted");
  });

  it("reports no decision for a result observed after restoring a finished unit", () => {
    const done = new UnitTracker("u1", 4096, policy);
    done.markSubmitted(handle(1));
    done.observe(1, result(0));

    const restored = new UnitTracker("u1", 4096, policy, done.snapshot());
    expect(restored.observe(1, result(0))).toEqual({ applied: false, decision: null, state: "Succeeded" });
    expect(restored.snapshot().errorKind).toBeNull();
  });

  it("succeeds on exit code zero", () => {
    const t = new UnitTracker("u1", 4096, policy);
    t.markSubmitted(handle(1));
    expect(t.observe(1, result(0)).state).toBe("Succeeded");
    expect(t.isTerminal()).toBe(true);
  });

  it("requires the next attempt number on submission", () => {
    const t = new UnitTracker("u1", 4096, policy);
    expect(() => t.markSubmitted(handle(2))).toThrow(/expected attempt 1/);
  });

  it("rejects transitions out of a terminal state", () => {
    const t = new UnitTracker("u1", 4096, policy);
    t.markSubmitted(handle(1));
    t.observe(1, result(0));
    expect(() => t.markSubmitted(handle(2))).toThrow(InvalidTransitionError);
  });

  it("restores from a snapshot and resets failed units", () => {
    const t = new UnitTracker("u1", 4096, policy);
    t.markSubmitted(handle(1));
    t.observe(1, result(3));

    const restored = new UnitTracker("u1", 4096, policy, t.snapshot());
    expect(restored.state).toBe("PermanentlyFailed");
    expect(restored.snapshot().error).toBe("exit code 3");

    restored.reset(4096);
    expect(restored.state).toBe("Planned");
    expect(restored.nextAttempt()).toBe(2);
  });

  it("fails a unit outside an observation", () => {
    const t = new UnitTracker("u1", 4096, policy);
    t.fail("ExternalSchedulerError", "sbatch rejected the job");
    expect(t.snapshot()).toMatchObject({ state: "PermanentlyFailed", errorKind: "ExternalSchedulerError" });
    t.fail("Cancelled", "ignored");
    expect(t.snapshot().errorKind).toBe("ExternalSchedulerError");
  });
});
