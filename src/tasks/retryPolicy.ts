import { ConfigError, type FanoutErrorKind } from "../core/errors.js";
import type { ExecutionResult } from "../core/task.js";

export const OOM_EXIT_CODE = 137;

export interface RetryPolicyConfig {
  oomExitCode: number;
  growthFactor: number;
  ceilingMemoryMb: number;
}

export type RetryDecision =
  | { action: "succeed" }
  | { action: "escalate"; memoryMb: number }
  | { action: "fail"; errorKind: FanoutErrorKind; reason: string };

export function validateRetryPolicy(policy: RetryPolicyConfig, initialMemoryMb: number): void {
  if (!(policy.growthFactor > 1) || !Number.isFinite(policy.growthFactor)) {
    throw new ConfigError(`retry.growth_factor must be > 1 (got ${policy.growthFactor})`);
  }
  if (!Number.isInteger(initialMemoryMb) || initialMemoryMb < 1) {
    throw new ConfigError(`resources.initial_memory_mb must be an integer >= 1 (got ${initialMemoryMb})`);
  }
  if (!Number.isInteger(policy.ceilingMemoryMb) || policy.ceilingMemoryMb < initialMemoryMb) {
    throw new ConfigError(
      `retry.ceiling_memory_mb must be an integer >= initial_memory_mb (got ${policy.ceilingMemoryMb} < ${initialMemoryMb})`
    );
  }
}

export function escalatedMemory(currentMb: number, policy: RetryPolicyConfig): number {
  return Math.min(Math.ceil(currentMb * policy.growthFactor), policy.ceilingMemoryMb);
}

/** Upper bound on automatic escalations for one unit: ceil(log_F(ceiling / initial)). */
export function maxEscalations(initialMemoryMb: number, policy: RetryPolicyConfig): number {
  if (initialMemoryMb >= policy.ceilingMemoryMb) return 0;
  let count = 0;
  let mem = initialMemoryMb;
  while (mem < policy.ceilingMemoryMb) {
    mem = escalatedMemory(mem, policy);
    count += 1;
  }
  return count;
}

export function decideRetry(result: ExecutionResult, requestedMemoryMb: number, policy: RetryPolicyConfig): RetryDecision {
  if (result.terminalState === "cancelled") {
    return { action: "fail", errorKind: "Cancelled", reason: result.detail ?? "cancelled" };
  }
  if (result.terminalState === "error" || result.exitCode === null) {
    return {
      action: "fail",
      errorKind: "ExternalSchedulerError",
      reason: result.detail ?? "execution framework reported an error without an exit code"
    };
  }
  if (result.exitCode === 0) return { action: "succeed" };

  if (result.exitCode === policy.oomExitCode) {
    if (requestedMemoryMb < policy.ceilingMemoryMb) {
      return { action: "escalate", memoryMb: escalatedMemory(requestedMemoryMb, policy) };
    }
    return {
      action: "fail",
      errorKind: "ResourceExhaustedError",
      reason: `out of memory at ${requestedMemoryMb} MB (ceiling ${policy.ceilingMemoryMb} MB)`
    };
  }

  return { action: "fail", errorKind: "TaskFailedError", reason: `exit code ${result.exitCode}` };
}
