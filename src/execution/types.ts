import type { FrameworkKind, PollOutcome, TaskHandle, TaskSpec } from "../core/task.js";

/**
 * Boundary to whatever actually runs containers. Implementations accept a
 * task, report its status when polled, and own any data movement the
 * task's staging plan declares.
 */
export interface ExecutionFramework {
  readonly kind: FrameworkKind;
  submit(task: TaskSpec): Promise<TaskHandle>;
  poll(handle: TaskHandle): Promise<PollOutcome>;
  cancel?(handle: TaskHandle): Promise<void>;
}
