import type { RunId } from "./ids.js";

export type StagingMode = "shared" | "transfer";

export type BindingRole = "primary" | "control" | "marker" | "output" | "license" | "extra";

export interface MountBinding {
  // Absolute in shared mode; relative to the execution-side workspace in transfer mode.
  hostPath: string;
  containerPath: string;
  mode: "ro" | "rw";
  role: BindingRole;
}

export interface TransferEntry {
  from: string;
  to: string;
}

export interface StagingPlan {
  unitId: string;
  mode: StagingMode;
  bindings: MountBinding[];
  transfers: {
    inputs: TransferEntry[];
    outputs: TransferEntry[];
  };
  // Host directory where the unit's outputs end up once the task is terminal.
  outputDir: string;
}

export interface TaskResources {
  memoryMb: number;
  cpus: number;
  runtimeSeconds: number;
}

export interface TaskSpec {
  taskId: string;
  runId: RunId;
  unitId: string;
  attempt: number;
  jobName: string;
  image: string;
  // Overrides the image's own entrypoint when set.
  entrypoint: string | null;
  argv: string[];
  bindings: MountBinding[];
  staging: StagingPlan;
  resources: TaskResources;
  env: Record<string, string>;
  outputDir: string;
}

export type FrameworkKind = "docker" | "slurm";

export interface TaskHandle {
  kind: FrameworkKind;
  // Container name or Slurm job id.
  ref: string;
  taskId: string;
  unitId: string;
  attempt: number;
  outputDir: string;
  workspaceDir: string;
  collect: TransferEntry[];
  exitCodePath?: string;
  submittedAt: string;
  deadlineAt: string | null;
}

export type TerminalState = "exited" | "error" | "cancelled";

export interface ExecutionResult {
  exitCode: number | null;
  outputDir: string;
  terminalState: TerminalState;
  detail: string | null;
  finishedAt: string;
}

export type PollOutcome = { kind: "pending"; running: boolean } | { kind: "done"; result: ExecutionResult };

export type UnitState = "Planned" | "Submitted" | "Running" | "Succeeded" | "Escalating" | "PermanentlyFailed";

export const TERMINAL_UNIT_STATES: ReadonlySet<UnitState> = new Set<UnitState>(["Succeeded", "PermanentlyFailed"]);
