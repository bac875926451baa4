import type { RunId } from "../core/ids.js";
import { jobNameFor } from "../core/ids.js";
import type { TaskResources, TaskSpec } from "../core/task.js";
import type { AnalysisUnit } from "../core/unit.js";
import type { StagedUnit } from "../staging/stagingPlanner.js";
import type { TaskTemplate } from "./templates.js";

export interface TaskDefaults {
  image: string;
  cpus: number;
  runtimeSeconds: number;
  env: Record<string, string>;
}

export function taskIdFor(runId: RunId, unitId: string, attempt: number): string {
  return `${runId}/${unitId}/${attempt}`;
}

export function buildTaskSpec(input: {
  runId: RunId;
  unit: AnalysisUnit;
  staged: StagedUnit;
  template: TaskTemplate;
  defaults: TaskDefaults;
  attempt: number;
  memoryMb: number;
}): TaskSpec {
  const { runId, unit, staged, template, defaults, attempt, memoryMb } = input;
  if (!Number.isInteger(attempt) || attempt < 1) throw new Error(`attempt must be an integer >= 1 (got ${attempt})`);
  if (!Number.isInteger(memoryMb) || memoryMb < 1) throw new Error(`memoryMb must be an integer >= 1 (got ${memoryMb})`);

  const resources: TaskResources = {
    memoryMb,
    cpus: defaults.cpus,
    runtimeSeconds: defaults.runtimeSeconds
  };

  const threads = String(defaults.cpus);
  const env: Record<string, string> = {
    ...template.env,
    ...defaults.env,
    OMP_NUM_THREADS: threads,
    OPENBLAS_NUM_THREADS: threads,
    FANOUT_UNIT_ID: unit.id,
    FANOUT_ATTEMPT: String(attempt)
  };

  return {
    taskId: taskIdFor(runId, unit.id, attempt),
    runId,
    unitId: unit.id,
    attempt,
    jobName: jobNameFor(runId, unit.id, attempt),
    image: defaults.image,
    entrypoint: template.entrypoint,
    argv: [...staged.argv],
    bindings: staged.plan.bindings.map((b) => ({ ...b })),
    staging: staged.plan,
    resources,
    env,
    outputDir: staged.plan.outputDir
  };
}
