import { promises as fs } from "fs";
import { ExternalSchedulerError, errnoCode, errorMessage } from "../../core/errors.js";
import type { ExecutionResult, PollOutcome, TaskHandle, TaskSpec } from "../../core/task.js";
import { OOM_EXIT_CODE } from "../../tasks/retryPolicy.js";
import type { ExecutionFramework } from "../types.js";
import { collectEntries, collectOutputs, hostPathFor, stageInputs } from "../transfers.js";
import { createUnitWorkspace } from "../workspace.js";
import { type SlurmScheduler, type SlurmJobInfo, SystemSlurmScheduler } from "./scheduler.js";
import { exitCodeFileName, renderSlurmScript, type SlurmPlacement } from "./slurmScript.js";
import { SbatchSubmitter, type SlurmSubmitter } from "./submitter.js";

export interface SlurmFrameworkOptions {
  workspaceRoot: string;
  placement?: Partial<SlurmPlacement>;
  oomExitCode?: number;
  submitter?: SlurmSubmitter;
  scheduler?: SlurmScheduler;
  now?: () => Date;
}

async function readExitCodeFile(filePath: string): Promise<number | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
  const n = Number.parseInt(raw.trim(), 10);
  return Number.isInteger(n) ? n : null;
}

export class SlurmFramework implements ExecutionFramework {
  readonly kind = "slurm" as const;

  private readonly placement: SlurmPlacement;
  private readonly oomExitCode: number;
  private readonly submitter: SlurmSubmitter;
  private readonly scheduler: SlurmScheduler;
  private readonly now: () => Date;
  private readonly finished = new Map<string, ExecutionResult>();

  constructor(private readonly opts: SlurmFrameworkOptions) {
    this.placement = {
      partition: opts.placement?.partition ?? null,
      account: opts.placement?.account ?? null,
      qos: opts.placement?.qos ?? null,
      constraint: opts.placement?.constraint ?? null
    };
    this.oomExitCode = opts.oomExitCode ?? OOM_EXIT_CODE;
    this.submitter = opts.submitter ?? new SbatchSubmitter();
    this.scheduler = opts.scheduler ?? new SystemSlurmScheduler();
    this.now = opts.now ?? (() => new Date());
  }

  async submit(task: TaskSpec): Promise<TaskHandle> {
    const ws = await createUnitWorkspace(this.opts.workspaceRoot, task.runId, task.unitId);
    await stageInputs(ws, task.staging);

    const exitCodePath = ws.metaPath(exitCodeFileName(task.attempt));
    await fs.rm(exitCodePath, { force: true });

    const script = renderSlurmScript({
      task,
      metaDir: ws.metaDir,
      placement: this.placement,
      resolveHostPath: (hostPath) => hostPathFor(ws, { hostPath, containerPath: "/", mode: "ro", role: "extra" })
    });
    const scriptPath = ws.metaPath(`job.a${task.attempt}.sbatch`);
    await fs.writeFile(scriptPath, script, { encoding: "utf8", mode: 0o700 });

    let jobId: string;
    try {
      jobId = (await this.submitter.submit(scriptPath)).slurmJobId;
    } catch (err) {
      throw new ExternalSchedulerError(`sbatch submission failed: ${errorMessage(err)}`, {
        phase: "submission",
        unitId: task.unitId,
        cause: err
      });
    }

    return {
      kind: "slurm",
      ref: jobId,
      taskId: task.taskId,
      unitId: task.unitId,
      attempt: task.attempt,
      outputDir: task.outputDir,
      workspaceDir: ws.rootDir,
      collect: collectEntries(ws, task.staging),
      exitCodePath,
      submittedAt: this.now().toISOString(),
      // Slurm enforces --time itself.
      deadlineAt: null
    };
  }

  async poll(handle: TaskHandle): Promise<PollOutcome> {
    const cached = this.finished.get(handle.ref);
    if (cached) return { kind: "done", result: cached };

    const { info } = await this.scheduler.query(handle.ref);
    if (!info || info.normalizedState === "unknown") {
      // Without accounting, squeue drops finished jobs and reports COMPLETED
      // with no exit code; the job's own exit code file settles it.
      const fromFile = handle.exitCodePath ? await readExitCodeFile(handle.exitCodePath) : null;
      if (fromFile !== null) return this.finish(handle, { exitCode: fromFile, terminalState: "exited", detail: null });
      return { kind: "pending", running: false };
    }

    switch (info.normalizedState) {
      case "queued":
        return { kind: "pending", running: false };
      case "running":
        return { kind: "pending", running: true };
      case "succeeded":
      case "failed":
        return this.finish(handle, await this.interpret(handle, info));
    }
  }

  async cancel(handle: TaskHandle): Promise<void> {
    if (this.finished.has(handle.ref)) return;
    try {
      await this.submitter.cancel(handle.ref);
    } catch (err) {
      throw new ExternalSchedulerError(`scancel failed: ${errorMessage(err)}`, {
        phase: "execution",
        unitId: handle.unitId,
        cause: err
      });
    }
  }

  private async interpret(
    handle: TaskHandle,
    info: SlurmJobInfo
  ): Promise<Pick<ExecutionResult, "exitCode" | "terminalState" | "detail">> {
    if (info.outOfMemory) return { exitCode: this.oomExitCode, terminalState: "exited", detail: info.stateRaw };

    const fromFile = handle.exitCodePath ? await readExitCodeFile(handle.exitCodePath) : null;
    if (fromFile !== null) return { exitCode: fromFile, terminalState: "exited", detail: null };

    if (info.cancelled) return { exitCode: null, terminalState: "cancelled", detail: info.stateRaw };
    if (info.normalizedState === "succeeded" && info.exitCode !== null) {
      return { exitCode: info.exitCode, terminalState: "exited", detail: null };
    }
    if (info.stateRaw.toUpperCase().includes("COMPLETED") && info.exitCode !== null) {
      return { exitCode: info.exitCode, terminalState: "exited", detail: null };
    }
    return { exitCode: null, terminalState: "error", detail: `slurm state ${info.stateRaw}` };
  }

  private async finish(
    handle: TaskHandle,
    partial: Pick<ExecutionResult, "exitCode" | "terminalState" | "detail">
  ): Promise<PollOutcome> {
    await collectOutputs(handle.collect);
    const result: ExecutionResult = { ...partial, outputDir: handle.outputDir, finishedAt: this.now().toISOString() };
    this.finished.set(handle.ref, result);
    return { kind: "done", result };
  }
}
