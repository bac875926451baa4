import { ExternalSchedulerError } from "../../core/errors.js";
import type { ExecutionResult, PollOutcome, TaskHandle, TaskSpec } from "../../core/task.js";
import { OOM_EXIT_CODE } from "../../tasks/retryPolicy.js";
import type { ExecutionFramework } from "../types.js";
import { collectEntries, collectOutputs, hostPathFor, stageInputs } from "../transfers.js";
import { createUnitWorkspace } from "../workspace.js";
import { type DockerCli, SystemDockerCli } from "./dockerCli.js";

export type DockerNetworkMode = "none" | "bridge" | "host";

export interface DockerFrameworkOptions {
  workspaceRoot: string;
  networkMode?: DockerNetworkMode;
  oomExitCode?: number;
  // "uid:gid"; defaults to the invoking user so outputs stay owned by them.
  user?: string | null;
  cli?: DockerCli;
  now?: () => Date;
}

const INSPECT_FORMAT = "{{.State.Status}}|{{.State.ExitCode}}|{{.State.OOMKilled}}";

interface ContainerState {
  status: string;
  exitCode: number | null;
  oomKilled: boolean;
}

export function parseInspectLine(line: string): ContainerState | null {
  const [status, code, oom, ...rest] = line.trim().split("|");
  if (status === undefined || code === undefined || oom === undefined || rest.length > 0) return null;
  const n = Number(code);
  return {
    status: status.toLowerCase(),
    exitCode: Number.isInteger(n) ? n : null,
    oomKilled: oom.trim().toLowerCase() === "true"
  };
}

function defaultUser(): string | null {
  if (typeof process.getuid === "function" && typeof process.getgid === "function") {
    return `${process.getuid()}:${process.getgid()}`;
  }
  return null;
}

/**
 * Local Docker daemon. Containers start detached and are inspected on each
 * poll; a terminal container is removed and its result kept, so polling a
 * finished handle again gives the same answer.
 */
export class DockerFramework implements ExecutionFramework {
  readonly kind = "docker" as const;

  private readonly cli: DockerCli;
  private readonly networkMode: DockerNetworkMode;
  private readonly oomExitCode: number;
  private readonly user: string | null;
  private readonly now: () => Date;
  private readonly finished = new Map<string, ExecutionResult>();
  private readonly timedOut = new Set<string>();

  constructor(private readonly opts: DockerFrameworkOptions) {
    this.cli = opts.cli ?? new SystemDockerCli();
    this.networkMode = opts.networkMode ?? "none";
    this.oomExitCode = opts.oomExitCode ?? OOM_EXIT_CODE;
    this.user = opts.user === undefined ? defaultUser() : opts.user;
    this.now = opts.now ?? (() => new Date());
  }

  buildRunArgs(task: TaskSpec, resolveHostPath: (hostPath: string) => string): string[] {
    if (!task.image) throw new Error("docker image must be non-empty");
    const args: string[] = ["run", "-d", "--name", task.jobName, "--label", `fanout.task=${task.taskId}`];

    args.push("--network", this.networkMode);
    args.push("--memory", `${task.resources.memoryMb}m`);
    args.push("--cpus", String(task.resources.cpus));

    for (const [k, v] of Object.entries(task.env)) {
      args.push("--env", `${k}=${v}`);
    }

    for (const b of task.bindings) {
      args.push("--volume", `${resolveHostPath(b.hostPath)}:${b.containerPath}:${b.mode}`);
    }

    if (this.user) args.push("--user", this.user);
    if (task.entrypoint) args.push("--entrypoint", task.entrypoint);

    args.push(task.image, ...task.argv);
    return args;
  }

  async submit(task: TaskSpec): Promise<TaskHandle> {
    const ws = await createUnitWorkspace(this.opts.workspaceRoot, task.runId, task.unitId);
    await stageInputs(ws, task.staging);

    const args = this.buildRunArgs(task, (hostPath) =>
      hostPathFor(ws, { hostPath, containerPath: "/", mode: "ro", role: "extra" })
    );

    // A container left over from an interrupted submission of this same attempt would block the name.
    await this.cli.exec(["rm", "-f", task.jobName]);

    const res = await this.cli.exec(args);
    if (res.exitCode !== 0) {
      throw new ExternalSchedulerError(`docker run failed (exit ${res.exitCode}): ${res.stderr.trim()}`, {
        phase: "submission",
        unitId: task.unitId
      });
    }

    const submittedAt = this.now();
    const deadline =
      task.resources.runtimeSeconds > 0 ? new Date(submittedAt.getTime() + task.resources.runtimeSeconds * 1000) : null;

    return {
      kind: "docker",
      ref: task.jobName,
      taskId: task.taskId,
      unitId: task.unitId,
      attempt: task.attempt,
      outputDir: task.outputDir,
      workspaceDir: ws.rootDir,
      collect: collectEntries(ws, task.staging),
      submittedAt: submittedAt.toISOString(),
      deadlineAt: deadline ? deadline.toISOString() : null
    };
  }

  async poll(handle: TaskHandle): Promise<PollOutcome> {
    const cached = this.finished.get(handle.ref);
    if (cached) return { kind: "done", result: cached };

    const res = await this.cli.exec(["inspect", "--format", INSPECT_FORMAT, handle.ref]);
    if (res.exitCode !== 0) {
      return this.finish(handle, {
        exitCode: null,
        terminalState: "error",
        detail: `docker inspect failed: ${res.stderr.trim() || `exit ${res.exitCode}`}`
      });
    }

    const state = parseInspectLine(res.stdout);
    if (!state) {
      return this.finish(handle, {
        exitCode: null,
        terminalState: "error",
        detail: `unparseable docker inspect output: ${res.stdout.trim()}`
      });
    }

    if (state.status === "exited" || state.status === "dead") {
      if (state.oomKilled) {
        return this.finish(handle, { exitCode: this.oomExitCode, terminalState: "exited", detail: "OOMKilled" });
      }
      if (this.timedOut.has(handle.ref)) {
        return this.finish(handle, {
          exitCode: null,
          terminalState: "error",
          detail: "runtime limit exceeded"
        });
      }
      return this.finish(handle, { exitCode: state.exitCode, terminalState: "exited", detail: null });
    }

    if (handle.deadlineAt && this.now().getTime() > Date.parse(handle.deadlineAt) && !this.timedOut.has(handle.ref)) {
      this.timedOut.add(handle.ref);
      await this.cli.exec(["kill", handle.ref]);
    }

    return { kind: "pending", running: state.status === "running" };
  }

  async cancel(handle: TaskHandle): Promise<void> {
    if (this.finished.has(handle.ref)) return;
    const res = await this.cli.exec(["rm", "-f", handle.ref]);
    if (res.exitCode !== 0) {
      throw new ExternalSchedulerError(`docker rm failed: ${res.stderr.trim()}`, {
        phase: "execution",
        unitId: handle.unitId
      });
    }
    this.finished.set(handle.ref, {
      exitCode: null,
      outputDir: handle.outputDir,
      terminalState: "cancelled",
      detail: "cancelled",
      finishedAt: this.now().toISOString()
    });
  }

  private async finish(
    handle: TaskHandle,
    partial: Pick<ExecutionResult, "exitCode" | "terminalState" | "detail">
  ): Promise<PollOutcome> {
    await collectOutputs(handle.collect);

    let detail = partial.detail;
    const rm = await this.cli.exec(["rm", "-f", handle.ref]);
    if (rm.exitCode !== 0) {
      const note = `container not removed: ${rm.stderr.trim()}`;
      detail = detail ? `${detail}; ${note}` : note;
    }

    const result: ExecutionResult = {
      ...partial,
      detail,
      outputDir: handle.outputDir,
      finishedAt: this.now().toISOString()
    };
    this.finished.set(handle.ref, result);
    return { kind: "done", result };
  }
}
