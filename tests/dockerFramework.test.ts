import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { ExternalSchedulerError } from "../src/core/errors.js";
import type { CliResult, DockerCli } from "../src/execution/docker/dockerCli.js";
import { DockerFramework, parseInspectLine } from "../src/execution/docker/dockerFramework.js";
import { bidsTask } from "./helpers/tasks.js";

class FakeDockerCli implements DockerCli {
  readonly calls: string[][] = [];
  inspect: string[] = [];
  runExit = 0;

  async exec(args: string[]): Promise<CliResult> {
    this.calls.push(args);
    if (args[0] === "run") return { exitCode: this.runExit, stdout: "cid\n", stderr: this.runExit ? "no such image" : "" };
    if (args[0] === "inspect") {
      const next = this.inspect.shift();
      if (next === undefined) return { exitCode: 1, stdout: "", stderr: "No such object" };
      return { exitCode: 0, stdout: `${next}\n`, stderr: "" };
    }
    return { exitCode: 0, stdout: "", stderr: "" };
  }

  verbs(): string[] {
    return this.calls.map((c) => c[0] ?? "");
  }
}

describe("parseInspectLine", () => {
  it("reads status, exit code and the OOM flag", () => {
    expect(parseInspectLine("exited|137|true\n")).toEqual({ status: "exited", exitCode: 137, oomKilled: true });
    expect(parseInspectLine("running|0|false")).toEqual({ status: "running", exitCode: 0, oomKilled: false });
    expect(parseInspectLine("garbage")).toBeNull();
  });
});

describe("DockerFramework", () => {
  let dir: string;
  let inputRoot: string;
  let outputRoot: string;
  let workspaceRoot: string;
  let cli: FakeDockerCli;
  let clock: number;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "fanout-docker-"));
    inputRoot = path.join(dir, "bids");
    outputRoot = path.join(dir, "out");
    workspaceRoot = path.join(dir, "ws");
    await mkdir(path.join(inputRoot, "sub-01", "anat"), { recursive: true });
    await writeFile(path.join(inputRoot, "sub-01", "anat", "t1.txt"), "t1");
    cli = new FakeDockerCli();
    clock = Date.parse("2026-01-01T00:00:00.000Z");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function framework(): DockerFramework {
    return new DockerFramework({ workspaceRoot, cli, user: "1000:1000", now: () => new Date(clock) });
  }

  it("builds a detached run with limits, mounts and no network", async () => {
    const task = await bidsTask({ inputRoot, outputRoot, memoryMb: 8192 });
    const args = framework().buildRunArgs(task, (p) => p);

    expect(args).toEqual([
      "run",
      "-d",
      "--name",
      task.jobName,
      "--label",
      `fanout.task=${task.taskId}`,
      "--network",
      "none",
      "--memory",
      "8192m",
      "--cpus",
      "2",
      "--env",
      "OMP_NUM_THREADS=2",
      "--env",
      "OPENBLAS_NUM_THREADS=2",
      "--env",
      "FANOUT_UNIT_ID=sub-01",
      "--env",
      "FANOUT_ATTEMPT=1",
      "--volume",
      `${path.join(inputRoot, "sub-01")}:/bids/sub-01:ro`,
      "--volume",
      `${path.join(outputRoot, ".compute", "sub-01")}:/output:rw`,
      "--user",
      "1000:1000",
      "poldracklab/fmriprep:latest",
      "/bids",
      "/output",
      "participant",
      "--participant_label",
      "01"
    ]);
  });

  it("reports a finished container once and removes it", async () => {
    const fw = framework();
    const task = await bidsTask({ inputRoot, outputRoot });
    const handle = await fw.submit(task);
    expect(cli.verbs()).toEqual(["rm", "run"]);
    expect(handle.ref).toBe(task.jobName);
    expect(handle.deadlineAt).toBe("2026-01-01T01:00:00.000Z");

    cli.inspect = ["running|0|false", "exited|0|false"];
    expect(await fw.poll(handle)).toEqual({ kind: "pending", running: true });

    const done = await fw.poll(handle);
    expect(done).toMatchObject({ kind: "done", result: { exitCode: 0, terminalState: "exited", detail: null } });
    expect(cli.verbs()).toEqual(["rm", "run", "inspect", "inspect", "rm"]);

    expect(await fw.poll(handle)).toEqual(done);
    expect(cli.verbs()).toHaveLength(5);
  });

  it("maps an OOM kill to the OOM sentinel", async () => {
    const fw = framework();
    const handle = await fw.submit(await bidsTask({ inputRoot, outputRoot }));
    cli.inspect = ["exited|137|true"];
    expect(await fw.poll(handle)).toMatchObject({ kind: "done", result: { exitCode: 137, detail: "OOMKilled" } });
  });

  it("kills a container past its runtime limit", async () => {
    const fw = framework();
    const handle = await fw.submit(await bidsTask({ inputRoot, outputRoot, runtimeSeconds: 60 }));

    clock += 120_000;
    cli.inspect = ["running|0|false", "exited|137|false"];
    expect(await fw.poll(handle)).toEqual({ kind: "pending", running: true });
    expect(cli.calls.at(-1)).toEqual(["kill", handle.ref]);

    expect(await fw.poll(handle)).toMatchObject({
      kind: "done",
      result: { exitCode: null, terminalState: "error", detail: "runtime limit exceeded" }
    });
  });

  it("reports a failed inspect as an error result", async () => {
    const fw = framework();
    const handle = await fw.submit(await bidsTask({ inputRoot, outputRoot }));
    expect(await fw.poll(handle)).toMatchObject({
      kind: "done",
      result: { exitCode: null, terminalState: "error", detail: "docker inspect failed: No such object" }
    });
  });

  it("raises a scheduler error when docker run fails", async () => {
    cli.runExit = 125;
    await expect(framework().submit(await bidsTask({ inputRoot, outputRoot }))).rejects.toBeInstanceOf(
      ExternalSchedulerError
    );
  });

  it("stages inputs into the workspace and collects outputs in transfer mode", async () => {
    const fw = framework();
    const task = await bidsTask({ inputRoot, outputRoot, mode: "transfer" });
    const handle = await fw.submit(task);

    expect(await readFile(path.join(handle.workspaceDir, "data", "sub-01", "anat", "t1.txt"), "utf8")).toBe("t1");
    const run = cli.calls.find((c) => c[0] === "run") ?? [];
    expect(run).toContain(`${path.join(handle.workspaceDir, "data", "sub-01")}:/bids/sub-01:ro`);
    expect(run).toContain(`${path.join(handle.workspaceDir, "output")}:/output:rw`);

    await mkdir(path.join(handle.workspaceDir, "output", "app1"), { recursive: true });
    await writeFile(path.join(handle.workspaceDir, "output", "app1", "r.txt"), "done");
    cli.inspect = ["exited|0|false"];
    await fw.poll(handle);

    expect(await readFile(path.join(outputRoot, ".compute", "sub-01", "app1", "r.txt"), "utf8")).toBe("done");
  });

  it("cancels by removing the container", async () => {
    const fw = framework();
    const handle = await fw.submit(await bidsTask({ inputRoot, outputRoot }));
    await fw.cancel(handle);
    expect(cli.calls.at(-1)).toEqual(["rm", "-f", handle.ref]);
    expect(await fw.poll(handle)).toMatchObject({ kind: "done", result: { terminalState: "cancelled" } });
  });
});
