import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import type * as pg from "pg";
import type { RawConfig } from "../src/config/fanoutConfig.js";
import { FanoutError } from "../src/core/errors.js";
import { prepareRun } from "../src/engine/createRun.js";
import type { PostgresStore } from "../src/store/postgresStore.js";
import { FakeFramework, type FakeFrameworkOptions } from "./helpers/fakeFramework.js";
import { memoryStore, writeBidsDataset } from "./helpers/store.js";

describe("FanoutEngine", () => {
  let dir: string;
  let inputRoot: string;
  let outputRoot: string;
  let pool: pg.Pool;
  let store: PostgresStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "fanout-engine-"));
    inputRoot = path.join(dir, "bids");
    outputRoot = path.join(dir, "out");
    await writeBidsDataset(inputRoot, ["sub-01", "sub-02", "sub-03"]);
    ({ pool, store } = await memoryStore());
  });

  afterEach(async () => {
    await pool.end();
    await rm(dir, { recursive: true, force: true });
  });

  const baseOverrides: RawConfig = {
    resources: { initial_memory_mb: 8192 },
    execution: { poll_interval_ms: 0 }
  };

  async function prepare(fake: FakeFramework, extra: { retryFailed?: boolean; overrides?: RawConfig } = {}) {
    return prepareRun(
      {
        inputRoot,
        outputRoot,
        overrides: extra.overrides ?? baseOverrides,
        retryFailed: extra.retryFailed,
        env: {},
        echo: false
      },
      { store, frameworkFactory: () => fake }
    );
  }

  function scripted(opts: FakeFrameworkOptions = {}): FakeFramework {
    return new FakeFramework({ exitCodes: { "sub-02": [137, 137, 0], "sub-03": [1] }, ...opts });
  }

  it("escalates memory on OOM, isolates failures and merges successes", async () => {
    const fake = scripted();
    const prepared = await prepare(fake);
    const report = await prepared.engine.run();

    expect(report.status).toBe("partial");
    expect(report.exitCode).toBe(1);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);

    expect(fake.memoryFor("sub-01")).toEqual([8192]);
    expect(fake.memoryFor("sub-02")).toEqual([8192, 16384, 32768]);
    expect(fake.memoryFor("sub-03")).toEqual([8192]);

    const byId = new Map(report.units.map((u) => [u.unitId, u]));
    expect(byId.get("sub-02")).toMatchObject({ state: "Succeeded", attempt: 3, memoryMb: 32768, escalations: 2 });
    expect(byId.get("sub-03")).toMatchObject({
      state: "PermanentlyFailed",
      errorKind: "TaskFailedError",
      error: "exit code 1",
      aggregated: false
    });

    expect(await readFile(path.join(outputRoot, "app1", "sub-01", "result.txt"), "utf8")).toBe("sub-01 attempt 1");
    expect(await readFile(path.join(outputRoot, "app1", "sub-02", "result.txt"), "utf8")).toBe("sub-02 attempt 3");
    await expect(readFile(path.join(outputRoot, "app1", "sub-03", "result.txt"), "utf8")).rejects.toThrow();

    const run = await store.getRun(prepared.runId);
    expect(run).toMatchObject({ status: "partial", exitCode: 1 });
    expect(run?.startedAt).not.toBeNull();
    expect(run?.finishedAt).not.toBeNull();

    const units = await store.listUnits(prepared.runId);
    expect(units.map((u) => [u.unitId, u.state, u.aggregated])).toEqual([
      ["sub-01", "Succeeded", true],
      ["sub-02", "Succeeded", true],
      ["sub-03", "PermanentlyFailed", false]
    ]);

    const log = await readFile(path.join(outputRoot, ".fanout", "workspaces", prepared.runId, "run.log"), "utf8");
    const kinds = log.trim().split("\n").map((l) => String(JSON.parse(l).kind));
    expect(kinds[0]).toBe("run.planned");
    expect(kinds.at(-1)).toBe("run.partial");
    expect(kinds.filter((k) => k === "unit.escalated")).toHaveLength(2);
  });

  it("fails a unit permanently once memory reaches the ceiling", async () => {
    const fake = new FakeFramework({ exitCodes: { "sub-01": [137, 137, 137] } });
    const report = await (await prepare(fake)).engine.run();

    expect(fake.memoryFor("sub-01")).toEqual([8192, 16384, 32768]);
    expect(report.units[0]).toMatchObject({ state: "PermanentlyFailed", errorKind: "ResourceExhaustedError" });
  });

  it("drops a failed attempt's outputs before resubmitting", async () => {
    const fake = new FakeFramework({
      exitCodes: { "sub-01": [137, 0] },
      outputFile: (task) => (task.attempt === 1 ? "partial.txt" : "result.txt")
    });
    const report = await (await prepare(fake)).engine.run();

    expect(report.units[0]).toMatchObject({ unitId: "sub-01", state: "Succeeded", attempt: 2 });
    expect((await readdir(path.join(outputRoot, "app1", "sub-01"))).sort()).toEqual(["result.txt"]);
    expect(await readFile(path.join(outputRoot, "app1", "sub-01", "result.txt"), "utf8")).toBe("sub-01 attempt 2");
  });

  it("keeps at most max_in_flight tasks outstanding", async () => {
    const fake = new FakeFramework({ pendingPolls: 2 });
    const report = await (
      await prepare(fake, { overrides: { ...baseOverrides, execution: { poll_interval_ms: 0, max_in_flight: 2 } } })
    ).engine.run();

    expect(report.status).toBe("succeeded");
    expect(report.exitCode).toBe(0);
    expect(fake.maxOutstanding).toBe(2);
    expect(fake.submitted.map((t) => t.unitId)).toEqual(["sub-01", "sub-02", "sub-03"]);
  });

  it("resumes from checkpoints without resubmitting finished units", async () => {
    const first = await prepare(scripted());
    await first.engine.run();

    const again = scripted();
    const second = await prepare(again);
    expect(second.runId).toBe(first.runId);
    const report = await second.engine.run();

    expect(again.submitted).toEqual([]);
    expect(report.status).toBe("partial");
    expect(report.units.find((u) => u.unitId === "sub-03")?.state).toBe("PermanentlyFailed");
  });

  it("resubmits failed units when asked", async () => {
    await (await prepare(scripted())).engine.run();

    const retry = new FakeFramework();
    const report = await (await prepare(retry, { retryFailed: true })).engine.run();

    expect(retry.submitted.map((t) => [t.unitId, t.attempt, t.resources.memoryMb])).toEqual([["sub-03", 2, 8192]]);
    expect(report.status).toBe("succeeded");
    expect(report.exitCode).toBe(0);
    expect(await readFile(path.join(outputRoot, "app1", "sub-03", "result.txt"), "utf8")).toBe("sub-03 attempt 2");
  });

  it("fails units whose submission is rejected and carries on", async () => {
    const fake = new FakeFramework({ rejectSubmit: ["sub-02"] });
    const report = await (await prepare(fake)).engine.run();

    expect(report.units.find((u) => u.unitId === "sub-02")).toMatchObject({
      state: "PermanentlyFailed",
      errorKind: "ExternalSchedulerError"
    });
    expect(report.succeeded).toBe(2);
  });

  it("cancels every unfinished unit when the signal fires", async () => {
    const controller = new AbortController();
    controller.abort();
    const fake = new FakeFramework();
    const report = await (await prepare(fake)).engine.run({ signal: controller.signal });

    expect(fake.submitted).toEqual([]);
    expect(report.status).toBe("cancelled");
    expect(report.exitCode).toBe(1);
    expect(report.units.every((u) => u.errorKind === "Cancelled")).toBe(true);
  });

  it("stops waiting between polls as soon as the signal fires", async () => {
    const controller = new AbortController();
    const fake = new FakeFramework({ pendingPolls: 1000 });
    const poll = fake.poll.bind(fake);
    fake.poll = async (handle) => {
      controller.abort();
      return poll(handle);
    };
    const prepared = await prepare(fake, {
      overrides: { ...baseOverrides, execution: { poll_interval_ms: 600_000 } }
    });

    const report = await prepared.engine.run({ signal: controller.signal });

    expect(report.status).toBe("cancelled");
    expect(fake.submitted).toHaveLength(3);
    expect(fake.cancelled).toHaveLength(3);
  });

  it("plans without touching the store's unit table on a dry run", async () => {
    const fake = new FakeFramework();
    const prepared = await prepareRun(
      { inputRoot, outputRoot, overrides: baseOverrides, dryRun: true, env: {}, echo: false },
      { store, frameworkFactory: () => fake }
    );
    const plan = await prepared.engine.plan({ dryRun: true });

    expect(plan.units.map((u) => u.unitId)).toEqual(["sub-01", "sub-02", "sub-03"]);
    expect(plan.controlFiles.map((f) => path.basename(f))).toEqual(["dataset_description.json", "participants.tsv"]);
    expect(plan.units[0]?.argv).toEqual(["/bids", "/output", "participant", "--participant_label", "01"]);
    expect(await store.listUnits(prepared.runId)).toEqual([]);
    await expect(prepared.engine.aggregate()).rejects.toThrow(/plan\(\) must run/);
  });

  it("refuses to aggregate before every unit is terminal", async () => {
    const fake = new FakeFramework({ pendingPolls: 5 });
    const prepared = await prepare(fake);
    await prepared.engine.plan();
    await prepared.engine.submitReady();
    await expect(prepared.engine.aggregate()).rejects.toBeInstanceOf(FanoutError);
  });

  it("succeeds with nothing to do on an empty input root", async () => {
    await rm(inputRoot, { recursive: true, force: true });
    await writeBidsDataset(inputRoot, []);
    const report = await (await prepare(new FakeFramework())).engine.run();
    expect(report).toMatchObject({ status: "succeeded", exitCode: 0, succeeded: 0, failed: 0 });
  });
});
