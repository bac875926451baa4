import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import type * as pg from "pg";
import { EXIT_OK, EXIT_UNIT_FAILURE, EXIT_USAGE, overridesFromFlags, parseArgs, runCli, UsageError } from "../src/cli.js";
import type { PostgresStore } from "../src/store/postgresStore.js";
import { FakeFramework } from "./helpers/fakeFramework.js";
import { memoryStore, writeBidsDataset } from "./helpers/store.js";

describe("parseArgs", () => {
  it("separates positionals, values, repeatable pairs and flags", () => {
    const parsed = parseArgs(["in", "out", "--template", "gwas", "--bind", "chromosomes=/ref", "--arg", "a=1", "--arg", "b=2", "--dry-run"]);
    expect(parsed.positionals).toEqual(["in", "out"]);
    expect(parsed.values).toEqual({ template: "gwas" });
    expect(parsed.lists).toEqual({ bind: ["chromosomes=/ref"], arg: ["a=1", "b=2"] });
    expect([...parsed.flags]).toEqual(["dry-run"]);
  });

  it("rejects unknown options and missing values", () => {
    expect(() => parseArgs(["--nope"])).toThrow(UsageError);
    expect(() => parseArgs(["--template"])).toThrow(/missing value for --template/);
    expect(() => parseArgs(["--template", "--dry-run"])).toThrow(/missing value/);
  });

  it("turns flags into config overrides", () => {
    const overrides = overridesFromFlags(
      parseArgs(["--transfer", "--repeat", "3", "--cleanup", "--arg", "analysis_level=group"])
    );
    expect(overrides).toMatchObject({
      staging: { mode: "transfer" },
      discovery: { repeat: 3 },
      aggregation: { cleanup_staging: true },
      template_args: { analysis_level: "group" }
    });
    expect(() => overridesFromFlags(parseArgs(["--transfer", "--shared"]))).toThrow(/mutually exclusive/);
    expect(() => overridesFromFlags(parseArgs(["--repeat", "many"]))).toThrow(/expects a number/);
    expect(() => overridesFromFlags(parseArgs(["--arg", "novalue"]))).toThrow(/expects key=value/);
  });
});

describe("runCli", () => {
  let dir: string;
  let inputRoot: string;
  let outputRoot: string;
  let pool: pg.Pool;
  let store: PostgresStore;
  let out: string[];
  let err: string[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "fanout-cli-"));
    inputRoot = path.join(dir, "bids");
    outputRoot = path.join(dir, "out");
    await writeBidsDataset(inputRoot, ["sub-01", "sub-02"]);
    ({ pool, store } = await memoryStore());
    out = [];
    err = [];
  });

  afterEach(async () => {
    await pool.end();
    await rm(dir, { recursive: true, force: true });
  });

  function cli(argv: string[], fake = new FakeFramework()): Promise<number> {
    return runCli(argv, {
      store,
      frameworkFactory: () => fake,
      env: {},
      out: (line) => out.push(line),
      err: (line) => err.push(line)
    });
  }

  it("prints usage for --help and bad invocations", async () => {
    expect(await cli(["--help"])).toBe(EXIT_OK);
    expect(out[0]).toMatch(/^usage:/);

    expect(await cli([])).toBe(EXIT_USAGE);
    expect(await cli(["a", "b", "c"])).toBe(EXIT_USAGE);
    expect(await cli(["--bogus"])).toBe(EXIT_USAGE);
    expect(err[err.length - 2]).toBe("unknown option: --bogus");
  });

  it("prints the plan on a dry run", async () => {
    const fake = new FakeFramework();
    expect(await cli([inputRoot, outputRoot, "--dry-run"], fake)).toBe(EXIT_OK);

    expect(out[0]).toMatch(/^run run_[0-9A-Z]{26} \(bids-app\): 2 unit\(s\)$/);
    expect(out.slice(1)).toEqual([
      "sub-01\t/bids /output participant --participant_label 01",
      "sub-02\t/bids /output participant --participant_label 02"
    ]);
    expect(fake.submitted).toEqual([]);
  });

  it("exits 0 when every unit succeeds", async () => {
    const fake = new FakeFramework({ exitCodes: { "sub-01": [137, 0] } });
    expect(await cli([inputRoot, outputRoot, "--poll-interval", "0"], fake)).toBe(EXIT_OK);

    expect(out.slice(0, 2)).toEqual(["sub-01\tSucceeded\tattempt=2\tmemory=8192MB", "sub-02\tSucceeded\tattempt=1\tmemory=4096MB"]);
    expect(out.at(-1)).toMatch(/^run run_[0-9A-Z]{26}: succeeded \(2 succeeded, 0 failed\)$/);
  });

  it("exits 1 when a unit fails", async () => {
    const fake = new FakeFramework({ exitCodes: { "sub-02": [3] } });
    expect(await cli([inputRoot, outputRoot, "--poll-interval", "0"], fake)).toBe(EXIT_UNIT_FAILURE);

    expect(out[1]).toBe("sub-02\tPermanentlyFailed\tattempt=1\tmemory=4096MB\texit code 3");
    expect(out.at(-1)).toMatch(/: partial \(1 succeeded, 1 failed\)$/);
  });

  it("exits 2 for a missing input root or a bad config", async () => {
    expect(await cli([path.join(dir, "missing"), outputRoot])).toBe(EXIT_USAGE);
    expect(err.at(-1)).toMatch(/^\[discovery\] input root does not exist: /);

    expect(await cli([inputRoot, outputRoot, "--backend", "k8s"])).toBe(EXIT_USAGE);
    expect(err.at(-1)).toMatch(/^\[config\] invalid config: execution\.backend/);

    expect(await cli([inputRoot, outputRoot, "--license", path.join(dir, "nope.txt")])).toBe(EXIT_USAGE);
    expect(err.at(-1)).toMatch(/license file not found/);
  });
});
