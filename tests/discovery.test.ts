import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { InvalidInputError } from "../src/core/errors.js";
import { deriveLabel, discoverUnits, type DiscoveryOptions } from "../src/discovery/discovery.js";

function options(overrides: Partial<DiscoveryOptions> = {}): DiscoveryOptions {
  return {
    strategy: "per_entry",
    controlSuffixes: [".json", ".tsv"],
    markerSuffix: null,
    chunkSizeBytes: 1024,
    pairedSuffix: ".fastq.gz",
    repeat: 1,
    includeHidden: false,
    labelStripPrefixes: ["sub-"],
    ...overrides
  };
}

describe("discoverUnits", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "fanout-discovery-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("finds one unit per subject folder and shares control files", async () => {
    for (const s of ["sub-05", "sub-01", "sub-03", "sub-02", "sub-04"]) {
      await mkdir(path.join(root, s, "anat"), { recursive: true });
    }
    await writeFile(path.join(root, "dataset_description.json"), "{}");
    await writeFile(path.join(root, "participants.json"), "{}");
    await mkdir(path.join(root, ".git"));

    const result = await discoverUnits(root, options());

    expect(result.units.map((u) => u.id)).toEqual(["sub-01", "sub-02", "sub-03", "sub-04", "sub-05"]);
    expect(result.units.map((u) => u.label)).toEqual(["01", "02", "03", "04", "05"]);
    expect(result.controlFiles).toEqual([
      path.join(root, "dataset_description.json"),
      path.join(root, "participants.json")
    ]);
    for (const u of result.units) expect(u.controlFiles).toHaveLength(2);
    expect(result.units[0]?.primary).toEqual({ kind: "directory", path: path.join(root, "sub-01") });
  });

  it("rediscovers the same units in the same order", async () => {
    for (const s of ["b", "a", "c"]) await mkdir(path.join(root, s));
    const first = await discoverUnits(root, options());
    const second = await discoverUnits(root, options());
    expect(second.units).toEqual(first.units);
  });

  it("returns no units for an empty root", async () => {
    const result = await discoverUnits(root, options());
    expect(result.units).toEqual([]);
  });

  it("fails when the input root is missing or not a directory", async () => {
    await expect(discoverUnits(path.join(root, "missing"), options())).rejects.toBeInstanceOf(InvalidInputError);
    await writeFile(path.join(root, "file"), "x");
    await expect(discoverUnits(path.join(root, "file"), options())).rejects.toThrow(/not a directory/);
  });

  it("requires a marker file when the strategy asks for one", async () => {
    await mkdir(path.join(root, "s1"));
    await mkdir(path.join(root, "s2"));
    await writeFile(path.join(root, "s1", "run.xml"), "<x/>");

    const result = await discoverUnits(root, options({ markerSuffix: ".xml" }));
    expect(result.units.map((u) => u.id)).toEqual(["s1"]);
    expect(result.units[0]?.marker).toBe(path.join(root, "s1", "run.xml"));
    expect(result.skipped).toEqual([{ name: "s2", reason: "no *.xml file" }]);
  });

  it("treats the whole root as one unit for the collective strategy", async () => {
    await mkdir(path.join(root, "sub-01"));
    await writeFile(path.join(root, "dataset_description.json"), "{}");

    const result = await discoverUnits(root, options({ strategy: "collective", labelStripPrefixes: [] }));
    expect(result.units).toHaveLength(1);
    expect(result.units[0]?.id).toBe(path.basename(root));
    expect(result.units[0]?.controlFiles).toEqual([]);
  });

  it("packs loose files into chunks", async () => {
    await writeFile(path.join(root, "a.nii"), "x".repeat(600));
    await writeFile(path.join(root, "b.nii"), "x".repeat(300));
    await writeFile(path.join(root, "c.nii"), "x".repeat(500));
    await writeFile(path.join(root, "dataset_description.json"), "{}");

    const result = await discoverUnits(root, options({ strategy: "chunked" }));
    expect(result.units.map((u) => u.id)).toEqual(["chunk-0000", "chunk-0001"]);
    expect(result.units[0]?.primary).toEqual({
      kind: "files",
      paths: [path.join(root, "a.nii"), path.join(root, "b.nii")]
    });
    expect(result.units[1]?.primary).toEqual({ kind: "files", paths: [path.join(root, "c.nii")] });
  });

  it("pairs R1 and R2 reads and reports orphans", async () => {
    for (const f of ["lib1_R1.fastq.gz", "lib1_R2.fastq.gz", "lib2_R1.fastq.gz"]) {
      await writeFile(path.join(root, f), "@r\n");
    }

    const result = await discoverUnits(root, options({ strategy: "paired_reads", controlSuffixes: [] }));
    expect(result.units.map((u) => u.id)).toEqual(["lib1"]);
    expect(result.units[0]?.primary).toEqual({
      kind: "files",
      paths: [path.join(root, "lib1_R1.fastq.gz"), path.join(root, "lib1_R2.fastq.gz")]
    });
    expect(result.skipped).toEqual([{ name: "lib2_R1.fastq.gz", reason: "missing mate lib2_R2.fastq.gz" }]);
  });

  it("repeats every unit with distinct ids", async () => {
    await mkdir(path.join(root, "sub-01"));
    await mkdir(path.join(root, "sub-02"));

    const result = await discoverUnits(root, options({ repeat: 2 }));
    expect(result.units.map((u) => u.id)).toEqual(["sub-01-0", "sub-01-1", "sub-02-0", "sub-02-1"]);
    expect(result.units.map((u) => u.repetition)).toEqual([0, 1, 0, 1]);
    expect(result.units.map((u) => u.label)).toEqual(["01", "01", "02", "02"]);
  });

  it("rejects a repeat count below one", async () => {
    await expect(discoverUnits(root, options({ repeat: 0 }))).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe("deriveLabel", () => {
  it("strips the first matching prefix", () => {
    expect(deriveLabel("sub-07", ["sub-", "sub_"])).toBe("07");
    expect(deriveLabel("sub_07", ["sub-", "sub_"])).toBe("07");
    expect(deriveLabel("sub-", ["sub-"])).toBe("sub-");
    expect(deriveLabel("patient7", ["sub-"])).toBe("patient7");
  });
});
