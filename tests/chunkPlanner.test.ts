import { describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { InvalidInputError } from "../src/core/errors.js";
import { listChunkableFiles, planChunks, type SizedFile } from "../src/planning/chunkPlanner.js";

const MB = 1024 * 1024;

function files(...sizesMb: number[]): SizedFile[] {
  return sizesMb.map((mb, i) => ({ path: `/in/f${i}`, sizeBytes: mb * MB }));
}

describe("planChunks", () => {
  it("packs first-fit in input order", () => {
    const chunks = planChunks(files(300, 400, 500), 1024 * MB);
    expect(chunks.map((c) => c.files.map((f) => f.path))).toEqual([["/in/f0", "/in/f1"], ["/in/f2"]]);
    expect(chunks.map((c) => c.totalBytes)).toEqual([700 * MB, 500 * MB]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1]);
  });

  it("puts an oversize file in a chunk of its own", () => {
    const chunks = planChunks(files(100, 2048, 100), 1024 * MB);
    expect(chunks.map((c) => c.files.length)).toEqual([1, 1, 1]);
    expect(chunks[1]?.totalBytes).toBe(2048 * MB);
  });

  it("never drops, duplicates or overfills", () => {
    const input = files(10, 900, 50, 70, 1, 1200, 30, 512, 512);
    const limit = 1024 * MB;
    const chunks = planChunks(input, limit);

    expect(chunks.flatMap((c) => c.files)).toEqual(input);
    for (const c of chunks) {
      if (c.files.length > 1) expect(c.totalBytes).toBeLessThanOrEqual(limit);
      expect(c.totalBytes).toBe(c.files.reduce((n, f) => n + f.sizeBytes, 0));
    }
  });

  it("returns no chunks for no files", () => {
    expect(planChunks([], 10)).toEqual([]);
  });

  it("rejects a non-positive limit and negative sizes", () => {
    expect(() => planChunks(files(1), 0)).toThrow(InvalidInputError);
    expect(() => planChunks([{ path: "/x", sizeBytes: -1 }], 10)).toThrow(InvalidInputError);
  });
});

describe("listChunkableFiles", () => {
  it("lists regular files by name with their sizes", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "fanout-chunks-"));
    try {
      await writeFile(path.join(dir, "b.dat"), "bbb");
      await writeFile(path.join(dir, "a.dat"), "a");
      await writeFile(path.join(dir, "skip.json"), "{}");

      const listed = await listChunkableFiles(dir, (name) => name.endsWith(".json"));
      expect(listed).toEqual([
        { path: path.join(dir, "a.dat"), sizeBytes: 1 },
        { path: path.join(dir, "b.dat"), sizeBytes: 3 }
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
