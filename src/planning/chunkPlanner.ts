import { promises as fs } from "fs";
import path from "path";
import { InvalidInputError } from "../core/errors.js";

export const DEFAULT_CHUNK_SIZE_BYTES = 1073741824;

export interface SizedFile {
  path: string;
  sizeBytes: number;
}

export interface Chunk {
  index: number;
  files: SizedFile[];
  totalBytes: number;
}

/**
 * First-fit greedy packing in input order. A file that alone exceeds the
 * limit becomes a singleton chunk; nothing is ever dropped or reordered.
 */
export function planChunks(files: readonly SizedFile[], limitBytes: number): Chunk[] {
  if (!Number.isSafeInteger(limitBytes) || limitBytes < 1) {
    throw new InvalidInputError(`chunk size must be a positive integer (got ${limitBytes})`, { phase: "chunking" });
  }

  const chunks: Chunk[] = [];
  let current: SizedFile[] = [];
  let running = 0;

  const close = (): void => {
    chunks.push({ index: chunks.length, files: current, totalBytes: running });
    current = [];
    running = 0;
  };

  for (const file of files) {
    if (!Number.isSafeInteger(file.sizeBytes) || file.sizeBytes < 0) {
      throw new InvalidInputError(`invalid size for ${file.path}: ${file.sizeBytes}`, { phase: "chunking" });
    }
    if (current.length > 0 && running + file.sizeBytes > limitBytes) close();
    current.push(file);
    running += file.sizeBytes;
  }
  if (current.length > 0) close();

  return chunks;
}

/** Regular files directly under `dir`, in name order, with their sizes. */
export async function listChunkableFiles(dir: string, exclude: (name: string) => boolean = () => false): Promise<SizedFile[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const names = entries
    .filter((e) => e.isFile() && !exclude(e.name))
    .map((e) => e.name)
    .sort(compareNames);

  const out: SizedFile[] = [];
  for (const name of names) {
    const full = path.join(dir, name);
    const st = await fs.stat(full);
    out.push({ path: full, sizeBytes: st.size });
  }
  return out;
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
