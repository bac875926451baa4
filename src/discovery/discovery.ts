import { promises as fs, type Stats } from "fs";
import path from "path";
import { InvalidInputError, errnoCode } from "../core/errors.js";
import { isSafeUnitId } from "../core/ids.js";
import type { AnalysisUnit, UnitPrimary } from "../core/unit.js";
import { compareNames, listChunkableFiles, planChunks } from "../planning/chunkPlanner.js";

export type DiscoveryStrategy = "per_entry" | "collective" | "chunked" | "paired_reads";

export interface DiscoveryOptions {
  strategy: DiscoveryStrategy;
  controlSuffixes: string[];
  markerSuffix: string | null;
  chunkSizeBytes: number;
  pairedSuffix: string;
  repeat: number;
  includeHidden: boolean;
  labelStripPrefixes: string[];
}

export interface DiscoveryResult {
  inputRoot: string;
  units: AnalysisUnit[];
  controlFiles: string[];
  skipped: Array<{ name: string; reason: string }>;
}

interface DiscoveredItem {
  name: string;
  primary: UnitPrimary;
  marker: string | null;
}

async function assertInputRoot(inputRoot: string): Promise<void> {
  let st: Stats;
  try {
    st = await fs.stat(inputRoot);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new InvalidInputError(`input root does not exist: ${inputRoot}`);
    }
    throw new InvalidInputError(`input root is not readable: ${inputRoot}`, { cause: err });
  }
  if (!st.isDirectory()) {
    throw new InvalidInputError(`input root is not a directory: ${inputRoot}`);
  }
}

export function deriveLabel(name: string, stripPrefixes: readonly string[]): string {
  for (const prefix of stripPrefixes) {
    if (prefix && name.startsWith(prefix) && name.length > prefix.length) return name.slice(prefix.length);
  }
  return name;
}

function isControlFile(name: string, suffixes: readonly string[]): boolean {
  return suffixes.some((s) => s.length > 0 && name.endsWith(s));
}

async function findMarker(dir: string, suffix: string): Promise<string | null> {
  const names = (await fs.readdir(dir, { withFileTypes: true }))
    .filter((e) => e.isFile() && e.name.endsWith(suffix))
    .map((e) => e.name)
    .sort(compareNames);
  const first = names[0];
  return first ? path.join(dir, first) : null;
}

function pairPrefix(r1Name: string, suffix: string): string {
  const stem = r1Name.slice(0, r1Name.length - `R1${suffix}`.length);
  return stem.replace(/[_.-]+$/, "");
}

/**
 * Enumerate the analysis units under `inputRoot`. The output order is a pure
 * function of the directory contents (names are compared bytewise), so an
 * interrupted run rediscovers exactly the same units.
 */
export async function discoverUnits(inputRoot: string, options: DiscoveryOptions): Promise<DiscoveryResult> {
  const root = path.resolve(inputRoot);
  await assertInputRoot(root);

  if (!Number.isInteger(options.repeat) || options.repeat < 1) {
    throw new InvalidInputError(`repeat must be an integer >= 1 (got ${options.repeat})`);
  }

  const entries = (await fs.readdir(root, { withFileTypes: true }))
    .filter((e) => options.includeHidden || !e.name.startsWith("."))
    .sort((a, b) => compareNames(a.name, b.name));

  const controlFiles =
    options.strategy === "collective"
      ? []
      : entries.filter((e) => e.isFile() && isControlFile(e.name, options.controlSuffixes)).map((e) => path.join(root, e.name));
  const controlSet = new Set(controlFiles.map((f) => path.basename(f)));

  const skipped: Array<{ name: string; reason: string }> = [];
  const items: DiscoveredItem[] = [];

  switch (options.strategy) {
    case "per_entry": {
      for (const e of entries) {
        if (!e.isDirectory()) continue;
        const dir = path.join(root, e.name);
        let marker: string | null = null;
        if (options.markerSuffix) {
          marker = await findMarker(dir, options.markerSuffix);
          if (!marker) {
            skipped.push({ name: e.name, reason: `no *${options.markerSuffix} file` });
            continue;
          }
        }
        items.push({ name: e.name, primary: { kind: "directory", path: dir }, marker });
      }
      break;
    }
    case "collective": {
      items.push({ name: path.basename(root), primary: { kind: "directory", path: root }, marker: null });
      break;
    }
    case "chunked": {
      const files = await listChunkableFiles(
        root,
        (name) => controlSet.has(name) || (!options.includeHidden && name.startsWith("."))
      );
      for (const chunk of planChunks(files, options.chunkSizeBytes)) {
        items.push({
          name: `chunk-${String(chunk.index).padStart(4, "0")}`,
          primary: { kind: "files", paths: chunk.files.map((f) => f.path) },
          marker: null
        });
      }
      break;
    }
    case "paired_reads": {
      const suffix = options.pairedSuffix;
      const files = new Set(entries.filter((e) => e.isFile()).map((e) => e.name));
      for (const name of [...files].sort(compareNames)) {
        if (!name.endsWith(`R1${suffix}`)) continue;
        const mate = `${name.slice(0, name.length - `R1${suffix}`.length)}R2${suffix}`;
        if (!files.has(mate)) {
          skipped.push({ name, reason: `missing mate ${mate}` });
          continue;
        }
        const prefix = pairPrefix(name, suffix);
        items.push({
          name: prefix.length > 0 ? prefix : name,
          primary: { kind: "files", paths: [path.join(root, name), path.join(root, mate)] },
          marker: null
        });
      }
      break;
    }
  }

  const units: AnalysisUnit[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    for (let rep = 0; rep < options.repeat; rep++) {
      const id = options.repeat > 1 ? `${item.name}-${rep}` : item.name;
      if (!isSafeUnitId(id)) {
        throw new InvalidInputError(`unit name is not a safe identifier: ${JSON.stringify(id)}`, { unitId: id });
      }
      if (seen.has(id)) {
        throw new InvalidInputError(`duplicate unit identifier: ${id}`, { unitId: id });
      }
      seen.add(id);
      units.push({
        id,
        label: deriveLabel(item.name, options.labelStripPrefixes),
        primary: item.primary,
        controlFiles,
        marker: item.marker,
        repetition: options.repeat > 1 ? rep : null
      });
    }
  }

  return { inputRoot: root, units, controlFiles, skipped };
}
