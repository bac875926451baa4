import { promises as fs, type Dirent } from "fs";
import path from "path";
import { AggregationConflictError, errnoCode, errorMessage } from "../core/errors.js";

export type AggregationMode = "move" | "copy";

export interface AggregationOptions {
  root: string;
  mode: AggregationMode;
  cleanupStaging: boolean;
}

export interface AggregatableUnit {
  unitId: string;
  outputDir: string;
}

export interface UnitMerge {
  unitId: string;
  apps: string[];
  entries: number;
  // Top-level files in the output dir; only directories are merged.
  skipped: string[];
}

export interface AggregationReport {
  merged: UnitMerge[];
  failures: AggregationConflictError[];
}

const CROSS_MOVE_CODES = new Set(["EXDEV", "ENOTEMPTY", "EEXIST", "EPERM"]);

async function moveEntry(src: string, dest: string): Promise<void> {
  try {
    await fs.rename(src, dest);
    return;
  } catch (err) {
    const code = errnoCode(err);
    if (!code || !CROSS_MOVE_CODES.has(code)) throw err;
  }
  await fs.cp(src, dest, { recursive: true, force: true });
  await fs.rm(src, { recursive: true, force: true });
}

async function mergeUnit(unit: AggregatableUnit, opts: AggregationOptions): Promise<UnitMerge> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(unit.outputDir, { withFileTypes: true });
  } catch (err) {
    throw new AggregationConflictError(`cannot read output directory ${unit.outputDir}: ${errorMessage(err)}`, {
      unitId: unit.unitId,
      cause: err
    });
  }

  const merge: UnitMerge = { unitId: unit.unitId, apps: [], entries: 0, skipped: [] };
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const app of sorted) {
    if (!app.isDirectory()) {
      merge.skipped.push(app.name);
      continue;
    }

    const src = path.join(unit.outputDir, app.name);
    const dest = path.join(opts.root, app.name, unit.unitId);
    try {
      await fs.mkdir(dest, { recursive: true });
    } catch (err) {
      throw new AggregationConflictError(`cannot create ${dest}: ${errorMessage(err)}`, {
        unitId: unit.unitId,
        cause: err
      });
    }

    const children = (await fs.readdir(src)).sort();
    for (const child of children) {
      const from = path.join(src, child);
      const to = path.join(dest, child);
      try {
        if (opts.mode === "move") await moveEntry(from, to);
        else await fs.cp(from, to, { recursive: true, force: true });
      } catch (err) {
        throw new AggregationConflictError(`cannot ${opts.mode} ${from} to ${to}: ${errorMessage(err)}`, {
          unitId: unit.unitId,
          cause: err
        });
      }
      merge.entries += 1;
    }
    merge.apps.push(app.name);
  }

  if (opts.cleanupStaging) await fs.rm(unit.outputDir, { recursive: true, force: true });
  return merge;
}

/**
 * Merges each unit's `{outputDir}/{app}/...` into `{root}/{app}/{unitId}/...`.
 * Callers pass succeeded units only. One unit's failure does not stop the others.
 */
export async function aggregateUnits(
  units: readonly AggregatableUnit[],
  opts: AggregationOptions
): Promise<AggregationReport> {
  const report: AggregationReport = { merged: [], failures: [] };
  for (const unit of units) {
    try {
      report.merged.push(await mergeUnit(unit, opts));
    } catch (err) {
      report.failures.push(
        err instanceof AggregationConflictError
          ? err
          : new AggregationConflictError(errorMessage(err), { unitId: unit.unitId, cause: err })
      );
    }
  }
  return report;
}
