import { promises as fs } from "fs";
import path from "path";
import { errnoCode } from "../core/errors.js";
import type { MountBinding, StagingPlan, TransferEntry } from "../core/task.js";
import type { UnitWorkspace } from "./workspace.js";

/**
 * Copy a transfer-mode unit's inputs into its workspace and reset the output
 * directory, so a resubmitted attempt never sees a previous attempt's outputs.
 */
export async function stageInputs(ws: UnitWorkspace, plan: StagingPlan): Promise<void> {
  if (plan.mode !== "transfer") return;
  for (const t of plan.transfers.inputs) {
    const dest = ws.resolve(t.to);
    await fs.rm(dest, { recursive: true, force: true });
    await fs.mkdir(path.dirname(dest), { recursive: true });
    await fs.cp(t.from, dest, { recursive: true });
  }
  for (const t of plan.transfers.outputs) {
    const src = ws.resolve(t.from);
    await fs.rm(src, { recursive: true, force: true });
    await fs.mkdir(src, { recursive: true });
  }
}

/** Empty a unit's host output directory before an attempt is submitted. */
export async function resetOutputDir(outputDir: string): Promise<void> {
  await fs.rm(outputDir, { recursive: true, force: true });
  await fs.mkdir(outputDir, { recursive: true });
}

export function collectEntries(ws: UnitWorkspace, plan: StagingPlan): TransferEntry[] {
  return plan.transfers.outputs.map((t) => ({ from: ws.resolve(t.from), to: t.to }));
}

/** Copy declared outputs back to their collection location once a task is terminal. */
export async function collectOutputs(entries: readonly TransferEntry[]): Promise<void> {
  for (const t of entries) {
    await fs.mkdir(t.to, { recursive: true });
    try {
      await fs.access(t.from);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") continue;
      throw err;
    }
    await fs.cp(t.from, t.to, { recursive: true, force: true });
  }
}

export function hostPathFor(ws: UnitWorkspace, binding: MountBinding): string {
  return path.isAbsolute(binding.hostPath) ? binding.hostPath : ws.resolve(binding.hostPath);
}
