import { promises as fs } from "fs";
import path from "path";
import { StagingError } from "../core/errors.js";
import type { MountBinding, StagingMode, StagingPlan, TransferEntry } from "../core/task.js";
import type { AnalysisUnit } from "../core/unit.js";
import { renderArgv, type PlaceholderValue, type TaskTemplate } from "../tasks/templates.js";

export const DEFAULT_STAGING_DIR_NAME = ".compute";

// Workspace-relative locations used on the execution side in transfer mode.
export const TRANSFER_DATA_DIR = "data";
export const TRANSFER_LICENSE_DIR = "license";
export const TRANSFER_EXTRA_DIR = "extra";
export const TRANSFER_OUTPUT_DIR = "output";

export interface StagingContext {
  mode: StagingMode;
  outputRoot: string;
  stagingDirName: string;
  licensePath: string | null;
  hostBindings: Record<string, string>;
  args: Record<string, string>;
  extraArgv: string[];
  // Plan only; leave the filesystem untouched.
  dryRun?: boolean;
}

export interface StagedUnit {
  plan: StagingPlan;
  argv: string[];
}

function normalizeContainerPath(p: string): string {
  const n = path.posix.normalize(p);
  return n.length > 1 && n.endsWith("/") ? n.slice(0, -1) : n;
}

function isUnder(child: string, parent: string): boolean {
  return child === parent || child.startsWith(parent.endsWith("/") ? parent : `${parent}/`);
}

export function unitOutputDir(outputRoot: string, stagingDirName: string, unitId: string): string {
  return path.join(path.resolve(outputRoot), stagingDirName, unitId);
}

class BindingSet {
  readonly bindings: MountBinding[] = [];
  readonly inputs: TransferEntry[] = [];
  private readonly byContainerPath = new Map<string, MountBinding>();

  constructor(
    private readonly unitId: string,
    private readonly mode: StagingMode
  ) {}

  add(input: { hostPath: string; containerPath: string; mode: "ro" | "rw"; role: MountBinding["role"]; transferRelpath: string }): string {
    const containerPath = normalizeContainerPath(input.containerPath);
    const existing = this.byContainerPath.get(containerPath);
    if (existing) {
      throw new StagingError(
        `binding collision at ${containerPath}: ${existing.role} ${existing.hostPath} and ${input.role} ${input.hostPath}`,
        { unitId: this.unitId }
      );
    }

    let hostPath = path.resolve(input.hostPath);
    if (this.mode === "transfer") {
      if (input.role !== "output") this.inputs.push({ from: hostPath, to: input.transferRelpath });
      hostPath = input.transferRelpath;
    }

    const binding: MountBinding = { hostPath, containerPath, mode: input.mode, role: input.role };
    this.byContainerPath.set(containerPath, binding);
    this.bindings.push(binding);
    return containerPath;
  }

  // A path is provided when it lies inside a mount or is a directory that mounts populate.
  covers(containerPath: string): boolean {
    const p = normalizeContainerPath(containerPath);
    return this.bindings.some((b) => isUnder(p, b.containerPath) || isUnder(b.containerPath, p));
  }
}

/**
 * Compute the mount plan and rendered argv for one unit. Container paths are
 * canonical (taken from the template) in both modes; only the host side of
 * each binding differs between shared and transfer staging.
 */
export async function planStaging(unit: AnalysisUnit, template: TaskTemplate, ctx: StagingContext): Promise<StagedUnit> {
  if (!template.stagingModes.includes(ctx.mode)) {
    throw new StagingError(`template ${template.name} does not support ${ctx.mode} staging`, { unitId: unit.id });
  }
  if (ctx.licensePath && !template.license) {
    throw new StagingError(`template ${template.name} has no license slot but a license file was given`, { unitId: unit.id });
  }

  const set = new BindingSet(unit.id, ctx.mode);
  const inputDir = template.inputs.containerDir;
  const values = new Map<string, PlaceholderValue>();

  let primaryContainerPath: string;
  if (unit.primary.kind === "files") {
    for (const f of unit.primary.paths) {
      const name = path.basename(f);
      set.add({
        hostPath: f,
        containerPath: path.posix.join(inputDir, name),
        mode: "ro",
        role: "primary",
        transferRelpath: path.posix.join(TRANSFER_DATA_DIR, name)
      });
    }
    primaryContainerPath = inputDir;
  } else {
    const name = path.basename(unit.primary.path);
    primaryContainerPath = set.add({
      hostPath: unit.primary.path,
      containerPath: path.posix.join(inputDir, name),
      mode: "ro",
      role: "primary",
      transferRelpath: path.posix.join(TRANSFER_DATA_DIR, name)
    });
  }

  for (const control of unit.controlFiles) {
    const name = path.basename(control);
    set.add({
      hostPath: control,
      containerPath: path.posix.join(inputDir, name),
      mode: "ro",
      role: "control",
      transferRelpath: path.posix.join(TRANSFER_DATA_DIR, name)
    });
  }

  const outputDir = unitOutputDir(ctx.outputRoot, ctx.stagingDirName, unit.id);
  const outputContainerPath = set.add({
    hostPath: outputDir,
    containerPath: template.output.containerPath,
    mode: "rw",
    role: "output",
    transferRelpath: TRANSFER_OUTPUT_DIR
  });

  for (const extra of template.extraBindings) {
    const hostPath = ctx.hostBindings[extra.key];
    if (!hostPath) {
      throw new StagingError(`template ${template.name} needs a host path for binding "${extra.key}"`, { unitId: unit.id });
    }
    const containerPath = set.add({
      hostPath,
      containerPath: extra.containerPath,
      mode: extra.mode,
      role: "extra",
      transferRelpath: path.posix.join(TRANSFER_EXTRA_DIR, extra.key)
    });
    values.set(`bind:${extra.key}`, { kind: "path", value: containerPath });
  }

  let licenseContainerPath: string | null = null;
  if (ctx.licensePath && template.license) {
    licenseContainerPath = set.add({
      hostPath: ctx.licensePath,
      containerPath: template.license.containerPath,
      mode: "ro",
      role: "license",
      transferRelpath: path.posix.join(TRANSFER_LICENSE_DIR, path.basename(ctx.licensePath))
    });
  }

  values.set("unit", { kind: "text", value: unit.id });
  values.set("label", { kind: "text", value: unit.label });
  values.set("input", { kind: "path", value: normalizeContainerPath(inputDir) });
  values.set("primary", { kind: "path", value: primaryContainerPath });
  values.set("output", { kind: "path", value: outputContainerPath });
  if (unit.marker && unit.primary.kind === "directory") {
    const rel = path.relative(unit.primary.path, unit.marker).split(path.sep).join("/");
    values.set("marker", { kind: "path", value: path.posix.join(primaryContainerPath, rel) });
  }
  if (licenseContainerPath) values.set("license", { kind: "path", value: licenseContainerPath });
  for (const [k, v] of Object.entries({ ...template.defaultArgs, ...ctx.args })) {
    values.set(`arg:${k}`, { kind: "text", value: v });
  }

  const tokens = [...template.argv, ...(licenseContainerPath && template.license ? template.license.argv : [])];
  const rendered = renderArgv(tokens, values, unit.id);
  for (const p of rendered.referencedPaths) {
    if (!set.covers(p)) {
      throw new StagingError(`argv references ${p} which no binding provides`, { unitId: unit.id });
    }
  }

  if (ctx.mode === "shared" && !ctx.dryRun) {
    await fs.mkdir(outputDir, { recursive: true });
  }

  const plan: StagingPlan = {
    unitId: unit.id,
    mode: ctx.mode,
    bindings: set.bindings,
    transfers: {
      inputs: set.inputs,
      outputs: ctx.mode === "transfer" ? [{ from: TRANSFER_OUTPUT_DIR, to: outputDir }] : []
    },
    outputDir
  };

  return { plan, argv: [...rendered.argv, ...ctx.extraArgv] };
}
