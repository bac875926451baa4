import { promises as fs } from "fs";
import path from "path";
import type { RunId } from "../core/ids.js";

export interface UnitWorkspace {
  rootDir: string;
  metaDir: string;
  resolve(relpath: string): string;
  metaPath(name: string): string;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

/** `{workspaceRoot}/{runId}/{unitId}` with a `meta/` directory for scripts and exit codes. */
export async function createUnitWorkspace(workspaceRoot: string, runId: RunId, unitId: string): Promise<UnitWorkspace> {
  const root = safeJoin(path.resolve(workspaceRoot, runId), unitId);
  const metaDir = path.join(root, "meta");
  await fs.mkdir(metaDir, { recursive: true });

  return {
    rootDir: root,
    metaDir,
    resolve: (relpath: string) => safeJoin(root, relpath),
    metaPath: (name: string) => safeJoin(metaDir, name)
  };
}

export function runWorkspaceDir(workspaceRoot: string, runId: RunId): string {
  return path.resolve(workspaceRoot, runId);
}
