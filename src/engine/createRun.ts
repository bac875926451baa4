import { promises as fs } from "fs";
import path from "path";
import {
  configHash,
  loadFanoutConfig,
  templateFromDefinition,
  type FanoutConfig,
  type RawConfig
} from "../config/fanoutConfig.js";
import { InvalidInputError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunRecord } from "../core/run.js";
import { DockerFramework } from "../execution/docker/dockerFramework.js";
import { SlurmFramework } from "../execution/slurm/slurmFramework.js";
import type { ExecutionFramework } from "../execution/types.js";
import { runWorkspaceDir } from "../execution/workspace.js";
import { resolveRunId } from "../runs/runIdentity.js";
import { RunJournal } from "../runs/runJournal.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { findTemplate } from "../tasks/builtinTemplates.js";
import { validateTemplate, type TaskTemplate } from "../tasks/templates.js";
import { FanoutEngine, type EngineSettings } from "./fanoutEngine.js";

export interface RunRequest {
  inputRoot: string;
  outputRoot: string;
  configPath?: string | null;
  overrides?: RawConfig;
  fresh?: boolean;
  retryFailed?: boolean;
  dryRun?: boolean;
  requestedBy?: string | null;
  env?: NodeJS.ProcessEnv;
  echo?: boolean;
}

export interface PreparedRun {
  runId: RunId;
  config: FanoutConfig;
  template: TaskTemplate;
  workspaceRoot: string;
  record: RunRecord;
  journal: RunJournal;
  engine: FanoutEngine;
}

export type FrameworkFactory = (config: FanoutConfig, workspaceRoot: string) => ExecutionFramework;

export const defaultFrameworkFactory: FrameworkFactory = (config, workspaceRoot) => {
  const oomExitCode = config.retry.oom_exit_code;
  if (config.execution.backend === "slurm") {
    return new SlurmFramework({ workspaceRoot, placement: config.execution.slurm, oomExitCode });
  }
  return new DockerFramework({ workspaceRoot, networkMode: config.execution.docker.network_mode, oomExitCode });
};

async function assertReadableFile(filePath: string, what: string): Promise<void> {
  try {
    const st = await fs.stat(filePath);
    if (!st.isFile()) throw new InvalidInputError(`${what} is not a file: ${filePath}`, { phase: "staging" });
  } catch (err) {
    if (err instanceof InvalidInputError) throw err;
    throw new InvalidInputError(`${what} not found: ${filePath}`, { phase: "staging", cause: err });
  }
}

function envSnapshot(): JsonObject {
  return {
    node: process.version,
    platform: process.platform,
    store: process.env.DATABASE_URL ? "postgres" : "pg-mem"
  };
}

function configSnapshot(config: FanoutConfig): JsonObject {
  const snapshot: unknown = JSON.parse(JSON.stringify(config));
  if (typeof snapshot !== "object" || snapshot === null || Array.isArray(snapshot)) return {};
  return snapshot as JsonObject;
}

/**
 * Resolve configuration, template and run id, register the run and build an
 * engine for it. Nothing is submitted here.
 */
export async function prepareRun(
  request: RunRequest,
  deps: { store: PostgresStore; frameworkFactory?: FrameworkFactory }
): Promise<PreparedRun> {
  const config = await loadFanoutConfig({
    filePath: request.configPath ?? null,
    overrides: request.overrides,
    env: request.env
  });

  const custom = config.templates.map((def) => validateTemplate(templateFromDefinition(def)));
  const template = findTemplate(config.template, custom);

  const inputRoot = path.resolve(request.inputRoot);
  const outputRoot = path.resolve(request.outputRoot);
  const licensePath = config.staging.license_path ? path.resolve(config.staging.license_path) : null;
  if (licensePath) await assertReadableFile(licensePath, "license file");

  const hostBindings: Record<string, string> = {};
  for (const [k, v] of Object.entries(config.bindings)) hostBindings[k] = path.resolve(v);

  const hash = configHash(config);
  const runId = resolveRunId({ template: template.name, inputRoot, outputRoot, configHash: hash }, request.fresh ?? false);
  const workspaceRoot = path.resolve(config.staging.workspace_root ?? path.join(outputRoot, ".fanout", "workspaces"));

  if (!request.dryRun) await fs.mkdir(outputRoot, { recursive: true });

  const record = await deps.store.createRun({
    runId,
    template: template.name,
    inputRoot,
    outputRoot,
    backend: config.execution.backend,
    configHash: hash,
    status: "planned",
    requestedBy: request.requestedBy ?? null,
    configSnapshot: configSnapshot(config),
    environment: envSnapshot()
  });

  const journal = new RunJournal(deps.store, runId, {
    logFilePath: request.dryRun ? null : path.join(runWorkspaceDir(workspaceRoot, runId), "run.log"),
    echo: request.echo
  });

  const framework = (deps.frameworkFactory ?? defaultFrameworkFactory)(config, workspaceRoot);

  const settings: EngineSettings = {
    runId,
    template,
    inputRoot,
    discovery: {
      strategy: config.discovery.strategy ?? template.strategy,
      controlSuffixes: config.discovery.control_suffixes ?? template.controlSuffixes,
      markerSuffix: config.discovery.marker_suffix ?? template.markerSuffix,
      labelStripPrefixes: config.discovery.label_strip_prefixes ?? template.labelStripPrefixes,
      chunkSizeBytes: config.discovery.chunk_size_bytes,
      pairedSuffix: config.discovery.paired_suffix,
      repeat: config.discovery.repeat,
      includeHidden: config.discovery.include_hidden
    },
    staging: {
      mode: config.staging.mode,
      outputRoot,
      stagingDirName: config.staging.staging_dir_name,
      licensePath,
      hostBindings,
      args: config.template_args,
      extraArgv: config.extra_argv
    },
    defaults: {
      image: config.image ?? template.image,
      cpus: config.resources.cpus,
      runtimeSeconds: config.resources.runtime_seconds,
      env: config.env
    },
    initialMemoryMb: config.resources.initial_memory_mb,
    retry: {
      oomExitCode: config.retry.oom_exit_code,
      growthFactor: config.retry.growth_factor,
      ceilingMemoryMb: config.retry.ceiling_memory_mb
    },
    maxInFlight: config.execution.max_in_flight,
    pollIntervalMs: config.execution.poll_interval_ms,
    aggregation: {
      root: config.aggregation.root ? path.resolve(config.aggregation.root) : outputRoot,
      mode: config.aggregation.mode,
      cleanupStaging: config.aggregation.cleanup_staging
    },
    retryFailed: request.retryFailed ?? false
  };

  const engine = new FanoutEngine({ framework, store: deps.store, journal }, settings);
  return { runId, config, template, workspaceRoot, record, journal, engine };
}
