import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import type { RawConfig } from "../config/fanoutConfig.js";
import { ConfigError, InvalidInputError, StagingError, errorMessage } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import { isRunId } from "../core/ids.js";
import { prepareRun, type FrameworkFactory } from "../engine/createRun.js";
import type { PlanSummary } from "../engine/fanoutEngine.js";
import type { PostgresStore } from "../store/postgresStore.js";
import {
  zFanoutPlanInput,
  zFanoutPlanOutput,
  zFanoutRunInput,
  zFanoutRunOutput,
  zFanoutStatusInput,
  zFanoutStatusOutput
} from "./toolSchemas.js";

/** Background runs started through the gateway, keyed by run id. */
export class RunRegistry {
  private readonly active = new Map<RunId, Promise<void>>();
  private readonly reserved = new Map<RunId, (settled: Promise<void> | void) => void>();

  isActive(runId: RunId): boolean {
    return this.active.has(runId);
  }

  /** Claim a run id before planning starts; false when it is already held. */
  reserve(runId: RunId): boolean {
    if (this.active.has(runId)) return false;
    this.active.set(
      runId,
      new Promise<void>((resolve) => {
        this.reserved.set(runId, resolve);
      })
    );
    return true;
  }

  release(runId: RunId): void {
    const settle = this.reserved.get(runId);
    if (!settle) return;
    this.reserved.delete(runId);
    this.active.delete(runId);
    settle();
  }

  track(runId: RunId, work: Promise<void>): void {
    const tracked = work.finally(() => {
      if (this.active.get(runId) === tracked) this.active.delete(runId);
    });
    this.active.set(runId, tracked);
    const settle = this.reserved.get(runId);
    if (settle) {
      this.reserved.delete(runId);
      settle(tracked);
    }
  }

  async wait(runId: RunId): Promise<void> {
    await this.active.get(runId);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.active.values()]);
  }
}

export interface GatewayDeps {
  store: PostgresStore;
  // Config file applied under every tool call's own arguments.
  configPath?: string | null;
  frameworkFactory?: FrameworkFactory;
  registry?: RunRegistry;
  env?: NodeJS.ProcessEnv;
}

type RunTargetArgs = z.infer<typeof zFanoutPlanInput>;

function overridesFromArgs(args: RunTargetArgs): RawConfig {
  return {
    template: args.template,
    image: args.image,
    staging: { mode: args.staging_mode, license_path: args.license_path },
    execution: { backend: args.backend },
    discovery: { repeat: args.repeat, chunk_size_bytes: args.chunk_size_bytes },
    template_args: args.template_args,
    bindings: args.bindings
  };
}

function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof InvalidInputError || err instanceof ConfigError || err instanceof StagingError) {
    return new McpError(ErrorCode.InvalidParams, err.describe());
  }
  return new McpError(ErrorCode.InternalError, errorMessage(err));
}

export function requestedByFromExtra(extra: {
  authInfo?: { clientId: string; extra?: Record<string, unknown> } | undefined;
  sessionId?: string | undefined;
}): string | null {
  const subject = extra.authInfo?.extra?.["subject"];
  if (typeof subject === "string") return subject;
  return extra.authInfo?.clientId ?? extra.sessionId ?? null;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "cohort-fanout-gateway",
    version: "0.1.0"
  });
  const registry = deps.registry ?? new RunRegistry();

  mcp.registerTool(
    "fanout_plan",
    {
      description: "Discover units and render each unit's container invocation and mounts without submitting anything.",
      inputSchema: zFanoutPlanInput,
      outputSchema: zFanoutPlanOutput
    },
    async (args, extra) => {
      try {
        const prepared = await prepareRun(
          {
            inputRoot: args.input_root,
            outputRoot: args.output_root,
            configPath: args.config_path ?? deps.configPath ?? null,
            overrides: overridesFromArgs(args),
            dryRun: true,
            requestedBy: requestedByFromExtra(extra),
            env: deps.env,
            echo: false
          },
          { store: deps.store, frameworkFactory: deps.frameworkFactory }
        );
        const plan = await prepared.engine.plan({ dryRun: true });

        const structured = {
          run_id: plan.runId,
          template: plan.template,
          units: plan.units.map((u) => ({
            unit_id: u.unitId,
            label: u.label,
            state: u.state,
            argv: u.argv,
            output_dir: u.outputDir,
            bindings: u.bindings.map((b) => ({
              host_path: b.hostPath,
              container_path: b.containerPath,
              mode: b.mode,
              role: b.role
            }))
          })),
          control_files: plan.controlFiles,
          skipped: plan.skipped
        };
        return {
          content: [{ type: "text", text: `Planned ${plan.units.length} unit(s) for ${plan.runId}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "fanout_run",
    {
      description: "Start (or resume) a fan-out run in the background and return its run id.",
      inputSchema: zFanoutRunInput,
      outputSchema: zFanoutRunOutput
    },
    async (args, extra) => {
      try {
        const prepared = await prepareRun(
          {
            inputRoot: args.input_root,
            outputRoot: args.output_root,
            configPath: args.config_path ?? deps.configPath ?? null,
            overrides: overridesFromArgs(args),
            fresh: args.fresh ?? false,
            retryFailed: args.retry_failed ?? false,
            requestedBy: requestedByFromExtra(extra),
            env: deps.env,
            echo: false
          },
          { store: deps.store, frameworkFactory: deps.frameworkFactory }
        );

        const runId = prepared.runId;
        if (!registry.reserve(runId)) {
          const units = await deps.store.listUnits(runId);
          return {
            content: [{ type: "text", text: `Run ${runId} is already active` }],
            structuredContent: { run_id: runId, status: "running", units: units.length, already_active: true }
          };
        }

        let plan: PlanSummary;
        try {
          plan = await prepared.engine.plan();
        } catch (err) {
          registry.release(runId);
          throw err;
        }
        registry.track(
          runId,
          prepared.engine.run().then(
            (report) => {
              console.error(`run ${runId} finished: ${report.status}`);
            },
            async (err: unknown) => {
              console.error(`run ${runId} aborted: ${errorMessage(err)}`);
              try {
                await deps.store.updateRun(runId, {
                  status: "failed",
                  finishedAt: new Date().toISOString(),
                  error: errorMessage(err)
                });
              } catch (storeErr) {
                console.error(`run ${runId}: could not record failure: ${errorMessage(storeErr)}`);
              }
            }
          )
        );

        return {
          content: [{ type: "text", text: `Started ${runId} with ${plan.units.length} unit(s)` }],
          structuredContent: { run_id: runId, status: "running", units: plan.units.length, already_active: false }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "fanout_status",
    {
      description: "Report a run's status, per-unit states and (optionally) its event log.",
      inputSchema: zFanoutStatusInput,
      outputSchema: zFanoutStatusOutput
    },
    async (args) => {
      const runId = args.run_id;
      if (!isRunId(runId)) throw new McpError(ErrorCode.InvalidParams, `invalid run_id: ${runId}`);

      const run = await deps.store.getRun(runId);
      if (!run) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${runId}`);

      const units = await deps.store.listUnits(runId);
      const events = args.include_events ? await deps.store.listRunEvents(runId, args.max_events ?? 200) : [];

      const counts: Record<string, number> = {};
      for (const u of units) counts[u.state] = (counts[u.state] ?? 0) + 1;

      const structured = {
        run_id: runId,
        status: run.status,
        template: run.template,
        backend: run.backend,
        input_root: run.inputRoot,
        output_root: run.outputRoot,
        created_at: run.createdAt,
        started_at: run.startedAt,
        finished_at: run.finishedAt,
        exit_code: run.exitCode,
        error: run.error,
        counts,
        units: units.map((u) => ({
          unit_id: u.unitId,
          label: u.label,
          state: u.state,
          attempt: u.attempt,
          memory_mb: u.memoryMb,
          escalations: u.escalations,
          exit_code: u.exitCode,
          error_kind: u.errorKind,
          error: u.error,
          aggregated: u.aggregated
        })),
        events: events.map((e) => ({ ts: e.ts, kind: e.kind, unit_id: e.unitId, message: e.message }))
      };

      return {
        content: [{ type: "text", text: `${runId}: ${run.status} (${units.length} unit(s))` }],
        structuredContent: structured
      };
    }
  );

  return mcp;
}
