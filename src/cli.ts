import type * as pg from "pg";
import type { RawConfig } from "./config/fanoutConfig.js";
import { ConfigError, FanoutError, InvalidInputError, StagingError, errorMessage } from "./core/errors.js";
import { createDb, openPool } from "./db/connection.js";
import { prepareRun, type FrameworkFactory } from "./engine/createRun.js";
import { PostgresStore } from "./store/postgresStore.js";

export const EXIT_OK = 0;
export const EXIT_UNIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function usage(): string {
  return [
    "usage:",
    "  cohort-fanout <input-root> <output-root> [options]",
    "",
    "options:",
    "  --config <file>          YAML configuration (flags override it)",
    "  --template <name>        task template (bids-app, bids-group, eager, stacks, gwas, chunked-app, or custom)",
    "  --image <ref>            container image, overriding the template's",
    "  --strategy <s>           per_entry | collective | chunked | paired_reads",
    "  --chunk-size <bytes>     byte limit per chunk (default 1073741824)",
    "  --repeat <n>             run every unit n times",
    "  --transfer | --shared    staging mode (default shared)",
    "  --license <file>         license file mounted read-only into every task",
    "  --backend <b>            docker | slurm",
    "  --max-in-flight <n>      outstanding task limit",
    "  --poll-interval <ms>     delay between status polls",
    "  --cleanup                remove per-unit staging output after aggregation",
    "  --aggregate-mode <m>     move | copy",
    "  --arg <key=value>        template argument (repeatable)",
    "  --bind <key=path>        host path for a template binding (repeatable)",
    "  --fresh                  start a new run instead of resuming",
    "  --retry-failed           resubmit units that failed in an earlier invocation",
    "  --dry-run                print the plan without submitting",
    "  --help",
    ""
  ].join("\n");
}

const FLAGS = new Set(["transfer", "shared", "cleanup", "fresh", "retry-failed", "dry-run", "help"]);
const REPEATABLE = new Set(["arg", "bind"]);
const VALUED = new Set([
  "config",
  "template",
  "image",
  "strategy",
  "chunk-size",
  "repeat",
  "license",
  "backend",
  "max-in-flight",
  "poll-interval",
  "aggregate-mode"
]);

export interface ParsedArgs {
  positionals: string[];
  values: Record<string, string>;
  lists: Record<string, string[]>;
  flags: Set<string>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const out: ParsedArgs = { positionals: [], values: {}, lists: {}, flags: new Set() };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (!a.startsWith("--")) {
      out.positionals.push(a);
      continue;
    }
    const key = a.slice(2);
    if (FLAGS.has(key)) {
      out.flags.add(key);
      continue;
    }
    if (!VALUED.has(key) && !REPEATABLE.has(key)) throw new UsageError(`unknown option: ${a}`);

    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw new UsageError(`missing value for --${key}`);
    i++;
    if (REPEATABLE.has(key)) (out.lists[key] ??= []).push(next);
    else out.values[key] = next;
  }
  return out;
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new UsageError(`--${flag} expects a number (got ${value})`);
  return n;
}

function toPairs(flag: string, entries: readonly string[] | undefined): Record<string, string> | undefined {
  if (!entries) return undefined;
  const out: Record<string, string> = {};
  for (const e of entries) {
    const eq = e.indexOf("=");
    if (eq <= 0) throw new UsageError(`--${flag} expects key=value (got ${e})`);
    out[e.slice(0, eq)] = e.slice(eq + 1);
  }
  return out;
}

export function overridesFromFlags(parsed: ParsedArgs): RawConfig {
  const v = parsed.values;
  if (parsed.flags.has("transfer") && parsed.flags.has("shared")) {
    throw new UsageError("--transfer and --shared are mutually exclusive");
  }
  const mode = parsed.flags.has("transfer") ? "transfer" : parsed.flags.has("shared") ? "shared" : undefined;

  return {
    template: v["template"],
    image: v["image"],
    discovery: {
      strategy: v["strategy"],
      chunk_size_bytes: toNumber("chunk-size", v["chunk-size"]),
      repeat: toNumber("repeat", v["repeat"])
    },
    staging: { mode, license_path: v["license"] },
    execution: {
      backend: v["backend"],
      max_in_flight: toNumber("max-in-flight", v["max-in-flight"]),
      poll_interval_ms: toNumber("poll-interval", v["poll-interval"])
    },
    aggregation: {
      mode: v["aggregate-mode"],
      cleanup_staging: parsed.flags.has("cleanup") ? true : undefined
    },
    template_args: toPairs("arg", parsed.lists["arg"]),
    bindings: toPairs("bind", parsed.lists["bind"])
  };
}

export interface CliDeps {
  store?: PostgresStore;
  frameworkFactory?: FrameworkFactory;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

function isInputProblem(e: unknown): boolean {
  return e instanceof InvalidInputError || e instanceof ConfigError || e instanceof StagingError;
}

/** Runs the command line to completion and returns the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));

  let parsed: ParsedArgs;
  let overrides: RawConfig;
  try {
    parsed = parseArgs(argv);
    overrides = overridesFromFlags(parsed);
  } catch (e) {
    err(errorMessage(e));
    err(usage());
    return EXIT_USAGE;
  }

  if (parsed.flags.has("help")) {
    out(usage());
    return EXIT_OK;
  }
  const [inputRoot, outputRoot, ...rest] = parsed.positionals;
  if (!inputRoot || !outputRoot || rest.length > 0) {
    err(usage());
    return EXIT_USAGE;
  }

  let pool: pg.Pool | null = null;
  let store: PostgresStore;
  if (deps.store) {
    store = deps.store;
  } else {
    pool = await openPool(deps.env ?? process.env);
    store = new PostgresStore(createDb(pool));
  }

  try {
    const dryRun = parsed.flags.has("dry-run");
    const prepared = await prepareRun(
      {
        inputRoot,
        outputRoot,
        configPath: parsed.values["config"] ?? null,
        overrides,
        fresh: parsed.flags.has("fresh"),
        retryFailed: parsed.flags.has("retry-failed"),
        dryRun,
        requestedBy: deps.env?.USER ?? process.env.USER ?? null,
        env: deps.env
      },
      { store, frameworkFactory: deps.frameworkFactory }
    );

    if (dryRun) {
      const plan = await prepared.engine.plan({ dryRun: true });
      out(`run ${plan.runId} (${plan.template}): ${plan.units.length} unit(s)`);
      for (const u of plan.units) out(`${u.unitId}\t${u.argv.join(" ")}`);
      for (const s of plan.skipped) err(`skipped ${s.name}: ${s.reason}`);
      return EXIT_OK;
    }

    const report = await prepared.engine.run({ signal: deps.signal });
    for (const u of report.units) {
      out(`${u.unitId}\t${u.state}\tattempt=${u.attempt}\tmemory=${u.memoryMb}MB${u.error ? `\t${u.error}` : ""}`);
    }
    for (const f of report.aggregationFailures) err(`aggregation failed for ${f.unitId ?? "?"}: ${f.message}`);
    out(`run ${report.runId}: ${report.status} (${report.succeeded} succeeded, ${report.failed} failed)`);
    return report.exitCode === 0 ? EXIT_OK : EXIT_UNIT_FAILURE;
  } catch (e) {
    err(e instanceof FanoutError ? e.describe() : errorMessage(e));
    return isInputProblem(e) ? EXIT_USAGE : EXIT_UNIT_FAILURE;
  } finally {
    if (pool) await pool.end();
  }
}
