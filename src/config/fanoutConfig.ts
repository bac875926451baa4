import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { ConfigError } from "../core/errors.js";
import { DEFAULT_CHUNK_SIZE_BYTES } from "../planning/chunkPlanner.js";
import { DEFAULT_STAGING_DIR_NAME } from "../staging/stagingPlanner.js";
import { OOM_EXIT_CODE } from "../tasks/retryPolicy.js";
import type { TaskTemplate } from "../tasks/templates.js";

const zStrategy = z.enum(["per_entry", "collective", "chunked", "paired_reads"]);
const zStagingMode = z.enum(["shared", "transfer"]);
const zStringMap = z.record(z.string(), z.string());

export const zTemplateDefinition = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  image: z.string().min(1),
  entrypoint: z.string().min(1).nullable().default(null),
  staging_modes: z.array(zStagingMode).min(1).default(["shared", "transfer"]),
  strategy: zStrategy.default("per_entry"),
  control_suffixes: z.array(z.string()).default([]),
  marker_suffix: z.string().min(1).nullable().default(null),
  label_strip_prefixes: z.array(z.string()).default([]),
  input_dir: z.string(),
  output_dir: z.string(),
  license: z
    .object({
      container_path: z.string(),
      argv: z.array(z.string()).default([])
    })
    .nullable()
    .default(null),
  extra_bindings: z
    .array(
      z.object({
        key: z.string(),
        container_path: z.string(),
        mode: z.enum(["ro", "rw"]).default("ro")
      })
    )
    .default([]),
  argv: z.array(z.string()),
  default_args: zStringMap.default({}),
  env: zStringMap.default({})
});

export type TemplateDefinition = z.infer<typeof zTemplateDefinition>;

export const zFanoutConfig = z.object({
  version: z.literal(1).default(1),
  template: z.string().min(1).default("bids-app"),
  // Overrides the template's image when set.
  image: z.string().min(1).nullable().default(null),
  discovery: z
    .object({
      // Null fields fall back to the template's own setting.
      strategy: zStrategy.nullable().default(null),
      control_suffixes: z.array(z.string()).nullable().default(null),
      marker_suffix: z.string().min(1).nullable().default(null),
      label_strip_prefixes: z.array(z.string()).nullable().default(null),
      chunk_size_bytes: z.number().int().positive().default(DEFAULT_CHUNK_SIZE_BYTES),
      paired_suffix: z.string().min(1).default(".fastq.gz"),
      repeat: z.number().int().min(1).default(1),
      include_hidden: z.boolean().default(false)
    })
    .prefault({}),
  staging: z
    .object({
      mode: zStagingMode.default("shared"),
      license_path: z.string().nullable().default(null),
      staging_dir_name: z
        .string()
        .regex(/^[A-Za-z0-9._-]+$/, "must be a single path segment")
        .refine((s) => s !== "." && s !== "..", "must be a single path segment")
        .default(DEFAULT_STAGING_DIR_NAME),
      // Defaults to `{outputRoot}/.fanout/workspaces`.
      workspace_root: z.string().nullable().default(null)
    })
    .prefault({}),
  resources: z
    .object({
      initial_memory_mb: z.number().int().positive().default(4096),
      cpus: z.number().positive().default(1),
      runtime_seconds: z.number().int().positive().default(86400)
    })
    .prefault({}),
  retry: z
    .object({
      growth_factor: z.number().default(2),
      ceiling_memory_mb: z.number().int().positive().default(32768),
      oom_exit_code: z.number().int().min(1).max(255).default(OOM_EXIT_CODE)
    })
    .prefault({}),
  execution: z
    .object({
      backend: z.enum(["docker", "slurm"]).default("docker"),
      max_in_flight: z.number().int().min(1).default(8),
      poll_interval_ms: z.number().int().min(0).default(30000),
      docker: z
        .object({
          network_mode: z.enum(["none", "bridge", "host"]).default("none")
        })
        .prefault({}),
      slurm: z
        .object({
          partition: z.string().nullable().default(null),
          account: z.string().nullable().default(null),
          qos: z.string().nullable().default(null),
          constraint: z.string().nullable().default(null)
        })
        .prefault({})
    })
    .prefault({}),
  aggregation: z
    .object({
      mode: z.enum(["move", "copy"]).default("move"),
      cleanup_staging: z.boolean().default(false),
      // Defaults to the output root.
      root: z.string().nullable().default(null)
    })
    .prefault({}),
  template_args: zStringMap.default({}),
  bindings: zStringMap.default({}),
  extra_argv: z.array(z.string()).default([]),
  env: zStringMap.default({}),
  templates: z.array(zTemplateDefinition).default([])
});

export type FanoutConfig = z.infer<typeof zFanoutConfig>;

export type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge of plain objects; arrays and scalars in `override` replace. */
export function mergeRawConfig(base: RawConfig, override: RawConfig): RawConfig {
  const out: RawConfig = { ...base };
  for (const [k, v] of Object.entries(override)) {
    if (v === undefined) continue;
    const prev = out[k];
    out[k] = isPlainObject(prev) && isPlainObject(v) ? mergeRawConfig(prev, v) : v;
  }
  return out;
}

export function expandEnvToken(value: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const name = m[1];
  if (!name) return null;
  const v = env[name]?.trim();
  return v ? v : null;
}

function expandEnv(config: FanoutConfig, env: NodeJS.ProcessEnv): FanoutConfig {
  const opt = (v: string | null): string | null => (v === null ? null : expandEnvToken(v, env));

  const bindings: Record<string, string> = {};
  for (const [k, v] of Object.entries(config.bindings)) {
    const expanded = expandEnvToken(v, env);
    if (expanded === null) throw new ConfigError(`bindings.${k}: environment variable in ${v} is not set`);
    bindings[k] = expanded;
  }

  return {
    ...config,
    staging: {
      ...config.staging,
      license_path: opt(config.staging.license_path),
      workspace_root: opt(config.staging.workspace_root)
    },
    aggregation: { ...config.aggregation, root: opt(config.aggregation.root) },
    bindings
  };
}

export function parseFanoutConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env, source = "config"): FanoutConfig {
  const parsed = zFanoutConfig.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid ${source}: ${details}`);
  }
  return expandEnv(parsed.data, env);
}

export async function readRawConfig(filePath: string): Promise<RawConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config ${filePath}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`config ${filePath} is not valid YAML`, { cause: err });
  }
  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) throw new ConfigError(`config ${filePath} must be a mapping`);
  return doc;
}

/** File values first, then `overrides` (CLI flags or tool arguments) on top. */
export async function loadFanoutConfig(input: {
  filePath?: string | null;
  overrides?: RawConfig;
  env?: NodeJS.ProcessEnv;
}): Promise<FanoutConfig> {
  const base = input.filePath ? await readRawConfig(input.filePath) : {};
  const merged = mergeRawConfig(base, input.overrides ?? {});
  return parseFanoutConfig(merged, input.env ?? process.env, input.filePath ?? "config");
}

export function configHash(config: FanoutConfig): `sha256:${string}` {
  return sha256Prefixed(stableJsonStringify(config));
}

export function templateFromDefinition(def: TemplateDefinition): TaskTemplate {
  return {
    name: def.name,
    description: def.description,
    image: def.image,
    entrypoint: def.entrypoint,
    stagingModes: def.staging_modes,
    strategy: def.strategy,
    controlSuffixes: def.control_suffixes,
    markerSuffix: def.marker_suffix,
    labelStripPrefixes: def.label_strip_prefixes,
    inputs: { containerDir: def.input_dir },
    output: { containerPath: def.output_dir },
    license: def.license ? { containerPath: def.license.container_path, argv: def.license.argv } : null,
    extraBindings: def.extra_bindings.map((b) => ({ key: b.key, containerPath: b.container_path, mode: b.mode })),
    argv: def.argv,
    defaultArgs: def.default_args,
    env: def.env
  };
}
