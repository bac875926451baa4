import * as z from "zod/v4";

const crockford26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${crockford26}$`), "invalid run_id");
export const zStagingMode = z.enum(["shared", "transfer"]);
export const zBackend = z.enum(["docker", "slurm"]);

const runTargetShape = {
  input_root: z.string().min(1),
  output_root: z.string().min(1),
  config_path: z.string().min(1).optional(),
  template: z.string().min(1).optional(),
  image: z.string().min(1).optional(),
  staging_mode: zStagingMode.optional(),
  license_path: z.string().min(1).optional(),
  backend: zBackend.optional(),
  repeat: z.number().int().min(1).optional(),
  chunk_size_bytes: z.number().int().positive().optional(),
  template_args: z.record(z.string(), z.string()).optional(),
  bindings: z.record(z.string(), z.string()).optional()
};

export const zFanoutPlanInput = z.object(runTargetShape);

export const zFanoutRunInput = z.object({
  ...runTargetShape,
  fresh: z.boolean().optional(),
  retry_failed: z.boolean().optional()
});

export const zFanoutStatusInput = z.object({
  run_id: zRunId,
  include_events: z.boolean().optional(),
  max_events: z.number().int().min(1).max(1000).optional()
});

export const zBinding = z.object({
  host_path: z.string(),
  container_path: z.string(),
  mode: z.enum(["ro", "rw"]),
  role: z.string()
});

export const zFanoutPlanOutput = z.object({
  run_id: zRunId,
  template: z.string(),
  units: z.array(
    z.object({
      unit_id: z.string(),
      label: z.string(),
      state: z.string(),
      argv: z.array(z.string()),
      output_dir: z.string(),
      bindings: z.array(zBinding)
    })
  ),
  control_files: z.array(z.string()),
  skipped: z.array(z.object({ name: z.string(), reason: z.string() }))
});

export const zFanoutRunOutput = z.object({
  run_id: zRunId,
  status: z.string(),
  units: z.number().int(),
  already_active: z.boolean()
});

export const zUnitStatus = z.object({
  unit_id: z.string(),
  label: z.string(),
  state: z.string(),
  attempt: z.number().int(),
  memory_mb: z.number().int(),
  escalations: z.number().int(),
  exit_code: z.number().int().nullable(),
  error_kind: z.string().nullable(),
  error: z.string().nullable(),
  aggregated: z.boolean()
});

export const zFanoutStatusOutput = z.object({
  run_id: zRunId,
  status: z.string(),
  template: z.string(),
  backend: zBackend,
  input_root: z.string(),
  output_root: z.string(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  exit_code: z.number().int().nullable(),
  error: z.string().nullable(),
  counts: z.record(z.string(), z.number().int()),
  units: z.array(zUnitStatus),
  events: z.array(
    z.object({
      ts: z.string(),
      kind: z.string(),
      unit_id: z.string().nullable(),
      message: z.string().nullable()
    })
  )
});
