import path from "path";
import type { TaskSpec } from "../../core/task.js";

export interface SlurmPlacement {
  partition: string | null;
  account: string | null;
  qos: string | null;
  constraint: string | null;
}

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function formatSlurmTimeLimit(seconds: number): string {
  if (!Number.isInteger(seconds) || seconds < 1) throw new Error(`invalid runtime seconds: ${seconds}`);

  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  const hms = [hours, minutes, secs].map((n) => String(n).padStart(2, "0")).join(":");
  return days > 0 ? `${days}-${hms}` : hms;
}

function assertEnvKey(key: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) throw new Error(`invalid env var name: ${key}`);
}

/** Apptainer pulls OCI references through the docker:// transport; local .sif files and explicit transports pass through. */
export function apptainerImageRef(image: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//.test(image)) return image;
  if (path.isAbsolute(image) || image.endsWith(".sif")) return image;
  return `docker://${image}`;
}

export function exitCodeFileName(attempt: number): string {
  return `exit_code.a${attempt}.txt`;
}

export interface SlurmScriptInput {
  task: TaskSpec;
  metaDir: string;
  placement: SlurmPlacement;
  resolveHostPath: (hostPath: string) => string;
}

/**
 * Batch script for one attempt: resource directives, then an apptainer
 * invocation whose exit status is written to a per-attempt file before the
 * script exits with it.
 */
export function renderSlurmScript(input: SlurmScriptInput): string {
  const { task, placement } = input;
  const metaDir = path.resolve(input.metaDir);
  const suffix = `a${task.attempt}`;

  const envKeys = Object.keys(task.env).sort();
  for (const k of envKeys) assertEnvKey(k);
  if (task.argv.length < 1 && !task.entrypoint) throw new Error("task argv must be non-empty");

  const lines: string[] = [];
  lines.push("#!/usr/bin/env bash");
  lines.push(`#SBATCH --job-name=${task.jobName.slice(0, 128)}`);
  if (placement.partition) lines.push(`#SBATCH --partition=${placement.partition}`);
  if (placement.account) lines.push(`#SBATCH --account=${placement.account}`);
  if (placement.qos) lines.push(`#SBATCH --qos=${placement.qos}`);
  if (placement.constraint) lines.push(`#SBATCH --constraint=${placement.constraint}`);
  lines.push(`#SBATCH --time=${formatSlurmTimeLimit(task.resources.runtimeSeconds)}`);
  lines.push(`#SBATCH --cpus-per-task=${task.resources.cpus}`);
  lines.push(`#SBATCH --mem=${task.resources.memoryMb}M`);
  lines.push(`#SBATCH --output=${path.join(metaDir, `slurm.${suffix}.out`)}`);
  lines.push(`#SBATCH --error=${path.join(metaDir, `slurm.${suffix}.err`)}`);
  lines.push("");
  lines.push("set -euo pipefail");
  lines.push("");
  lines.push(`STDOUT_PATH=${bashSingleQuote(path.join(metaDir, `stdout.${suffix}.txt`))}`);
  lines.push(`STDERR_PATH=${bashSingleQuote(path.join(metaDir, `stderr.${suffix}.txt`))}`);
  lines.push(`EXIT_CODE_PATH=${bashSingleQuote(path.join(metaDir, exitCodeFileName(task.attempt)))}`);
  lines.push("");

  for (const k of envKeys) {
    lines.push(`export APPTAINERENV_${k}=${bashSingleQuote(task.env[k] ?? "")}`);
  }
  if (envKeys.length > 0) lines.push("");

  const cmd: string[] = ["apptainer", task.entrypoint ? "exec" : "run", "--cleanenv"];
  for (const b of task.bindings) {
    cmd.push("--bind", `${input.resolveHostPath(b.hostPath)}:${b.containerPath}:${b.mode}`);
  }
  cmd.push(apptainerImageRef(task.image));
  if (task.entrypoint) cmd.push(task.entrypoint);
  cmd.push(...task.argv);

  lines.push("set +e");
  lines.push(`${cmd.map(bashSingleQuote).join(" ")} >"$STDOUT_PATH" 2>"$STDERR_PATH"`);
  lines.push("exit_code=$?");
  lines.push("set -e");
  lines.push(`printf '%s' "$exit_code" >"$EXIT_CODE_PATH"`);
  lines.push('exit "$exit_code"');
  lines.push("");

  return lines.join("\n");
}
