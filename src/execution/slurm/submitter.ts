import { spawnSync } from "child_process";

export interface SlurmSubmitResult {
  slurmJobId: string;
  stdout: string;
  stderr: string;
}

export interface SlurmSubmitter {
  submit(scriptPath: string): Promise<SlurmSubmitResult>;
  cancel(jobId: string): Promise<void>;
}

export function parseSbatchJobId(stdout: string): string | null {
  const trimmed = stdout.trim();
  if (!trimmed) return null;

  // --parsable prints "jobid" or "jobid;cluster".
  const token = trimmed.split(/\s+/)[0] ?? "";
  if (/^\d+/.test(token)) return token.split(";")[0] || null;

  const m = /Submitted batch job\s+(\d+)/.exec(trimmed);
  return m?.[1] ?? null;
}

function run(bin: string, args: string[]): { stdout: string; stderr: string } {
  const res = spawnSync(bin, args, { stdio: ["ignore", "pipe", "pipe"] });
  const stdout = res.stdout ? res.stdout.toString("utf8") : "";
  const stderr = res.stderr ? res.stderr.toString("utf8") : "";
  if (res.error) throw res.error;
  if (res.status !== 0) throw new Error(`${bin} failed (exit ${res.status})${stderr ? `: ${stderr.trim()}` : ""}`);
  return { stdout, stderr };
}

export class SbatchSubmitter implements SlurmSubmitter {
  async submit(scriptPath: string): Promise<SlurmSubmitResult> {
    const { stdout, stderr } = run("sbatch", ["--parsable", scriptPath]);
    const jobId = parseSbatchJobId(stdout) ?? parseSbatchJobId(stderr);
    if (!jobId) throw new Error(`unable to parse sbatch job id from output: ${stdout || stderr}`);
    return { slurmJobId: jobId, stdout, stderr };
  }

  async cancel(jobId: string): Promise<void> {
    run("scancel", [jobId]);
  }
}
