import { spawn } from "child_process";

const MAX_CAPTURE_BYTES = 1024 * 1024;

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface DockerCli {
  exec(args: string[]): Promise<CliResult>;
}

interface CaptureState {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

function appendLimited(state: CaptureState, chunk: Buffer): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) state.chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  state.chunks.push(chunk);
  state.bytes = next;
}

function drain(state: CaptureState, label: string): string {
  return Buffer.concat(state.chunks).toString("utf8") + (state.truncated ? `\n[${label} truncated]\n` : "");
}

/** Runs the `docker` binary found on PATH. */
export class SystemDockerCli implements DockerCli {
  constructor(private readonly binary: string = "docker") {}

  async exec(args: string[]): Promise<CliResult> {
    const child = spawn(this.binary, args, { stdio: ["ignore", "pipe", "pipe"] as const });

    const out: CaptureState = { chunks: [], bytes: 0, truncated: false };
    const err: CaptureState = { chunks: [], bytes: 0, truncated: false };
    child.stdout.on("data", (chunk: Buffer) => appendLimited(out, chunk));
    child.stderr.on("data", (chunk: Buffer) => appendLimited(err, chunk));

    const exitCode = await new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null) => resolve(code ?? 1));
    });

    return { exitCode, stdout: drain(out, "stdout"), stderr: drain(err, "stderr") };
  }
}
