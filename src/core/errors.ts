export type FanoutPhase = "config" | "discovery" | "chunking" | "staging" | "submission" | "execution" | "aggregation";

export interface FanoutErrorContext {
  phase: FanoutPhase;
  unitId?: string | null;
  cause?: unknown;
}

export class FanoutError extends Error {
  readonly phase: FanoutPhase;
  readonly unitId: string | null;

  constructor(message: string, context: FanoutErrorContext) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "FanoutError";
    this.phase = context.phase;
    this.unitId = context.unitId ?? null;
  }

  describe(): string {
    return this.unitId ? `[${this.phase}] unit ${this.unitId}: ${this.message}` : `[${this.phase}] ${this.message}`;
  }
}

export class InvalidInputError extends FanoutError {
  constructor(message: string, context: Partial<FanoutErrorContext> = {}) {
    super(message, { phase: "discovery", ...context });
    this.name = "InvalidInputError";
  }
}

export class ConfigError extends FanoutError {
  constructor(message: string, context: Partial<FanoutErrorContext> = {}) {
    super(message, { phase: "config", ...context });
    this.name = "ConfigError";
  }
}

export class StagingError extends FanoutError {
  constructor(message: string, context: Partial<FanoutErrorContext> = {}) {
    super(message, { phase: "staging", ...context });
    this.name = "StagingError";
  }
}

export class ResourceExhaustedError extends FanoutError {
  readonly memoryMb: number;

  constructor(message: string, context: Partial<FanoutErrorContext> & { memoryMb: number }) {
    super(message, { phase: "execution", ...context });
    this.name = "ResourceExhaustedError";
    this.memoryMb = context.memoryMb;
  }
}

export class TaskFailedError extends FanoutError {
  readonly exitCode: number | null;

  constructor(message: string, context: Partial<FanoutErrorContext> & { exitCode: number | null }) {
    super(message, { phase: "execution", ...context });
    this.name = "TaskFailedError";
    this.exitCode = context.exitCode;
  }
}

export class ExternalSchedulerError extends FanoutError {
  constructor(message: string, context: Partial<FanoutErrorContext> = {}) {
    super(message, { phase: "execution", ...context });
    this.name = "ExternalSchedulerError";
  }
}

export class AggregationConflictError extends FanoutError {
  constructor(message: string, context: Partial<FanoutErrorContext> = {}) {
    super(message, { phase: "aggregation", ...context });
    this.name = "AggregationConflictError";
  }
}

export type FanoutErrorKind =
  | "InvalidInputError"
  | "ConfigError"
  | "StagingError"
  | "ResourceExhaustedError"
  | "TaskFailedError"
  | "ExternalSchedulerError"
  | "AggregationConflictError"
  | "Cancelled";

export function errorMessage(err: unknown): string {
  if (err instanceof FanoutError) return err.describe();
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
