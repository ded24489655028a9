/**
 * Error taxonomy for the scatter-gather engine.
 *
 * Work unit errors are always recovered into Failure outcomes by the invoker.
 * The classes below are what callers see on a run's terminal result, or
 * (for ConfigurationError) synchronously from scatterGather().
 */

export type ErrorCode =
  | "CONFIGURATION"
  | "WORK_UNIT_FAILED"
  | "ITEM_TIMEOUT"
  | "RUN_FAILED"
  | "AGGREGATION_FAILED"
  | "CANCELLED"
  | "RUN_TIMEOUT";

export class ScatterGatherError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid engine or run configuration. Thrown before any work unit starts.
 */
export class ConfigurationError extends ScatterGatherError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super("CONFIGURATION", `Invalid configuration: ${violations.join("; ")}`);
    this.violations = violations;
  }
}

/**
 * Wraps a thrown value that is not an Error, so every Failure carries one.
 */
export class WorkUnitFailure extends ScatterGatherError {
  readonly index: number;

  constructor(index: number, cause: unknown) {
    super("WORK_UNIT_FAILED", `Work unit #${index} failed: ${describeCause(cause)}`, { cause });
    this.index = index;
  }
}

export class ItemTimeoutError extends ScatterGatherError {
  readonly index: number;
  readonly timeoutMs: number;

  constructor(index: number, timeoutMs: number) {
    super("ITEM_TIMEOUT", `Work unit #${index} timed out after ${timeoutMs}ms`);
    this.index = index;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Fail-fast terminal cause: the first failed item's cause is kept on `.cause`.
 */
export class RunFailure extends ScatterGatherError {
  readonly index: number;

  constructor(index: number, cause: unknown) {
    super("RUN_FAILED", `Run failed at item #${index}: ${describeCause(cause)}`, { cause });
    this.index = index;
  }
}

/**
 * The aggregator's combine or finalize threw. Always fatal to the run.
 */
export class AggregationError extends ScatterGatherError {
  constructor(cause: unknown) {
    super("AGGREGATION_FAILED", `Aggregation failed: ${describeCause(cause)}`, { cause });
  }
}

export class CancelledError extends ScatterGatherError {
  constructor(message = "Run cancelled", code: ErrorCode = "CANCELLED") {
    super(code, message);
  }
}

export class RunTimeoutError extends CancelledError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Run timed out after ${timeoutMs}ms`, "RUN_TIMEOUT");
    this.timeoutMs = timeoutMs;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Normalize an AbortSignal's reason into a CancelledError.
 */
export function toCancelledError(reason: unknown): CancelledError {
  if (reason instanceof CancelledError) return reason;
  if (reason instanceof Error) return new CancelledError(reason.message);
  return new CancelledError(reason === undefined ? undefined : String(reason));
}
