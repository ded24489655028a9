/**
 * Core type definitions for the scatter-gather engine.
 * Kept in one module so the engine, trajectory and events share a stable
 * vocabulary without circular imports.
 */

// ============================================================================
// Work Units & Outcomes
// ============================================================================

export type FailurePolicy = "fail-fast" | "fail-soft";

export interface WorkUnitContext {
  /** Zero-based admission index of the item. */
  index: number;
  /** 1 on the first try, incremented on each retry. */
  attempt: number;
  /** Aborted when the unit times out or the run is cancelled/terminates early. */
  signal: AbortSignal;
}

/**
 * One unit of work per input item. May return synchronously or asynchronously,
 * and may block; the engine only requires that it settles exactly once.
 */
export type WorkUnit<I, T> = (item: I, context: WorkUnitContext) => Promise<T> | T;

export interface Success<I, T> {
  kind: "success";
  index: number;
  item: I;
  value: T;
  attempts: number;
  elapsedMs: number;
}

export interface Failure<I> {
  kind: "failure";
  index: number;
  item: I;
  cause: Error;
  attempts: number;
  elapsedMs: number;
}

export type Outcome<I, T> = Success<I, T> | Failure<I>;

export function isSuccess<I, T>(outcome: Outcome<I, T>): outcome is Success<I, T> {
  return outcome.kind === "success";
}

export function isFailure<I, T>(outcome: Outcome<I, T>): outcome is Failure<I> {
  return outcome.kind === "failure";
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Accumulator over outcomes. `combine` is only ever called from the run's
 * coordinating loop, one outcome at a time, so it needs no locking.
 * `finalize` runs exactly once when the run completes; see foldAggregator()
 * for aggregators whose final value is the accumulator itself.
 */
export interface Aggregator<I, T, A, R = A> {
  zero(): A;
  combine(aggregate: A, outcome: Outcome<I, T>): A | Promise<A>;
  finalize(aggregate: A): R;
}

// ============================================================================
// Execution Context
// ============================================================================

/**
 * Where work units actually run. Passed per run so tests can substitute a
 * deterministic scheduler and runs do not share hidden global state.
 */
export interface ExecutionContext {
  readonly name: string;
  execute<T>(task: () => Promise<T>, signal: AbortSignal): Promise<T>;
}

export type Clock = () => number;

// ============================================================================
// Runs
// ============================================================================

export type RunState = "idle" | "running" | "completed" | "failed";

export interface RunStats {
  admitted: number;
  succeeded: number;
  failed: number;
  /** Outcomes that arrived after the run terminated and were dropped. */
  discarded: number;
  /** Units still in flight when the run terminated. */
  abandoned: number;
  peakInFlight: number;
}

export interface RunProgress {
  state: RunState;
  admitted: number;
  inFlight: number;
  settled: number;
}

export interface CompletedRun<R> {
  status: "completed";
  runId: string;
  aggregate: R;
  elapsedMs: number;
  stats: RunStats;
}

export interface FailedRun {
  status: "failed";
  runId: string;
  cause: Error;
  elapsedMs: number;
  stats: RunStats;
}

export type RunResult<R> = CompletedRun<R> | FailedRun;

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  /** Defaults to retrying every failure except cancellation and timeouts. */
  isRetryable?: (cause: unknown) => boolean;
}

// ============================================================================
// Trajectory Types
// ============================================================================

export interface UnitTrajectoryRecord {
  kind: "unit";
  runId: string;
  index: number;
  status: "success" | "failure" | "discarded";
  attempts: number;
  elapsedMs: number;
  error?: string;
  timestamp: number;
}

export interface RunTrajectoryRecord {
  kind: "run";
  runId: string;
  status: "completed" | "failed";
  concurrencyLimit: number;
  failurePolicy: FailurePolicy;
  executor: string;
  stats: RunStats;
  elapsedMs: number;
  error?: string;
  timestamp: number;
}

export type TrajectoryRecord = UnitTrajectoryRecord | RunTrajectoryRecord;

export interface ITrajectoryLogger {
  append(record: TrajectoryRecord): void;
  flush(): Promise<void>;
  getTrajectoryPath(): string;
  getPendingCount(): number;
}
