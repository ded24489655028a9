/**
 * Scatter-gather orchestrator: one run of the pipeline.
 *
 * A run owns its dispatcher, outcome channel and aggregate. Completions
 * and abort requests are messages on the channel, consumed by a single
 * coordinating loop that settles, admits and folds in turn. The loop is
 * the only code that changes run state, so the terminal transition
 * happens exactly once.
 *
 *   idle ──start──▶ running ──all outcomes folded──▶ completed
 *                      │
 *                      └──fail-fast failure / aggregation error / abort──▶ failed
 */

import { randomBytes } from "node:crypto";
import { emitEvent, type EventSink } from "../events.js";
import {
  CancelledError,
  ConfigurationError,
  RunFailure,
  RunTimeoutError,
  describeCause,
  toCancelledError,
} from "../errors.js";
import { isFailure, isSuccess } from "../types.js";
import type {
  Aggregator,
  Clock,
  CompletedRun,
  ExecutionContext,
  FailedRun,
  FailurePolicy,
  ITrajectoryLogger,
  Outcome,
  RetryPolicy,
  RunProgress,
  RunResult,
  RunState,
  RunStats,
  WorkUnit,
} from "../types.js";
import { ResultAggregator } from "./aggregator.js";
import { OutcomeChannel } from "./channel.js";
import { BoundedDispatcher } from "./dispatcher.js";
import { startWorkUnit } from "./invoker.js";
import { inlineExecutor } from "./worker-pool.js";

export interface ScatterGatherOptions<I, T, A, R> {
  items: Iterable<I>;
  concurrencyLimit: number;
  workUnit: WorkUnit<I, T>;
  aggregator: Aggregator<I, T, A, R>;
  failurePolicy: FailurePolicy;
  /** Where work units run. Defaults to inlineExecutor. */
  executor?: ExecutionContext;
  itemTimeoutMs?: number;
  runTimeoutMs?: number;
  retry?: RetryPolicy;
  /** Aborting this signal fails the run with CancelledError. */
  signal?: AbortSignal;
  /** Monotonic milliseconds. Defaults to performance.now(). */
  clock?: Clock;
  events?: EventSink;
  trajectory?: ITrajectoryLogger;
  runId?: string;
}

export interface RunHandle<R> {
  readonly runId: string;
  readonly state: RunState;
  /** Settles once with the terminal result; never rejects. */
  readonly result: Promise<RunResult<R>>;
  progress(): RunProgress;
  /** Request cancellation. No effect once the run is terminal. */
  cancel(reason?: string): void;
  /** The aggregate, or a rejection with the failure cause. */
  unwrap(): Promise<R>;
}

/**
 * `executing` marks an outcome reported while its unit still runs; its
 * credit comes back later with a `released` message.
 */
type RunMessage<I, T> =
  | { kind: "outcome"; outcome: Outcome<I, T>; executing: boolean }
  | { kind: "released"; index: number }
  | { kind: "abort"; cause: Error };

export function createRunId(): string {
  return "run-" + randomBytes(4).toString("hex");
}

function nonNegative(name: string, value: number | undefined, violations: string[]): void {
  if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
    violations.push(`${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * Check run options up front; nothing has started if this throws.
 */
export function validateRunOptions<I, T, A, R>(options: ScatterGatherOptions<I, T, A, R>): void {
  const violations: string[] = [];
  const { concurrencyLimit, failurePolicy, retry } = options;

  if (!Number.isInteger(concurrencyLimit) || concurrencyLimit <= 0) {
    violations.push(`concurrencyLimit must be a positive integer, got ${concurrencyLimit}`);
  }
  if (failurePolicy !== "fail-fast" && failurePolicy !== "fail-soft") {
    violations.push(`failurePolicy must be "fail-fast" or "fail-soft", got ${String(failurePolicy)}`);
  }
  if (typeof options.workUnit !== "function") {
    violations.push("workUnit must be a function");
  }
  nonNegative("itemTimeoutMs", options.itemTimeoutMs, violations);
  nonNegative("runTimeoutMs", options.runTimeoutMs, violations);
  if (retry) {
    if (!Number.isInteger(retry.maxRetries) || retry.maxRetries < 0) {
      violations.push(`retry.maxRetries must be a non-negative integer, got ${retry.maxRetries}`);
    }
    nonNegative("retry.initialDelayMs", retry.initialDelayMs, violations);
  }

  if (violations.length > 0) {
    throw new ConfigurationError(violations);
  }
}

/**
 * Start a run. Throws ConfigurationError synchronously on invalid options;
 * otherwise returns immediately with a handle to the running run.
 */
export function scatterGather<I, T, A, R>(options: ScatterGatherOptions<I, T, A, R>): RunHandle<R> {
  validateRunOptions(options);
  return new ScatterGatherRun(options);
}

class ScatterGatherRun<I, T, A, R> implements RunHandle<R> {
  readonly runId: string;
  readonly result: Promise<RunResult<R>>;

  private currentState: RunState = "idle";
  private readonly clock: Clock;
  private readonly executor: ExecutionContext;
  private readonly channel = new OutcomeChannel<RunMessage<I, T>>();
  private readonly dispatcher: BoundedDispatcher<I>;
  private readonly startedAt: number;
  private succeeded = 0;
  private failed = 0;
  private discarded = 0;
  private runTimer: ReturnType<typeof setTimeout> | undefined;

  constructor(private readonly options: ScatterGatherOptions<I, T, A, R>) {
    this.runId = options.runId ?? createRunId();
    this.clock = options.clock ?? (() => performance.now());
    this.executor = options.executor ?? inlineExecutor;
    this.dispatcher = new BoundedDispatcher(options.items, options.concurrencyLimit, (item, index, signal) =>
      this.launch(item, index, signal),
    );
    this.startedAt = this.clock();
    this.result = this.coordinate();
  }

  get state(): RunState {
    return this.currentState;
  }

  progress(): RunProgress {
    return {
      state: this.currentState,
      admitted: this.dispatcher.admittedCount,
      inFlight: this.dispatcher.inFlightCount,
      settled: this.dispatcher.settled,
    };
  }

  cancel(reason?: string): void {
    this.abort(new CancelledError(reason ?? `Run ${this.runId} cancelled`));
  }

  async unwrap(): Promise<R> {
    const result = await this.result;
    if (result.status === "completed") {
      return result.aggregate;
    }
    throw result.cause;
  }

  // --------------------------------------------------------------------------
  // Coordinating loop
  // --------------------------------------------------------------------------

  private async coordinate(): Promise<RunResult<R>> {
    this.currentState = "running";
    emitEvent(this.options.events, "run:start", {
      runId: this.runId,
      concurrencyLimit: this.options.concurrencyLimit,
      failurePolicy: this.options.failurePolicy,
      executor: this.executor.name,
    });

    try {
      const { signal } = this.options;
      if (signal?.aborted) {
        return this.fail(toCancelledError(signal.reason));
      }
      this.armAbortSources();

      const aggregator = new ResultAggregator(this.options.aggregator);
      this.dispatcher.fill();

      while (!this.dispatcher.done) {
        const message = await this.channel.take();
        if (message.kind === "abort") {
          return this.fail(message.cause);
        }
        if (message.kind === "released") {
          this.dispatcher.settle(message.index);
          this.dispatcher.fill();
          continue;
        }

        const { outcome, executing } = message;
        if (!executing) {
          this.dispatcher.settle(outcome.index);
        }
        this.account(outcome);

        if (isFailure(outcome) && this.options.failurePolicy === "fail-fast") {
          return this.fail(new RunFailure(outcome.index, outcome.cause));
        }

        // Spend the freed credit before folding, so a slow combine never delays admission
        if (!executing) {
          this.dispatcher.fill();
        }
        await aggregator.fold(outcome);
      }

      return this.complete(aggregator.finalize());
    } catch (err) {
      return this.fail(err instanceof Error ? err : new Error(String(err)));
    }
  }

  private launch(item: I, index: number, signal: AbortSignal): void {
    emitEvent(this.options.events, "unit:start", {
      runId: this.runId,
      index,
      inFlight: this.dispatcher.inFlightCount,
    });

    const invocation = startWorkUnit(this.options.workUnit, item, index, {
      executor: this.executor,
      signal,
      clock: this.clock,
      itemTimeoutMs: this.options.itemTimeoutMs,
      retry: this.options.retry,
      onRetry: (attempt, delayMs, cause) =>
        emitEvent(this.options.events, "unit:retry", {
          runId: this.runId,
          index,
          attempt,
          delayMs,
          error: cause.message,
        }),
    });

    invocation.outcome
      .then(async (outcome) => {
        const { executing } = invocation;
        this.deliver(outcome, executing);
        if (executing) {
          await invocation.released;
          this.channel.post({ kind: "released", index });
        }
      })
      .catch((err: unknown) => {
        console.error(`[scatter-gather] ${this.runId}: failed to deliver outcome for item #${index}:`, err);
      });
  }

  private deliver(outcome: Outcome<I, T>, executing: boolean): void {
    if (!this.channel.post({ kind: "outcome", outcome, executing })) {
      this.discard(outcome);
    }
  }

  private abort(cause: Error): void {
    this.channel.post({ kind: "abort", cause });
  }

  private armAbortSources(): void {
    const { signal, runTimeoutMs } = this.options;
    signal?.addEventListener("abort", this.onExternalAbort, { once: true });
    if (runTimeoutMs !== undefined && runTimeoutMs > 0) {
      this.runTimer = setTimeout(() => this.abort(new RunTimeoutError(runTimeoutMs)), runTimeoutMs);
    }
  }

  private onExternalAbort = (): void => {
    this.abort(toCancelledError(this.options.signal?.reason));
  };

  // --------------------------------------------------------------------------
  // Accounting
  // --------------------------------------------------------------------------

  private account(outcome: Outcome<I, T>): void {
    const success = isSuccess(outcome);
    if (success) {
      this.succeeded++;
    } else {
      this.failed++;
    }

    const error = isFailure(outcome) ? outcome.cause.message : undefined;
    emitEvent(this.options.events, "unit:end", {
      runId: this.runId,
      index: outcome.index,
      success,
      inFlight: this.dispatcher.inFlightCount,
      elapsedMs: outcome.elapsedMs,
      error,
    });
    this.options.trajectory?.append({
      kind: "unit",
      runId: this.runId,
      index: outcome.index,
      status: outcome.kind,
      attempts: outcome.attempts,
      elapsedMs: outcome.elapsedMs,
      error,
      timestamp: Date.now(),
    });
  }

  /**
   * Drop an outcome that can no longer affect the run.
   */
  private discard(outcome: Outcome<I, T>): void {
    this.discarded++;
    console.warn(
      `[scatter-gather] ${this.runId}: discarded ${outcome.kind} for item #${outcome.index} after run ${this.currentState}`,
    );
    emitEvent(this.options.events, "unit:discarded", {
      runId: this.runId,
      index: outcome.index,
      success: isSuccess(outcome),
    });
    this.options.trajectory?.append({
      kind: "unit",
      runId: this.runId,
      index: outcome.index,
      status: "discarded",
      attempts: outcome.attempts,
      elapsedMs: outcome.elapsedMs,
      error: isFailure(outcome) ? outcome.cause.message : undefined,
      timestamp: Date.now(),
    });
  }

  // --------------------------------------------------------------------------
  // Terminal transitions
  // --------------------------------------------------------------------------

  private complete(aggregate: R): CompletedRun<R> {
    const elapsedMs = this.clock() - this.startedAt;
    this.currentState = "completed";
    this.shutdown(new CancelledError(`Run ${this.runId} completed`));

    const result: CompletedRun<R> = {
      status: "completed",
      runId: this.runId,
      aggregate,
      elapsedMs,
      stats: this.snapshot(0),
    };
    this.report(result);
    return result;
  }

  private fail(cause: Error): FailedRun {
    const elapsedMs = this.clock() - this.startedAt;
    this.currentState = "failed";
    const abandoned = this.shutdown(new CancelledError(`Run ${this.runId} failed: ${describeCause(cause)}`));

    const result: FailedRun = {
      status: "failed",
      runId: this.runId,
      cause,
      elapsedMs,
      stats: this.snapshot(abandoned),
    };
    this.report(result);
    return result;
  }

  /**
   * Close the channel, drop whatever it still holds and cancel in-flight
   * units. Returns the number of units left running.
   */
  private shutdown(reason: CancelledError): number {
    clearTimeout(this.runTimer);
    this.options.signal?.removeEventListener("abort", this.onExternalAbort);

    for (const message of this.channel.close()) {
      if (message.kind === "released") {
        this.dispatcher.settle(message.index);
      } else if (message.kind === "outcome") {
        if (!message.executing) {
          this.dispatcher.settle(message.outcome.index);
        }
        this.discard(message.outcome);
      }
    }

    return this.dispatcher.cancelAll(reason);
  }

  private snapshot(abandoned: number): RunStats {
    return {
      admitted: this.dispatcher.admittedCount,
      succeeded: this.succeeded,
      failed: this.failed,
      discarded: this.discarded,
      abandoned,
      peakInFlight: this.dispatcher.peak,
    };
  }

  private report(result: RunResult<R>): void {
    const error = result.status === "failed" ? result.cause.message : undefined;
    emitEvent(this.options.events, "run:end", {
      runId: this.runId,
      status: result.status,
      elapsedMs: result.elapsedMs,
      stats: result.stats,
      error,
    });
    this.options.trajectory?.append({
      kind: "run",
      runId: this.runId,
      status: result.status,
      concurrencyLimit: this.options.concurrencyLimit,
      failurePolicy: this.options.failurePolicy,
      executor: this.executor.name,
      stats: result.stats,
      elapsedMs: result.elapsedMs,
      error,
      timestamp: Date.now(),
    });
  }
}
