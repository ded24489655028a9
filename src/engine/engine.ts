/**
 * ScatterGatherEngine: long-lived owner of configuration, a worker pool,
 * the active-run registry and the trajectory log. Each run() is an
 * independent scatterGather() run with engine defaults filled in.
 */

import { mergeConfig, validateConfig, type EngineConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { EventSink } from "../events.js";
import { TrajectoryLogger } from "../trajectory.js";
import type {
  Aggregator,
  Clock,
  ExecutionContext,
  FailurePolicy,
  ITrajectoryLogger,
  RetryPolicy,
  WorkUnit,
} from "../types.js";
import { createRunId, scatterGather, type RunHandle } from "./orchestrator.js";
import { RunRegistry, type ActiveRunSnapshot } from "./run-registry.js";
import { WorkerPool } from "./worker-pool.js";

export interface EngineDependencies {
  /** Replaces the engine-owned WorkerPool. */
  executor?: ExecutionContext;
  events?: EventSink;
  /** Replaces the TrajectoryLogger built from config.trajectoryDir. */
  trajectory?: ITrajectoryLogger;
  clock?: Clock;
}

/**
 * Per-run overrides of engine config.
 */
export interface RunOverrides {
  concurrencyLimit?: number;
  failurePolicy?: FailurePolicy;
  itemTimeoutMs?: number;
  runTimeoutMs?: number;
  retry?: RetryPolicy;
  executor?: ExecutionContext;
  signal?: AbortSignal;
  runId?: string;
}

export class ScatterGatherEngine {
  readonly config: EngineConfig;
  private executor: ExecutionContext;
  private registry = new RunRegistry();
  private trajectory: ITrajectoryLogger | undefined;
  private events: EventSink | undefined;
  private clock: Clock;

  /**
   * @throws ConfigurationError if the merged config is invalid
   */
  constructor(config: Partial<EngineConfig> = {}, deps: EngineDependencies = {}) {
    this.config = validateConfig(mergeConfig(config));
    this.executor = deps.executor ?? new WorkerPool(this.config.workerPoolSize);
    this.events = deps.events;
    this.clock = deps.clock ?? (() => performance.now());
    this.trajectory =
      deps.trajectory ?? (this.config.trajectoryDir ? new TrajectoryLogger(this.config.trajectoryDir) : undefined);
  }

  /**
   * Start a run. Throws ConfigurationError synchronously on invalid overrides
   * or a runId that is still active; nothing starts in either case.
   */
  run<I, T, A, R>(
    items: Iterable<I>,
    workUnit: WorkUnit<I, T>,
    aggregator: Aggregator<I, T, A, R>,
    overrides: RunOverrides = {},
  ): RunHandle<R> {
    const concurrencyLimit = overrides.concurrencyLimit ?? this.config.concurrencyLimit;
    const failurePolicy = overrides.failurePolicy ?? this.config.failurePolicy;
    const runId = overrides.runId ?? createRunId();
    if (this.registry.has(runId)) {
      throw new ConfigurationError([`runId ${runId} is already active`]);
    }

    const handle = scatterGather({
      items,
      workUnit,
      aggregator,
      concurrencyLimit,
      failurePolicy,
      executor: overrides.executor ?? this.executor,
      itemTimeoutMs: overrides.itemTimeoutMs ?? this.config.itemTimeoutMs,
      runTimeoutMs: overrides.runTimeoutMs ?? this.config.runTimeoutMs,
      retry: overrides.retry ?? this.defaultRetry(),
      signal: overrides.signal,
      clock: this.clock,
      events: this.events,
      trajectory: this.trajectory,
      runId,
    });

    if (handle.state === "running") {
      this.registry.register({
        runId: handle.runId,
        concurrencyLimit,
        failurePolicy,
        startTime: this.clock(),
        progress: () => handle.progress(),
        cancel: (reason) => handle.cancel(reason),
      });
    }
    void handle.result.then(() => this.settle(handle.runId));

    return handle;
  }

  private defaultRetry(): RetryPolicy | undefined {
    if (this.config.maxRetries === 0) {
      return undefined;
    }
    return { maxRetries: this.config.maxRetries, initialDelayMs: this.config.retryDelayMs };
  }

  private async settle(runId: string): Promise<void> {
    this.registry.complete(runId);
    try {
      await this.trajectory?.flush();
    } catch (err) {
      console.warn(`[scatter-gather] Failed to write trajectory for ${runId}:`, err);
    }
  }

  /**
   * Cancel one active run. Returns false if no such run is active.
   */
  cancel(runId: string, reason?: string): boolean {
    return this.registry.abort(runId, reason);
  }

  /**
   * Cancel every active run. Returns how many were signalled.
   */
  cancelAll(reason?: string): number {
    return this.registry.abortAll(reason);
  }

  getActiveRuns(): ActiveRunSnapshot[] {
    return this.registry.getActive();
  }

  getExecutor(): ExecutionContext {
    return this.executor;
  }

  getTrajectoryPath(): string | undefined {
    return this.trajectory?.getTrajectoryPath();
  }

  /**
   * Write out any buffered trajectory records.
   */
  async flush(): Promise<void> {
    await this.trajectory?.flush();
  }
}
