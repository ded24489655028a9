/**
 * WorkUnit invoker: runs one item's work unit through an execution context
 * and turns whatever happens into exactly one Outcome.
 *
 * The returned promise never rejects. Thrown errors, rejections, timeouts
 * and cancellation all become Failure outcomes; what to do with them is
 * the orchestrator's decision.
 */

import {
  CancelledError,
  ItemTimeoutError,
  WorkUnitFailure,
  describeCause,
  toCancelledError,
} from "../errors.js";
import type { Clock, ExecutionContext, Outcome, RetryPolicy, WorkUnit } from "../types.js";

export interface InvokeOptions {
  executor: ExecutionContext;
  /** Unit-level signal; aborting it abandons the unit. */
  signal: AbortSignal;
  clock: Clock;
  /** Per-attempt deadline. 0 or absent disables it. */
  itemTimeoutMs?: number;
  retry?: RetryPolicy;
  onRetry?: (attempt: number, delayMs: number, cause: Error) => void;
}

/**
 * Default retry predicate: everything except cancellation and timeouts.
 */
export function isRetryableByDefault(cause: unknown): boolean {
  return !(cause instanceof CancelledError) && !(cause instanceof ItemTimeoutError);
}

/**
 * Backoff before the next attempt, or undefined when no retry is due.
 * Delay doubles per attempt, starting at initialDelayMs.
 */
export function nextRetryDelay(
  retry: RetryPolicy | undefined,
  attempt: number,
  cause: Error,
): number | undefined {
  if (!retry || attempt > retry.maxRetries) {
    return undefined;
  }
  const isRetryable = retry.isRetryable ?? isRetryableByDefault;
  if (!isRetryable(cause)) {
    return undefined;
  }
  return retry.initialDelayMs * 2 ** (attempt - 1);
}

function toError(index: number, err: unknown): Error {
  return err instanceof Error ? err : new WorkUnitFailure(index, err);
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(toCancelledError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(toCancelledError(signal.reason));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Whether an attempt's task is still executing on the execution context.
 * Attempts run one after another, so there is at most one such task.
 */
interface TaskTracker {
  executing: boolean;
  settled: Promise<void>;
}

/**
 * One attempt. Settles as soon as the unit settles, its deadline passes,
 * or the unit signal aborts, whichever comes first. A unit that ignores
 * its signal keeps running and stays visible through the tracker, but its
 * eventual result is dropped here.
 */
async function runAttempt<I, T>(
  workUnit: WorkUnit<I, T>,
  item: I,
  index: number,
  attempt: number,
  options: InvokeOptions,
  tracker: TaskTracker,
): Promise<T> {
  const { signal } = options;
  if (signal.aborted) {
    throw toCancelledError(signal.reason);
  }

  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal.reason);
  signal.addEventListener("abort", forwardAbort, { once: true });

  const timeoutMs = options.itemTimeoutMs ?? 0;
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await new Promise<T>((resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => {
          const reason: unknown = controller.signal.reason;
          reject(reason instanceof ItemTimeoutError ? reason : toCancelledError(reason));
        },
        { once: true },
      );

      if (timeoutMs > 0) {
        timer = setTimeout(() => controller.abort(new ItemTimeoutError(index, timeoutMs)), timeoutMs);
      }

      const task = options.executor.execute(
        async () => workUnit(item, { index, attempt, signal: controller.signal }),
        controller.signal,
      );
      // Registered before resolve/reject, so the flag is clear by the time the outcome is seen
      tracker.executing = true;
      tracker.settled = task.then(
        () => {
          tracker.executing = false;
        },
        () => {
          tracker.executing = false;
        },
      );
      task.then(resolve, reject);
    });
  } finally {
    clearTimeout(timer);
    signal.removeEventListener("abort", forwardAbort);
  }
}

/**
 * Resolves once `settled` does; rejects with CancelledError if the signal
 * aborts first.
 */
function settledOrAborted(settled: Promise<void>, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.reject(toCancelledError(signal.reason));
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(toCancelledError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    void settled.then(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    });
  });
}

/**
 * A started work unit.
 */
export interface Invocation<I, T> {
  /** Resolves with exactly one Outcome; never rejects. */
  readonly outcome: Promise<Outcome<I, T>>;
  /** True while an attempt's task is still executing, e.g. after a timeout it ignored. */
  readonly executing: boolean;
  /** Resolves once no attempt of this unit is executing. */
  readonly released: Promise<void>;
}

/**
 * Start a work unit. The outcome may be known (timeout, cancellation)
 * while the unit is still executing; `released` tells when it has stopped.
 */
export function startWorkUnit<I, T>(
  workUnit: WorkUnit<I, T>,
  item: I,
  index: number,
  options: InvokeOptions,
): Invocation<I, T> {
  const tracker: TaskTracker = { executing: false, settled: Promise.resolve() };
  const outcome = attemptUntilDone(workUnit, item, index, options, tracker);
  return {
    outcome,
    get executing() {
      return tracker.executing;
    },
    get released() {
      return tracker.settled;
    },
  };
}

export async function invokeWorkUnit<I, T>(
  workUnit: WorkUnit<I, T>,
  item: I,
  index: number,
  options: InvokeOptions,
): Promise<Outcome<I, T>> {
  return startWorkUnit(workUnit, item, index, options).outcome;
}

async function attemptUntilDone<I, T>(
  workUnit: WorkUnit<I, T>,
  item: I,
  index: number,
  options: InvokeOptions,
  tracker: TaskTracker,
): Promise<Outcome<I, T>> {
  const startedAt = options.clock();
  let attempt = 0;

  for (;;) {
    attempt++;
    let cause: Error;
    try {
      const value = await runAttempt(workUnit, item, index, attempt, options, tracker);
      return { kind: "success", index, item, value, attempts: attempt, elapsedMs: options.clock() - startedAt };
    } catch (err) {
      cause = toError(index, err);
    }

    const delayMs = options.signal.aborted ? undefined : nextRetryDelay(options.retry, attempt, cause);
    if (delayMs === undefined) {
      return { kind: "failure", index, item, cause, attempts: attempt, elapsedMs: options.clock() - startedAt };
    }

    try {
      options.onRetry?.(attempt, delayMs, cause);
    } catch (err) {
      console.error(`[scatter-gather] onRetry hook failed for item #${index}: ${describeCause(err)}`);
    }

    try {
      await sleep(delayMs, options.signal);
      // Never overlap two attempts of the same item
      await settledOrAborted(tracker.settled, options.signal);
    } catch (err) {
      return {
        kind: "failure",
        index,
        item,
        cause: toError(index, err),
        attempts: attempt,
        elapsedMs: options.clock() - startedAt,
      };
    }
  }
}
