/**
 * Execution contexts: where admitted work units actually run.
 *
 * The dispatcher's concurrencyLimit bounds how many units are admitted;
 * a WorkerPool's size bounds how many of those execute at once. When the
 * pool is smaller than the limit, admitted units queue here.
 */

import { ConfigurationError, toCancelledError } from "../errors.js";
import type { ExecutionContext } from "../types.js";

interface QueuedTask {
  start(): void;
}

export interface WorkerPoolStats {
  size: number;
  busy: number;
  queued: number;
  peakBusy: number;
  completed: number;
}

async function runTask<T>(task: () => Promise<T>): Promise<T> {
  return await task();
}

/**
 * Fixed-size pool of execution slots with a FIFO wait queue.
 * Each task starts on a fresh macrotask (setImmediate), never on the
 * caller's stack.
 */
export class WorkerPool implements ExecutionContext {
  readonly name: string;
  private size: number;
  private busy = 0;
  private peakBusy = 0;
  private completed = 0;
  private queue: QueuedTask[] = [];

  constructor(size: number = 16, name?: string) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new ConfigurationError([`workerPoolSize must be a positive integer, got ${size}`]);
    }
    this.size = size;
    this.name = name ?? `worker-pool(${size})`;
  }

  execute<T>(task: () => Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(toCancelledError(signal.reason));
    }

    return new Promise<T>((resolve, reject) => {
      const entry: QueuedTask = {
        start: () => {
          signal.removeEventListener("abort", onAbort);
          setImmediate(() => {
            void runTask(task)
              .then(resolve, reject)
              .finally(() => this.release());
          });
        },
      };

      // A queued task whose signal aborts leaves the queue without using a slot
      const onAbort = () => {
        const position = this.queue.indexOf(entry);
        if (position >= 0) {
          this.queue.splice(position, 1);
          reject(toCancelledError(signal.reason));
        }
      };

      signal.addEventListener("abort", onAbort, { once: true });
      this.queue.push(entry);
      this.drain();
    });
  }

  private drain(): void {
    while (this.busy < this.size && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      this.busy++;
      this.peakBusy = Math.max(this.peakBusy, this.busy);
      next.start();
    }
  }

  private release(): void {
    this.busy--;
    this.completed++;
    this.drain();
  }

  getStats(): WorkerPoolStats {
    return {
      size: this.size,
      busy: this.busy,
      queued: this.queue.length,
      peakBusy: this.peakBusy,
      completed: this.completed,
    };
  }

  /**
   * Resize the pool. Growing starts queued tasks immediately; shrinking
   * lets running tasks finish.
   */
  resize(size: number): void {
    if (!Number.isInteger(size) || size <= 0) {
      throw new ConfigurationError([`workerPoolSize must be a positive integer, got ${size}`]);
    }
    this.size = size;
    this.drain();
  }
}

/**
 * Unbounded execution context: every task starts on the next microtask.
 * Suits work units that only await I/O and never block.
 */
export const inlineExecutor: ExecutionContext = {
  name: "inline",
  execute<T>(task: () => Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(toCancelledError(signal.reason));
    }
    return Promise.resolve().then(task);
  },
};
