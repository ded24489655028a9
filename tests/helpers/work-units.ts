/**
 * Test helpers: latency-simulating work units, a step-by-step executor and
 * an event recorder.
 */

import type { EngineEventName, EventSink } from "../../src/events.js";
import type { ExecutionContext } from "../../src/types.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/**
 * Yield to the event loop so pending promise chains and immediates settle.
 */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Sleep that ends early (rejecting) when the signal aborts.
 */
export function cooperativeSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new Error("aborted"));
      },
      { once: true },
    );
  });
}

/**
 * Tracks how many work units are executing at once.
 */
export class ConcurrencyProbe {
  current = 0;
  max = 0;

  async around<T>(fn: () => Promise<T>): Promise<T> {
    this.current++;
    this.max = Math.max(this.max, this.current);
    try {
      return await fn();
    } finally {
      this.current--;
    }
  }
}

interface ManualTask {
  run(): void;
  signal: AbortSignal;
}

/**
 * Execution context that only runs tasks when the test says so.
 */
export class ManualExecutor implements ExecutionContext {
  readonly name = "manual";
  private pending: ManualTask[] = [];

  execute<T>(task: () => Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        run: () => {
          task().then(resolve, reject);
        },
        signal,
      });
    });
  }

  get queued(): number {
    return this.pending.length;
  }

  /**
   * Run the task at `position` in the queue (FIFO order) and let the
   * run's coordinator react.
   */
  async runAt(position: number): Promise<void> {
    const [task] = this.pending.splice(position, 1);
    if (!task) {
      throw new Error(`No task at position ${position}`);
    }
    task.run();
    await tick();
  }

  async runAll(): Promise<void> {
    while (this.pending.length > 0) {
      await this.runAt(0);
    }
  }

  signals(): AbortSignal[] {
    return this.pending.map((task) => task.signal);
  }
}

/**
 * EventSink that keeps every emitted event.
 */
export class RecordingSink implements EventSink {
  events: Array<{ name: string; data: unknown }> = [];

  emit(eventName: string, data: unknown): boolean {
    this.events.push({ name: eventName, data });
    return true;
  }

  named(name: EngineEventName): unknown[] {
    return this.events.filter((event) => event.name === name).map((event) => event.data);
  }

  /**
   * A numeric field from every event with the given name, in emit order.
   */
  numbers(name: EngineEventName, field: string): number[] {
    return this.named(name).flatMap((data) => {
      if (typeof data === "object" && data !== null && field in data) {
        const value: unknown = Reflect.get(data, field);
        return typeof value === "number" ? [value] : [];
      }
      return [];
    });
  }
}
