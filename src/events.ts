/**
 * Event handling utilities for the scatter-gather engine.
 *
 * Provides:
 * 1. safeHandler() wrapper for event listeners
 * 2. Typed emission helpers for engine instrumentation events
 *
 * Listener errors are caught and logged so instrumentation can never
 * change the outcome of a run.
 */

import type { FailurePolicy, RunStats } from "./types.js";

/**
 * Wrap a listener so that exceptions are logged instead of thrown.
 *
 * @example
 * ```typescript
 * emitter.on("unit:start", safeHandler("unit:start", (event) => track(event)));
 * ```
 */
export function safeHandler<A extends unknown[], T>(
  name: string,
  fn: (...args: A) => Promise<T> | T,
): (...args: A) => Promise<T | undefined> {
  return async (...args: A): Promise<T | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      console.error(`[scatter-gather] ${name} handler error:`, err);
      return undefined;
    }
  };
}

/**
 * Instrumentation events:
 * - run:start / run:end — run lifecycle
 * - unit:start — an item was admitted; `inFlight` includes it
 * - unit:end — an outcome was accounted for by the coordinator
 * - unit:retry — a retryable failure is about to be retried
 * - unit:discarded — an outcome arrived after the run terminated
 */
export interface EngineEventMap {
  "run:start": {
    runId: string;
    concurrencyLimit: number;
    failurePolicy: FailurePolicy;
    executor: string;
  };
  "run:end": {
    runId: string;
    status: "completed" | "failed";
    elapsedMs: number;
    stats: RunStats;
    error?: string;
  };
  "unit:start": {
    runId: string;
    index: number;
    inFlight: number;
  };
  "unit:end": {
    runId: string;
    index: number;
    success: boolean;
    inFlight: number;
    elapsedMs: number;
    error?: string;
  };
  "unit:retry": {
    runId: string;
    index: number;
    attempt: number;
    delayMs: number;
    error: string;
  };
  "unit:discarded": {
    runId: string;
    index: number;
    success: boolean;
  };
}

export type EngineEventName = keyof EngineEventMap;

/**
 * Anything with an `emit` method; a Node EventEmitter qualifies.
 */
export interface EventSink {
  emit(eventName: string, data: unknown): unknown;
}

/**
 * Emit an engine event. A missing sink is a no-op.
 */
export function emitEvent<K extends EngineEventName>(
  sink: EventSink | undefined,
  eventName: K,
  data: EngineEventMap[K],
): void {
  if (!sink) {
    return;
  }

  try {
    sink.emit(eventName, data);
  } catch (err) {
    console.error(`[scatter-gather] Failed to emit event "${eventName}":`, err);
  }
}
