/**
 * Latency estimates and run summaries.
 *
 * With a fixed per-item latency L, a run of N items admitted K at a time
 * onto a pool of P workers takes ceil(N / min(K, P, N)) rounds of L.
 * Raising K past min(P, N) buys nothing.
 */

import type { RunResult } from "../types.js";

export interface LatencyEstimateInput {
  items: number;
  concurrencyLimit: number;
  /** Omit for an unbounded execution context. */
  workerPoolSize?: number;
  latencyMs: number;
}

/**
 * Number of units that can actually execute at once.
 */
export function effectiveParallelism(input: Omit<LatencyEstimateInput, "latencyMs">): number {
  if (input.items <= 0) {
    return 0;
  }
  return Math.min(input.concurrencyLimit, input.workerPoolSize ?? Infinity, input.items);
}

export function estimateElapsed(input: LatencyEstimateInput): number {
  const parallelism = effectiveParallelism(input);
  if (parallelism === 0) {
    return 0;
  }
  return Math.ceil(input.items / parallelism) * input.latencyMs;
}

/**
 * One-line human summary of a finished run.
 */
export function formatRunSummary(result: RunResult<unknown>): string {
  const { stats } = result;
  const elapsed = `${Math.round(result.elapsedMs)}ms`;
  const counts = [
    `${stats.admitted} admitted`,
    `${stats.succeeded} succeeded`,
    `${stats.failed} failed`,
    `peak ${stats.peakInFlight} in flight`,
  ];

  if (result.status === "completed") {
    return `${result.runId} completed in ${elapsed}: ${counts.join(", ")}`;
  }

  if (stats.abandoned > 0) counts.push(`${stats.abandoned} abandoned`);
  if (stats.discarded > 0) counts.push(`${stats.discarded} discarded`);
  return `${result.runId} failed in ${elapsed} (${result.cause.message}): ${counts.join(", ")}`;
}
