/**
 * RunRegistry: tracks active runs so they can be listed and cancelled
 * from outside, e.g. on shutdown.
 */

import type { FailurePolicy, RunProgress } from "../types.js";

export interface RunEntry {
  runId: string;
  concurrencyLimit: number;
  failurePolicy: FailurePolicy;
  startTime: number;
  progress(): RunProgress;
  cancel(reason?: string): void;
}

export interface ActiveRunSnapshot extends RunProgress {
  runId: string;
  concurrencyLimit: number;
  failurePolicy: FailurePolicy;
  startTime: number;
}

export class RunRegistry {
  private runs = new Map<string, RunEntry>();

  register(entry: RunEntry): void {
    if (this.runs.has(entry.runId)) {
      throw new Error(`Run ${entry.runId} is already registered`);
    }
    this.runs.set(entry.runId, entry);
  }

  /**
   * Remove a run. Returns false if it was not registered.
   */
  complete(runId: string): boolean {
    return this.runs.delete(runId);
  }

  /**
   * Cancel a single run by ID.
   */
  abort(runId: string, reason?: string): boolean {
    const entry = this.runs.get(runId);
    if (!entry) return false;
    entry.cancel(reason);
    return true;
  }

  /**
   * Cancel ALL registered runs. Returns how many were signalled.
   */
  abortAll(reason?: string): number {
    for (const entry of this.runs.values()) {
      entry.cancel(reason);
    }
    return this.runs.size;
  }

  has(runId: string): boolean {
    return this.runs.has(runId);
  }

  getActive(): ActiveRunSnapshot[] {
    return [...this.runs.values()].map((entry) => ({
      runId: entry.runId,
      concurrencyLimit: entry.concurrencyLimit,
      failurePolicy: entry.failurePolicy,
      startTime: entry.startTime,
      ...entry.progress(),
    }));
  }

  /**
   * Get the most recently started run.
   */
  getLatest(): RunEntry | undefined {
    let latest: RunEntry | undefined;
    for (const entry of this.runs.values()) {
      if (!latest || entry.startTime >= latest.startTime) {
        latest = entry;
      }
    }
    return latest;
  }

  get size(): number {
    return this.runs.size;
  }
}
