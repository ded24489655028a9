/**
 * Elapsed-time behaviour of runs under fake timers: a run of N items with
 * per-item latency L takes ceil(N / min(K, P, N)) * L.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { countAggregator } from "../../src/engine/aggregator.js";
import { estimateElapsed } from "../../src/engine/estimate.js";
import { scatterGather } from "../../src/engine/orchestrator.js";
import { WorkerPool, inlineExecutor } from "../../src/engine/worker-pool.js";
import type { ExecutionContext } from "../../src/types.js";
import { range, sleep } from "../helpers/work-units.js";

async function timedRun(
  concurrencyLimit: number,
  latencyMs: number,
  executor: ExecutionContext = inlineExecutor,
): Promise<number> {
  const handle = scatterGather({
    items: range(8),
    concurrencyLimit,
    failurePolicy: "fail-fast",
    workUnit: async (x: number) => {
      await sleep(latencyMs);
      return x;
    },
    aggregator: countAggregator<number, number>(),
    executor,
    clock: () => Date.now(),
  });

  await vi.runAllTimersAsync();
  const result = await handle.result;
  expect(result.status).toBe("completed");
  return result.elapsedMs;
}

describe("run timing", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should shrink elapsed time as the limit grows, then plateau at N", async () => {
    const elapsed: number[] = [];
    for (const limit of [1, 2, 4, 8, 16]) {
      elapsed.push(await timedRun(limit, 100));
    }

    expect(elapsed).toEqual([800, 400, 200, 100, 100]);
  });

  it("should match the latency estimate", async () => {
    for (const limit of [1, 3, 8]) {
      expect(await timedRun(limit, 50)).toBe(estimateElapsed({ items: 8, concurrencyLimit: limit, latencyMs: 50 }));
    }
  });

  it("should plateau at the worker pool size", async () => {
    const elapsed: number[] = [];
    for (const limit of [2, 4, 8]) {
      elapsed.push(await timedRun(limit, 100, new WorkerPool(2)));
    }

    expect(elapsed).toEqual([400, 400, 400]);
  });

  it("should scale with per-item latency at a fixed limit", async () => {
    const fast = await timedRun(2, 50);
    const slow = await timedRun(2, 100);

    expect(fast).toBe(200);
    expect(slow).toBe(400);
  });
});
