/**
 * Unit tests for WorkerPool and inlineExecutor.
 */

import { describe, it, expect, vi } from "vitest";
import { WorkerPool, inlineExecutor } from "../../src/engine/worker-pool.js";
import { CancelledError, ConfigurationError } from "../../src/errors.js";
import { ConcurrencyProbe, range, sleep, tick } from "../helpers/work-units.js";

describe("WorkerPool", () => {
  it("should run a task and resolve with its value", async () => {
    const pool = new WorkerPool(2);
    await expect(pool.execute(async () => 42, new AbortController().signal)).resolves.toBe(42);
  });

  it("should never run more tasks than its size", async () => {
    const pool = new WorkerPool(3);
    const probe = new ConcurrencyProbe();
    const signal = new AbortController().signal;

    const results = await Promise.all(
      range(10).map((i) => pool.execute(() => probe.around(() => sleep(5).then(() => i)), signal)),
    );

    expect(results).toEqual(range(10));
    expect(probe.max).toBe(3);
    expect(pool.getStats()).toMatchObject({ size: 3, busy: 0, queued: 0, peakBusy: 3, completed: 10 });
  });

  it("should start tasks off the caller's stack", async () => {
    const pool = new WorkerPool(1);
    const task = vi.fn(async () => "done");

    const pending = pool.execute(task, new AbortController().signal);
    expect(task).not.toHaveBeenCalled();

    await pending;
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("should queue tasks FIFO once full", async () => {
    const pool = new WorkerPool(1);
    const order: number[] = [];
    const signal = new AbortController().signal;

    await Promise.all(
      [1, 2, 3].map((n) =>
        pool.execute(async () => {
          order.push(n);
        }, signal),
      ),
    );

    expect(order).toEqual([1, 2, 3]);
  });

  it("should release the slot when a task throws", async () => {
    const pool = new WorkerPool(1);
    const signal = new AbortController().signal;

    await expect(
      pool.execute(async () => {
        throw new Error("task failed");
      }, signal),
    ).rejects.toThrow("task failed");
    await expect(pool.execute(async () => "next", signal)).resolves.toBe("next");
    expect(pool.getStats().busy).toBe(0);
  });

  it("should drop a queued task whose signal aborts", async () => {
    const pool = new WorkerPool(1);
    const blocker = pool.execute(() => sleep(20), new AbortController().signal);
    const controller = new AbortController();
    const queuedTask = vi.fn(async () => "never");

    const queued = pool.execute(queuedTask, controller.signal);
    expect(pool.getStats().queued).toBe(1);

    controller.abort();
    await expect(queued).rejects.toBeInstanceOf(CancelledError);
    expect(pool.getStats().queued).toBe(0);

    await blocker;
    await tick();
    expect(queuedTask).not.toHaveBeenCalled();
  });

  it("should reject immediately when the signal is already aborted", async () => {
    const pool = new WorkerPool(1);
    const controller = new AbortController();
    controller.abort(new CancelledError("already gone"));

    await expect(pool.execute(async () => 1, controller.signal)).rejects.toThrow("already gone");
  });

  it("should start queued work when resized upward", async () => {
    const pool = new WorkerPool(1);
    const signal = new AbortController().signal;
    const first = pool.execute(() => sleep(20), signal);
    const second = pool.execute(async () => "second", signal);

    pool.resize(2);
    expect(pool.getStats()).toMatchObject({ size: 2, busy: 2, queued: 0 });

    await expect(second).resolves.toBe("second");
    await first;
  });

  it.each([0, -2, 1.5])("should reject size %s", (size) => {
    expect(() => new WorkerPool(size)).toThrow(ConfigurationError);
  });

  it("should name itself after its size", () => {
    expect(new WorkerPool(4).name).toBe("worker-pool(4)");
    expect(new WorkerPool(4, "io").name).toBe("io");
  });
});

describe("inlineExecutor", () => {
  it("should defer the task to a microtask", async () => {
    const task = vi.fn(async () => 7);
    const pending = inlineExecutor.execute(task, new AbortController().signal);

    expect(task).not.toHaveBeenCalled();
    await expect(pending).resolves.toBe(7);
  });

  it("should start the task before any macrotask runs", async () => {
    const order: string[] = [];
    const immediate = new Promise<void>((resolve) =>
      setImmediate(() => {
        order.push("immediate");
        resolve();
      }),
    );

    await inlineExecutor.execute(async () => {
      order.push("task");
    }, new AbortController().signal);
    await immediate;

    expect(order).toEqual(["task", "immediate"]);
  });

  it("should reject when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(inlineExecutor.execute(async () => 1, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
