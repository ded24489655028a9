/**
 * Unit tests for event helpers.
 */

import { EventEmitter } from "node:events";
import { describe, it, expect, vi, afterEach } from "vitest";
import { emitEvent, safeHandler } from "../../src/events.js";

describe("safeHandler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should pass arguments through and return the result", async () => {
    const handler = safeHandler("sum", (a: number, b: number) => a + b);
    await expect(handler(2, 3)).resolves.toBe(5);
  });

  it("should log and swallow listener errors", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const handler = safeHandler("unit:start", async () => {
      throw new Error("listener broke");
    });

    await expect(handler()).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[0]).toBe("[scatter-gather] unit:start handler error:");
  });
});

describe("emitEvent", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should be a no-op without a sink", () => {
    expect(() => emitEvent(undefined, "unit:discarded", { runId: "r", index: 0, success: true })).not.toThrow();
  });

  it("should deliver typed payloads to an EventEmitter", () => {
    const emitter = new EventEmitter();
    const received: unknown[] = [];
    emitter.on("unit:start", (data: unknown) => received.push(data));

    emitEvent(emitter, "unit:start", { runId: "run-1", index: 4, inFlight: 2 });

    expect(received).toEqual([{ runId: "run-1", index: 4, inFlight: 2 }]);
  });

  it("should log when a synchronous listener throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const emitter = new EventEmitter();
    emitter.on("run:start", () => {
      throw new Error("bad listener");
    });

    expect(() =>
      emitEvent(emitter, "run:start", {
        runId: "run-1",
        concurrencyLimit: 2,
        failurePolicy: "fail-soft",
        executor: "inline",
      }),
    ).not.toThrow();
    expect(errorSpy.mock.calls[0]?.[0]).toBe('[scatter-gather] Failed to emit event "run:start":');
  });
});
