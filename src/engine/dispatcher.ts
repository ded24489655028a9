/**
 * BoundedDispatcher: admits input items in sequence order while keeping
 * the in-flight set at or below the concurrency limit.
 *
 * Admission is credit-based. Every settle() returns one credit, and the
 * next fill() spends it on the next pending item straight away; there is
 * no batching into rounds of `limit` items.
 */

import { assertConcurrencyLimit } from "../config.js";

export type LaunchFn<I> = (item: I, index: number, signal: AbortSignal) => void;

export class BoundedDispatcher<I> {
  private iterator: Iterator<I>;
  private exhausted = false;
  private nextIndex = 0;
  private inFlight = new Map<number, AbortController>();
  private peakInFlight = 0;
  private settledCount = 0;

  /**
   * @param items - pulled lazily, one item per admission
   * @param limit - maximum in-flight units; throws ConfigurationError if not a positive integer
   * @param launch - starts the unit; must not throw and must not settle synchronously
   */
  constructor(
    items: Iterable<I>,
    readonly limit: number,
    private launch: LaunchFn<I>,
  ) {
    assertConcurrencyLimit(limit);
    this.iterator = items[Symbol.iterator]();
  }

  /**
   * Admit pending items until the in-flight set is full or the input is
   * exhausted. Returns the indexes admitted by this call, in order.
   */
  fill(): number[] {
    const admitted: number[] = [];
    while (this.inFlight.size < this.limit && !this.exhausted) {
      const index = this.admitOne();
      if (index === undefined) break;
      admitted.push(index);
    }
    return admitted;
  }

  private admitOne(): number | undefined {
    const next = this.iterator.next();
    if (next.done) {
      this.exhausted = true;
      return undefined;
    }

    const index = this.nextIndex++;
    const controller = new AbortController();
    this.inFlight.set(index, controller);
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight.size);
    this.launch(next.value, index, controller.signal);
    return index;
  }

  /**
   * Mark a unit finished, returning its credit. Returns false if the index
   * was not in flight (already settled or never admitted).
   */
  settle(index: number): boolean {
    if (!this.inFlight.delete(index)) {
      return false;
    }
    this.settledCount++;
    return true;
  }

  /**
   * Signal every in-flight unit to stop. Cancellation is best effort: the
   * units stay in the in-flight set until they settle.
   */
  cancelAll(reason: unknown): number {
    for (const controller of this.inFlight.values()) {
      controller.abort(reason);
    }
    return this.inFlight.size;
  }

  /**
   * Indexes currently in flight, in admission order.
   */
  inFlightIndexes(): number[] {
    return [...this.inFlight.keys()];
  }

  /** True once the input is exhausted and nothing is in flight. */
  get done(): boolean {
    return this.exhausted && this.inFlight.size === 0;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get admittedCount(): number {
    return this.nextIndex;
  }

  get settled(): number {
    return this.settledCount;
  }

  get peak(): number {
    return this.peakInFlight;
  }
}
