/**
 * Result aggregation: the run-scoped fold over outcomes, plus a few
 * ready-made aggregators.
 */

import { AggregationError } from "../errors.js";
import { isSuccess, type Aggregator, type Failure, type Outcome, type Success } from "../types.js";

function zeroOf<A>(aggregator: { zero(): A }): A {
  try {
    return aggregator.zero();
  } catch (err) {
    throw new AggregationError(err);
  }
}

/**
 * Owns one run's aggregate. Only the run's coordinating loop calls fold(),
 * and it awaits each fold before taking the next outcome, so folds never
 * overlap.
 */
export class ResultAggregator<I, T, A, R> {
  private aggregate: A;
  private folded = new Set<number>();
  private finalized = false;

  constructor(private aggregator: Aggregator<I, T, A, R>) {
    this.aggregate = zeroOf(aggregator);
  }

  /**
   * Fold one outcome in. Throws AggregationError if combine throws or the
   * outcome's index was already folded.
   */
  async fold(outcome: Outcome<I, T>): Promise<void> {
    if (this.finalized) {
      throw new AggregationError(new Error(`outcome #${outcome.index} arrived after finalize`));
    }
    if (this.folded.has(outcome.index)) {
      throw new AggregationError(new Error(`outcome #${outcome.index} folded twice`));
    }
    this.folded.add(outcome.index);

    try {
      this.aggregate = await this.aggregator.combine(this.aggregate, outcome);
    } catch (err) {
      throw new AggregationError(err);
    }
  }

  /**
   * Produce the final value. Callable once.
   */
  finalize(): R {
    if (this.finalized) {
      throw new AggregationError(new Error("aggregate already finalized"));
    }
    this.finalized = true;

    try {
      return this.aggregator.finalize(this.aggregate);
    } catch (err) {
      throw new AggregationError(err);
    }
  }

  get foldedCount(): number {
    return this.folded.size;
  }
}

// ============================================================================
// Built-in Aggregators
// ============================================================================

/**
 * Build an aggregator from a zero and a combine; the accumulator is the result.
 */
export function foldAggregator<I, T, A>(
  zero: () => A,
  combine: (aggregate: A, outcome: Outcome<I, T>) => A | Promise<A>,
): Aggregator<I, T, A> {
  return { zero, combine, finalize: (aggregate) => aggregate };
}

export interface CollectedResults<I, T> {
  /** Success values in input order. */
  values: T[];
  /** Recorded failures in input order. */
  failures: Failure<I>[];
}

interface CollectState<I, T> {
  successes: Success<I, T>[];
  failures: Failure<I>[];
}

/**
 * Collect every outcome, restoring input order at finalize.
 */
export function collectAggregator<I, T>(): Aggregator<I, T, CollectState<I, T>, CollectedResults<I, T>> {
  return {
    zero: () => ({ successes: [], failures: [] }),
    combine(state, outcome) {
      if (isSuccess(outcome)) {
        state.successes.push(outcome);
      } else {
        state.failures.push(outcome);
      }
      return state;
    },
    finalize(state) {
      const byIndex = (a: { index: number }, b: { index: number }) => a.index - b.index;
      return {
        values: [...state.successes].sort(byIndex).map((s) => s.value),
        failures: [...state.failures].sort(byIndex),
      };
    },
  };
}

export interface ReducedResults<S, I> {
  value: S;
  succeeded: number;
  failures: Failure<I>[];
}

/**
 * Fold success values with a reducer. The reducer should be commutative and
 * associative, since outcomes arrive in completion order.
 */
export function reduceAggregator<I, T, S>(
  seed: S,
  reducer: (accumulator: S, value: T, item: I) => S,
): Aggregator<I, T, ReducedResults<S, I>> {
  return foldAggregator<I, T, ReducedResults<S, I>>(
    () => ({ value: seed, succeeded: 0, failures: [] }),
    (state, outcome) => {
      if (isSuccess(outcome)) {
        return {
          value: reducer(state.value, outcome.value, outcome.item),
          succeeded: state.succeeded + 1,
          failures: state.failures,
        };
      }
      return { ...state, failures: [...state.failures, outcome] };
    },
  );
}

export interface OutcomeCounts {
  succeeded: number;
  failed: number;
}

export function countAggregator<I, T>(): Aggregator<I, T, OutcomeCounts> {
  return foldAggregator<I, T, OutcomeCounts>(
    () => ({ succeeded: 0, failed: 0 }),
    (counts, outcome) =>
      isSuccess(outcome)
        ? { ...counts, succeeded: counts.succeeded + 1 }
        : { ...counts, failed: counts.failed + 1 },
  );
}
