/**
 * Pairwise combination of two sequences
 *
 * `zip`, `equiZip` and `zipLongest` pair up the N-th elements of two
 * iterables and combine each pair with a selector. They differ only in what
 * happens when one input runs out before the other; all three share
 * {@link zipImpl}.
 *
 * Arguments are checked when the function is called. Iteration is lazy and
 * each `[Symbol.iterator]()` call starts an independent traversal.
 */

import {
  SequenceLengthMismatchError,
  createLogger,
  throwIfNotFunction,
  throwIfNotIterable,
  throwIfNull,
} from "@lockstep/core";
import type { SequenceSide } from "@lockstep/core";
import { Cursor } from "./cursor.js";
import { ImbalancedZipStrategy } from "./types.js";
import type { Padding, ResultSelector } from "./types.js";

const log = createLogger("zip");

/**
 * Returns a projection where each element combines the N-th element of
 * each input. The result ends as soon as the shorter input is exhausted.
 *
 * @example
 * ```typescript
 * const zipped = zip([1, 2, 3], ["A", "B", "C", "D"], (n, l) => `${n}${l}`);
 * [...zipped]; // ["1A", "2B", "3C"]
 * ```
 */
export function zip<TFirst, TSecond, TResult>(
  first: Iterable<TFirst>,
  second: Iterable<TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
): Iterable<TResult> {
  checkArguments(first, second, resultSelector);
  return deferred(() =>
    zipImpl(first, second, resultSelector, ImbalancedZipStrategy.Truncate, undefined),
  );
}

/**
 * Like {@link zip}, but the inputs must have the same length: if one runs
 * out first, iteration throws {@link SequenceLengthMismatchError} at the
 * point where the imbalance is found.
 *
 * @example
 * ```typescript
 * const zipped = equiZip([1, 2, 3, 4], ["A", "B", "C", "D"], (n, l) => `${n}${l}`);
 * [...zipped]; // ["1A", "2B", "3C", "4D"]
 * ```
 */
export function equiZip<TFirst, TSecond, TResult>(
  first: Iterable<TFirst>,
  second: Iterable<TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
): Iterable<TResult> {
  checkArguments(first, second, resultSelector);
  return deferred(() =>
    zipImpl(first, second, resultSelector, ImbalancedZipStrategy.Fail, undefined),
  );
}

/**
 * Like {@link zip}, but the result is as long as the longer input. The
 * selector receives `undefined` for the side that has run out.
 *
 * @example
 * ```typescript
 * const zipped = zipLongest([1, 2, 3], ["A", "B", "C", "D"], (n, l) => `${n ?? 0}${l}`);
 * [...zipped]; // ["1A", "2B", "3C", "0D"]
 * ```
 */
export function zipLongest<TFirst, TSecond, TResult>(
  first: Iterable<TFirst>,
  second: Iterable<TSecond>,
  resultSelector: ResultSelector<TFirst | undefined, TSecond | undefined, TResult>,
): Iterable<TResult> {
  checkArguments(first, second, resultSelector);
  return deferred(() =>
    zipImpl<TFirst | undefined, TSecond | undefined, TResult>(
      first,
      second,
      resultSelector,
      ImbalancedZipStrategy.Pad,
      { first: undefined, second: undefined },
    ),
  );
}

/**
 * Like {@link zipLongest}, but the missing side is filled from `padding`
 * so the selector keeps its non-optional parameter types.
 *
 * @example
 * ```typescript
 * const zipped = zipLongestPadded(
 *   [1, 2, 3],
 *   ["A", "B", "C", "D"],
 *   { first: 0, second: "" },
 *   (n, l) => `${n}${l}`,
 * );
 * [...zipped]; // ["1A", "2B", "3C", "0D"]
 * ```
 */
export function zipLongestPadded<TFirst, TSecond, TResult>(
  first: Iterable<TFirst>,
  second: Iterable<TSecond>,
  padding: Padding<TFirst, TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
): Iterable<TResult> {
  checkArguments(first, second, resultSelector);
  throwIfNull(padding, "padding");
  return deferred(() =>
    zipImpl(first, second, resultSelector, ImbalancedZipStrategy.Pad, padding),
  );
}

// ---------------------------------------------------------------------------
// Shared implementation
// ---------------------------------------------------------------------------

function checkArguments(first: unknown, second: unknown, resultSelector: unknown): void {
  throwIfNotIterable(first, "first");
  throwIfNotIterable(second, "second");
  throwIfNotFunction(resultSelector, "resultSelector");
}

function deferred<T>(start: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: start };
}

/**
 * Log an imbalance and, under `fail`, build the error to throw.
 * @internal shared with the async variants
 */
export function imbalance(
  shorter: SequenceSide,
  strategy: ImbalancedZipStrategy,
  position: number,
): SequenceLengthMismatchError | undefined {
  if (log.isEnabled("debug")) {
    const longer = shorter === "first" ? "second" : "first";
    log.debug(`${shorter} sequence ran out before ${longer}`, { strategy, position });
  }
  return strategy === ImbalancedZipStrategy.Fail
    ? new SequenceLengthMismatchError(shorter, position)
    : undefined;
}

/**
 * Lockstep traversal shared by every zip variant.
 *
 * Both cursors are released on every exit: natural end, a `return()` from
 * the consumer, a mismatch under `fail`, or an error from the selector or
 * the inputs. `padding` is only read under `pad`.
 */
function* zipImpl<TFirst, TSecond, TResult>(
  first: Iterable<TFirst>,
  second: Iterable<TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
  strategy: ImbalancedZipStrategy,
  padding: Padding<TFirst, TSecond> | undefined,
): Generator<TResult, void, undefined> {
  const e1 = new Cursor(first);
  try {
    const e2 = new Cursor(second);
    try {
      let position = 0;

      while (e1.moveNext()) {
        if (e2.moveNext()) {
          yield resultSelector(e1.current, e2.current);
          position++;
          continue;
        }

        const error = imbalance("second", strategy, position);
        if (error) throw error;
        if (strategy === ImbalancedZipStrategy.Truncate || padding === undefined) return;

        // Run the first sequence out; the second is not advanced again
        do {
          yield resultSelector(e1.current, padding.second);
        } while (e1.moveNext());
        return;
      }

      if (!e2.moveNext()) return;

      const error = imbalance("first", strategy, position);
      if (error) throw error;
      if (strategy === ImbalancedZipStrategy.Truncate || padding === undefined) return;

      do {
        yield resultSelector(padding.first, e2.current);
      } while (e2.moveNext());
    } finally {
      e2.release();
    }
  } finally {
    e1.release();
  }
}
