/**
 * Async zips
 *
 * Same policies as the synchronous zips, over async iterables. Either input
 * may be sync or async. The first input is awaited before the second is
 * advanced, so the two are never pulled concurrently.
 */

import { throwIfNotAnyIterable, throwIfNotFunction, throwIfNull } from "@lockstep/core";
import { AsyncCursor } from "./cursor.js";
import { ImbalancedZipStrategy } from "./types.js";
import type { AnyIterable, Padding, ResultSelector } from "./types.js";
import { imbalance } from "./zip.js";

/** Async {@link zip}: ends with the shorter input. */
export function zipAsync<TFirst, TSecond, TResult>(
  first: AnyIterable<TFirst>,
  second: AnyIterable<TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
): AsyncIterable<TResult> {
  checkArguments(first, second, resultSelector);
  return deferred(() =>
    zipAsyncImpl(first, second, resultSelector, ImbalancedZipStrategy.Truncate, undefined),
  );
}

/** Async {@link equiZip}: rejects with `SequenceLengthMismatchError` on unequal lengths. */
export function equiZipAsync<TFirst, TSecond, TResult>(
  first: AnyIterable<TFirst>,
  second: AnyIterable<TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
): AsyncIterable<TResult> {
  checkArguments(first, second, resultSelector);
  return deferred(() =>
    zipAsyncImpl(first, second, resultSelector, ImbalancedZipStrategy.Fail, undefined),
  );
}

/** Async {@link zipLongest}: pads the shorter input with `undefined`. */
export function zipLongestAsync<TFirst, TSecond, TResult>(
  first: AnyIterable<TFirst>,
  second: AnyIterable<TSecond>,
  resultSelector: ResultSelector<TFirst | undefined, TSecond | undefined, TResult>,
): AsyncIterable<TResult> {
  checkArguments(first, second, resultSelector);
  return deferred(() =>
    zipAsyncImpl<TFirst | undefined, TSecond | undefined, TResult>(
      first,
      second,
      resultSelector,
      ImbalancedZipStrategy.Pad,
      { first: undefined, second: undefined },
    ),
  );
}

/** Async {@link zipLongestPadded}: pads the shorter input from `padding`. */
export function zipLongestPaddedAsync<TFirst, TSecond, TResult>(
  first: AnyIterable<TFirst>,
  second: AnyIterable<TSecond>,
  padding: Padding<TFirst, TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
): AsyncIterable<TResult> {
  checkArguments(first, second, resultSelector);
  throwIfNull(padding, "padding");
  return deferred(() =>
    zipAsyncImpl(first, second, resultSelector, ImbalancedZipStrategy.Pad, padding),
  );
}

function checkArguments(first: unknown, second: unknown, resultSelector: unknown): void {
  throwIfNotAnyIterable(first, "first");
  throwIfNotAnyIterable(second, "second");
  throwIfNotFunction(resultSelector, "resultSelector");
}

function deferred<T>(start: () => AsyncIterator<T>): AsyncIterable<T> {
  return { [Symbol.asyncIterator]: start };
}

async function* zipAsyncImpl<TFirst, TSecond, TResult>(
  first: AnyIterable<TFirst>,
  second: AnyIterable<TSecond>,
  resultSelector: ResultSelector<TFirst, TSecond, TResult>,
  strategy: ImbalancedZipStrategy,
  padding: Padding<TFirst, TSecond> | undefined,
): AsyncGenerator<TResult, void, undefined> {
  const e1 = new AsyncCursor(first);
  try {
    const e2 = new AsyncCursor(second);
    try {
      let position = 0;

      while (await e1.moveNext()) {
        if (await e2.moveNext()) {
          yield resultSelector(e1.current, e2.current);
          position++;
          continue;
        }

        const error = imbalance("second", strategy, position);
        if (error) throw error;
        if (strategy === ImbalancedZipStrategy.Truncate || padding === undefined) return;

        do {
          yield resultSelector(e1.current, padding.second);
        } while (await e1.moveNext());
        return;
      }

      if (!(await e2.moveNext())) return;

      const error = imbalance("first", strategy, position);
      if (error) throw error;
      if (strategy === ImbalancedZipStrategy.Truncate || padding === undefined) return;

      do {
        yield resultSelector(padding.first, e2.current);
      } while (await e2.moveNext());
    } finally {
      await e2.release();
    }
  } finally {
    await e1.release();
  }
}
