/**
 * Fluent, lazy wrapper around an iterable
 *
 * Lets the zips chain like methods on the sequence itself:
 *
 * ```typescript
 * sequence([1, 2, 3])
 *   .zip(["a", "b", "c"], (n, s) => s.repeat(n))
 *   .filter((s) => s.length > 1)
 *   .toArray(); // ["bb", "ccc"]
 * ```
 *
 * Combinators only describe work. Terminal operations (`toArray`, `count`,
 * `first`) and `for...of` pull from the source, once per traversal.
 */

import { ArgumentTypeError, throwIfNotFunction, throwIfNotIterable, throwIfNull } from "@lockstep/core";
import type { Padding, ResultSelector } from "./types.js";
import { equiZip, zip, zipLongest, zipLongestPadded } from "./zip.js";

export class Sequence<T> implements Iterable<T> {
  private readonly source: Iterable<T>;

  constructor(source: Iterable<T>) {
    throwIfNotIterable(source, "source");
    this.source = source;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.source[Symbol.iterator]();
  }

  // ---------------------------------------------------------------------------
  // Zips
  // ---------------------------------------------------------------------------

  /** Pair with `other`, ending with the shorter of the two */
  zip<U, R>(other: Iterable<U>, resultSelector: ResultSelector<T, U, R>): Sequence<R> {
    return new Sequence(zip(this.source, other, resultSelector));
  }

  /** Pair with `other`; iteration throws if the lengths differ */
  equiZip<U, R>(other: Iterable<U>, resultSelector: ResultSelector<T, U, R>): Sequence<R> {
    return new Sequence(equiZip(this.source, other, resultSelector));
  }

  /** Pair with `other`, padding the shorter side with `undefined` */
  zipLongest<U, R>(
    other: Iterable<U>,
    resultSelector: ResultSelector<T | undefined, U | undefined, R>,
  ): Sequence<R> {
    return new Sequence(zipLongest(this.source, other, resultSelector));
  }

  /** Pair with `other`, padding the shorter side from `padding` */
  zipLongestPadded<U, R>(
    other: Iterable<U>,
    padding: Padding<T, U>,
    resultSelector: ResultSelector<T, U, R>,
  ): Sequence<R> {
    return new Sequence(zipLongestPadded(this.source, other, padding, resultSelector));
  }

  // ---------------------------------------------------------------------------
  // Combinators
  // ---------------------------------------------------------------------------

  /** Transform each element */
  map<U>(f: (value: T, index: number) => U): Sequence<U> {
    throwIfNotFunction(f, "f");
    const source = this.source;
    return new Sequence({
      *[Symbol.iterator]() {
        let index = 0;
        for (const value of source) {
          yield f(value, index++);
        }
      },
    });
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (value: T) => boolean): Sequence<T> {
    throwIfNotFunction(predicate, "predicate");
    const source = this.source;
    return new Sequence({
      *[Symbol.iterator]() {
        for (const value of source) {
          if (predicate(value)) yield value;
        }
      },
    });
  }

  /** Take the first `count` elements, then stop pulling from the source */
  take(count: number): Sequence<T> {
    throwIfNull(count, "count");
    if (!Number.isInteger(count)) {
      throw new ArgumentTypeError("count", "an integer");
    }
    const source = this.source;
    return new Sequence({
      *[Symbol.iterator]() {
        if (count <= 0) return;
        let taken = 0;
        for (const value of source) {
          yield value;
          if (++taken >= count) return;
        }
      },
    });
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Collect all elements into an array */
  toArray(): T[] {
    const result: T[] = [];
    for (const value of this.source) {
      result.push(value);
    }
    return result;
  }

  /** Count the number of elements */
  count(): number {
    let n = 0;
    for (const _value of this.source) {
      n++;
    }
    return n;
  }

  /** First element, or null if empty */
  first(): T | null {
    for (const value of this.source) {
      return value;
    }
    return null;
  }
}

/** Create a lazy sequence from any iterable */
export function sequence<T>(source: Iterable<T>): Sequence<T> {
  return new Sequence(source);
}
