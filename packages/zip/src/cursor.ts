/**
 * Forward-only cursors over iterators.
 *
 * A cursor owns its iterator from construction until `release()`. Releasing
 * calls the iterator's `return()` unless it already reported `done` or its
 * `next()` threw, which is the same contract `for...of` keeps.
 */

import type { AnyIterable } from "./types.js";

export class Cursor<T> {
  private readonly iterator: Iterator<T>;
  private head: IteratorYieldResult<T> | undefined;
  private finished = false;

  constructor(source: Iterable<T>) {
    this.iterator = source[Symbol.iterator]();
  }

  /** Advance to the next element; false once the source is exhausted */
  moveNext(): boolean {
    if (this.finished) return false;
    let result: IteratorResult<T>;
    try {
      result = this.iterator.next();
    } catch (error) {
      // A source that threw is closed; release() must not call return()
      this.finished = true;
      this.head = undefined;
      throw error;
    }
    if (result.done) {
      this.finished = true;
      this.head = undefined;
      return false;
    }
    this.head = result;
    return true;
  }

  /** The element the last successful `moveNext()` landed on */
  get current(): T {
    if (this.head === undefined) {
      throw new RangeError("Cursor is not positioned on an element");
    }
    return this.head.value;
  }

  release(): void {
    if (this.finished) return;
    this.finished = true;
    this.head = undefined;
    this.iterator.return?.();
  }
}

export function isAsyncIterable<T>(source: AnyIterable<T>): source is AsyncIterable<T> {
  return typeof source === "object" && Symbol.asyncIterator in source;
}

/** Async counterpart of {@link Cursor}; accepts sync sources too. */
export class AsyncCursor<T> {
  private readonly iterator: AsyncIterator<T> | Iterator<T>;
  private head: IteratorYieldResult<T> | undefined;
  private finished = false;

  constructor(source: AnyIterable<T>) {
    this.iterator = isAsyncIterable(source)
      ? source[Symbol.asyncIterator]()
      : source[Symbol.iterator]();
  }

  async moveNext(): Promise<boolean> {
    if (this.finished) return false;
    let result: IteratorResult<T>;
    try {
      result = await this.iterator.next();
    } catch (error) {
      this.finished = true;
      this.head = undefined;
      throw error;
    }
    if (result.done) {
      this.finished = true;
      this.head = undefined;
      return false;
    }
    this.head = result;
    return true;
  }

  get current(): T {
    if (this.head === undefined) {
      throw new RangeError("Cursor is not positioned on an element");
    }
    return this.head.value;
  }

  async release(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.head = undefined;
    await this.iterator.return?.();
  }
}
