// ---------------------------------------------------------------------------
// Test sources that record how they are iterated
// ---------------------------------------------------------------------------

export interface IterationStats {
  /** Number of iterators handed out */
  acquired: number;
  /** Calls to next(), including the one that reports done */
  advances: number;
  /** Calls to return() */
  released: number;
}

export function tracked<T>(values: readonly T[]): { iterable: Iterable<T>; stats: IterationStats } {
  const stats: IterationStats = { acquired: 0, advances: 0, released: 0 };
  const iterable: Iterable<T> = {
    [Symbol.iterator]() {
      stats.acquired++;
      let index = 0;
      return {
        next(): IteratorResult<T> {
          stats.advances++;
          if (index < values.length) {
            return { done: false, value: values[index++] };
          }
          return { done: true, value: undefined };
        },
        return(): IteratorResult<T> {
          stats.released++;
          index = values.length;
          return { done: true, value: undefined };
        },
      };
    },
  };
  return { iterable, stats };
}

export function trackedAsync<T>(
  values: readonly T[],
): { iterable: AsyncIterable<T>; stats: IterationStats } {
  const stats: IterationStats = { acquired: 0, advances: 0, released: 0 };
  const iterable: AsyncIterable<T> = {
    [Symbol.asyncIterator]() {
      stats.acquired++;
      let index = 0;
      return {
        async next(): Promise<IteratorResult<T>> {
          stats.advances++;
          if (index < values.length) {
            return { done: false, value: values[index++] };
          }
          return { done: true, value: undefined };
        },
        async return(): Promise<IteratorResult<T>> {
          stats.released++;
          index = values.length;
          return { done: true, value: undefined };
        },
      };
    },
  };
  return { iterable, stats };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const value of source) {
    result.push(value);
  }
  return result;
}

export function caught(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
