/**
 * Shared types for @lockstep/zip
 */

/**
 * How a zip behaves when one input ends before the other.
 *
 * - `truncate`: the result ends when either input is exhausted
 * - `pad`: the result ends when both are exhausted; the shorter side is
 *   padded with a placeholder value
 * - `fail`: `SequenceLengthMismatchError` is thrown if one input is
 *   exhausted but not the other
 */
export const ImbalancedZipStrategy = {
  Truncate: "truncate",
  Pad: "pad",
  Fail: "fail",
} as const;

export type ImbalancedZipStrategy =
  (typeof ImbalancedZipStrategy)[keyof typeof ImbalancedZipStrategy];

/** Placeholder values used for the missing side when padding */
export interface Padding<TFirst, TSecond> {
  readonly first: TFirst;
  readonly second: TSecond;
}

/** Combines the N-th elements of two sequences */
export type ResultSelector<TFirst, TSecond, TResult> = (
  first: TFirst,
  second: TSecond,
) => TResult;

/** Anything `for await` can consume */
export type AnyIterable<T> = AsyncIterable<T> | Iterable<T>;
