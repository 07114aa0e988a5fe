/**
 * @lockstep/zip: Pairwise combination of sequences
 *
 * Combine the N-th elements of two sequences with a selector. The variants
 * differ in how they treat inputs of unequal length:
 *
 * - `zip` stops at the shorter input
 * - `equiZip` throws `SequenceLengthMismatchError`
 * - `zipLongest` / `zipLongestPadded` pad the shorter input
 *
 * All of them are lazy and release both input iterators however iteration
 * ends.
 *
 * @example
 * ```typescript
 * import { zip, zipLongestPadded, sequence } from "@lockstep/zip";
 *
 * [...zip([1, 2, 3], ["A", "B", "C", "D"], (n, l) => `${n}${l}`)];
 * // ["1A", "2B", "3C"]
 *
 * [...zipLongestPadded([1, 2, 3], ["A", "B", "C", "D"], { first: 0, second: "" }, (n, l) => `${n}${l}`)];
 * // ["1A", "2B", "3C", "0D"]
 *
 * sequence([1, 2]).equiZip([3, 4], (a, b) => a * b).toArray(); // [3, 8]
 * ```
 */

export { zip, equiZip, zipLongest, zipLongestPadded } from "./zip.js";
export { zipAsync, equiZipAsync, zipLongestAsync, zipLongestPaddedAsync } from "./zip-async.js";
export { Sequence, sequence } from "./sequence.js";
export { Cursor, AsyncCursor } from "./cursor.js";
export { ImbalancedZipStrategy } from "./types.js";
export type { Padding, ResultSelector, AnyIterable } from "./types.js";

export { SequenceLengthMismatchError, ArgumentNullError, ArgumentTypeError } from "@lockstep/core";
