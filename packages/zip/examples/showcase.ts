/**
 * @lockstep/zip Showcase
 *
 * Self-documenting examples of the three zip policies, their async forms
 * and the fluent Sequence wrapper.
 *
 * Build: npm run build && node dist/packages/zip/examples/showcase.js
 */

import assert from "node:assert/strict";

import {
  zip, equiZip, zipLongest, zipLongestPadded,
  zipAsync,
  sequence,
  SequenceLengthMismatchError,
} from "../src/index.js";

const numbers = [1, 2, 3];
const letters = ["A", "B", "C", "D"];

// ============================================================================
// 1. TRUNCATE: stop at the shorter input
// ============================================================================

assert.deepEqual([...zip(numbers, letters, (n, l) => `${n}${l}`)], ["1A", "2B", "3C"]);

// ============================================================================
// 2. FAIL: unequal lengths are an error, raised where they are found
// ============================================================================

const strict = equiZip(numbers, letters, (n, l) => `${n}${l}`);
const seen: string[] = [];
assert.throws(() => {
  for (const pair of strict) seen.push(pair);
}, SequenceLengthMismatchError);
assert.deepEqual(seen, ["1A", "2B", "3C"]);

// ============================================================================
// 3. PAD: run to the longer input
// ============================================================================

// The selector sees undefined for the missing side...
assert.deepEqual(
  [...zipLongest(numbers, letters, (n, l) => `${n ?? 0}${l}`)],
  ["1A", "2B", "3C", "0D"],
);

// ...or a padding value of the element type
assert.deepEqual(
  [...zipLongestPadded(numbers, letters, { first: 0, second: "" }, (n, l) => `${n}${l}`)],
  ["1A", "2B", "3C", "0D"],
);

// ============================================================================
// 4. LAZINESS: infinite inputs are fine as long as one side ends
// ============================================================================

function* naturals(): Generator<number> {
  for (let n = 1; ; n++) yield n;
}

assert.deepEqual(
  [...zip(naturals(), ["a", "b", "c"], (n, s) => `${n}.${s}`)],
  ["1.a", "2.b", "3.c"],
);

// ============================================================================
// 5. FLUENT SEQUENCES
// ============================================================================

const totals = sequence([10, 20, 30])
  .zip([1, 2, 3], (price, qty) => price * qty)
  .filter((total) => total > 10)
  .toArray();

assert.deepEqual(totals, [40, 90]);

// ============================================================================
// 6. ASYNC SOURCES
// ============================================================================

async function* ticks(): AsyncGenerator<number> {
  yield 1;
  yield 2;
}

async function main(): Promise<void> {
  const labelled: string[] = [];
  for await (const label of zipAsync(ticks(), ["first", "second"], (t, name) => `${name}@${t}`)) {
    labelled.push(label);
  }
  assert.deepEqual(labelled, ["first@1", "second@2"]);
  console.log("showcase: all assertions passed");
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
