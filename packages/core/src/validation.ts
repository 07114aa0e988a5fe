/**
 * Eager argument checks.
 *
 * These run at call time, before any lazy work is scheduled, so a bad
 * argument surfaces where the call was made rather than on first pull.
 */

import { ArgumentNullError, ArgumentTypeError } from "./errors.js";

/** Throw `ArgumentNullError` if `value` is `null` or `undefined`. */
export function throwIfNull<T>(
  value: T | null | undefined,
  paramName: string,
): asserts value is T {
  if (value === null || value === undefined) {
    throw new ArgumentNullError(paramName);
  }
}

/** Throw unless `value` is a non-null synchronous iterable. */
export function throwIfNotIterable(value: unknown, paramName: string): void {
  throwIfNull(value, paramName);
  if (!hasMethod(value, Symbol.iterator)) {
    throw new ArgumentTypeError(paramName, "an iterable");
  }
}

/** Throw unless `value` is a non-null sync or async iterable. */
export function throwIfNotAnyIterable(value: unknown, paramName: string): void {
  throwIfNull(value, paramName);
  if (!hasMethod(value, Symbol.asyncIterator) && !hasMethod(value, Symbol.iterator)) {
    throw new ArgumentTypeError(paramName, "an iterable or async iterable");
  }
}

/** Throw unless `value` is a non-null function. */
export function throwIfNotFunction(value: unknown, paramName: string): void {
  throwIfNull(value, paramName);
  if (typeof value !== "function") {
    throw new ArgumentTypeError(paramName, "a function");
  }
}

function hasMethod(value: unknown, key: symbol): boolean {
  if (typeof value !== "object" && typeof value !== "function" && typeof value !== "string") {
    return false;
  }
  // Object() boxes strings so their iterator is visible
  return typeof Object(value)[key] === "function";
}
