/**
 * Error Types
 *
 * Every error raised by lockstep carries a stable `code` so callers can
 * branch on the failure without matching message text.
 */

/** Stable codes for lockstep errors. */
export type LockstepErrorCode =
  | "ARGUMENT_NULL"
  | "ARGUMENT_TYPE"
  | "SEQUENCE_LENGTH_MISMATCH";

/**
 * Base class for all lockstep errors.
 */
export class LockstepError extends Error {
  constructor(
    readonly code: LockstepErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "LockstepError";
  }
}

/**
 * Thrown when a required argument is `null` or `undefined`.
 */
export class ArgumentNullError extends LockstepError {
  constructor(readonly paramName: string) {
    super("ARGUMENT_NULL", `Value cannot be null or undefined (parameter '${paramName}')`);
    this.name = "ArgumentNullError";
  }
}

/**
 * Thrown when an argument is present but of the wrong kind,
 * e.g. a non-iterable where a sequence is expected.
 */
export class ArgumentTypeError extends LockstepError {
  constructor(
    readonly paramName: string,
    readonly expected: string,
  ) {
    super("ARGUMENT_TYPE", `Expected ${expected} (parameter '${paramName}')`);
    this.name = "ArgumentTypeError";
  }
}

/** Which of the two zipped sequences ran out first. */
export type SequenceSide = "first" | "second";

/**
 * Thrown by strict zips when one input ends while the other still has
 * elements. `position` is the number of elements produced before the
 * imbalance was seen.
 */
export class SequenceLengthMismatchError extends LockstepError {
  constructor(
    readonly shorter: SequenceSide,
    readonly position: number,
  ) {
    super(
      "SEQUENCE_LENGTH_MISMATCH",
      shorter === "first"
        ? "First sequence ran out before second"
        : "Second sequence ran out before first",
    );
    this.name = "SequenceLengthMismatchError";
  }
}

/** True if `error` is any lockstep error, optionally with the given code. */
export function isLockstepError(error: unknown, code?: LockstepErrorCode): error is LockstepError {
  return error instanceof LockstepError && (code === undefined || error.code === code);
}
