/**
 * unionkit/core (internal)
 *
 * The discriminated unions shared by every module, their constructors, and
 * the exceptions thrown by the unchecked accessors. Kept separate so that
 * `option.ts` and `result.ts` can convert into each other without an import
 * cycle.
 */

import { getConfig } from "./config";
import type { AppError, ErrorLike } from "./errors";
import { toError } from "./errors";

// =============================================================================
// Option
// =============================================================================

/** A present value. Use `some(value)` to create instances. */
export type Some<T> = { readonly some: true; readonly value: T };

/** The absent value. Use `none()`; there is only one instance. */
export type None = { readonly some: false };

/** A value that may be absent. Never holds `null` or `undefined`. */
export type Option<T> = Some<T> | None;

// =============================================================================
// Result
// =============================================================================

/** A successful result. Use `success(value)` to create instances. */
export type Ok<T> = { readonly ok: true; readonly value: T };

/** A failed result. Use `failure(error)` to create instances. */
export type Err = { readonly ok: false; readonly error: AppError };

/** A computation that produced a value or failed with an `AppError`. */
export type Result<T> = Ok<T> | Err;

/** A success that carries no value. */
export type OkUnit = { readonly ok: true };

/**
 * A computation that succeeded or failed, with no value on success.
 * Every `Result<T>` is assignable to `UnitResult`.
 */
export type UnitResult = OkUnit | Err;

// =============================================================================
// Constructors
// =============================================================================

const NONE: None = Object.freeze({ some: false });
const OK_UNIT: OkUnit = Object.freeze({ ok: true });

export const someOf = <T extends {}>(value: T): Some<T> => {
  // Guard for untyped callers; the signature already excludes nullish values.
  if (value === null || value === undefined) {
    throw new TypeError("Cannot create Some from a null or undefined value");
  }
  return { some: true, value };
};

export const noneOf = (): None => NONE;

export const okOf = <T>(value: T): Ok<T> => ({ ok: true, value });

export const okUnit = (): OkUnit => OK_UNIT;

export const errOf = (error: ErrorLike): Err => ({
  ok: false,
  error: toError(error),
});

// =============================================================================
// Unchecked access
// =============================================================================

/**
 * Thrown when a value is read from the wrong state: the value of a None or a
 * failure, or the error of a success. These are programmer errors, not
 * failures to handle.
 */
export class UnwrapError extends Error {
  /** The domain error, when the unwrapped value was a failure. */
  public readonly error?: AppError;

  constructor(message: string, error?: AppError) {
    super(message);
    this.name = "UnwrapError";
    this.error = error;
  }
}

/**
 * Default exception of the fatal escape hatches (`getValueOrThrow`,
 * `throwIfFailure`). Its message is the domain error's message.
 */
export class ResultFailureError extends Error {
  public readonly error: AppError;

  constructor(error: AppError) {
    super(error.message);
    this.name = "ResultFailureError";
    this.error = error;
  }
}

/** Sends one line to the configured logger. */
export const logThrow = (operation: string, detail: string): void => {
  getConfig().logger(`${operation}: ${detail}`);
};
