/**
 * unionkit/result
 *
 * Result primitives for typed error handling without exceptions.
 *
 * Two families of combinators:
 * - short-circuit (`map`, `bind`, `ensure`, `combine`, `sequence`, ...): the
 *   first failure is returned and nothing after it runs.
 * - accumulate (`bindAll`, `ensureAll`, `combineAll`, `collectAll`): every
 *   operand is evaluated and all failures are merged into one error.
 */

import type { Err, Ok, Option, Result, UnitResult } from "./core";
import {
  errOf,
  logThrow,
  noneOf,
  okOf,
  okUnit,
  ResultFailureError,
  someOf,
  UnwrapError,
} from "./core";
import { getConfig } from "./config";
import { ErrorBuilder } from "./error-builder";
import type { AppError, ErrorLike } from "./errors";
import { GeneralErrors, StringErrors } from "./predefined-errors";

export type { Err, Ok, Result } from "./core";

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const success = <T>(value: T): Ok<T> => okOf(value);

/**
 * Creates a failed Result. A string becomes an `AppError` with an empty code.
 */
export const failure = (error: ErrorLike): Err => errOf(error);

// =============================================================================
// Type Guards & Accessors
// =============================================================================

export const isSuccess = <T>(result: Result<T>): result is Ok<T> => result.ok;

export const isFailure = <T>(result: Result<T>): result is Err => !result.ok;

/**
 * Reads the value of a successful Result.
 *
 * @throws UnwrapError when the Result failed
 */
export const unwrap = <T>(result: Result<T>): T => {
  if (result.ok) return result.value;
  logThrow("Result.unwrap", result.error.toString());
  throw new UnwrapError("Result is not in a success state.", result.error);
};

/**
 * Reads the error of a failed Result (valued or not).
 *
 * @throws UnwrapError when the Result succeeded
 */
export const unwrapError = (result: UnitResult): AppError => {
  if (!result.ok) return result.error;
  logThrow("Result.unwrapError", "Result is not in a failure state.");
  throw new UnwrapError("Result is not in a failure state.");
};

export const getValueOr = <T>(result: Result<T>, defaultValue: T): T =>
  result.ok ? result.value : defaultValue;

export const getValueOrElse = <T>(
  result: Result<T>,
  fn: (error: AppError) => T
): T => (result.ok ? result.value : fn(result.error));

/**
 * Fatal escape hatch: the value, or a thrown exception built from the error.
 * Only for call sites that accept a crash on failure.
 *
 * @throws ResultFailureError (or the selector's exception) when the Result failed
 */
export function getValueOrThrow<T>(
  result: Result<T>,
  selector?: (error: AppError) => Error
): T {
  if (result.ok) return result.value;
  logThrow("getValueOrThrow", result.error.toString());
  throw selector ? selector(result.error) : new ResultFailureError(result.error);
}

/** `"Success: value"` or `"Failure: {error}"`. */
export const format = <T>(result: Result<T>): string =>
  result.ok
    ? `Success: ${String(result.value)}`
    : `Failure: ${result.error.toString()}`;

// =============================================================================
// Transformers
// =============================================================================

export function map<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
  return result.ok ? okOf(fn(result.value)) : result;
}

export function mapError<T>(
  result: Result<T>,
  fn: (error: AppError) => ErrorLike
): Result<T> {
  return result.ok ? result : errOf(fn(result.error));
}

export function bind<T, U>(
  result: Result<T>,
  fn: (value: T) => Result<U>
): Result<U> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Runs a valueless check on the value and keeps the original value when it
 * succeeds.
 */
export function bindUnit<T>(
  result: Result<T>,
  fn: (value: T) => UnitResult
): Result<T> {
  if (!result.ok) return result;
  const next = fn(result.value);
  return next.ok ? result : next;
}

/**
 * Extends a tuple value with the value of a dependent step. Fail-fast.
 * Start a chain from a single value with `map(result, (v) => [v] as const)`.
 *
 * @example
 * ```typescript
 * bindAppend(combine(getUser(id), getOrg(orgId)), (user, org) => getRole(user, org));
 * // Result<[User, Org, Role]>
 * ```
 */
export function bindAppend<T extends readonly unknown[], U>(
  result: Result<T>,
  fn: (...values: NoInfer<T>) => Result<U>
): Result<[...T, U]> {
  if (!result.ok) return result;
  const next = fn(...result.value);
  if (!next.ok) return next;
  const values: [...T, U] = [...result.value, next.value];
  return okOf(values);
}

export function match<T, R>(
  result: Result<T>,
  onSuccess: (value: T) => R,
  onFailure: (error: AppError) => R
): R {
  return result.ok ? onSuccess(result.value) : onFailure(result.error);
}

/**
 * Keeps a success only when the predicate holds. A failure is returned
 * untouched and the predicate is not called.
 */
export function ensure<T>(
  result: Result<T>,
  predicate: (value: T) => boolean,
  error: ErrorLike
): Result<T> {
  if (!result.ok) return result;
  return predicate(result.value) ? result : errOf(error);
}

/**
 * `ensure` with a default `Error.PredicateFailed` validation error.
 */
export const where = <T>(
  result: Result<T>,
  predicate: (value: T) => boolean,
  error: ErrorLike = GeneralErrors.PredicateFailed
): Result<T> => ensure(result, predicate, error);

/** Replaces a failure with the Result built from its error. */
export function orElse<T>(
  result: Result<T>,
  fn: (error: AppError) => Result<T>
): Result<T> {
  return result.ok ? result : fn(result.error);
}

/** Turns any failure into a success. */
export function recover<T>(
  result: Result<T>,
  fn: (error: AppError) => T
): Ok<T> {
  return result.ok ? result : okOf(fn(result.error));
}

// =============================================================================
// Side Effects
// =============================================================================

export function onSuccess<T>(
  result: Result<T>,
  fn: (value: T) => void
): Result<T> {
  if (result.ok) fn(result.value);
  return result;
}

/** Alias of `onSuccess`. */
export const tap = onSuccess;

export function onFailure<T>(
  result: Result<T>,
  fn: (error: AppError) => void
): Result<T> {
  if (!result.ok) fn(result.error);
  return result;
}

export function onEither<T>(
  result: Result<T>,
  onSuccessFn: (value: T) => void,
  onFailureFn: (error: AppError) => void
): Result<T> {
  if (result.ok) onSuccessFn(result.value);
  else onFailureFn(result.error);
  return result;
}

// =============================================================================
// Conversions
// =============================================================================

/** Drops the value; the error, if any, is kept. */
export const discardValue = <T>(result: Result<T>): UnitResult =>
  result.ok ? okUnit() : result;

/** Success becomes `Some`; a failure becomes `None` and its error is lost. */
export function toOption<T extends {}>(result: Result<T>): Option<T> {
  return result.ok ? someOf(result.value) : noneOf();
}

/**
 * Unwraps an Option inside a successful Result. `None` becomes a failure with
 * `error`, or the configured `noneError`.
 */
export function ensureSome<T>(
  result: Result<Option<T>>,
  error?: ErrorLike
): Result<T> {
  if (!result.ok) return result;
  const option = result.value;
  return option.some
    ? okOf(option.value)
    : errOf(error ?? getConfig().noneError);
}

/**
 * Succeeds without a value when the Option inside is `None`.
 */
export function ensureNone<T>(
  result: Result<Option<T>>,
  error?: ErrorLike
): UnitResult {
  if (!result.ok) return result;
  return result.value.some ? errOf(error ?? getConfig().someError) : okUnit();
}

/** Success unless the value is `null` or `undefined`. */
export function ensureNotNull<T>(
  value: T | null | undefined,
  error: ErrorLike = GeneralErrors.Null
): Result<NonNullable<T>> {
  return value === null || value === undefined ? errOf(error) : okOf(value);
}

export function ensureNotNullOrEmpty(
  value: string | null | undefined,
  error: ErrorLike = StringErrors.Empty
): Result<string> {
  return value === null || value === undefined || value === ""
    ? errOf(error)
    : okOf(value);
}

export function ensureNotNullOrWhiteSpace(
  value: string | null | undefined,
  error: ErrorLike = StringErrors.Empty
): Result<string> {
  return value === null || value === undefined || value.trim() === ""
    ? errOf(error)
    : okOf(value);
}

// =============================================================================
// Tuple Spreading
// =============================================================================

// Callbacks receive the tuple's elements as separate parameters.

export function mapTuple<T extends readonly unknown[], U>(
  result: Result<T>,
  fn: (...values: NoInfer<T>) => U
): Result<U> {
  return result.ok ? okOf(fn(...result.value)) : result;
}

export function bindTuple<T extends readonly unknown[], U>(
  result: Result<T>,
  fn: (...values: NoInfer<T>) => Result<U>
): Result<U> {
  return result.ok ? fn(...result.value) : result;
}

export function matchTuple<T extends readonly unknown[], R>(
  result: Result<T>,
  onSuccessFn: (...values: NoInfer<T>) => R,
  onFailureFn: (error: AppError) => R
): R {
  return result.ok ? onSuccessFn(...result.value) : onFailureFn(result.error);
}

export function ensureTuple<T extends readonly unknown[]>(
  result: Result<T>,
  predicate: (...values: NoInfer<T>) => boolean,
  error: ErrorLike
): Result<T> {
  if (!result.ok) return result;
  return predicate(...result.value) ? result : errOf(error);
}

export function onSuccessTuple<T extends readonly unknown[]>(
  result: Result<T>,
  fn: (...values: NoInfer<T>) => void
): Result<T> {
  if (result.ok) fn(...result.value);
  return result;
}

// =============================================================================
// Combining (short-circuit)
// =============================================================================

type SuccessValues<T extends readonly Result<unknown>[]> = {
  -readonly [K in keyof T]: T[K] extends Result<infer V> ? V : never;
};

type FactoryValues<T extends readonly (() => Result<unknown>)[]> = {
  -readonly [K in keyof T]: T[K] extends () => Result<infer V> ? V : never;
};

/**
 * Combines Results into a tuple of their values. Returns the first failure.
 *
 * @example
 * ```typescript
 * const pair = combine(success(1), success("a")); // Result<[number, string]>
 * ```
 */
export function combine<const T extends readonly Result<unknown>[]>(
  ...results: T
): Result<SuccessValues<T>> {
  const list: readonly Result<unknown>[] = results;
  const values: unknown[] = [];
  for (const result of list) {
    if (!result.ok) return result;
    values.push(result.value);
  }
  return okOf(values) as Result<SuccessValues<T>>;
}

/**
 * Like `combine`, but each Result is produced only after the previous one
 * succeeded.
 */
export function combineLazy<const T extends readonly (() => Result<unknown>)[]>(
  ...factories: T
): Result<FactoryValues<T>> {
  const list: readonly (() => Result<unknown>)[] = factories;
  const values: unknown[] = [];
  for (const factory of list) {
    const result = factory();
    if (!result.ok) return result;
    values.push(result.value);
  }
  return okOf(values) as Result<FactoryValues<T>>;
}

/**
 * All values when every Result succeeded; the first failure otherwise.
 */
export function sequence<T>(results: Iterable<Result<T>>): Result<T[]> {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) return result;
    values.push(result.value);
  }
  return okOf(values);
}

/**
 * Maps each item and collects the values; stops calling `fn` at the first
 * failure.
 */
export function traverse<T, U>(
  items: Iterable<T>,
  fn: (item: T, index: number) => Result<U>
): Result<U[]> {
  const values: U[] = [];
  let index = 0;
  for (const item of items) {
    const result = fn(item, index++);
    if (!result.ok) return result;
    values.push(result.value);
  }
  return okOf(values);
}

// =============================================================================
// Accumulating
// =============================================================================

/**
 * Accumulating bind over two already-evaluated Results. Returns `next` when
 * both succeeded; otherwise every failure, merged.
 */
export function bindAll<T, U>(result: Result<T>, next: Result<U>): Result<U> {
  if (result.ok) return next;
  return errOf(new ErrorBuilder().append(result.error).appendOnFailure(next).build());
}

/**
 * Accumulating form of `bindUnit`: keeps `result`'s value when both succeeded.
 */
export function bindAllUnit<T>(result: Result<T>, next: UnitResult): Result<T> {
  if (next.ok) return result;
  return errOf(new ErrorBuilder().appendOnFailure(result).append(next.error).build());
}

/**
 * Accumulating form of `bindAppend`: both Results are evaluated and the
 * tuple is extended when both succeeded.
 */
export function bindAllAppend<T extends readonly unknown[], U>(
  result: Result<T>,
  next: Result<U>
): Result<[...T, U]> {
  if (result.ok && next.ok) {
    const values: [...T, U] = [...result.value, next.value];
    return okOf(values);
  }
  return errOf(
    new ErrorBuilder().appendOnFailure(result).appendOnFailure(next).build()
  );
}

/**
 * Like `combine`, but reports every failure instead of the first.
 */
export function combineAll<const T extends readonly Result<unknown>[]>(
  ...results: T
): Result<SuccessValues<T>> {
  const list: readonly Result<unknown>[] = results;
  return collectAll(list) as Result<SuccessValues<T>>;
}

/**
 * Adds `error` when `condition` is false, keeping any failure `result`
 * already carries.
 */
export function ensureAll<T>(
  result: Result<T>,
  condition: boolean,
  error: ErrorLike
): Result<T> {
  if (condition) return result;
  return errOf(new ErrorBuilder().appendOnFailure(result).append(error).build());
}

/**
 * All values when every Result succeeded. Otherwise the single error, or an
 * aggregate of all errors in order.
 */
export function collectAll<T>(results: Iterable<Result<T>>): Result<T[]> {
  const values: T[] = [];
  const errors = new ErrorBuilder();
  for (const result of results) {
    if (result.ok) values.push(result.value);
    else errors.append(result.error);
  }
  return errors.hasErrors ? errOf(errors.build()) : okOf(values);
}

/** Splits Results into values and errors, keeping order. */
export function partition<T>(results: Iterable<Result<T>>): {
  values: T[];
  errors: AppError[];
} {
  const values: T[] = [];
  const errors: AppError[] = [];
  for (const result of results) {
    if (result.ok) values.push(result.value);
    else errors.push(result.error);
  }
  return { values, errors };
}

export const chooseSuccesses = <T>(results: Iterable<Result<T>>): T[] =>
  partition(results).values;

export const chooseFailures = <T>(results: Iterable<Result<T>>): AppError[] =>
  partition(results).errors;
