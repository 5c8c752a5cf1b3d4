/**
 * unionkit/unit-result
 *
 * Results that carry no value on success: side-effecting commands and
 * validations. Same two families as `result.ts` (short-circuit and
 * accumulate), plus the factories that start a validation from conditions.
 *
 * @example
 * ```typescript
 * const checked = checkAll(
 *   [input.name !== "", "Name required"],
 *   [input.age >= 0, "Age invalid"],
 * ); // fails with an AggregateError of both when both are false
 * ```
 */

import type { Err, OkUnit, Result, UnitResult } from "./core";
import {
  errOf,
  logThrow,
  okOf,
  okUnit,
  ResultFailureError,
  UnwrapError,
} from "./core";
import { ErrorBuilder } from "./error-builder";
import type { AppError, ErrorLike } from "./errors";

export type { OkUnit, UnitResult } from "./core";

// =============================================================================
// Constructors
// =============================================================================

export const success = (): OkUnit => okUnit();

export const failure = (error: ErrorLike): Err => errOf(error);

/** Drops the value of a Result. */
export const from = <T>(result: Result<T>): UnitResult =>
  result.ok ? okUnit() : result;

/** Success when `condition` holds, otherwise a failure with `error`. */
export const check = (condition: boolean, error: ErrorLike): UnitResult =>
  condition ? okUnit() : errOf(error);

// =============================================================================
// Type Guards & Accessors
// =============================================================================

export const isSuccess = (result: UnitResult): result is OkUnit => result.ok;

export const isFailure = (result: UnitResult): result is Err => !result.ok;

/**
 * Reads the error of a failed result.
 *
 * @throws UnwrapError when the result succeeded
 */
export const unwrapError = (result: UnitResult): AppError => {
  if (!result.ok) return result.error;
  logThrow("UnitResult.unwrapError", "Result is not in a failure state.");
  throw new UnwrapError("Result is not in a failure state.");
};

/**
 * Fatal escape hatch: returns on success, throws on failure.
 * Only for call sites that accept a crash on failure.
 *
 * @throws ResultFailureError (or the selector's exception) when the result failed
 */
export function throwIfFailure(
  result: UnitResult,
  selector?: (error: AppError) => Error
): void {
  if (result.ok) return;
  logThrow("throwIfFailure", result.error.toString());
  throw selector ? selector(result.error) : new ResultFailureError(result.error);
}

/** `"Success"` or `"Failure: {error}"`. */
export const format = (result: UnitResult): string =>
  result.ok ? "Success" : `Failure: ${result.error.toString()}`;

// =============================================================================
// Short-circuit
// =============================================================================

export function bind(result: UnitResult, next: () => UnitResult): UnitResult {
  return result.ok ? next() : result;
}

/** Continues with a step that produces a value. */
export function bindValue<T>(
  result: UnitResult,
  next: () => Result<T>
): Result<T> {
  return result.ok ? next() : result;
}

/**
 * Fails with `error` when the predicate is false. A failure is returned
 * untouched and the predicate is not called.
 */
export function ensure(
  result: UnitResult,
  predicate: () => boolean,
  error: ErrorLike
): UnitResult {
  if (!result.ok) return result;
  return predicate() ? result : errOf(error);
}

export function match<R>(
  result: UnitResult,
  onSuccess: () => R,
  onFailure: (error: AppError) => R
): R {
  return result.ok ? onSuccess() : onFailure(result.error);
}

export function onSuccess(result: UnitResult, fn: () => void): UnitResult {
  if (result.ok) fn();
  return result;
}

export function onFailure(
  result: UnitResult,
  fn: (error: AppError) => void
): UnitResult {
  if (!result.ok) fn(result.error);
  return result;
}

export function onEither(
  result: UnitResult,
  onSuccessFn: () => void,
  onFailureFn: (error: AppError) => void
): UnitResult {
  if (result.ok) onSuccessFn();
  else onFailureFn(result.error);
  return result;
}

/** Promotes a success to a Result carrying `value`. */
export const withValue = <T>(result: UnitResult, value: T): Result<T> =>
  result.ok ? okOf(value) : result;

/** Like `withValue`; the factory only runs on success. */
export const withValueFrom = <T>(
  result: UnitResult,
  factory: () => T
): Result<T> => (result.ok ? okOf(factory()) : result);

/** The first failure, or success when all succeeded. */
export function combine(...results: UnitResult[]): UnitResult {
  return sequence(results);
}

export function sequence(results: Iterable<UnitResult>): UnitResult {
  for (const result of results) {
    if (!result.ok) return result;
  }
  return okUnit();
}

/** Runs `fn` per item until one fails. */
export function traverse<T>(
  items: Iterable<T>,
  fn: (item: T, index: number) => UnitResult
): UnitResult {
  let index = 0;
  for (const item of items) {
    const result = fn(item, index++);
    if (!result.ok) return result;
  }
  return okUnit();
}

/** Runs each step in order, stopping at the first failure. */
export function bindEach(...steps: Array<() => UnitResult>): UnitResult {
  for (const step of steps) {
    const result = step();
    if (!result.ok) return result;
  }
  return okUnit();
}

/**
 * Evaluates each predicate in order and fails with the paired error of the
 * first one that is false. Later predicates are not called.
 */
export function checkEach(
  ...checks: Array<readonly [predicate: () => boolean, error: ErrorLike]>
): UnitResult {
  for (const [predicate, error] of checks) {
    if (!predicate()) return errOf(error);
  }
  return okUnit();
}

// =============================================================================
// Accumulating
// =============================================================================

/**
 * Accumulating bind over two already-evaluated results. Returns `next` when
 * `result` succeeded; otherwise every failure, merged.
 */
export function bindAll<T>(result: UnitResult, next: Result<T>): Result<T>;
export function bindAll(result: UnitResult, next: UnitResult): UnitResult;
export function bindAll(result: UnitResult, next: UnitResult): UnitResult {
  if (result.ok) return next;
  return errOf(new ErrorBuilder().append(result.error).appendOnFailure(next).build());
}

/**
 * Adds `error` when `condition` is false, keeping any failure `result`
 * already carries.
 */
export function ensureAll(
  result: UnitResult,
  condition: boolean,
  error: ErrorLike
): UnitResult {
  if (condition) return result;
  return errOf(new ErrorBuilder().appendOnFailure(result).append(error).build());
}

/** Every false condition contributes its error. */
export function checkAll(
  ...checks: Array<readonly [condition: boolean, error: ErrorLike]>
): UnitResult {
  const errors = new ErrorBuilder();
  for (const [condition, error] of checks) {
    if (!condition) errors.append(error);
  }
  return errors.hasErrors ? errOf(errors.build()) : okUnit();
}

/** Like `combine`, but reports every failure. */
export function combineAll(...results: UnitResult[]): UnitResult {
  return collectAll(results);
}

/**
 * Success when all succeeded. Otherwise the single error, or an aggregate of
 * all errors in order.
 */
export function collectAll(results: Iterable<UnitResult>): UnitResult {
  const errors = new ErrorBuilder();
  for (const result of results) errors.appendOnFailure(result);
  return errors.hasErrors ? errOf(errors.build()) : okUnit();
}

export function partition(results: Iterable<UnitResult>): {
  successCount: number;
  errors: AppError[];
} {
  let successCount = 0;
  const errors: AppError[] = [];
  for (const result of results) {
    if (result.ok) successCount++;
    else errors.push(result.error);
  }
  return { successCount, errors };
}

export const countSuccesses = (results: Iterable<UnitResult>): number =>
  partition(results).successCount;

export const countFailures = (results: Iterable<UnitResult>): number =>
  partition(results).errors.length;

export const extractErrors = (results: Iterable<UnitResult>): AppError[] =>
  partition(results).errors;
