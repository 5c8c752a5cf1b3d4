/**
 * unionkit/option
 *
 * Option primitives: a value that is either present (`Some`) or absent
 * (`None`). Absence short-circuits every combinator: callbacks only run on a
 * present value.
 *
 * @example
 * ```typescript
 * import { some, from, map, getValueOr } from 'unionkit/option';
 *
 * const port = getValueOr(map(from(process.env.PORT), Number), 3000);
 * ```
 */

import type { None, Option, Result, Some, UnitResult } from "./core";
import {
  errOf,
  logThrow,
  noneOf,
  okOf,
  okUnit,
  someOf,
  UnwrapError,
} from "./core";
import { getConfig } from "./config";
import type { ErrorLike } from "./errors";

export type { None, Option, Some } from "./core";

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a present Option.
 *
 * @throws TypeError when called with `null` or `undefined` from untyped code
 */
export const some = <T extends {}>(value: T): Some<T> => someOf(value);

/**
 * The absent Option. Always the same instance.
 */
export const none = (): None => noneOf();

/**
 * Lifts a nullable value: `null` and `undefined` become `None`.
 */
export const from = <T>(value: T | null | undefined): Option<NonNullable<T>> =>
  value === null || value === undefined ? noneOf() : someOf(value);

// =============================================================================
// Type Guards & Accessors
// =============================================================================

export const isSome = <T>(option: Option<T>): option is Some<T> => option.some;

export const isNone = <T>(option: Option<T>): option is None => !option.some;

/**
 * Reads the value of a present Option.
 *
 * @throws UnwrapError when the Option is absent
 */
export const unwrap = <T>(option: Option<T>): T => {
  if (option.some) return option.value;
  logThrow("Option.unwrap", "Option is None");
  throw new UnwrapError("Option is None");
};

export const getValueOr = <T>(option: Option<T>, defaultValue: T): T =>
  option.some ? option.value : defaultValue;

export const getValueOrElse = <T>(option: Option<T>, fn: () => T): T =>
  option.some ? option.value : fn();

/** The value or `null`, e.g. for serialization. */
export const toNullable = <T>(option: Option<T>): T | null =>
  option.some ? option.value : null;

export const toUndefined = <T>(option: Option<T>): T | undefined =>
  option.some ? option.value : undefined;

// =============================================================================
// Equality, Ordering, Formatting
// =============================================================================

/**
 * Two Options are equal when both are absent, or both present with equal
 * values (`Object.is` unless a comparer is given).
 */
export function equals<T>(
  a: Option<T>,
  b: Option<T>,
  eq: (x: T, y: T) => boolean = Object.is
): boolean {
  if (a.some && b.some) return eq(a.value, b.value);
  return a.some === b.some;
}

/** Orders `None` before any `Some`; two `Some`s are ordered by `cmp`. */
export function compare<T>(
  a: Option<T>,
  b: Option<T>,
  cmp: (x: T, y: T) => number
): number {
  if (a.some && b.some) return cmp(a.value, b.value);
  if (a.some) return 1;
  if (b.some) return -1;
  return 0;
}

/** `"Some(value)"` or `"None"`. */
export const format = <T>(option: Option<T>): string =>
  option.some ? `Some(${String(option.value)})` : "None";

// =============================================================================
// Transformers
// =============================================================================

export function map<T, U extends {}>(
  option: Option<T>,
  fn: (value: T) => U
): Option<U> {
  return option.some ? someOf(fn(option.value)) : noneOf();
}

export function bind<T, U>(
  option: Option<T>,
  fn: (value: T) => Option<U>
): Option<U> {
  return option.some ? fn(option.value) : noneOf();
}

export function match<T, R>(
  option: Option<T>,
  onSome: (value: T) => R,
  onNone: () => R
): R {
  return option.some ? onSome(option.value) : onNone();
}

/**
 * Keeps a present value only when it satisfies the predicate.
 */
export function filter<T>(
  option: Option<T>,
  predicate: (value: T) => boolean
): Option<T> {
  return option.some && predicate(option.value) ? option : noneOf();
}

/** Alias of `filter`, for query-style chains. */
export const where = filter;

/** Returns the option when present, otherwise the fallback. */
export const orElse = <T>(option: Option<T>, fallback: Option<T>): Option<T> =>
  option.some ? option : fallback;

/** Like `orElse`, but the fallback is only built when needed. */
export const orElseWith = <T>(
  option: Option<T>,
  factory: () => Option<T>
): Option<T> => (option.some ? option : factory());

// =============================================================================
// Side Effects
// =============================================================================

export function onSome<T>(option: Option<T>, fn: (value: T) => void): Option<T> {
  if (option.some) fn(option.value);
  return option;
}

export function onNone<T>(option: Option<T>, fn: () => void): Option<T> {
  if (!option.some) fn();
  return option;
}

export function onEither<T>(
  option: Option<T>,
  onSomeFn: (value: T) => void,
  onNoneFn: () => void
): Option<T> {
  if (option.some) onSomeFn(option.value);
  else onNoneFn();
  return option;
}

// =============================================================================
// Conversion to Result
// =============================================================================

/**
 * Present becomes success. Absent becomes a failure with `error`, or the
 * configured `noneError` (`OptionError.None` by default).
 */
export function toResult<T>(option: Option<T>, error?: ErrorLike): Result<T> {
  if (option.some) return okOf(option.value);
  return errOf(error ?? getConfig().noneError);
}

/** Alias of `toResult`. */
export const ensureSome = toResult;

/**
 * Absent becomes a valueless success. Present becomes a failure with
 * `error`, or the configured `someError` (`OptionError.Some` by default).
 */
export function ensureNone<T>(option: Option<T>, error?: ErrorLike): UnitResult {
  if (!option.some) return okUnit();
  return errOf(error ?? getConfig().someError);
}

// =============================================================================
// Tuple Spreading
// =============================================================================

// Callbacks receive the tuple's elements as separate parameters.

export function mapTuple<T extends readonly unknown[], U extends {}>(
  option: Option<T>,
  fn: (...values: NoInfer<T>) => U
): Option<U> {
  return option.some ? someOf(fn(...option.value)) : noneOf();
}

export function bindTuple<T extends readonly unknown[], U>(
  option: Option<T>,
  fn: (...values: NoInfer<T>) => Option<U>
): Option<U> {
  return option.some ? fn(...option.value) : noneOf();
}

export function matchTuple<T extends readonly unknown[], R>(
  option: Option<T>,
  onSomeFn: (...values: NoInfer<T>) => R,
  onNoneFn: () => R
): R {
  return option.some ? onSomeFn(...option.value) : onNoneFn();
}

export function filterTuple<T extends readonly unknown[]>(
  option: Option<T>,
  predicate: (...values: NoInfer<T>) => boolean
): Option<T> {
  return option.some && predicate(...option.value) ? option : noneOf();
}

export function onSomeTuple<T extends readonly unknown[]>(
  option: Option<T>,
  fn: (...values: NoInfer<T>) => void
): Option<T> {
  if (option.some) fn(...option.value);
  return option;
}

// =============================================================================
// Collection Utilities
// =============================================================================

/**
 * All values when every Option is present; stops at the first `None`.
 */
export function sequence<T>(options: Iterable<Option<T>>): Option<T[]> {
  const values: T[] = [];
  for (const option of options) {
    if (!option.some) return noneOf();
    values.push(option.value);
  }
  return someOf(values);
}

/**
 * Maps each item and collects the values; stops calling `fn` at the first
 * `None`.
 */
export function traverse<T, U>(
  items: Iterable<T>,
  fn: (item: T, index: number) => Option<U>
): Option<U[]> {
  const values: U[] = [];
  let index = 0;
  for (const item of items) {
    const option = fn(item, index++);
    if (!option.some) return noneOf();
    values.push(option.value);
  }
  return someOf(values);
}

/** Present values in order, plus how many were absent. */
export function partition<T>(options: Iterable<Option<T>>): {
  values: T[];
  noneCount: number;
} {
  const values: T[] = [];
  let noneCount = 0;
  for (const option of options) {
    if (option.some) values.push(option.value);
    else noneCount++;
  }
  return { values, noneCount };
}

/** Present values in order; absent ones are dropped. */
export function choose<T>(options: Iterable<Option<T>>): T[] {
  return partition(options).values;
}

/** Maps each item and keeps only the present results. */
export function chooseMap<T, U>(
  items: Iterable<T>,
  fn: (item: T, index: number) => Option<U>
): U[] {
  const values: U[] = [];
  let index = 0;
  for (const item of items) {
    const option = fn(item, index++);
    if (option.some) values.push(option.value);
  }
  return values;
}

/**
 * Pairs present values into a tuple; absent when any input is absent.
 */
export function zip<A, B>(a: Option<A>, b: Option<B>): Option<[A, B]>;
export function zip<A, B, C>(
  a: Option<A>,
  b: Option<B>,
  c: Option<C>
): Option<[A, B, C]>;
export function zip<A, B, C>(
  a: Option<A>,
  b: Option<B>,
  c?: Option<C>
): Option<[A, B] | [A, B, C]> {
  if (!a.some || !b.some) return noneOf();
  if (c === undefined) return someOf<[A, B]>([a.value, b.value]);
  if (!c.some) return noneOf();
  return someOf<[A, B, C]>([a.value, b.value, c.value]);
}

export const flatten = <T>(option: Option<Option<T>>): Option<T> =>
  option.some ? option.value : noneOf();

/** The first item (matching the predicate, when given), or `None`. */
export function firstOrNone<T extends {}>(
  items: Iterable<T>,
  predicate: (item: T) => boolean = () => true
): Option<T> {
  for (const item of items) {
    if (predicate(item)) return someOf(item);
  }
  return noneOf();
}

/** The last item (matching the predicate, when given), or `None`. */
export function lastOrNone<T extends {}>(
  items: Iterable<T>,
  predicate: (item: T) => boolean = () => true
): Option<T> {
  let found: Option<T> = noneOf();
  for (const item of items) {
    if (predicate(item)) found = someOf(item);
  }
  return found;
}
