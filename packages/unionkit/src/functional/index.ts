/**
 * unionkit/functional
 *
 * Pipe-based composition for Options and Results. `O` and `R` hold curried
 * versions of the combinators so chains read top to bottom.
 *
 * @example
 * ```typescript
 * const label = pipe(
 *   Option.from(user.nickname),
 *   O.filter((n) => n.length > 2),
 *   O.map((n) => n.toUpperCase()),
 *   O.getValueOr("ANONYMOUS")
 * );
 * ```
 */

import type { Option, Result, UnitResult } from "../core";
import type { AppError, ErrorLike } from "../errors";
import * as option from "../option";
import * as result from "../result";

// =============================================================================
// Composition
// =============================================================================

type Fn<A, B> = (a: A) => B;

export function pipe<A>(a: A): A;
export function pipe<A, B>(a: A, ab: Fn<A, B>): B;
export function pipe<A, B, C>(a: A, ab: Fn<A, B>, bc: Fn<B, C>): C;
export function pipe<A, B, C, D>(a: A, ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>): D;
export function pipe<A, B, C, D, E>(a: A, ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>, de: Fn<D, E>): E;
export function pipe<A, B, C, D, E, F>(
  a: A, ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>, de: Fn<D, E>, ef: Fn<E, F>
): F;
export function pipe(a: unknown, ...fns: Array<Fn<unknown, unknown>>): unknown {
  return fns.reduce((acc, fn) => fn(acc), a);
}

export function flow<A, B>(ab: Fn<A, B>): Fn<A, B>;
export function flow<A, B, C>(ab: Fn<A, B>, bc: Fn<B, C>): Fn<A, C>;
export function flow<A, B, C, D>(ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>): Fn<A, D>;
export function flow<A, B, C, D, E>(ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>, de: Fn<D, E>): Fn<A, E>;
export function flow(...fns: Array<Fn<unknown, unknown>>): Fn<unknown, unknown> {
  return (a) => fns.reduce((acc, fn) => fn(acc), a);
}

// =============================================================================
// Pipeable Option namespace
// =============================================================================

export const O = {
  /** Curried map for use in pipe() */
  map:
    <T, U extends {}>(fn: (value: T) => U) =>
    (o: Option<T>): Option<U> =>
      option.map(o, fn),

  /** Curried bind for use in pipe() */
  bind:
    <T, U>(fn: (value: T) => Option<U>) =>
    (o: Option<T>): Option<U> =>
      option.bind(o, fn),

  /** Curried filter for use in pipe() */
  filter:
    <T>(predicate: (value: T) => boolean) =>
    (o: Option<T>): Option<T> =>
      option.filter(o, predicate),

  /** Curried match for use in pipe() */
  match:
    <T, R>(onSome: (value: T) => R, onNone: () => R) =>
    (o: Option<T>): R =>
      option.match(o, onSome, onNone),

  /** Curried orElse for use in pipe() */
  orElse:
    <T>(fallback: Option<T>) =>
    (o: Option<T>): Option<T> =>
      option.orElse(o, fallback),

  /** Curried orElseWith for use in pipe() */
  orElseWith:
    <T>(factory: () => Option<T>) =>
    (o: Option<T>): Option<T> =>
      option.orElseWith(o, factory),

  /** Curried onSome for use in pipe() */
  onSome:
    <T>(fn: (value: T) => void) =>
    (o: Option<T>): Option<T> =>
      option.onSome(o, fn),

  /** Curried getValueOr for use in pipe() */
  getValueOr:
    <T>(defaultValue: T) =>
    (o: Option<T>): T =>
      option.getValueOr(o, defaultValue),

  /** Curried toResult for use in pipe() */
  toResult:
    (error?: ErrorLike) =>
    <T>(o: Option<T>): Result<T> =>
      option.toResult(o, error),
} as const;

// =============================================================================
// Pipeable Result namespace
// =============================================================================

export const R = {
  /** Curried map for use in pipe() */
  map:
    <T, U>(fn: (value: T) => U) =>
    (r: Result<T>): Result<U> =>
      result.map(r, fn),

  /** Curried mapError for use in pipe() */
  mapError:
    <T>(fn: (error: AppError) => ErrorLike) =>
    (r: Result<T>): Result<T> =>
      result.mapError(r, fn),

  /** Curried bind for use in pipe() */
  bind:
    <T, U>(fn: (value: T) => Result<U>) =>
    (r: Result<T>): Result<U> =>
      result.bind(r, fn),

  /** Curried bindUnit for use in pipe() */
  bindUnit:
    <T>(fn: (value: T) => UnitResult) =>
    (r: Result<T>): Result<T> =>
      result.bindUnit(r, fn),

  /** Curried ensure for use in pipe() */
  ensure:
    <T>(predicate: (value: T) => boolean, error: ErrorLike) =>
    (r: Result<T>): Result<T> =>
      result.ensure(r, predicate, error),

  /** Curried ensureAll for use in pipe() */
  ensureAll:
    (condition: boolean, error: ErrorLike) =>
    <T>(r: Result<T>): Result<T> =>
      result.ensureAll(r, condition, error),

  /** Curried match for use in pipe() */
  match:
    <T, U>(onSuccess: (value: T) => U, onFailure: (error: AppError) => U) =>
    (r: Result<T>): U =>
      result.match(r, onSuccess, onFailure),

  /** Curried onSuccess for use in pipe() */
  onSuccess:
    <T>(fn: (value: T) => void) =>
    (r: Result<T>): Result<T> =>
      result.onSuccess(r, fn),

  /** Curried onFailure for use in pipe() */
  onFailure:
    <T>(fn: (error: AppError) => void) =>
    (r: Result<T>): Result<T> =>
      result.onFailure(r, fn),

  /** Curried orElse for use in pipe() */
  orElse:
    <T>(fn: (error: AppError) => Result<T>) =>
    (r: Result<T>): Result<T> =>
      result.orElse(r, fn),

  /** Curried getValueOr for use in pipe() */
  getValueOr:
    <T>(defaultValue: T) =>
    (r: Result<T>): T =>
      result.getValueOr(r, defaultValue),
} as const;
