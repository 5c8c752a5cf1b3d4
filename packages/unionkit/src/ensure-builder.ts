/**
 * unionkit/ensure-builder
 *
 * Deferred validation for Results. Same state machine as FilterBuilder, but
 * the Disqualified state carries an error: the source failure, or the error
 * of the first check that failed. Every named check has a default
 * `ValidationError` that an explicit `error` argument replaces.
 *
 * Obtain one with `Result.ensureBuilder(result)` or `Result.ensureThat(value)`
 * and collapse it in the same expression.
 *
 * @example
 * ```typescript
 * const age = Result.ensureThat(input.age)
 *   .nonNegative()
 *   .lessThan(150, new ValidationError("Age.Range", "Age is not plausible"))
 *   .build(); // Result<number>
 * ```
 */

import type { Option, Result, UnitResult } from "./core";
import { errOf, okOf, okUnit } from "./core";
import { getConfig } from "./config";
import type { ErrorLike } from "./errors";
import {
  BooleanErrors,
  DateTimeErrors,
  EnumErrors,
  GeneralErrors,
  GuidErrors,
  NumericErrors,
  StringErrors,
} from "./predefined-errors";
import type { Comparable, Numeric } from "./predicates";
import {
  compareValues,
  EMAIL_PATTERN,
  EMPTY_GUID,
  inRange,
  isDefinedIn,
  isInFuture,
  isInPast,
  isTodayOrEarlier,
  isTodayOrLater,
  matchesPattern,
  patternSource,
  sameValue,
  signOf,
  URL_PATTERN,
} from "./predicates";
import { bind, bindAll, ensureNotNull, ensureNotNullOrEmpty, ensureNotNullOrWhiteSpace } from "./result";

export class EnsureBuilder<T> {
  private readonly state: Result<T>;

  constructor(state: Result<T>) {
    this.state = state;
  }

  get eligible(): boolean {
    return this.state.ok;
  }

  /**
   * Keeps the builder eligible only when the predicate holds; otherwise
   * disqualifies it with `error`. The predicate is not called once
   * disqualified, and the first error is kept.
   */
  check(
    predicate: (value: T) => boolean,
    error: ErrorLike = GeneralErrors.PredicateFailed
  ): EnsureBuilder<T> {
    if (!this.state.ok || predicate(this.state.value)) return this;
    return new EnsureBuilder<T>(errOf(error));
  }

  /** Collapses to the value when eligible, the recorded failure otherwise. */
  build(): Result<T> {
    return this.state;
  }

  map<U>(fn: (value: T) => U): Result<U> {
    return this.state.ok ? okOf(fn(this.state.value)) : this.state;
  }

  bind<U>(fn: (value: T) => Result<U>): Result<U> {
    return this.state.ok ? fn(this.state.value) : this.state;
  }

  /** Accumulating collapse: reports both this builder's failure and `next`'s. */
  bindAll<U>(next: Result<U>): Result<U> {
    return bindAll(this.state, next);
  }

  // ===========================================================================
  // Presence
  // ===========================================================================

  notNull<V>(
    this: EnsureBuilder<V | null | undefined>,
    error: ErrorLike = GeneralErrors.Null
  ): EnsureBuilder<NonNullable<V>> {
    return new EnsureBuilder(bind(this.state, (v) => ensureNotNull(v, error)));
  }

  notNullOrEmpty(
    this: EnsureBuilder<string | null | undefined>,
    error: ErrorLike = StringErrors.Empty
  ): EnsureBuilder<string> {
    return new EnsureBuilder(bind(this.state, (v) => ensureNotNullOrEmpty(v, error)));
  }

  notNullOrWhiteSpace(
    this: EnsureBuilder<string | null | undefined>,
    error: ErrorLike = StringErrors.Empty
  ): EnsureBuilder<string> {
    return new EnsureBuilder(bind(this.state, (v) => ensureNotNullOrWhiteSpace(v, error)));
  }

  /** Terminal: unwraps a present Option, failing on `None`. */
  someValue<V>(this: EnsureBuilder<Option<V>>, error?: ErrorLike): Result<V> {
    if (!this.state.ok) return this.state;
    const option = this.state.value;
    return option.some ? okOf(option.value) : errOf(error ?? getConfig().noneError);
  }

  /** Terminal: succeeds without a value when the Option is `None`. */
  noneValue<V>(this: EnsureBuilder<Option<V>>, error?: ErrorLike): UnitResult {
    if (!this.state.ok) return this.state;
    return this.state.value.some ? errOf(error ?? getConfig().someError) : okUnit();
  }

  // ===========================================================================
  // Strings
  // ===========================================================================

  empty(this: EnsureBuilder<string>, error: ErrorLike = StringErrors.NotEmpty): EnsureBuilder<string> {
    return this.check((v) => v.length === 0, error);
  }

  notEmpty(this: EnsureBuilder<string>, error: ErrorLike = StringErrors.Empty): EnsureBuilder<string> {
    return this.check((v) => v.length > 0, error);
  }

  notBlank(this: EnsureBuilder<string>, error: ErrorLike = StringErrors.Blank): EnsureBuilder<string> {
    return this.check((v) => v.trim().length > 0, error);
  }

  hasLength(this: EnsureBuilder<string>, length: number, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => v.length === length, error ?? StringErrors.InvalidLength(length));
  }

  longerThan(this: EnsureBuilder<string>, length: number, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => v.length > length, error ?? StringErrors.TooShort(length, false));
  }

  longerThanOrEqualTo(
    this: EnsureBuilder<string>,
    length: number,
    error?: ErrorLike
  ): EnsureBuilder<string> {
    return this.check((v) => v.length >= length, error ?? StringErrors.TooShort(length, true));
  }

  shorterThan(this: EnsureBuilder<string>, length: number, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => v.length < length, error ?? StringErrors.TooLong(length, false));
  }

  shorterThanOrEqualTo(
    this: EnsureBuilder<string>,
    length: number,
    error?: ErrorLike
  ): EnsureBuilder<string> {
    return this.check((v) => v.length <= length, error ?? StringErrors.TooLong(length, true));
  }

  matches(this: EnsureBuilder<string>, pattern: RegExp | string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check(
      (v) => matchesPattern(v, pattern),
      error ?? StringErrors.NotMatch(patternSource(pattern))
    );
  }

  notMatch(this: EnsureBuilder<string>, pattern: RegExp | string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check(
      (v) => !matchesPattern(v, pattern),
      error ?? StringErrors.Match(patternSource(pattern))
    );
  }

  contains(this: EnsureBuilder<string>, part: string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => v.includes(part), error ?? StringErrors.NotContain(part));
  }

  notContain(this: EnsureBuilder<string>, part: string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => !v.includes(part), error ?? StringErrors.Contain(part));
  }

  startsWith(this: EnsureBuilder<string>, prefix: string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => v.startsWith(prefix), error ?? StringErrors.NotStartWith(prefix));
  }

  notStartWith(this: EnsureBuilder<string>, prefix: string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => !v.startsWith(prefix), error ?? StringErrors.StartWith(prefix));
  }

  endsWith(this: EnsureBuilder<string>, suffix: string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => v.endsWith(suffix), error ?? StringErrors.NotEndWith(suffix));
  }

  notEndWith(this: EnsureBuilder<string>, suffix: string, error?: ErrorLike): EnsureBuilder<string> {
    return this.check((v) => !v.endsWith(suffix), error ?? StringErrors.EndWith(suffix));
  }

  email(this: EnsureBuilder<string>, error: ErrorLike = StringErrors.InvalidEmail): EnsureBuilder<string> {
    return this.check((v) => EMAIL_PATTERN.test(v), error);
  }

  url(this: EnsureBuilder<string>, error: ErrorLike = StringErrors.InvalidUrl): EnsureBuilder<string> {
    return this.check((v) => URL_PATTERN.test(v), error);
  }

  emptyGuid(this: EnsureBuilder<string>, error: ErrorLike = GuidErrors.NotEmpty): EnsureBuilder<string> {
    return this.check((v) => v === EMPTY_GUID, error);
  }

  notEmptyGuid(this: EnsureBuilder<string>, error: ErrorLike = GuidErrors.Empty): EnsureBuilder<string> {
    return this.check((v) => v !== EMPTY_GUID, error);
  }

  // ===========================================================================
  // Ordering & sign
  // ===========================================================================

  greaterThan<C extends Comparable>(this: EnsureBuilder<C>, min: C, error?: ErrorLike): EnsureBuilder<C> {
    return this.check((v) => compareValues(v, min) > 0, error ?? NumericErrors.TooSmall(min, false));
  }

  greaterThanOrEqualTo<C extends Comparable>(
    this: EnsureBuilder<C>,
    min: C,
    error?: ErrorLike
  ): EnsureBuilder<C> {
    return this.check((v) => compareValues(v, min) >= 0, error ?? NumericErrors.TooSmall(min, true));
  }

  lessThan<C extends Comparable>(this: EnsureBuilder<C>, max: C, error?: ErrorLike): EnsureBuilder<C> {
    return this.check((v) => compareValues(v, max) < 0, error ?? NumericErrors.TooLarge(max, false));
  }

  lessThanOrEqualTo<C extends Comparable>(
    this: EnsureBuilder<C>,
    max: C,
    error?: ErrorLike
  ): EnsureBuilder<C> {
    return this.check((v) => compareValues(v, max) <= 0, error ?? NumericErrors.TooLarge(max, true));
  }

  inRange<C extends Comparable>(
    this: EnsureBuilder<C>,
    min: C,
    minInclusive: boolean,
    max: C,
    maxInclusive: boolean,
    error?: ErrorLike
  ): EnsureBuilder<C> {
    return this.check(
      (v) => inRange(v, min, minInclusive, max, maxInclusive),
      error ?? NumericErrors.OutOfRange(min, minInclusive, max, maxInclusive)
    );
  }

  positive<N extends Numeric>(this: EnsureBuilder<N>, error: ErrorLike = NumericErrors.NotPositive): EnsureBuilder<N> {
    return this.check((v) => signOf(v) > 0, error);
  }

  negative<N extends Numeric>(this: EnsureBuilder<N>, error: ErrorLike = NumericErrors.NotNegative): EnsureBuilder<N> {
    return this.check((v) => signOf(v) < 0, error);
  }

  zero<N extends Numeric>(this: EnsureBuilder<N>, error: ErrorLike = NumericErrors.NotZero): EnsureBuilder<N> {
    return this.check((v) => signOf(v) === 0, error);
  }

  nonZero<N extends Numeric>(this: EnsureBuilder<N>, error: ErrorLike = NumericErrors.Zero): EnsureBuilder<N> {
    return this.check((v) => signOf(v) !== 0, error);
  }

  nonPositive<N extends Numeric>(this: EnsureBuilder<N>, error: ErrorLike = NumericErrors.Positive): EnsureBuilder<N> {
    return this.check((v) => signOf(v) <= 0, error);
  }

  nonNegative<N extends Numeric>(this: EnsureBuilder<N>, error: ErrorLike = NumericErrors.Negative): EnsureBuilder<N> {
    return this.check((v) => signOf(v) >= 0, error);
  }

  // ===========================================================================
  // Dates (against the configured clock)
  // ===========================================================================

  inFuture(this: EnsureBuilder<Date>, error?: ErrorLike): EnsureBuilder<Date> {
    return this.check(isInFuture, error ?? DateTimeErrors.NotInFuture("Date"));
  }

  inPast(this: EnsureBuilder<Date>, error?: ErrorLike): EnsureBuilder<Date> {
    return this.check(isInPast, error ?? DateTimeErrors.NotInPast("Date"));
  }

  inFutureOrPresent(this: EnsureBuilder<Date>, error: ErrorLike = DateTimeErrors.DateInPast): EnsureBuilder<Date> {
    return this.check(isTodayOrLater, error);
  }

  inPastOrPresent(this: EnsureBuilder<Date>, error: ErrorLike = DateTimeErrors.DateInFuture): EnsureBuilder<Date> {
    return this.check(isTodayOrEarlier, error);
  }

  // ===========================================================================
  // Misc
  // ===========================================================================

  definedIn<V extends string | number>(
    this: EnsureBuilder<V>,
    enumObject: object,
    error: ErrorLike = EnumErrors.NotDefined
  ): EnsureBuilder<V> {
    return this.check((v) => isDefinedIn(enumObject, v), error);
  }

  isTrue(this: EnsureBuilder<boolean>, error: ErrorLike = BooleanErrors.NotTrue): EnsureBuilder<boolean> {
    return this.check((v) => v, error);
  }

  isFalse(this: EnsureBuilder<boolean>, error: ErrorLike = BooleanErrors.NotFalse): EnsureBuilder<boolean> {
    return this.check((v) => !v, error);
  }

  equalTo(expected: T, error: ErrorLike = GeneralErrors.NotEqual): EnsureBuilder<T> {
    return this.check((v) => sameValue(v, expected), error);
  }

  notEqualTo(unexpected: T, error: ErrorLike = GeneralErrors.Equal): EnsureBuilder<T> {
    return this.check((v) => !sameValue(v, unexpected), error);
  }
}

/** Starts deferred validation of a Result. A failure starts disqualified. */
export const ensureBuilder = <T>(result: Result<T>): EnsureBuilder<T> =>
  new EnsureBuilder(result);

/** Starts deferred validation of a plain value. */
export const ensureThat = <T>(value: T): EnsureBuilder<T> =>
  new EnsureBuilder<T>(okOf(value));
