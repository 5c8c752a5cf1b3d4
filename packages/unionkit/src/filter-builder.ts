/**
 * unionkit/filter-builder
 *
 * Deferred validation for Options. A builder is either Eligible (it still
 * holds the value) or Disqualified (a check failed, or the source was None).
 * Once disqualified, later checks are no-ops and their predicates never run.
 *
 * Obtain one with `Option.filterBuilder(option)` or `Option.filterThat(value)`
 * and collapse it in the same expression with `build()`, `map()` or `bind()`.
 * Do not store or pass a builder around.
 *
 * @example
 * ```typescript
 * const username = Option.filterThat(input.trim())
 *   .notEmpty()
 *   .longerThanOrEqualTo(3)
 *   .matches(/^[a-z0-9_]+$/)
 *   .build(); // Option<string>
 * ```
 */

import type { Option } from "./core";
import { noneOf, someOf } from "./core";
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
  sameValue,
  signOf,
  URL_PATTERN,
} from "./predicates";

export class FilterBuilder<T> {
  private readonly state: Option<T>;

  constructor(state: Option<T>) {
    this.state = state;
  }

  /** False once any check has failed or when the source was absent. */
  get eligible(): boolean {
    return this.state.some;
  }

  /**
   * Keeps the builder eligible only when the predicate holds.
   * The predicate is not called once disqualified.
   */
  check(predicate: (value: T) => boolean): FilterBuilder<T> {
    if (!this.state.some || predicate(this.state.value)) return this;
    return new FilterBuilder<T>(noneOf());
  }

  /** Collapses to the value when eligible, `None` otherwise. */
  build(): Option<T> {
    return this.state;
  }

  map<U extends {}>(fn: (value: T) => U): Option<U> {
    return this.state.some ? someOf(fn(this.state.value)) : noneOf();
  }

  bind<U>(fn: (value: T) => Option<U>): Option<U> {
    return this.state.some ? fn(this.state.value) : noneOf();
  }

  // ===========================================================================
  // Strings
  // ===========================================================================

  empty(this: FilterBuilder<string>): FilterBuilder<string> {
    return this.check((v) => v.length === 0);
  }

  notEmpty(this: FilterBuilder<string>): FilterBuilder<string> {
    return this.check((v) => v.length > 0);
  }

  /** Not empty and not only whitespace. */
  notBlank(this: FilterBuilder<string>): FilterBuilder<string> {
    return this.check((v) => v.trim().length > 0);
  }

  hasLength(this: FilterBuilder<string>, length: number): FilterBuilder<string> {
    return this.check((v) => v.length === length);
  }

  longerThan(this: FilterBuilder<string>, length: number): FilterBuilder<string> {
    return this.check((v) => v.length > length);
  }

  longerThanOrEqualTo(this: FilterBuilder<string>, length: number): FilterBuilder<string> {
    return this.check((v) => v.length >= length);
  }

  shorterThan(this: FilterBuilder<string>, length: number): FilterBuilder<string> {
    return this.check((v) => v.length < length);
  }

  shorterThanOrEqualTo(this: FilterBuilder<string>, length: number): FilterBuilder<string> {
    return this.check((v) => v.length <= length);
  }

  matches(this: FilterBuilder<string>, pattern: RegExp | string): FilterBuilder<string> {
    return this.check((v) => matchesPattern(v, pattern));
  }

  notMatch(this: FilterBuilder<string>, pattern: RegExp | string): FilterBuilder<string> {
    return this.check((v) => !matchesPattern(v, pattern));
  }

  contains(this: FilterBuilder<string>, part: string): FilterBuilder<string> {
    return this.check((v) => v.includes(part));
  }

  notContain(this: FilterBuilder<string>, part: string): FilterBuilder<string> {
    return this.check((v) => !v.includes(part));
  }

  startsWith(this: FilterBuilder<string>, prefix: string): FilterBuilder<string> {
    return this.check((v) => v.startsWith(prefix));
  }

  notStartWith(this: FilterBuilder<string>, prefix: string): FilterBuilder<string> {
    return this.check((v) => !v.startsWith(prefix));
  }

  endsWith(this: FilterBuilder<string>, suffix: string): FilterBuilder<string> {
    return this.check((v) => v.endsWith(suffix));
  }

  notEndWith(this: FilterBuilder<string>, suffix: string): FilterBuilder<string> {
    return this.check((v) => !v.endsWith(suffix));
  }

  email(this: FilterBuilder<string>): FilterBuilder<string> {
    return this.check((v) => EMAIL_PATTERN.test(v));
  }

  url(this: FilterBuilder<string>): FilterBuilder<string> {
    return this.check((v) => URL_PATTERN.test(v));
  }

  emptyGuid(this: FilterBuilder<string>): FilterBuilder<string> {
    return this.check((v) => v === EMPTY_GUID);
  }

  notEmptyGuid(this: FilterBuilder<string>): FilterBuilder<string> {
    return this.check((v) => v !== EMPTY_GUID);
  }

  // ===========================================================================
  // Ordering & sign
  // ===========================================================================

  greaterThan<C extends Comparable>(this: FilterBuilder<C>, min: C): FilterBuilder<C> {
    return this.check((v) => compareValues(v, min) > 0);
  }

  greaterThanOrEqualTo<C extends Comparable>(this: FilterBuilder<C>, min: C): FilterBuilder<C> {
    return this.check((v) => compareValues(v, min) >= 0);
  }

  lessThan<C extends Comparable>(this: FilterBuilder<C>, max: C): FilterBuilder<C> {
    return this.check((v) => compareValues(v, max) < 0);
  }

  lessThanOrEqualTo<C extends Comparable>(this: FilterBuilder<C>, max: C): FilterBuilder<C> {
    return this.check((v) => compareValues(v, max) <= 0);
  }

  inRange<C extends Comparable>(
    this: FilterBuilder<C>,
    min: C,
    minInclusive: boolean,
    max: C,
    maxInclusive: boolean
  ): FilterBuilder<C> {
    return this.check((v) => inRange(v, min, minInclusive, max, maxInclusive));
  }

  positive<N extends Numeric>(this: FilterBuilder<N>): FilterBuilder<N> {
    return this.check((v) => signOf(v) > 0);
  }

  negative<N extends Numeric>(this: FilterBuilder<N>): FilterBuilder<N> {
    return this.check((v) => signOf(v) < 0);
  }

  zero<N extends Numeric>(this: FilterBuilder<N>): FilterBuilder<N> {
    return this.check((v) => signOf(v) === 0);
  }

  nonZero<N extends Numeric>(this: FilterBuilder<N>): FilterBuilder<N> {
    return this.check((v) => signOf(v) !== 0);
  }

  nonPositive<N extends Numeric>(this: FilterBuilder<N>): FilterBuilder<N> {
    return this.check((v) => signOf(v) <= 0);
  }

  nonNegative<N extends Numeric>(this: FilterBuilder<N>): FilterBuilder<N> {
    return this.check((v) => signOf(v) >= 0);
  }

  // ===========================================================================
  // Dates (against the configured clock)
  // ===========================================================================

  inFuture(this: FilterBuilder<Date>): FilterBuilder<Date> {
    return this.check(isInFuture);
  }

  inPast(this: FilterBuilder<Date>): FilterBuilder<Date> {
    return this.check(isInPast);
  }

  /** Today (by calendar day) or later. */
  inFutureOrPresent(this: FilterBuilder<Date>): FilterBuilder<Date> {
    return this.check(isTodayOrLater);
  }

  /** Today (by calendar day) or earlier. */
  inPastOrPresent(this: FilterBuilder<Date>): FilterBuilder<Date> {
    return this.check(isTodayOrEarlier);
  }

  // ===========================================================================
  // Misc
  // ===========================================================================

  /** The value is a member of the given enum object. */
  definedIn<V extends string | number>(this: FilterBuilder<V>, enumObject: object): FilterBuilder<V> {
    return this.check((v) => isDefinedIn(enumObject, v));
  }

  isTrue(this: FilterBuilder<boolean>): FilterBuilder<boolean> {
    return this.check((v) => v);
  }

  isFalse(this: FilterBuilder<boolean>): FilterBuilder<boolean> {
    return this.check((v) => !v);
  }

  /** `Object.is` equality; Dates compare by instant. */
  equalTo(expected: T): FilterBuilder<T> {
    return this.check((v) => sameValue(v, expected));
  }

  notEqualTo(unexpected: T): FilterBuilder<T> {
    return this.check((v) => !sameValue(v, unexpected));
  }
}

/** Starts deferred validation of an Option. */
export const filterBuilder = <T>(option: Option<T>): FilterBuilder<T> =>
  new FilterBuilder(option);

/** Starts deferred validation of a present value. */
export const filterThat = <T extends {}>(value: T): FilterBuilder<T> =>
  new FilterBuilder<T>(someOf(value));
