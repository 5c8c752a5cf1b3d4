/**
 * unionkit/predicates (internal)
 *
 * Predicates behind the named checks of FilterBuilder and EnsureBuilder.
 */

import { getConfig } from "./config";

/** Values the ordering checks accept. Dates compare by instant. */
export type Comparable = number | bigint | string | Date;

export type Numeric = number | bigint;

export const EMPTY_GUID = "00000000-0000-0000-0000-000000000000";

export const EMAIL_PATTERN = /^[\w.-]+@([\w-]+\.)+[\w-]{2,4}$/;

export const URL_PATTERN = /^https?:\/\/([\w-]+\.)+[\w-]+(\/[\w\- ./?%&=]*)?$/;

const isNaNValue = (value: number | bigint | string): boolean =>
  typeof value === "number" && Number.isNaN(value);

/** Negative, zero or positive; NaN when either side is NaN or an invalid Date. */
export function compareValues(a: Comparable, b: Comparable): number {
  const x = a instanceof Date ? a.getTime() : a;
  const y = b instanceof Date ? b.getTime() : b;
  if (typeof x === "string" || typeof y === "string") {
    const sx = String(x);
    const sy = String(y);
    return sx < sy ? -1 : sx > sy ? 1 : 0;
  }
  if (x < y) return -1;
  if (x > y) return 1;
  return isNaNValue(x) || isNaNValue(y) ? Number.NaN : 0;
}

/** `Object.is`, except that two Dates are equal when they hold the same instant. */
export const sameValue = (a: unknown, b: unknown): boolean =>
  a instanceof Date && b instanceof Date
    ? Object.is(a.getTime(), b.getTime())
    : Object.is(a, b);

export function inRange(
  value: Comparable,
  min: Comparable,
  minInclusive: boolean,
  max: Comparable,
  maxInclusive: boolean
): boolean {
  const low = compareValues(value, min);
  const high = compareValues(value, max);
  return (minInclusive ? low >= 0 : low > 0) && (maxInclusive ? high <= 0 : high < 0);
}

/**
 * -1, 0 or 1; NaN for NaN, so every sign comparison on it is false except
 * `!== 0`.
 */
export function signOf(value: Numeric): number {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return isNaNValue(value) ? Number.NaN : 0;
}

/** Calendar day in local time, as a sortable number. */
const dayKey = (date: Date): number =>
  date.getFullYear() * 10000 + (date.getMonth() + 1) * 100 + date.getDate();

export const isInFuture = (date: Date): boolean =>
  date.getTime() > getConfig().now().getTime();

export const isInPast = (date: Date): boolean =>
  date.getTime() < getConfig().now().getTime();

export const isTodayOrLater = (date: Date): boolean =>
  dayKey(date) >= dayKey(getConfig().now());

export const isTodayOrEarlier = (date: Date): boolean =>
  dayKey(date) <= dayKey(getConfig().now());

/**
 * Whether `value` is one of the enum's member values. Numeric enums also carry
 * reverse-mapping keys ("1" -> "Red"); those are not members.
 */
export function isDefinedIn(enumObject: object, value: unknown): boolean {
  return Object.entries(enumObject).some(
    ([key, member]) =>
      Number.isNaN(Number(key)) && Object.is(member, value)
  );
}

export const toRegExp = (pattern: RegExp | string): RegExp =>
  typeof pattern === "string" ? new RegExp(pattern) : pattern;

/** `search` ignores `lastIndex`, so global patterns behave like the others. */
export const matchesPattern = (value: string, pattern: RegExp | string): boolean =>
  value.search(toRegExp(pattern)) !== -1;

export const patternSource = (pattern: RegExp | string): string =>
  typeof pattern === "string" ? pattern : pattern.source;
