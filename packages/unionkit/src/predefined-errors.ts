/**
 * unionkit/predefined-errors
 *
 * Default `ValidationError`s used by the named checks on `EnsureBuilder`
 * and by the Option/Result conversions. Each can be overridden per call.
 */

import { ValidationError } from "./errors";

const inclusiveWord = (inclusive: boolean, word: string): string =>
  inclusive ? `${word} or equal to` : word;

export const BooleanErrors = {
  NotTrue: new ValidationError("BooleanError.NotTrue", "The value must be true."),
  NotFalse: new ValidationError("BooleanError.NotFalse", "The value must be false."),
} as const;

export const DateTimeErrors = {
  NotInPast: (kind: string) =>
    new ValidationError("DateTimeError.NotInPast", `${kind} should be in the past.`),
  NotInFuture: (kind: string) =>
    new ValidationError("DateTimeError.NotInFuture", `${kind} should be in the future.`),
  DateInPast: new ValidationError("DateTimeError.InPast", "Date cannot be in the past."),
  DateInFuture: new ValidationError("DateTimeError.InFuture", "Date cannot be in the future."),
} as const;

export const EnumErrors = {
  NotDefined: new ValidationError("EnumError.NotDefined", "The value is not defined."),
} as const;

export const GeneralErrors = {
  NotEqual: new ValidationError("Error.NotEqual", "Value must be equal to the expected value."),
  Equal: new ValidationError("Error.Equal", "Value must not be equal to the expected value."),
  Null: new ValidationError("Error.Null", "Value cannot be null."),
  NotNull: new ValidationError("Error.NotNull", "Value must be null."),
  PredicateFailed: new ValidationError(
    "Error.PredicateFailed",
    "The value did not satisfy the specified condition."
  ),
} as const;

export const GuidErrors = {
  NotEmpty: new ValidationError("GuidError.NotEmpty", "Value must be empty."),
  Empty: new ValidationError("GuidError.Empty", "Value cannot be empty."),
} as const;

type Bound = number | bigint | string | Date;

const showBound = (bound: Bound): string =>
  bound instanceof Date ? bound.toISOString() : String(bound);

export const NumericErrors = {
  TooSmall: (min: Bound, inclusive: boolean) =>
    new ValidationError(
      "NumericError.TooSmall",
      `Value must be ${inclusiveWord(inclusive, "greater than")} ${showBound(min)}.`
    ),
  TooLarge: (max: Bound, inclusive: boolean) =>
    new ValidationError(
      "NumericError.TooLarge",
      `Value must be ${inclusiveWord(inclusive, "less than")} ${showBound(max)}.`
    ),
  OutOfRange: (min: Bound, minInclusive: boolean, max: Bound, maxInclusive: boolean) =>
    new ValidationError(
      "NumericError.OutOfRange",
      `Value must be ${inclusiveWord(minInclusive, "greater than")} ${showBound(min)} ` +
        `and ${inclusiveWord(maxInclusive, "less than")} ${showBound(max)}.`
    ),
  NotPositive: new ValidationError("NumericError.NotPositive", "Value must be positive."),
  NotNegative: new ValidationError("NumericError.NotNegative", "Value must be negative."),
  NotZero: new ValidationError("NumericError.NotZero", "Value must be zero."),
  Zero: new ValidationError("NumericError.Zero", "Value cannot be zero."),
  Positive: new ValidationError("NumericError.Positive", "Value cannot be positive."),
  Negative: new ValidationError("NumericError.Negative", "Value cannot be negative."),
} as const;

export const OptionErrors = {
  Some: new ValidationError("OptionError.Some", "The value cannot be some."),
  None: new ValidationError("OptionError.None", "The value cannot be none."),
} as const;

export const StringErrors = {
  NotEmpty: new ValidationError("StringError.NotEmpty", "String must be empty."),
  Empty: new ValidationError("StringError.Empty", "String cannot be empty."),
  Blank: new ValidationError("StringError.Blank", "String cannot be blank."),
  InvalidLength: (length: number) =>
    new ValidationError(
      "StringError.InvalidLength",
      `String must have exactly ${length} characters.`
    ),
  TooShort: (length: number, inclusive: boolean) =>
    new ValidationError(
      "StringError.TooShort",
      `String must be ${inclusive ? "at least" : "longer than"} ${length} characters.`
    ),
  TooLong: (length: number, inclusive: boolean) =>
    new ValidationError(
      "StringError.TooLong",
      `String must be ${inclusive ? "at most" : "shorter than"} ${length} characters.`
    ),
  NotMatch: (pattern: string) =>
    new ValidationError("StringError.NotMatch", `String must match the pattern '${pattern}'.`),
  Match: (pattern: string) =>
    new ValidationError("StringError.Match", `String cannot match the pattern '${pattern}'.`),
  NotContain: (value: string) =>
    new ValidationError("StringError.NotContain", `String must contain '${value}'.`),
  Contain: (value: string) =>
    new ValidationError("StringError.Contain", `String cannot contain '${value}'.`),
  NotStartWith: (value: string) =>
    new ValidationError("StringError.NotStartWith", `String must start with '${value}'.`),
  StartWith: (value: string) =>
    new ValidationError("StringError.StartWith", `String cannot start with '${value}'.`),
  NotEndWith: (value: string) =>
    new ValidationError("StringError.NotEndWith", `String must end with '${value}'.`),
  EndWith: (value: string) =>
    new ValidationError("StringError.EndWith", `String cannot end with '${value}'.`),
  InvalidEmail: new ValidationError("StringError.InvalidEmail", "String must be a valid email address."),
  InvalidUrl: new ValidationError("StringError.InvalidUrl", "String must be a valid URL."),
} as const;
