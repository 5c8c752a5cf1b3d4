/**
 * unionkit
 *
 * Option and Result as plain discriminated unions, an error model, and
 * combinators in two families: short-circuit (stop at the first failure) and
 * accumulate (report every failure as one AggregateError).
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Result, UnitResult, ValidationError } from 'unionkit';
 *
 * function parseAge(raw: string): Result<number> {
 *   return Result.ensureThat(Number(raw))
 *     .check(Number.isInteger, new ValidationError('Age.NotInteger', 'Age must be a whole number'))
 *     .inRange(0, true, 150, false)
 *     .build();
 * }
 *
 * const form = UnitResult.checkAll(
 *   [name !== '', 'Name required'],
 *   [Result.isSuccess(parseAge(age)), 'Age invalid'],
 * );
 * ```
 *
 * ## Entry Points
 *
 * - `unionkit` - `Option`, `Result`, `UnitResult` namespaces plus named exports
 * - `unionkit/result` - Result functions only
 * - `unionkit/option` - Option functions only
 * - `unionkit/errors` - error classes and guards
 * - `unionkit/functional` - pipe/flow and the curried `O` / `R` namespaces
 */

import type {
  Option as OptionType,
  Result as ResultType,
  UnitResult as UnitResultType,
} from "./core";
import * as option from "./option";
import * as result from "./result";
import * as unitResult from "./unit-result";
import { filterBuilder, filterThat } from "./filter-builder";
import { ensureBuilder, ensureThat } from "./ensure-builder";

// =============================================================================
// Namespaces
// =============================================================================

export const Option = {
  ...option,
  filterBuilder,
  filterThat,
} as const;

export const Result = {
  ...result,
  ensureBuilder,
  ensureThat,
} as const;

export const UnitResult = {
  ...unitResult,
} as const;

// =============================================================================
// Named exports
// =============================================================================

export {
  AppError,
  ErrorWithMetadata,
  ValidationError,
  NotFoundError,
  ConflictError,
  AuthenticationError,
  AuthorizationError,
  AggregateError,
  AGGREGATE_CODE,
  AGGREGATE_MESSAGE,
  errorTags,
  toError,
  isAppError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isAuthenticationError,
  isAuthorizationError,
  isAggregateError,
  matchError,
  createError,
} from "./errors";

export { ErrorBuilder, NoErrorsAccumulatedError } from "./error-builder";

export { UnwrapError, ResultFailureError } from "./core";

export {
  BooleanErrors,
  DateTimeErrors,
  EnumErrors,
  GeneralErrors,
  GuidErrors,
  NumericErrors,
  OptionErrors,
  StringErrors,
} from "./predefined-errors";

export { configure, getConfig, resetConfig } from "./config";

export { filterBuilder, filterThat } from "./filter-builder";
export { ensureBuilder, ensureThat } from "./ensure-builder";

export { pipe, flow, O, R } from "./functional";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

// Same names as the namespaces above: `Option<T>` is the type, `Option.some` the value.
export type Option<T> = OptionType<T>;
export type Result<T> = ResultType<T>;
export type UnitResult = UnitResultType;

export type { Some, None, Ok, Err, OkUnit } from "./core";

export type {
  ErrorTag,
  ErrorLike,
  ErrorHandlers,
  MetadataInput,
} from "./errors";

export type { UnionkitConfig } from "./config";
export type { Comparable, Numeric } from "./predicates";
export type { FilterBuilder } from "./filter-builder";
export type { EnsureBuilder } from "./ensure-builder";
