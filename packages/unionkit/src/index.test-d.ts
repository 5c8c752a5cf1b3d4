/**
 * Type tests for unionkit
 * Checked by `tsc --noEmit` with the rest of the tree.
 */
import { expectType } from "tsd";
import {
  Option,
  Result,
  UnitResult,
  AggregateError,
  ValidationError,
  matchError,
  pipe,
  R,
  type AppError,
  type EnsureBuilder,
  type FilterBuilder,
} from "./index";

// =============================================================================
// Option
// =============================================================================

expectType<Option<number>>(Option.map(Option.some(1), (x) => x + 1));
expectType<Option<string>>(Option.from<string | null>(null));
expectType<Option<[number, string]>>(Option.zip(Option.some(1), Option.some("a")));
expectType<number | null>(Option.toNullable(Option.some(1)));

const lookup = (): Option<number> => Option.none();
const maybe = lookup();
if (Option.isSome(maybe)) {
  expectType<number>(maybe.value);
}

// =============================================================================
// Result
// =============================================================================

expectType<Result<[number, string, boolean]>>(
  Result.combine(Result.success(1), Result.success("a"), Result.success(true))
);
expectType<Result<[number, string]>>(
  Result.combineAll(Result.success(1), Result.success("a"))
);
expectType<Result<string>>(Result.bind(Result.success(1), (n) => Result.success(String(n))));
expectType<Result<string>>(Result.ensureNotNull<string>("x"));

const pair = Result.combine(Result.success(2), Result.success("b"));
expectType<Result<string>>(Result.mapTuple(pair, (n, s) => s.repeat(n)));
expectType<Result<[number, string, boolean]>>(
  Result.bindAppend(pair, (n) => Result.success(n > 1))
);
expectType<Result<number>>(Result.bindTuple(pair, (n) => Result.success(n)));
expectType<Option<string>>(
  Option.mapTuple(Option.zip(Option.some(1), Option.some("a")), (n) => String(n))
);

const started = Result.map(Result.success(2), (v) => [v] as const);
expectType<Result<readonly [number]>>(started);
expectType<Result<[number, string]>>(Result.bindAppend(started, (n) => Result.success(`x${n}`)));
expectType<Result<[number, string]>>(Result.bindAllAppend(started, Result.success("y")));

const compute = (): Result<number> => Result.success(1);
const outcome = compute();
if (outcome.ok) {
  expectType<number>(outcome.value);
} else {
  expectType<AppError>(outcome.error);
}

// =============================================================================
// UnitResult
// =============================================================================

expectType<UnitResult>(UnitResult.checkAll([true, "a"], [false, "b"]));
expectType<Result<number>>(UnitResult.bindAll(UnitResult.success(), Result.success(1)));
expectType<UnitResult>(UnitResult.bindAll(UnitResult.success(), UnitResult.success()));
expectType<Result<string>>(UnitResult.withValue(UnitResult.success(), "v"));

// =============================================================================
// Builders
// =============================================================================

expectType<FilterBuilder<string>>(Option.filterThat("abc").notEmpty());
expectType<Option<number>>(Option.filterThat("abc").notEmpty().map((s) => s.length));
expectType<EnsureBuilder<number>>(Result.ensureThat(3).positive());
expectType<Result<string>>(Result.ensureThat<string | null>("x").notNull().build());
expectType<Result<number>>(Result.ensureThat(Option.some(3)).someValue());

// =============================================================================
// Errors & pipelines
// =============================================================================

expectType<string>(
  matchError(new ValidationError("x"), {
    AppError: (e) => e.message,
    ValidationError: (e) => e.code,
    NotFoundError: (e) => e.code,
    ConflictError: (e) => e.code,
    AuthenticationError: (e) => e.code,
    AuthorizationError: (e) => e.code,
    AggregateError: (e: AggregateError) => String(e.errors.length),
  })
);

expectType<number>(
  pipe(
    Result.success(2),
    R.map((n: number) => n * 2),
    R.getValueOr(0)
  )
);
