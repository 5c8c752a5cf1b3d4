/**
 * unionkit/error-builder
 *
 * Accumulates errors and collapses them into a single `AppError`: nothing,
 * the only error, or an `AggregateError` over all of them in append order.
 *
 * @example
 * ```typescript
 * const errors = new ErrorBuilder()
 *   .appendOnFailure(validateName(input))
 *   .appendOnFailure(validateAge(input));
 *
 * return errors.hasErrors ? failure(errors.build()) : success(input);
 * ```
 */

import type { Option, UnitResult } from "./core";
import { noneOf, someOf } from "./core";
import type { AppError, ErrorLike } from "./errors";
import { AggregateError, toError } from "./errors";

/**
 * Thrown by `ErrorBuilder.build()` when nothing was appended.
 */
export class NoErrorsAccumulatedError extends Error {
  constructor() {
    super("No errors to build.");
    this.name = "NoErrorsAccumulatedError";
  }
}

export class ErrorBuilder {
  private readonly errors: AppError[] = [];

  /** Appends an error. An aggregate contributes its children instead. */
  append(error: ErrorLike): this {
    const lifted = toError(error);
    if (lifted instanceof AggregateError) this.errors.push(...lifted.errors);
    else this.errors.push(lifted);
    return this;
  }

  /** Appends the result's error when it failed; successes are ignored. */
  appendOnFailure(result: UnitResult): this {
    if (!result.ok) this.append(result.error);
    return this;
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }

  get count(): number {
    return this.errors.length;
  }

  /**
   * Collapses the accumulated errors without throwing.
   * Zero errors give `None`.
   */
  tryBuild(): Option<AppError> {
    const [first] = this.errors;
    if (first === undefined) return noneOf();
    if (this.errors.length === 1) return someOf(first);
    return someOf(new AggregateError(this.errors));
  }

  /**
   * Collapses the accumulated errors.
   *
   * @throws NoErrorsAccumulatedError when nothing was appended
   */
  build(): AppError {
    const built = this.tryBuild();
    if (!built.some) throw new NoErrorsAccumulatedError();
    return built.value;
  }
}
