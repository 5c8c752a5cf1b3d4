/**
 * unionkit/errors
 *
 * Error values carried by failed Results. Errors here are plain immutable
 * values, not thrown exceptions: they have a machine-readable code, a
 * human-readable message and, for most variants, key/value metadata.
 *
 * The hierarchy is closed. Every error has a `_tag` so callers can match
 * exhaustively with `matchError`.
 *
 * @example
 * ```typescript
 * import { ValidationError, NotFoundError, matchError } from 'unionkit/errors';
 *
 * const error = new ValidationError('User.Email', 'Email is invalid', { field: 'email' });
 * error.toString(); // "ValidationError: User.Email - Email is invalid - Metadata: field: email"
 *
 * matchError(error, {
 *   AppError: (e) => 500,
 *   ValidationError: (e) => 400,
 *   NotFoundError: () => 404,
 *   ConflictError: () => 409,
 *   AuthenticationError: () => 401,
 *   AuthorizationError: () => 403,
 *   AggregateError: () => 400,
 * });
 * ```
 */

// =============================================================================
// Tags
// =============================================================================

/** All error variants, in the order used by `errorTags`. */
export const errorTags = [
  "AppError",
  "ValidationError",
  "NotFoundError",
  "ConflictError",
  "AuthenticationError",
  "AuthorizationError",
  "AggregateError",
] as const;

export type ErrorTag = (typeof errorTags)[number];

/** Metadata accepted by constructors. Copied on construction. */
export type MetadataInput =
  | Readonly<Record<string, unknown>>
  | ReadonlyMap<string, unknown>;

const EMPTY_METADATA: ReadonlyMap<string, unknown> = new Map();

const toMetadataMap = (
  input: MetadataInput | undefined
): ReadonlyMap<string, unknown> => {
  if (input === undefined) return EMPTY_METADATA;
  if (input instanceof Map) return new Map(input);
  return new Map(Object.entries(input));
};

const sameMetadata = (
  a: ReadonlyMap<string, unknown>,
  b: ReadonlyMap<string, unknown>
): boolean => {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (!b.has(key) || !Object.is(b.get(key), value)) return false;
  }
  return true;
};

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error value. `code` defaults to the empty string.
 *
 * @example
 * ```typescript
 * new AppError('Something went wrong').toString(); // "AppError: Something went wrong"
 * new AppError('Order.Locked', 'Order is locked').toString(); // "AppError: Order.Locked - Order is locked"
 * ```
 */
export class AppError {
  readonly _tag: ErrorTag = "AppError";
  readonly code: string;
  readonly message: string;

  constructor(codeOrMessage: string, message?: string) {
    if (message === undefined) {
      this.code = "";
      this.message = codeOrMessage;
    } else {
      this.code = codeOrMessage;
      this.message = message;
    }
  }

  /** Key/value metadata in insertion order. Empty unless the variant carries it. */
  get metadata(): ReadonlyMap<string, unknown> {
    return EMPTY_METADATA;
  }

  /**
   * Type-exact equality: a subtype never equals its base even when code and
   * message match.
   */
  equals(other: AppError): boolean {
    if (this === other) return true;
    return (
      this.constructor === other.constructor &&
      this.code === other.code &&
      this.message === other.message &&
      sameMetadata(this.metadata, other.metadata)
    );
  }

  /** Prefixed with the runtime class name, so subclasses render as themselves. */
  toString(): string {
    const name = this.constructor.name;
    return this.code === ""
      ? `${name}: ${this.message}`
      : `${name}: ${this.code} - ${this.message}`;
  }
}

// =============================================================================
// Errors with metadata
// =============================================================================

/**
 * Base for the variants that carry structured metadata.
 * Metadata keeps insertion order and is read-only after construction.
 */
export abstract class ErrorWithMetadata extends AppError {
  private readonly entries: ReadonlyMap<string, unknown>;

  constructor(message: string);
  constructor(code: string, message: string, metadata?: MetadataInput);
  constructor(codeOrMessage: string, message?: string, metadata?: MetadataInput) {
    super(codeOrMessage, message);
    this.entries = toMetadataMap(metadata);
  }

  override get metadata(): ReadonlyMap<string, unknown> {
    return this.entries;
  }

  override toString(): string {
    const base = super.toString();
    if (this.metadata.size === 0) return base;
    const entries = Array.from(
      this.metadata,
      ([key, value]) => `${key}: ${String(value)}`
    ).join(", ");
    return `${base} - Metadata: ${entries}`;
  }
}

/** Input failed validation. Also the type of every predefined check error. */
export class ValidationError extends ErrorWithMetadata {
  override readonly _tag = "ValidationError" as const;
}

/** A requested entity does not exist. */
export class NotFoundError extends ErrorWithMetadata {
  override readonly _tag = "NotFoundError" as const;
}

/** The operation conflicts with current state (duplicate key, stale version). */
export class ConflictError extends ErrorWithMetadata {
  override readonly _tag = "ConflictError" as const;
}

/** The caller could not be identified. */
export class AuthenticationError extends ErrorWithMetadata {
  override readonly _tag = "AuthenticationError" as const;
}

/** The caller is identified but not allowed. */
export class AuthorizationError extends ErrorWithMetadata {
  override readonly _tag = "AuthorizationError" as const;
}

// =============================================================================
// Aggregate
// =============================================================================

export const AGGREGATE_CODE = "Errors.Aggregate";
export const AGGREGATE_MESSAGE = "Multiple errors occurred.";

/**
 * Several failures reported at once. Children are flattened on construction,
 * so an aggregate never contains another aggregate.
 *
 * Normally produced by `ErrorBuilder` or an accumulating combinator rather
 * than constructed directly.
 */
export class AggregateError extends AppError {
  override readonly _tag = "AggregateError" as const;
  readonly errors: readonly AppError[];

  constructor(errors: Iterable<AppError>) {
    super(AGGREGATE_CODE, AGGREGATE_MESSAGE);
    const flat: AppError[] = [];
    for (const error of errors) {
      if (error instanceof AggregateError) flat.push(...error.errors);
      else flat.push(error);
    }
    if (flat.length === 0) {
      throw new RangeError("AggregateError requires at least one error");
    }
    this.errors = flat;
  }

  override equals(other: AppError): boolean {
    if (!(other instanceof AggregateError) || !super.equals(other)) return false;
    if (this.errors.length !== other.errors.length) return false;
    return this.errors.every((error, i) => {
      const peer = other.errors[i];
      return peer !== undefined && error.equals(peer);
    });
  }

  override toString(): string {
    const children = this.errors.map((e) => e.toString()).join(", ");
    return `${super.toString()} ( ${children} )`;
  }
}

// =============================================================================
// Lifting & type guards
// =============================================================================

/** Anything accepted where an error is expected. Strings become `AppError`. */
export type ErrorLike = AppError | string;

/**
 * Lifts a string into a base `AppError` with an empty code.
 */
export const toError = (error: ErrorLike): AppError =>
  typeof error === "string" ? new AppError(error) : error;

export const isAppError = (value: unknown): value is AppError =>
  value instanceof AppError;

export const isValidationError = (value: unknown): value is ValidationError =>
  value instanceof ValidationError;

export const isNotFoundError = (value: unknown): value is NotFoundError =>
  value instanceof NotFoundError;

export const isConflictError = (value: unknown): value is ConflictError =>
  value instanceof ConflictError;

export const isAuthenticationError = (
  value: unknown
): value is AuthenticationError => value instanceof AuthenticationError;

export const isAuthorizationError = (
  value: unknown
): value is AuthorizationError => value instanceof AuthorizationError;

export const isAggregateError = (value: unknown): value is AggregateError =>
  value instanceof AggregateError;

// =============================================================================
// Matching
// =============================================================================

export type ErrorHandlers<R> = {
  AppError: (error: AppError) => R;
  ValidationError: (error: ValidationError) => R;
  NotFoundError: (error: NotFoundError) => R;
  ConflictError: (error: ConflictError) => R;
  AuthenticationError: (error: AuthenticationError) => R;
  AuthorizationError: (error: AuthorizationError) => R;
  AggregateError: (error: AggregateError) => R;
};

/**
 * Exhaustive dispatch over the error variants.
 * User subclasses dispatch to the handler of the variant they extend.
 */
export function matchError<R>(error: AppError, handlers: ErrorHandlers<R>): R {
  if (error instanceof ValidationError) return handlers.ValidationError(error);
  if (error instanceof NotFoundError) return handlers.NotFoundError(error);
  if (error instanceof ConflictError) return handlers.ConflictError(error);
  if (error instanceof AuthenticationError) {
    return handlers.AuthenticationError(error);
  }
  if (error instanceof AuthorizationError) {
    return handlers.AuthorizationError(error);
  }
  if (error instanceof AggregateError) return handlers.AggregateError(error);
  return handlers.AppError(error);
}

// =============================================================================
// Reconstruction
// =============================================================================

const isErrorTag = (tag: string): tag is ErrorTag =>
  errorTags.some((known) => known === tag);

/**
 * Rebuilds an error from an external discriminator, e.g. when reading a
 * serialized payload. Unknown tags fall back to `AppError`, which drops the
 * metadata. Aggregates cannot be rebuilt this way since they need children:
 * rebuild each child and pass them to `new AggregateError(children)`.
 */
export function createError(
  tag: string,
  code: string,
  message: string,
  metadata?: MetadataInput
): AppError {
  const known: ErrorTag = isErrorTag(tag) ? tag : "AppError";
  switch (known) {
    case "ValidationError":
      return new ValidationError(code, message, metadata);
    case "NotFoundError":
      return new NotFoundError(code, message, metadata);
    case "ConflictError":
      return new ConflictError(code, message, metadata);
    case "AuthenticationError":
      return new AuthenticationError(code, message, metadata);
    case "AuthorizationError":
      return new AuthorizationError(code, message, metadata);
    case "AggregateError":
      throw new TypeError(
        "createError cannot rebuild an AggregateError; construct it from its children"
      );
    case "AppError":
      return new AppError(code, message);
  }
}
