/**
 * unionkit/config
 *
 * Process-wide defaults. Every default here can also be overridden per call
 * (e.g. `Option.toResult(option, error)`), which always wins.
 */

import type { AppError } from "./errors";
import { OptionErrors } from "./predefined-errors";

export interface UnionkitConfig {
  /** Error used when an absent Option is converted to a failed Result. */
  noneError: AppError;
  /** Error used by `ensureNone` when the Option is present. */
  someError: AppError;
  /** Clock used by the date checks. */
  now: () => Date;
  /**
   * Receives one line whenever an unchecked accessor or escape hatch throws.
   * Defaults to a no-op; the library never writes to the console itself.
   */
  logger: (message: string) => void;
}

const defaults = (): UnionkitConfig => ({
  noneError: OptionErrors.None,
  someError: OptionErrors.Some,
  now: () => new Date(),
  logger: () => {},
});

let current: Readonly<UnionkitConfig> = Object.freeze(defaults());

/**
 * Overrides some defaults. Unspecified keys keep their current value.
 *
 * @example
 * ```typescript
 * configure({ logger: (line) => console.warn(line) });
 * ```
 */
export function configure(overrides: Partial<UnionkitConfig>): void {
  current = Object.freeze({
    noneError: overrides.noneError ?? current.noneError,
    someError: overrides.someError ?? current.someError,
    now: overrides.now ?? current.now,
    logger: overrides.logger ?? current.logger,
  });
}

export function getConfig(): Readonly<UnionkitConfig> {
  return current;
}

/** Restores every default. */
export function resetConfig(): void {
  current = Object.freeze(defaults());
}
