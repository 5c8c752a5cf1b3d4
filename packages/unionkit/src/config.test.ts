/**
 * Tests for config.ts
 */
import { afterEach, describe, it, expect, vi } from "vitest";
import { configure, getConfig, resetConfig } from "./config";
import { NotFoundError, ValidationError } from "./errors";
import { OptionErrors } from "./predefined-errors";
import { none, toResult } from "./option";
import { failure, getValueOrThrow } from "./result";

afterEach(() => {
  resetConfig();
});

describe("config", () => {
  it("has defaults", () => {
    const config = getConfig();
    expect(config.noneError).toBe(OptionErrors.None);
    expect(config.someError).toBe(OptionErrors.Some);
    expect(config.now()).toBeInstanceOf(Date);
  });

  it("merges overrides and keeps the rest", () => {
    const noneError = new NotFoundError("Thing.Missing", "Thing missing");
    configure({ noneError });
    expect(getConfig().noneError).toBe(noneError);
    expect(getConfig().someError).toBe(OptionErrors.Some);
  });

  it("ignores keys passed as undefined", () => {
    configure({ now: undefined });
    expect(getConfig().now()).toBeInstanceOf(Date);
  });

  it("feeds the configured none error to conversions", () => {
    const noneError = new NotFoundError("Thing.Missing", "Thing missing");
    configure({ noneError });
    const result = toResult(none());
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe(noneError);
  });

  it("a per-call error wins over the configured one", () => {
    configure({ noneError: new NotFoundError("unused") });
    const result = toResult(none(), new ValidationError("explicit"));
    if (result.ok) throw new Error("expected failure");
    expect(result.error.message).toBe("explicit");
  });

  it("sends escape-hatch lines to the logger", () => {
    const logger = vi.fn();
    configure({ logger });
    expect(() => getValueOrThrow(failure(new ValidationError("Age.Invalid", "Age invalid")))).toThrow(
      "Age invalid"
    );
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith("getValueOrThrow: ValidationError: Age.Invalid - Age invalid");
  });

  it("resetConfig restores defaults", () => {
    const logger = vi.fn();
    configure({ logger });
    resetConfig();
    expect(getConfig().logger).not.toBe(logger);
  });
});
