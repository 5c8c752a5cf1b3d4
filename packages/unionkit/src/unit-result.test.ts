/**
 * Tests for unit-result.ts
 */
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  success,
  failure,
  from,
  check,
  isSuccess,
  isFailure,
  unwrapError,
  throwIfFailure,
  format,
  bind,
  bindValue,
  ensure,
  match,
  onSuccess,
  onFailure,
  onEither,
  withValue,
  withValueFrom,
  combine,
  sequence,
  traverse,
  bindEach,
  checkEach,
  bindAll,
  ensureAll,
  checkAll,
  combineAll,
  collectAll,
  partition,
  countSuccesses,
  countFailures,
  extractErrors,
  type UnitResult,
} from "./unit-result";
import * as Result from "./result";
import { ResultFailureError, UnwrapError } from "./core";
import { configure, resetConfig } from "./config";
import { AggregateError, ConflictError, ValidationError } from "./errors";
import type { AppError } from "./errors";

afterEach(() => {
  resetConfig();
});

const messagesOf = (result: UnitResult): string[] => {
  if (result.ok) return [];
  const { error } = result;
  return error instanceof AggregateError ? error.errors.map((e) => e.message) : [error.message];
};

describe("constructors", () => {
  it("success carries nothing", () => {
    expect(success()).toEqual({ ok: true });
    expect(isSuccess(success())).toBe(true);
  });

  it("failure lifts strings", () => {
    const failed = failure("nope");
    expect(isFailure(failed)).toBe(true);
    expect(failed.error.toString()).toBe("AppError: nope");
  });

  it("from drops a value", () => {
    expect(from(Result.success(5))).toEqual({ ok: true });
    expect(messagesOf(from(Result.failure("x")))).toEqual(["x"]);
  });

  it("check follows the condition", () => {
    expect(check(true, "unused")).toEqual({ ok: true });
    expect(messagesOf(check(false, "Age invalid"))).toEqual(["Age invalid"]);
  });
});

describe("accessors", () => {
  it("unwrapError", () => {
    const error = new ConflictError("taken");
    expect(unwrapError(failure(error))).toBe(error);
    expect(() => unwrapError(success())).toThrow(UnwrapError);
    expect(() => unwrapError(success())).toThrow("Result is not in a failure state.");
  });

  it("throwIfFailure returns on success", () => {
    expect(() => throwIfFailure(success())).not.toThrow();
  });

  it("throwIfFailure throws the error's message", () => {
    const logger = vi.fn();
    configure({ logger });
    expect(() => throwIfFailure(failure(new ValidationError("Name required")))).toThrow(
      ResultFailureError
    );
    expect(logger).toHaveBeenCalledWith("throwIfFailure: ValidationError: Name required");
  });

  it("throwIfFailure honors the selector", () => {
    expect(() => throwIfFailure(failure("x"), (e) => new TypeError(e.message))).toThrow(TypeError);
  });

  it("format", () => {
    expect(format(success())).toBe("Success");
    expect(format(failure("x"))).toBe("Failure: AppError: x");
  });
});

describe("short-circuit", () => {
  it("bind runs next only after success", () => {
    const next = vi.fn(() => failure("second"));
    expect(messagesOf(bind(failure("first"), next))).toEqual(["first"]);
    expect(next).not.toHaveBeenCalled();
    expect(messagesOf(bind(success(), next))).toEqual(["second"]);
  });

  it("bindValue continues into a valued step", () => {
    expect(bindValue(success(), () => Result.success(7))).toEqual(Result.success(7));
    expect(bindValue(failure("x"), () => Result.success(7)).ok).toBe(false);
  });

  it("ensure skips the predicate after a failure", () => {
    const predicate = vi.fn(() => true);
    const failed = failure("first");
    expect(ensure(failed, predicate, "second")).toBe(failed);
    expect(predicate).not.toHaveBeenCalled();
    expect(messagesOf(ensure(success(), () => false, "second"))).toEqual(["second"]);
  });

  it("match", () => {
    expect(match(success(), () => "ok", (e) => e.message)).toBe("ok");
    expect(match(failure("bad"), () => "ok", (e) => e.message)).toBe("bad");
  });

  it("observers", () => {
    const seen: string[] = [];
    onSuccess(success(), () => seen.push("ok"));
    onSuccess(failure("x"), () => seen.push("never"));
    onFailure(failure("x"), (e) => seen.push(`err:${e.message}`));
    onEither(success(), () => seen.push("either-ok"), () => seen.push("either-err"));
    expect(seen).toEqual(["ok", "err:x", "either-ok"]);
  });

  it("withValue / withValueFrom", () => {
    expect(withValue(success(), "v")).toEqual(Result.success("v"));
    const factory = vi.fn(() => "v");
    expect(withValueFrom(failure("x"), factory).ok).toBe(false);
    expect(factory).not.toHaveBeenCalled();
  });

  it("combine / sequence return the first failure", () => {
    expect(combine(success(), success())).toEqual({ ok: true });
    expect(messagesOf(combine(success(), failure("a"), failure("b")))).toEqual(["a"]);
    expect(messagesOf(sequence([failure("a"), failure("b")]))).toEqual(["a"]);
  });

  it("traverse stops at the first failing item", () => {
    const fn = vi.fn((item: string) => check(item !== "", `empty at ${item.length}`));
    expect(messagesOf(traverse(["a", "", "c"], fn))).toEqual(["empty at 0"]);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("bindEach evaluates steps lazily", () => {
    const third = vi.fn(() => success());
    const result = bindEach(
      () => success(),
      () => failure("Name required"),
      third
    );
    expect(messagesOf(result)).toEqual(["Name required"]);
    expect(third).not.toHaveBeenCalled();
  });

  it("checkEach reports only the first false predicate", () => {
    const later = vi.fn(() => false);
    const result = checkEach([() => true, "unused"], [() => false, "Name required"], [later, "Age invalid"]);
    expect(messagesOf(result)).toEqual(["Name required"]);
    expect(later).not.toHaveBeenCalled();
  });
});

describe("accumulating", () => {
  it("bindAll table", () => {
    expect(bindAll(success(), success())).toEqual({ ok: true });
    expect(messagesOf(bindAll(success(), failure("b")))).toEqual(["b"]);
    expect(messagesOf(bindAll(failure("a"), success()))).toEqual(["a"]);
    expect(messagesOf(bindAll(failure("a"), failure("b")))).toEqual(["a", "b"]);
  });

  it("bindAll continues into a valued result", () => {
    expect(bindAll(success(), Result.success(3))).toEqual(Result.success(3));
    const merged = bindAll(failure("a"), Result.failure("b"));
    expect(merged.ok).toBe(false);
    if (!merged.ok) expect(merged.error).toBeInstanceOf(AggregateError);
  });

  it("ensureAll adds to existing failures", () => {
    expect(ensureAll(success(), true, "x")).toEqual({ ok: true });
    expect(messagesOf(ensureAll(failure("a"), false, "b"))).toEqual(["a", "b"]);
  });

  it("checkAll reports every false condition in order", () => {
    const input = { name: "", age: -1, email: "a@b.co" };
    const result = checkAll(
      [input.name !== "", new ValidationError("Name required")],
      [input.age >= 0, new ValidationError("Age invalid")],
      [input.email.includes("@"), new ValidationError("Email invalid")]
    );
    expect(messagesOf(result)).toEqual(["Name required", "Age invalid"]);
    expect(checkAll([true, "a"], [true, "b"])).toEqual({ ok: true });
  });

  it("a single failed condition stays unwrapped", () => {
    const error = new ValidationError("Age invalid");
    const result = checkAll([true, "unused"], [false, error]);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe(error);
  });

  it("combineAll / collectAll flatten nested aggregates", () => {
    const nested = failure(new AggregateError([new ValidationError("a"), new ValidationError("b")]));
    expect(messagesOf(combineAll(nested, success(), failure("c")))).toEqual(["a", "b", "c"]);
    expect(collectAll([success(), success()])).toEqual({ ok: true });
  });
});

describe("partition", () => {
  const results: UnitResult[] = [success(), failure("a"), success(), failure("b"), success()];

  it("counts and extracts", () => {
    const { successCount, errors } = partition(results);
    expect(successCount).toBe(3);
    expect(errors.map((e: AppError) => e.message)).toEqual(["a", "b"]);
    expect(countSuccesses(results)).toBe(3);
    expect(countFailures(results)).toBe(2);
    expect(extractErrors(results).map((e) => e.message)).toEqual(["a", "b"]);
  });
});
