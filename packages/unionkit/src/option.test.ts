/**
 * Tests for option.ts
 */
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  some,
  none,
  from,
  isSome,
  isNone,
  unwrap,
  getValueOr,
  getValueOrElse,
  toNullable,
  toUndefined,
  equals,
  compare,
  format,
  map,
  bind,
  match,
  filter,
  where,
  orElse,
  orElseWith,
  onSome,
  onNone,
  onEither,
  toResult,
  ensureSome,
  ensureNone,
  mapTuple,
  bindTuple,
  matchTuple,
  filterTuple,
  onSomeTuple,
  sequence,
  traverse,
  partition,
  choose,
  chooseMap,
  zip,
  flatten,
  firstOrNone,
  lastOrNone,
  type Option,
} from "./option";
import { UnwrapError } from "./core";
import { configure, resetConfig } from "./config";
import { ValidationError } from "./errors";
import { OptionErrors } from "./predefined-errors";
import { toOption } from "./result";

afterEach(() => {
  resetConfig();
});

// =============================================================================
// Constructors & accessors
// =============================================================================

describe("constructors", () => {
  it("some holds a value", () => {
    const option = some(5);
    expect(option).toEqual({ some: true, value: 5 });
    expect(isSome(option)).toBe(true);
    expect(isNone(option)).toBe(false);
  });

  it("none is a single shared instance", () => {
    expect(none()).toBe(none());
    expect(isNone(none())).toBe(true);
    expect(isSome(none())).toBe(false);
  });

  it("some rejects nullish values from untyped callers", () => {
    expect(() => Reflect.apply(some, undefined, [null])).toThrow(TypeError);
    expect(() => Reflect.apply(some, undefined, [undefined])).toThrow(TypeError);
  });

  it("from lifts nullable values", () => {
    expect(from(null)).toBe(none());
    expect(from(undefined)).toBe(none());
    expect(from(0)).toEqual(some(0));
    expect(from("")).toEqual(some(""));
    expect(from(false)).toEqual(some(false));
  });
});

describe("accessors", () => {
  it("unwrap returns the value", () => {
    expect(unwrap(some("x"))).toBe("x");
  });

  it("unwrap throws on None and logs", () => {
    const logger = vi.fn();
    configure({ logger });
    expect(() => unwrap(none())).toThrow(UnwrapError);
    expect(() => unwrap(none())).toThrow("Option is None");
    expect(logger).toHaveBeenCalledWith("Option.unwrap: Option is None");
  });

  it("getValueOr / getValueOrElse", () => {
    const fallback = vi.fn(() => 9);
    expect(getValueOr(some(1), 0)).toBe(1);
    expect(getValueOr(none(), 0)).toBe(0);
    expect(getValueOrElse(some(1), fallback)).toBe(1);
    expect(fallback).not.toHaveBeenCalled();
    expect(getValueOrElse(none(), fallback)).toBe(9);
  });

  it("nullable views", () => {
    expect(toNullable(some(1))).toBe(1);
    expect(toNullable(none())).toBeNull();
    expect(toUndefined(none())).toBeUndefined();
  });
});

describe("equality, ordering and formatting", () => {
  it("equals", () => {
    expect(equals(some(1), some(1))).toBe(true);
    expect(equals(some(1), some(2))).toBe(false);
    expect(equals<number>(some(1), none())).toBe(false);
    expect(equals(none(), none())).toBe(true);
    expect(equals(some({ id: 1 }), some({ id: 1 }))).toBe(false);
    expect(equals(some({ id: 1 }), some({ id: 1 }), (a, b) => a.id === b.id)).toBe(true);
  });

  it("compare puts None first", () => {
    const byNumber = (a: number, b: number) => a - b;
    const sorted = [some(3), none(), some(1)].sort((a, b) => compare(a, b, byNumber));
    expect(sorted.map(format)).toEqual(["None", "Some(1)", "Some(3)"]);
    expect(compare(none(), none(), byNumber)).toBe(0);
  });

  it("format", () => {
    expect(format(some(42))).toBe("Some(42)");
    expect(format(none())).toBe("None");
  });
});

// =============================================================================
// Transformers
// =============================================================================

describe("map", () => {
  it("maps a present value", () => {
    expect(map(some(5), (x) => x * 2)).toEqual(some(10));
  });

  it("never changes presence", () => {
    const fn = vi.fn((x: number) => x + 1);
    expect(isNone(map(none(), fn))).toBe(true);
    expect(isSome(map(some(1), fn))).toBe(true);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("bind", () => {
  it("delegates to the function", () => {
    expect(bind(some(4), (x) => (x > 3 ? some(x * 2) : none()))).toEqual(some(8));
    expect(bind(some(1), (x) => (x > 3 ? some(x) : none()))).toBe(none());
  });

  it("does not invoke the function on None", () => {
    const fn = vi.fn((x: number) => some(x * 2));
    const empty: Option<number> = none();
    expect(bind(empty, fn)).toBe(none());
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("match", () => {
  it("runs exactly one branch", () => {
    const onSomeFn = vi.fn((x: number) => `some:${x}`);
    const onNoneFn = vi.fn(() => "none");
    expect(match(some(1), onSomeFn, onNoneFn)).toBe("some:1");
    expect(match(none(), onSomeFn, onNoneFn)).toBe("none");
    expect(onSomeFn).toHaveBeenCalledTimes(1);
    expect(onNoneFn).toHaveBeenCalledTimes(1);
  });
});

describe("filter", () => {
  it("keeps values that satisfy the predicate", () => {
    expect(filter(some(4), (x) => x % 2 === 0)).toEqual(some(4));
    expect(filter(some(3), (x) => x % 2 === 0)).toBe(none());
  });

  it("does not call the predicate on None", () => {
    const predicate = vi.fn(() => true);
    expect(filter(none(), predicate)).toBe(none());
    expect(predicate).not.toHaveBeenCalled();
  });

  it("where is filter", () => {
    expect(where(some(3), (x) => x > 2)).toEqual(some(3));
  });
});

describe("orElse", () => {
  it("returns self when present", () => {
    const option = some(1);
    expect(orElse(option, some(2))).toBe(option);
  });

  it("returns the fallback when absent", () => {
    expect(orElse(none(), some(2))).toEqual(some(2));
  });

  it("evaluates the factory lazily", () => {
    const factory = vi.fn(() => some(2));
    expect(orElseWith(some(1), factory)).toEqual(some(1));
    expect(factory).not.toHaveBeenCalled();
    expect(orElseWith(none(), factory)).toEqual(some(2));
    expect(factory).toHaveBeenCalledTimes(1);
  });
});

describe("side effects", () => {
  it("observers return the original option", () => {
    const seen: string[] = [];
    const present = some(1);
    expect(onSome(present, (x) => seen.push(`some:${x}`))).toBe(present);
    expect(onNone(present, () => seen.push("none"))).toBe(present);
    expect(onNone(none(), () => seen.push("none"))).toBe(none());
    expect(
      onEither(
        none(),
        () => seen.push("either-some"),
        () => seen.push("either-none")
      )
    ).toBe(none());
    expect(seen).toEqual(["some:1", "none", "either-none"]);
  });
});

// =============================================================================
// Conversion to Result
// =============================================================================

describe("toResult", () => {
  it("present becomes success", () => {
    expect(toResult(some(1))).toEqual({ ok: true, value: 1 });
  });

  it("absent uses the given error", () => {
    const error = new ValidationError("missing");
    const result = toResult(none(), error);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe(error);
  });

  it("absent defaults to OptionError.None", () => {
    const result = ensureSome(none());
    if (result.ok) throw new Error("expected failure");
    expect(result.error).toBe(OptionErrors.None);
    expect(result.error.toString()).toBe("ValidationError: OptionError.None - The value cannot be none.");
  });

  it("round-trips through toOption", () => {
    expect(toOption(toResult(some(7), "unused"))).toEqual(some(7));
    const failed = toResult(none(), "gone");
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error.message).toBe("gone");
  });
});

describe("ensureNone", () => {
  it("absent succeeds without a value", () => {
    expect(ensureNone(none())).toEqual({ ok: true });
  });

  it("present fails with OptionError.Some by default", () => {
    const result = ensureNone(some(1));
    if (result.ok) throw new Error("expected failure");
    expect(result.error).toBe(OptionErrors.Some);
  });

  it("present fails with the given error", () => {
    const result = ensureNone(some(1), "already set");
    if (result.ok) throw new Error("expected failure");
    expect(result.error.message).toBe("already set");
  });
});

// =============================================================================
// Tuple spreading
// =============================================================================

describe("tuple spreading", () => {
  const pair = zip(some(2), some("x"));

  it("mapTuple / bindTuple / matchTuple", () => {
    expect(mapTuple(pair, (n, s) => s.repeat(n))).toEqual(some("xx"));
    expect(bindTuple(pair, (n) => (n > 5 ? some(n) : none()))).toBe(none());
    expect(matchTuple(pair, (n, s) => `${s}${n}`, () => "none")).toBe("x2");
  });

  it("filterTuple / onSomeTuple", () => {
    expect(filterTuple(pair, (n) => n === 2)).toBe(pair);
    const fn = vi.fn();
    onSomeTuple(pair, fn);
    expect(fn).toHaveBeenCalledWith(2, "x");
  });

  it("spreads wider tuples", () => {
    const wide = some<[number, number, number, number, number, number, number, number]>([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(mapTuple(wide, (a, b, c, d, e, f, g, h) => a + b + c + d + e + f + g + h)).toEqual(some(36));
  });

  it("skips callbacks on None", () => {
    const fn = vi.fn(() => 1);
    const empty: Option<[number, string]> = none();
    expect(mapTuple(empty, fn)).toBe(none());
    expect(fn).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Collections
// =============================================================================

describe("sequence / traverse", () => {
  it("collects when all present", () => {
    expect(sequence([some(1), some(2)])).toEqual(some([1, 2]));
    expect(sequence([])).toEqual(some([]));
  });

  it("short-circuits on the first None", () => {
    const seen: number[] = [];
    function* options(): Generator<Option<number>> {
      seen.push(1);
      yield some(1);
      seen.push(2);
      yield none();
      seen.push(3);
      yield some(3);
    }
    expect(sequence(options())).toBe(none());
    expect(seen).toEqual([1, 2]);
  });

  it("traverse stops calling fn after a None", () => {
    const fn = vi.fn((x: number) => (x > 1 ? none() : some(x * 10)));
    expect(traverse([1, 2, 3], fn)).toBe(none());
    expect(fn).toHaveBeenCalledTimes(2);
    expect(traverse([0, 1], fn)).toEqual(some([0, 10]));
  });
});

describe("partition / choose", () => {
  const options = [some(1), none(), some(3), none()];

  it("partition counts absent values", () => {
    expect(partition(options)).toEqual({ values: [1, 3], noneCount: 2 });
  });

  it("choose keeps present values", () => {
    expect(choose(options)).toEqual([1, 3]);
  });

  it("chooseMap maps then keeps present values", () => {
    expect(chooseMap(["1", "x", "3"], (s) => from(Number.isNaN(Number(s)) ? null : Number(s)))).toEqual([1, 3]);
  });
});

describe("zip / flatten", () => {
  it("zips two and three options", () => {
    expect(zip(some(1), some("a"))).toEqual(some([1, "a"]));
    expect(zip(some(1), some("a"), some(true))).toEqual(some([1, "a", true]));
  });

  it("absent when any input is absent", () => {
    expect(zip(some(1), none())).toBe(none());
    expect(zip(none(), some(1))).toBe(none());
    expect(zip(some(1), some(2), none())).toBe(none());
  });

  it("flatten collapses nesting", () => {
    expect(flatten(some(some(1)))).toEqual(some(1));
    expect(flatten(some(none()))).toBe(none());
    expect(flatten(none())).toBe(none());
  });
});

describe("firstOrNone / lastOrNone", () => {
  it("picks by position", () => {
    expect(firstOrNone([4, 5, 6])).toEqual(some(4));
    expect(lastOrNone([4, 5, 6])).toEqual(some(6));
  });

  it("picks by predicate", () => {
    const even = (x: number) => x % 2 === 0;
    expect(firstOrNone([1, 2, 3, 4], even)).toEqual(some(2));
    expect(lastOrNone([1, 2, 3, 4], even)).toEqual(some(4));
  });

  it("absent on empty or no match", () => {
    expect(firstOrNone([])).toBe(none());
    expect(lastOrNone([1, 3], (x) => x > 5)).toBe(none());
  });
});
