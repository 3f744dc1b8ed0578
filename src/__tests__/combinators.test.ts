import { describe, it, expect } from "vitest";
import {
  between,
  char,
  fail,
  furthest,
  lazy,
  map,
  merge,
  ok,
  positionAt,
  regex,
  sepBy1,
  seq,
  type TextParser,
} from "../combinators.js";

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("char", () => {
  it("matches a single character", () => {
    expect(char("=").parse("= x")).toEqual({ ok: true, value: "=", pos: 1, furthest: null });
  });

  it("fails with the quoted character as expectation", () => {
    expect(char("=").parse("x")).toEqual({ ok: false, pos: 0, expected: ["'='"] });
  });

  it("fails at end of input", () => {
    expect(char(";").parse("ab", 2)).toEqual({ ok: false, pos: 2, expected: ["';'"] });
  });
});

describe("regex", () => {
  it("matches at the given position only", () => {
    const word = regex(/[a-z]+/, "word");
    expect(word.parse("12abc", 2)).toEqual({ ok: true, value: "abc", pos: 5, furthest: null });
    expect(word.parse("12abc", 0)).toEqual({ ok: false, pos: 0, expected: ["word"] });
  });

  it("defaults the expectation to the pattern", () => {
    const r = regex(/\d+/).parse("x");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.expected).toEqual(["/\\d+/"]);
  });
});

// ---------------------------------------------------------------------------
// Furthest failure
// ---------------------------------------------------------------------------

describe("furthest", () => {
  it("keeps the failure at the larger offset", () => {
    const near = { pos: 1, expected: ["a"] };
    const far = { pos: 3, expected: ["b"] };
    expect(furthest(near, far)).toBe(far);
    expect(furthest(far, near)).toBe(far);
  });

  it("joins expectations at the same offset without repeats", () => {
    expect(furthest({ pos: 2, expected: ["a", "b"] }, { pos: 2, expected: ["b", "c"] })).toEqual({
      pos: 2,
      expected: ["a", "b", "c"],
    });
  });

  it("passes a lone failure through", () => {
    const only = { pos: 0, expected: ["a"] };
    expect(furthest(null, only)).toBe(only);
    expect(furthest(only, null)).toBe(only);
    expect(furthest(null, null)).toBeNull();
  });
});

describe("merge", () => {
  it("moves a failure forward to an earlier, further one", () => {
    expect(merge(fail(1, "x"), { pos: 3, expected: ["y"] })).toEqual({ ok: false, pos: 3, expected: ["y"] });
  });

  it("attaches an earlier failure to a success", () => {
    expect(merge(ok("v", 2), { pos: 2, expected: ["z"] })).toEqual({
      ok: true,
      value: "v",
      pos: 2,
      furthest: { pos: 2, expected: ["z"] },
    });
  });
});

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

describe("seq and map", () => {
  it("sequences two parsers", () => {
    expect(seq(char("a"), char("b")).parse("ab")).toEqual({ ok: true, value: ["a", "b"], pos: 2, furthest: null });
  });

  it("reports the failure of the second parser", () => {
    expect(seq(char("a"), char("b")).parse("ac")).toEqual({ ok: false, pos: 1, expected: ["'b'"] });
  });

  it("transforms the value", () => {
    const n = map(regex(/\d+/), Number);
    expect(n.parse("42")).toEqual({ ok: true, value: 42, pos: 2, furthest: null });
  });
});

describe("between", () => {
  it("keeps only the inner value", () => {
    const p = between(char("("), regex(/[a-z]+/), char(")"));
    expect(p.parse("(abc)")).toEqual({ ok: true, value: "abc", pos: 5, furthest: null });
  });

  it("fails on a missing closer", () => {
    const p = between(char("("), regex(/[a-z]+/), char(")"));
    expect(p.parse("(abc")).toEqual({ ok: false, pos: 4, expected: ["')'"] });
  });

  it("lists what could have continued the inner list", () => {
    const p = between(char("("), sepBy1(regex(/\d/, "digit"), char(",")), char(")"));
    expect(p.parse("(1,2]")).toEqual({ ok: false, pos: 4, expected: ["','", "')'"] });
  });
});

describe("sepBy1", () => {
  const list = sepBy1(regex(/\d/, "digit"), char(","));

  it("collects separated items and remembers the missing separator", () => {
    expect(list.parse("1,2,3")).toEqual({
      ok: true,
      value: ["1", "2", "3"],
      pos: 5,
      furthest: { pos: 5, expected: ["','"] },
    });
  });

  it("stops before a token that is not a separator", () => {
    expect(list.parse("1,2;")).toEqual({
      ok: true,
      value: ["1", "2"],
      pos: 3,
      furthest: { pos: 3, expected: ["','"] },
    });
  });

  it("requires an item after each separator", () => {
    expect(list.parse("1,2,x")).toEqual({ ok: false, pos: 4, expected: ["digit"] });
  });

  it("requires at least one item", () => {
    expect(list.parse("x")).toEqual({ ok: false, pos: 0, expected: ["digit"] });
  });
});

describe("lazy", () => {
  it("supports recursive definitions", () => {
    // nested = "(" nested ")" | "x"
    const nested: TextParser<number> = lazy(() => {
      const inner = map(between(char("("), nested, char(")")), (depth) => depth + 1);
      return {
        parse(input: string, pos = 0) {
          const r = inner.parse(input, pos);
          return r.ok ? r : map(char("x"), () => 0).parse(input, pos);
        },
      };
    });
    expect(nested.parse("((x))")).toEqual({ ok: true, value: 2, pos: 5, furthest: null });
  });
});

describe("positionAt", () => {
  it("counts lines and columns from 1", () => {
    expect(positionAt("ab\ncd", 0)).toEqual({ line: 1, column: 1, offset: 0 });
    expect(positionAt("ab\ncd", 2)).toEqual({ line: 1, column: 3, offset: 2 });
    expect(positionAt("ab\ncd", 4)).toEqual({ line: 2, column: 2, offset: 4 });
  });
});
