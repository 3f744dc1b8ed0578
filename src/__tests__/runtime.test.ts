import { describe, it, expect } from "vitest";
import { load } from "../loader.js";
import { validate } from "../validator.js";
import { build, type ChoicePlan, type ParserModel } from "../model.js";
import { emit, type EmitOptions, type ParserObject } from "../emitter.js";
import { parse, parseOrThrow, type ParseOutcome } from "../runtime.js";
import { formatTree } from "../syntax.js";
import {
  ParseSyntaxError,
  RecursionDepthExceededError,
  TrailingInputError,
  UndefinedRuleError,
  type ParseError,
} from "../errors.js";
import type { Token } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** One token per kind, laid out on one line with one column each. */
function tokens(...kinds: string[]): Token[] {
  return kinds.map((kind, i) => ({ kind, text: kind, position: { line: 1, column: i + 1, offset: i } }));
}

function parserFor(source: string, options?: EmitOptions): ParserObject {
  return emit(build(validate(load(source))), options);
}

function tree(source: string, ...kinds: string[]): string {
  const outcome = parserFor(source).parse(tokens(...kinds));
  if (!outcome.ok) throw outcome.error;
  return formatTree(outcome.tree);
}

function failure(outcome: ParseOutcome): ParseError {
  if (outcome.ok) throw new Error(`expected a failure, got ${formatTree(outcome.tree)}`);
  return outcome.error;
}

/** The same model with every rule-level choice forced to try alternatives in order. */
function ordered(model: ParserModel): ParserModel {
  const rules = new Map(
    [...model.rules].map(([name, rule]) => {
      const body: ChoicePlan = { ...rule.body, strategy: "ordered" };
      return [name, { ...rule, body }] as const;
    })
  );
  return { ...model, rules };
}

// ---------------------------------------------------------------------------
// Terms
// ---------------------------------------------------------------------------

describe("literals and sequences", () => {
  it("matches tokens by kind", () => {
    const outcome = parserFor(`pair = "(" , "x" , ")" ;`).parse(tokens("(", "x", ")"));
    expect(outcome).toEqual({ ok: true, tree: { type: "node", tag: "pair", children: tokens("(", "x", ")") } });
  });

  it("nests a node per rule reference", () => {
    expect(tree(`list = item , item ; item = "x" ;`, "x", "x")).toBe("list(item(x) item(x))");
  });

  it("does not leak a failed sequence's tokens", () => {
    expect(tree(`r = ( "a" , "b" ) | ( "a" , "c" ) ;`, "a", "c")).toBe("r(a c)");
  });
});

describe("repetition", () => {
  const list = `list = "[" , { "x" } , "]" ;`;

  it("collects every iteration", () => {
    expect(tree(list, "[", "x", "x", "]")).toBe("list([ {x; x} ])");
  });

  it("accepts zero iterations", () => {
    expect(tree(list, "[", "]")).toBe("list([ {} ])");
  });

  it("requires one iteration for the '-' form", () => {
    const parser = parserFor(`list = { "x" }- ;`);
    expect(formatTree(parseOrThrow(parser, tokens("x", "x")))).toBe("list({x; x})");
    const error = failure(parser.parse([]));
    expect(error).toBeInstanceOf(ParseSyntaxError);
    if (error instanceof ParseSyntaxError) {
      expect(error.expected).toEqual(["x"]);
      expect(error.actual).toBeNull();
      expect(error.position).toEqual({ line: 1, column: 1, offset: 0 });
    }
  });

  it("is greedy and never gives iterations back", () => {
    const error = failure(parserFor(`r = { "a" } , "a" ;`).parse(tokens("a", "a")));
    expect(error).toBeInstanceOf(ParseSyntaxError);
    if (error instanceof ParseSyntaxError) {
      expect(error.expected).toEqual(["a"]);
      expect(error.actual).toBeNull();
    }
  });
});

describe("optional", () => {
  const source = `r = [ "a" ] , "b" ;`;

  it("records an absent match", () => {
    expect(tree(source, "b")).toBe("r([] b)");
  });

  it("records a present match", () => {
    expect(tree(source, "a", "b")).toBe("r([a] b)");
  });
});

describe("exception", () => {
  const source = `r = letter - "x" ; letter = "x" | "y" ;`;

  it("matches where the excluded term does not", () => {
    expect(tree(source, "y")).toBe("r(letter(y))");
  });

  it("fails where the excluded term matches", () => {
    const error = failure(parserFor(source).parse(tokens("x")));
    expect(error).toBeInstanceOf(ParseSyntaxError);
    if (error instanceof ParseSyntaxError) expect(error.expected).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Choice
// ---------------------------------------------------------------------------

describe("choice", () => {
  it("commits to the earlier alternative on overlap", () => {
    const source = `r = first | second ; first = "x" , "y" ; second = "x" , "y" ;`;
    const parser = parserFor(source);
    expect(parser.model.warnings).toHaveLength(1);
    expect(formatTree(parseOrThrow(parser, tokens("x", "y")))).toBe("r(first(x y))");
  });

  it("does not revisit a committed alternative", () => {
    const source = `r = first | second ; first = "x" ; second = "x" , "y" ;`;
    const error = failure(parserFor(source).parse(tokens("x", "y")));
    expect(error).toBeInstanceOf(TrailingInputError);
    if (error instanceof TrailingInputError) {
      expect(error.token.text).toBe("y");
      expect(error.expected).toEqual([]);
    }
  });

  it("gives the same results with both strategies", () => {
    const model = build(validate(load(`r = "a" , "b" | "c" , { "d" } | [ "e" ] , "f" ;`)));
    const predictive = emit(model);
    const backtracking = emit(ordered(model));
    expect(model.rules.get("r")?.body.strategy).toBe("predictive");

    const inputs = [["a", "b"], ["c", "d", "d"], ["f"], ["e", "f"], ["a", "c"], ["d"], []];
    for (const input of inputs) {
      expect(predictive.parse(tokens(...input))).toEqual(backtracking.parse(tokens(...input)));
    }
  });
});

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

describe("diagnostics", () => {
  it("reports the furthest failure", () => {
    const error = failure(parserFor(`r = "a" , "b" , "c" | "a" , "d" ;`).parse(tokens("a", "b", "x")));
    expect(error).toBeInstanceOf(ParseSyntaxError);
    if (error instanceof ParseSyntaxError) {
      expect(error.expected).toEqual(["c"]);
      expect(error.actual?.text).toBe("x");
      expect(error.position).toEqual({ line: 1, column: 3, offset: 2 });
    }
  });

  it("merges expectations recorded at the same token", () => {
    const error = failure(parserFor(`r = "a" , ( "b" | "c" ) ;`).parse(tokens("a", "x")));
    expect(error.message).toBe('Parse error at line 1, col 2: expected "b" or "c", found "x"');
  });

  it("positions end-of-input failures after the last token", () => {
    const error = failure(parserFor(`r = "a" , "b" ;`).parse(tokens("a")));
    expect(error.position).toEqual({ line: 1, column: 2, offset: 1 });
    expect(error.message).toBe('Parse error at line 1, col 2: expected "b", found end of input');
  });

  it("prefers a failure past the matched prefix over leftover input", () => {
    const error = failure(parserFor(`r = "a" , { "b" , "c" } ;`).parse(tokens("a", "b", "x")));
    expect(error).toBeInstanceOf(ParseSyntaxError);
    if (error instanceof ParseSyntaxError) {
      expect(error.expected).toEqual(["c"]);
      expect(error.actual?.text).toBe("x");
      expect(error.position).toEqual({ line: 1, column: 3, offset: 2 });
    }
  });

  it("rejects leftover tokens", () => {
    const error = failure(parserFor(`r = "a" , { "b" } ;`).parse(tokens("a", "b", "c")));
    expect(error).toBeInstanceOf(TrailingInputError);
    if (error instanceof TrailingInputError) {
      expect(error.expected).toEqual(["b"]);
      expect(error.position).toEqual({ line: 1, column: 3, offset: 2 });
      expect(error.message).toBe('Parse error at line 1, col 3: expected end of input, found "c"');
    }
  });
});

// ---------------------------------------------------------------------------
// Infix rules
// ---------------------------------------------------------------------------

describe("infix alternatives", () => {
  const source = `typ = var | ( typ , "->" , typ ) ; var = "a" | "b" | "c" ;`;

  it("nest to the right", () => {
    expect(tree(source, "a", "->", "b", "->", "c")).toBe("typ(typ(var(a)) -> typ(typ(var(b)) -> typ(var(c))))");
  });

  it("leave a lone operand alone", () => {
    expect(tree(source, "a")).toBe("typ(var(a))");
  });

  it("try operators in declared order", () => {
    const arith = `e = "n" | e , "+" , e | e , "*" , e ;`;
    expect(tree(arith, "n", "*", "n", "+", "n")).toBe("e(e(n) * e(e(n) + e(n)))");
  });
});

// ---------------------------------------------------------------------------
// Parser object
// ---------------------------------------------------------------------------

describe("parser object", () => {
  const nest = `nest = "(" , nest , ")" | "x" ;`;
  const deep = tokens("(", "(", "(", "x", ")", ")", ")");

  it("limits rule-call depth", () => {
    const error = failure(parserFor(nest).parse(deep, { maxDepth: 3 }));
    expect(error).toBeInstanceOf(RecursionDepthExceededError);
    if (error instanceof RecursionDepthExceededError) {
      expect(error.limit).toBe(3);
      expect(error.ruleName).toBe("nest");
      expect(error.position).toEqual({ line: 1, column: 4, offset: 3 });
    }
  });

  it("takes its default depth limit from emit options", () => {
    const parser = parserFor(nest, { maxDepth: 3 });
    expect(parser.maxDepth).toBe(3);
    expect(failure(parser.parse(deep))).toBeInstanceOf(RecursionDepthExceededError);
    expect(parser.parse(deep, { maxDepth: 4 }).ok).toBe(true);
  });

  it("reports a depth error when the call stack runs out first", () => {
    const depth = 20000;
    const kinds = [...Array<string>(depth).fill("("), "x", ...Array<string>(depth).fill(")")];
    const stream = kinds.map((kind, i) => ({ kind, text: kind, position: { line: 1, column: i + 1, offset: i } }));
    const error = failure(parserFor(nest).parse(stream, { maxDepth: 100000 }));
    expect(error).toBeInstanceOf(RecursionDepthExceededError);
    if (error instanceof RecursionDepthExceededError) {
      expect(error.ruleName).toBe("nest");
      expect(error.limit).toBeGreaterThan(0);
      expect(error.limit).toBeLessThan(depth);
      expect(error.position.offset).toBe(error.limit - 1);
    }
  });

  it("defaults to a depth limit of 500", () => {
    expect(parserFor(nest).maxDepth).toBe(500);
  });

  it("starts from another rule on request", () => {
    const parser = parserFor(`list = item , item ; item = "x" ;`);
    const outcome = parse(parser, tokens("x"), { entry: "item" });
    expect(outcome.ok && formatTree(outcome.tree)).toBe("item(x)");
  });

  it("throws for an unknown entry rule", () => {
    const parser = parserFor(`r = "x" ;`);
    expect(() => parser.parse([], { entry: "nope" })).toThrow(UndefinedRuleError);
    expect(() => parser.procedure("nope")).toThrow(UndefinedRuleError);
  });

  it("accepts any iterable of tokens", () => {
    function* stream(): Generator<Token> {
      yield* tokens("x", "x");
    }
    expect(parserFor(`r = { "x" } ;`).parse(stream()).ok).toBe(true);
  });

  it("is frozen and reusable", () => {
    const parser = parserFor(`r = { "x" } ;`);
    expect(Object.isFrozen(parser)).toBe(true);
    expect([...parser.procedures.keys()]).toEqual(["r"]);
    expect(parser.parse(tokens("x")).ok).toBe(true);
    expect(parser.parse(tokens("x", "x", "x")).ok).toBe(true);
  });

  it("keeps parsing when the exposed procedure table is cleared", () => {
    const parser = parserFor(`list = item , { item } ; item = "x" ;`);
    if (parser.procedures instanceof Map) parser.procedures.clear();
    expect(parser.parse(tokens("x", "x")).ok).toBe(true);
    expect(() => parser.procedure("item")).not.toThrow();
  });

  it("throws from parseOrThrow", () => {
    expect(() => parseOrThrow(parserFor(`r = "x" ;`), tokens("y"))).toThrow(ParseSyntaxError);
  });
});
