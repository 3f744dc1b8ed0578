import { describe, it, expect } from "vitest";
import { createLexer } from "../lexer.js";
import { LexError } from "../errors.js";

describe("createLexer", () => {
  it("tokenizes literals with their positions", () => {
    const lexer = createLexer(["val", "x", "=", "a"]);
    expect(lexer.tokenize("val x = a")).toEqual([
      { kind: "val", text: "val", position: { line: 1, column: 1, offset: 0 } },
      { kind: "x", text: "x", position: { line: 1, column: 5, offset: 4 } },
      { kind: "=", text: "=", position: { line: 1, column: 7, offset: 6 } },
      { kind: "a", text: "a", position: { line: 1, column: 9, offset: 8 } },
    ]);
  });

  it("prefers the longest literal", () => {
    const lexer = createLexer(["-", "->"]);
    expect(lexer.tokenize("->-").map((t) => t.kind)).toEqual(["->", "-"]);
  });

  it("does not match a keyword inside a longer word", () => {
    const lexer = createLexer(["val", "v", "a", "l", "x"]);
    expect(lexer.tokenize("valx").map((t) => t.kind)).toEqual(["v", "a", "l", "x"]);
    expect(lexer.tokenize("val x").map((t) => t.kind)).toEqual(["val", "x"]);
  });

  it("tracks lines and columns across newlines", () => {
    const lexer = createLexer(["a", "b"]);
    expect(lexer.tokenize("a\n  b")[1].position).toEqual({ line: 2, column: 3, offset: 4 });
  });

  it("throws at the first unknown character", () => {
    const lexer = createLexer(["a"]);
    expect(() => lexer.tokenize("a ?")).toThrow(LexError);
    try {
      lexer.tokenize("a ?");
    } catch (error) {
      expect(error).toBeInstanceOf(LexError);
      if (error instanceof LexError) {
        expect(error.position).toEqual({ line: 1, column: 3, offset: 2 });
        expect(error.found).toBe("?");
        expect(error.message).toBe('Unexpected character "?" at line 1, col 3');
      }
    }
  });

  it("drops duplicate and empty literals", () => {
    expect(createLexer(["a", "", "a", "b"]).literals).toEqual(["a", "b"]);
  });

  it("accepts a custom skip pattern", () => {
    const lexer = createLexer(["a", "b"], { skip: /(\s|#[^\n]*)+/ });
    const tokens = lexer.tokenize("a # note\nb");
    expect(tokens.map((t) => t.kind)).toEqual(["a", "b"]);
    expect(tokens[1].position).toEqual({ line: 2, column: 1, offset: 9 });
  });

  it("returns no tokens for blank input", () => {
    expect(createLexer(["a"]).tokenize("  \n ")).toEqual([]);
  });
});
