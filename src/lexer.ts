/**
 * Default lexer: a longest-match scanner over a fixed set of literals.
 *
 * Every token's kind and text are the literal it matched. Word-like
 * literals (`val`, `datatype`) only match when no word character follows,
 * so `valid` never starts with `val`. Good enough to drive a grammar whose
 * terminals are all literals; real languages bring their own lexer.
 */

import { LexError } from "./errors.js";
import type { SourcePosition, Token } from "./types.js";

export interface LexerOptions {
  /** Skipped between tokens. Defaults to whitespace. */
  skip?: RegExp;
}

export interface Lexer {
  readonly literals: readonly string[];
  /** @throws LexError at the first character no literal matches */
  tokenize(text: string): Token[];
}

const WORD = /^[A-Za-z_][A-Za-z0-9_]*$/;
const WORD_CHAR = /[A-Za-z0-9_]/;

function isWordLike(literal: string): boolean {
  return literal.length > 1 && WORD.test(literal);
}

function advance(position: SourcePosition, text: string): SourcePosition {
  let { line, column } = position;
  for (const c of text) {
    if (c === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset: position.offset + text.length };
}

export function createLexer(literals: Iterable<string>, options: LexerOptions = {}): Lexer {
  const unique = [...new Set(literals)].filter((literal) => literal.length > 0);
  // Longest first; ties keep their original order.
  const ordered = [...unique].sort((a, b) => b.length - a.length);
  const skip = new RegExp((options.skip ?? /\s+/).source, "y");

  const matchAt = (text: string, offset: number): string | null => {
    for (const literal of ordered) {
      if (!text.startsWith(literal, offset)) continue;
      const next = text[offset + literal.length];
      if (isWordLike(literal) && next !== undefined && WORD_CHAR.test(next)) continue;
      return literal;
    }
    return null;
  };

  return {
    literals: unique,
    tokenize(text: string): Token[] {
      const tokens: Token[] = [];
      let position: SourcePosition = { line: 1, column: 1, offset: 0 };
      while (position.offset < text.length) {
        skip.lastIndex = position.offset;
        const gap = skip.exec(text);
        if (gap && gap[0].length > 0) {
          position = advance(position, gap[0]);
          continue;
        }
        const literal = matchAt(text, position.offset);
        if (literal === null) throw new LexError(position, text[position.offset]);
        tokens.push({ kind: literal, text: literal, position });
        position = advance(position, literal);
      }
      return tokens;
    },
  };
}
