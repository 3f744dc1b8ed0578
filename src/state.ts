/**
 * Per-parse state shared by every emitted procedure: the materialised token
 * stream, the rule-call depth and the furthest failure seen so far.
 */

import { END_OF_INPUT } from "./analysis.js";
import { RecursionDepthExceededError } from "./errors.js";
import type { SourcePosition, Token } from "./types.js";

export const DEFAULT_MAX_DEPTH = 500;

/** Outcome of one procedure: the produced value and the next token index, or a failure. */
export type Step<T> = { ok: true; value: T; pos: number } | { ok: false; pos: number };

export function ok<T>(value: T, pos: number): Step<T> {
  return { ok: true, value, pos };
}

export function fail<T>(pos: number): Step<T> {
  return { ok: false, pos };
}

/** A parsing procedure over token indices. */
export type Procedure<T> = (state: ParseState, pos: number) => Step<T>;

export interface FurthestFailure {
  readonly index: number;
  readonly expected: readonly string[];
}

export class ParseState {
  private depth = 0;
  private furthest = -1;
  private expected = new Set<string>();
  private deepest: { rule: string; pos: number; depth: number } | null = null;

  constructor(
    readonly tokens: readonly Token[],
    readonly maxDepth: number = DEFAULT_MAX_DEPTH
  ) {}

  /** Kind of the token at `pos`, or `$end` past the last one. */
  kindAt(pos: number): string {
    return pos < this.tokens.length ? this.tokens[pos].kind : END_OF_INPUT;
  }

  /** Record that one of `kinds` would have been accepted at `pos`. */
  expect(pos: number, kinds: Iterable<string>): void {
    if (pos < this.furthest) return;
    if (pos > this.furthest) {
      this.furthest = pos;
      this.expected = new Set();
    }
    for (const kind of kinds) this.expected.add(kind);
  }

  expectedAt(pos: number): string[] {
    return pos === this.furthest ? [...this.expected] : [];
  }

  furthestFailure(): FurthestFailure {
    const index = Math.max(this.furthest, 0);
    return { index, expected: this.expectedAt(this.furthest) };
  }

  /** Run `attempt` without letting its failures show up in diagnostics. */
  lookahead<T>(attempt: () => Step<T>): Step<T> {
    const furthest = this.furthest;
    const expected = this.expected;
    this.expected = new Set(expected);
    try {
      return attempt();
    } finally {
      this.furthest = furthest;
      this.expected = expected;
    }
  }

  /** Count a rule call. Throws once the limit is passed. */
  enter(rule: string, pos: number): void {
    this.depth++;
    if (!this.deepest || this.depth > this.deepest.depth) this.deepest = { rule, pos, depth: this.depth };
    if (this.depth > this.maxDepth) {
      throw new RecursionDepthExceededError(this.maxDepth, rule, this.positionAt(pos));
    }
  }

  leave(): void {
    this.depth--;
  }

  /** Depth error for a parse that ran out of call stack before reaching `maxDepth`. */
  stackExhausted(): RecursionDepthExceededError {
    const at = this.deepest ?? { rule: "", pos: 0, depth: 0 };
    return new RecursionDepthExceededError(at.depth, at.rule, this.positionAt(at.pos));
  }

  /** Source position of token `index`; past the end, the position right after the last token. */
  positionAt(index: number): SourcePosition {
    if (index < this.tokens.length) return this.tokens[index].position;
    if (this.tokens.length === 0) return { line: 1, column: 1, offset: 0 };
    const last = this.tokens[this.tokens.length - 1];
    return {
      line: last.position.line,
      column: last.position.column + last.text.length,
      offset: last.position.offset + last.text.length,
    };
  }
}
