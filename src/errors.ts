/**
 * Error and warning taxonomy for ebnf-parsegen.
 *
 * Grammar-phase errors are thrown and abort compilation. Parse-phase errors
 * are returned inside a `ParseOutcome`. Warnings are plain tagged records and
 * never thrown.
 */

import type { SourcePosition, Token } from "./types.js";

export type ErrorPhase = "grammar" | "lex" | "parse" | "config";

/** Base class for every error raised by this package. */
export abstract class ParsegenError extends Error {
  abstract readonly phase: ErrorPhase;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

function at(position: SourcePosition): string {
  return `line ${position.line}, col ${position.column}`;
}

function describeToken(token: Token | null): string {
  return token === null ? "end of input" : JSON.stringify(token.text);
}

function describeExpected(expected: readonly string[]): string {
  if (expected.length === 0) return "something else";
  const shown = expected.slice(0, 8).map((kind) => JSON.stringify(kind));
  const rest = expected.length - shown.length;
  return rest > 0 ? `one of ${shown.join(", ")} (+${rest} more)` : shown.join(" or ");
}

// ---------------------------------------------------------------------------
// Grammar phase
// ---------------------------------------------------------------------------

/** Malformed grammar text. Loading stops at the first one. */
export class GrammarSyntaxError extends ParsegenError {
  readonly phase = "grammar";
  readonly line: number;
  readonly column: number;
  readonly offset: number;
  /** What the loader expected at the failure position. */
  readonly expected: string;

  constructor(position: SourcePosition, expected: string) {
    super(`Grammar syntax error at ${at(position)}: expected ${expected}`);
    this.line = position.line;
    this.column = position.column;
    this.offset = position.offset;
    this.expected = expected;
  }
}

export class DuplicateRuleError extends ParsegenError {
  readonly phase = "grammar";

  constructor(
    readonly ruleName: string,
    readonly position: SourcePosition
  ) {
    super(`Duplicate rule '${ruleName}' at ${at(position)}`);
  }
}

/** A reference to a rule that is never defined. `referencedFrom` is `null` for the entry rule. */
export class UndefinedRuleError extends ParsegenError {
  readonly phase = "grammar";

  constructor(
    readonly ruleName: string,
    readonly referencedFrom: string | null
  ) {
    super(
      referencedFrom === null
        ? `Entry rule '${ruleName}' is not defined`
        : `Undefined rule '${ruleName}' referenced in '${referencedFrom}'`
    );
  }
}

/** `cycle` is closed: it starts and ends with the same rule name. */
export class LeftRecursionError extends ParsegenError {
  readonly phase = "grammar";

  constructor(readonly cycle: readonly string[]) {
    super(
      `Left recursion detected: ${cycle.join(" -> ")}. ` +
        `Rewrite the rule to consume input before recursing, e.g. 'a = b , { op , b }' instead of 'a = a , op , b'.`
    );
  }
}

export class InfiniteLoopError extends ParsegenError {
  readonly phase = "grammar";

  constructor(readonly ruleName: string) {
    super(`Repetition in rule '${ruleName}' can match without consuming input`);
  }
}

// ---------------------------------------------------------------------------
// Lex and parse phase
// ---------------------------------------------------------------------------

export class LexError extends ParsegenError {
  readonly phase = "lex";

  constructor(
    readonly position: SourcePosition,
    readonly found: string
  ) {
    super(`Unexpected character ${JSON.stringify(found)} at ${at(position)}`);
  }
}

/** Parse-time failures. None of them ever comes with a partial tree. */
export abstract class ParseError extends ParsegenError {
  readonly phase = "parse";
  abstract readonly position: SourcePosition;
}

/** The furthest failure of an unsuccessful parse. `actual` is `null` at end of input. */
export class ParseSyntaxError extends ParseError {
  constructor(
    readonly expected: readonly string[],
    readonly actual: Token | null,
    readonly position: SourcePosition
  ) {
    super(`Parse error at ${at(position)}: expected ${describeExpected(expected)}, found ${describeToken(actual)}`);
  }
}

/** The entry rule matched, but `token` and what follows it were left over. */
export class TrailingInputError extends ParseError {
  readonly position: SourcePosition;

  constructor(
    readonly token: Token,
    readonly expected: readonly string[]
  ) {
    super(`Parse error at ${at(token.position)}: expected end of input, found ${describeToken(token)}`);
    this.position = token.position;
  }
}

export class RecursionDepthExceededError extends ParseError {
  constructor(
    readonly limit: number,
    readonly ruleName: string,
    readonly position: SourcePosition
  ) {
    super(`Recursion depth limit of ${limit} exceeded in rule '${ruleName}' at ${at(position)}`);
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ConfigError extends ParsegenError {
  readonly phase = "config";

  constructor(
    readonly key: string,
    detail: string
  ) {
    super(`Invalid configuration for '${key}': ${detail}`);
  }
}

// ---------------------------------------------------------------------------
// Warnings
// ---------------------------------------------------------------------------

export interface UnreachableRuleWarning {
  readonly kind: "unreachable";
  readonly rule: string;
}

/** Two alternatives of one choice can start with the same token. Ordering resolves it. */
export interface AmbiguityWarning {
  readonly kind: "ambiguity";
  readonly rule: string;
  /** Indices within the choice, earlier first. */
  readonly alternatives: readonly [number, number];
  readonly overlap: readonly string[];
}

export type GrammarWarning = UnreachableRuleWarning | AmbiguityWarning;

export function formatWarning(warning: GrammarWarning): string {
  switch (warning.kind) {
    case "unreachable":
      return `rule '${warning.rule}' is unreachable from the entry rule`;
    case "ambiguity":
      return (
        `alternatives ${warning.alternatives[0]} and ${warning.alternatives[1]} of '${warning.rule}' ` +
        `can both start with ${warning.overlap.map((k) => JSON.stringify(k)).join(", ")}; the earlier one wins`
      );
  }
}
