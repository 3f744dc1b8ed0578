/**
 * Runtime parsing engine: runs an emitted parser over a token stream.
 */

import type { ParserObject } from "./emitter.js";
import { ParseSyntaxError, RecursionDepthExceededError, TrailingInputError, type ParseError } from "./errors.js";
import { ParseState, type Step } from "./state.js";
import type { SyntaxNode, Token } from "./types.js";

export interface ParseOptions {
  /** Rule to start from instead of the parser's entry rule. */
  entry?: string;
  /** Rule-call depth limit for this parse. */
  maxDepth?: number;
}

/** A complete tree, or the error that stopped the parse. Never both. */
export type ParseOutcome = { ok: true; tree: SyntaxNode } | { ok: false; error: ParseError };

function furthestError(state: ParseState): ParseSyntaxError {
  const failure = state.furthestFailure();
  const actual = failure.index < state.tokens.length ? state.tokens[failure.index] : null;
  return new ParseSyntaxError(failure.expected, actual, state.positionAt(failure.index));
}

/**
 * Parse `tokens` with `parser`. The whole stream must be consumed.
 *
 * Failures are returned, not thrown: the furthest point any alternative
 * reached, with every kind expected there.
 *
 * @throws UndefinedRuleError when `options.entry` names no rule
 */
export function parse(parser: ParserObject, tokens: Iterable<Token>, options: ParseOptions = {}): ParseOutcome {
  const stream = Array.from(tokens);
  const procedure = parser.procedure(options.entry ?? parser.entry);
  const state = new ParseState(stream, options.maxDepth ?? parser.maxDepth);

  let result: Step<SyntaxNode>;
  try {
    result = procedure(state, 0);
  } catch (error) {
    if (error instanceof RecursionDepthExceededError) return { ok: false, error };
    // The call stack ran out below maxDepth.
    if (error instanceof RangeError) return { ok: false, error: state.stackExhausted() };
    throw error;
  }

  if (!result.ok) return { ok: false, error: furthestError(state) };

  if (result.pos < stream.length) {
    // A failure past the end of the match explains the leftover better.
    if (state.furthestFailure().index > result.pos) return { ok: false, error: furthestError(state) };
    return { ok: false, error: new TrailingInputError(stream[result.pos], state.expectedAt(result.pos)) };
  }

  return { ok: true, tree: result.value };
}

/** Like {@link parse}, but throws the error instead of returning it. */
export function parseOrThrow(parser: ParserObject, tokens: Iterable<Token>, options?: ParseOptions): SyntaxNode {
  const outcome = parse(parser, tokens, options);
  if (!outcome.ok) throw outcome.error;
  return outcome.tree;
}
