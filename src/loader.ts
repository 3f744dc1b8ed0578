/**
 * Grammar loader: EBNF source text → Grammar IR.
 *
 * Meta-syntax accepted:
 *
 * ```
 * rule      = identifier "=" alternatives ";"
 * alternatives = sequence { "|" sequence }
 * sequence  = term { "," term }
 * term      = primary [ "-" primary ]
 * primary   = literal | identifier | "(" alternatives ")"
 *           | "[" alternatives "]" | "{" alternatives "}" [ "-" ]
 * literal   = '"' chars '"' | "'" chars "'"
 * ```
 *
 * `(* … *)` comments may appear wherever whitespace may. They do not nest.
 */

import {
  between,
  char,
  fail,
  lazy,
  map,
  merge,
  mkParser,
  ok,
  positionAt,
  regex,
  seq,
  sepBy1,
  type Failure,
  type TextParser,
} from "./combinators.js";
import { GrammarSyntaxError } from "./errors.js";
import type { Alternative, Grammar, GrammarRule, Term } from "./types.js";

export interface LoadOptions {
  /** Entry rule name. Defaults to the first rule declared. */
  entry?: string;
}

// ---------------------------------------------------------------------------
// Lexical layer
// ---------------------------------------------------------------------------

const whitespace = regex(/\s+/, "whitespace");

/** Whitespace and comments. Fails only on a comment that is never closed. */
const skip: TextParser<null> = mkParser((input, pos) => {
  let cur = pos;
  for (;;) {
    const ws = whitespace.parse(input, cur);
    if (ws.ok) cur = ws.pos;
    if (!input.startsWith("(*", cur)) return ok(null, cur);
    const close = input.indexOf("*)", cur + 2);
    if (close === -1) return fail(cur, "'*)' to close the comment");
    cur = close + 2;
  }
});

function lexeme<T>(p: TextParser<T>): TextParser<T> {
  return map(seq(p, skip), ([value]) => value);
}

function symbol(c: string): TextParser<string> {
  return lexeme(char(c));
}

const identifier = lexeme(regex(/[A-Za-z_][A-Za-z0-9_]*/, "identifier"));

const quoted: TextParser<string> = lexeme(
  mkParser((input, pos) => {
    const quote = input[pos];
    if (quote !== '"' && quote !== "'") return fail(pos, "literal");
    let end = pos + 1;
    while (end < input.length && input[end] !== quote && input[end] !== "\n") end++;
    if (input[end] !== quote) return fail(pos, `closing ${quote}`);
    if (end === pos + 1) return fail(pos, "non-empty literal");
    return ok(input.slice(pos + 1, end), end + 1);
  })
);

// ---------------------------------------------------------------------------
// Terms
// ---------------------------------------------------------------------------

/** A bracketed body: one plain term stays as is, several become a sequence or choice. */
function group(alts: readonly Alternative[]): Term {
  if (alts.length > 1) return { type: "choice", alternatives: alts };
  const [only] = alts;
  return only.terms.length === 1 ? only.terms[0] : { type: "sequence", terms: only.terms };
}

const alternatives: TextParser<Alternative[]> = lazy(() => sepBy1(sequence, symbol("|")));

const literalTerm = map(quoted, (text): Term => ({ type: "literal", text }));

const referenceTerm = map(identifier, (name): Term => ({ type: "reference", name }));

const groupTerm = map(between(symbol("("), alternatives, symbol(")")), group);

const optionalTerm = map(
  between(symbol("["), alternatives, symbol("]")),
  (alts): Term => ({ type: "optional", term: group(alts) })
);

const FOLLOWS_ONE_OR_MORE = /[-,|;)\]}]/;

/**
 * The `-` of `{ … }-`. A `-` followed by another term is an exception
 * instead, so the marker only counts before a separator, a closer, the `-`
 * of an exception or the end.
 */
const oneOrMore: TextParser<null> = mkParser((input, pos) => {
  if (input[pos] !== "-") return fail(pos, "'-'");
  const after = skip.parse(input, pos + 1);
  if (!after.ok) return fail(pos, "'-'");
  if (after.pos < input.length && !FOLLOWS_ONE_OR_MORE.test(input[after.pos])) return fail(pos, "'-'");
  return ok(null, after.pos);
});

const repetitionTerm: TextParser<Term> = mkParser<Term>((input, pos) => {
  const body = between(symbol("{"), alternatives, symbol("}")).parse(input, pos);
  if (!body.ok) return body;
  const inner = group(body.value);
  const marker = oneOrMore.parse(input, body.pos);
  if (marker.ok) return ok({ type: "repetition", term: inner, allowEmpty: false }, marker.pos, body.furthest);
  return ok({ type: "repetition", term: inner, allowEmpty: true }, body.pos, body.furthest);
});

const primary: TextParser<Term> = mkParser<Term>((input, pos) => {
  switch (input[pos]) {
    case '"':
    case "'":
      return literalTerm.parse(input, pos);
    case "(":
      return groupTerm.parse(input, pos);
    case "[":
      return optionalTerm.parse(input, pos);
    case "{":
      return repetitionTerm.parse(input, pos);
  }
  const ref = referenceTerm.parse(input, pos);
  return ref.ok ? ref : fail(pos, "term");
});

/** `a - b`: a primary, optionally followed by an exception. */
const term: TextParser<Term> = mkParser<Term>((input, pos) => {
  const base = primary.parse(input, pos);
  if (!base.ok) return base;
  const minus = symbol("-").parse(input, base.pos);
  if (!minus.ok) return base;
  const except = merge(primary.parse(input, minus.pos), base.furthest);
  if (!except.ok) return except;
  return ok({ type: "exception", term: base.value, except: except.value }, except.pos, except.furthest);
});

const sequence: TextParser<Alternative> = map(sepBy1(term, symbol(",")), (terms) => ({ terms }));

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

const rule: TextParser<GrammarRule> = mkParser<GrammarRule>((input, pos) => {
  const name = identifier.parse(input, pos);
  if (!name.ok) return fail(pos, "rule name");
  const eq = symbol("=").parse(input, name.pos);
  if (!eq.ok) return eq;
  const body = alternatives.parse(input, eq.pos);
  if (!body.ok) return body;
  const end = merge(symbol(";").parse(input, body.pos), body.furthest);
  if (!end.ok) return end;
  return ok({ name: name.value, alternatives: body.value, position: positionAt(input, pos) }, end.pos);
});

/** `'a'`, `'a' or 'b'`, `'a', 'b' or 'c'`. */
function describeExpected(expected: readonly string[]): string {
  if (expected.length < 2) return expected.join("");
  return `${expected.slice(0, -1).join(", ")} or ${expected[expected.length - 1]}`;
}

function syntaxError(input: string, failure: Failure): GrammarSyntaxError {
  return new GrammarSyntaxError(positionAt(input, failure.pos), describeExpected(failure.expected));
}

/**
 * Parse grammar text into its rules, in declaration order.
 *
 * @throws GrammarSyntaxError at the first malformed construct
 *
 * @example
 * ```typescript
 * const grammar = load(`digits = digit , { digit } ; digit = "0" | "1" ;`);
 * grammar.entry; // "digits"
 * ```
 */
export function load(text: string, options: LoadOptions = {}): Grammar {
  const start = skip.parse(text, 0);
  if (!start.ok) throw syntaxError(text, start);

  const rules: GrammarRule[] = [];
  let pos = start.pos;
  while (pos < text.length) {
    const r = rule.parse(text, pos);
    if (!r.ok) throw syntaxError(text, r);
    rules.push(r.value);
    pos = r.pos;
  }

  if (rules.length === 0) {
    throw new GrammarSyntaxError(positionAt(text, pos), "rule definition");
  }
  return { rules, entry: options.entry ?? rules[0].name };
}
