/**
 * Core types for ebnf-parsegen
 *
 * Defines the grammar IR produced by the loader, the token stream consumed by
 * the runtime, and the syntax tree it hands back.
 */

// ---------------------------------------------------------------------------
// Source positions
// ---------------------------------------------------------------------------

/** A location in some source text. `line` and `column` are 1-based, `offset` is 0-based. */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

// ---------------------------------------------------------------------------
// Grammar IR
// ---------------------------------------------------------------------------

/** Grammar term IR nodes. Rules refer to each other by name only. */
export type Term =
  | { readonly type: "literal"; readonly text: string }
  | { readonly type: "reference"; readonly name: string }
  | { readonly type: "sequence"; readonly terms: readonly Term[] }
  | { readonly type: "choice"; readonly alternatives: readonly Alternative[] }
  | { readonly type: "repetition"; readonly term: Term; readonly allowEmpty: boolean }
  | { readonly type: "optional"; readonly term: Term }
  | { readonly type: "exception"; readonly term: Term; readonly except: Term };

/** One `|`-separated branch: its terms, in order. */
export interface Alternative {
  readonly terms: readonly Term[];
}

/** A named production. Alternative order is significant. */
export interface GrammarRule {
  readonly name: string;
  readonly alternatives: readonly Alternative[];
  /** Where the rule name appears in the grammar text. */
  readonly position: SourcePosition;
}

/**
 * A loaded grammar: rule declarations exactly as written (duplicates
 * included, until the validator rejects them) and the entry rule name.
 */
export interface Grammar {
  readonly rules: readonly GrammarRule[];
  readonly entry: string;
}

// ---------------------------------------------------------------------------
// Tokens and syntax trees
// ---------------------------------------------------------------------------

/** A token as produced by a lexer. Literal terms match on `kind`. */
export interface Token {
  readonly kind: string;
  readonly text: string;
  readonly position: SourcePosition;
}

/** A rule match. `tag` is the rule name. */
export interface SyntaxNode {
  readonly type: "node";
  readonly tag: string;
  readonly children: readonly SyntaxChild[];
}

/** The matches of a `{ … }` repetition, one child list per iteration. */
export interface SyntaxRepeat {
  readonly type: "repeat";
  readonly matches: readonly (readonly SyntaxChild[])[];
}

/** The match of a `[ … ]` optional; `null` when absent. */
export interface SyntaxOptional {
  readonly type: "optional";
  readonly match: readonly SyntaxChild[] | null;
}

export type SyntaxChild = SyntaxNode | Token | SyntaxRepeat | SyntaxOptional;
