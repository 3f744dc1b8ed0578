/**
 * Grammar analysis: nullability, FIRST and FOLLOW sets.
 *
 * Every set is computed by fixed-point iteration over the rule table and is
 * read-only once returned. FOLLOW uses {@link END_OF_INPUT} for "end of input".
 */

import type { GrammarRule, Term } from "./types.js";

/** Token kind standing for end of input in FOLLOW and predict sets. */
export const END_OF_INPUT = "$end";

export interface GrammarAnalysis {
  /** Rules that can match without consuming a token. */
  readonly nullable: ReadonlySet<string>;
  readonly first: ReadonlyMap<string, ReadonlySet<string>>;
  readonly follow: ReadonlyMap<string, ReadonlySet<string>>;
}

/** The two inputs term-level FIRST computation needs. */
export type FirstSets = Pick<GrammarAnalysis, "nullable" | "first">;

const EMPTY: ReadonlySet<string> = new Set();

// ---------------------------------------------------------------------------
// Term-level helpers
// ---------------------------------------------------------------------------

/** Inline nested sequences, so `a , ( b , c )` reads as `a , b , c`. */
export function flattenTerms(terms: readonly Term[]): Term[] {
  const out: Term[] = [];
  for (const term of terms) {
    if (term.type === "sequence") out.push(...flattenTerms(term.terms));
    else out.push(term);
  }
  return out;
}

export function termNullable(term: Term, nullable: ReadonlySet<string>): boolean {
  switch (term.type) {
    case "literal":
      return false;
    case "reference":
      return nullable.has(term.name);
    case "sequence":
      return termsNullable(term.terms, nullable);
    case "choice":
      return term.alternatives.some((alt) => termsNullable(alt.terms, nullable));
    case "repetition":
      return term.allowEmpty || termNullable(term.term, nullable);
    case "optional":
      return true;
    case "exception":
      return termNullable(term.term, nullable);
  }
}

export function termsNullable(terms: readonly Term[], nullable: ReadonlySet<string>): boolean {
  return terms.every((term) => termNullable(term, nullable));
}

function addAll(target: Set<string>, source: Iterable<string>): void {
  for (const kind of source) target.add(kind);
}

export function termFirst(term: Term, sets: FirstSets): Set<string> {
  switch (term.type) {
    case "literal":
      return new Set([term.text]);
    case "reference":
      return new Set(sets.first.get(term.name) ?? EMPTY);
    case "sequence":
      return termsFirst(term.terms, sets);
    case "choice": {
      const out = new Set<string>();
      for (const alt of term.alternatives) addAll(out, termsFirst(alt.terms, sets));
      return out;
    }
    case "repetition":
    case "optional":
      return termFirst(term.term, sets);
    case "exception":
      return termFirst(term.term, sets);
  }
}

/** FIRST of a term sequence: each term's FIRST up to and including the first non-nullable one. */
export function termsFirst(terms: readonly Term[], sets: FirstSets): Set<string> {
  const out = new Set<string>();
  for (const term of terms) {
    addAll(out, termFirst(term, sets));
    if (!termNullable(term, sets.nullable)) break;
  }
  return out;
}

/** Kinds that may start a match of `terms`, or follow it when it matches empty. */
export function predictSet(terms: readonly Term[], follow: ReadonlySet<string>, sets: FirstSets): Set<string> {
  const out = termsFirst(terms, sets);
  if (termsNullable(terms, sets.nullable)) addAll(out, follow);
  return out;
}

/** Overlap of two sets, in the iteration order of `a`. */
export function intersection(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter((kind) => b.has(kind));
}

/**
 * Rules `terms` may call before consuming any input, in order of first
 * appearance.
 */
export function leftCorners(terms: readonly Term[], nullable: ReadonlySet<string>): string[] {
  const out: string[] = [];
  const visit = (term: Term): void => {
    switch (term.type) {
      case "literal":
        return;
      case "reference":
        if (!out.includes(term.name)) out.push(term.name);
        return;
      case "sequence":
        for (const t of term.terms) {
          visit(t);
          if (!termNullable(t, nullable)) return;
        }
        return;
      case "choice":
        for (const alt of term.alternatives) visit({ type: "sequence", terms: alt.terms });
        return;
      case "repetition":
      case "optional":
        visit(term.term);
        return;
      case "exception":
        visit(term.term);
        visit(term.except);
        return;
    }
  };
  visit({ type: "sequence", terms });
  return out;
}

// ---------------------------------------------------------------------------
// Walking terms with their local FOLLOW
// ---------------------------------------------------------------------------

/** Called for every term, pre-order, with the kinds that may follow it locally. */
export type TermVisitor = (term: Term, follow: ReadonlySet<string>) => void;

/**
 * Visit `terms` and everything nested in them, left to right, passing each
 * the set of kinds that may come right after it given `follow` after the
 * whole sequence.
 */
export function walkTerms(
  terms: readonly Term[],
  follow: ReadonlySet<string>,
  sets: FirstSets,
  visitor: TermVisitor
): void {
  const trailers = localFollow(terms, follow, sets);
  terms.forEach((term, i) => walkTerm(term, trailers[i], sets, visitor));
}

/** For each of `terms`, the kinds that may come right after it. */
export function localFollow(terms: readonly Term[], follow: ReadonlySet<string>, sets: FirstSets): ReadonlySet<string>[] {
  const trailers: ReadonlySet<string>[] = [];
  let trailer = follow;
  for (let i = terms.length - 1; i >= 0; i--) {
    trailers[i] = trailer;
    const first = termFirst(terms[i], sets);
    if (termNullable(terms[i], sets.nullable)) addAll(first, trailer);
    trailer = first;
  }
  return trailers;
}

function walkTerm(term: Term, follow: ReadonlySet<string>, sets: FirstSets, visitor: TermVisitor): void {
  visitor(term, follow);
  switch (term.type) {
    case "literal":
    case "reference":
      return;
    case "sequence":
      walkTerms(term.terms, follow, sets, visitor);
      return;
    case "choice":
      for (const alt of term.alternatives) walkTerms(alt.terms, follow, sets, visitor);
      return;
    case "repetition": {
      const again = termFirst(term.term, sets);
      addAll(again, follow);
      walkTerm(term.term, again, sets, visitor);
      return;
    }
    case "optional":
      walkTerm(term.term, follow, sets, visitor);
      return;
    case "exception":
      walkTerm(term.term, follow, sets, visitor);
      walkTerm(term.except, follow, sets, visitor);
      return;
  }
}

// ---------------------------------------------------------------------------
// Fixed points
// ---------------------------------------------------------------------------

function computeNullable(rules: ReadonlyMap<string, GrammarRule>): Set<string> {
  const nullable = new Set<string>();
  let changed = true;
  while (changed) {
    changed = false;
    for (const rule of rules.values()) {
      if (nullable.has(rule.name)) continue;
      if (rule.alternatives.some((alt) => termsNullable(alt.terms, nullable))) {
        nullable.add(rule.name);
        changed = true;
      }
    }
  }
  return nullable;
}

function computeFirst(rules: ReadonlyMap<string, GrammarRule>, nullable: ReadonlySet<string>): Map<string, Set<string>> {
  const first = new Map<string, Set<string>>();
  for (const name of rules.keys()) first.set(name, new Set());
  const sets: FirstSets = { nullable, first };

  let changed = true;
  while (changed) {
    changed = false;
    for (const rule of rules.values()) {
      const target = first.get(rule.name) ?? new Set<string>();
      const before = target.size;
      for (const alt of rule.alternatives) addAll(target, termsFirst(alt.terms, sets));
      if (target.size !== before) changed = true;
    }
  }
  return first;
}

function computeFollow(rules: ReadonlyMap<string, GrammarRule>, entry: string, sets: FirstSets): Map<string, Set<string>> {
  const follow = new Map<string, Set<string>>();
  for (const name of rules.keys()) follow.set(name, new Set());
  follow.get(entry)?.add(END_OF_INPUT);

  let changed = true;
  const visitor: TermVisitor = (term, after) => {
    if (term.type !== "reference") return;
    const target = follow.get(term.name);
    if (!target) return;
    const before = target.size;
    addAll(target, after);
    if (target.size !== before) changed = true;
  };

  while (changed) {
    changed = false;
    for (const rule of rules.values()) {
      const after = follow.get(rule.name) ?? EMPTY;
      for (const alt of rule.alternatives) walkTerms(alt.terms, after, sets, visitor);
    }
  }
  return follow;
}

/**
 * Analyse a resolved rule table. Every reference must name a rule in
 * `rules`; the validator checks that before calling this.
 */
export function analyzeGrammar(rules: ReadonlyMap<string, GrammarRule>, entry: string): GrammarAnalysis {
  const nullable = computeNullable(rules);
  const first = computeFirst(rules, nullable);
  const follow = computeFollow(rules, entry, { nullable, first });
  return { nullable, first, follow };
}
