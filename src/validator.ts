/**
 * Grammar validator.
 *
 * Checks, in order: unique rule names, resolved references and entry rule,
 * reachability (warning), left recursion, repetitions that can loop without
 * consuming, and overlapping alternatives (warning). The first fatal problem
 * is thrown; warnings accumulate on the result.
 */

import {
  analyzeGrammar,
  flattenTerms,
  intersection,
  leftCorners,
  predictSet,
  termNullable,
  walkTerms,
  type FirstSets,
  type GrammarAnalysis,
} from "./analysis.js";
import {
  DuplicateRuleError,
  InfiniteLoopError,
  LeftRecursionError,
  UndefinedRuleError,
  type AmbiguityWarning,
  type GrammarWarning,
} from "./errors.js";
import type { Grammar, GrammarRule, Term } from "./types.js";

/**
 * An alternative `R , middle… , R` of rule `R`. It is parsed by matching a
 * base alternative first, then `middle… , R`, nesting to the right.
 */
export interface InfixAlternative {
  /** Index among the rule's alternatives. */
  readonly index: number;
  /** Terms between the two operands, flattened. */
  readonly middle: readonly Term[];
}

export interface ValidatedGrammar {
  readonly grammar: Grammar;
  readonly rules: ReadonlyMap<string, GrammarRule>;
  readonly analysis: GrammarAnalysis;
  /** Infix alternatives per rule; rules without any are absent. */
  readonly infix: ReadonlyMap<string, readonly InfixAlternative[]>;
  readonly warnings: readonly GrammarWarning[];
}

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

function indexRules(grammar: Grammar): Map<string, GrammarRule> {
  const rules = new Map<string, GrammarRule>();
  for (const rule of grammar.rules) {
    if (rules.has(rule.name)) throw new DuplicateRuleError(rule.name, rule.position);
    rules.set(rule.name, rule);
  }
  return rules;
}

function* references(term: Term): Generator<string> {
  switch (term.type) {
    case "literal":
      return;
    case "reference":
      yield term.name;
      return;
    case "sequence":
      for (const t of term.terms) yield* references(t);
      return;
    case "choice":
      for (const alt of term.alternatives) for (const t of alt.terms) yield* references(t);
      return;
    case "repetition":
    case "optional":
      yield* references(term.term);
      return;
    case "exception":
      yield* references(term.term);
      yield* references(term.except);
      return;
  }
}

function* ruleReferences(rule: GrammarRule): Generator<string> {
  for (const alt of rule.alternatives) for (const term of alt.terms) yield* references(term);
}

function checkReferences(rules: ReadonlyMap<string, GrammarRule>, entry: string): void {
  for (const rule of rules.values()) {
    for (const name of ruleReferences(rule)) {
      if (!rules.has(name)) throw new UndefinedRuleError(name, rule.name);
    }
  }
  if (!rules.has(entry)) throw new UndefinedRuleError(entry, null);
}

function unreachableRules(rules: ReadonlyMap<string, GrammarRule>, entry: string): GrammarWarning[] {
  const seen = new Set<string>([entry]);
  const queue = [entry];
  for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
    const rule = rules.get(name);
    if (!rule) continue;
    for (const ref of ruleReferences(rule)) {
      if (seen.has(ref)) continue;
      seen.add(ref);
      queue.push(ref);
    }
  }
  return [...rules.keys()]
    .filter((name) => !seen.has(name))
    .map((rule): GrammarWarning => ({ kind: "unreachable", rule }));
}

// ---------------------------------------------------------------------------
// Left recursion
// ---------------------------------------------------------------------------

/**
 * Infix alternatives of `rule`. Only a non-nullable rule with at least one
 * other alternative qualifies, so the left operand always consumes input.
 */
function infixAlternatives(rule: GrammarRule, nullable: ReadonlySet<string>): InfixAlternative[] {
  if (nullable.has(rule.name)) return [];
  const isSelf = (term: Term): boolean => term.type === "reference" && term.name === rule.name;

  const found: InfixAlternative[] = [];
  rule.alternatives.forEach((alt, index) => {
    const terms = flattenTerms(alt.terms);
    if (terms.length < 3 || !isSelf(terms[0]) || !isSelf(terms[terms.length - 1])) return;
    const middle = terms.slice(1, -1);
    if (middle.every((term) => termNullable(term, nullable))) return;
    found.push({ index, middle });
  });
  return found.length < rule.alternatives.length ? found : [];
}

/** Depth-first search in declaration order; returns the first closed cycle found. */
function findCycle(edges: ReadonlyMap<string, readonly string[]>): string[] | null {
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (name: string): string[] | null => {
    const open = stack.indexOf(name);
    if (open !== -1) return [...stack.slice(open), name];
    if (done.has(name)) return null;
    stack.push(name);
    for (const next of edges.get(name) ?? []) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    stack.pop();
    done.add(name);
    return null;
  };

  for (const name of edges.keys()) {
    const cycle = visit(name);
    if (cycle) return cycle;
  }
  return null;
}

function checkLeftRecursion(
  rules: ReadonlyMap<string, GrammarRule>,
  infix: ReadonlyMap<string, readonly InfixAlternative[]>,
  nullable: ReadonlySet<string>
): void {
  const edges = new Map<string, string[]>();
  for (const rule of rules.values()) {
    const skipped = new Set((infix.get(rule.name) ?? []).map((alt) => alt.index));
    const corners: string[] = [];
    rule.alternatives.forEach((alt, index) => {
      if (skipped.has(index)) return;
      for (const name of leftCorners(alt.terms, nullable)) {
        if (!corners.includes(name)) corners.push(name);
      }
    });
    edges.set(rule.name, corners);
  }
  const cycle = findCycle(edges);
  if (cycle) throw new LeftRecursionError(cycle);
}

// ---------------------------------------------------------------------------
// Repetition and ambiguity
// ---------------------------------------------------------------------------

function checkRepetitions(rules: ReadonlyMap<string, GrammarRule>, sets: FirstSets): void {
  for (const rule of rules.values()) {
    for (const alt of rule.alternatives) {
      walkTerms(alt.terms, new Set<string>(), sets, (term) => {
        if (term.type === "repetition" && termNullable(term.term, sets.nullable)) {
          throw new InfiniteLoopError(rule.name);
        }
      });
    }
  }
}

/** One warning per pair of alternatives whose predict sets overlap. */
export function overlappingAlternatives(
  rule: string,
  alternatives: readonly { readonly index: number; readonly terms: readonly Term[] }[],
  follow: ReadonlySet<string>,
  sets: FirstSets
): AmbiguityWarning[] {
  const predicts = alternatives.map((alt) => predictSet(alt.terms, follow, sets));
  const warnings: AmbiguityWarning[] = [];
  for (let i = 0; i < alternatives.length; i++) {
    for (let j = i + 1; j < alternatives.length; j++) {
      const overlap = intersection(predicts[i], predicts[j]);
      if (overlap.length > 0) {
        warnings.push({
          kind: "ambiguity",
          rule,
          alternatives: [alternatives[i].index, alternatives[j].index],
          overlap,
        });
      }
    }
  }
  return warnings;
}

function ambiguities(
  rules: ReadonlyMap<string, GrammarRule>,
  infix: ReadonlyMap<string, readonly InfixAlternative[]>,
  analysis: GrammarAnalysis
): AmbiguityWarning[] {
  const warnings: AmbiguityWarning[] = [];
  for (const rule of rules.values()) {
    const follow = analysis.follow.get(rule.name) ?? new Set<string>();
    const skipped = new Set((infix.get(rule.name) ?? []).map((alt) => alt.index));
    const bases = rule.alternatives
      .map((alt, index) => ({ index, terms: alt.terms }))
      .filter((alt) => !skipped.has(alt.index));
    warnings.push(...overlappingAlternatives(rule.name, bases, follow, analysis));

    for (const alt of rule.alternatives) {
      walkTerms(alt.terms, follow, analysis, (term, after) => {
        if (term.type !== "choice") return;
        const nested = term.alternatives.map((a, index) => ({ index, terms: a.terms }));
        warnings.push(...overlappingAlternatives(rule.name, nested, after, analysis));
      });
    }
  }
  return warnings;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Validate a loaded grammar.
 *
 * @throws DuplicateRuleError, UndefinedRuleError, LeftRecursionError or
 *   InfiniteLoopError for the first fatal problem found
 */
export function validate(grammar: Grammar): ValidatedGrammar {
  const rules = indexRules(grammar);
  checkReferences(rules, grammar.entry);
  const unreachable = unreachableRules(rules, grammar.entry);

  const analysis = analyzeGrammar(rules, grammar.entry);
  const infix = new Map<string, readonly InfixAlternative[]>();
  for (const rule of rules.values()) {
    const found = infixAlternatives(rule, analysis.nullable);
    if (found.length > 0) infix.set(rule.name, found);
  }

  checkLeftRecursion(rules, infix, analysis.nullable);
  checkRepetitions(rules, analysis);

  return {
    grammar,
    rules,
    analysis,
    infix,
    warnings: [...unreachable, ...ambiguities(rules, infix, analysis)],
  };
}
