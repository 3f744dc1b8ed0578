/**
 * Parser model: a validated grammar turned into per-rule decision plans.
 *
 * Plans mirror the term tree, with FIRST sets attached wherever the runtime
 * needs lookahead. A choice is `predictive` when its alternatives' predict
 * sets are pairwise disjoint and `ordered` otherwise; both commit to the
 * first alternative that succeeds.
 */

import {
  flattenTerms,
  localFollow,
  termFirst,
  termNullable,
  termsFirst,
  termsNullable,
  type FirstSets,
} from "./analysis.js";
import type { GrammarWarning } from "./errors.js";
import type { Term } from "./types.js";
import { overlappingAlternatives, type ValidatedGrammar } from "./validator.js";

// ---------------------------------------------------------------------------
// Plan types
// ---------------------------------------------------------------------------

export type ChoiceStrategy = "predictive" | "ordered";

export interface AlternativePlan {
  /** Index of the alternative as declared. */
  readonly index: number;
  readonly items: readonly Plan[];
  readonly first: ReadonlySet<string>;
  readonly nullable: boolean;
}

export interface ChoicePlan {
  readonly kind: "choice";
  readonly strategy: ChoiceStrategy;
  readonly alternatives: readonly AlternativePlan[];
}

export type Plan =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "reference"; readonly name: string }
  | { readonly kind: "sequence"; readonly items: readonly Plan[] }
  | ChoicePlan
  | {
      readonly kind: "repetition";
      readonly body: Plan;
      readonly first: ReadonlySet<string>;
      readonly allowEmpty: boolean;
    }
  | {
      readonly kind: "optional";
      readonly body: Plan;
      readonly first: ReadonlySet<string>;
      readonly nullable: boolean;
    }
  | { readonly kind: "exception"; readonly body: Plan; readonly except: Plan };

/** `middle… , R` tried after a base match of rule `R`. */
export interface InfixPlan {
  readonly index: number;
  readonly middle: readonly Plan[];
}

export interface RulePlan {
  readonly name: string;
  /** The rule's alternatives, minus its infix ones. */
  readonly body: ChoicePlan;
  readonly infix: readonly InfixPlan[];
}

export interface ParserModel {
  readonly entry: string;
  /** Plans in declaration order. */
  readonly rules: ReadonlyMap<string, RulePlan>;
  /** Every literal the grammar mentions, in order of first appearance. */
  readonly literals: readonly string[];
  readonly warnings: readonly GrammarWarning[];
  first(rule: string): ReadonlySet<string>;
  follow(rule: string): ReadonlySet<string>;
  nullable(rule: string): boolean;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

interface IndexedAlternative {
  readonly index: number;
  readonly terms: readonly Term[];
}

class Planner {
  constructor(
    private readonly rule: string,
    private readonly sets: FirstSets
  ) {}

  choice(alternatives: readonly IndexedAlternative[], follow: ReadonlySet<string>): ChoicePlan {
    const overlaps = overlappingAlternatives(this.rule, alternatives, follow, this.sets);
    return {
      kind: "choice",
      strategy: overlaps.length === 0 ? "predictive" : "ordered",
      alternatives: alternatives.map((alt) => {
        const terms = flattenTerms(alt.terms);
        return {
          index: alt.index,
          items: this.sequence(terms, follow),
          first: termsFirst(terms, this.sets),
          nullable: termsNullable(terms, this.sets.nullable),
        };
      }),
    };
  }

  sequence(terms: readonly Term[], follow: ReadonlySet<string>): Plan[] {
    const trailers = localFollow(terms, follow, this.sets);
    return terms.map((term, i) => this.term(term, trailers[i]));
  }

  term(term: Term, follow: ReadonlySet<string>): Plan {
    switch (term.type) {
      case "literal":
        return { kind: "literal", text: term.text };
      case "reference":
        return { kind: "reference", name: term.name };
      case "sequence":
        return { kind: "sequence", items: this.sequence(flattenTerms(term.terms), follow) };
      case "choice":
        return this.choice(
          term.alternatives.map((alt, index) => ({ index, terms: alt.terms })),
          follow
        );
      case "repetition": {
        const first = termFirst(term.term, this.sets);
        const again = new Set([...first, ...follow]);
        return { kind: "repetition", body: this.term(term.term, again), first, allowEmpty: term.allowEmpty };
      }
      case "optional":
        return {
          kind: "optional",
          body: this.term(term.term, follow),
          first: termFirst(term.term, this.sets),
          nullable: termNullable(term.term, this.sets.nullable),
        };
      case "exception":
        return { kind: "exception", body: this.term(term.term, follow), except: this.term(term.except, follow) };
    }
  }
}

function collectLiterals(term: Term, out: string[]): void {
  switch (term.type) {
    case "literal":
      if (!out.includes(term.text)) out.push(term.text);
      return;
    case "reference":
      return;
    case "sequence":
      for (const t of term.terms) collectLiterals(t, out);
      return;
    case "choice":
      for (const alt of term.alternatives) for (const t of alt.terms) collectLiterals(t, out);
      return;
    case "repetition":
    case "optional":
      collectLiterals(term.term, out);
      return;
    case "exception":
      collectLiterals(term.term, out);
      collectLiterals(term.except, out);
      return;
  }
}

/**
 * Build the parser model for a validated grammar.
 *
 * @example
 * ```typescript
 * const model = build(validate(load(source)));
 * model.first("dec"); // Set { "val", "type", "datatype" }
 * ```
 */
export function build(validated: ValidatedGrammar): ParserModel {
  const { analysis } = validated;
  const rules = new Map<string, RulePlan>();
  const literals: string[] = [];

  for (const rule of validated.rules.values()) {
    const follow = analysis.follow.get(rule.name) ?? new Set<string>();
    const infix = validated.infix.get(rule.name) ?? [];
    const skipped = new Set(infix.map((alt) => alt.index));
    const planner = new Planner(rule.name, analysis);
    const operand = analysis.first.get(rule.name) ?? new Set<string>();

    const bases = rule.alternatives
      .map((alt, index) => ({ index, terms: alt.terms }))
      .filter((alt) => !skipped.has(alt.index));

    rules.set(rule.name, {
      name: rule.name,
      body: planner.choice(bases, follow),
      infix: infix.map((alt) => ({ index: alt.index, middle: planner.sequence(alt.middle, operand) })),
    });

    for (const alt of rule.alternatives) for (const term of alt.terms) collectLiterals(term, literals);
  }

  const empty: ReadonlySet<string> = new Set();
  return Object.freeze({
    entry: validated.grammar.entry,
    rules,
    literals,
    warnings: validated.warnings,
    first: (rule: string) => analysis.first.get(rule) ?? empty,
    follow: (rule: string) => analysis.follow.get(rule) ?? empty,
    nullable: (rule: string) => analysis.nullable.has(rule),
  });
}
