/**
 * Parser emitter: compiles each rule plan of a model into a closure over
 * token indices, and wraps them in an immutable ParserObject.
 */

import { UndefinedRuleError } from "./errors.js";
import type { AlternativePlan, ChoicePlan, ParserModel, Plan, RulePlan } from "./model.js";
import { parse, type ParseOptions, type ParseOutcome } from "./runtime.js";
import { DEFAULT_MAX_DEPTH, fail, ok, type Procedure } from "./state.js";
import type { SyntaxChild, SyntaxNode, Token } from "./types.js";

/** A compiled rule: matches at a token index and produces a node tagged with the rule name. */
export type RuleProcedure = Procedure<SyntaxNode>;

export interface EmitOptions {
  /** Default rule-call depth limit for parses that don't set their own. */
  maxDepth?: number;
}

export interface ParserObject {
  readonly entry: string;
  readonly model: ParserModel;
  readonly maxDepth: number;
  readonly procedures: ReadonlyMap<string, RuleProcedure>;
  /** @throws UndefinedRuleError when no rule has this name */
  procedure(name: string): RuleProcedure;
  parse(tokens: Iterable<Token>, options?: ParseOptions): ParseOutcome;
}

type Matcher = Procedure<SyntaxChild[]>;

function node(tag: string, children: readonly SyntaxChild[]): SyntaxNode {
  return { type: "node", tag, children };
}

// ---------------------------------------------------------------------------
// Plan compilation
// ---------------------------------------------------------------------------

function compileSequence(items: readonly Plan[], procedures: ReadonlyMap<string, RuleProcedure>): Matcher {
  const subs = items.map((item) => compilePlan(item, procedures));
  return (state, pos) => {
    const children: SyntaxChild[] = [];
    let cur = pos;
    for (const sub of subs) {
      const r = sub(state, cur);
      if (!r.ok) return fail(pos);
      children.push(...r.value);
      cur = r.pos;
    }
    return ok(children, cur);
  };
}

function compileChoice(plan: ChoicePlan, procedures: ReadonlyMap<string, RuleProcedure>): Matcher {
  const alternatives = plan.alternatives.map((alt) => ({
    plan: alt,
    match: compileSequence(alt.items, procedures),
  }));

  if (plan.strategy === "ordered") {
    return (state, pos) => {
      for (const alt of alternatives) {
        const r = alt.match(state, pos);
        if (r.ok) return r;
      }
      return fail(pos);
    };
  }

  const viable = (alt: AlternativePlan, kind: string): boolean => alt.nullable || alt.first.has(kind);
  return (state, pos) => {
    const kind = state.kindAt(pos);
    for (const alt of alternatives) {
      if (!viable(alt.plan, kind)) {
        state.expect(pos, alt.plan.first);
        continue;
      }
      const r = alt.match(state, pos);
      if (r.ok) return r;
    }
    return fail(pos);
  };
}

function compilePlan(plan: Plan, procedures: ReadonlyMap<string, RuleProcedure>): Matcher {
  switch (plan.kind) {
    case "literal":
      return (state, pos) => {
        if (pos < state.tokens.length && state.tokens[pos].kind === plan.text) {
          return ok([state.tokens[pos]], pos + 1);
        }
        state.expect(pos, [plan.text]);
        return fail(pos);
      };

    case "reference":
      return (state, pos) => {
        const target = procedures.get(plan.name);
        if (!target) throw new UndefinedRuleError(plan.name, null);
        const r = target(state, pos);
        return r.ok ? ok([r.value], r.pos) : r;
      };

    case "sequence":
      return compileSequence(plan.items, procedures);

    case "choice":
      return compileChoice(plan, procedures);

    case "repetition": {
      const body = compilePlan(plan.body, procedures);
      return (state, pos) => {
        const matches: SyntaxChild[][] = [];
        let cur = pos;
        for (;;) {
          if (!plan.first.has(state.kindAt(cur))) {
            state.expect(cur, plan.first);
            break;
          }
          const r = body(state, cur);
          if (!r.ok || r.pos === cur) break;
          matches.push(r.value);
          cur = r.pos;
        }
        if (!plan.allowEmpty && matches.length === 0) return fail(pos);
        return ok([{ type: "repeat", matches }], cur);
      };
    }

    case "optional": {
      const body = compilePlan(plan.body, procedures);
      return (state, pos) => {
        if (!plan.nullable && !plan.first.has(state.kindAt(pos))) {
          state.expect(pos, plan.first);
          return ok([{ type: "optional", match: null }], pos);
        }
        const r = body(state, pos);
        if (r.ok) return ok([{ type: "optional", match: r.value }], r.pos);
        return ok([{ type: "optional", match: null }], pos);
      };
    }

    case "exception": {
      const body = compilePlan(plan.body, procedures);
      const except = compilePlan(plan.except, procedures);
      return (state, pos) => {
        const excluded = state.lookahead(() => except(state, pos));
        if (excluded.ok) {
          state.expect(pos, []);
          return fail(pos);
        }
        return body(state, pos);
      };
    }
  }
}

/**
 * A rule procedure. After a base alternative matches, each infix
 * alternative is tried in turn as `middle… , R`; the right operand recurses,
 * so chains nest to the right.
 */
function compileRule(rule: RulePlan, procedures: ReadonlyMap<string, RuleProcedure>): RuleProcedure {
  const body = compileChoice(rule.body, procedures);
  const operators = rule.infix.map((op) => compileSequence(op.middle, procedures));

  const procedure: RuleProcedure = (state, pos) => {
    state.enter(rule.name, pos);
    try {
      const base = body(state, pos);
      if (!base.ok) return base;
      const left = node(rule.name, base.value);
      for (const middle of operators) {
        const m = middle(state, base.pos);
        if (!m.ok) continue;
        const right = procedure(state, m.pos);
        if (!right.ok) continue;
        return ok(node(rule.name, [left, ...m.value, right.value]), right.pos);
      }
      return ok(left, base.pos);
    } finally {
      state.leave();
    }
  };
  return procedure;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Compile a parser model into a reusable ParserObject.
 *
 * The object is frozen and holds no per-parse state, so one instance can
 * serve any number of parses.
 *
 * @example
 * ```typescript
 * const parser = emit(build(validate(load(source))));
 * const outcome = parser.parse(tokens);
 * if (outcome.ok) console.log(formatTree(outcome.tree));
 * ```
 */
export function emit(model: ParserModel, options: EmitOptions = {}): ParserObject {
  // References resolve through this table only; callers get a copy.
  const procedures = new Map<string, RuleProcedure>();
  for (const [name, rule] of model.rules) {
    procedures.set(name, compileRule(rule, procedures));
  }

  const parser: ParserObject = Object.freeze({
    entry: model.entry,
    model,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    procedures: new Map(procedures),
    procedure(name: string): RuleProcedure {
      const found = procedures.get(name);
      if (!found) throw new UndefinedRuleError(name, null);
      return found;
    },
    parse(tokens: Iterable<Token>, parseOptions?: ParseOptions): ParseOutcome {
      return parse(parser, tokens, parseOptions);
    },
  });
  return parser;
}
