/**
 * Renders grammar IR back to EBNF text in the loader's meta-syntax.
 * Loading the output yields the same rules, positions aside.
 */

import type { Alternative, Grammar, GrammarRule, Term } from "./types.js";

function printLiteral(text: string): string {
  return text.includes('"') ? `'${text}'` : `"${text}"`;
}

function printAlternative(alt: Alternative): string {
  return alt.terms.map(printTerm).join(" , ");
}

/** Contents of a bracket pair, without the brackets. */
function printBody(term: Term): string {
  switch (term.type) {
    case "sequence":
      return term.terms.map(printTerm).join(" , ");
    case "choice":
      return term.alternatives.map(printAlternative).join(" | ");
    default:
      return printTerm(term);
  }
}

/** Exception operands are primaries; a nested exception needs its own group. */
function printOperand(term: Term): string {
  return term.type === "exception" ? `( ${printTerm(term)} )` : printTerm(term);
}

export function printTerm(term: Term): string {
  switch (term.type) {
    case "literal":
      return printLiteral(term.text);
    case "reference":
      return term.name;
    case "sequence":
    case "choice":
      return `( ${printBody(term)} )`;
    case "repetition":
      return `{ ${printBody(term.term)} }${term.allowEmpty ? "" : "-"}`;
    case "optional":
      return `[ ${printBody(term.term)} ]`;
    case "exception":
      return `${printOperand(term.term)} - ${printOperand(term.except)}`;
  }
}

export function printRule(rule: GrammarRule): string {
  return `${rule.name} = ${rule.alternatives.map(printAlternative).join(" | ")} ;`;
}

/** One rule per line, in declaration order. */
export function printGrammar(grammar: Grammar): string {
  return grammar.rules.map(printRule).join("\n") + "\n";
}
