/**
 * ebnf-parsegen Showcase
 *
 * Self-documenting walk through the pipeline: load a grammar, validate it,
 * build the parser model, emit a parser and run it over tokens.
 *
 * Run:   npx tsx examples/showcase.ts
 * Build: npx tsc && node dist/examples/showcase.js
 */

import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import {
  load,
  printGrammar,
  validate,
  build,
  emit,
  compile,
  createLexer,
  formatTree,
  findChild,
  textOf,
  LeftRecursionError,
  ParseSyntaxError,
} from "../src/index.js";

// ============================================================================
// 1. LOAD - EBNF text to grammar IR, and back
// ============================================================================

const listSource = `list = "[" , [ item , { "," , item } ] , "]" ; item = "x" | "y" ;`;
const grammar = load(listSource);

assert.equal(grammar.entry, "list");
assert.deepEqual(
  grammar.rules.map((rule) => rule.name),
  ["list", "item"]
);
assert.equal(printGrammar(grammar), `list = "[" , [ item , { "," , item } ] , "]" ;\nitem = "x" | "y" ;\n`);

// ============================================================================
// 2. VALIDATE AND MODEL - FIRST/FOLLOW sets and choice strategies
// ============================================================================

const validated = validate(grammar);
assert.deepEqual(validated.warnings, []);

const model = build(validated);
assert.deepEqual([...model.first("list")], ["["]);
assert.deepEqual([...model.follow("item")], [",", "]"]);
assert.equal(model.rules.get("item")?.body.strategy, "predictive");

// ============================================================================
// 3. EMIT AND PARSE - one reusable parser object
// ============================================================================

const parser = emit(model);
const lexer = createLexer(model.literals);

const outcome = parser.parse(lexer.tokenize("[x, y]"));
assert.ok(outcome.ok);
assert.equal(formatTree(outcome.tree), "list([ [item(x) {, item(y)}] ])");

// Failures carry the furthest position reached and what would have fit there.
const failed = parser.parse(lexer.tokenize("[x y]"));
assert.ok(!failed.ok);
assert.ok(failed.error instanceof ParseSyntaxError);
assert.equal(failed.error.message, 'Parse error at line 1, col 4: expected "," or "]", found "y"');

// ============================================================================
// 4. ONE CALL - compile a grammar file
// ============================================================================

const ml = compile(readFileSync(new URL("../grammars/standard-ml.ebnf", import.meta.url), "utf8"));
const mlLexer = createLexer(ml.model.literals);

const program = ml.parser.parse(mlLexer.tokenize("val answer ~42"));
assert.ok(program.ok);
const dec = findChild(program.tree, "dec");
assert.ok(dec);
assert.equal(textOf(dec), "val a n s w e r ~ 4 2");

// Arrows nest to the right, even though the grammar writes them left-recursively.
const typ = ml.parser.parse(mlLexer.tokenize("a -> b -> c"), { entry: "typ" });
assert.ok(typ.ok);
assert.equal(typ.tree.children.length, 3);

// ============================================================================
// 5. REJECTED GRAMMARS
// ============================================================================

assert.throws(() => compile(`e = e , "+" | "n" ;`), LeftRecursionError);

console.log("showcase: all assertions passed");
