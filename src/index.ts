/**
 * ebnf-parsegen
 *
 * Compiles EBNF grammars into reusable recursive-descent parsers.
 *
 * Provides:
 * - A grammar loader for ISO-style EBNF text, and a printer back to text
 * - Validation: undefined rules, left recursion, empty loops, ambiguity
 * - FIRST/FOLLOW-annotated parser models and emitted per-rule procedures
 * - A runtime that parses token streams into syntax trees
 *
 * @module
 */

// Core types
export type {
  SourcePosition,
  Term,
  Alternative,
  GrammarRule,
  Grammar,
  Token,
  SyntaxNode,
  SyntaxRepeat,
  SyntaxOptional,
  SyntaxChild,
} from "./types.js";

// Errors and warnings
export {
  ParsegenError,
  GrammarSyntaxError,
  DuplicateRuleError,
  UndefinedRuleError,
  LeftRecursionError,
  InfiniteLoopError,
  LexError,
  ParseError,
  ParseSyntaxError,
  TrailingInputError,
  RecursionDepthExceededError,
  ConfigError,
  formatWarning,
} from "./errors.js";
export type { ErrorPhase, GrammarWarning, UnreachableRuleWarning, AmbiguityWarning } from "./errors.js";

// Pipeline stages
export { load, type LoadOptions } from "./loader.js";
export { printGrammar, printRule, printTerm } from "./printer.js";
export { END_OF_INPUT, analyzeGrammar, type GrammarAnalysis } from "./analysis.js";
export { validate, type ValidatedGrammar, type InfixAlternative } from "./validator.js";
export {
  build,
  type ParserModel,
  type RulePlan,
  type ChoicePlan,
  type AlternativePlan,
  type InfixPlan,
  type Plan,
  type ChoiceStrategy,
} from "./model.js";
export { emit, type EmitOptions, type ParserObject, type RuleProcedure } from "./emitter.js";
export { parse, parseOrThrow, type ParseOptions, type ParseOutcome } from "./runtime.js";
export { ParseState, DEFAULT_MAX_DEPTH, type Step, type Procedure } from "./state.js";
export { compile, compileFile, type CompileOptions, type CompiledGrammar } from "./pipeline.js";

// Collaborators
export { createLexer, type Lexer, type LexerOptions } from "./lexer.js";
export { isToken, isNode, tokensOf, textOf, findChild, formatTree } from "./syntax.js";

// Configuration
export {
  defineConfig,
  loadConfig,
  resolveConfig,
  configFromEnv,
  type ParsegenConfig,
  type ResolvedConfig,
  type ConfigLayer,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./config.js";
