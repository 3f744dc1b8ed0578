/**
 * One-call pipeline: grammar text → loaded, validated, modelled and emitted parser.
 */

import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { configFromEnv, loadConfig, resolveConfig, type ParsegenConfig, type ResolvedConfig } from "./config.js";
import { emit, type ParserObject } from "./emitter.js";
import { formatWarning, type GrammarWarning } from "./errors.js";
import { load } from "./loader.js";
import { build, type ParserModel } from "./model.js";
import type { Grammar } from "./types.js";
import { validate } from "./validator.js";

export interface CompileOptions extends ParsegenConfig {
  /** Source of PARSEGEN_* overrides. Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>;
}

export interface CompiledGrammar {
  readonly grammar: Grammar;
  readonly model: ParserModel;
  readonly parser: ParserObject;
  readonly warnings: readonly GrammarWarning[];
}

function run(text: string, config: ResolvedConfig): CompiledGrammar {
  const verbose = config.verbose;

  const grammar = load(text, { entry: config.entry });
  if (verbose) console.log(`[parsegen] Loaded ${grammar.rules.length} rules, entry '${grammar.entry}'`);

  const validated = validate(grammar);
  if (verbose) console.log(`[parsegen] Validated with ${validated.warnings.length} warning(s)`);

  const model = build(validated);
  if (verbose) console.log(`[parsegen] Built model over ${model.literals.length} literals`);

  const parser = emit(model, { maxDepth: config.maxDepth });
  if (verbose) console.log(`[parsegen] Emitted ${parser.procedures.size} procedures`);

  if (verbose) {
    for (const warning of validated.warnings) {
      console.warn(`[parsegen] warning: ${formatWarning(warning)}`);
    }
  }

  return { grammar, model, parser, warnings: validated.warnings };
}

/**
 * Compile grammar text in one step. PARSEGEN_* variables apply over the
 * defaults and `options` over those; config files are not consulted.
 *
 * @throws GrammarSyntaxError, DuplicateRuleError, UndefinedRuleError,
 *   LeftRecursionError, InfiniteLoopError or ConfigError
 *
 * @example
 * ```typescript
 * const { parser } = compile(`list = "[" , [ item , { "," , item } ] , "]" ; item = "x" ;`);
 * ```
 */
export function compile(text: string, options: CompileOptions = {}): CompiledGrammar {
  const { env, ...settings } = options;
  return run(text, resolveConfig(configFromEnv(env ?? process.env), settings));
}

/**
 * Read and compile a grammar file. Configuration is looked up next to the
 * file, then environment variables, then `options`.
 */
export async function compileFile(path: string, options: CompileOptions = {}): Promise<CompiledGrammar> {
  const { env, ...settings } = options;
  const [text, loaded] = await Promise.all([
    readFile(path, "utf8"),
    loadConfig(env === undefined ? { searchFrom: dirname(path) } : { searchFrom: dirname(path), env }),
  ]);
  return run(text, resolveConfig(loaded.config, settings));
}
