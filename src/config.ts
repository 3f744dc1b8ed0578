/**
 * Configuration
 *
 * Settings are resolved from (in priority order):
 *
 * 1. Programmatic options passed to `compile()` / `compileFile()`
 * 2. Environment variables: PARSEGEN_* (for CI overrides)
 * 3. Config files: .parsegenrc, .parsegenrc.json, parsegen.config.js, etc.,
 *    or the "parsegen" key of package.json
 * 4. Defaults
 *
 * @example Config file (parsegen.config.mjs)
 * ```typescript
 * import { defineConfig } from "ebnf-parsegen";
 *
 * export default defineConfig({
 *   maxDepth: 2000,
 *   verbose: true,
 * });
 * ```
 */

import { cosmiconfig } from "cosmiconfig";
import { ConfigError } from "./errors.js";
import { DEFAULT_MAX_DEPTH } from "./state.js";

// ============================================================================
// Types
// ============================================================================

export interface ParsegenConfig {
  /** Rule-call depth limit for each parse. */
  maxDepth?: number;
  /** Log each pipeline stage and every grammar warning. */
  verbose?: boolean;
  /** Entry rule; defaults to the grammar's first rule. */
  entry?: string;
}

export interface ResolvedConfig {
  readonly maxDepth: number;
  readonly verbose: boolean;
  readonly entry?: string;
}

/** One configuration source, before validation. */
export type ConfigLayer = { readonly [K in keyof ParsegenConfig]?: unknown };

export interface LoadConfigOptions {
  /** Directory to look for config files in. Defaults to the working directory. */
  searchFrom?: string;
  /** Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>;
}

export interface LoadedConfig {
  readonly config: ResolvedConfig;
  /** The config file used, if any. */
  readonly filepath?: string;
}

const MODULE_NAME = "parsegen";
const ENV_PREFIX = "PARSEGEN_";

const DEFAULTS: ResolvedConfig = { maxDepth: DEFAULT_MAX_DEPTH, verbose: false };

/** Identity helper for typed config files. */
export function defineConfig(config: ParsegenConfig): ParsegenConfig {
  return config;
}

// ============================================================================
// Sources
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read PARSEGEN_* variables.
 *
 * Examples:
 *   PARSEGEN_MAX_DEPTH=2000  → { maxDepth: 2000 }
 *   PARSEGEN_VERBOSE=1       → { verbose: true }
 *   PARSEGEN_ENTRY=program   → { entry: "program" }
 */
export function configFromEnv(env: Readonly<Record<string, string | undefined>>): ConfigLayer {
  const layer: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // PARSEGEN_MAX_DEPTH → maxDepth
    const name = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

    if (value === "1" || value === "true") {
      layer[name] = true;
    } else if (value === "0" || value === "false" || value === "") {
      layer[name] = false;
    } else if (/^\d+$/.test(value)) {
      layer[name] = parseInt(value, 10);
    } else {
      layer[name] = value;
    }
  }

  return { maxDepth: layer.maxDepth, verbose: layer.verbose, entry: layer.entry };
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merge layers over the defaults (later layers win) and validate the result.
 * Keys a layer leaves `undefined` fall through to earlier layers.
 *
 * @throws ConfigError for a value of the wrong type or range
 */
export function resolveConfig(...layers: readonly ConfigLayer[]): ResolvedConfig {
  let maxDepth: unknown = DEFAULTS.maxDepth;
  let verbose: unknown = DEFAULTS.verbose;
  let entry: unknown = undefined;

  for (const layer of layers) {
    if (layer.maxDepth !== undefined) maxDepth = layer.maxDepth;
    if (layer.verbose !== undefined) verbose = layer.verbose;
    if (layer.entry !== undefined) entry = layer.entry;
  }

  if (typeof maxDepth !== "number" || !Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new ConfigError("maxDepth", `expected a positive integer, got ${JSON.stringify(maxDepth)}`);
  }
  if (typeof verbose !== "boolean") {
    throw new ConfigError("verbose", `expected a boolean, got ${JSON.stringify(verbose)}`);
  }
  if (entry !== undefined && (typeof entry !== "string" || entry.length === 0)) {
    throw new ConfigError("entry", `expected a rule name, got ${JSON.stringify(entry)}`);
  }

  return entry === undefined ? { maxDepth, verbose } : { maxDepth, verbose, entry };
}

/**
 * Load configuration files, then apply environment overrides.
 * Uses cosmiconfig to search for config in standard locations.
 *
 * @throws ConfigError when a config file cannot be read or holds bad values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
      `${MODULE_NAME}.config.mjs`,
    ],
  });

  let fileLayer: ConfigLayer = {};
  let filepath: string | undefined;
  try {
    const result = await explorer.search(options.searchFrom);
    if (result && !result.isEmpty) {
      const found: unknown = result.config;
      if (!isRecord(found)) {
        throw new ConfigError("file", `${result.filepath} does not hold an object`);
      }
      fileLayer = found;
      filepath = result.filepath;
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError("file", error instanceof Error ? error.message : String(error));
  }

  const config = resolveConfig(fileLayer, configFromEnv(options.env ?? process.env));
  return filepath === undefined ? { config } : { config, filepath };
}
