/**
 * Configuration for @tagweave/xml
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: TAGWEAVE_*
 * 3. Config files: package.json#tagweave, .tagweaverc, tagweave.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * Only the document layer reads configuration; the grammar and the parser
 * engine are pure.
 *
 * @example
 * ```bash
 * TAGWEAVE_DEBUG=1 node app.js                  # log every parseDocument call
 * TAGWEAVE_DOCUMENT_TRAILING=allow node app.js  # ignore input after the root
 * TAGWEAVE_DIAGNOSTICS_SNIPPET=40 node app.js   # longer error snippets
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { DEFAULT_SNIPPET_LENGTH } from "@tagweave/parser";

// ============================================================================
// Types
// ============================================================================

/** What `parseDocument` does with input left after the root element. */
export type TrailingInputPolicy = "error" | "allow";

export interface TagweaveConfig {
  /** Log each document parse via console.debug */
  debug: boolean;
  diagnostics: {
    /** Characters of remaining input quoted in a ParseError message */
    snippet: number;
  };
  document: {
    trailing: TrailingInputPolicy;
  };
}

/** A partial configuration, as accepted by config.set() and config files. */
export interface TagweaveConfigInput {
  debug?: boolean;
  diagnostics?: { snippet?: number };
  document?: { trailing?: TrailingInputPolicy };
}

type RawConfig = Record<string, unknown>;

const MODULE_NAME = "tagweave";
const ENV_PREFIX = "TAGWEAVE_";

const DEFAULTS: TagweaveConfig = {
  debug: false,
  diagnostics: { snippet: DEFAULT_SNIPPET_LENGTH },
  document: { trailing: "error" },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: TagweaveConfig | null = null;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSnippetLength(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isTrailingPolicy(value: unknown): value is TrailingInputPolicy {
  return value === "error" || value === "allow";
}

/**
 * Overlay one configuration source on `base`. Values of the wrong type are
 * ignored and `base` keeps its value.
 */
function applyLayer(base: TagweaveConfig, layer: unknown): TagweaveConfig {
  if (!isRecord(layer)) return base;
  const diagnostics: RawConfig = isRecord(layer.diagnostics) ? layer.diagnostics : {};
  const document: RawConfig = isRecord(layer.document) ? layer.document : {};

  return {
    debug: typeof layer.debug === "boolean" ? layer.debug : base.debug,
    diagnostics: {
      snippet: isSnippetLength(diagnostics.snippet) ? diagnostics.snippet : base.diagnostics.snippet,
    },
    document: {
      trailing: isTrailingPolicy(document.trailing) ? document.trailing : base.document.trailing,
    },
  };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: RawConfig, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/** Config paths whose environment values are always numbers. */
const NUMERIC_PATHS = new Set(["diagnostics.snippet"]);

function parseEnvValue(path: string, value: string): unknown {
  if (NUMERIC_PATHS.has(path) && /^\d+$/.test(value)) return parseInt(value, 10);
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Load configuration from environment variables.
 *
 *   TAGWEAVE_DEBUG=1                 → { debug: true }
 *   TAGWEAVE_DOCUMENT_TRAILING=allow → { document: { trailing: "allow" } }
 *   TAGWEAVE_DIAGNOSTICS_SNIPPET=0   → { diagnostics: { snippet: 0 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const envConfig: RawConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");
    setNestedValue(envConfig, configPath, parseEnvValue(configPath, value));
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

/**
 * Load the first config file found from `searchFrom` (default: cwd). A module
 * written as `export default defineConfig({...})` loads as `{ default: ... }`.
 */
function loadConfigFromFiles(): unknown {
  const result = cosmiconfigSync(MODULE_NAME).search(searchFrom);
  if (result && !result.isEmpty) {
    configFilePath = result.filepath;
    const loaded: unknown = result.config;
    return isRecord(loaded) && isRecord(loaded.default) ? loaded.default : loaded;
  }
  return undefined;
}

// ============================================================================
// Public API
// ============================================================================

function initializeConfig(): TagweaveConfig {
  if (configStore) return configStore;
  const fromFiles = applyLayer(DEFAULTS, loadConfigFromFiles());
  configStore = applyLayer(fromFiles, loadConfigFromEnv(process.env));
  return configStore;
}

/** The effective configuration. */
function get(): Readonly<TagweaveConfig> {
  return initializeConfig();
}

/** Override configuration values programmatically. */
function set(values: TagweaveConfigInput): void {
  configStore = applyLayer(initializeConfig(), values);
}

/** Get the path to the loaded config file (if any). */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Forget all loaded and programmatic values; the next read reloads. */
function reset(): void {
  configStore = null;
  configFilePath = undefined;
  searchFrom = undefined;
}

/** Reload configuration, searching for config files from `directory`. */
function load(directory?: string): Readonly<TagweaveConfig> {
  reset();
  searchFrom = directory;
  return initializeConfig();
}

export const config = {
  get,
  set,
  load,
  getConfigFilePath,
  reset,
};

/** Type helper for `tagweave.config.js` files. */
export function defineConfig(values: TagweaveConfigInput): TagweaveConfigInput {
  return values;
}
