/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: LOCKSTEP_* (for CI overrides)
 * 3. Config files: .locksteprc, .locksteprc.json, lockstep.config.js, etc.
 * 4. package.json: "lockstep" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@lockstep/core";
 *
 * config.get("logLevel"); // → "warn"
 * config.set({ debug: true });
 * ```
 *
 * @example Environment variables
 * ```bash
 * LOCKSTEP_DEBUG=1 npm test
 * LOCKSTEP_LOG_LEVEL=info node app.js
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "off" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["off", "error", "warn", "info", "debug"];

/**
 * Full lockstep configuration schema.
 */
export interface LockstepConfig {
  /** Enable debug mode (forces the `debug` log level) */
  debug?: boolean;
  /** Minimum level a logger writes */
  logLevel?: LogLevel;
}

export interface FileConfigResult {
  config: LockstepConfig;
  /** Path of the file the config came from, if one was found */
  filepath?: string;
}

export interface LoadOptions {
  /** Directory to search for config files (default: process.cwd()) */
  searchFrom?: string;
  /** Environment to read LOCKSTEP_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS: LockstepConfig = {
  debug: false,
  logLevel: "warn",
};

let configStore: LockstepConfig = {};
let programmatic: LockstepConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "lockstep";

/**
 * Load configuration synchronously from files in `searchFrom`.
 */
export function loadConfigFromFiles(searchFrom?: string): FileConfigResult {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      return {
        config: normalizeConfig(result.config, result.filepath),
        filepath: result.filepath,
      };
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[lockstep] Failed to load config file:`, error);
  }

  return { config: {} };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * The part after LOCKSTEP_ is converted to camelCase.
 *
 * Examples:
 *   LOCKSTEP_DEBUG=1            → { debug: true }
 *   LOCKSTEP_LOG_LEVEL=info     → { logLevel: "info" }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LockstepConfig {
  const raw: Record<string, unknown> = {};
  const PREFIX = "LOCKSTEP_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const name = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());

    if (value === "1" || value === "true") {
      raw[name] = true;
    } else if (value === "0" || value === "false" || value === "") {
      raw[name] = false;
    } else {
      raw[name] = value;
    }
  }

  return normalizeConfig(raw, "environment");
}

// ============================================================================
// Validation
// ============================================================================

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Keep the known, well-typed keys of a raw config object.
 * Invalid values are reported and dropped; unknown keys are ignored.
 */
export function normalizeConfig(raw: unknown, source: string): LockstepConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    console.warn(`[lockstep] Ignoring config from ${source}: expected an object`);
    return {};
  }

  const result: LockstepConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  if (entries.has("debug")) {
    const debug = entries.get("debug");
    if (typeof debug === "boolean") {
      result.debug = debug;
    } else {
      warnInvalid(source, "debug", debug);
    }
  }

  if (entries.has("logLevel")) {
    const logLevel = entries.get("logLevel");
    if (isLogLevel(logLevel)) {
      result.logLevel = logLevel;
    } else {
      warnInvalid(source, "logLevel", logLevel);
    }
  }

  return result;
}

function warnInvalid(source: string, key: string, value: unknown): void {
  console.warn(
    `[lockstep] Ignoring invalid value for "${key}" from ${source}: ${JSON.stringify(value)}`,
  );
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * (Re)load configuration from all sources.
 * Priority: programmatic > env vars > config files > defaults
 */
function load(options: LoadOptions = {}): void {
  const fileResult = loadConfigFromFiles(options.searchFrom);
  const envConfig = loadConfigFromEnv(options.env);

  configFilePath = fileResult.filepath;
  configStore = { ...DEFAULTS, ...fileResult.config, ...envConfig, ...programmatic };
  configLoaded = true;
}

function initializeConfig(): void {
  if (configLoaded) return;
  load();
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value.
 *
 * @example
 * config.get("debug")    // → false
 * config.get("logLevel") // → "warn"
 */
function get<K extends keyof LockstepConfig>(key: K): LockstepConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 * Merges with the existing configuration.
 */
function set(values: LockstepConfig): void {
  programmatic = { ...programmatic, ...values };
  if (configLoaded) {
    configStore = { ...configStore, ...values };
  }
}

/**
 * Read a value without loading anything: before the first load this sees
 * only defaults and `config.set()` values.
 */
function peek<K extends keyof LockstepConfig>(key: K): LockstepConfig[K] {
  return configLoaded ? configStore[key] : { ...DEFAULTS, ...programmatic }[key];
}

/**
 * True once files and environment have been read, by `config.load()` or by
 * the first `get`, `getAll` or `getConfigFilePath`.
 */
function isLoaded(): boolean {
  return configLoaded;
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<LockstepConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * The configuration API.
 */
export const config = {
  get,
  peek,
  set,
  getAll,
  isLoaded,
  load,
  getConfigFilePath,
  reset,
};

/**
 * Type-safe config helper for lockstep.config.js files.
 */
export function defineConfig(values: LockstepConfig): LockstepConfig {
  return values;
}
