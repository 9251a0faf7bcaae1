/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: MARKWEAVE_*
 * 3. Config files: .markweaverc, markweave.config.js, package.json#markweave
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@markweave/core";
 *
 * config.get("debug")                      // → boolean
 * config.getString("runtime.counter.module") // → "@markweave/runtime"
 *
 * config.set({ runtime: { trace: "TraceError" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** Where the invocation counter lives and how it is called */
export interface CounterConfig {
  module?: string;
  name?: string;
  method?: string;
}

/** Where the logger factory lives and how a warning is emitted */
export interface LoggerConfig {
  module?: string;
  factory?: string;
  accessor?: string;
  type?: string;
  method?: string;
}

export interface RuntimeConfig {
  counter?: CounterConfig;
  logger?: LoggerConfig;
  /** Constructor whose instance is passed to the logger as a stack trace */
  trace?: string;
}

/**
 * Full markweave configuration schema.
 */
export interface MarkweaveConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Glob patterns of file names the transformer leaves untouched */
  exclude?: string[];
  /** Runtime symbols that instrumented code calls into */
  runtime?: RuntimeConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "markweave";
const ENV_PREFIX = "MARKWEAVE_";

const DEFAULTS: MarkweaveConfig = {
  debug: false,
  exclude: [],
  runtime: {
    counter: {
      module: "@markweave/runtime",
      name: "DeprecatedMethodInvocationCounter",
      method: "onDeprecatedMethodCalled",
    },
    logger: {
      module: "@markweave/runtime",
      factory: "LoggerFactory",
      accessor: "getLogger",
      type: "Logger",
      method: "warn",
    },
    trace: "Error",
  },
};

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   MARKWEAVE_DEBUG=1                     → { debug: true }
 *   MARKWEAVE_RUNTIME_COUNTER_MODULE=x    → { runtime: { counter: { module: "x" } } }
 *   MARKWEAVE_EXCLUDE=a.ts,b.ts           → { exclude: ["a.ts", "b.ts"] }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");
    setNestedValue(envConfig, configPath, parseEnvValue(configPath, value));
  }

  return envConfig;
}

function parseEnvValue(configPath: string, value: string): unknown {
  if (configPath === "exclude") {
    return value
      .split(",")
      .map((pattern) => pattern.trim())
      .filter((pattern) => pattern.length > 0);
  }
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Config File Loading
// ============================================================================

function loadConfigFromFiles(): ConfigRecord {
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
    const result = explorer.search();
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
      console.warn(`[markweave] Ignoring ${result.filepath}: configuration must be an object`);
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[markweave] Failed to load configuration file: ${reason}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge({ ...DEFAULTS }, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/** A string value, or `fallback` when the path is unset or not a string */
function getString(path: string, fallback?: string): string | undefined {
  const value = get(path);
  return typeof value === "string" ? value : fallback;
}

/** A list of strings; a single string counts as a one-element list */
function getStringArray(path: string): string[] {
  const value = get(path);
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

/**
 * Set configuration values programmatically.
 */
function set(values: MarkweaveConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
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
 * Reset configuration (mainly for testing). The next read reloads it.
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Whether `fileName` matches one of the `exclude` patterns, or one of
 * `extraPatterns`.
 */
function isExcluded(fileName: string, extraPatterns: readonly string[] = []): boolean {
  const normalized = fileName.replace(/\\/g, "/");
  return [...getStringArray("exclude"), ...extraPatterns].some((pattern) =>
    matchGlob(normalized, pattern)
  );
}

/**
 * Simple glob matching: `**` spans directories, `*` stays within one,
 * `?` matches one character. Patterns without a slash match the base name.
 */
function matchGlob(fileName: string, pattern: string): boolean {
  const subject = pattern.includes("/") ? fileName : fileName.slice(fileName.lastIndexOf("/") + 1);
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*\*\/?/g, "\0")
    .replace(/\*/g, "[^/]*")
    .replace(/\?/g, "[^/]")
    .replace(/\0/g, ".*");
  return new RegExp(`^${regexStr}$`).test(subject);
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getString,
  getStringArray,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  isExcluded,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: MarkweaveConfig): MarkweaveConfig {
  return cfg;
}

export { loadConfigFromEnv, matchGlob };
