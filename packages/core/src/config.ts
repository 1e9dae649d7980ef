/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for handlekit packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: HANDLEKIT_* (highest priority, for CI overrides)
 * 2. Config files: handlekit.config.js, .handlekitrc, "handlekit" in package.json
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@handlekit/core";
 *
 * config.get("log.level")                // → "warn"
 * config.set({ log: { level: "debug" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Log thresholds, from quietest to loudest.
 */
export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface LogConfig {
  /** Lines above this level are dropped */
  level?: LogLevel;
}

/**
 * Full handlekit configuration schema.
 */
export interface HandlekitConfig {
  /** Enable debug mode (forces log.level to "debug") */
  debug?: boolean;
  /** Logging configuration */
  log?: LogConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: HandlekitConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "HANDLEKIT_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   HANDLEKIT_DEBUG=1              → { debug: true }
 *   HANDLEKIT_LOG_LEVEL=debug      → { log: { level: "debug" } }
 */
function loadConfigFromEnv(): HandlekitConfig {
  const envConfig: HandlekitConfig = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
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
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "handlekit";

/**
 * Load configuration synchronously from files in the standard locations.
 */
function loadConfigFromFiles(): HandlekitConfig {
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
  if (result && !result.isEmpty && isPlainObject(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): HandlekitConfig {
  return {
    debug: false,
    log: { level: "warn" },
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults(), fileConfig), envConfig);
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

/**
 * Set configuration values programmatically.
 *
 * Environment variables keep precedence: they are merged again on top.
 */
function set(values: Partial<HandlekitConfig>): void {
  initializeConfig();
  configStore = deepMerge(deepMerge(configStore, values), loadConfigFromEnv());
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
function getAll(): Readonly<HandlekitConfig> {
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
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * The unified configuration object.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Type helper for defining configuration files.
 *
 * @example
 * ```javascript
 * // handlekit.config.js
 * import { defineConfig } from "@handlekit/core";
 * export default defineConfig({ log: { level: "info" } });
 * ```
 */
export function defineConfig(cfg: HandlekitConfig): HandlekitConfig {
  return cfg;
}
