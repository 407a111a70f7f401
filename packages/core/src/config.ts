/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: CORRAL_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .corralrc, corral.config.js, package.json "corral" key, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@corral/core";
 *
 * config.get("collections.loadFactor")     // → 0.75
 * config.getString("log.level")            // → "warn"
 *
 * config.set({ collections: { nullKeys: "reject" } });
 * ```
 *
 * @example Config file (.corralrc.json)
 * ```json
 * { "log": { "level": "debug" }, "collections": { "initialCapacity": 64 } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

/**
 * Defaults applied when a container is constructed without explicit options.
 */
export interface CollectionsConfig {
  /** Initial bucket/slot count; hash tables round it up to a power of two */
  initialCapacity?: number;
  /** Occupancy ratio at which a hash table doubles */
  loadFactor?: number;
  /** Whether hash maps accept a single null/undefined key */
  nullKeys?: "permit" | "reject";
  /** Check comparator symmetry on every tree comparison */
  verifyComparator?: boolean;
}

/**
 * Full corral configuration schema.
 */
export interface CorralConfig {
  /** Enable debug mode (forces log level "debug") */
  debug?: boolean;
  log?: {
    level?: LogLevel;
  };
  collections?: CollectionsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let programmatic: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "corral";
const ENV_PREFIX = "CORRAL_";

const DEFAULTS: CorralConfig = {
  debug: false,
  log: {
    level: "warn",
  },
  collections: {
    initialCapacity: 16,
    loadFactor: 0.75,
    nullKeys: "permit",
    verifyComparator: true,
  },
};

// ============================================================================
// Config File Loading (cosmiconfig)
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
    }
  } catch (error) {
    // A broken config file falls back to defaults
    if (process.env.NODE_ENV === "development" || process.env.CORRAL_DEBUG === "1") {
      console.warn(`[corral/config] Failed to load config file:`, error);
    }
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * `__` separates nesting levels; a single `_` camel-cases the segment:
 *   CORRAL_DEBUG=1                        → { debug: 1 }, a flag to getBoolean
 *   CORRAL_LOG__LEVEL=debug               → { log: { level: "debug" } }
 *   CORRAL_COLLECTIONS__LOAD_FACTOR=0.5   → { collections: { loadFactor: 0.5 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .split("__")
      .map(camelCase)
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function camelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

function parseEnvValue(value: string): unknown {
  // Numerals stay numbers; getBoolean reads 1 and 0 as flags
  if (/^\d+(\.\d+)?$/.test(value)) return Number(value);
  if (value === "true") return true;
  if (value === "false" || value === "") return false;
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: ConfigRecord = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
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

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) continue;

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // defaults < file < programmatic < env
  configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, fileConfig), programmatic), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

function getNumber(path: string): number | undefined {
  const value = get(path);
  return typeof value === "number" && !Number.isNaN(value) ? value : undefined;
}

function getBoolean(path: string): boolean | undefined {
  const value = get(path);
  if (typeof value === "boolean") return value;
  if (value === 1 || value === 0) return value === 1;
  return undefined;
}

function getString(path: string): string | undefined {
  const value = get(path);
  return typeof value === "string" ? value : undefined;
}

/**
 * Merge values into the programmatic layer. Environment variables still win.
 */
function set(values: CorralConfig): void {
  programmatic = deepMerge(programmatic, values);
  configLoaded = false;
  initializeConfig();
}

function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

/**
 * Path of the config file that was loaded, if any.
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Drop programmatic values and reload from files and environment on next access.
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  getNumber,
  getBoolean,
  getString,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Identity helper giving config files type checking.
 */
export function defineConfig(c: CorralConfig): CorralConfig {
  return c;
}
