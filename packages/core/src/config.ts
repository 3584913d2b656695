/**
 * Configuration
 *
 * Loaded from (in priority order):
 *
 * 1. Environment variables: FINITARY_* (highest priority, for CI overrides)
 * 2. Config files found by cosmiconfig: `.finitaryrc`, `.finitaryrc.json`,
 *    `finitary.config.js`, or a `"finitary"` key in package.json
 * 3. Programmatic: `config.set()` calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@finitary/core";
 *
 * config.get<boolean>("debug");         // → false
 * config.get("limits.ceiling");         // → 1000000
 * config.set({ deadline: { chunk: 64 } });
 * ```
 *
 * @example Environment
 * ```
 * FINITARY_DEBUG=1                → { debug: true }
 * FINITARY_LIMITS_CEILING=5000    → { limits: { ceiling: 5000 } }
 * FINITARY_DEADLINE_CHUNK=256     → { deadline: { chunk: 256 } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface LimitsConfig {
  /**
   * Default ceiling for `enumerateBelow` when the caller passes none.
   * A decimal string is accepted for values beyond `Number.MAX_SAFE_INTEGER`.
   */
  ceiling?: number | string;
}

export interface DeadlineConfig {
  /** Values materialized between checks of the deadline. */
  chunk?: number;
}

/**
 * Full configuration schema.
 */
export interface FinitaryConfig {
  /** Write debug lines for derivations, rejections and deadline outcomes */
  debug?: boolean;
  limits?: LimitsConfig;
  deadline?: DeadlineConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

export const DEFAULT_CEILING = 1_000_000;
export const DEFAULT_CHUNK = 1024;

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "FINITARY_";

/**
 * Load configuration from environment variables.
 * `FINITARY_LIMITS_CEILING` becomes `limits.ceiling`.
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      const n = Number(value);
      parsedValue = Number.isSafeInteger(n) ? n : value;
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

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
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
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "finitary";

/**
 * Load configuration synchronously from files.
 * A config file that fails to load is reported and otherwise ignored.
 */
function loadConfigFromFiles(): Record<string, unknown> {
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

  try {
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    console.warn(`[finitary] Failed to load config file: ${String(error)}`);
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): FinitaryConfig {
  return {
    debug: false,
    limits: { ceiling: DEFAULT_CEILING },
    deadline: { chunk: DEFAULT_CHUNK },
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults(), fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path. The caller names the expected type;
 * values from files and the environment are not checked against it.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  const value: unknown = getNestedValue(configStore, path);
  return value as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<FinitaryConfig>): void {
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
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: FinitaryConfig): FinitaryConfig {
  return cfg;
}

// ============================================================================
// Typed Accessors
// ============================================================================

/** `limits.ceiling`, widened to a bigint. Falls back to the default when unparseable. */
export function configuredCeiling(): bigint {
  const raw = get<unknown>("limits.ceiling");
  if (typeof raw === "number" && Number.isInteger(raw) && raw >= 0) return BigInt(raw);
  if (typeof raw === "string" && /^\d+$/.test(raw)) return BigInt(raw);
  return BigInt(DEFAULT_CEILING);
}

/** `deadline.chunk`, at least 1. */
export function configuredChunk(): number {
  const raw = get<unknown>("deadline.chunk");
  return typeof raw === "number" && Number.isInteger(raw) && raw > 0 ? raw : DEFAULT_CHUNK;
}
