/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: QCALC_* (highest priority)
 * 2. Config files: .qcalcrc, .qcalcrc.json, .qcalcrc.yaml, qcalc.config.cjs, etc.
 * 3. package.json: "qcalc" key
 * 4. Programmatic: config.set() calls
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "./core/config.js";
 *
 * config.get("primes.preload")  // → 0
 * config.getAll().verbose       // → false
 * ```
 *
 * @example Config file (.qcalcrc.json)
 * ```json
 * { "verbose": true, "primes": { "preload": 100 } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration as written by users. Every key is optional.
 */
export interface QcalcConfig {
  /** Log diagnostics to stderr */
  verbose?: boolean;
  /** Colorize log output */
  color?: boolean;
  primes?: {
    /** Number of primes to compute before reading input */
    preload?: number;
  };
}

/**
 * Configuration after defaults are applied and values are checked.
 */
export interface ResolvedConfig {
  readonly verbose: boolean;
  readonly color: boolean;
  readonly primes: {
    readonly preload: number;
  };
}

type ConfigRecord = Record<string, unknown>;

const DEFAULTS: ResolvedConfig = {
  verbose: false,
  color: true,
  primes: { preload: 0 },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let programmatic: ConfigRecord = {};
let resolved: ResolvedConfig = DEFAULTS;
let configLoaded = false;
let configFilePath: string | undefined;
let configWarnings: string[] = [];

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "qcalc";

export interface LoadOptions {
  /** Directory to look for config files in (default: cwd) */
  searchFrom?: string;
}

let loadOptions: LoadOptions = {};

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): ConfigRecord {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.cjs`,
      ],
      searchStrategy: "none",
    });

    const result = explorer.search(loadOptions.searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        return loaded;
      }
      configWarnings.push(`${result.filepath} does not contain an object; ignoring it`);
    }
  } catch (error) {
    // A broken config file falls back to the defaults
    const message = error instanceof Error ? error.message : String(error);
    configWarnings.push(`Failed to load config file: ${message}`);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with QCALC_ are parsed into the config object.
 *
 * Examples:
 *   QCALC_VERBOSE=1         → { verbose: true }
 *   QCALC_COLOR=false       → { color: false }
 *   QCALC_PRIMES_PRELOAD=50 → { primes: { preload: 50 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};
  const PREFIX = "QCALC_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/_/g, ".");

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

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: ConfigRecord = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
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
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Validation
// ============================================================================

function pickBoolean(raw: ConfigRecord, path: string, fallback: boolean): boolean {
  const value = getNestedValue(raw, path);
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;
  configWarnings.push(`"${path}" must be a boolean, got ${JSON.stringify(value)}; using ${fallback}`);
  return fallback;
}

function pickCount(raw: ConfigRecord, path: string, fallback: number): number {
  const value = getNestedValue(raw, path);
  if (value === undefined || value === false) return fallback;
  // QCALC_PRIMES_PRELOAD=1 arrives as a boolean
  if (value === true) return 1;
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  configWarnings.push(
    `"${path}" must be a non-negative integer, got ${JSON.stringify(value)}; using ${fallback}`,
  );
  return fallback;
}

function resolve(raw: ConfigRecord): ResolvedConfig {
  return {
    verbose: pickBoolean(raw, "verbose", DEFAULTS.verbose),
    color: pickBoolean(raw, "color", DEFAULTS.color),
    primes: {
      preload: pickCount(raw, "primes.preload", DEFAULTS.primes.preload),
    },
  };
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > programmatic > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  configWarnings = [];
  configFilePath = undefined;
  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  configStore = deepMerge(deepMerge(programmatic, fileConfig), envConfig);
  resolved = resolve(configStore);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a raw configuration value by dot-notation path.
 *
 * @example
 * config.get("verbose")        // → true
 * config.get("primes.preload") // → 100
 */
function get(path: string): unknown {
  initializeConfig();
  const value = getNestedValue(configStore, path);
  return value === undefined ? getNestedValue(DEFAULTS, path) : value;
}

/**
 * Set configuration values programmatically. Files and environment still win.
 */
function set(values: QcalcConfig): void {
  programmatic = deepMerge(programmatic, { ...values });
  configLoaded = false;
}

/**
 * Get the checked configuration with defaults filled in.
 */
function getAll(): ResolvedConfig {
  initializeConfig();
  return resolved;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Problems found while loading, for the caller to log.
 */
function getWarnings(): readonly string[] {
  initializeConfig();
  return configWarnings;
}

/**
 * Change where config files are looked up. Takes effect on the next read.
 */
function configure(options: LoadOptions): void {
  loadOptions = { ...options };
  configLoaded = false;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  resolved = DEFAULTS;
  configLoaded = false;
  configFilePath = undefined;
  configWarnings = [];
  loadOptions = {};
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  getWarnings,
  configure,
  reset,
};

/**
 * Identity helper for typed config files (qcalc.config.cjs).
 */
export function defineConfig(values: QcalcConfig): QcalcConfig {
  return values;
}
