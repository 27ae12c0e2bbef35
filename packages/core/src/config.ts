/**
 * Configuration
 *
 * Configuration is resolved from (in priority order):
 *
 * 1. Environment variables: POLYDISPATCH_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@polydispatch/core";
 *
 * config.flag("debug", false)            // → boolean
 * config.set({ dispatch: { retry: false } });
 * ```
 *
 * Registries read the shared `config` unless they are given their own
 * instance from `createConfig()`.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Dispatch configuration options.
 */
export interface DispatchConfig {
  /** Try the next candidate when an implementation throws a retryable error */
  retry?: boolean;
  /** Log the outcome of every candidate tried */
  trace?: boolean;
}

/**
 * Introspection configuration options.
 */
export interface IntrospectConfig {
  /** Cache descriptors parsed from function source */
  cache?: boolean;
}

/**
 * Full configuration schema.
 */
export interface PolydispatchConfig {
  /** Enable debug logging */
  debug?: boolean;
  dispatch?: DispatchConfig;
  introspect?: IntrospectConfig;
}

/** A configuration instance. */
export interface Config {
  /** Get a configuration value by dotted path. */
  get(path: string): unknown;
  /** Read a boolean setting, falling back when unset or not a boolean. */
  flag(path: string, fallback: boolean): boolean;
  /** Set configuration values programmatically. */
  set(values: PolydispatchConfig): void;
  /** Get all configuration values. */
  getAll(): Readonly<Record<string, unknown>>;
  /** Reset to defaults plus environment (mainly for testing). */
  reset(): void;
}

type ConfigRecord = Record<string, unknown>;

const ENV_PREFIX = "POLYDISPATCH_";

const DEFAULTS: PolydispatchConfig = {
  debug: false,
  dispatch: {
    retry: true,
    trace: false,
  },
  introspect: {
    cache: true,
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
function deepMerge(target: ConfigRecord, source: object): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with POLYDISPATCH_ are parsed into the config object.
 *
 * Examples:
 *   POLYDISPATCH_DEBUG=1                → { debug: true }
 *   POLYDISPATCH_DISPATCH_RETRY=false   → { dispatch: { retry: false } }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator too
    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

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
// Public API
// ============================================================================

/**
 * Create a configuration instance.
 *
 * @param overrides - Programmatic values applied over the defaults
 * @param env - Environment to read POLYDISPATCH_* variables from
 */
export function createConfig(
  overrides: PolydispatchConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const initial = (): ConfigRecord =>
    deepMerge(deepMerge(deepMerge({}, DEFAULTS), overrides), loadConfigFromEnv(env));

  let store = initial();

  return {
    get(path) {
      return getNestedValue(store, path);
    },
    flag(path, fallback) {
      const value = getNestedValue(store, path);
      return typeof value === "boolean" ? value : fallback;
    },
    set(values) {
      // Environment variables stay on top of programmatic values
      store = deepMerge(deepMerge(store, values), loadConfigFromEnv(env));
    },
    getAll() {
      return store;
    },
    reset() {
      store = initial();
    },
  };
}

/**
 * The shared configuration used by registries that are not given their own.
 */
export const config: Config = createConfig();
