/**
 * @tabnest/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import {
  createConsoleLogger,
  getDefaultLogger,
  isAggregateFunction,
  LogLevels,
  type AggregateFunction,
  type Logger,
  type LogLevel,
} from '@tabnest/core';
import { DEFAULT_CONFIG } from './defaults.js';
import type { DeepPartial, EnvConfigOptions, LogFormat, TabnestConfig } from './types.js';

/**
 * Copy the defined own properties of a partial section.
 */
function compact<T extends object>(value: Partial<T> | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!value) {
    return result;
  }
  for (const key in value) {
    // Skip undefined values - they should not override
    if (Object.prototype.hasOwnProperty.call(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  return { ...base, ...compact(override) };
}

function mergePartialSection<T extends object>(
  base: Partial<T> | undefined,
  override: Partial<T> | undefined
): Partial<T> {
  return { ...compact(base), ...compact(override) };
}

/**
 * Deep freeze an object to prevent mutation.
 */
function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  Object.freeze(obj);
  return obj;
}

/**
 * Create a complete TabnestConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen TabnestConfig with all values filled in
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   lookup: { defaultLevel: 2 },
 *   observability: { logLevel: 'debug' },
 * });
 *
 * // Build on another config
 * const quiet = createConfig({ observability: { logLevel: 'error' } }, config);
 * ```
 */
export function createConfig(
  overrides: DeepPartial<TabnestConfig> = {},
  base: TabnestConfig = DEFAULT_CONFIG
): TabnestConfig {
  return deepFreeze({
    transform: mergeSection(base.transform, overrides.transform),
    lookup: mergeSection(base.lookup, overrides.lookup),
    reader: mergeSection(base.reader, overrides.reader),
    observability: mergeSection(base.observability, overrides.observability),
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { lookup: { defaultLevel: 2 } },
 *   { lookup: { defaultLevel: 3 }, reader: { addSheetColumn: true } }
 * );
 * // merged.lookup.defaultLevel === 3
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<TabnestConfig> | null | undefined>
): DeepPartial<TabnestConfig> {
  let result: DeepPartial<TabnestConfig> = {};

  for (const config of configs) {
    if (config) {
      result = {
        transform: mergePartialSection<TabnestConfig['transform']>(result.transform, config.transform),
        lookup: mergePartialSection<TabnestConfig['lookup']>(result.lookup, config.lookup),
        reader: mergePartialSection<TabnestConfig['reader']>(result.reader, config.reader),
        observability: mergePartialSection<TabnestConfig['observability']>(result.observability, config.observability),
      };
    }
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function parseChoice<T extends string>(
  value: string | undefined,
  isChoice: (candidate: string) => candidate is T,
  variable: string,
  logger: Logger
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (isChoice(value)) {
    return value;
  }
  logger.warn(`Ignoring unrecognized value for ${variable}`, { operation: 'config', variable, value });
  return undefined;
}

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: TABNEST_<SECTION>_<FIELD>
 * For example:
 * - TABNEST_TRANSFORM_NORMALIZE_TUPLES=false
 * - TABNEST_TRANSFORM_DEFAULT_AGGREGATION=collect
 * - TABNEST_LOOKUP_DEFAULT_LEVEL=2
 * - TABNEST_READER_SHEET_COLUMN_NAME=source
 * - TABNEST_OBSERVABILITY_LOG_LEVEL=debug
 *
 * Unrecognized choices are ignored with a warning on the default logger.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_LOOKUP_DEFAULT_LEVEL: '2' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): TabnestConfig {
  const prefix = options.prefix ?? 'TABNEST';
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});
  const logger = getDefaultLogger();

  const variable = (...parts: string[]): string => [prefix, ...parts].join('_').toUpperCase();

  const normalizeTuples = parseBoolean(getEnvVar(env, prefix, 'TRANSFORM', 'NORMALIZE', 'TUPLES'));
  const defaultAggregation = parseChoice<AggregateFunction>(
    getEnvVar(env, prefix, 'TRANSFORM', 'DEFAULT', 'AGGREGATION'),
    isAggregateFunction,
    variable('TRANSFORM', 'DEFAULT', 'AGGREGATION'),
    logger
  );
  const defaultLevel = parseNumber(getEnvVar(env, prefix, 'LOOKUP', 'DEFAULT', 'LEVEL'));
  const sheetColumnName = getEnvVar(env, prefix, 'READER', 'SHEET', 'COLUMN', 'NAME');
  const addSheetColumn = parseBoolean(getEnvVar(env, prefix, 'READER', 'ADD', 'SHEET', 'COLUMN'));
  const logLevel = parseChoice<LogLevel>(
    getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL'),
    LogLevels.isLogLevel,
    variable('OBSERVABILITY', 'LOG', 'LEVEL'),
    logger
  );
  const logFormat = parseChoice<LogFormat>(
    getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT'),
    isLogFormat,
    variable('OBSERVABILITY', 'LOG', 'FORMAT'),
    logger
  );

  return createConfig({
    transform: { normalizeTuples, defaultAggregation },
    lookup: { defaultLevel },
    reader: { sheetColumnName, addSheetColumn },
    observability: { logLevel, logFormat },
  });
}

// =============================================================================
// Logging
// =============================================================================

/**
 * Create the console logger described by `config.observability`.
 */
export function createLoggerFromConfig(config: TabnestConfig): Logger {
  return createConsoleLogger({
    format: config.observability.logFormat,
    minLevel: config.observability.logLevel,
  });
}
