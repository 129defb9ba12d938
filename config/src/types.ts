/**
 * @tabnest/config - Type Definitions
 *
 * Configuration schema shared by the tabnest packages.
 *
 * @packageDocumentation
 * @module @tabnest/config
 */

import type { AggregateFunction, LogLevel } from '@tabnest/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

/**
 * Deep readonly type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = T extends object
  ? { readonly [P in keyof T]: DeepReadonly<T[P]> }
  : T;

// =============================================================================
// Sections
// =============================================================================

/**
 * Defaults for the transform operations.
 */
export interface TransformConfig {
  /** Decode tuple-shaped strings in results */
  normalizeTuples: boolean;

  /** Aggregation for value columns without an explicit function */
  defaultAggregation: AggregateFunction;
}

/**
 * Defaults for key lookups.
 */
export interface LookupConfig {
  /** Levels to descend when a lookup does not name one */
  defaultLevel: number;
}

/**
 * Workbook reading.
 *
 * @example
 * ```typescript
 * const readerConfig: ReaderConfig = {
 *   sheetColumnName: '_sheet_name',
 *   addSheetColumn: true,
 * };
 * ```
 */
export interface ReaderConfig {
  /** Name of the provenance column added when sheets are unioned */
  sheetColumnName: string;

  /** Add the provenance column unless a call says otherwise */
  addSheetColumn: boolean;
}

/**
 * Log output format.
 */
export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Console output format */
  logFormat: LogFormat;
}

/**
 * Complete tabnest configuration.
 */
export interface TabnestConfig {
  transform: TransformConfig;
  lookup: LookupConfig;
  reader: ReaderConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ConfigError {
  /** Path to the invalid field (e.g., 'lookup.defaultLevel') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ConfigWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigError[];
  warnings: ConfigWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'TABNEST') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
