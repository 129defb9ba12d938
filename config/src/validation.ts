/**
 * @tabnest/config - Configuration Validation
 *
 * Validates configuration values and reports errors and warnings.
 *
 * @packageDocumentation
 */

import { isAggregateFunction, LogLevels } from '@tabnest/core';
import type {
  ConfigError,
  ConfigValidationResult,
  ConfigWarning,
  TabnestConfig,
} from './types.js';

/** Lookups deeper than this usually mean a wrong hierarchy */
const DEEP_LOOKUP_LEVEL = 16;

/**
 * Validate a complete TabnestConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   logger.error('Config errors', undefined, { errors: result.errors.map(e => e.message) });
 * }
 * ```
 */
export function validateConfig(config: TabnestConfig): ConfigValidationResult {
  const errors: ConfigError[] = [];
  const warnings: ConfigWarning[] = [];

  validateTransformConfig(config.transform, errors);
  validateLookupConfig(config.lookup, errors, warnings);
  validateReaderConfig(config.reader, errors);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateTransformConfig(
  transform: TabnestConfig['transform'],
  errors: ConfigError[]
): void {
  if (typeof transform.normalizeTuples !== 'boolean') {
    errors.push({
      path: 'transform.normalizeTuples',
      message: 'normalizeTuples must be a boolean',
      value: transform.normalizeTuples,
    });
  }

  if (!isAggregateFunction(String(transform.defaultAggregation))) {
    errors.push({
      path: 'transform.defaultAggregation',
      message: 'Unknown aggregation function',
      value: transform.defaultAggregation,
      suggestion: 'Use one of: sum, mean, first, last, min, max, collect',
    });
  }
}

function validateLookupConfig(
  lookup: TabnestConfig['lookup'],
  errors: ConfigError[],
  warnings: ConfigWarning[]
): void {
  if (!Number.isInteger(lookup.defaultLevel) || lookup.defaultLevel < 1) {
    errors.push({
      path: 'lookup.defaultLevel',
      message: 'Default lookup level must be a positive integer',
      value: lookup.defaultLevel,
      suggestion: 'Use 1 to return the direct children of the start path',
    });
  } else if (lookup.defaultLevel > DEEP_LOOKUP_LEVEL) {
    warnings.push({
      path: 'lookup.defaultLevel',
      message: `Default lookup level exceeds ${DEEP_LOOKUP_LEVEL}`,
      value: lookup.defaultLevel,
      recommendation: 'Lookups past the hierarchy depth return no keys',
    });
  }
}

function validateReaderConfig(
  reader: TabnestConfig['reader'],
  errors: ConfigError[]
): void {
  if (typeof reader.sheetColumnName !== 'string' || reader.sheetColumnName.trim() === '') {
    errors.push({
      path: 'reader.sheetColumnName',
      message: 'Sheet column name must be a non-empty string',
      value: reader.sheetColumnName,
    });
  }

  if (typeof reader.addSheetColumn !== 'boolean') {
    errors.push({
      path: 'reader.addSheetColumn',
      message: 'addSheetColumn must be a boolean',
      value: reader.addSheetColumn,
    });
  }
}

function validateObservabilityConfig(
  observability: TabnestConfig['observability'],
  errors: ConfigError[],
  warnings: ConfigWarning[]
): void {
  if (!LogLevels.isLogLevel(String(observability.logLevel))) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Invalid log level',
      value: observability.logLevel,
      suggestion: 'Use one of: debug, info, warn, error',
    });
  }

  if (observability.logFormat !== 'json' && observability.logFormat !== 'pretty') {
    errors.push({
      path: 'observability.logFormat',
      message: 'Invalid log format',
      value: observability.logFormat,
      suggestion: "Use 'json' or 'pretty'",
    });
  }

  if (observability.logLevel === 'debug' && observability.logFormat === 'pretty') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Debug logging writes one summary line per transform',
      value: observability.logLevel,
      recommendation: "Use 'json' format when shipping debug logs",
    });
  }
}
