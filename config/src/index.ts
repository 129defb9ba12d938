/**
 * @tabnest/config
 *
 * Configuration defaults, merging, environment loading and validation
 * for the tabnest packages.
 *
 * @example
 * ```typescript
 * import { createConfig, getConfigFromEnv, validateConfig } from '@tabnest/config';
 *
 * const config = createConfig({ lookup: { defaultLevel: 2 } });
 * const fromEnv = getConfigFromEnv();
 * const { valid, errors } = validateConfig(config);
 * ```
 *
 * @packageDocumentation
 * @module @tabnest/config
 */

export type {
  DeepPartial,
  DeepReadonly,
  TransformConfig,
  LookupConfig,
  ReaderConfig,
  LogFormat,
  ObservabilityConfig,
  TabnestConfig,
  ConfigError,
  ConfigWarning,
  ConfigValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG, DEFAULT_SHEET_COLUMN } from './defaults.js';

export {
  createConfig,
  mergeConfigs,
  getConfigFromEnv,
  createLoggerFromConfig,
} from './config.js';

export { validateConfig } from './validation.js';
