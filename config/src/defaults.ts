/**
 * @tabnest/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { TabnestConfig } from './types.js';

/** Column holding each row's sheet name when sheets are unioned */
export const DEFAULT_SHEET_COLUMN = '_sheet_name';

const DEFAULT_TRANSFORM_CONFIG = {
  normalizeTuples: true,
  defaultAggregation: 'first',
} as const;

const DEFAULT_LOOKUP_CONFIG = {
  defaultLevel: 1,
} as const;

const DEFAULT_READER_CONFIG = {
  sheetColumnName: DEFAULT_SHEET_COLUMN,
  addSheetColumn: false,
} as const;

const DEFAULT_OBSERVABILITY_CONFIG = {
  logLevel: 'warn',
  logFormat: 'pretty',
} as const;

/**
 * Default configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@tabnest/config';
 *
 * console.log(DEFAULT_CONFIG.lookup.defaultLevel); // 1
 *
 * const config = createConfig({
 *   transform: { defaultAggregation: 'collect' },
 * });
 * ```
 */
export const DEFAULT_CONFIG: TabnestConfig = Object.freeze({
  transform: Object.freeze({ ...DEFAULT_TRANSFORM_CONFIG }),
  lookup: Object.freeze({ ...DEFAULT_LOOKUP_CONFIG }),
  reader: Object.freeze({ ...DEFAULT_READER_CONFIG }),
  observability: Object.freeze({ ...DEFAULT_OBSERVABILITY_CONFIG }),
});
