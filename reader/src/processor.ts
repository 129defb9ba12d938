/**
 * @tabnest/reader - Table Processor
 *
 * Binds a workbook to a configuration and runs the core transforms over
 * sheet selections, filling unset options from the config.
 */

import {
  keysAt,
  keysAtMany,
  transform,
  transformAggregated,
  withContext,
  type AggregateTransformOptions,
  type KeyPath,
  type Logger,
  type NestedResult,
  type Scalar,
  type Table,
  type TransformOptions,
} from '@tabnest/core';
import { createLoggerFromConfig, DEFAULT_CONFIG, type TabnestConfig } from '@tabnest/config';
import { readSheets } from './workbook.js';
import type { SheetSelection, Workbook } from './types.js';

// =============================================================================
// Options
// =============================================================================

interface SheetOptions {
  /** Add the provenance column when unioning sheets (default: config.reader.addSheetColumn) */
  addSheetColumn?: boolean;
}

export type NestedOptions = Omit<TransformOptions, 'logger'> & SheetOptions;

export type AggregatedNestedOptions = Omit<AggregateTransformOptions, 'logger'> & SheetOptions;

export interface TableProcessorOptions {
  config?: TabnestConfig;
  /** Overrides the logger built from `config.observability` */
  logger?: Logger;
}

// =============================================================================
// Processor
// =============================================================================

/**
 * Runs transforms and lookups over a workbook's sheets.
 *
 * @example
 * ```typescript
 * const processor = createTableProcessor(workbook, {
 *   config: createConfig({ reader: { addSheetColumn: true } }),
 * });
 * const result = processor.toNested(['Q1', 'Q2'], {
 *   hierarchy: ['_sheet_name', 'region'],
 *   valueColumns: 'revenue',
 * });
 * processor.keysAt(result, 'Q1'); // ['North', 'South']
 * ```
 */
export class TableProcessor {
  readonly config: TabnestConfig;
  private readonly workbook: Workbook;
  private readonly logger: Logger;

  constructor(workbook: Workbook, options: TableProcessorOptions = {}) {
    this.workbook = workbook;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = withContext(options.logger ?? createLoggerFromConfig(this.config), {
      service: 'tabnest-reader',
    });
  }

  get sheetNames(): readonly string[] {
    return this.workbook.sheetNames;
  }

  /**
   * Read a sheet selection as one table.
   */
  read(sheets: SheetSelection, addSheetColumn = this.config.reader.addSheetColumn): Table {
    return readSheets(this.workbook, sheets, {
      addSheetColumn,
      sheetColumnName: this.config.reader.sheetColumnName,
      logger: this.logger,
    });
  }

  toNested(sheets: SheetSelection, options: NestedOptions): NestedResult {
    const { addSheetColumn, ...transformOptions } = options;
    return transform(this.read(sheets, addSheetColumn), {
      ...transformOptions,
      normalize: transformOptions.normalize ?? this.config.transform.normalizeTuples,
      logger: this.logger,
    });
  }

  toNestedAggregated(sheets: SheetSelection, options: AggregatedNestedOptions): NestedResult {
    const { addSheetColumn, ...transformOptions } = options;
    return transformAggregated(this.read(sheets, addSheetColumn), {
      ...transformOptions,
      normalize: transformOptions.normalize ?? this.config.transform.normalizeTuples,
      defaultAggregation: transformOptions.defaultAggregation ?? this.config.transform.defaultAggregation,
      logger: this.logger,
    });
  }

  keysAt(result: NestedResult, path: KeyPath, level = this.config.lookup.defaultLevel): Scalar[] {
    return keysAt(result, path, level);
  }

  keysAtMany(
    result: NestedResult,
    paths: readonly KeyPath[],
    level = this.config.lookup.defaultLevel
  ): Set<Scalar> {
    return keysAtMany(result, paths, level);
  }
}

/**
 * Create a table processor for a workbook.
 */
export function createTableProcessor(
  workbook: Workbook,
  options: TableProcessorOptions = {}
): TableProcessor {
  return new TableProcessor(workbook, options);
}
