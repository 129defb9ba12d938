/**
 * @tabnest/reader - Workbooks
 *
 * In-memory workbooks and sheet selection. A list selection unions its
 * sheets in listed order; the column set is the first-appearance union of
 * every selected sheet's columns, and cells a sheet lacks read as null.
 */

import {
  createTable,
  getDefaultLogger,
  SheetNotFoundError,
  ValidationError,
  type Row,
  type Table,
} from '@tabnest/core';
import { DEFAULT_SHEET_COLUMN } from '@tabnest/config';
import type {
  ReadSheetsOptions,
  SheetSelection,
  SheetSource,
  Workbook,
  WorkbookInput,
} from './types.js';

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a table from rows, inferring columns from row keys.
 */
export function tableFromRows(rows: readonly Row[]): Table {
  return createTable(rows);
}

function isTable(source: SheetSource): source is Table {
  return !Array.isArray(source);
}

function isSheetMap(input: WorkbookInput): input is ReadonlyMap<string, SheetSource> {
  return input instanceof Map;
}

function toTable(source: SheetSource): Table {
  return isTable(source) ? source : tableFromRows(source);
}

/**
 * Create an in-memory workbook.
 *
 * @example
 * ```typescript
 * const workbook = createWorkbook({
 *   Q1: [{ region: 'North', revenue: 10 }],
 *   Q2: [{ region: 'North', revenue: 12 }],
 * });
 * workbook.sheetNames; // ['Q1', 'Q2']
 * ```
 */
export function createWorkbook(input: WorkbookInput): Workbook {
  const sheets = new Map<string, Table>();
  const entries = isSheetMap(input) ? input.entries() : Object.entries(input);
  for (const [name, source] of entries) {
    sheets.set(name, toTable(source));
  }

  const sheetNames = Object.freeze([...sheets.keys()]);

  return {
    sheetNames,
    sheet(name: string): Table {
      const table = sheets.get(name);
      if (table === undefined) {
        throw new SheetNotFoundError(name, sheetNames);
      }
      return table;
    },
  };
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Read one sheet, or union several in listed order.
 *
 * Every name is resolved before any row is copied, so an unknown sheet
 * fails the whole call. The provenance column only applies to list
 * selections.
 *
 * @throws SheetNotFoundError for an unknown sheet name
 * @throws ValidationError for an empty list
 */
export function readSheets(
  workbook: Workbook,
  selection: SheetSelection,
  options: ReadSheetsOptions = {}
): Table {
  if (typeof selection === 'string') {
    return workbook.sheet(selection);
  }

  if (selection.length === 0) {
    throw new ValidationError('Sheet selection must name at least one sheet', [
      { path: ['sheets'], message: 'Expected at least one sheet name' },
    ]);
  }

  const addSheetColumn = options.addSheetColumn ?? false;
  const sheetColumn = options.sheetColumnName ?? DEFAULT_SHEET_COLUMN;
  const logger = options.logger ?? getDefaultLogger();

  const selected = selection.map(name => ({ name, table: workbook.sheet(name) }));

  const columns = new Set<string>();
  const rows: Row[] = [];
  for (const { name, table } of selected) {
    for (const column of table.columns) {
      columns.add(column);
    }
    if (addSheetColumn) {
      columns.add(sheetColumn);
    }
    for (const row of table.rows) {
      rows.push(addSheetColumn ? { ...row, [sheetColumn]: name } : row);
    }
  }

  logger.debug('Sheets unioned', {
    operation: 'readSheets',
    sheets: selection.length,
    rowsOut: rows.length,
  });

  return createTable(rows, [...columns]);
}
