/**
 * Table utilities shared by the nesting and aggregation engines:
 * construction, schema checks, cell access, deduplication and sorting.
 */

import { SchemaError } from './errors.js';
import type { Row, Scalar, Table } from './types.js';

// =============================================================================
// Construction & Access
// =============================================================================

/**
 * Build a table from rows. When `columns` is omitted the column set is the
 * union of row keys in first-appearance order.
 */
export function createTable(rows: readonly Row[], columns?: readonly string[]): Table {
  if (columns) {
    return { columns: [...columns], rows };
  }
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return { columns: [...seen], rows };
}

/**
 * Read a cell; absent keys read as null.
 */
export function cell(row: Row, column: string): Scalar {
  return Object.prototype.hasOwnProperty.call(row, column) ? row[column] ?? null : null;
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column);
}

/**
 * Columns from `required` absent from the table, de-duplicated, in request order.
 */
export function missingColumns(table: Table, required: readonly string[]): string[] {
  const available = new Set(table.columns);
  const missing: string[] = [];
  for (const column of required) {
    if (!available.has(column) && !missing.includes(column)) {
      missing.push(column);
    }
  }
  return missing;
}

/**
 * @throws SchemaError naming every missing column
 */
export function assertColumns(
  table: Table,
  required: readonly string[],
  role: 'hierarchy' | 'value' | 'sort'
): void {
  const missing = missingColumns(table, required);
  if (missing.length > 0) {
    throw SchemaError.missingColumns(missing, role, table.columns);
  }
}

// =============================================================================
// Deduplication
// =============================================================================

/**
 * Type-tagged identity for a cell. Two cells get the same id exactly when
 * they are SameValueZero-equal, as `Map` keys are: 1 and "1" differ,
 * NaN and Infinity keep apart from null, -0 and 0 match.
 */
export function scalarId(value: Scalar): string {
  if (value === null) return 'z';
  if (typeof value === 'boolean') return value ? 'b:1' : 'b:0';
  if (typeof value === 'number') return `n:${value === 0 ? '0' : String(value)}`;
  return `s:${value}`;
}

/**
 * Identity of a key path or row projection, one {@link scalarId} per cell.
 */
export function scalarsId(values: readonly Scalar[]): string {
  return JSON.stringify(values.map(scalarId));
}

function rowKey(row: Row, columns: readonly string[]): string {
  return scalarsId(columns.map(column => cell(row, column)));
}

/**
 * Drop rows equal to an earlier row on every column. First occurrence wins.
 */
export function dedupRows(table: Table): Table {
  const seen = new Set<string>();
  const rows: Row[] = [];
  for (const row of table.rows) {
    const key = rowKey(row, table.columns);
    if (!seen.has(key)) {
      seen.add(key);
      rows.push(row);
    }
  }
  return { columns: table.columns, rows };
}

// =============================================================================
// Sorting
// =============================================================================

/**
 * Code-unit string order, independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

const TYPE_RANK = {
  boolean: 0,
  number: 1,
  string: 2,
} as const;

function isMissing(value: Scalar): boolean {
  return value === null || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * Total order for sorting: booleans, numbers and strings, then missing
 * cells (null and NaN) last.
 */
export function compareForSort(a: Scalar, b: Scalar): number {
  const aMissing = isMissing(a);
  const bMissing = isMissing(b);
  if (aMissing || bMissing) {
    return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
  }
  if (a === null || b === null) return 0;

  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return compareStrings(a, b);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  return typeRank(a) - typeRank(b);
}

function typeRank(value: string | number | boolean): number {
  return TYPE_RANK[typeof value === 'boolean' ? 'boolean' : typeof value === 'number' ? 'number' : 'string'];
}

/**
 * Stable ascending sort by one or more columns.
 *
 * @throws SchemaError if a sort column is missing
 */
export function sortRows(table: Table, sortBy: string | readonly string[]): Table {
  const columns = typeof sortBy === 'string' ? [sortBy] : sortBy;
  if (columns.length === 0) {
    return table;
  }
  assertColumns(table, columns, 'sort');

  // Array.prototype.sort is stable
  const rows = table.rows.slice();
  rows.sort((a, b) => {
    for (const column of columns) {
      const cmp = compareForSort(cell(a, column), cell(b, column));
      if (cmp !== 0) return cmp;
    }
    return 0;
  });
  return { columns: table.columns, rows };
}

// =============================================================================
// Preparation
// =============================================================================

export interface PrepareOptions {
  /** Drop exact duplicate rows */
  dedup?: boolean;
  /** Stable-sort rows by column(s), ascending, nulls last */
  sortBy?: string | readonly string[];
}

/**
 * Apply optional dedup, then optional sort.
 */
export function prepareRows(table: Table, options: PrepareOptions = {}): Table {
  let prepared = table;
  if (options.dedup) {
    prepared = dedupRows(prepared);
  }
  if (options.sortBy !== undefined) {
    prepared = sortRows(prepared, options.sortBy);
  }
  return prepared;
}

/**
 * Resolve a value selection to an explicit column list.
 * `undefined` selects every column outside the hierarchy.
 */
export function resolveValueColumns(
  table: Table,
  hierarchy: readonly string[],
  valueColumns?: string | readonly string[]
): string[] {
  if (valueColumns === undefined) {
    return table.columns.filter(column => !hierarchy.includes(column));
  }
  if (typeof valueColumns === 'string') {
    return [valueColumns];
  }
  return [...valueColumns];
}
