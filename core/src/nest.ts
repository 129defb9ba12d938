/**
 * Grouping/Nesting Engine
 *
 * Partitions rows into a nested map whose depth equals the hierarchy length.
 * Each row walks the hierarchy columns outermost first, creating or reusing
 * one branch per distinct key value, and writes its value columns into the
 * terminal slot addressed by the last hierarchy column.
 *
 * Two rows with the same full key path collide: the later row overwrites the
 * earlier one. Collisions are not reported; pass aggregation functions to
 * `buildAggregated` when rows are not unique per path.
 */

import { assertColumns, cell } from './table.js';
import {
  createBranch,
  type BranchNode,
  type CellValue,
  type LeafNode,
  type NestedResult,
  type Row,
  type Scalar,
  type Table,
} from './types.js';

/**
 * Check that every hierarchy and value column exists.
 *
 * @throws SchemaError naming the missing columns
 */
export function assertNestingColumns(
  table: Table,
  hierarchy: readonly string[],
  valueColumns: readonly string[]
): void {
  assertColumns(table, hierarchy, 'hierarchy');
  assertColumns(table, valueColumns, 'value');
}

/**
 * Build the terminal payload: a value node for one column, a record node
 * (fields in selection order) otherwise.
 */
export function makeLeaf(valueColumns: readonly string[], read: (column: string) => CellValue): LeafNode {
  if (valueColumns.length === 1) {
    return { kind: 'value', value: read(valueColumns[0]) };
  }
  const fields = new Map<string, CellValue>();
  for (const column of valueColumns) {
    fields.set(column, read(column));
  }
  return { kind: 'record', fields };
}

/**
 * Write `leaf` at `keys`, creating intermediate branches as needed.
 * An existing terminal slot at the same path is replaced.
 */
export function insertLeaf(root: BranchNode, keys: readonly Scalar[], leaf: LeafNode): void {
  let current = root;
  for (let i = 0; i < keys.length - 1; i++) {
    const existing = current.children.get(keys[i]);
    if (existing && existing.kind === 'branch') {
      current = existing;
    } else {
      const branch = createBranch();
      current.children.set(keys[i], branch);
      current = branch;
    }
  }
  current.children.set(keys[keys.length - 1], leaf);
}

/**
 * Hierarchy values of a row, outermost first.
 */
export function keyPath(row: Row, hierarchy: readonly string[]): Scalar[] {
  return hierarchy.map(column => cell(row, column));
}

/**
 * Nest rows under `hierarchy`, last write wins on identical key paths.
 *
 * @throws SchemaError if a hierarchy or value column is missing
 *
 * @example
 * ```typescript
 * const result = buildNested(table, ['REGION', 'CITY'], ['POP']);
 * // root → 'North' → 'Hanoi' → { kind: 'value', value: 8_000_000 }
 * ```
 */
export function buildNested(
  table: Table,
  hierarchy: readonly string[],
  valueColumns: readonly string[]
): NestedResult {
  assertNestingColumns(table, hierarchy, valueColumns);

  const root = createBranch();
  for (const row of table.rows) {
    insertLeaf(root, keyPath(row, hierarchy), makeLeaf(valueColumns, column => cell(row, column)));
  }
  return { depth: hierarchy.length, root };
}
