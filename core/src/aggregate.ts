/**
 * Aggregation Engine
 *
 * Groups rows by their full hierarchy path (first-appearance order, rows in
 * table order within a group) and reduces each value column with its own
 * aggregation function before writing the terminal slot.
 */

import { AggregationTypeError } from './errors.js';
import { getDefaultLogger, type Logger } from './logging.js';
import { assertNestingColumns, insertLeaf, keyPath, makeLeaf } from './nest.js';
import { cell, scalarsId } from './table.js';
import { createBranch, type CellValue, type NestedResult, type Row, type Scalar, type Table } from './types.js';

// =============================================================================
// Types
// =============================================================================

export const AGGREGATE_FUNCTIONS = ['sum', 'mean', 'first', 'last', 'min', 'max', 'collect'] as const;

/**
 * Aggregation function identifier. `collect` keeps every value as a sequence.
 */
export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

/** Accepted spellings of `collect` */
const AGGREGATE_ALIASES: Readonly<Record<string, AggregateFunction>> = {
  list: 'collect',
  'collect-as-sequence': 'collect',
};

/**
 * Value column → aggregation function. Columns not listed use the default.
 * Values are strings so that specs loaded from JSON can carry unknown names.
 */
export type AggregateSpec = Readonly<Record<string, AggregateFunction | string>>;

export interface AggregateOptions {
  /** Function for unlisted columns and unknown names (default: 'first') */
  defaultFunction?: AggregateFunction;
  logger?: Logger;
}

/**
 * Single-pass accumulator
 */
interface Aggregator {
  update(value: Scalar): void;
  finalize(): CellValue;
}

// =============================================================================
// Aggregators
// =============================================================================

export function isAggregateFunction(value: string): value is AggregateFunction {
  return AGGREGATE_FUNCTIONS.some(fn => fn === value);
}

/**
 * Map an identifier to a known function, or undefined.
 */
export function resolveAggregateFunction(name: string): AggregateFunction | undefined {
  if (isAggregateFunction(name)) return name;
  return AGGREGATE_ALIASES[name];
}

function numeric(column: string, fn: AggregateFunction, value: Scalar): number | null {
  if (value === null) return null;
  if (typeof value !== 'number') {
    throw new AggregationTypeError(column, fn, value);
  }
  return value;
}

function createAggregator(column: string, fn: AggregateFunction): Aggregator {
  switch (fn) {
    case 'sum': {
      let sum = 0;
      return {
        update(v) {
          const n = numeric(column, fn, v);
          if (n !== null) sum += n;
        },
        finalize: () => sum,
      };
    }

    case 'mean': {
      let sum = 0;
      let count = 0;
      return {
        update(v) {
          const n = numeric(column, fn, v);
          if (n !== null) {
            sum += n;
            count++;
          }
        },
        finalize: () => (count > 0 ? sum / count : null),
      };
    }

    case 'min':
    case 'max': {
      let best: number | null = null;
      return {
        update(v) {
          const n = numeric(column, fn, v);
          if (n === null) return;
          if (best === null || (fn === 'min' ? n < best : n > best)) {
            best = n;
          }
        },
        finalize: () => best,
      };
    }

    case 'first': {
      let first: Scalar = null;
      let found = false;
      return {
        update(v) {
          if (!found && v !== null) {
            first = v;
            found = true;
          }
        },
        finalize: () => first,
      };
    }

    case 'last': {
      let last: Scalar = null;
      return {
        update(v) {
          if (v !== null) last = v;
        },
        finalize: () => last,
      };
    }

    case 'collect': {
      const values: Scalar[] = [];
      return {
        update(v) {
          values.push(v);
        },
        finalize: () => values,
      };
    }

    default: {
      const _exhaustiveCheck: never = fn;
      throw new Error(`Unhandled aggregate function: ${String(_exhaustiveCheck)}`);
    }
  }
}

/**
 * Resolve the function for every value column, warning once per unknown name.
 */
export function planAggregation(
  valueColumns: readonly string[],
  spec: AggregateSpec,
  options: AggregateOptions = {}
): AggregateFunction[] {
  const fallback = options.defaultFunction ?? 'first';
  const logger = options.logger ?? getDefaultLogger();

  for (const column of Object.keys(spec)) {
    if (!valueColumns.includes(column)) {
      logger.debug(`Aggregation for "${column}" ignored; not a value column`, {
        operation: 'aggregate',
        column,
      });
    }
  }

  return valueColumns.map(column => {
    const name = Object.prototype.hasOwnProperty.call(spec, column) ? spec[column] : undefined;
    if (name === undefined) {
      return fallback;
    }
    const fn = resolveAggregateFunction(name);
    if (fn === undefined) {
      logger.warn(`Unknown aggregation "${name}" for column "${column}"; using "${fallback}"`, {
        operation: 'aggregate',
        column,
        function: name,
      });
      return fallback;
    }
    return fn;
  });
}

/**
 * Reduce a column over a group of rows.
 *
 * @throws AggregationTypeError when a numeric function meets a non-numeric cell
 */
export function aggregateColumn(rows: readonly Row[], column: string, fn: AggregateFunction): CellValue {
  const aggregator = createAggregator(column, fn);
  for (const row of rows) {
    aggregator.update(cell(row, column));
  }
  return aggregator.finalize();
}

// =============================================================================
// Grouped Nesting
// =============================================================================

/** Rows sharing one full hierarchy path */
export interface RowGroup {
  keys: Scalar[];
  rows: Row[];
}

/**
 * Partition rows by full hierarchy path, groups in first-appearance order.
 */
export function groupRows(rows: readonly Row[], hierarchy: readonly string[]): RowGroup[] {
  const groups = new Map<string, RowGroup>();
  for (const row of rows) {
    const keys = keyPath(row, hierarchy);
    const id = scalarsId(keys);
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { keys, rows: [row] });
    }
  }
  return [...groups.values()];
}

/**
 * Nest rows under `hierarchy`, reducing each group's value columns with
 * the functions named in `spec`.
 *
 * @throws SchemaError if a hierarchy or value column is missing
 * @throws AggregationTypeError on non-numeric input to sum, mean, min or max
 *
 * @example
 * ```typescript
 * buildAggregated(table, ['G'], ['v'], { v: 'sum' });
 * // root → 'A' → { kind: 'value', value: 6 }
 * ```
 */
export function buildAggregated(
  table: Table,
  hierarchy: readonly string[],
  valueColumns: readonly string[],
  spec: AggregateSpec,
  options: AggregateOptions = {}
): NestedResult {
  assertNestingColumns(table, hierarchy, valueColumns);
  const plan = planAggregation(valueColumns, spec, options);
  const functionFor = new Map(valueColumns.map((column, i) => [column, plan[i]] as const));

  const root = createBranch();
  for (const group of groupRows(table.rows, hierarchy)) {
    const leaf = makeLeaf(valueColumns, column =>
      aggregateColumn(group.rows, column, functionFor.get(column) ?? 'first')
    );
    insertLeaf(root, group.keys, leaf);
  }
  return { depth: hierarchy.length, root };
}
