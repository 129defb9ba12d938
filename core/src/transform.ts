/**
 * Public transform operations.
 *
 * Pipeline: validate options → check hierarchy, value and sort columns →
 * filter → dedup → sort → nest (or aggregate) → normalize.
 *
 * Schema checks run before filtering so that a call that is going to fail
 * does so before emitting filter warnings.
 */

import {
  buildAggregated,
  type AggregateFunction,
  type AggregateSpec,
} from './aggregate.js';
import { filterTable, type FilterSpec } from './filter.js';
import { getDefaultLogger, type Logger } from './logging.js';
import { buildNested } from './nest.js';
import { normalizeResult } from './normalize.js';
import { countLeaves } from './result.js';
import { assertColumns, prepareRows, resolveValueColumns } from './table.js';
import type { NestedResult, Table } from './types.js';
import {
  AggregateTransformOptionsSchema,
  TransformOptionsSchema,
  validate,
  type ValidatedTransformOptions,
} from './validation.js';

// =============================================================================
// Options
// =============================================================================

export interface TransformOptions {
  /** Key columns, outermost first */
  hierarchy: readonly string[];
  /** One column, an ordered list, or every non-hierarchy column when omitted */
  valueColumns?: string | readonly string[];
  filters?: FilterSpec;
  /** Drop exact duplicate rows before nesting */
  dedup?: boolean;
  /** Stable ascending sort before nesting, nulls last */
  sortBy?: string | readonly string[];
  /** Decode tuple-shaped strings in the result (default: true) */
  normalize?: boolean;
  logger?: Logger;
}

export interface AggregateTransformOptions extends TransformOptions {
  /** Value column → aggregation function */
  aggregate: AggregateSpec;
  /** Function for value columns missing from `aggregate` (default: 'first') */
  defaultAggregation?: AggregateFunction;
}

// =============================================================================
// Pipeline
// =============================================================================

interface PreparedInput {
  table: Table;
  hierarchy: string[];
  valueColumns: string[];
  rowsIn: number;
}

function prepare(table: Table, options: TransformOptions, parsed: ValidatedTransformOptions, logger: Logger): PreparedInput {
  const hierarchy = parsed.hierarchy;
  const valueColumns = resolveValueColumns(table, hierarchy, parsed.valueColumns);

  assertColumns(table, hierarchy, 'hierarchy');
  assertColumns(table, valueColumns, 'value');
  if (parsed.sortBy !== undefined) {
    assertColumns(table, typeof parsed.sortBy === 'string' ? [parsed.sortBy] : parsed.sortBy, 'sort');
  }

  const filtered = filterTable(table, options.filters, logger);
  const prepared = prepareRows(filtered, { dedup: parsed.dedup, sortBy: parsed.sortBy });

  return { table: prepared, hierarchy, valueColumns, rowsIn: table.rows.length };
}

function finish(
  result: NestedResult,
  input: PreparedInput,
  normalize: boolean | undefined,
  logger: Logger,
  operation: string,
  startTime: number
): NestedResult {
  const output = normalize === false ? result : normalizeResult(result);
  logger.debug(`${operation} complete`, {
    operation,
    rowsIn: input.rowsIn,
    rowsOut: input.table.rows.length,
    groups: countLeaves(output),
    durationMs: Date.now() - startTime,
  });
  return output;
}

/**
 * Nest a table under a key hierarchy. Rows sharing a full key path
 * overwrite each other, the last one winning.
 *
 * @throws ValidationError if the options are malformed
 * @throws SchemaError if a hierarchy, value or sort column is missing
 *
 * @example
 * ```typescript
 * const result = transform(table, {
 *   hierarchy: ['REGION', 'CITY'],
 *   valueColumns: 'POP',
 *   filters: { POP: { '>': 0 } },
 * });
 * keysAt(result, 'North'); // ['Hanoi', 'Haiphong']
 * ```
 */
export function transform(table: Table, options: TransformOptions): NestedResult {
  const startTime = Date.now();
  const parsed = validate(options, TransformOptionsSchema, 'transform options');
  const logger = options.logger ?? getDefaultLogger();

  const input = prepare(table, options, parsed, logger);
  const result = buildNested(input.table, input.hierarchy, input.valueColumns);
  return finish(result, input, parsed.normalize, logger, 'transform', startTime);
}

/**
 * Nest a table under a key hierarchy, reducing the rows of each key path
 * with per-column aggregation functions.
 *
 * @throws ValidationError if the options are malformed
 * @throws SchemaError if a hierarchy, value or sort column is missing
 * @throws AggregationTypeError if a numeric function meets a non-numeric cell
 *
 * @example
 * ```typescript
 * transformAggregated(sales, {
 *   hierarchy: ['REGION'],
 *   valueColumns: ['AMOUNT', 'ORDER_ID'],
 *   aggregate: { AMOUNT: 'sum', ORDER_ID: 'collect' },
 * });
 * ```
 */
export function transformAggregated(table: Table, options: AggregateTransformOptions): NestedResult {
  const startTime = Date.now();
  const parsed = validate(options, AggregateTransformOptionsSchema, 'aggregate transform options');
  const logger = options.logger ?? getDefaultLogger();

  const input = prepare(table, options, parsed, logger);
  const result = buildAggregated(input.table, input.hierarchy, input.valueColumns, options.aggregate, {
    defaultFunction: parsed.defaultAggregation,
    logger,
  });
  return finish(result, input, parsed.normalize, logger, 'transformAggregated', startTime);
}
