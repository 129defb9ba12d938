/**
 * Predicate Evaluator
 *
 * Evaluates a declarative filter specification against every row of a table.
 * Conditions on different columns are ANDed, as are the operators inside one
 * operator map.
 *
 * Filters are advisory: a condition on an unknown column, an unknown
 * operator or a malformed operand is skipped with a warning and treats the
 * row as matching. Structural problems (hierarchy and value columns) are
 * handled by the schema checks, not here.
 *
 * @example
 * ```typescript
 * const adults = filterTable(people, {
 *   age: { '>=': 18, '<': 65 },
 *   country: ['VN', 'SG'],
 *   name: (value) => typeof value === 'string' && value.length > 2,
 * });
 * ```
 */

import { z } from 'zod';
import { getDefaultLogger, type Logger } from './logging.js';
import { cell, hasColumn } from './table.js';
import type { Row, Scalar, Table } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Caller-supplied single-value predicate. Exceptions propagate.
 */
export type Predicate = (value: Scalar) => boolean;

/** Membership operand */
export type ScalarCollection = readonly Scalar[] | ReadonlySet<Scalar>;

export const FILTER_OPERATORS = [
  '==',
  '!=',
  '>',
  '>=',
  '<',
  '<=',
  'in',
  'not_in',
  'contains',
  'startswith',
  'endswith',
  'between',
  'isnull',
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

/**
 * Operator map for a single column. All listed operators must hold.
 */
export interface OperatorConditions {
  '=='?: Scalar;
  '!='?: Scalar;
  '>'?: Scalar;
  '>='?: Scalar;
  '<'?: Scalar;
  '<='?: Scalar;
  in?: ScalarCollection;
  not_in?: ScalarCollection;
  /** Substring of the cell's string form */
  contains?: string;
  startswith?: string;
  endswith?: string;
  /** Inclusive `[low, high]` */
  between?: readonly [Scalar, Scalar];
  /** true keeps only nulls, false only non-nulls */
  isnull?: boolean;
}

/**
 * A column condition: equality, membership, predicate or operator map.
 */
export type FilterCondition = Scalar | ScalarCollection | Predicate | OperatorConditions;

export type FilterSpec = Readonly<Record<string, FilterCondition>>;

/** Compiled single-cell check */
type CellCheck = (value: Scalar) => boolean;

/**
 * Filter compiled against a table's column set
 */
export interface CompiledFilter {
  column: string;
  checks: CellCheck[];
}

// =============================================================================
// Operand Schemas
// =============================================================================

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const collectionSchema = z.union([z.array(scalarSchema), z.set(scalarSchema)]);

const textSchema = z.union([z.string(), z.number(), z.boolean()]).transform(v => String(v));

const OPERAND_SCHEMAS = {
  '==': scalarSchema,
  '!=': scalarSchema,
  '>': scalarSchema,
  '>=': scalarSchema,
  '<': scalarSchema,
  '<=': scalarSchema,
  in: collectionSchema,
  not_in: collectionSchema,
  contains: textSchema,
  startswith: textSchema,
  endswith: textSchema,
  between: z.tuple([scalarSchema, scalarSchema]),
  isnull: z.boolean(),
} satisfies Record<FilterOperator, z.ZodTypeAny>;

// =============================================================================
// Comparison Helpers
// =============================================================================

export function isFilterOperator(value: string): value is FilterOperator {
  return FILTER_OPERATORS.some(operator => operator === value);
}

/**
 * Equality used by `==`, `!=` and plain scalar conditions. Null never equals.
 */
export function scalarEquals(a: Scalar, b: Scalar): boolean {
  return a !== null && b !== null && a === b;
}

/**
 * Order two cells of the same primitive type. Returns undefined for nulls and
 * mixed types, which makes every ordering operator fail.
 */
export function compareScalars(a: Scalar, b: Scalar): number | undefined {
  if (a === null || b === null) return undefined;
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return undefined;
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  return undefined;
}

function isScalarCollection(value: FilterCondition): value is ScalarCollection {
  return Array.isArray(value) || value instanceof Set;
}

function isMember(collection: ScalarCollection, value: Scalar): boolean {
  return 'includes' in collection ? collection.includes(value) : collection.has(value);
}

function ordered(value: Scalar, operand: Scalar, test: (cmp: number) => boolean): boolean {
  const cmp = compareScalars(value, operand);
  return cmp !== undefined && test(cmp);
}

// =============================================================================
// Compilation
// =============================================================================

function compileOperator(
  column: string,
  operator: FilterOperator,
  rawOperand: unknown,
  logger: Logger
): CellCheck | undefined {
  const invalid = (issues: z.ZodIssue[]): undefined => {
    logger.warn(`Invalid operand for filter operator "${operator}" on column "${column}"; condition skipped`, {
      operation: 'filter',
      column,
      operator,
      issues: issues.map(issue => issue.message),
    });
    return undefined;
  };

  switch (operator) {
    case '==':
    case '!=':
    case '>':
    case '>=':
    case '<':
    case '<=': {
      const parsed = OPERAND_SCHEMAS[operator].safeParse(rawOperand);
      if (!parsed.success) return invalid(parsed.error.issues);
      const operand = parsed.data;
      if (operator === '==') return v => scalarEquals(v, operand);
      if (operator === '!=') return v => !scalarEquals(v, operand);
      if (operator === '>') return v => ordered(v, operand, c => c > 0);
      if (operator === '>=') return v => ordered(v, operand, c => c >= 0);
      if (operator === '<') return v => ordered(v, operand, c => c < 0);
      return v => ordered(v, operand, c => c <= 0);
    }

    case 'in':
    case 'not_in': {
      const parsed = OPERAND_SCHEMAS[operator].safeParse(rawOperand);
      if (!parsed.success) return invalid(parsed.error.issues);
      const collection = parsed.data;
      return operator === 'in'
        ? v => isMember(collection, v)
        : v => !isMember(collection, v);
    }

    case 'contains':
    case 'startswith':
    case 'endswith': {
      const parsed = OPERAND_SCHEMAS[operator].safeParse(rawOperand);
      if (!parsed.success) return invalid(parsed.error.issues);
      const text = parsed.data;
      if (operator === 'contains') return v => v !== null && String(v).includes(text);
      if (operator === 'startswith') return v => v !== null && String(v).startsWith(text);
      return v => v !== null && String(v).endsWith(text);
    }

    case 'between': {
      const parsed = OPERAND_SCHEMAS.between.safeParse(rawOperand);
      if (!parsed.success) return invalid(parsed.error.issues);
      const [low, high] = parsed.data;
      return v => ordered(v, low, c => c >= 0) && ordered(v, high, c => c <= 0);
    }

    case 'isnull': {
      const parsed = OPERAND_SCHEMAS.isnull.safeParse(rawOperand);
      if (!parsed.success) return invalid(parsed.error.issues);
      return parsed.data ? v => v === null : v => v !== null;
    }

    default: {
      const _exhaustiveCheck: never = operator;
      throw new Error(`Unhandled filter operator: ${String(_exhaustiveCheck)}`);
    }
  }
}

function compileCondition(column: string, condition: FilterCondition, logger: Logger): CellCheck[] {
  if (typeof condition === 'function') {
    const predicate = condition;
    return [v => Boolean(predicate(v))];
  }
  if (isScalarCollection(condition)) {
    const collection = condition;
    return [v => isMember(collection, v)];
  }
  if (condition === null || typeof condition !== 'object') {
    const operand = condition;
    return [v => scalarEquals(v, operand)];
  }

  const checks: CellCheck[] = [];
  for (const [operator, operand] of Object.entries(condition)) {
    if (!isFilterOperator(operator)) {
      logger.warn(`Unsupported filter operator "${operator}" on column "${column}"; condition skipped`, {
        operation: 'filter',
        column,
        operator,
      });
      continue;
    }
    const check = compileOperator(column, operator, operand, logger);
    if (check) {
      checks.push(check);
    }
  }
  return checks;
}

/**
 * Compile a filter spec against a table's columns. Warnings for unknown
 * columns, operators and operands are emitted here, once per call.
 */
export function compileFilters(
  table: Table,
  filters: FilterSpec,
  logger: Logger = getDefaultLogger()
): CompiledFilter[] {
  const compiled: CompiledFilter[] = [];
  for (const [column, condition] of Object.entries(filters)) {
    if (!hasColumn(table, column)) {
      logger.warn(`Filter column "${column}" not found; condition skipped`, {
        operation: 'filter',
        column,
      });
      continue;
    }
    const checks = compileCondition(column, condition, logger);
    if (checks.length > 0) {
      compiled.push({ column, checks });
    }
  }
  return compiled;
}

/**
 * Evaluate compiled filters against a row (AND logic).
 */
export function evaluateCompiledFilters(row: Row, compiled: readonly CompiledFilter[]): boolean {
  for (const { column, checks } of compiled) {
    const value = cell(row, column);
    for (const check of checks) {
      if (!check(value)) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Keep the rows satisfying every condition, in their original order.
 * The input table is not modified.
 */
export function filterTable(
  table: Table,
  filters: FilterSpec | undefined,
  logger: Logger = getDefaultLogger()
): Table {
  if (!filters) {
    return { columns: table.columns, rows: table.rows.slice() };
  }
  const compiled = compileFilters(table, filters, logger);
  return {
    columns: table.columns,
    rows: table.rows.filter(row => evaluateCompiledFilters(row, compiled)),
  };
}
