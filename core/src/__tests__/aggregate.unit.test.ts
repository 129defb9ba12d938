/**
 * Aggregation Engine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  aggregateColumn,
  buildAggregated,
  groupRows,
  planAggregation,
  resolveAggregateFunction,
} from '../aggregate.js';
import { AggregationTypeError } from '../errors.js';
import { createTestLogger } from '../logging.js';
import { toPlainObject } from '../result.js';
import { createTable } from '../table.js';
import type { Row } from '../types.js';

const sample = createTable([
  { G: 'A', v: 1 },
  { G: 'A', v: 3 },
  { G: 'A', v: 2 },
]);

// =============================================================================
// Reductions
// =============================================================================

describe('aggregateColumn', () => {
  it.each([
    ['sum', 6],
    ['mean', 2],
    ['min', 1],
    ['max', 3],
    ['first', 1],
    ['last', 2],
  ] as const)('should compute %s', (fn, expected) => {
    expect(aggregateColumn(sample.rows, 'v', fn)).toBe(expected);
  });

  it('should collect every value in row order', () => {
    expect(aggregateColumn(sample.rows, 'v', 'collect')).toEqual([1, 3, 2]);
  });

  describe('with nulls', () => {
    const rows = [{ v: null }, { v: 4 }, { v: 6 }, { v: null }];

    it('should skip nulls in numeric reductions', () => {
      expect(aggregateColumn(rows, 'v', 'sum')).toBe(10);
      expect(aggregateColumn(rows, 'v', 'mean')).toBe(5);
      expect(aggregateColumn(rows, 'v', 'min')).toBe(4);
      expect(aggregateColumn(rows, 'v', 'max')).toBe(6);
    });

    it('should pick the first and last non-null values', () => {
      expect(aggregateColumn(rows, 'v', 'first')).toBe(4);
      expect(aggregateColumn(rows, 'v', 'last')).toBe(6);
    });

    it('should keep nulls when collecting', () => {
      expect(aggregateColumn(rows, 'v', 'collect')).toEqual([null, 4, 6, null]);
    });
  });

  describe('with only nulls', () => {
    const rows: Row[] = [{ v: null }, {}];

    it('should sum to zero', () => {
      expect(aggregateColumn(rows, 'v', 'sum')).toBe(0);
    });

    it('should yield null for mean, min, max, first and last', () => {
      expect(aggregateColumn(rows, 'v', 'mean')).toBeNull();
      expect(aggregateColumn(rows, 'v', 'min')).toBeNull();
      expect(aggregateColumn(rows, 'v', 'max')).toBeNull();
      expect(aggregateColumn(rows, 'v', 'first')).toBeNull();
      expect(aggregateColumn(rows, 'v', 'last')).toBeNull();
    });
  });

  it('should reject non-numeric cells in numeric reductions', () => {
    const rows = [{ v: 1 }, { v: 'x' }];
    expect(() => aggregateColumn(rows, 'v', 'sum')).toThrow(AggregationTypeError);
    expect(() => aggregateColumn(rows, 'v', 'max')).toThrow(
      'Cannot apply "max" to non-numeric value "x" in column "v"'
    );
  });

  it('should accept any cell type for first, last and collect', () => {
    const rows = [{ v: 'x' }, { v: true }];
    expect(aggregateColumn(rows, 'v', 'first')).toBe('x');
    expect(aggregateColumn(rows, 'v', 'last')).toBe(true);
    expect(aggregateColumn(rows, 'v', 'collect')).toEqual(['x', true]);
  });
});

// =============================================================================
// Planning
// =============================================================================

describe('resolveAggregateFunction', () => {
  it('should accept known names and the list alias', () => {
    expect(resolveAggregateFunction('mean')).toBe('mean');
    expect(resolveAggregateFunction('list')).toBe('collect');
    expect(resolveAggregateFunction('median')).toBeUndefined();
  });
});

describe('planAggregation', () => {
  it('should default unlisted columns to first', () => {
    expect(planAggregation(['a', 'b'], { b: 'sum' }, { logger: createTestLogger() })).toEqual(['first', 'sum']);
  });

  it('should honor a custom default', () => {
    expect(planAggregation(['a'], {}, { defaultFunction: 'collect' })).toEqual(['collect']);
  });

  it('should fall back with a warning on unknown names', () => {
    const logger = createTestLogger();
    expect(planAggregation(['v'], { v: 'median' }, { logger })).toEqual(['first']);

    const warnings = logger.getLogsByLevel('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Unknown aggregation "median" for column "v"; using "first"');
    expect(warnings[0].context).toEqual({ operation: 'aggregate', column: 'v', function: 'median' });
  });

  it('should ignore entries for columns that are not selected', () => {
    const logger = createTestLogger();
    expect(planAggregation(['v'], { other: 'sum' }, { logger })).toEqual(['first']);
    expect(logger.getLogsByLevel('warn')).toHaveLength(0);
    expect(logger.getLogsByLevel('debug')).toHaveLength(1);
  });
});

// =============================================================================
// Grouped Nesting
// =============================================================================

describe('groupRows', () => {
  it('should group by the full path in first-appearance order', () => {
    const table = createTable([
      { a: 'x', b: 1 },
      { a: 'y', b: 1 },
      { a: 'x', b: 1 },
      { a: 'x', b: '1' },
    ]);
    const groups = groupRows(table.rows, ['a', 'b']);
    expect(groups.map(g => g.keys)).toEqual([
      ['x', 1],
      ['y', 1],
      ['x', '1'],
    ]);
    expect(groups[0].rows).toHaveLength(2);
  });

  it('should keep null, NaN and infinite keys in separate groups', () => {
    const table = createTable([
      { G: null, v: 1 },
      { G: NaN, v: 2 },
      { G: Infinity, v: 4 },
      { G: -Infinity, v: 8 },
      { G: NaN, v: 16 },
    ]);
    const groups = groupRows(table.rows, ['G']);
    expect(groups.map(g => g.keys)).toEqual([[null], [NaN], [Infinity], [-Infinity]]);
    expect(groups.map(g => g.rows.length)).toEqual([1, 2, 1, 1]);
  });
});

describe('buildAggregated', () => {
  it('should key non-finite groups the way plain nesting does', () => {
    const table = createTable([
      { G: null, v: 1 },
      { G: NaN, v: 2 },
      { G: Infinity, v: 4 },
    ]);
    const result = buildAggregated(table, ['G'], ['v'], { v: 'sum' });
    const sums = [...result.root.children].map(([key, node]) => [key, node.kind === 'value' ? node.value : undefined]);
    expect(sums).toEqual([
      [null, 1],
      [NaN, 2],
      [Infinity, 4],
    ]);
  });

  it('should sum each group', () => {
    expect(toPlainObject(buildAggregated(sample, ['G'], ['v'], { v: 'sum' }))).toEqual({ A: 6 });
  });

  it('should collect each group', () => {
    expect(toPlainObject(buildAggregated(sample, ['G'], ['v'], { v: 'collect' }))).toEqual({ A: [1, 3, 2] });
  });

  it('should reduce each value column with its own function', () => {
    const table = createTable([
      { R: 'N', C: 'a', amount: 10, id: 'o1' },
      { R: 'N', C: 'a', amount: 5, id: 'o2' },
      { R: 'S', C: 'b', amount: 7, id: 'o3' },
    ]);
    const result = buildAggregated(table, ['R', 'C'], ['amount', 'id'], { amount: 'sum', id: 'list' });
    expect(toPlainObject(result)).toEqual({
      N: { a: { amount: 15, id: ['o1', 'o2'] } },
      S: { b: { amount: 7, id: ['o3'] } },
    });
  });

  it('should keep groups in first-appearance order', () => {
    const table = createTable([
      { G: 'B', v: 1 },
      { G: 'A', v: 1 },
      { G: 'B', v: 1 },
    ]);
    const result = buildAggregated(table, ['G'], ['v'], { v: 'sum' });
    expect([...result.root.children.keys()]).toEqual(['B', 'A']);
  });

  it('should throw on non-numeric data in a numeric aggregation', () => {
    const table = createTable([{ G: 'A', v: 'x' }]);
    expect(() => buildAggregated(table, ['G'], ['v'], { v: 'mean' })).toThrow(AggregationTypeError);
  });
});
