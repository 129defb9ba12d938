/**
 * Table utility tests: construction, schema checks, dedup and sort.
 */

import { describe, it, expect } from 'vitest';
import { SchemaError } from '../errors.js';
import {
  assertColumns,
  cell,
  compareForSort,
  compareStrings,
  createTable,
  dedupRows,
  missingColumns,
  prepareRows,
  resolveValueColumns,
  scalarId,
  scalarsId,
  sortRows,
} from '../table.js';

describe('createTable', () => {
  it('should infer columns as the union of row keys in first-seen order', () => {
    const table = createTable([{ a: 1 }, { b: 2, a: 3 }, { c: null }]);
    expect(table.columns).toEqual(['a', 'b', 'c']);
  });

  it('should keep explicit columns', () => {
    const table = createTable([{ a: 1 }], ['a', 'z']);
    expect(table.columns).toEqual(['a', 'z']);
  });
});

describe('cell', () => {
  it('should read absent keys as null', () => {
    expect(cell({ a: 1 }, 'b')).toBeNull();
    expect(cell({ a: 1 }, 'a')).toBe(1);
  });

  it('should not read inherited properties', () => {
    expect(cell({ a: 1 }, 'toString')).toBeNull();
  });
});

// =============================================================================
// Schema Checks
// =============================================================================

describe('missingColumns', () => {
  it('should list absent columns once, in request order', () => {
    const table = createTable([{ a: 1, b: 2 }]);
    expect(missingColumns(table, ['Y', 'a', 'X', 'Y'])).toEqual(['Y', 'X']);
  });
});

describe('assertColumns', () => {
  const table = createTable([{ a: 1, b: 2 }]);

  it('should pass when every column exists', () => {
    expect(() => assertColumns(table, ['a', 'b'], 'hierarchy')).not.toThrow();
  });

  it('should throw a SchemaError naming every missing column', () => {
    let caught: unknown;
    try {
      assertColumns(table, ['a', 'X', 'Y'], 'value');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    if (!(caught instanceof SchemaError)) return;
    expect(caught.missingColumns).toEqual(['X', 'Y']);
    expect(caught.message).toBe('Columns not found in table (value): "X", "Y"');
    expect(caught.code).toBe('MISSING_COLUMN');
    expect(caught.suggestion).toBe('Available columns: a, b');
  });
});

// =============================================================================
// Dedup & Sort
// =============================================================================

describe('dedupRows', () => {
  it('should keep the first of each group of identical rows', () => {
    const first = { a: 1, b: 'x' };
    const table = createTable([first, { a: 1, b: 'x' }, { a: '1', b: 'x' }, { a: 1, b: null }]);
    const result = dedupRows(table);
    expect(result.rows).toHaveLength(3);
    expect(result.rows[0]).toBe(first);
  });

  it('should compare absent cells as null', () => {
    const table = createTable([{ a: 1 }, { a: 1, b: null }]);
    expect(dedupRows(table).rows).toHaveLength(1);
  });
  it('should keep non-finite numbers apart from null and each other', () => {
    const table = createTable([
      { a: 1, v: null },
      { a: 1, v: Infinity },
      { a: 1, v: -Infinity },
      { a: 1, v: NaN },
      { a: 1, v: NaN },
    ]);
    expect(dedupRows(table).rows.map(r => r.v)).toEqual([null, Infinity, -Infinity, NaN]);
  });

  it('should treat zero and negative zero as duplicates', () => {
    const table = createTable([{ a: 0 }, { a: -0 }]);
    expect(dedupRows(table).rows).toHaveLength(1);
  });
});

describe('scalarId', () => {
  it('should tag each cell with its type', () => {
    expect([null, true, 1, '1', NaN, Infinity, -0].map(scalarId)).toEqual([
      'z',
      'b:1',
      'n:1',
      's:1',
      'n:NaN',
      'n:Infinity',
      'n:0',
    ]);
  });

  it('should keep a string that looks like a tag apart from its cell', () => {
    expect(scalarsId(['n:1'])).not.toBe(scalarsId([1]));
    expect(scalarsId(['z'])).not.toBe(scalarsId([null]));
  });
});

describe('compareForSort', () => {
  it('should place nulls last', () => {
    expect(compareForSort(null, 1)).toBeGreaterThan(0);
    expect(compareForSort(1, null)).toBeLessThan(0);
    expect(compareForSort(null, null)).toBe(0);
  });

  it('should order booleans before numbers before strings', () => {
    expect(compareForSort(true, 1)).toBeLessThan(0);
    expect(compareForSort(1, 'a')).toBeLessThan(0);
    expect(compareForSort('a', false)).toBeGreaterThan(0);
  });

  it('should place NaN last alongside nulls', () => {
    expect(compareForSort(NaN, 1)).toBeGreaterThan(0);
    expect(compareForSort(Infinity, NaN)).toBeLessThan(0);
    expect(compareForSort(NaN, null)).toBe(0);
    expect(compareForSort(NaN, NaN)).toBe(0);
  });

  it('should order infinities', () => {
    expect(compareForSort(-Infinity, -1)).toBeLessThan(0);
    expect(compareForSort(Infinity, Infinity)).toBe(0);
  });
});

describe('compareStrings', () => {
  it('should compare by code unit', () => {
    expect(compareStrings('B', 'a')).toBeLessThan(0);
    expect(compareStrings('abc', 'abc')).toBe(0);
  });

  it('should place accented letters after ASCII letters', () => {
    expect(compareStrings('á', 'B')).toBeGreaterThan(0);
    expect(compareStrings('a', 'á')).toBeLessThan(0);
    expect(compareStrings('Hà Nội', 'Hải Phòng')).toBeLessThan(0);
  });
});

describe('sortRows', () => {
  const table = createTable([
    { k: 2, i: 0 },
    { k: null, i: 1 },
    { k: 1, i: 2 },
    { k: 2, i: 3 },
  ]);

  it('should sort ascending, stable, nulls last', () => {
    expect(sortRows(table, 'k').rows.map(r => r.i)).toEqual([2, 0, 3, 1]);
  });

  it('should sort by several columns', () => {
    expect(sortRows(table, ['k', 'i']).rows.map(r => r.i)).toEqual([2, 0, 3, 1]);
    const t = createTable([
      { a: 1, b: 'y' },
      { a: 0, b: 'z' },
      { a: 1, b: 'x' },
    ]);
    expect(sortRows(t, ['a', 'b']).rows.map(r => r.b)).toEqual(['z', 'x', 'y']);
  });

  it('should sort mixed ASCII and accented strings in code-unit order', () => {
    const words = createTable(['á', 'B', 'a', 'Z', 'é'].map(s => ({ s })));
    expect(sortRows(words, 's').rows.map(r => r.s)).toEqual(['B', 'Z', 'a', 'á', 'é']);
  });

  it('should sort NaN after every number and before later nulls', () => {
    const numbers = createTable([3, NaN, null, -Infinity, Infinity, 1].map(n => ({ n })));
    expect(sortRows(numbers, 'n').rows.map(r => r.n)).toEqual([-Infinity, 1, 3, Infinity, NaN, null]);
  });

  it('should not modify the input', () => {
    sortRows(table, 'k');
    expect(table.rows.map(r => r.i)).toEqual([0, 1, 2, 3]);
  });

  it('should throw a SchemaError for a missing sort column', () => {
    expect(() => sortRows(table, 'missing')).toThrow(SchemaError);
  });
});

describe('prepareRows', () => {
  it('should dedup before sorting', () => {
    const table = createTable([{ k: 2 }, { k: 1 }, { k: 2 }]);
    const prepared = prepareRows(table, { dedup: true, sortBy: 'k' });
    expect(prepared.rows).toEqual([{ k: 1 }, { k: 2 }]);
  });

  it('should return the table unchanged with no options', () => {
    const table = createTable([{ k: 2 }]);
    expect(prepareRows(table)).toBe(table);
  });
});

describe('resolveValueColumns', () => {
  const table = createTable([{ a: 1, b: 2, c: 3 }]);

  it('should select every non-hierarchy column in table order', () => {
    expect(resolveValueColumns(table, ['b'])).toEqual(['a', 'c']);
  });

  it('should accept a single column or a list', () => {
    expect(resolveValueColumns(table, ['a'], 'c')).toEqual(['c']);
    expect(resolveValueColumns(table, ['a'], ['c', 'b'])).toEqual(['c', 'b']);
  });
});
