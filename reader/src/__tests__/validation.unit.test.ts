/**
 * Workbook document validation tests
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ValidationError } from '@tabnest/core';
import {
  columnarToRows,
  loadWorkbook,
  parseWorkbookJson,
  workbookFromDocument,
} from '../validation.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('columnarToRows', () => {
  it('should expand a columnar block into rows', () => {
    expect(columnarToRows({ x: [1, 2], y: ['a', 'b'] })).toEqual([
      { x: 1, y: 'a' },
      { x: 2, y: 'b' },
    ]);
  });

  it('should pad short columns with null', () => {
    expect(columnarToRows({ x: [1, 2], y: ['a'] })).toEqual([
      { x: 1, y: 'a' },
      { x: 2, y: null },
    ]);
  });

  it('should return no rows for an empty block', () => {
    expect(columnarToRows({})).toEqual([]);
  });
});

describe('workbookFromDocument', () => {
  it('should accept sheets keyed by name', () => {
    const workbook = workbookFromDocument({
      sheets: { A: [{ x: 1 }], B: { x: [1, 2], y: ['a', 'b'] } },
    });
    expect(workbook.sheetNames).toEqual(['A', 'B']);
    expect(workbook.sheet('B').rows).toEqual([
      { x: 1, y: 'a' },
      { x: 2, y: 'b' },
    ]);
  });

  it('should accept an ordered sheet list', () => {
    const workbook = workbookFromDocument({
      sheets: [
        { name: '2025', rows: [{ x: 1 }] },
        { name: '2024', rows: [{ x: 2 }] },
      ],
    });
    expect(workbook.sheetNames).toEqual(['2025', '2024']);
  });

  it('should reject duplicate sheet names', () => {
    expect(() =>
      workbookFromDocument({
        sheets: [
          { name: 'A', rows: [] },
          { name: 'A', rows: [] },
        ],
      })
    ).toThrow('Invalid workbook document: duplicate sheet name "A"');
  });

  it('should reject columns of different lengths', () => {
    expect(() => workbookFromDocument({ sheets: { A: { x: [1, 2], y: ['a'] } } })).toThrow(ValidationError);
  });

  it('should reject nested cell values', () => {
    expect(() => workbookFromDocument({ sheets: { A: [{ x: { nested: true } }] } })).toThrow(ValidationError);
  });

  it('should reject a document without sheets', () => {
    expect(() => workbookFromDocument({ tabs: {} }, 'book.json')).toThrow(/^Invalid book\.json: sheets: /);
  });
});

describe('parseWorkbookJson', () => {
  it('should parse a JSON document', () => {
    const workbook = parseWorkbookJson('{"sheets":{"Only":[{"k":"v"}]}}');
    expect(workbook.sheet('Only').columns).toEqual(['k']);
  });

  it('should wrap JSON syntax errors in a ValidationError', () => {
    expect(() => parseWorkbookJson('{not json', 'broken.json')).toThrow(/^Invalid broken\.json: /);
    expect(() => parseWorkbookJson('{not json')).toThrow(ValidationError);
  });
});

describe('loadWorkbook', () => {
  it('should load a workbook document from disk', async () => {
    const workbook = await loadWorkbook(fixture('sales-workbook.json'));
    expect(workbook.sheetNames).toEqual(['Q1', 'Q2']);
    expect(workbook.sheet('Q2').rows).toEqual([
      { region: 'North', city: 'Hanoi', revenue: 12 },
      { region: 'North', city: 'Haiphong', revenue: 4 },
    ]);
  });

  it('should reject a missing file', async () => {
    await expect(loadWorkbook(fixture('missing.json'))).rejects.toThrow();
  });
});
