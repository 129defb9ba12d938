/**
 * Tests for typed exception classes
 */

import { describe, it, expect } from 'vitest';
import {
  AggregationTypeError,
  ErrorCode,
  SchemaError,
  SheetNotFoundError,
  TabnestError,
  ValidationError,
  isErrorCode,
} from '../errors.js';

describe('TabnestError base class', () => {
  it('should be an instance of Error', () => {
    const error = new TabnestError('Test error', 'TEST_ERROR');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TabnestError');
  });

  it('should default the code to UNKNOWN', () => {
    expect(new TabnestError('Test error').code).toBe(ErrorCode.UNKNOWN);
  });

  it('should capture stack trace', () => {
    const error = new TabnestError('Test error');
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('TabnestError');
  });

  it('should have undefined details when not provided', () => {
    expect(new TabnestError('Test error').details).toBeUndefined();
  });

  it('should render a log context', () => {
    const error = new TabnestError('Broken', 'X', { column: 'a' }, 'Fix it');
    expect(error.toLogContext()).toEqual({
      name: 'TabnestError',
      message: 'Broken',
      code: 'X',
      details: { column: 'a' },
      suggestion: 'Fix it',
      timestamp: error.timestamp,
    });
  });

  it('should render a detailed string', () => {
    const error = new TabnestError('Broken', 'X', { column: 'a' }, 'Fix it');
    expect(error.toDetailedString()).toBe('[X] Broken\n  Details: column="a"\n  Suggestion: Fix it');
  });
});

describe('SchemaError', () => {
  it('should extend TabnestError', () => {
    const error = SchemaError.missingColumns(['NOPE'], 'hierarchy');
    expect(error).toBeInstanceOf(TabnestError);
    expect(error.name).toBe('SchemaError');
  });

  it('should name the missing columns', () => {
    const error = SchemaError.missingColumns(['NOPE', 'ALSO'], 'hierarchy');
    expect(error.message).toBe('Columns not found in table (hierarchy): "NOPE", "ALSO"');
    expect(error.missingColumns).toEqual(['NOPE', 'ALSO']);
    expect(error.details).toEqual({ missingColumns: ['NOPE', 'ALSO'], role: 'hierarchy' });
    expect(error.suggestion).toBeUndefined();
  });
});

describe('SheetNotFoundError', () => {
  it('should be a SchemaError carrying the sheet name', () => {
    const error = new SheetNotFoundError('Q5', ['Q1', 'Q2']);
    expect(error).toBeInstanceOf(SchemaError);
    expect(error.code).toBe(ErrorCode.SHEET_NOT_FOUND);
    expect(error.sheetName).toBe('Q5');
    expect(error.message).toBe('Sheet "Q5" not found');
    expect(error.suggestion).toBe('Available sheets: Q1, Q2');
  });
});

describe('ValidationError', () => {
  it('should carry its issues in details', () => {
    const issues = [{ path: ['hierarchy'], message: 'Required' }];
    const error = new ValidationError('Invalid', issues);
    expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(error.issues).toEqual(issues);
    expect(error.details).toEqual({ issues });
  });
});

describe('AggregationTypeError', () => {
  it('should describe the offending value', () => {
    const error = new AggregationTypeError('price', 'sum', 'n/a');
    expect(error.code).toBe(ErrorCode.AGGREGATION_TYPE_ERROR);
    expect(error.message).toBe('Cannot apply "sum" to non-numeric value "n/a" in column "price"');
    expect(error.details).toEqual({ column: 'price', function: 'sum', value: 'n/a', valueType: 'string' });
  });
});

describe('isErrorCode', () => {
  it('should recognize declared codes only', () => {
    expect(isErrorCode('SCHEMA_ERROR')).toBe(true);
    expect(isErrorCode('NOT_A_CODE')).toBe(false);
  });
});
