/**
 * Option schema tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import {
  AggregateTransformOptionsSchema,
  TransformOptionsSchema,
  validate,
} from '../validation.js';

describe('TransformOptionsSchema', () => {
  it('should accept a minimal option object', () => {
    expect(TransformOptionsSchema.safeParse({ hierarchy: ['a'] }).success).toBe(true);
  });

  it('should accept single and listed column selections', () => {
    expect(TransformOptionsSchema.safeParse({ hierarchy: ['a'], valueColumns: 'b', sortBy: ['a', 'b'] }).success).toBe(true);
  });

  it('should accept predicate and Set filters', () => {
    const filters = { a: (v: unknown) => v !== null, b: new Set([1]) };
    expect(TransformOptionsSchema.safeParse({ hierarchy: ['a'], filters }).success).toBe(true);
  });

  it('should reject empty and non-string column names', () => {
    expect(TransformOptionsSchema.safeParse({ hierarchy: [''] }).success).toBe(false);
    expect(TransformOptionsSchema.safeParse({ hierarchy: ['a'], valueColumns: [1] }).success).toBe(false);
  });

  it('should reject non-boolean flags', () => {
    expect(TransformOptionsSchema.safeParse({ hierarchy: ['a'], dedup: 'yes' }).success).toBe(false);
  });
});

describe('AggregateTransformOptionsSchema', () => {
  it('should accept unknown aggregation names', () => {
    expect(AggregateTransformOptionsSchema.safeParse({ hierarchy: ['a'], aggregate: { v: 'median' } }).success).toBe(true);
  });

  it('should reject an unknown default aggregation', () => {
    const parsed = AggregateTransformOptionsSchema.safeParse({
      hierarchy: ['a'],
      aggregate: {},
      defaultAggregation: 'median',
    });
    expect(parsed.success).toBe(false);
  });
});

describe('validate', () => {
  it('should return parsed data', () => {
    expect(validate({ hierarchy: ['a'], dedup: true }, TransformOptionsSchema)).toEqual({ hierarchy: ['a'], dedup: true });
  });

  it('should throw a ValidationError listing every issue', () => {
    let caught: unknown;
    try {
      validate({ hierarchy: [], dedup: 1 }, TransformOptionsSchema, 'options');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.issues.map(issue => issue.path)).toEqual([['hierarchy'], ['dedup']]);
    expect(caught.message).toMatch(/^Invalid options: hierarchy: Hierarchy must name at least one column, dedup: /);
  });
});
