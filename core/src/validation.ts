/**
 * Option validation at the public boundary.
 *
 * Structural options (hierarchy, value selection, sort keys, aggregation
 * names) are checked with zod before any row is touched. Filters are only
 * checked for shape here; their operands are validated per operator by the
 * predicate evaluator, which skips bad conditions instead of failing.
 *
 * @module validation
 */

import { z } from 'zod';
import { AGGREGATE_FUNCTIONS } from './aggregate.js';
import { ValidationError, ErrorCode, type ValidationIssue } from './errors.js';

// =============================================================================
// Schema-like Interface
// =============================================================================

/**
 * ZodError-like shape carried by failed parses
 */
export interface ZodErrorLike {
  issues: Array<{
    code: string;
    path: (string | number)[];
    message: string;
  }>;
  message: string;
}

/**
 * Anything with zod's `safeParse` contract
 */
export interface ZodSchemaLike<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: ZodErrorLike };
}

// =============================================================================
// Option Schemas
// =============================================================================

const columnName = z.string().min(1, 'Column name must be a non-empty string');

const columnSelection = z.union([columnName, z.array(columnName)]);

export const TransformOptionsSchema = z.object({
  hierarchy: z.array(columnName).min(1, 'Hierarchy must name at least one column'),
  valueColumns: columnSelection.optional(),
  filters: z.record(z.string(), z.unknown()).optional(),
  dedup: z.boolean().optional(),
  sortBy: columnSelection.optional(),
  normalize: z.boolean().optional(),
  logger: z
    .custom<object>(value => typeof value === 'object' && value !== null, 'Logger must be an object')
    .optional(),
});

export const AggregateTransformOptionsSchema = TransformOptionsSchema.extend({
  aggregate: z.record(z.string(), z.string()),
  defaultAggregation: z.enum(AGGREGATE_FUNCTIONS).optional(),
});

export type ValidatedTransformOptions = z.infer<typeof TransformOptionsSchema>;
export type ValidatedAggregateTransformOptions = z.infer<typeof AggregateTransformOptionsSchema>;

// =============================================================================
// Validation
// =============================================================================

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * Validate a value against a schema, returning the parsed data.
 *
 * @throws ValidationError listing every issue
 *
 * @example
 * ```typescript
 * const options = validate(input, TransformOptionsSchema, 'transform options');
 * ```
 */
export function validate<T>(value: unknown, schema: ZodSchemaLike<T>, label = 'value'): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map(issue => ({
      path: issue.path,
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid ${label}: ${formatIssues(issues)}`,
      issues,
      ErrorCode.INVALID_OPTIONS
    );
  }

  return result.data;
}
