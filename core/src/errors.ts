/**
 * Typed exception classes for tabnest
 *
 * Error hierarchy:
 * - TabnestError: Base error class for all tabnest errors
 *   - SchemaError: Hierarchy, value or sort column absent from the table
 *     - SheetNotFoundError: Sheet name absent from a workbook
 *   - ValidationError: Malformed transform or lookup options
 *   - AggregationTypeError: Numeric aggregation over non-numeric cells
 *
 * Soft conditions (unknown filter column or operator, unparseable tuple
 * strings, lookup misses) are never thrown. They surface as log entries or
 * empty results.
 *
 * @example
 * ```typescript
 * import { transform, SchemaError } from '@tabnest/core';
 *
 * try {
 *   transform(table, { hierarchy: ['REGION', 'CITY'] });
 * } catch (error) {
 *   if (error instanceof SchemaError) {
 *     logger.error('Bad hierarchy', error, { columns: error.missingColumns });
 *   }
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',

  // Schema errors
  SCHEMA_ERROR = 'SCHEMA_ERROR',
  MISSING_COLUMN = 'MISSING_COLUMN',
  SHEET_NOT_FOUND = 'SHEET_NOT_FOUND',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_OPTIONS = 'INVALID_OPTIONS',

  // Aggregation errors
  AGGREGATION_TYPE_ERROR = 'AGGREGATION_TYPE_ERROR',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.values(ErrorCode).some(value => value === code);
}

// =============================================================================
// Stack Traces
// =============================================================================

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasCaptureStackTrace(
  errorConstructor: ErrorConstructor
): errorConstructor is ErrorConstructor & V8ErrorConstructor {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Drop constructor frames from the stack where the runtime supports it.
 * Elsewhere the stack set by the Error constructor is kept.
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all tabnest errors
 *
 * Carries a machine-readable `code`, structured `details` for logging and
 * an optional `suggestion` for the caller.
 */
export class TabnestError extends Error {
  public readonly code: string;

  public readonly details?: Record<string, unknown>;

  public readonly suggestion?: string;

  /** Milliseconds since epoch */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'TabnestError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();
    captureStackTrace(this, TabnestError);
  }

  /**
   * Structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Multi-line description for debugging output.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Schema Errors
// =============================================================================

/**
 * Thrown when a structural column (hierarchy, value selection or sort key)
 * does not exist in the table.
 *
 * @example
 * ```typescript
 * throw SchemaError.missingColumns(['NOPE'], 'hierarchy');
 * ```
 */
export class SchemaError extends TabnestError {
  /** Every column that was requested but not found */
  public readonly missingColumns: readonly string[];

  constructor(
    message: string,
    missingColumns: readonly string[] = [],
    code: string = ErrorCode.SCHEMA_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, { missingColumns: [...missingColumns], ...details }, suggestion);
    this.name = 'SchemaError';
    this.missingColumns = missingColumns;
    captureStackTrace(this, SchemaError);
  }

  /**
   * Create a "missing columns" error naming each absent column
   */
  static missingColumns(
    columns: readonly string[],
    role: 'hierarchy' | 'value' | 'sort',
    available?: readonly string[]
  ): SchemaError {
    const names = columns.map(c => `"${c}"`).join(', ');
    return new SchemaError(
      `Columns not found in table (${role}): ${names}`,
      columns,
      ErrorCode.MISSING_COLUMN,
      { role, ...(available && { available: [...available] }) },
      available ? `Available columns: ${available.join(', ')}` : undefined
    );
  }
}

/**
 * Thrown when a workbook has no sheet with the requested name.
 */
export class SheetNotFoundError extends SchemaError {
  public readonly sheetName: string;

  constructor(sheetName: string, available: readonly string[] = []) {
    super(
      `Sheet "${sheetName}" not found`,
      [],
      ErrorCode.SHEET_NOT_FOUND,
      { sheetName, available: [...available] },
      available.length > 0 ? `Available sheets: ${available.join(', ')}` : undefined
    );
    this.name = 'SheetNotFoundError';
    this.sheetName = sheetName;
    captureStackTrace(this, SheetNotFoundError);
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Issue reported by an option schema
 */
export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Thrown when transform or lookup options are malformed.
 */
export class ValidationError extends TabnestError {
  public readonly issues: readonly ValidationIssue[];

  constructor(
    message: string,
    issues: readonly ValidationIssue[] = [],
    code: string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, code, issues.length > 0 ? { issues: [...issues] } : undefined);
    this.name = 'ValidationError';
    this.issues = issues;
    captureStackTrace(this, ValidationError);
  }
}

// =============================================================================
// Aggregation Errors
// =============================================================================

/**
 * Thrown when sum, mean, min or max meets a non-numeric cell.
 */
export class AggregationTypeError extends TabnestError {
  constructor(column: string, fn: string, value: unknown) {
    super(
      `Cannot apply "${fn}" to non-numeric value ${JSON.stringify(value)} in column "${column}"`,
      ErrorCode.AGGREGATION_TYPE_ERROR,
      { column, function: fn, value, valueType: typeof value },
      `Use "first", "last" or "collect" for non-numeric columns`
    );
    this.name = 'AggregationTypeError';
    captureStackTrace(this, AggregationTypeError);
  }
}
