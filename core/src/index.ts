// @tabnest/core
// Hierarchical tabular-to-nested-map transformation engine

// =============================================================================
// Public Operations
// =============================================================================

export {
  transform,
  transformAggregated,
  type TransformOptions,
  type AggregateTransformOptions,
} from './transform.js';

export { keysAt, keysAtMany, locate, type KeyPath } from './lookup.js';

// =============================================================================
// Data Model
// =============================================================================

export {
  tuple,
  isTuple,
  isCellList,
  createBranch,
  isBranch,
  isLeaf,
  type Scalar,
  type Row,
  type Table,
  type TupleItem,
  type Tuple,
  type CellValue,
  type BranchNode,
  type ValueNode,
  type RecordNode,
  type LeafNode,
  type NestedNode,
  type NestedResult,
  type PlainNested,
  type PlainValue,
} from './types.js';

export { toPlainObject, countLeaves, leafDepths } from './result.js';

// =============================================================================
// Engine Components
// =============================================================================

export {
  createTable,
  cell,
  hasColumn,
  missingColumns,
  assertColumns,
  dedupRows,
  sortRows,
  prepareRows,
  resolveValueColumns,
  compareForSort,
  compareStrings,
  scalarId,
  scalarsId,
  type PrepareOptions,
} from './table.js';

export {
  normalizeValue,
  normalizeResult,
  parseTupleLiteral,
  looksLikeTuple,
} from './normalize.js';

export {
  filterTable,
  compileFilters,
  evaluateCompiledFilters,
  scalarEquals,
  compareScalars,
  isFilterOperator,
  FILTER_OPERATORS,
  type Predicate,
  type ScalarCollection,
  type FilterOperator,
  type OperatorConditions,
  type FilterCondition,
  type FilterSpec,
  type CompiledFilter,
} from './filter.js';

export { buildNested, insertLeaf, keyPath, makeLeaf } from './nest.js';

export {
  buildAggregated,
  aggregateColumn,
  groupRows,
  planAggregation,
  resolveAggregateFunction,
  isAggregateFunction,
  AGGREGATE_FUNCTIONS,
  type AggregateFunction,
  type AggregateSpec,
  type AggregateOptions,
  type RowGroup,
} from './aggregate.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  captureStackTrace,
  TabnestError,
  SchemaError,
  SheetNotFoundError,
  ValidationError,
  AggregationTypeError,
  type ValidationIssue,
} from './errors.js';

export {
  validate,
  TransformOptionsSchema,
  AggregateTransformOptionsSchema,
  type ZodSchemaLike,
  type ZodErrorLike,
  type ValidatedTransformOptions,
  type ValidatedAggregateTransformOptions,
} from './validation.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  getDefaultLogger,
  setDefaultLogger,
  isLogContextValue,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';
