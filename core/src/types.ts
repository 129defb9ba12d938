// Data model for tables, tuples and nested results

// =============================================================================
// Branded Types
// =============================================================================

/**
 * Branded type pattern for compile-time type safety.
 * Tuples are the only branded value: they must stay distinguishable from
 * collected sequences, which are plain arrays.
 */
type Brand<T, B> = T & { readonly __brand: B };

// =============================================================================
// Tables
// =============================================================================

/** A single table cell */
export type Scalar = string | number | boolean | null;

/** A row maps column names to cells; a missing key reads as null */
export type Row = Readonly<Record<string, Scalar>>;

/**
 * Rectangular tabular input.
 *
 * `columns` is the authoritative column set. After unioning sources it may be
 * a superset of the keys present on any individual row.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

// =============================================================================
// Tuples
// =============================================================================

/** Primitive tuple element */
export type TupleItem = string | number | boolean | null;

/** Structured tuple decoded from a string cell such as `"(1, 'x', True)"` */
export type Tuple = Brand<readonly TupleItem[], 'Tuple'>;

const tupleRegistry = new WeakSet<readonly TupleItem[]>();

/**
 * Create a frozen tuple.
 */
export function tuple(items: readonly TupleItem[]): Tuple {
  const frozen = Object.freeze([...items]);
  tupleRegistry.add(frozen);
  return frozen as Tuple;
}

/**
 * Type guard for tuples created by {@link tuple}.
 */
export function isTuple(value: unknown): value is Tuple {
  return Array.isArray(value) && tupleRegistry.has(value);
}

// =============================================================================
// Nested Results
// =============================================================================

/**
 * Value stored in a terminal slot or record field. Sequences come from the
 * `collect` aggregation.
 */
export type CellValue = Scalar | Tuple | readonly CellValue[];

/**
 * Type guard for sequences of cell values (tuples included).
 */
export function isCellList(value: CellValue): value is readonly CellValue[] {
  return Array.isArray(value);
}

/** Interior level: one child per distinct key value */
export interface BranchNode {
  readonly kind: 'branch';
  readonly children: Map<Scalar, NestedNode>;
}

/** Terminal slot holding the single selected value column */
export interface ValueNode {
  readonly kind: 'value';
  readonly value: CellValue;
}

/** Terminal slot holding several value columns, in selection order */
export interface RecordNode {
  readonly kind: 'record';
  readonly fields: ReadonlyMap<string, CellValue>;
}

export type LeafNode = ValueNode | RecordNode;

export type NestedNode = BranchNode | LeafNode;

/**
 * Output of a transform. Every leaf sits exactly `depth` levels below `root`,
 * where `depth` is the hierarchy length.
 */
export interface NestedResult {
  readonly depth: number;
  readonly root: BranchNode;
}

/** Plain-object rendering of a nested result */
export type PlainNested = { [key: string]: PlainNested | PlainValue };

export type PlainValue = Scalar | PlainValue[] | { [field: string]: PlainValue };

// =============================================================================
// Node Helpers
// =============================================================================

export function createBranch(): BranchNode {
  return { kind: 'branch', children: new Map() };
}

export function isBranch(node: NestedNode): node is BranchNode {
  return node.kind === 'branch';
}

export function isLeaf(node: NestedNode): node is LeafNode {
  return node.kind !== 'branch';
}
