/**
 * @tabnest/reader - Type Definitions
 */

import type { Logger, Row, Table } from '@tabnest/core';

/**
 * Ordered collection of named sheets.
 */
export interface Workbook {
  /** Sheet names in workbook order */
  readonly sheetNames: readonly string[];

  /**
   * @throws SheetNotFoundError when no sheet has this name
   */
  sheet(name: string): Table;
}

/** A sheet given as a table or as rows whose columns are inferred */
export type SheetSource = Table | readonly Row[];

/**
 * Sheets keyed by name. Map entries keep their insertion order; plain
 * objects follow JavaScript property order (integer-like names first).
 */
export type WorkbookInput =
  | Readonly<Record<string, SheetSource>>
  | ReadonlyMap<string, SheetSource>;

/** One sheet name, or a list of sheets unioned in listed order */
export type SheetSelection = string | readonly string[];

export interface ReadSheetsOptions {
  /** Add the provenance column when unioning a list of sheets (default: false) */
  addSheetColumn?: boolean;

  /** Name of the provenance column (default: '_sheet_name') */
  sheetColumnName?: string;

  logger?: Logger;
}
