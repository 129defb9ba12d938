/**
 * @tabnest/reader - Workbook Document Validation
 *
 * Runtime validation for workbooks stored as JSON. A document carries its
 * sheets either as an object keyed by sheet name or as an ordered list of
 * `{ name, rows }` entries. A sheet is a list of row objects or a columnar
 * block (column name → array of cells, all of one length).
 *
 * @example
 * ```json
 * {
 *   "sheets": [
 *     { "name": "Q1", "rows": [{ "region": "North", "revenue": 10 }] },
 *     { "name": "Q2", "rows": { "region": ["North"], "revenue": [12] } }
 *   ]
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { validate, ValidationError, type Row, type Scalar } from '@tabnest/core';
import { createWorkbook } from './workbook.js';
import type { SheetSource, Workbook } from './types.js';

// =============================================================================
// Schemas
// =============================================================================

const scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const rowSheet = z.array(z.record(z.string(), scalar));

const columnarSheet = z.record(z.string(), z.array(scalar)).superRefine((block, ctx) => {
  const lengths = new Set(Object.values(block).map(cells => cells.length));
  if (lengths.size > 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Column arrays have inconsistent lengths: ${[...lengths].join(', ')}`,
    });
  }
});

const sheetData = z.union([rowSheet, columnarSheet]);

export const WorkbookDocumentSchema = z.object({
  sheets: z.union([
    z.array(
      z.object({
        name: z.string().min(1, 'Sheet name must be a non-empty string'),
        rows: sheetData,
      })
    ),
    z.record(z.string(), sheetData),
  ]),
});

export type WorkbookDocument = z.infer<typeof WorkbookDocumentSchema>;

type SheetData = z.infer<typeof sheetData>;

// =============================================================================
// Conversion
// =============================================================================

/**
 * Expand a columnar block into rows.
 */
export function columnarToRows(block: Readonly<Record<string, readonly Scalar[]>>): Row[] {
  const columns = Object.keys(block);
  const rowCount = Math.max(0, ...columns.map(column => block[column]?.length ?? 0));
  const rows: Row[] = [];
  for (let i = 0; i < rowCount; i++) {
    rows.push(Object.fromEntries(columns.map((column): [string, Scalar] => [column, block[column]?.[i] ?? null])));
  }
  return rows;
}

function toSheetSource(data: SheetData): SheetSource {
  return Array.isArray(data) ? data : columnarToRows(data);
}

/**
 * Validate a parsed workbook document and build the workbook.
 *
 * @param source - Where the document came from, for error messages
 * @throws ValidationError listing every problem found
 */
export function workbookFromDocument(data: unknown, source = 'workbook document'): Workbook {
  const document = validate(data, WorkbookDocumentSchema, source);

  if (Array.isArray(document.sheets)) {
    const seen = new Set<string>();
    const entries = new Map<string, SheetSource>();
    for (const { name, rows } of document.sheets) {
      if (seen.has(name)) {
        throw new ValidationError(`Invalid ${source}: duplicate sheet name "${name}"`, [
          { path: ['sheets'], message: `Duplicate sheet name "${name}"` },
        ]);
      }
      seen.add(name);
      entries.set(name, toSheetSource(rows));
    }
    return createWorkbook(entries);
  }

  const entries = new Map<string, SheetSource>();
  for (const [name, rows] of Object.entries(document.sheets)) {
    entries.set(name, toSheetSource(rows));
  }
  return createWorkbook(entries);
}

/**
 * Parse a JSON workbook document.
 *
 * @throws ValidationError when the text is not JSON or the document is malformed
 */
export function parseWorkbookJson(text: string, source = 'workbook document'): Workbook {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid ${source}: ${reason}`, [{ path: [], message: reason }]);
  }
  return workbookFromDocument(data, source);
}

/**
 * Load a JSON workbook document from disk.
 */
export async function loadWorkbook(path: string): Promise<Workbook> {
  const text = await readFile(path, 'utf8');
  return parseWorkbookJson(text, path);
}
