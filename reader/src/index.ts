/**
 * @tabnest/reader - Workbook reading and table processing
 *
 * Addresses sheets of a workbook by name, unions sheet lists with an
 * optional provenance column, and runs the core transforms over them with
 * defaults taken from a TabnestConfig.
 */

export type {
  Workbook,
  SheetSource,
  WorkbookInput,
  SheetSelection,
  ReadSheetsOptions,
} from './types.js';

export { createWorkbook, readSheets, tableFromRows } from './workbook.js';

export {
  WorkbookDocumentSchema,
  columnarToRows,
  workbookFromDocument,
  parseWorkbookJson,
  loadWorkbook,
  type WorkbookDocument,
} from './validation.js';

export {
  TableProcessor,
  createTableProcessor,
  type NestedOptions,
  type AggregatedNestedOptions,
  type TableProcessorOptions,
} from './processor.js';
