export { allocate } from './lib/allocation/allocate';
export { reconcile, findSharedIdColumn } from './lib/allocation/reconcile';
export { tally } from './lib/allocation/tally';
export { canonicalizePreferences } from './lib/allocation/prepare';
export { runAllocationPipeline } from './lib/allocation/pipeline';
export { detectPreferenceColumns, findCgpaIndex } from './utils/columnDetection';
export { DEFAULT_FACULTY_CODES, mapFacultyValue, parseFacultyCodes, loadFacultyCodes } from './utils/facultyCodes';
export { parseCsvText, parseWorkbook, readTableFile } from './utils/tableParser';
export { toCsv } from './utils/csvExport';
export { buildWorkbook, writeWorkbookXlsx } from './utils/excel';
export { readAllocationConfig, OUTPUT_FILENAMES } from './utils/featureFlags';
export {
  AllocationError,
  ColumnNotFoundError,
  NoPreferenceColumnsError,
  MissingAllocationColumnError,
  RowCountMismatchError,
  TableParseError,
  ConfigError,
  isAllocationError,
} from './lib/errors/allocationErrors';
export type { AllocationErrorCode } from './lib/errors/allocationErrors';
export { normalizeError, formatErrorMessage } from './lib/errors/normalizeError';
export type { NormalizedError } from './lib/errors/normalizeError';
export type {
  Cell,
  Row,
  Table,
  FacultyCodeTable,
  ColumnDetection,
  PreparedTable,
  AllocationOptions,
  PipelineResult,
} from './types/allocation';
