/**
 * Structural faults raised by the allocation core and its I/O layer.
 * All are deterministic: callers should report them, not retry.
 */

export type AllocationErrorCode =
  | 'COLUMN_NOT_FOUND'
  | 'NO_PREFERENCE_COLUMNS'
  | 'MISSING_ALLOCATION_COLUMN'
  | 'ROW_COUNT_MISMATCH'
  | 'TABLE_PARSE_ERROR'
  | 'CONFIG_ERROR';

export class AllocationError extends Error {
  readonly code: AllocationErrorCode;

  constructor(code: AllocationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ColumnNotFoundError extends AllocationError {
  constructor(message = 'CGPA column not found.') {
    super('COLUMN_NOT_FOUND', message);
  }
}

export class NoPreferenceColumnsError extends AllocationError {
  readonly cgpaColumn: string;

  constructor(cgpaColumn: string) {
    super('NO_PREFERENCE_COLUMNS', `No preference columns found after CGPA column "${cgpaColumn}".`);
    this.cgpaColumn = cgpaColumn;
  }
}

export class MissingAllocationColumnError extends AllocationError {
  constructor(column: string) {
    super('MISSING_ALLOCATION_COLUMN', `Allocated table must contain the "${column}" column.`);
  }
}

export class RowCountMismatchError extends AllocationError {
  readonly originalRows: number;
  readonly allocatedRows: number;

  constructor(originalRows: number, allocatedRows: number) {
    super(
      'ROW_COUNT_MISMATCH',
      `Cannot map allocations: no ID column and row counts differ (original=${originalRows}, allocated=${allocatedRows}).`
    );
    this.originalRows = originalRows;
    this.allocatedRows = allocatedRows;
  }
}

export class TableParseError extends AllocationError {
  constructor(message: string) {
    super('TABLE_PARSE_ERROR', message);
  }
}

export class ConfigError extends AllocationError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export function isAllocationError(error: unknown): error is AllocationError {
  return error instanceof AllocationError;
}
