/**
 * Table and allocation types shared by the allocation core, table I/O and the CLI.
 */

export type Cell = string | number | boolean | null;

export type Row = Record<string, Cell>;

/**
 * A tabular dataset. `headers` carries the column order; rows are keyed by header.
 */
export interface Table {
  readonly headers: readonly string[];
  readonly rows: readonly Row[];
}

/** Short numeric code → canonical faculty short name */
export type FacultyCodeTable = Readonly<Record<string, string>>;

export interface ColumnDetection {
  cgpaColumn: string;
  cgpaIndex: number;
  // Ordered by rank: index 0 holds preference 1
  preferenceColumns: string[];
}

/**
 * Input table with every preference cell canonicalized, plus the detection it was built from.
 */
export interface PreparedTable {
  table: Table;
  detection: ColumnDetection;
}

export interface AllocationOptions {
  codes?: FacultyCodeTable;
  // Per-row logging; defaults to ALLOC_VERBOSE_LOGS
  verbose?: boolean;
}

export interface PipelineResult {
  sorted: Table;
  final: Table;
  tally: Table;
  detection: ColumnDetection;
}
