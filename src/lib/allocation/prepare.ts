import { detectPreferenceColumns } from '@/utils/columnDetection';
import { DEFAULT_FACULTY_CODES, mapFacultyValue } from '@/utils/facultyCodes';
import type { FacultyCodeTable, PreparedTable, Row, Table } from '@/types/allocation';

/**
 * Detect columns on `table` and return a copy whose preference cells are canonical faculty names.
 * Detection always runs against the headers passed in, so a changed schema is picked up.
 */
export function canonicalizePreferences(
  table: Table,
  codes: FacultyCodeTable = DEFAULT_FACULTY_CODES
): PreparedTable {
  const detection = detectPreferenceColumns(table.headers);

  const rows = table.rows.map(row => {
    const next: Row = { ...row };
    for (const col of detection.preferenceColumns) {
      next[col] = mapFacultyValue(row[col], codes);
    }
    return next;
  });

  return {
    table: { headers: [...table.headers], rows },
    detection,
  };
}
