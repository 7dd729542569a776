import { canonicalizePreferences } from './prepare';
import { ALLOCATED_FACULTY_COLUMN } from '@/utils/headerAliases';
import { ALLOC_VERBOSE_LOGS } from '@/utils/featureFlags';
import { compareCgpaDesc, toCgpaNumber } from '@/utils/valueNormalizers';
import type { AllocationOptions, Row, Table } from '@/types/allocation';

/**
 * Sort students by CGPA (descending, stable, unparseable CGPA last) and give each one faculty.
 *
 * The student at sorted position `i` receives their own preference at rank `i % N`
 * (N = number of preference columns), so successive students cycle through
 * preference depth 1, 2, …, N, 1, 2, … This is a round-robin over rank positions,
 * not over faculty, and carries no capacity limit.
 *
 * Returns a new table: input headers + `AllocatedFaculty`, CGPA coerced to numbers
 * (NaN when unparseable), preference cells canonicalized. The input is untouched.
 */
export function allocate(table: Table, options: AllocationOptions = {}): Table {
  const verbose = options.verbose ?? ALLOC_VERBOSE_LOGS;

  try {
    const { table: mapped, detection } = canonicalizePreferences(table, options.codes);
    const { cgpaColumn, preferenceColumns } = detection;
    const n = preferenceColumns.length;

    const keyed = mapped.rows.map(row => {
      const cgpa = toCgpaNumber(row[cgpaColumn]);
      const withCgpa: Row = { ...row, [cgpaColumn]: cgpa };
      return { row: withCgpa, cgpa };
    });

    // Array.prototype.sort is stable: equal CGPAs keep input order
    keyed.sort((a, b) => compareCgpaDesc(a.cgpa, b.cgpa));

    const rows = keyed.map(({ row, cgpa }, i) => {
      const rankColumn = preferenceColumns[i % n];
      const allocated = row[rankColumn] ?? '';
      if (verbose) {
        console.log(`[allocate.row] pos=${i} cgpa=${cgpa} rank=${(i % n) + 1} column=${rankColumn} faculty=${allocated || '(blank)'}`);
      }
      return { ...row, [ALLOCATED_FACULTY_COLUMN]: allocated };
    });

    const headers = mapped.headers.includes(ALLOCATED_FACULTY_COLUMN)
      ? [...mapped.headers]
      : [...mapped.headers, ALLOCATED_FACULTY_COLUMN];

    if (verbose) {
      console.log(`[allocate] rows=${rows.length} cgpa=${cgpaColumn} prefs=${n}`);
    }

    return { headers, rows };
  } catch (err) {
    console.error('[allocate] failed', err);
    throw err;
  }
}
