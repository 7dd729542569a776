import { canonicalizePreferences } from './prepare';
import { ALLOCATED_FACULTY_COLUMN, STUDENT_ID_CANDIDATES } from '@/utils/headerAliases';
import { ALLOC_VERBOSE_LOGS } from '@/utils/featureFlags';
import { isBlankCell } from '@/utils/valueNormalizers';
import { MissingAllocationColumnError, RowCountMismatchError } from '@/lib/errors/allocationErrors';
import type { AllocationOptions, Cell, Row, Table } from '@/types/allocation';

/**
 * First identifier column (in candidate priority order) present in both tables, or null.
 */
export function findSharedIdColumn(original: Table, allocated: Table): string | null {
  return STUDENT_ID_CANDIDATES.find(c => original.headers.includes(c) && allocated.headers.includes(c)) ?? null;
}

function allocationsById(allocated: Table, idColumn: string): Map<Cell, Cell> {
  const mapping = new Map<Cell, Cell>();
  for (const row of allocated.rows) {
    const id = row[idColumn];
    if (isBlankCell(id)) continue;
    // Duplicate ids: last row wins
    mapping.set(id, row[ALLOCATED_FACULTY_COLUMN] ?? null);
  }
  return mapping;
}

/**
 * Put the allocation back in the original row order.
 *
 * Output columns: original headers up to and including CGPA, then `AllocatedFaculty`.
 * Rows are joined on the first shared student id column; without one, rows are
 * aligned by position and both tables must have the same length.
 */
export function reconcile(original: Table, allocated: Table, options: AllocationOptions = {}): Table {
  const verbose = options.verbose ?? ALLOC_VERBOSE_LOGS;

  try {
    const { table: mapped, detection } = canonicalizePreferences(original, options.codes);

    if (!allocated.headers.includes(ALLOCATED_FACULTY_COLUMN)) {
      throw new MissingAllocationColumnError(ALLOCATED_FACULTY_COLUMN);
    }

    const idColumn = findSharedIdColumn(mapped, allocated);
    let assigned: Cell[];

    if (idColumn) {
      const mapping = allocationsById(allocated, idColumn);
      assigned = mapped.rows.map(row => {
        const id = row[idColumn];
        if (isBlankCell(id)) return null;
        return mapping.get(id) ?? null;
      });
    } else {
      if (mapped.rows.length !== allocated.rows.length) {
        throw new RowCountMismatchError(mapped.rows.length, allocated.rows.length);
      }
      assigned = allocated.rows.map(row => row[ALLOCATED_FACULTY_COLUMN] ?? null);
    }

    const kept = mapped.headers
      .slice(0, detection.cgpaIndex + 1)
      .filter(h => h !== ALLOCATED_FACULTY_COLUMN);
    const rows = original.rows.map((row, i) => {
      const out: Row = {};
      for (const col of kept) {
        out[col] = row[col] ?? null;
      }
      out[ALLOCATED_FACULTY_COLUMN] = assigned[i];
      return out;
    });

    if (verbose) {
      const unmatched = assigned.filter(v => v === null).length;
      console.log(`[reconcile] rows=${rows.length} join=${idColumn ?? 'position'} unmatched=${unmatched}`);
    }

    return { headers: [...kept, ALLOCATED_FACULTY_COLUMN], rows };
  } catch (err) {
    console.error('[reconcile] failed', err);
    throw err;
  }
}
