import { canonicalizePreferences } from './prepare';
import { TALLY_FACULTY_COLUMN, tallyCountColumn } from '@/utils/headerAliases';
import { ALLOC_VERBOSE_LOGS } from '@/utils/featureFlags';
import type { AllocationOptions, Row, Table } from '@/types/allocation';

function byCodeUnit(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Count, for every faculty named in any preference column, how many students put them at each rank.
 *
 * Columns: `Fac`, `Count Pref 1` … `Count Pref N`. One row per distinct non-empty
 * canonical name, sorted ascending. Blank cells are never counted.
 */
export function tally(original: Table, options: AllocationOptions = {}): Table {
  const verbose = options.verbose ?? ALLOC_VERBOSE_LOGS;

  try {
    const { table: mapped, detection } = canonicalizePreferences(original, options.codes);
    const n = detection.preferenceColumns.length;

    // faculty → counts[rank - 1]
    const counts = new Map<string, number[]>();
    detection.preferenceColumns.forEach((col, rankIdx) => {
      for (const row of mapped.rows) {
        const fac = String(row[col] ?? '').trim();
        if (fac === '') continue;
        let perRank = counts.get(fac);
        if (!perRank) {
          perRank = new Array<number>(n).fill(0);
          counts.set(fac, perRank);
        }
        perRank[rankIdx] += 1;
      }
    });

    const countColumns = detection.preferenceColumns.map((_, idx) => tallyCountColumn(idx + 1));
    const rows = [...counts.keys()].sort(byCodeUnit).map(fac => {
      const perRank = counts.get(fac) ?? [];
      const row: Row = { [TALLY_FACULTY_COLUMN]: fac };
      countColumns.forEach((col, idx) => {
        row[col] = perRank[idx] ?? 0;
      });
      return row;
    });

    if (verbose) {
      console.log(`[tally] faculties=${rows.length} prefs=${n}`);
    }

    return { headers: [TALLY_FACULTY_COLUMN, ...countColumns], rows };
  } catch (err) {
    console.error('[tally] failed', err);
    throw err;
  }
}
