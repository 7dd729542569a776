// src/utils/columnDetection.ts
// Locates the CGPA column and the ranked preference columns that follow it

import { CGPA_ALIASES, CGPA_SUBSTRING } from './headerAliases';
import { ColumnNotFoundError, NoPreferenceColumnsError } from '@/lib/errors/allocationErrors';
import type { ColumnDetection } from '@/types/allocation';

/**
 * Index of the CGPA column, or -1.
 * Exact alias match wins over the first header that merely contains "cgpa".
 */
export function findCgpaIndex(headers: readonly string[]): number {
  const exact = headers.findIndex(h => CGPA_ALIASES.includes(h.trim().toLowerCase()));
  if (exact !== -1) return exact;

  return headers.findIndex(h => h.toLowerCase().includes(CGPA_SUBSTRING));
}

/**
 * Detect the CGPA column and the preference columns (every header after it, in order).
 * Pure: run it again whenever the headers may have changed.
 */
export function detectPreferenceColumns(headers: readonly string[]): ColumnDetection {
  const cgpaIndex = findCgpaIndex(headers);
  if (cgpaIndex === -1) {
    throw new ColumnNotFoundError();
  }

  const cgpaColumn = headers[cgpaIndex];
  const preferenceColumns = headers.slice(cgpaIndex + 1);
  if (preferenceColumns.length === 0) {
    throw new NoPreferenceColumnsError(cgpaColumn);
  }

  return { cgpaColumn, cgpaIndex, preferenceColumns };
}
