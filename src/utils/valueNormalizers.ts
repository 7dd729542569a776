// src/utils/valueNormalizers.ts
// Cell value normalization for allocation input and output

import type { Cell } from '@/types/allocation';

// Spreadsheet exports write these for an empty cell; matched exactly, case included
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

export function isMissingToken(value: unknown): boolean {
  return typeof value === 'string' && MISSING_VALUE_TOKENS.has(value);
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

/**
 * Coerce a CGPA cell to a number.
 * Numbers, plain decimal text and `inf`/`Infinity` text parse; anything else becomes NaN (never throws).
 */
export function toCgpaNumber(raw: Cell | undefined): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw !== 'string') return NaN;

  // "8,5" is rejected, not read as 8.5
  const s = raw.trim();
  const inf = INFINITY_PATTERN.exec(s);
  if (inf) return inf[1] === '-' ? -Infinity : Infinity;
  if (!DECIMAL_PATTERN.test(s)) return NaN;
  return parseFloat(s);
}

/**
 * Descending numeric comparator with NaN last. Used with a stable sort.
 */
export function compareCgpaDesc(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    if (aNaN && bNaN) return 0;
    return aNaN ? 1 : -1;
  }
  if (a === b) return 0;
  return b - a;
}

export function isBlankCell(value: Cell | undefined): boolean {
  if (value == null) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

/**
 * Render a cell for CSV / console output: null, undefined and NaN become ''.
 */
export function formatCellValue(value: Cell | undefined): string {
  if (value == null) return '';
  if (typeof value === 'number' && Number.isNaN(value)) return '';
  return String(value);
}
