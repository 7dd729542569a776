// src/utils/csvExport.ts
// Table → CSV text (header row first, columns in table order)

import Papa from 'papaparse';
import { formatCellValue } from './valueNormalizers';
import type { Table } from '@/types/allocation';

export function tableToMatrix(table: Table): string[][] {
  return table.rows.map(row => table.headers.map(h => formatCellValue(row[h])));
}

/**
 * Serialize a table as CSV. Missing values and NaN are written as empty cells.
 * Always ends with exactly one newline (unparse already adds it after a header-only table).
 */
export function toCsv(table: Table): string {
  const body = Papa.unparse(
    { fields: [...table.headers], data: tableToMatrix(table) },
    { newline: '\n' }
  );
  return body.endsWith('\n') ? body : `${body}\n`;
}
