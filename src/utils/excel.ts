// src/utils/excel.ts
// Excel workbook export for allocation results

import { writeFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { Cell, Table } from '@/types/allocation';

function sanitizeSheetName(name: string): string {
  // Excel sheet names: max 31 chars, no []:*?/\
  const invalidSheetChars = new RegExp('[\\[\\]:*?/\\\\]', 'g');
  return name
    .replace(invalidSheetChars, '')
    .slice(0, 31) || 'Sheet1';
}

function toSheetValue(value: Cell | undefined): string | number | boolean | null {
  if (value == null) return null;
  if (typeof value === 'number' && Number.isNaN(value)) return null;
  return value;
}

function tableToSheet(table: Table): XLSX.WorkSheet {
  const aoa = [
    [...table.headers],
    ...table.rows.map(row => table.headers.map(h => toSheetValue(row[h]))),
  ];
  const ws = XLSX.utils.aoa_to_sheet(aoa);

  ws['!cols'] = table.headers.map((h, idx) => {
    const longest = table.rows.reduce((max, row) => {
      const v = toSheetValue(row[table.headers[idx]]);
      return Math.max(max, v == null ? 0 : String(v).length);
    }, h.length);
    return { wch: Math.min(Math.max(longest + 2, 6), 40) };
  });

  return ws;
}

/**
 * One sheet per table, in insertion order.
 */
export function buildWorkbook(sheets: Record<string, Table>): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  for (const [sheetName, table] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(wb, tableToSheet(table), sanitizeSheetName(sheetName));
  }
  return wb;
}

/**
 * Write tables to an .xlsx file (extension forced). Returns the path written.
 */
export async function writeWorkbookXlsx(filePath: string, sheets: Record<string, Table>): Promise<string> {
  let safePath = filePath;
  if (!/\.xlsx$/i.test(safePath)) {
    safePath = safePath.replace(/\.[^./\\]+$/, '') + '.xlsx';
  }

  const wb = buildWorkbook(sheets);
  const buffer: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  await writeFile(safePath, buffer);
  console.log('[excel] writeWorkbookXlsx:', safePath);
  return safePath;
}
