// src/utils/tableParser.ts
// CSV / Excel → Table. First row is the header row.

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { TableParseError } from '@/lib/errors/allocationErrors';
import { isMissingToken } from './valueNormalizers';
import type { Cell, Row, Table } from '@/types/allocation';

/**
 * Trim header cells, name blank ones `__EMPTY_COL_<i>` and suffix repeats: Name, Name (2), Name (3).
 */
export function withUniqueHeaders(rawRow: readonly unknown[]): string[] {
  const seen = new Map<string, number>();
  return rawRow.map((cell, idx) => {
    const trimmed = String(cell ?? '').trim();
    const base = trimmed.length > 0 ? trimmed : `__EMPTY_COL_${idx}`;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base} (${count})`;
  });
}

export function toCell(value: unknown): Cell {
  if (value == null || isMissingToken(value)) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function buildTable(matrix: readonly unknown[][], source: string): Table {
  const headerRow = matrix[0];
  if (!headerRow || headerRow.every(c => String(c ?? '').trim() === '')) {
    throw new TableParseError(`No header row found in ${source}. Row 1 must hold the column headers.`);
  }

  const headers = withUniqueHeaders(headerRow);
  let overflowRows = 0;

  const rows = matrix.slice(1).map(values => {
    if (values.length > headers.length) overflowRows += 1;
    const row: Row = {};
    headers.forEach((h, idx) => {
      row[h] = toCell(values[idx]);
    });
    return row;
  });

  if (overflowRows > 0) {
    console.warn(`[table-io] ${source}: ${overflowRows} row(s) have more cells than headers; extra cells ignored`);
  }

  return { headers, rows };
}

export function parseCsvText(text: string, source = 'CSV'): Table {
  const results = Papa.parse<unknown[]>(text.replace(/^\uFEFF/, ''), {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: true,
  });

  const fatal = results.errors.find(e => e.type === 'Quotes');
  if (fatal) {
    throw new TableParseError(`${source}: ${fatal.message} (row ${fatal.row ?? '?'})`);
  }

  return buildTable(results.data, source);
}

export function parseWorkbook(data: Uint8Array, sheetName?: string, source = 'workbook'): Table {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.read(data, { type: 'array' });
  } catch (err) {
    throw new TableParseError(`Parse error: ${err instanceof Error ? err.message : 'Unknown error reading Excel file'}`);
  }

  if (!wb.SheetNames || wb.SheetNames.length === 0) {
    throw new TableParseError('No sheets found in this workbook.');
  }

  const wsName = sheetName ?? wb.SheetNames[0];
  const ws = wb.Sheets[wsName];
  if (!ws) {
    throw new TableParseError(`Sheet "${wsName}" not found. Available: ${wb.SheetNames.join(', ')}`);
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, defval: null, blankrows: false });
  return buildTable(matrix, `${source} [${wsName}]`);
}

/**
 * Read a .csv, .xls or .xlsx file into a Table.
 */
export async function readTableFile(filePath: string, sheetName?: string): Promise<Table> {
  const ext = path.extname(filePath).toLowerCase();
  const name = path.basename(filePath);

  if (ext === '.csv') {
    const text = await readFile(filePath, 'utf8');
    return parseCsvText(text, name);
  }
  if (ext === '.xls' || ext === '.xlsx') {
    const buffer = await readFile(filePath);
    return parseWorkbook(buffer, sheetName, name);
  }

  throw new TableParseError(`Unsupported file type "${ext || '(none)'}". Please provide a CSV or Excel (.xls/.xlsx) file.`);
}
