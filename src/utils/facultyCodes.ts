// src/utils/facultyCodes.ts
// Faculty code → short name mapping for preference cells

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors/allocationErrors';
import type { Cell, FacultyCodeTable } from '@/types/allocation';

// Edit (or override with FACULTY_CODES_PATH) if your department's codes differ
export const DEFAULT_FACULTY_CODES: FacultyCodeTable = Object.freeze({
  '1': 'ABM',
  '2': 'AE',
  '3': 'AM',
  '4': 'AR',
  '5': 'CA',
  '6': 'JC',
  '7': 'JM',
  '8': 'MA',
  '9': 'RH',
  '10': 'RM',
  '11': 'RM2',
  '12': 'RS',
  '13': 'SK',
  '14': 'SKD',
  '15': 'SKM',
  '16': 'SM',
  '17': 'SS',
  '18': 'ST',
});

function lookup(codes: FacultyCodeTable, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(codes, key) ? codes[key] : undefined;
}

/**
 * Resolve a raw preference cell to a canonical faculty name.
 * Known codes (also "7.0" style) map to names; anything else passes through trimmed.
 * Blank or missing → ''.
 */
export function mapFacultyValue(raw: Cell | undefined, codes: FacultyCodeTable = DEFAULT_FACULTY_CODES): string {
  if (raw == null) return '';
  if (typeof raw === 'number' && Number.isNaN(raw)) return '';

  const s = String(raw).trim();
  if (s === '') return '';

  const direct = lookup(codes, s);
  if (direct !== undefined) return direct;

  if (s.endsWith('.0')) {
    const fromDecimal = lookup(codes, s.slice(0, -2));
    if (fromDecimal !== undefined) return fromDecimal;
  }

  return s;
}

const facultyCodeFileSchema = z.record(
  z.string().trim().min(1, 'Faculty code must not be blank'),
  z.string().trim().min(1, 'Faculty name must not be blank')
);

/**
 * Parse a faculty code table from JSON text: an object of `"code": "name"` pairs.
 * Codes and names are trimmed; the result is frozen.
 */
export function parseFacultyCodes(json: string, source = 'faculty codes'): FacultyCodeTable {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ConfigError(`${source}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const parsed = facultyCodeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new ConfigError(`${source}: ${issue?.message ?? 'invalid faculty code table'}${where}`);
  }

  const codes: Record<string, string> = {};
  for (const [code, name] of Object.entries(parsed.data)) {
    codes[code.trim()] = name;
  }
  return Object.freeze(codes);
}

export async function loadFacultyCodes(filePath: string): Promise<FacultyCodeTable> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read faculty code file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseFacultyCodes(text, filePath);
}
