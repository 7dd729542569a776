import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_FACULTY_CODES,
  loadFacultyCodes,
  mapFacultyValue,
  parseFacultyCodes,
} from '@/utils/facultyCodes';
import { ConfigError } from '@/lib/errors/allocationErrors';

describe('mapFacultyValue', () => {
  it('maps known codes to faculty short names', () => {
    expect(mapFacultyValue('1')).toBe('ABM');
    expect(mapFacultyValue('11')).toBe('RM2');
    expect(mapFacultyValue(' 18 ')).toBe('ST');
  });

  it('maps a code and its ".0" decimal form to the same name', () => {
    expect(mapFacultyValue('7')).toBe('JM');
    expect(mapFacultyValue('7.0')).toBe('JM');
    expect(mapFacultyValue(7)).toBe('JM');
    expect(mapFacultyValue('10.0')).toBe(mapFacultyValue('10'));
  });

  it('returns empty string for missing or blank cells', () => {
    expect(mapFacultyValue(null)).toBe('');
    expect(mapFacultyValue(undefined)).toBe('');
    expect(mapFacultyValue('   ')).toBe('');
    expect(mapFacultyValue(NaN)).toBe('');
  });

  it('passes unknown values through trimmed', () => {
    expect(mapFacultyValue('  Dr. Rao ')).toBe('Dr. Rao');
    expect(mapFacultyValue('19')).toBe('19');
    expect(mapFacultyValue('19.0')).toBe('19.0');
    expect(mapFacultyValue(7.5)).toBe('7.5');
    expect(mapFacultyValue('ABM')).toBe('ABM');
  });

  it('does not resolve inherited object keys as codes', () => {
    expect(mapFacultyValue('toString')).toBe('toString');
    expect(mapFacultyValue('constructor.0')).toBe('constructor.0');
  });

  it('uses a custom code table when given', () => {
    const codes = { A1: 'XYZ', '2': 'Beta' };
    expect(mapFacultyValue('A1', codes)).toBe('XYZ');
    expect(mapFacultyValue('2.0', codes)).toBe('Beta');
    expect(mapFacultyValue('1', codes)).toBe('1');
  });

  it('keeps the default table frozen', () => {
    expect(Object.isFrozen(DEFAULT_FACULTY_CODES)).toBe(true);
    expect(Object.keys(DEFAULT_FACULTY_CODES)).toHaveLength(18);
  });
});

describe('parseFacultyCodes', () => {
  it('parses and trims a code → name object', () => {
    const codes = parseFacultyCodes('{" 1 ": " Alpha ", "2": "Beta"}');
    expect(codes).toEqual({ '1': 'Alpha', '2': 'Beta' });
    expect(Object.isFrozen(codes)).toBe(true);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseFacultyCodes('{1: "A"}')).toThrow(ConfigError);
  });

  it('rejects arrays and non-string names', () => {
    expect(() => parseFacultyCodes('["ABM"]')).toThrow(ConfigError);
    expect(() => parseFacultyCodes('{"1": 5}')).toThrow(ConfigError);
  });

  it('rejects blank names', () => {
    expect(() => parseFacultyCodes('{"1": "  "}', 'codes.json')).toThrow(/codes\.json: Faculty name must not be blank/);
  });
});

describe('loadFacultyCodes', () => {
  it('reads a JSON file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'faculty-codes-'));
    const file = path.join(dir, 'codes.json');
    fs.writeFileSync(file, JSON.stringify({ '1': 'Alpha' }));

    await expect(loadFacultyCodes(file)).resolves.toEqual({ '1': 'Alpha' });
  });

  it('raises ConfigError for a missing file', async () => {
    const missing = path.join(os.tmpdir(), `no-such-codes-${Date.now()}.json`);
    await expect(loadFacultyCodes(missing)).rejects.toBeInstanceOf(ConfigError);
  });
});
