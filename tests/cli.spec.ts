import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { read } from 'xlsx';
import { parseCliArgs, runCli } from '@/cli';
import { makeTmpDir } from './utils/xlsx';

const INPUT_CSV = [
  'Roll,Name,CGPA,P1,P2',
  'R1,Asha,8.5,1,2',
  'R2,Bala,9.2,3,Dr X',
  'R3,Chen,8.5,2.0,1',
  '',
].join('\n');

function writeInput(dir: string, content = INPUT_CSV): string {
  const file = path.join(dir, 'input_btp_mtp_allocation.csv');
  fs.writeFileSync(file, content);
  return file;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'table').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseCliArgs', () => {
  it('applies environment defaults and lets flags override them', () => {
    const env = { ALLOC_OUTPUT_DIR: 'from-env', ALLOC_VERBOSE_LOGS: 'true' };

    expect(parseCliArgs(['in.csv'], env)).toEqual({
      input: 'in.csv',
      outDir: 'from-env',
      codesPath: null,
      sheet: undefined,
      xlsx: false,
      quiet: false,
      verbose: true,
    });
    expect(parseCliArgs(['in.csv', '-o', 'flag-dir', '--codes', 'c.json', '-q'], env)).toMatchObject({
      outDir: 'flag-dir',
      codesPath: 'c.json',
      quiet: true,
    });
  });

  it('returns null for help, missing input or unknown flags', () => {
    expect(parseCliArgs([], {})).toBeNull();
    expect(parseCliArgs(['--help'], {})).toBeNull();
    expect(parseCliArgs(['in.csv', '--bogus'], {})).toBeNull();
  });
});

describe('runCli', () => {
  it('writes the final allocation and preference count CSVs', async () => {
    const dir = makeTmpDir('alloc-cli');
    const outDir = path.join(dir, 'outputs');

    const result = await runCli([writeInput(dir), '--out', outDir, '--quiet'], {});

    expect(result.exitCode).toBe(0);
    expect(fs.readFileSync(path.join(outDir, 'output_btp_mtp_allocation.csv'), 'utf8')).toBe(
      'Roll,Name,CGPA,AllocatedFaculty\nR1,Asha,8.5,AE\nR2,Bala,9.2,AM\nR3,Chen,8.5,AE\n'
    );
    expect(fs.readFileSync(path.join(outDir, 'fac_preference_count.csv'), 'utf8')).toBe(
      'Fac,Count Pref 1,Count Pref 2\nABM,1,1\nAE,1,1\nAM,1,0\nDr X,0,1\n'
    );
  });

  it('prints previews unless quiet', async () => {
    const dir = makeTmpDir('alloc-cli');

    await runCli([writeInput(dir), '--out', path.join(dir, 'out')], {});

    expect(console.table).toHaveBeenCalledTimes(3);
  });

  it('adds a workbook with every result table when --xlsx is set', async () => {
    const dir = makeTmpDir('alloc-cli');
    const outDir = path.join(dir, 'out');

    const result = await runCli([writeInput(dir), '--xlsx', '-q'], { ALLOC_OUTPUT_DIR: outDir });

    expect(result.written).toEqual([
      path.join(outDir, 'output_btp_mtp_allocation.csv'),
      path.join(outDir, 'fac_preference_count.csv'),
      path.join(outDir, 'allocation_results.xlsx'),
    ]);
    const wb = read(fs.readFileSync(path.join(outDir, 'allocation_results.xlsx')), { type: 'buffer' });
    expect(wb.SheetNames).toEqual(['Allocation', 'FacultyPreferenceCount', 'SortedByCgpa']);
  });

  it('uses a faculty code file when given', async () => {
    const dir = makeTmpDir('alloc-cli');
    const codes = path.join(dir, 'codes.json');
    fs.writeFileSync(codes, JSON.stringify({ '1': 'Alpha' }));
    const outDir = path.join(dir, 'out');

    const result = await runCli([writeInput(dir), '--codes', codes, '-o', outDir, '-q'], {});

    expect(result.exitCode).toBe(0);
    expect(fs.readFileSync(path.join(outDir, 'output_btp_mtp_allocation.csv'), 'utf8')).toBe(
      'Roll,Name,CGPA,AllocatedFaculty\nR1,Asha,8.5,2\nR2,Bala,9.2,3\nR3,Chen,8.5,2\n'
    );
  });

  it('fails without writing anything when the input has no CGPA column', async () => {
    const dir = makeTmpDir('alloc-cli');
    const outDir = path.join(dir, 'out');
    const input = writeInput(dir, 'Roll,Score,P1\nR1,9,1\n');

    const result = await runCli([input, '-o', outDir, '-q'], {});

    expect(result).toEqual({ exitCode: 1, written: [] });
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it('shows usage with exit code 2 when no input is given', async () => {
    const result = await runCli([], {});

    expect(result.exitCode).toBe(2);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage: faculty-allocate'));
  });
});
