// src/cli.ts
// Command-line front end: read a student table, allocate, write result tables

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { runAllocationPipeline } from '@/lib/allocation/pipeline';
import { formatErrorMessage, normalizeError } from '@/lib/errors/normalizeError';
import { toCsv } from '@/utils/csvExport';
import { writeWorkbookXlsx } from '@/utils/excel';
import { DEFAULT_FACULTY_CODES, loadFacultyCodes } from '@/utils/facultyCodes';
import { OUTPUT_FILENAMES, readAllocationConfig } from '@/utils/featureFlags';
import { readTableFile } from '@/utils/tableParser';
import type { Table } from '@/types/allocation';

export const USAGE = `Usage: faculty-allocate <input.csv|input.xlsx> [options]

Options:
  -o, --out <dir>       Output directory (default: ALLOC_OUTPUT_DIR or "outputs")
      --codes <file>    JSON file mapping faculty codes to names (default: FACULTY_CODES_PATH)
      --sheet <name>    Worksheet to read from an Excel file (default: first sheet)
      --xlsx            Also write all result tables to ${OUTPUT_FILENAMES.workbook}
  -q, --quiet           Do not print table previews
  -v, --verbose         Per-row allocation logs (default: ALLOC_VERBOSE_LOGS)
  -h, --help            Show this message
`;

export interface CliOptions {
  input: string;
  outDir: string;
  codesPath: string | null;
  sheet?: string;
  xlsx: boolean;
  quiet: boolean;
  verbose: boolean;
}

export interface CliResult {
  exitCode: number;
  written: string[];
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      codes: { type: 'string' },
      sheet: { type: 'string' },
      xlsx: { type: 'boolean', default: false },
      quiet: { type: 'boolean', short: 'q', default: false },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/**
 * Returns null when usage should be shown (help, missing input, bad flags).
 */
export function parseCliArgs(argv: string[], env: Record<string, string | undefined> = process.env): CliOptions | null {
  let parsed: ReturnType<typeof parseFlags>;
  try {
    parsed = parseFlags(argv);
  } catch (err) {
    console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const { values, positionals } = parsed;
  if (values.help || positionals.length !== 1) return null;

  const config = readAllocationConfig(env);
  return {
    input: positionals[0],
    outDir: values.out ?? config.outputDir,
    codesPath: values.codes ?? config.facultyCodesPath,
    sheet: values.sheet,
    xlsx: values.xlsx ?? false,
    quiet: values.quiet ?? false,
    verbose: values.verbose ?? config.verboseLogs,
  };
}

function preview(title: string, table: Table, limit: number) {
  console.log(`\n${title} (first ${Math.min(limit, table.rows.length)} of ${table.rows.length} rows)`);
  console.table(table.rows.slice(0, limit), [...table.headers]);
}

export async function runCli(argv: string[], env: Record<string, string | undefined> = process.env): Promise<CliResult> {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(argv, env);
  } catch (err) {
    const normalized = normalizeError(err);
    console.error(`[cli] ${formatErrorMessage(normalized)}\n${normalized.suggestedAction}`);
    return { exitCode: 1, written: [] };
  }

  if (!options) {
    console.log(USAGE);
    return { exitCode: 2, written: [] };
  }

  try {
    const codes = options.codesPath ? await loadFacultyCodes(options.codesPath) : DEFAULT_FACULTY_CODES;
    const input = await readTableFile(options.input, options.sheet);

    if (!options.quiet) preview('Input preview', input, 10);

    // Nothing is written unless every stage succeeds
    const result = runAllocationPipeline(input, { codes, verbose: options.verbose });

    if (!options.quiet) {
      preview('Final allocation', result.final, 20);
      preview('Faculty preference counts', result.tally, 40);
    }

    await mkdir(options.outDir, { recursive: true });
    const finalPath = path.join(options.outDir, OUTPUT_FILENAMES.finalAllocation);
    const countPath = path.join(options.outDir, OUTPUT_FILENAMES.preferenceCount);
    await writeFile(finalPath, toCsv(result.final), 'utf8');
    await writeFile(countPath, toCsv(result.tally), 'utf8');
    const written = [finalPath, countPath];

    if (options.xlsx) {
      const workbookPath = await writeWorkbookXlsx(path.join(options.outDir, OUTPUT_FILENAMES.workbook), {
        Allocation: result.final,
        FacultyPreferenceCount: result.tally,
        SortedByCgpa: result.sorted,
      });
      written.push(workbookPath);
    }

    console.log(`[cli] Saved outputs to ${options.outDir}: ${written.map(p => path.basename(p)).join(', ')}`);
    return { exitCode: 0, written };
  } catch (err) {
    const normalized = normalizeError(err);
    console.error(`[cli] Allocation failed: ${normalized.rawMessage}`);
    console.error(`[cli] ${formatErrorMessage(normalized)}\n${normalized.suggestedAction}`);
    return { exitCode: 1, written: [] };
  }
}
