// src/utils/featureFlags.ts
// Environment-driven settings for the allocation run (.env is loaded by the CLI)

import { z } from 'zod';
import { ConfigError } from '@/lib/errors/allocationErrors';

const TRUTHY = ['1', 'true', 'yes', 'y', 'on'];

export function coerceBool(value: unknown, fallback: boolean): boolean {
  if (value == null) return fallback;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const s = value.trim().toLowerCase();
    if (s === '') return fallback;
    return TRUTHY.includes(s);
  }
  return fallback;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  ALLOC_VERBOSE_LOGS: z.string().optional(),
  ALLOC_OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().trim().optional()),
  FACULTY_CODES_PATH: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export const DEFAULT_OUTPUT_DIR = 'outputs';

export const OUTPUT_FILENAMES = {
  finalAllocation: 'output_btp_mtp_allocation.csv',
  preferenceCount: 'fac_preference_count.csv',
  workbook: 'allocation_results.xlsx',
} as const;

export interface AllocationConfig {
  verboseLogs: boolean;
  outputDir: string;
  facultyCodesPath: string | null;
}

export function readAllocationConfig(env: Record<string, string | undefined> = process.env): AllocationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid environment setting ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unknown'}`);
  }

  return {
    verboseLogs: coerceBool(parsed.data.ALLOC_VERBOSE_LOGS, false),
    outputDir: parsed.data.ALLOC_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    facultyCodesPath: parsed.data.FACULTY_CODES_PATH ?? null,
  };
}

export const ALLOC_VERBOSE_LOGS = coerceBool(process.env.ALLOC_VERBOSE_LOGS, false);
