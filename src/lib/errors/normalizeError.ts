/**
 * Normalizes raw errors into user-facing messages with reference IDs.
 *
 * Usage:
 *   const normalized = normalizeError(error);
 *   console.error(formatErrorMessage(normalized));
 */

import { isAllocationError } from "./allocationErrors";

export type ErrorSeverity = "error" | "warn" | "info";

export interface NormalizedError {
  friendlyMessage: string;
  suggestedAction: string;
  severity: ErrorSeverity;
  referenceId: string;
  rawCode?: string;
  rawMessage: string;
  eventType: string;
}

function generateReferenceId(): string {
  const chars = "ABCDEFGHJKMNPQRSTUVWXYZ23456789";
  let id = "";
  for (let i = 0; i < 6; i++) {
    id += chars[Math.floor(Math.random() * chars.length)];
  }
  return id;
}

type ErrorPattern = {
  test: (msg: string, code: string | undefined) => boolean;
  friendly: string;
  action: string;
  severity: ErrorSeverity;
  eventType: string;
};

const PATTERNS: ErrorPattern[] = [
  // Input structure
  {
    test: (m, c) => c === "COLUMN_NOT_FOUND" || /cgpa column not found/i.test(m),
    friendly: "Could not find a CGPA column in the file.",
    action: "Add a header named 'CGPA' (or 'GPA', 'CGPA_score', 'CGPA (out of 10)') before the preference columns.",
    severity: "error",
    eventType: "input_error",
  },
  {
    test: (m, c) => c === "NO_PREFERENCE_COLUMNS" || /no preference columns/i.test(m),
    friendly: "No faculty preference columns were found after the CGPA column.",
    action: "Place the ranked preference columns (1st choice first) immediately after CGPA.",
    severity: "error",
    eventType: "input_error",
  },
  // Internal contract between allocation stages
  {
    test: (m, c) => c === "MISSING_ALLOCATION_COLUMN" || /must contain the "AllocatedFaculty" column/i.test(m),
    friendly: "The allocation result is missing its AllocatedFaculty column.",
    action: "Run the allocation step again before mapping results back to the input order.",
    severity: "error",
    eventType: "pipeline_error",
  },
  {
    test: (m, c) => c === "ROW_COUNT_MISMATCH" || /row counts differ/i.test(m),
    friendly: "Allocations could not be matched back to students.",
    action: "Add a Roll, RollNo, Email, StudentID or ID column, or allocate the same file you reconcile.",
    severity: "error",
    eventType: "pipeline_error",
  },
  // File / configuration
  {
    test: (m, c) => c === "TABLE_PARSE_ERROR" || /no sheets found|no header row|unsupported file type/i.test(m),
    friendly: "The input file could not be read as a table.",
    action: "Upload a CSV or Excel (.xls/.xlsx) file whose first row holds the column headers.",
    severity: "error",
    eventType: "import_error",
  },
  {
    test: (_m, c) => c === "CONFIG_ERROR",
    friendly: "The allocation settings are invalid.",
    action: "Check FACULTY_CODES_PATH and the other ALLOC_* settings in your .env file.",
    severity: "error",
    eventType: "config_error",
  },
  {
    test: (m, c) => c === "ENOENT" || /no such file or directory/i.test(m),
    friendly: "The file was not found.",
    action: "Check the path and try again.",
    severity: "error",
    eventType: "file_error",
  },
  {
    test: (m, c) => c === "EACCES" || c === "EPERM" || /permission denied/i.test(m),
    friendly: "Permission denied while reading or writing a file.",
    action: "Check that the output directory is writable.",
    severity: "error",
    eventType: "file_error",
  },
];

/**
 * Normalizes any error into a user-facing structure.
 */
export function normalizeError(error: unknown): NormalizedError {
  const referenceId = generateReferenceId();
  const rawMessage = extractMessage(error);
  const rawCode = extractCode(error);

  for (const pattern of PATTERNS) {
    if (pattern.test(rawMessage, rawCode)) {
      return {
        friendlyMessage: pattern.friendly,
        suggestedAction: pattern.action,
        severity: pattern.severity,
        referenceId,
        rawCode,
        rawMessage,
        eventType: pattern.eventType,
      };
    }
  }

  // Fallback
  return {
    friendlyMessage: "Something went wrong while allocating faculty.",
    suggestedAction: "Check the logs for the reference ID below.",
    severity: "error",
    referenceId,
    rawCode,
    rawMessage,
    eventType: "unknown_error",
  };
}

function extractMessage(error: unknown): string {
  if (!error) return "";
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  if (typeof error === "object") {
    const obj = error as Record<string, unknown>;
    if (typeof obj.message === "string") return obj.message;
    if (typeof obj.error === "string") return obj.error;
  }
  return String(error);
}

function extractCode(error: unknown): string | undefined {
  if (isAllocationError(error)) return error.code;
  if (!error || typeof error !== "object") return undefined;
  const obj = error as Record<string, unknown>;
  if (typeof obj.code === "string") return obj.code;
  return undefined;
}

/**
 * Formats a normalized error for the terminal.
 * Returns the message with the reference ID appended.
 */
export function formatErrorMessage(normalized: NormalizedError): string {
  return `${normalized.friendlyMessage} (Ref: ${normalized.referenceId})`;
}
