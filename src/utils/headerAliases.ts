// src/utils/headerAliases.ts
// Header names the allocation core looks for (matching is done in columnDetection.ts)

// Exact matches (after trim + lowercase); checked before the substring fallback
export const CGPA_ALIASES: readonly string[] = ['cgpa', 'cgpa_score', 'gpa', 'cgpa (out of 10)'];

export const CGPA_SUBSTRING = 'cgpa';

// Stable student identifiers, in priority order. Case-sensitive header match.
export const STUDENT_ID_CANDIDATES: readonly string[] = ['Roll', 'RollNo', 'Email', 'StudentID', 'ID'];

export const ALLOCATED_FACULTY_COLUMN = 'AllocatedFaculty';

export const TALLY_FACULTY_COLUMN = 'Fac';

export function tallyCountColumn(rank: number): string {
  return `Count Pref ${rank}`;
}
