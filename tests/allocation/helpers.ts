import type { Cell, Row, Table } from '@/types/allocation';

export function makeTable(headers: string[], matrix: Cell[][]): Table {
  const rows = matrix.map(values => {
    const row: Row = {};
    headers.forEach((h, idx) => {
      row[h] = values[idx] ?? null;
    });
    return row;
  });
  return { headers, rows };
}

export function column(table: Table, name: string): Cell[] {
  return table.rows.map(row => row[name] ?? null);
}

// Four students, three ranked preferences given as faculty codes
export const EXAMPLE_HEADERS = ['Roll', 'Name', 'CGPA', 'Pref 1', 'Pref 2', 'Pref 3'];

export const EXAMPLE_ROWS: Record<string, Cell[]> = {
  R1: ['R1', 'Asha', 9.1, '1', '2', '3'],
  R2: ['R2', 'Bala', 8.0, '4', '5', '6'],
  R3: ['R3', 'Chen', 8.0, '7', '8', '9'],
  R4: ['R4', 'Dev', 7.5, '10', '11', '12'],
};

export function exampleTable(order: string[] = ['R1', 'R2', 'R3', 'R4']): Table {
  return makeTable(EXAMPLE_HEADERS, order.map(id => EXAMPLE_ROWS[id]));
}

/**
 * Deterministic pseudo-random student table (linear congruential generator).
 */
export function generatedTable(students: number, prefs: number, seed = 42): Table {
  let state = seed;
  const next = () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };

  const prefHeaders = Array.from({ length: prefs }, (_, i) => `Choice ${i + 1}`);
  const headers = ['Roll', 'CGPA', ...prefHeaders];
  const matrix: Cell[][] = Array.from({ length: students }, (_, i) => {
    // Coarse CGPA steps so ties are common
    const cgpa = Math.round(next() * 8) / 2 + 6;
    const choices = prefHeaders.map(() => {
      const pick = Math.floor(next() * 22);
      if (pick === 0) return '';
      return pick <= 18 ? String(pick) : `Guest ${pick}`;
    });
    return [`S${i + 1}`, cgpa, ...choices];
  });

  return makeTable(headers, matrix);
}
