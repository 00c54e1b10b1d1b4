/**
 * Grid and A1-notation helpers
 *
 * Worksheet values arrive as ragged row-major arrays; these helpers hide the
 * missing trailing cells and convert between A1 letters and indices.
 */

/**
 * Worksheet values as returned by the Sheets API (row-major)
 */
export type SheetGrid = string[][];

/**
 * Convert A1 column letters to a 0-based column index
 *
 * @param letters - Column letters, e.g. 'A', 'N', 'AB'
 * @returns 0-based index ('A' → 0, 'AA' → 26)
 */
export function columnToIndex(letters: string): number {
  const normalized = letters.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new Error(`Invalid column letters: "${letters}"`);
  }

  let index = 0;
  for (const char of normalized) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index - 1;
}

/**
 * Convert a 0-based column index to A1 column letters
 */
export function indexToColumn(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new Error(`Invalid column index: ${index}`);
  }

  let letters = '';
  let n = index + 1;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Build an A1 reference from a 1-based row and 0-based column
 */
export function toA1(row: number, columnIndex: number): string {
  return `${indexToColumn(columnIndex)}${row}`;
}

/**
 * Read a cell by 1-based row and 0-based column; missing cells read as ''
 */
export function cellAt(grid: SheetGrid, row: number, columnIndex: number): string {
  return grid[row - 1]?.[columnIndex] ?? '';
}

/**
 * Collapse runs of whitespace and trim
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}
