import type { SheetGrid } from '../normalizers/index.js';
import { columnToIndex } from '../normalizers/index.js';

/**
 * Build a ragged worksheet grid (as the Sheets API returns it) from A1 cells
 */
export function buildGrid(cells: Record<string, string>): SheetGrid {
  const grid: SheetGrid = [];

  for (const [ref, value] of Object.entries(cells)) {
    const match = /^([A-Z]+)(\d+)$/.exec(ref);
    if (!match) {
      throw new Error(`Bad cell reference: ${ref}`);
    }
    const rowIndex = parseInt(match[2], 10) - 1;
    const columnIndex = columnToIndex(match[1]);

    while (grid.length <= rowIndex) {
      grid.push([]);
    }
    const row = grid[rowIndex];
    while (row.length < columnIndex) {
      row.push('');
    }
    row[columnIndex] = value;
  }

  return grid;
}

/**
 * One week of a shift plan in the default layout
 *
 * J. Kowalski works:
 * - B7  Mon customer-service 8-16
 * - D9  Tue customer-service 16-24, tagged PLAKATY
 * - F24 Wed ticket-agent 10-18, as a handover "A. Nowak/J. Kowalski"
 * - H25 Thu ticket-agent 9-17, written in lower case
 * - J7  Fri with an unreadable hours cell
 * - N40 Sun 7-15, outside every section
 */
export const PLAN_CELLS: Record<string, string> = {
  A1: 'GRAFIK PT-CZW',
  A5: '11 Mar',
  C5: '12 Mar',
  E5: '13 Mar',
  G5: '14 Mar',
  I5: '15 Mar',
  K5: '16 Mar',
  M5: '17 Mar',
  A7: '8.00-16.00',
  B7: 'J. Kowalski',
  A8: '16.00-24.00',
  B8: 'A. Nowak',
  C7: '8.00-16.00',
  D7: 'A. Nowak',
  C9: '16.00-24.00',
  D9: 'J. Kowalski PLAKATY',
  E24: '10.00-18.00',
  F24: 'A. Nowak/J. Kowalski',
  G25: '9.00-17.00',
  H25: 'j. kowalski',
  I7: 'nonsense',
  J7: 'J. Kowalski',
  M40: '7.00-15.00',
  N40: 'J. Kowalski',
};
