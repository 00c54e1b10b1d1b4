import { describe, it, expect } from 'vitest';
import { validateConfig } from '../schemas/index.js';
import type { SheetLayout } from '../schemas/index.js';
import { extractWorkshifts } from '../src/extraction.js';
import { buildGrid, PLAN_CELLS } from './helpers.js';

const layout: SheetLayout = validateConfig({}).layout;

describe('extractWorkshifts', () => {
  describe('columns strategy', () => {
    it('should extract every section row naming the worker', () => {
      const result = extractWorkshifts(buildGrid(PLAN_CELLS), {
        fullName: 'Jan Kowalski',
        layout,
        year: 2024,
        strategy: 'columns',
      });

      expect(result.workshifts).toEqual([
        {
          date: '2024-03-11',
          start: '08:00:00',
          end: '16:00:00',
          endDate: '2024-03-11',
          section: 'customer-service',
          cell: 'B7',
        },
        {
          date: '2024-03-12',
          start: '16:00:00',
          end: '00:00:00',
          endDate: '2024-03-13',
          section: 'customer-service',
          cell: 'D9',
        },
        {
          date: '2024-03-13',
          start: '10:00:00',
          end: '18:00:00',
          endDate: '2024-03-13',
          section: 'ticket-agent',
          cell: 'F24',
        },
        {
          date: '2024-03-14',
          start: '09:00:00',
          end: '17:00:00',
          endDate: '2024-03-14',
          section: 'ticket-agent',
          cell: 'H25',
        },
      ]);
    });

    it('should report unparseable hours as warnings', () => {
      const result = extractWorkshifts(buildGrid(PLAN_CELLS), {
        fullName: 'Jan Kowalski',
        layout,
        year: 2024,
        strategy: 'columns',
      });

      expect(result.warnings).toEqual([
        { cell: 'I7', message: 'Cannot parse hours "nonsense" for shift in J7' },
      ]);
    });

    it('should match names regardless of accents', () => {
      const grid = buildGrid({ A5: '11 Mar', A7: '6.00-14.00', B7: 'Ł. Żak' });

      for (const fullName of ['Łukasz Żak', 'Lukasz Zak']) {
        const result = extractWorkshifts(grid, { fullName, layout, year: 2024, strategy: 'columns' });
        expect(result.workshifts.map((shift) => shift.cell)).toEqual(['B7']);
      }
    });

    it('should ignore other workers', () => {
      const result = extractWorkshifts(buildGrid(PLAN_CELLS), {
        fullName: 'Adam Nowak',
        layout,
        year: 2024,
        strategy: 'columns',
      });

      expect(result.workshifts.map((shift) => shift.cell)).toEqual(['B8', 'D7']);
      expect(result.warnings).toEqual([]);
    });
  });

  describe('search strategy', () => {
    it('should find exact name cells anywhere in the worksheet', () => {
      const result = extractWorkshifts(buildGrid(PLAN_CELLS), {
        fullName: 'Jan Kowalski',
        layout,
        year: 2024,
        strategy: 'search',
      });

      expect(result.workshifts).toEqual([
        { date: '2024-03-11', start: '08:00:00', end: '16:00:00', endDate: '2024-03-11', cell: 'B7' },
        { date: '2024-03-12', start: '16:00:00', end: '00:00:00', endDate: '2024-03-13', cell: 'D9' },
        { date: '2024-03-17', start: '07:00:00', end: '15:00:00', endDate: '2024-03-17', cell: 'N40' },
      ]);
      expect(result.warnings).toEqual([
        { cell: 'I7', message: 'Cannot parse hours "nonsense" for shift in J7' },
      ]);
    });

    it('should require special characters to match', () => {
      const grid = buildGrid({ A5: '11 Mar', A7: '6.00-14.00', B7: 'Ł. Żak' });

      const exact = extractWorkshifts(grid, { fullName: 'Łukasz Żak', layout, year: 2024, strategy: 'search' });
      const folded = extractWorkshifts(grid, { fullName: 'Lukasz Zak', layout, year: 2024, strategy: 'search' });

      expect(exact.workshifts.map((shift) => shift.cell)).toEqual(['B7']);
      expect(folded.workshifts).toEqual([]);
    });

    it('should not match names with extra inner spaces', () => {
      const grid = buildGrid({
        A5: '11 Mar',
        C5: '12 Mar',
        A7: '8.00-16.00',
        B7: 'J.  Kowalski',
        C7: '8.00-16.00',
        D7: ' J. Kowalski ',
      });

      const result = extractWorkshifts(grid, { fullName: 'Jan Kowalski', layout, year: 2024, strategy: 'search' });

      expect(result.workshifts.map((shift) => shift.cell)).toEqual(['D7']);
    });

    it('should ignore names in the first column', () => {
      const grid = buildGrid({ A5: '11 Mar', A7: 'J. Kowalski' });

      const result = extractWorkshifts(grid, { fullName: 'Jan Kowalski', layout, year: 2024, strategy: 'search' });

      expect(result.workshifts).toEqual([]);
      expect(result.warnings).toEqual([]);
    });
  });

  it('should move January days of a December plan to the next year', () => {
    const grid = buildGrid({
      A5: '30 Dec',
      C5: '31 Dec',
      E5: '1 Jan',
      E7: '8.00-16.00',
      F7: 'J. Kowalski',
    });

    const result = extractWorkshifts(grid, { fullName: 'Jan Kowalski', layout, year: 2024, strategy: 'columns' });

    expect(result.workshifts.map((shift) => shift.date)).toEqual(['2025-01-01']);
  });

  it('should warn about a missing day label', () => {
    const grid = buildGrid({ A7: '8.00-16.00', B7: 'J. Kowalski' });

    const result = extractWorkshifts(grid, { fullName: 'Jan Kowalski', layout, year: 2024, strategy: 'columns' });

    expect(result.workshifts).toEqual([]);
    expect(result.warnings).toEqual([{ cell: 'A5', message: 'Cannot parse day label "" for shift in B7' }]);
  });

  it('should follow a custom layout', () => {
    const custom: SheetLayout = {
      dateRow: 2,
      dayColumns: [['B', 'C']],
      sections: [{ label: 'night', startRow: 3, endRow: 4 }],
      annotationTags: [],
    };
    const grid = buildGrid({ B2: '2 Apr', B4: '22.00-06.00', C4: 'J. Kowalski' });

    const result = extractWorkshifts(grid, { fullName: 'Jan Kowalski', layout: custom, year: 2024, strategy: 'columns' });

    expect(result.workshifts).toEqual([
      { date: '2024-04-02', start: '22:00:00', end: '06:00:00', endDate: '2024-04-03', section: 'night', cell: 'C4' },
    ]);
  });
});
