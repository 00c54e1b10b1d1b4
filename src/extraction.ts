/**
 * Workshift extraction from a shift plan worksheet
 *
 * Two strategies share the same output:
 * - columns: walks each day's name column inside the configured sections and
 *   compares accent-folded names, so "Ł. Żak" matches "L. Zak"
 * - search: scans the whole worksheet for the exact short name, so special
 *   characters must be typed correctly
 */

import type {
  ExtractionResult,
  ExtractionStrategy,
  ExtractionWarning,
  SheetLayout,
  Workshift,
} from '../schemas/index.js';
import {
  addYears,
  cellAt,
  cleanNameCell,
  columnToIndex,
  parseDayCell,
  parseHoursCell,
  resolveEndDate,
  toA1,
  toMatchKey,
  toShortName,
} from '../normalizers/index.js';
import type { SheetGrid } from '../normalizers/index.js';

/**
 * Options for extracting a worker's shifts
 */
export interface ExtractionOptions {
  /** Person's full name, e.g. "Jan Kowalski" */
  fullName: string;
  layout: SheetLayout;
  /** Year the day labels belong to */
  year: number;
  strategy: ExtractionStrategy;
}

/**
 * A name cell matched for the worker, before date/hour parsing
 */
interface ShiftLocation {
  row: number;
  hoursColumn: number;
  nameColumn: number;
  section?: string;
}

/**
 * Resolve the date of the day whose hours sit in `hoursColumn`
 *
 * Dates before the first day of the plan belong to the following year.
 */
function resolveDate(
  grid: SheetGrid,
  layout: SheetLayout,
  hoursColumn: number,
  year: number,
  firstDate: string | null
): string | null {
  const date = parseDayCell(cellAt(grid, layout.dateRow, hoursColumn), year);
  if (date && firstDate && date < firstDate) {
    return addYears(date, 1);
  }
  return date;
}

function firstPlanDate(grid: SheetGrid, layout: SheetLayout, year: number): string | null {
  for (const [hoursColumn] of layout.dayColumns) {
    const date = parseDayCell(cellAt(grid, layout.dateRow, columnToIndex(hoursColumn)), year);
    if (date) {
      return date;
    }
  }
  return null;
}

/**
 * Locate the worker in each day's name column (accent-insensitive)
 */
function locateByColumns(grid: SheetGrid, layout: SheetLayout, shortName: string): ShiftLocation[] {
  const key = toMatchKey(shortName);
  const locations: ShiftLocation[] = [];

  for (const [hoursLetters, nameLetters] of layout.dayColumns) {
    const hoursColumn = columnToIndex(hoursLetters);
    const nameColumn = columnToIndex(nameLetters);

    for (const section of layout.sections) {
      for (let row = section.startRow; row <= section.endRow; row++) {
        const name = cleanNameCell(cellAt(grid, row, nameColumn), layout.annotationTags);
        if (name === key) {
          locations.push({ row, hoursColumn, nameColumn, section: section.label });
        }
      }
    }
  }

  return locations;
}

/**
 * Locate the worker anywhere in the worksheet (exact, accent-sensitive)
 *
 * Only surrounding whitespace is ignored.
 */
function locateBySearch(grid: SheetGrid, layout: SheetLayout, shortName: string): ShiftLocation[] {
  const accepted = new Set([shortName, ...layout.annotationTags.map((tag) => `${shortName} ${tag}`)]);
  const locations: ShiftLocation[] = [];

  grid.forEach((cells, rowIndex) => {
    cells.forEach((value, columnIndex) => {
      if (columnIndex === 0 || !accepted.has(value.trim())) {
        return;
      }
      locations.push({ row: rowIndex + 1, hoursColumn: columnIndex - 1, nameColumn: columnIndex });
    });
  });

  return locations;
}

/**
 * Extract every shift of a worker from the worksheet grid
 *
 * - Cells that cannot be parsed are reported as warnings and skipped
 * - Shifts ending at or before their start end on the following day
 * - Returns shifts sorted by date, then start time
 */
export function extractWorkshifts(grid: SheetGrid, options: ExtractionOptions): ExtractionResult {
  const { layout, year, strategy } = options;
  const shortName = toShortName(options.fullName);
  const locations =
    strategy === 'search'
      ? locateBySearch(grid, layout, shortName)
      : locateByColumns(grid, layout, shortName);

  const firstDate = firstPlanDate(grid, layout, year);
  const workshifts: Workshift[] = [];
  const warnings: ExtractionWarning[] = [];

  for (const location of locations) {
    const nameCell = toA1(location.row, location.nameColumn);
    const dateCell = toA1(layout.dateRow, location.hoursColumn);
    const hoursCell = toA1(location.row, location.hoursColumn);

    const date = resolveDate(grid, layout, location.hoursColumn, year, firstDate);
    if (!date) {
      warnings.push({
        cell: dateCell,
        message: `Cannot parse day label "${cellAt(grid, layout.dateRow, location.hoursColumn)}" for shift in ${nameCell}`,
      });
      continue;
    }

    const hours = parseHoursCell(cellAt(grid, location.row, location.hoursColumn));
    if (!hours) {
      warnings.push({
        cell: hoursCell,
        message: `Cannot parse hours "${cellAt(grid, location.row, location.hoursColumn)}" for shift in ${nameCell}`,
      });
      continue;
    }

    const workshift: Workshift = {
      date,
      start: hours.start,
      end: hours.end,
      endDate: resolveEndDate(date, hours),
      cell: nameCell,
    };
    if (location.section) {
      workshift.section = location.section;
    }
    workshifts.push(workshift);
  }

  workshifts.sort((a, b) => a.date.localeCompare(b.date) || a.start.localeCompare(b.start));

  return { workshifts, warnings };
}
