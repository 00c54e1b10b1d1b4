/**
 * Day and hour cell parsing
 */

import { DateTime } from 'luxon';
import type { ShiftHours } from '../schemas/index.js';
import { collapseWhitespace } from './utils.js';

const DAY_FORMATS = ['d MMM yyyy', 'd MMMM yyyy'];

/**
 * "8.00-16.00", "8:00 – 16:00", "16-24", "16.00 - 24.00 (S)"
 */
const HOURS_PATTERN = /(\d{1,2})(?:[.:](\d{2}))?\s*[-–]\s*(\d{1,2})(?:[.:](\d{2}))?/;

/**
 * Parse a day label such as "15 Mar" for the given year
 *
 * @returns Date in YYYY-MM-DD format, or null if the label is not a date
 */
export function parseDayCell(value: string, year: number): string | null {
  const label = collapseWhitespace(value);
  if (label.length === 0) {
    return null;
  }

  for (const format of DAY_FORMATS) {
    const parsed = DateTime.fromFormat(`${label} ${year}`, format, { locale: 'en' });
    if (parsed.isValid) {
      return parsed.toISODate();
    }
  }
  return null;
}

function toTime(hourText: string, minuteText: string | undefined): string | null {
  let hour = parseInt(hourText, 10);
  const minute = minuteText === undefined ? 0 : parseInt(minuteText, 10);

  if (hour === 24 && minute === 0) {
    hour = 0;
  }
  if (hour > 23 || minute > 59) {
    return null;
  }

  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}:00`;
}

/**
 * Parse the first time range found in an hours cell
 *
 * Hour 24 is written as 00 (midnight of the next day).
 *
 * @returns Zero-padded HH:mm:ss start and end, or null if no valid range
 */
export function parseHoursCell(value: string): ShiftHours | null {
  const match = HOURS_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, startHour, startMinute, endHour, endMinute] = match;
  const start = toTime(startHour, startMinute);
  const end = toTime(endHour, endMinute);
  if (!start || !end) {
    return null;
  }

  return { start, end };
}

/**
 * Date on which a shift ends: the next day when it crosses midnight
 *
 * @param date - Start date, YYYY-MM-DD
 * @param hours - Zero-padded start/end times
 */
export function resolveEndDate(date: string, hours: ShiftHours): string {
  if (hours.end > hours.start) {
    return date;
  }

  const next = DateTime.fromISO(date).plus({ days: 1 }).toISODate();
  if (!next) {
    throw new Error(`Invalid date: "${date}"`);
  }
  return next;
}

/**
 * Move a date forward by whole years (plans spanning New Year)
 */
export function addYears(date: string, years: number): string {
  const shifted = DateTime.fromISO(date).plus({ years }).toISODate();
  if (!shifted) {
    throw new Error(`Invalid date: "${date}"`);
  }
  return shifted;
}
