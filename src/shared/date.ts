/**
 * Calendar date helpers (`YYYY-MM-DD`, no time component)
 */

import type { CalendarDate } from './types.js';

const CALENDAR_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True when `value` is a real calendar date in `YYYY-MM-DD` form. */
export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE_REGEX.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // Date.UTC maps years 0-99 onto 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/** The UTC calendar date of `now`. */
export function toCalendarDate(now: Date = new Date()): CalendarDate {
  return now.toISOString().slice(0, 10);
}
