import { parseISODate } from '@utils/dayjs';
import type { Dayjs } from 'dayjs';

const WEEKEND_DAYS = new Set([0, 6]);
const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

export const DAYS_PER_WEEK = 7;

export function isWeekend(day: Dayjs): boolean {
  return WEEKEND_DAYS.has(day.day());
}

export function weekdayName(weekday: number): string {
  return WEEKDAY_NAMES[weekday] ?? `weekday ${weekday}`;
}

/** The `anchorWeekday` on or before `day`. */
export function weekBucketStart(day: Dayjs, anchorWeekday: number): Dayjs {
  const offset = (day.day() - anchorWeekday + DAYS_PER_WEEK) % DAYS_PER_WEEK;
  return day.subtract(offset, 'day');
}

export function isOnWeekday(dateISO: string, weekday: number): boolean {
  const day = parseISODate(dateISO);
  return day.isValid() && day.day() === weekday;
}

/** Inclusive list of calendar days between two ISO dates; empty when either is invalid. */
export function enumerateDays(startISO: string, endISO: string): Dayjs[] {
  const start = parseISODate(startISO);
  const end = parseISODate(endISO);
  if (!start.isValid() || !end.isValid()) {
    return [];
  }
  const days: Dayjs[] = [];
  let cursor = start;
  while (!cursor.isAfter(end, 'day')) {
    days.push(cursor);
    cursor = cursor.add(1, 'day');
  }
  return days;
}

export function daysBetween(earlier: Dayjs, later: Dayjs): number {
  return later.diff(earlier, 'day');
}
