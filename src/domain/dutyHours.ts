import dayjs, { ISO_DATE_FORMAT, TIME_OF_DAY_FORMAT, formatISODate } from '@utils/dayjs';
import type { Dayjs } from 'dayjs';
import { debugLog } from '@utils/debug';
import {
  DAYS_PER_WEEK,
  daysBetween,
  enumerateDays,
  isOnWeekday,
  isWeekend,
  weekBucketStart,
  weekdayName,
} from './calendar';
import { DEFAULT_PROGRAM_RULES, type ProgramRules } from './programRules';
import type { RotationAssignment, RotationType, Violation } from './types';

const ROLLING_WINDOW_DAYS = 7;

export type DailyHours = {
  dateISO: string;
  day: Dayjs;
  hours: number;
};

/** Daily worked hours keyed by resident, then by ISO date. */
export type ResidentDailyHours = Map<string, Map<string, DailyHours>>;

function atTimeOfDay(day: Dayjs, time: string): Dayjs {
  return dayjs.utc(
    `${formatISODate(day)} ${time}`,
    `${ISO_DATE_FORMAT} ${TIME_OF_DAY_FORMAT}`,
    true,
  );
}

/**
 * Hours a rotation contributes on one calendar day. Overnight rotations end on the following
 * day; weekdays-only rotations contribute nothing on Saturday or Sunday. Never negative.
 */
export function rotationHoursForDate(
  rotation: RotationType,
  day: Dayjs,
  rules: ProgramRules = DEFAULT_PROGRAM_RULES,
): number {
  if (rotation.weekdaysOnly && isWeekend(day)) {
    return 0;
  }

  const start = atTimeOfDay(day, rotation.startTime ?? rules.defaultStartTime);
  const endDay = rotation.isOvernight ? day.add(1, 'day') : day;
  const end = atTimeOfDay(endDay, rotation.endTime ?? rules.defaultEndTime);
  if (!start.isValid() || !end.isValid()) {
    return 0;
  }

  return Math.max(end.diff(start, 'minute') / 60, 0);
}

export function buildDailyHours(
  assignments: readonly RotationAssignment[],
  rotationsById: ReadonlyMap<string, RotationType>,
  rules: ProgramRules = DEFAULT_PROGRAM_RULES,
): ResidentDailyHours {
  const daily: ResidentDailyHours = new Map();

  for (const assignment of assignments) {
    const rotation = rotationsById.get(assignment.rotationId);
    if (!rotation) {
      continue;
    }

    let residentDays = daily.get(assignment.residentId);
    if (!residentDays) {
      residentDays = new Map();
      daily.set(assignment.residentId, residentDays);
    }

    for (const day of enumerateDays(assignment.weekStartISO, assignment.weekEndISO)) {
      const hours = rotationHoursForDate(rotation, day, rules);
      if (hours <= 0) {
        continue;
      }
      const dateISO = formatISODate(day);
      const existing = residentDays.get(dateISO);
      if (existing) {
        existing.hours += hours;
      } else {
        residentDays.set(dateISO, { dateISO, day, hours });
      }
    }
  }

  return daily;
}

function sortDays(days: Iterable<DailyHours>): DailyHours[] {
  return [...days].sort((a, b) => a.dateISO.localeCompare(b.dateISO));
}

function findBlockChangeViolations(
  assignments: readonly RotationAssignment[],
  rotationsById: ReadonlyMap<string, RotationType>,
  rules: ProgramRules,
): Violation[] {
  const violations: Violation[] = [];
  for (const assignment of assignments) {
    if (!rotationsById.has(assignment.rotationId)) {
      continue;
    }
    if (isOnWeekday(assignment.weekStartISO, rules.rotationChangeDay)) {
      continue;
    }
    violations.push({
      code: 'block_change_day',
      message: `Rotation week must start on ${weekdayName(rules.rotationChangeDay)}`,
      severity: 'hard',
      spanStartISO: assignment.weekStartISO,
      spanEndISO: assignment.weekEndISO,
      residentId: assignment.residentId,
    });
  }
  return violations;
}

/**
 * Slides a trailing 7-day window over `days` (ascending) and reports every day on which the
 * window total exceeds the rolling cap. Overlapping spans are reported individually.
 */
export function findRollingWindowViolations(
  residentId: string,
  days: readonly DailyHours[],
  rules: ProgramRules = DEFAULT_PROGRAM_RULES,
): Violation[] {
  const violations: Violation[] = [];
  const window: DailyHours[] = [];
  let head = 0;
  let total = 0;

  for (const entry of days) {
    window.push(entry);
    total += entry.hours;

    let oldest = window[head];
    while (oldest && daysBetween(oldest.day, entry.day) > ROLLING_WINDOW_DAYS - 1) {
      total -= oldest.hours;
      head += 1;
      oldest = window[head];
    }

    if (total > rules.dutyHoursMax7d) {
      violations.push({
        code: 'duty_hours_7d',
        message: `Duty hours exceed ${rules.dutyHoursMax7d}h in 7-day window (${total.toFixed(1)}h)`,
        severity: 'hard',
        spanStartISO: (oldest ?? entry).dateISO,
        spanEndISO: entry.dateISO,
        residentId,
      });
    }
  }

  return violations;
}

export function findWeeklyViolations(
  residentId: string,
  days: readonly DailyHours[],
  rules: ProgramRules = DEFAULT_PROGRAM_RULES,
): Violation[] {
  const buckets = new Map<string, { start: Dayjs; total: number }>();
  for (const entry of days) {
    const start = weekBucketStart(entry.day, rules.rotationChangeDay);
    const key = formatISODate(start);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.total += entry.hours;
    } else {
      buckets.set(key, { start, total: entry.hours });
    }
  }

  const violations: Violation[] = [];
  for (const [key, bucket] of buckets) {
    if (bucket.total <= rules.dutyHoursMaxWeek) {
      continue;
    }
    violations.push({
      code: 'duty_hours_avg_week',
      message: `Weekly duty hours exceed ${rules.dutyHoursMaxWeek}h (${bucket.total.toFixed(1)}h)`,
      severity: 'hard',
      spanStartISO: key,
      spanEndISO: formatISODate(bucket.start.add(DAYS_PER_WEEK - 1, 'day')),
      residentId,
    });
  }
  return violations;
}

/**
 * Checks a set of assignments against the block-change, rolling 7-day and weekly duty-hour
 * rules. Pure: the same input always yields the same list in the same order.
 */
export function validateSchedule(
  assignments: readonly RotationAssignment[],
  rotationsById: ReadonlyMap<string, RotationType>,
  rules: ProgramRules = DEFAULT_PROGRAM_RULES,
): Violation[] {
  const violations = findBlockChangeViolations(assignments, rotationsById, rules);

  const daily = buildDailyHours(assignments, rotationsById, rules);
  for (const [residentId, residentDays] of daily) {
    const sorted = sortDays(residentDays.values());
    violations.push(...findRollingWindowViolations(residentId, sorted, rules));
    violations.push(...findWeeklyViolations(residentId, sorted, rules));
  }

  debugLog('validator.run', () => ({
    assignments: assignments.length,
    residents: daily.size,
    violations: violations.length,
  }));
  return violations;
}

export function hasHardViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === 'hard');
}
