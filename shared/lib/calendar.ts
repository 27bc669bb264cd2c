import type { Occurrence, ScheduleRule } from '../models';
import { Weekday, activeWeeks, weekdayFromJsDay } from '../models';
import {
  DEFAULT_TIMEZONE,
  addCalendarDays,
  daysInMonth,
  zonedDateTime,
  zonedParts,
} from './timezone';

export type RecurrenceRule = Pick<
  ScheduleRule,
  'weekday' | 'from_hour' | 'to_hour' | 'week1' | 'week2' | 'week3' | 'week4' | 'week5'
>;

export type RecurrenceHorizon = { months: number } | { weeks: number };

export interface RecurrenceOptions {
  horizon?: RecurrenceHorizon;
  limit?: number;
  timeZone?: string;
}

export const DEFAULT_HORIZON: RecurrenceHorizon = { months: 3 };
export const MAX_HORIZON_MONTHS = 13;
export const MAX_HORIZON_WEEKS = 56;

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Find the day of the month for the nth occurrence of a weekday.
 * Example: nthWeekday(2025, 1, Weekday.MON, 2) returns 13, the 2nd Monday in Jan 2025
 *
 * @param month - The month (1-12)
 * @param occurrence - Which occurrence (1-5)
 * @returns Day of month, or null if the month has no such occurrence
 */
export function nthWeekday(year: number, month: number, weekday: Weekday, occurrence: number): number | null {
  const firstWeekday = weekdayFromJsDay(new Date(Date.UTC(year, month - 1, 1)).getUTCDay());

  const day = 1 + ((weekday - firstWeekday + 7) % 7) + 7 * (occurrence - 1);
  return day <= daysInMonth(year, month) ? day : null;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function buildOccurrence(
  rule: RecurrenceRule,
  year: number,
  month: number,
  day: number,
  weekOfMonth: number,
  timeZone: string,
): Occurrence {
  const start = zonedDateTime(timeZone, year, month, day, rule.from_hour);
  let end = zonedDateTime(timeZone, year, month, day, rule.to_hour);

  // Windows that cross midnight end on the following day
  if (end.getTime() <= start.getTime()) {
    end = addCalendarDays(end, 1, timeZone);
  }

  return {
    start,
    end,
    date: `${year}-${pad(month)}-${pad(day)}`,
    weekOfMonth,
  };
}

function monthsToScan(horizon: RecurrenceHorizon): number {
  if ('months' in horizon) {
    return Math.min(Math.max(Math.floor(horizon.months), 0), MAX_HORIZON_MONTHS);
  }
  const weeks = Math.min(Math.max(horizon.weeks, 0), MAX_HORIZON_WEEKS);
  // Every month has at least 28 days
  return Math.ceil((weeks * 7) / 28) + 1;
}

/**
 * Future start instants of a rule, soonest first.
 *
 * The rule fires on the nth appearance of its weekday within each calendar month
 * for every n whose week flag is set; months are walked from the one containing
 * `after`. A `{ months }` horizon counts calendar months including the current one;
 * a `{ weeks }` horizon only accepts starts within that many weeks of `after`.
 */
export function nextOccurrences(
  rule: RecurrenceRule,
  after: Date,
  options: RecurrenceOptions = {},
): Occurrence[] {
  const timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  const horizon = options.horizon ?? DEFAULT_HORIZON;

  const weeks = activeWeeks(rule);
  if (weeks.length === 0 || limit <= 0) {
    return [];
  }

  const deadline = 'weeks' in horizon ? after.getTime() + horizon.weeks * WEEK_MS : null;
  const reference = zonedParts(after, timeZone);
  const results: Occurrence[] = [];

  for (let monthOffset = 0; monthOffset < monthsToScan(horizon); monthOffset++) {
    const monthIndex = reference.month - 1 + monthOffset;
    const year = reference.year + Math.floor(monthIndex / 12);
    const month = (monthIndex % 12) + 1;

    for (const week of weeks) {
      const day = nthWeekday(year, month, rule.weekday, week);
      if (day === null) continue;

      const occurrence = buildOccurrence(rule, year, month, day, week, timeZone);
      if (occurrence.start.getTime() <= after.getTime()) continue;

      // Months and weeks are walked in order, so nothing later can fit either
      if (deadline !== null && occurrence.start.getTime() > deadline) {
        return results;
      }

      results.push(occurrence);
      if (results.length >= limit) {
        return results;
      }
    }
  }

  return results.sort((a, b) => a.start.getTime() - b.start.getTime());
}

export function nextOccurrence(
  rule: RecurrenceRule,
  after: Date,
  options: Omit<RecurrenceOptions, 'limit'> = {},
): Occurrence | null {
  return nextOccurrences(rule, after, { ...options, limit: 1 })[0] ?? null;
}

/**
 * The restriction window in progress at `at`, if any.
 */
export function activeWindow(
  rule: RecurrenceRule,
  at: Date,
  options: Pick<RecurrenceOptions, 'timeZone'> = {},
): Occurrence | null {
  // A window lasts at most a day, so it started within the last 36 hours
  const since = new Date(at.getTime() - 36 * 60 * 60 * 1000);
  const candidates = nextOccurrences(rule, since, {
    timeZone: options.timeZone,
    horizon: { weeks: 1 },
    limit: 2,
  });
  return candidates.find(o => o.start.getTime() <= at.getTime() && at.getTime() < o.end.getTime()) ?? null;
}
