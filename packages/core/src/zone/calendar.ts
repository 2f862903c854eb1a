import { RuntimeError } from '../domain/errors.js';
import type { WeekStart } from '../domain/types.js';
import { MAX_EPOCH_MS, MS_PER_DAY, MS_PER_SECOND } from '../time/constants.js';

/**
 * Day of week representation: Monday = 0, Sunday = 6.
 */
export type DayOfWeek = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * A proleptic Gregorian calendar date with no zone attached.
 */
export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
}

/**
 * A wall-clock reading with no zone attached.
 */
export interface LocalDateTime extends CalendarDate {
  /** 0-23 */
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

/**
 * Returns true if `ms` is a finite epoch millisecond value within the Date range.
 */
export function isRepresentableMs(ms: number): boolean {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_EPOCH_MS;
}

/**
 * Reads a wall clock as if it were UTC and returns that epoch millisecond value.
 * Years 0-99 are taken literally (no 1900 offset). Returns NaN outside the Date range.
 */
export function localDateTimeToMs(local: LocalDateTime): number {
  const date = new Date(0);
  date.setUTCFullYear(local.year, local.month - 1, local.day);
  date.setUTCHours(local.hour, local.minute, local.second, local.millisecond);
  return date.getTime();
}

/**
 * Inverse of {@link localDateTimeToMs}.
 */
export function msToLocalDateTime(ms: number): LocalDateTime {
  const date = new Date(ms);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    millisecond: date.getUTCMilliseconds(),
  };
}

/**
 * Local midnight at the start of a date.
 */
export function atMidnight(date: CalendarDate): LocalDateTime {
  return {
    year: date.year,
    month: date.month,
    day: date.day,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
  };
}

/**
 * Drops the time of day.
 */
export function toCalendarDate(local: CalendarDate): CalendarDate {
  return { year: local.year, month: local.month, day: local.day };
}

function shiftMs(baseMs: number, deltaMs: number, what: string): number {
  const shifted = baseMs + deltaMs;
  if (!isRepresentableMs(baseMs) || !isRepresentableMs(shifted)) {
    throw new RuntimeError(`Date arithmetic overflow while ${what}`, { baseMs, deltaMs });
  }
  return shifted;
}

/**
 * Adds whole calendar days to a date.
 *
 * @throws RuntimeError if the result leaves the representable range
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const ms = shiftMs(localDateTimeToMs(atMidnight(date)), days * MS_PER_DAY, `adding ${days} days`);
  return toCalendarDate(msToLocalDateTime(ms));
}

/**
 * Adds seconds to a wall clock using plain wall-clock arithmetic (no zone rules).
 *
 * @throws RuntimeError if the result leaves the representable range
 */
export function addSeconds(local: LocalDateTime, seconds: number): LocalDateTime {
  const ms = shiftMs(localDateTimeToMs(local), seconds * MS_PER_SECOND, `adding ${seconds} seconds`);
  return msToLocalDateTime(ms);
}

/**
 * Wall-clock difference `a - b` in milliseconds.
 */
export function diffMs(a: LocalDateTime, b: LocalDateTime): number {
  return localDateTimeToMs(a) - localDateTimeToMs(b);
}

/**
 * Number of days in a month, accounting for leap years.
 */
export function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  // Day 0 of the following month is the last day of this one
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

/**
 * Day of week of a date (0 = Monday, 6 = Sunday).
 */
export function dayOfWeek(date: CalendarDate): DayOfWeek {
  // getUTCDay() returns 0=Sunday, 1=Monday, ..., 6=Saturday
  const jsDayOfWeek = new Date(localDateTimeToMs(atMidnight(date))).getUTCDay();
  switch (jsDayOfWeek) {
    case 0:
      return 6;
    case 1:
      return 0;
    case 2:
      return 1;
    case 3:
      return 2;
    case 4:
      return 3;
    case 5:
      return 4;
    default:
      return 5;
  }
}

/**
 * 0-based number of days between the start of the week and `day`.
 *
 * @example
 * daysSinceWeekStart(6, 'monday') // 6 (Sunday is the last day of a Monday week)
 * daysSinceWeekStart(6, 'sunday') // 0
 */
export function daysSinceWeekStart(day: DayOfWeek, weekStart: WeekStart): number {
  switch (weekStart) {
    case 'monday':
      return day;
    case 'sunday':
      return (day + 1) % 7;
    default: {
      const _exhaustive: never = weekStart;
      throw new Error(`Unknown week start: ${String(_exhaustive)}`);
    }
  }
}

/**
 * First day of the month containing `date`.
 */
export function startOfMonth(date: CalendarDate): CalendarDate {
  return { year: date.year, month: date.month, day: 1 };
}

/**
 * First day of the month after the one containing `date`.
 * December rolls over to January of the following year.
 */
export function startOfNextMonth(date: CalendarDate): CalendarDate {
  if (date.month === 12) {
    return { year: date.year + 1, month: 1, day: 1 };
  }
  return { year: date.year, month: date.month + 1, day: 1 };
}

/**
 * Orders two dates: negative if `a` is earlier, zero if equal, positive if later.
 */
export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}
