/**
 * Calendar bucket computation.
 *
 * Bucket boundaries are found in local calendar-date arithmetic and each
 * boundary midnight is resolved to UTC on its own, so a bucket spanning a DST
 * transition is 23 or 25 hours long instead of a fixed 24.
 */

import { DEFAULT_WEEK_START } from '../domain/types.js';
import type { Bucket, BucketResult, Interval, WeekStart } from '../domain/types.js';
import {
  addDays,
  atMidnight,
  dayOfWeek,
  daysSinceWeekStart,
  startOfMonth,
  startOfNextMonth,
  toCalendarDate,
} from '../zone/calendar.js';
import type { CalendarDate } from '../zone/calendar.js';
import { formatDate, formatMonth, formatUtc } from '../zone/format.js';
import { formatLocal, localToUtc, parseZone, toLocal } from '../zone/provider.js';
import type { Zone } from '../zone/provider.js';
import { parseTimestamp } from '../parse/timestamp.js';
import type { TimestampFormatOption } from '../parse/timestamp.js';
import { DAYS_PER_WEEK } from './constants.js';

/**
 * Local calendar dates bounding a bucket: `[startDate, endDate)`.
 */
export interface BucketDates {
  readonly key: string;
  readonly startDate: CalendarDate;
  readonly endDate: CalendarDate;
}

/**
 * A bucket together with its boundaries as epoch milliseconds.
 */
export interface ComputedBucket {
  readonly bucket: Bucket;
  readonly startMs: number;
  readonly endMs: number;
}

/**
 * Finds the local dates bounding the bucket that contains `date`.
 *
 * @example
 * // 2026-03-29 is a Sunday
 * bucketDates({ year: 2026, month: 3, day: 29 }, 'week', 'monday').key // '2026-03-23'
 * bucketDates({ year: 2026, month: 3, day: 29 }, 'week', 'sunday').key // '2026-03-29'
 */
export function bucketDates(
  date: CalendarDate,
  interval: Interval,
  weekStart: WeekStart = DEFAULT_WEEK_START,
): BucketDates {
  switch (interval) {
    case 'day':
      return { key: formatDate(date), startDate: date, endDate: addDays(date, 1) };
    case 'week': {
      const startDate = addDays(date, -daysSinceWeekStart(dayOfWeek(date), weekStart));
      return {
        key: formatDate(startDate),
        startDate,
        endDate: addDays(startDate, DAYS_PER_WEEK),
      };
    }
    case 'month':
      return {
        key: formatMonth(date),
        startDate: startOfMonth(date),
        endDate: startOfNextMonth(date),
      };
    default: {
      const _exhaustive: never = interval;
      throw new Error(`Unknown interval: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Resolves local midnight at the start of `date` to an instant.
 * A skipped midnight resolves to the end of the skipped range, a repeated
 * one to its first occurrence.
 */
export function resolveMidnight(date: CalendarDate, zone: Zone): number {
  return localToUtc(atMidnight(date), zone);
}

/**
 * Resolves the boundaries of a bucket given by its local dates.
 */
export function resolveBucket(dates: BucketDates, zone: Zone): ComputedBucket {
  const startMs = resolveMidnight(dates.startDate, zone);
  const endMs = resolveMidnight(dates.endDate, zone);
  return {
    bucket: {
      key: dates.key,
      // Re-derived from the resolved instants so the offsets are the ones in effect
      start_local: formatLocal(startMs, zone),
      end_local: formatLocal(endMs, zone),
      start_utc: formatUtc(startMs),
      end_utc: formatUtc(endMs),
    },
    startMs,
    endMs,
  };
}

/**
 * Computes the bucket containing an instant, keeping the boundary instants.
 *
 * @throws RuntimeError if date arithmetic leaves the representable range
 */
export function computeBucketBounds(
  instantMs: number,
  zone: Zone,
  interval: Interval,
  weekStart: WeekStart = DEFAULT_WEEK_START,
): ComputedBucket {
  const localDate = toCalendarDate(toLocal(instantMs, zone).local);
  return resolveBucket(bucketDates(localDate, interval, weekStart), zone);
}

/**
 * Computes the calendar bucket containing an instant in a zone.
 *
 * @param instantMs - Epoch milliseconds
 * @param weekStart - First day of week buckets; ignored for other intervals
 * @throws RuntimeError if date arithmetic leaves the representable range
 *
 * @example
 * computeBucket(Date.UTC(2026, 2, 29, 0, 15), parseZone('Europe/Berlin'), 'day')
 * // {
 * //   key: '2026-03-29',
 * //   start_local: '2026-03-29T00:00:00+01:00',
 * //   end_local: '2026-03-30T00:00:00+02:00',
 * //   start_utc: '2026-03-28T23:00:00Z',
 * //   end_utc: '2026-03-29T22:00:00Z',
 * // }
 */
export function computeBucket(
  instantMs: number,
  zone: Zone,
  interval: Interval,
  weekStart: WeekStart = DEFAULT_WEEK_START,
): Bucket {
  return computeBucketBounds(instantMs, zone, interval, weekStart).bucket;
}

/**
 * Parses a timestamp and a zone name and computes the bucket record for them.
 *
 * @throws InvalidTimezoneError if the zone name is unknown
 * @throws ParseError if the timestamp does not match the format
 */
export function computeBucketFromString(
  text: string,
  format: TimestampFormatOption,
  zoneName: string,
  interval: Interval,
  weekStart: WeekStart = DEFAULT_WEEK_START,
): BucketResult {
  const zone = parseZone(zoneName);
  const ts = text.trim();
  const epochMs = parseTimestamp(ts, format);
  return {
    input: { ts, epoch_ms: epochMs },
    tz: zone.name,
    interval,
    bucket: computeBucket(epochMs, zone, interval, weekStart),
  };
}
