import { InvalidRangeError } from '../domain/errors.js';
import { DEFAULT_WEEK_START } from '../domain/types.js';
import type { Bucket, Interval, WeekStart } from '../domain/types.js';
import { compareDates, toCalendarDate } from '../zone/calendar.js';
import { formatUtc } from '../zone/format.js';
import { toLocal } from '../zone/provider.js';
import type { Zone } from '../zone/provider.js';
import { bucketDates, resolveBucket } from './bucket.js';
import type { ComputedBucket } from './bucket.js';

/**
 * Lists every bucket overlapping the UTC interval `[startMs, endMs)`,
 * de-duplicated by key and sorted by start.
 *
 * @throws InvalidRangeError if `startMs` is not before `endMs`
 *
 * @example
 * // Europe/Berlin, 2026-03-28T12:00:00Z to 2026-03-30T00:00:00Z
 * enumerateBuckets(start, end, berlin, 'day').map((b) => b.key)
 * // ['2026-03-28', '2026-03-29', '2026-03-30']
 */
export function enumerateBuckets(
  startMs: number,
  endMs: number,
  zone: Zone,
  interval: Interval,
  weekStart: WeekStart = DEFAULT_WEEK_START,
): Bucket[] {
  if (startMs >= endMs) {
    throw new InvalidRangeError(formatUtc(startMs), formatUtc(endMs));
  }

  const lastDate = toCalendarDate(toLocal(endMs, zone).local);
  const found = new Map<string, ComputedBucket>();

  let dates = bucketDates(toCalendarDate(toLocal(startMs, zone).local), interval, weekStart);
  while (compareDates(dates.startDate, lastDate) <= 0) {
    const computed = resolveBucket(dates, zone);
    if (computed.startMs < endMs && computed.endMs > startMs && !found.has(dates.key)) {
      found.set(dates.key, computed);
    }
    dates = bucketDates(dates.endDate, interval, weekStart);
  }

  return [...found.values()]
    .sort((a, b) => a.startMs - b.startMs)
    .map((computed) => computed.bucket);
}
