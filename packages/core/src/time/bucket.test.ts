import { describe, it, expect } from 'vitest';
import {
  bucketDates,
  computeBucket,
  computeBucketBounds,
  computeBucketFromString,
} from './bucket.js';
import { MS_PER_DAY } from './constants.js';
import { parseZone } from '../zone/provider.js';
import { InvalidTimezoneError, ParseError } from '../domain/errors.js';

const HOUR_MS = 3_600_000;

describe('bucketDates', () => {
  const sunday = { year: 2026, month: 3, day: 29 };

  it('should span one day for day buckets', () => {
    expect(bucketDates(sunday, 'day')).toEqual({
      key: '2026-03-29',
      startDate: sunday,
      endDate: { year: 2026, month: 3, day: 30 },
    });
  });

  it('should start Monday weeks on the previous Monday', () => {
    const dates = bucketDates(sunday, 'week', 'monday');
    expect(dates.key).toBe('2026-03-23');
    expect(dates.endDate).toEqual({ year: 2026, month: 3, day: 30 });
  });

  it('should start Sunday weeks on the Sunday itself', () => {
    const dates = bucketDates(sunday, 'week', 'sunday');
    expect(dates.key).toBe('2026-03-29');
    expect(dates.endDate).toEqual({ year: 2026, month: 4, day: 5 });
  });

  it('should default to Monday weeks', () => {
    expect(bucketDates(sunday, 'week').key).toBe('2026-03-23');
  });

  it('should key month buckets by year and month', () => {
    expect(bucketDates({ year: 2026, month: 12, day: 15 }, 'month')).toEqual({
      key: '2026-12',
      startDate: { year: 2026, month: 12, day: 1 },
      endDate: { year: 2027, month: 1, day: 1 },
    });
  });
});

describe('computeBucket', () => {
  const berlin = parseZone('Europe/Berlin');

  describe('day buckets across DST in Europe/Berlin', () => {
    it('should produce a 23-hour spring-forward day', () => {
      const bucket = computeBucket(Date.UTC(2026, 2, 29, 0, 15), berlin, 'day');
      expect(bucket).toEqual({
        key: '2026-03-29',
        start_local: '2026-03-29T00:00:00+01:00',
        end_local: '2026-03-30T00:00:00+02:00',
        start_utc: '2026-03-28T23:00:00Z',
        end_utc: '2026-03-29T22:00:00Z',
      });
    });

    it('should produce a 25-hour fall-back day', () => {
      const bucket = computeBucket(Date.UTC(2026, 9, 25, 1), berlin, 'day');
      expect(bucket).toEqual({
        key: '2026-10-25',
        start_local: '2026-10-25T00:00:00+02:00',
        end_local: '2026-10-26T00:00:00+01:00',
        start_utc: '2026-10-24T22:00:00Z',
        end_utc: '2026-10-25T23:00:00Z',
      });
    });

    it('should measure real durations, not fixed days', () => {
      const spring = computeBucketBounds(Date.UTC(2026, 2, 29, 12), berlin, 'day');
      const fall = computeBucketBounds(Date.UTC(2026, 9, 25, 12), berlin, 'day');
      expect(spring.endMs - spring.startMs).toBe(23 * HOUR_MS);
      expect(fall.endMs - fall.startMs).toBe(25 * HOUR_MS);
    });
  });

  describe('day buckets in America/New_York', () => {
    it('should produce a 23-hour day on 2026-03-08', () => {
      const bucket = computeBucket(Date.UTC(2026, 2, 8, 12), parseZone('America/New_York'), 'day');
      expect(bucket.start_utc).toBe('2026-03-08T05:00:00Z');
      expect(bucket.end_utc).toBe('2026-03-09T04:00:00Z');
      expect(bucket.start_local).toBe('2026-03-08T00:00:00-05:00');
      expect(bucket.end_local).toBe('2026-03-09T00:00:00-04:00');
    });
  });

  describe('midnight transitions in America/Havana', () => {
    const havana = parseZone('America/Havana');

    it('should start a day at the end of a skipped midnight', () => {
      // Clocks jump from 00:00 to 01:00 on 2026-03-08
      const bucket = computeBucket(Date.UTC(2026, 2, 8, 12), havana, 'day');
      expect(bucket).toEqual({
        key: '2026-03-08',
        start_local: '2026-03-08T01:00:00-04:00',
        end_local: '2026-03-09T00:00:00-04:00',
        start_utc: '2026-03-08T05:00:00Z',
        end_utc: '2026-03-09T04:00:00Z',
      });
    });

    it('should start a day at the first occurrence of a repeated midnight', () => {
      // Clocks fall back from 01:00 to 00:00 on 2026-11-01
      const bounds = computeBucketBounds(Date.UTC(2026, 10, 1, 5, 30), havana, 'day');
      expect(bounds.bucket.key).toBe('2026-11-01');
      expect(bounds.bucket.start_utc).toBe('2026-11-01T04:00:00Z');
      expect(bounds.bucket.end_utc).toBe('2026-11-02T05:00:00Z');
      expect(bounds.endMs - bounds.startMs).toBe(25 * HOUR_MS);
    });

    it('should end the previous day where the repeated midnight starts', () => {
      const bucket = computeBucket(Date.UTC(2026, 9, 31, 12), havana, 'day');
      expect(bucket.end_utc).toBe('2026-11-01T04:00:00Z');
    });
  });

  describe('week buckets', () => {
    const sundayInstant = Date.UTC(2026, 2, 29, 0, 15);

    it('should key Monday weeks by the preceding Monday', () => {
      expect(computeBucket(sundayInstant, berlin, 'week', 'monday')).toEqual({
        key: '2026-03-23',
        start_local: '2026-03-23T00:00:00+01:00',
        end_local: '2026-03-30T00:00:00+02:00',
        start_utc: '2026-03-22T23:00:00Z',
        end_utc: '2026-03-29T22:00:00Z',
      });
    });

    it('should key Sunday weeks by the Sunday', () => {
      const bucket = computeBucket(sundayInstant, berlin, 'week', 'sunday');
      expect(bucket.key).toBe('2026-03-29');
      expect(bucket.start_utc).toBe('2026-03-28T23:00:00Z');
      expect(bucket.end_utc).toBe('2026-04-04T22:00:00Z');
    });
  });

  describe('month buckets', () => {
    it('should cover March from local midnight to local midnight', () => {
      for (const day of [1, 15, 31]) {
        const bucket = computeBucket(Date.UTC(2026, 2, day, 12), berlin, 'month');
        expect(bucket).toEqual({
          key: '2026-03',
          start_local: '2026-03-01T00:00:00+01:00',
          end_local: '2026-04-01T00:00:00+02:00',
          start_utc: '2026-02-28T23:00:00Z',
          end_utc: '2026-03-31T22:00:00Z',
        });
      }
    });

    it('should roll December over into January', () => {
      const bucket = computeBucket(Date.UTC(2026, 11, 15, 12), berlin, 'month');
      expect(bucket.key).toBe('2026-12');
      expect(bucket.end_local).toBe('2027-01-01T00:00:00+01:00');
      expect(bucket.end_utc).toBe('2026-12-31T23:00:00Z');
    });

    it('should use the local date rather than the UTC date', () => {
      // 2026-03-31T22:30:00Z is already April 1st in Berlin
      expect(computeBucket(Date.UTC(2026, 2, 31, 22, 30), berlin, 'month').key).toBe('2026-04');
    });
  });

  it('should produce 24-hour days in zones without a transition', () => {
    const tokyo = parseZone('Asia/Tokyo');
    const utc = parseZone('UTC');
    for (let day = 0; day < 365; day += 5) {
      const instant = Date.UTC(2026, 0, 1, 7) + day * MS_PER_DAY;
      for (const zone of [tokyo, utc]) {
        const bounds = computeBucketBounds(instant, zone, 'day');
        expect(bounds.endMs - bounds.startMs).toBe(MS_PER_DAY);
      }
    }
  });

  it('should contain the instant in every bucket', () => {
    const start = Date.UTC(2026, 0, 1);
    for (let instant = start; instant < start + 365 * MS_PER_DAY; instant += 7 * HOUR_MS + 1234) {
      for (const interval of ['day', 'week', 'month'] as const) {
        const bounds = computeBucketBounds(instant, berlin, interval);
        expect(bounds.startMs).toBeLessThanOrEqual(instant);
        expect(instant).toBeLessThan(bounds.endMs);
      }
    }
  });

  it('should be idempotent', () => {
    const first = computeBucket(Date.UTC(2026, 9, 25, 1), berlin, 'week', 'sunday');
    const second = computeBucket(Date.UTC(2026, 9, 25, 1), berlin, 'week', 'sunday');
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('should handle instants before the epoch', () => {
    const bucket = computeBucket(-1, parseZone('UTC'), 'day');
    expect(bucket.key).toBe('1969-12-31');
    expect(bucket.start_utc).toBe('1969-12-31T00:00:00Z');
    expect(bucket.end_utc).toBe('1970-01-01T00:00:00Z');
  });
});

describe('computeBucketFromString', () => {
  it('should build the full bucket record', () => {
    const result = computeBucketFromString(' 1774743300000 ', 'epoch_ms', 'Europe/Berlin', 'day');
    expect(result).toEqual({
      input: { ts: '1774743300000', epoch_ms: 1_774_743_300_000 },
      tz: 'Europe/Berlin',
      interval: 'day',
      bucket: {
        key: '2026-03-29',
        start_local: '2026-03-29T00:00:00+01:00',
        end_local: '2026-03-30T00:00:00+02:00',
        start_utc: '2026-03-28T23:00:00Z',
        end_utc: '2026-03-29T22:00:00Z',
      },
    });
  });

  it('should pass the week start through', () => {
    const result = computeBucketFromString(
      '2026-03-29T00:15:00Z',
      'rfc3339',
      'Europe/Berlin',
      'week',
      'sunday',
    );
    expect(result.bucket.key).toBe('2026-03-29');
  });

  it('should reject unknown zones and malformed timestamps', () => {
    expect(() => computeBucketFromString('0', 'epoch_ms', 'Mars/Olympus', 'day')).toThrow(
      InvalidTimezoneError,
    );
    expect(() => computeBucketFromString('soon', 'epoch_ms', 'UTC', 'day')).toThrow(ParseError);
  });
});
