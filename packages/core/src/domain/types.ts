/**
 * Core domain types for calendar bucketing and local-time resolution.
 * All values are immutable and constructed fresh per request.
 */

/**
 * Bucket granularity.
 */
export type Interval = 'day' | 'week' | 'month';

/**
 * First day of a week bucket. Only meaningful for the `week` interval.
 */
export type WeekStart = 'monday' | 'sunday';

/**
 * Behavior when a requested local wall-clock time was skipped by a forward clock jump.
 */
export type NonexistentPolicy = 'error' | 'shift_forward';

/**
 * Behavior when a requested local wall-clock time occurred twice because of a backward clock jump.
 */
export type AmbiguousPolicy = 'error' | 'first' | 'second';

/**
 * Explicit input timestamp formats.
 */
export type TimestampFormat = 'epoch_ms' | 'epoch_s' | 'rfc3339';

/**
 * Three-way classification of a local wall-clock time in a zone.
 */
export type LocalTimeStatus = 'normal' | 'ambiguous' | 'nonexistent';

export const DEFAULT_INTERVAL: Interval = 'day';
export const DEFAULT_WEEK_START: WeekStart = 'monday';
export const DEFAULT_TIMESTAMP_FORMAT: TimestampFormat = 'epoch_ms';

/**
 * Policies used when resolving a local wall-clock time.
 * Both default to `error`: callers must opt in to any silent adjustment.
 */
export interface ResolutionPolicy {
  readonly nonexistent: NonexistentPolicy;
  readonly ambiguous: AmbiguousPolicy;
}

export const DEFAULT_RESOLUTION_POLICY: ResolutionPolicy = {
  nonexistent: 'error',
  ambiguous: 'error',
};

/**
 * A computed calendar bucket.
 *
 * `start_local`/`end_local` are the same instants as `start_utc`/`end_utc`
 * re-expressed in the zone, so their offsets may differ across a DST boundary.
 */
export interface Bucket {
  /** `YYYY-MM-DD` for day and week buckets, `YYYY-MM` for month buckets */
  readonly key: string;
  /** Local boundary with offset, e.g. `2026-03-29T00:00:00+01:00` */
  readonly start_local: string;
  readonly end_local: string;
  /** UTC boundary, e.g. `2026-03-28T23:00:00Z` */
  readonly start_utc: string;
  readonly end_utc: string;
}

/**
 * Record of what was parsed and which instant it resolved to.
 */
export interface InputTimestamp {
  /** Input text with surrounding whitespace removed */
  readonly ts: string;
  readonly epoch_ms: number;
}

/**
 * Complete externally visible record for one input timestamp.
 */
export interface BucketResult {
  readonly input: InputTimestamp;
  readonly tz: string;
  readonly interval: Interval;
  readonly bucket: Bucket;
}

/**
 * Policy actually applied when resolving an ambiguous or nonexistent time.
 */
export type AppliedPolicy = 'first' | 'second' | 'shift_forward';

export interface Resolution {
  readonly policy: AppliedPolicy;
  /** Resolved instant as local time with offset */
  readonly result: string;
}

/**
 * Explanation of a local wall-clock time in a zone.
 * `resolution` is absent for normal times.
 */
export interface ExplainResult {
  readonly local_time: string;
  readonly tz: string;
  readonly status: LocalTimeStatus;
  readonly resolution?: Resolution;
}
