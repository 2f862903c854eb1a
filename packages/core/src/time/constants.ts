/**
 * Time constants shared by the parser, the bucket computer and the resolver.
 */

/**
 * Milliseconds per second.
 */
export const MS_PER_SECOND = 1000;

/**
 * Milliseconds per hour.
 */
export const MS_PER_HOUR = 3_600_000;

/**
 * Seconds per civil day without a clock change.
 */
export const SECONDS_PER_DAY = 86_400;

/**
 * Milliseconds per civil day without a clock change.
 */
export const MS_PER_DAY = SECONDS_PER_DAY * MS_PER_SECOND;

/**
 * Days per week.
 */
export const DAYS_PER_WEEK = 7;

/**
 * Largest absolute epoch millisecond value an instant can take
 * (the range of an ECMAScript Date, ±100,000,000 days around the epoch).
 */
export const MAX_EPOCH_MS = 8_640_000_000_000_000;

/**
 * Auto-detection threshold: integer inputs greater than this are epoch milliseconds,
 * everything else epoch seconds.
 */
export const EPOCH_MS_AUTO_THRESHOLD = 10_000_000_000;

/**
 * Bound, in seconds, of the second-by-second search for a valid local time
 * on either side of a skipped range.
 */
export const GAP_SEARCH_BOUND_SECONDS = 2 * SECONDS_PER_DAY;
