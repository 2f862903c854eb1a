/**
 * Calendar bucketing.
 *
 * - Constants shared across the core
 * - Bucket boundaries for an instant (day, week, month)
 * - Enumeration of the buckets overlapping a UTC range
 */

export * from './constants.js';
export * from './bucket.js';
export * from './range.js';
