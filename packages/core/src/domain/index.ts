/**
 * Domain module public exports.
 * Value types, error taxonomy and validation schemas.
 */

// Types
export type {
  Interval,
  WeekStart,
  NonexistentPolicy,
  AmbiguousPolicy,
  TimestampFormat,
  LocalTimeStatus,
  ResolutionPolicy,
  Bucket,
  InputTimestamp,
  BucketResult,
  AppliedPolicy,
  Resolution,
  ExplainResult,
} from './types.js';

export {
  DEFAULT_INTERVAL,
  DEFAULT_WEEK_START,
  DEFAULT_TIMESTAMP_FORMAT,
  DEFAULT_RESOLUTION_POLICY,
} from './types.js';

// Errors
export type { TzBucketErrorCode, PolicyErrorStatus } from './errors.js';
export {
  TzBucketError,
  InvalidTimezoneError,
  ParseError,
  InvalidRangeError,
  PolicyError,
  RuntimeError,
  isTzBucketError,
} from './errors.js';

// Validation schemas
export {
  INTERVALS,
  WEEK_STARTS,
  TIMESTAMP_FORMATS,
  NONEXISTENT_POLICIES,
  AMBIGUOUS_POLICIES,
  intervalSchema,
  weekStartSchema,
  timestampFormatSchema,
  nonexistentPolicySchema,
  ambiguousPolicySchema,
  bucketSchema,
  bucketResultSchema,
  explainResultSchema,
} from './validation.js';
