/**
 * Zod validation schemas for domain types.
 */

import { z } from 'zod';
import type {
  AmbiguousPolicy,
  Bucket,
  BucketResult,
  ExplainResult,
  Interval,
  NonexistentPolicy,
  TimestampFormat,
  WeekStart,
} from './types.js';

export const INTERVALS = ['day', 'week', 'month'] as const satisfies readonly Interval[];
export const WEEK_STARTS = ['monday', 'sunday'] as const satisfies readonly WeekStart[];
export const TIMESTAMP_FORMATS = [
  'epoch_ms',
  'epoch_s',
  'rfc3339',
] as const satisfies readonly TimestampFormat[];
export const NONEXISTENT_POLICIES = [
  'error',
  'shift_forward',
] as const satisfies readonly NonexistentPolicy[];
export const AMBIGUOUS_POLICIES = [
  'error',
  'first',
  'second',
] as const satisfies readonly AmbiguousPolicy[];

export const intervalSchema = z.enum(INTERVALS);
export const weekStartSchema = z.enum(WEEK_STARTS);
export const timestampFormatSchema = z.enum(TIMESTAMP_FORMATS);
export const nonexistentPolicySchema = z.enum(NONEXISTENT_POLICIES);
export const ambiguousPolicySchema = z.enum(AMBIGUOUS_POLICIES);

/**
 * Schema for the Bucket JSON record.
 */
export const bucketSchema: z.ZodType<Bucket> = z.object({
  key: z.string().min(1),
  start_local: z.string(),
  end_local: z.string(),
  start_utc: z.string().endsWith('Z'),
  end_utc: z.string().endsWith('Z'),
});

/**
 * Schema for the BucketResult JSON record.
 */
export const bucketResultSchema: z.ZodType<BucketResult> = z.object({
  input: z.object({
    ts: z.string(),
    epoch_ms: z.number().int(),
  }),
  tz: z.string().min(1),
  interval: intervalSchema,
  bucket: bucketSchema,
});

/**
 * Schema for the ExplainResult JSON record.
 * A resolution is present exactly when the status is not `normal`.
 */
export const explainResultSchema: z.ZodType<ExplainResult> = z
  .object({
    local_time: z.string(),
    tz: z.string().min(1),
    status: z.enum(['normal', 'ambiguous', 'nonexistent']),
    resolution: z
      .object({
        policy: z.enum(['first', 'second', 'shift_forward']),
        result: z.string(),
      })
      .optional(),
  })
  .refine((data) => (data.status === 'normal') === (data.resolution === undefined), {
    message: 'resolution must be present exactly when status is not normal',
    path: ['resolution'],
  });
