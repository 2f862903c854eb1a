/**
 * Validation of option values given on the command line.
 * Values are matched case-insensitively.
 */

import { z } from 'zod';
import { TIMESTAMP_FORMATS } from '../domain/validation.js';
import type { TimestampFormatOption } from '../parse/timestamp.js';
import { CliError } from './errors.js';

export type OutputFormat = 'json' | 'text';

export const outputFormatSchema = z.enum(['json', 'text']);

export const timestampFormatOptionSchema = z.enum([
  ...TIMESTAMP_FORMATS,
  'auto',
] as const satisfies readonly TimestampFormatOption[]);

/**
 * Parses an enumerated option value.
 *
 * @param name - Option name used in the error message
 * @throws CliError (input) naming the accepted values
 *
 * @example
 * parseChoice(intervalSchema, 'interval', 'Week') // 'week'
 * parseChoice(intervalSchema, 'interval', 'hour')
 * // throws "Invalid interval 'hour'. Expected: day, week, month"
 */
export function parseChoice<T extends string>(
  schema: z.ZodEnum<[T, ...T[]]>,
  name: string,
  value: string,
): T {
  const result = schema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw CliError.input(`Invalid ${name} '${value}'. Expected: ${schema.options.join(', ')}`);
  }
  return result.data;
}

/**
 * Output format to render an error in when the option value itself is invalid.
 */
export function outputFormatHint(value: string): OutputFormat {
  return value.toLowerCase() === 'json' ? 'json' : 'text';
}
