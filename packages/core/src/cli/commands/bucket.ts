import type { Command } from 'commander';
import { z } from 'zod';
import { ParseError } from '../../domain/errors.js';
import {
  DEFAULT_INTERVAL,
  DEFAULT_TIMESTAMP_FORMAT,
  DEFAULT_WEEK_START,
} from '../../domain/types.js';
import type { BucketResult, Interval, WeekStart } from '../../domain/types.js';
import { intervalSchema, weekStartSchema } from '../../domain/validation.js';
import { parseTimestamp } from '../../parse/timestamp.js';
import type { TimestampFormatOption } from '../../parse/timestamp.js';
import { computeBucket } from '../../time/bucket.js';
import { parseZone } from '../../zone/provider.js';
import type { Zone } from '../../zone/provider.js';
import type { CommandContext } from '../context.js';
import { CliError } from '../errors.js';
import type { ExitCode } from '../errors.js';
import { execute } from '../execute.js';
import { readInputLines } from '../input.js';
import { parseChoice, timestampFormatOptionSchema } from '../options.js';
import type { OutputFormat } from '../options.js';
import { renderBucketResult } from '../render.js';

const bucketOptionsSchema = z.object({
  tz: z.string(),
  interval: z.string(),
  weekStart: z.string(),
  format: z.string(),
  outputFormat: z.string(),
  input: z.string(),
  stdin: z.boolean(),
  skipInvalid: z.boolean(),
});

export type BucketOptions = z.infer<typeof bucketOptionsSchema>;

interface BucketSettings {
  readonly zone: Zone;
  readonly interval: Interval;
  readonly weekStart: WeekStart;
  readonly format: TimestampFormatOption;
}

function bucketLine(line: string, settings: BucketSettings): BucketResult {
  const epochMs = parseTimestamp(line, settings.format);
  return {
    input: { ts: line, epoch_ms: epochMs },
    tz: settings.zone.name,
    interval: settings.interval,
    bucket: computeBucket(epochMs, settings.zone, settings.interval, settings.weekStart),
  };
}

/**
 * Buckets one timestamp per input line. Blank lines are ignored.
 * A malformed line aborts the run unless `skipInvalid` is set.
 */
export async function runBucket(
  options: BucketOptions,
  outputFormat: OutputFormat,
  context: CommandContext,
): Promise<void> {
  const settings: BucketSettings = {
    zone: parseZone(options.tz),
    interval: parseChoice(intervalSchema, 'interval', options.interval),
    weekStart: parseChoice(weekStartSchema, 'week_start', options.weekStart),
    format: parseChoice(timestampFormatOptionSchema, 'format', options.format),
  };

  let processed = 0;
  let skipped = 0;
  for await (const line of readInputLines(options, context.io.stdin)) {
    const trimmed = line.trim();
    if (trimmed === '') {
      continue;
    }

    let result: BucketResult;
    try {
      result = bucketLine(trimmed, settings);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      if (options.skipInvalid) {
        context.logger.warn('Skipping invalid input line', { line: trimmed, error: error.message });
        skipped++;
        continue;
      }
      throw CliError.input(`Error processing '${trimmed}': ${error.message}`);
    }

    context.io.stdout.write(`${renderBucketResult(result, outputFormat)}\n`);
    processed++;
  }

  context.logger.debug('Bucket command finished', { processed, skipped });
}

export function registerBucketCommand(
  program: Command,
  context: CommandContext,
  onExit: (code: ExitCode) => void,
): void {
  program
    .command('bucket')
    .description('Compute time buckets for timestamps')
    .option('-t, --tz <zone>', 'IANA timezone (e.g., Europe/Berlin)', context.config.defaultTz)
    .option('-i, --interval <interval>', 'Bucket interval: day, week, month', DEFAULT_INTERVAL)
    .option(
      '--week-start <day>',
      'Week start day: monday or sunday (for week interval)',
      DEFAULT_WEEK_START,
    )
    .option(
      '-f, --format <format>',
      'Input format: epoch_ms, epoch_s, rfc3339, auto',
      DEFAULT_TIMESTAMP_FORMAT,
    )
    .option('--output-format <format>', 'Output format: json, text', 'text')
    .option('--input <path>', 'Input file path (use - for stdin)', '-')
    .option('--stdin', 'Read from stdin', false)
    .option('--skip-invalid', 'Skip malformed lines instead of aborting', false)
    .action(async (_options: unknown, command: Command) => {
      const options = bucketOptionsSchema.parse(command.opts());
      context.logger.debug('Parsed options', { command: 'bucket', ...options });
      onExit(
        await execute(options.outputFormat, context, (format) =>
          runBucket(options, format, context),
        ),
      );
    });
}
