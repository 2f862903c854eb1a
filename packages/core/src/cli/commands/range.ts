import type { Command } from 'commander';
import { z } from 'zod';
import { ParseError } from '../../domain/errors.js';
import { DEFAULT_INTERVAL, DEFAULT_WEEK_START } from '../../domain/types.js';
import { intervalSchema, weekStartSchema } from '../../domain/validation.js';
import { parseRfc3339 } from '../../parse/timestamp.js';
import { enumerateBuckets } from '../../time/range.js';
import { parseZone } from '../../zone/provider.js';
import type { CommandContext } from '../context.js';
import { CliError } from '../errors.js';
import type { ExitCode } from '../errors.js';
import { execute } from '../execute.js';
import { parseChoice } from '../options.js';
import type { OutputFormat } from '../options.js';
import { renderBuckets } from '../render.js';

const rangeOptionsSchema = z.object({
  tz: z.string(),
  interval: z.string(),
  weekStart: z.string(),
  start: z.string(),
  end: z.string(),
  outputFormat: z.string(),
});

export type RangeOptions = z.infer<typeof rangeOptionsSchema>;

function parseBoundary(label: 'start' | 'end', text: string): number {
  try {
    return parseRfc3339(text);
  } catch (error) {
    if (error instanceof ParseError) {
      throw CliError.input(`Invalid ${label} timestamp: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Lists every bucket overlapping `[start, end)`.
 */
export function runRange(
  options: RangeOptions,
  outputFormat: OutputFormat,
  context: CommandContext,
): void {
  const zone = parseZone(options.tz);
  const interval = parseChoice(intervalSchema, 'interval', options.interval);
  const weekStart = parseChoice(weekStartSchema, 'week_start', options.weekStart);
  const startMs = parseBoundary('start', options.start);
  const endMs = parseBoundary('end', options.end);

  const buckets = enumerateBuckets(startMs, endMs, zone, interval, weekStart);
  context.io.stdout.write(`${renderBuckets(buckets, outputFormat)}\n`);
  context.logger.debug('Range command finished', { buckets: buckets.length });
}

export function registerRangeCommand(
  program: Command,
  context: CommandContext,
  onExit: (code: ExitCode) => void,
): void {
  program
    .command('range')
    .description('Generate all buckets in a time range')
    .requiredOption('-t, --tz <zone>', 'IANA timezone')
    .option('-i, --interval <interval>', 'Bucket interval: day, week, month', DEFAULT_INTERVAL)
    .option('--week-start <day>', 'Week start day', DEFAULT_WEEK_START)
    .requiredOption('--start <rfc3339>', 'Start of range (inclusive, RFC3339)')
    .requiredOption('--end <rfc3339>', 'End of range (exclusive, RFC3339)')
    .option('--output-format <format>', 'Output format: json, text', 'json')
    .action(async (_options: unknown, command: Command) => {
      const options = rangeOptionsSchema.parse(command.opts());
      context.logger.debug('Parsed options', { command: 'range', ...options });
      onExit(
        await execute(options.outputFormat, context, (format) =>
          runRange(options, format, context),
        ),
      );
    });
}
