import type { Command } from 'commander';
import { z } from 'zod';
import { DEFAULT_RESOLUTION_POLICY } from '../../domain/types.js';
import { ambiguousPolicySchema, nonexistentPolicySchema } from '../../domain/validation.js';
import { explainLocalTime } from '../../resolve/resolver.js';
import { parseZone } from '../../zone/provider.js';
import type { CommandContext } from '../context.js';
import type { ExitCode } from '../errors.js';
import { execute } from '../execute.js';
import { parseChoice } from '../options.js';
import type { OutputFormat } from '../options.js';
import { renderExplain } from '../render.js';

const explainOptionsSchema = z.object({
  tz: z.string(),
  local: z.string(),
  policyNonexistent: z.string(),
  policyAmbiguous: z.string(),
  outputFormat: z.string(),
});

export type ExplainOptions = z.infer<typeof explainOptionsSchema>;

/**
 * Explains how a local time resolves in a zone.
 */
export function runExplain(
  options: ExplainOptions,
  outputFormat: OutputFormat,
  context: CommandContext,
): void {
  const zone = parseZone(options.tz);
  const nonexistent = parseChoice(
    nonexistentPolicySchema,
    'policy_nonexistent',
    options.policyNonexistent,
  );
  const ambiguous = parseChoice(
    ambiguousPolicySchema,
    'policy_ambiguous',
    options.policyAmbiguous,
  );

  const result = explainLocalTime(options.local, zone, nonexistent, ambiguous);
  context.io.stdout.write(`${renderExplain(result, outputFormat)}\n`);
  context.logger.debug('Explain command finished', { status: result.status });
}

export function registerExplainCommand(
  program: Command,
  context: CommandContext,
  onExit: (code: ExitCode) => void,
): void {
  program
    .command('explain')
    .description('Explain local time resolution (DST handling)')
    .requiredOption('-t, --tz <zone>', 'IANA timezone')
    .requiredOption('--local <time>', 'Local time without offset (e.g., 2026-03-29T02:30:00)')
    .option(
      '--policy-nonexistent <policy>',
      'Policy for nonexistent times: error, shift_forward',
      DEFAULT_RESOLUTION_POLICY.nonexistent,
    )
    .option(
      '--policy-ambiguous <policy>',
      'Policy for ambiguous times: error, first, second',
      DEFAULT_RESOLUTION_POLICY.ambiguous,
    )
    .option('--output-format <format>', 'Output format: json, text', 'json')
    .action(async (_options: unknown, command: Command) => {
      const options = explainOptionsSchema.parse(command.opts());
      context.logger.debug('Parsed options', { command: 'explain', ...options });
      onExit(
        await execute(options.outputFormat, context, (format) =>
          runExplain(options, format, context),
        ),
      );
    });
}
