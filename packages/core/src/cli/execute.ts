import type { CommandContext } from './context.js';
import { CliError, EXIT_SUCCESS, toCliError } from './errors.js';
import type { ExitCode } from './errors.js';
import { outputFormatHint, outputFormatSchema, parseChoice } from './options.js';
import type { OutputFormat } from './options.js';
import { renderError } from './render.js';

/**
 * Runs a command body and renders whatever it throws in the requested output
 * format. An invalid `--output-format` is itself reported in the closest format.
 */
export async function execute(
  rawOutputFormat: string,
  context: CommandContext,
  body: (format: OutputFormat) => Promise<void> | void,
): Promise<ExitCode> {
  let format = outputFormatHint(rawOutputFormat);
  try {
    format = parseChoice(outputFormatSchema, 'output_format', rawOutputFormat);
    await body(format);
    return EXIT_SUCCESS;
  } catch (error) {
    const cliError = toCliError(error);
    if (!(error instanceof CliError) && cliError.kind === 'runtime') {
      context.logger.error('Command failed', { error: cliError.message });
    }
    return renderError(cliError, format, context.io.stderr);
  }
}
