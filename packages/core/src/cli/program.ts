/**
 * The `tzbucket` command-line program.
 */

import { Command, CommanderError } from 'commander';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import type { CommandContext } from './context.js';
import { EXIT_INPUT_ERROR, EXIT_SUCCESS, toCliError } from './errors.js';
import type { ExitCode } from './errors.js';
import type { CliIo } from './io.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { renderError } from './render.js';
import { registerBucketCommand } from './commands/bucket.js';
import { registerExplainCommand } from './commands/explain.js';
import { registerRangeCommand } from './commands/range.js';

export const VERSION = '0.1.0';

export interface CliDeps {
  /** Environment to read configuration from (defaults to `process.env`) */
  env?: NodeJS.ProcessEnv;
  /** Overrides the environment configuration */
  config?: Config;
  /** Overrides the logger built from the configuration */
  logger?: Logger;
}

/**
 * Runs the program against `argv` (arguments after the program name) and
 * resolves to the process exit code: 0 on success, 2 for input and policy
 * errors, 3 for runtime errors.
 *
 * @example
 * const code = await run(['explain', '-t', 'Europe/Berlin', '--local', '2026-03-29T02:30:00'], io);
 */
export async function run(
  argv: readonly string[],
  io: CliIo,
  deps: CliDeps = {},
): Promise<ExitCode> {
  let config: Config;
  try {
    config = deps.config ?? loadConfig(deps.env ?? process.env);
  } catch (error) {
    return renderError(toCliError(error), 'text', io.stderr);
  }

  const logger =
    deps.logger ?? createLogger({ level: config.logLevel, json: config.logFormat === 'json' });
  const context: CommandContext = { io, logger, config };

  let exitCode: ExitCode = EXIT_SUCCESS;
  const onExit = (code: ExitCode) => {
    exitCode = code;
  };

  const program = new Command();
  program
    .name('tzbucket')
    .description('DST-safe time bucketing tool')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  registerBucketCommand(program, context, onExit);
  registerRangeCommand(program, context, onExit);
  registerExplainCommand(program, context, onExit);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version exit 0; usage errors were already reported by commander
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_INPUT_ERROR;
    }
    const cliError = toCliError(error);
    logger.error('Unexpected failure', { error: cliError.message });
    return renderError(cliError, 'text', io.stderr);
  }
  return exitCode;
}
