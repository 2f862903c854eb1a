import type { Config } from './config.js';
import type { CliIo } from './io.js';
import type { Logger } from './logger.js';

/**
 * Everything a command needs besides its options.
 */
export interface CommandContext {
  readonly io: CliIo;
  readonly logger: Logger;
  readonly config: Config;
}
