import { createReadStream } from 'node:fs';
import { once } from 'node:events';
import { createInterface } from 'node:readline';
import { CliError } from './errors.js';

export interface InputSource {
  /** File path, or `-` for stdin */
  readonly input: string;
  /** Read stdin regardless of `input` */
  readonly stdin: boolean;
}

/**
 * Yields the raw lines of the input file or stdin.
 *
 * @throws CliError (runtime) if the file cannot be opened or read
 */
export async function* readInputLines(
  source: InputSource,
  stdin: NodeJS.ReadableStream,
): AsyncGenerator<string> {
  if (source.stdin || source.input === '-') {
    yield* createInterface({ input: stdin, crlfDelay: Infinity });
    return;
  }

  const stream = createReadStream(source.input, { encoding: 'utf8' });
  try {
    await once(stream, 'open');
  } catch (error) {
    stream.destroy();
    throw CliError.runtime(
      `Failed to open file '${source.input}': ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  try {
    yield* createInterface({ input: stream, crlfDelay: Infinity });
  } catch (error) {
    throw CliError.runtime(
      `Failed to read line: ${error instanceof Error ? error.message : String(error)}`,
    );
  } finally {
    stream.destroy();
  }
}
