/**
 * Command-line error type and the mapping from core errors to exit codes.
 */

import { PolicyError, isTzBucketError } from '../domain/errors.js';
import type { PolicyErrorStatus } from '../domain/errors.js';

export const EXIT_SUCCESS = 0;
export const EXIT_INPUT_ERROR = 2;
export const EXIT_RUNTIME_ERROR = 3;

export type ExitCode = typeof EXIT_SUCCESS | typeof EXIT_INPUT_ERROR | typeof EXIT_RUNTIME_ERROR;

/**
 * `input`: bad arguments, input text or policy rejection (exit 2).
 * `runtime`: I/O failure or internal resolution failure (exit 3).
 */
export type CliErrorKind = 'input' | 'runtime';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly status?: PolicyErrorStatus;

  constructor(kind: CliErrorKind, message: string, status?: PolicyErrorStatus) {
    super(message);
    this.name = 'CliError';
    this.kind = kind;
    this.status = status;
  }

  static input(message: string): CliError {
    return new CliError('input', message);
  }

  static policy(message: string, status: PolicyErrorStatus): CliError {
    return new CliError('input', message, status);
  }

  static runtime(message: string): CliError {
    return new CliError('runtime', message);
  }

  get exitCode(): ExitCode {
    switch (this.kind) {
      case 'input':
        return EXIT_INPUT_ERROR;
      case 'runtime':
        return EXIT_RUNTIME_ERROR;
      default: {
        const _exhaustive: never = this.kind;
        throw new Error(`Unknown error kind: ${String(_exhaustive)}`);
      }
    }
  }
}

/**
 * Converts anything thrown while running a command into a {@link CliError}.
 * Errors that are not from the core are treated as runtime failures.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof PolicyError) {
    return CliError.policy(error.message, error.status);
  }
  if (isTzBucketError(error)) {
    switch (error.code) {
      case 'INVALID_TIMEZONE':
      case 'PARSE_ERROR':
      case 'INVALID_RANGE':
      case 'POLICY_ERROR':
        return CliError.input(error.message);
      case 'RUNTIME_ERROR':
        return CliError.runtime(error.message);
      default: {
        const _exhaustive: never = error.code;
        throw new Error(`Unknown error code: ${String(_exhaustive)}`);
      }
    }
  }
  return CliError.runtime(error instanceof Error ? error.message : String(error));
}
