/**
 * Text and JSON renderings of command results and errors.
 */

import type { Bucket, BucketResult, ExplainResult } from '../domain/types.js';
import type { CliError, ExitCode } from './errors.js';
import type { TextSink } from './io.js';
import type { OutputFormat } from './options.js';

/**
 * One bucket record per line: compact JSON, or `<key> -> <start_local> to <end_local>`.
 */
export function renderBucketResult(result: BucketResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result);
    case 'text':
      return `${result.bucket.key} -> ${result.bucket.start_local} to ${result.bucket.end_local}`;
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown output format: ${String(_exhaustive)}`);
    }
  }
}

export function renderBuckets(buckets: readonly Bucket[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(buckets, null, 2);
    case 'text':
      return buckets
        .map((bucket) => `${bucket.key}: ${bucket.start_local} to ${bucket.end_local}`)
        .join('\n');
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown output format: ${String(_exhaustive)}`);
    }
  }
}

export function renderExplain(result: ExplainResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result, null, 2);
    case 'text': {
      const lines = [
        `Local time: ${result.local_time}`,
        `Timezone: ${result.tz}`,
        `Status: ${result.status}`,
      ];
      if (result.resolution) {
        lines.push(`Resolution: ${result.resolution.policy} -> ${result.resolution.result}`);
      }
      return lines.join('\n');
    }
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown output format: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Writes an error to stderr and returns its exit code.
 * JSON mode writes a pretty-printed `{error, exit_code, status?}` envelope.
 */
export function renderError(error: CliError, format: OutputFormat, stderr: TextSink): ExitCode {
  switch (format) {
    case 'json': {
      const envelope = {
        error: error.message,
        exit_code: error.exitCode,
        ...(error.status === undefined ? {} : { status: error.status }),
      };
      stderr.write(`${JSON.stringify(envelope, null, 2)}\n`);
      break;
    }
    case 'text':
      stderr.write(`Error: ${error.message}\n`);
      break;
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown output format: ${String(_exhaustive)}`);
    }
  }
  return error.exitCode;
}
