/**
 * Structured logging for the command-line front end.
 * Every level goes to stderr; stdout carries only records.
 */

import winston from 'winston';
import { LOG_LEVELS } from './config.js';
import type { LogLevel } from './config.js';

const { format } = winston;

export type Logger = winston.Logger;

export interface LoggerConfig {
  level: LogLevel;
  /** One JSON object per line instead of the pretty format */
  json: boolean;
  /** Destination other than stderr */
  stream?: NodeJS.WritableStream;
  silent?: boolean;
}

/**
 * Pretty format: `[timestamp] level: message key=value ...`
 */
const prettyPrint = format.printf((info) => {
  const { timestamp, level, message, stack, ...rest } = info;
  const context = Object.entries(rest).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;
  return typeof stack === 'string' ? `${line}\n${stack}` : line;
});

/**
 * Creates a logger writing to stderr (or the given stream).
 *
 * @example
 * const logger = createLogger({ level: 'debug', json: false });
 * logger.debug('Parsed options', { command: 'bucket', tz: 'Europe/Berlin' });
 * // [2026-03-29T10:00:00.000Z] debug: Parsed options command="bucket" tz="Europe/Berlin"
 */
export function createLogger(config: LoggerConfig): Logger {
  const { level, json, stream, silent = false } = config;

  const logFormat = format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    json ? format.json() : prettyPrint,
  );

  const transport = stream
    ? new winston.transports.Stream({ stream })
    : new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] });

  return winston.createLogger({
    level,
    format: logFormat,
    transports: [transport],
    silent,
    exitOnError: false,
  });
}
