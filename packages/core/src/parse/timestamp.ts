/**
 * Timestamp parsing: epoch integers and RFC 3339 text to epoch milliseconds.
 */

import { ParseError } from '../domain/errors.js';
import type { TimestampFormat } from '../domain/types.js';
import { daysInMonth, isRepresentableMs, localDateTimeToMs } from '../zone/calendar.js';
import { EPOCH_MS_AUTO_THRESHOLD, MAX_EPOCH_MS, MS_PER_SECOND } from '../time/constants.js';

/**
 * An explicit format, or `auto` to guess it from the text.
 */
export type TimestampFormatOption = TimestampFormat | 'auto';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|z|[+-]\d{2}:\d{2})$/;

const RFC3339_WITHOUT_OFFSET = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?$/;

const MAX_EPOCH_SECONDS = MAX_EPOCH_MS / MS_PER_SECOND;

interface EpochUnit {
  readonly label: string;
  readonly max: number;
  readonly scale: number;
}

const EPOCH_MS: EpochUnit = { label: 'milliseconds', max: MAX_EPOCH_MS, scale: 1 };
const EPOCH_S: EpochUnit = { label: 'seconds', max: MAX_EPOCH_SECONDS, scale: MS_PER_SECOND };

function parseEpoch(trimmed: string, unit: EpochUnit): number {
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ParseError(
      `Invalid epoch ${unit.label}: '${trimmed}'. Expected integer value.`,
      trimmed,
    );
  }
  const value = Number(trimmed);
  if (Math.abs(value) > unit.max) {
    throw new ParseError(`Epoch ${unit.label} out of range: ${trimmed}`, trimmed);
  }
  // Normalizes -0
  return value * unit.scale || 0;
}

/**
 * Parses an integer count of milliseconds since the epoch.
 *
 * @throws ParseError if the text is not an integer or is out of range
 */
export function parseEpochMs(text: string): number {
  return parseEpoch(text.trim(), EPOCH_MS);
}

/**
 * Parses an integer count of seconds since the epoch into milliseconds.
 *
 * @throws ParseError if the text is not an integer or is out of range
 */
export function parseEpochSeconds(text: string): number {
  return parseEpoch(text.trim(), EPOCH_S);
}

function rfc3339Error(input: string, complaint: string): ParseError {
  return new ParseError(`Invalid RFC3339 timestamp: '${input}'. Error: ${complaint}`, input);
}

function parseOffsetSeconds(offset: string, input: string): number {
  if (offset === 'Z' || offset === 'z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const hours = parseInt(offset.slice(1, 3), 10);
  const minutes = parseInt(offset.slice(4, 6), 10);
  if (hours > 23 || minutes > 59) {
    throw rfc3339Error(input, 'offset out of range');
  }
  return sign * (hours * 3600 + minutes * 60);
}

/**
 * Parses an RFC 3339 timestamp. A UTC offset is required; fraction digits
 * beyond milliseconds are truncated.
 *
 * @throws ParseError carrying the input and what was wrong with it
 *
 * @example
 * parseRfc3339('2026-03-29T00:15:00Z') // 1774743300000
 * parseRfc3339('2026-03-29T02:15:00+02:00') // 1774743300000
 */
export function parseRfc3339(text: string): number {
  const input = text.trim();
  const match = RFC3339_PATTERN.exec(input);
  if (!match) {
    throw rfc3339Error(
      input,
      RFC3339_WITHOUT_OFFSET.test(input) ? 'missing UTC offset' : 'invalid format',
    );
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, offset] =
    match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  if (month < 1 || month > 12) {
    throw rfc3339Error(input, 'month out of range');
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw rfc3339Error(input, 'day out of range');
  }
  if (hour > 23) {
    throw rfc3339Error(input, 'hour out of range');
  }
  if (minute > 59) {
    throw rfc3339Error(input, 'minute out of range');
  }
  if (second > 59) {
    throw rfc3339Error(input, 'second out of range');
  }
  const offsetSeconds = parseOffsetSeconds(offset ?? 'Z', input);
  const millisecond = fraction === undefined ? 0 : Number(fraction.slice(0, 3).padEnd(3, '0'));

  const wallMs = localDateTimeToMs({ year, month, day, hour, minute, second, millisecond });
  const epochMs = wallMs - offsetSeconds * MS_PER_SECOND;
  if (!isRepresentableMs(epochMs)) {
    throw rfc3339Error(input, 'timestamp out of range');
  }
  return epochMs;
}

function looksLikeRfc3339(input: string): boolean {
  return (
    input.includes('T') ||
    input.includes('Z') ||
    input.includes('+') ||
    (input.length > 6 && input.charAt(input.length - 6) === '-')
  );
}

/**
 * Guesses the format of a timestamp and parses it.
 *
 * Text containing `T`, `Z` or `+`, or with a `-` where an offset suffix would
 * start, is read as RFC 3339. Anything else must be an integer: values above
 * 10,000,000,000 are milliseconds, the rest seconds. Seconds-valued inputs above
 * the threshold (after 2286-11-20) and negative values are misread.
 *
 * @throws ParseError if neither reading applies
 */
export function parseTimestampAuto(text: string): number {
  const input = text.trim();
  if (looksLikeRfc3339(input)) {
    return parseRfc3339(input);
  }
  if (!INTEGER_PATTERN.test(input)) {
    throw new ParseError(`Could not auto-detect format for: '${input}'`, input);
  }
  return Number(input) > EPOCH_MS_AUTO_THRESHOLD
    ? parseEpoch(input, EPOCH_MS)
    : parseEpoch(input, EPOCH_S);
}

/**
 * Parses a timestamp in the given format to epoch milliseconds.
 * Surrounding whitespace is ignored.
 *
 * @throws ParseError if the text does not match the format
 *
 * @example
 * parseTimestamp('1774743300000', 'epoch_ms') // 1774743300000
 * parseTimestamp('1774743300', 'epoch_s') // 1774743300000
 */
export function parseTimestamp(text: string, format: TimestampFormatOption): number {
  switch (format) {
    case 'epoch_ms':
      return parseEpochMs(text);
    case 'epoch_s':
      return parseEpochSeconds(text);
    case 'rfc3339':
      return parseRfc3339(text);
    case 'auto':
      return parseTimestampAuto(text);
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown timestamp format: ${String(_exhaustive)}`);
    }
  }
}
