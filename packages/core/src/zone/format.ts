/**
 * Text renderings of dates, wall clocks, offsets and instants.
 */

import { msToLocalDateTime } from './calendar.js';
import type { CalendarDate, LocalDateTime } from './calendar.js';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Four-digit year; years outside 0-9999 carry an explicit sign.
 */
export function formatYear(year: number): string {
  if (year < 0) {
    return `-${pad(-year, 4)}`;
  }
  if (year > 9999) {
    return `+${year}`;
  }
  return pad(year, 4);
}

/**
 * `YYYY-MM-DD`
 */
export function formatDate(date: CalendarDate): string {
  return `${formatYear(date.year)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

/**
 * `YYYY-MM`
 */
export function formatMonth(date: CalendarDate): string {
  return `${formatYear(date.year)}-${pad(date.month, 2)}`;
}

/**
 * `YYYY-MM-DDTHH:MM:SS` (sub-second precision is dropped)
 */
export function formatLocalDateTime(local: LocalDateTime): string {
  return `${formatDate(local)}T${pad(local.hour, 2)}:${pad(local.minute, 2)}:${pad(local.second, 2)}`;
}

/**
 * Formats a UTC offset given in seconds as `±HH:MM`.
 * Seconds of historical offsets (local mean time) are truncated.
 *
 * @example
 * formatOffset(3600) // '+01:00'
 * formatOffset(-16200) // '-04:30'
 * formatOffset(0) // '+00:00'
 */
export function formatOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? '-' : '+';
  const abs = Math.abs(offsetSeconds);
  const hours = Math.floor(abs / 3600);
  const minutes = Math.floor((abs % 3600) / 60);
  return `${sign}${pad(hours, 2)}:${pad(minutes, 2)}`;
}

/**
 * Formats an instant in UTC with a zulu suffix, e.g. `2026-03-28T23:00:00Z`.
 */
export function formatUtc(epochMs: number): string {
  return `${formatLocalDateTime(msToLocalDateTime(epochMs))}Z`;
}
