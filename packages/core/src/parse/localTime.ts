import { ParseError } from '../domain/errors.js';
import { daysInMonth } from '../zone/calendar.js';
import type { LocalDateTime } from '../zone/calendar.js';

// YYYY-MM-DDTHH:MM[:SS], date and time separated by `T` or a space
const LOCAL_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parses a zone-less wall clock. Seconds are optional.
 *
 * @throws ParseError if the text is not one of the accepted layouts or names an impossible date or time
 *
 * @example
 * parseLocalDateTime('2026-03-29T02:30:00') // { year: 2026, month: 3, day: 29, hour: 2, minute: 30, ... }
 * parseLocalDateTime('2026-03-29 02:30') // same wall clock
 */
export function parseLocalDateTime(text: string): LocalDateTime {
  const input = text.trim();
  const invalid = () =>
    new ParseError(`Invalid local time format '${input}'. Expected: YYYY-MM-DDTHH:MM:SS`, input);

  const match = LOCAL_TIME_PATTERN.exec(input);
  if (!match) {
    throw invalid();
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText] = match;
  const local: LocalDateTime = {
    year: Number(yearText),
    month: Number(monthText),
    day: Number(dayText),
    hour: Number(hourText),
    minute: Number(minuteText),
    second: secondText === undefined ? 0 : Number(secondText),
    millisecond: 0,
  };

  if (
    local.month < 1 ||
    local.month > 12 ||
    local.day < 1 ||
    local.day > daysInMonth(local.year, local.month) ||
    local.hour > 23 ||
    local.minute > 59 ||
    local.second > 59
  ) {
    throw invalid();
  }
  return local;
}
