/**
 * Timezone provider backed by the Intl API (the IANA database bundled with ICU).
 *
 * A `Zone` owns its formatter and is never mutated, so it can be shared
 * freely between callers.
 */

import { InvalidTimezoneError, RuntimeError } from '../domain/errors.js';
import { MAX_EPOCH_MS, MS_PER_DAY, MS_PER_HOUR, MS_PER_SECOND } from '../time/constants.js';
import { isRepresentableMs, localDateTimeToMs } from './calendar.js';
import type { LocalDateTime } from './calendar.js';
import { formatLocalDateTime, formatOffset } from './format.js';

/**
 * A validated IANA timezone.
 */
export interface Zone {
  /** Zone name as supplied by the caller (trimmed) */
  readonly name: string;
  readonly formatter: Intl.DateTimeFormat;
}

/**
 * An instant together with the wall clock and UTC offset in effect in a zone.
 */
export interface ZonedDateTime {
  readonly epochMs: number;
  readonly local: LocalDateTime;
  /** UTC offset in seconds, positive east of Greenwich */
  readonly offsetSeconds: number;
}

/**
 * A stretch of time `[from, to)` during which one UTC offset is in effect.
 */
export interface OffsetSpan {
  readonly from: number;
  readonly to: number;
  readonly offsetSeconds: number;
}

/**
 * Result of mapping a wall clock back to UTC.
 * - `unique`: the wall clock occurred exactly once
 * - `ambiguous`: it occurred twice (backward clock jump); `earlier` is still in the old offset
 * - `skipped`: it never occurred (forward clock jump); `transition` is the first instant after the jump
 */
export type UtcCandidates =
  | { readonly kind: 'unique'; readonly instant: number }
  | { readonly kind: 'ambiguous'; readonly earlier: number; readonly later: number }
  | { readonly kind: 'skipped'; readonly transition: number };

/**
 * Validates an IANA zone name.
 *
 * @throws InvalidTimezoneError if the name is unknown or differs from a known zone only in case
 *
 * @example
 * parseZone('Europe/Berlin').name // 'Europe/Berlin'
 * parseZone('Invalid/Timezone') // throws InvalidTimezoneError
 */
export function parseZone(name: string): Zone {
  const trimmed = name.trim();
  if (trimmed === '') {
    throw new InvalidTimezoneError(name);
  }

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: trimmed,
      hourCycle: 'h23',
      era: 'short',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidTimezoneError(name);
    }
    throw error;
  }

  // Intl matches names case-insensitively; zone names are case-sensitive
  const resolved = formatter.resolvedOptions().timeZone;
  if (resolved !== trimmed && resolved.toLowerCase() === trimmed.toLowerCase()) {
    throw new InvalidTimezoneError(name);
  }

  return { name: trimmed, formatter };
}

function readPart(parts: Map<string, string>, type: string, epochMs: number): number {
  const value = parts.get(type);
  const parsed = value === undefined ? Number.NaN : parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new RuntimeError(`Timezone provider returned no ${type} for instant ${epochMs}`, { epochMs });
  }
  return parsed;
}

/**
 * Converts an instant to the wall clock and offset in effect in the zone.
 *
 * @throws RuntimeError if the instant is outside the representable range
 */
export function toLocal(epochMs: number, zone: Zone): ZonedDateTime {
  if (!isRepresentableMs(epochMs)) {
    throw new RuntimeError(`Instant out of range: ${epochMs}`, { epochMs });
  }

  const parts = new Map<string, string>();
  for (const part of zone.formatter.formatToParts(new Date(epochMs))) {
    parts.set(part.type, part.value);
  }

  const eraYear = readPart(parts, 'year', epochMs);
  const millisecond = ((epochMs % MS_PER_SECOND) + MS_PER_SECOND) % MS_PER_SECOND;
  const local: LocalDateTime = {
    // Astronomical year numbering: 1 BC is year 0
    year: parts.get('era') === 'BC' ? 1 - eraYear : eraYear,
    month: readPart(parts, 'month', epochMs),
    day: readPart(parts, 'day', epochMs),
    hour: readPart(parts, 'hour', epochMs),
    minute: readPart(parts, 'minute', epochMs),
    second: readPart(parts, 'second', epochMs),
    millisecond,
  };

  const wallMs = localDateTimeToMs({ ...local, millisecond: 0 });
  const offsetSeconds = (wallMs - (epochMs - millisecond)) / MS_PER_SECOND;

  return { epochMs, local, offsetSeconds };
}

/**
 * UTC offset in seconds in effect at an instant.
 */
export function offsetAt(epochMs: number, zone: Zone): number {
  return toLocal(epochMs, zone).offsetSeconds;
}

/**
 * Finds the first instant in `(fromMs, toMs]` whose offset differs from the offset at `fromMs`.
 *
 * @throws RuntimeError if the offset does not change within the interval
 */
export function findTransition(zone: Zone, fromMs: number, toMs: number): number {
  const startOffset = offsetAt(fromMs, zone);
  if (offsetAt(toMs, zone) === startOffset) {
    throw new RuntimeError(`No offset transition in ${zone.name} between ${fromMs} and ${toMs}`, {
      zone: zone.name,
      fromMs,
      toMs,
    });
  }

  let lo = fromMs;
  let hi = toMs;
  while (hi - lo > 1) {
    const mid = Math.floor((lo + hi) / 2);
    if (offsetAt(mid, zone) === startOffset) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return hi;
}

function candidateOffsets(wallMs: number, zone: Zone): Set<number> {
  const probes = [wallMs - MS_PER_DAY, wallMs, wallMs + MS_PER_DAY].filter(isRepresentableMs);
  const offsets = new Set(probes.map((probe) => offsetAt(probe, zone)));
  for (const offset of [...offsets]) {
    const guess = wallMs - offset * MS_PER_SECOND;
    if (isRepresentableMs(guess)) {
      offsets.add(offsetAt(guess, zone));
    }
  }
  return offsets;
}

function instantsFor(wallMs: number, offsets: Set<number>, zone: Zone): number[] {
  const instants: number[] = [];
  for (const offset of offsets) {
    const candidate = wallMs - offset * MS_PER_SECOND;
    if (
      isRepresentableMs(candidate) &&
      offsetAt(candidate, zone) === offset &&
      !instants.includes(candidate)
    ) {
      instants.push(candidate);
    }
  }
  return instants.sort((a, b) => a - b);
}

function wallClockMs(local: LocalDateTime): number {
  const wallMs = localDateTimeToMs(local);
  if (!isRepresentableMs(wallMs)) {
    throw new RuntimeError(`Local time out of range: ${formatLocalDateTime(local)}`);
  }
  return wallMs;
}

/**
 * Instants that display the wall clock in the zone, in ascending order:
 * none if it was skipped, two if it was repeated.
 *
 * @throws RuntimeError if the wall clock is outside the representable range
 */
export function validInstants(local: LocalDateTime, zone: Zone): number[] {
  const wallMs = wallClockMs(local);
  return instantsFor(wallMs, candidateOffsets(wallMs, zone), zone);
}

/**
 * Offsets in effect over `[fromMs, toMs)` as consecutive spans.
 * The zone is sampled hourly; each change is then located to the millisecond.
 */
export function offsetTimeline(zone: Zone, fromMs: number, toMs: number): OffsetSpan[] {
  const spans: OffsetSpan[] = [];
  let spanStart = fromMs;
  let offset = offsetAt(fromMs, zone);
  let probe = fromMs;
  while (probe < toMs) {
    const nextProbe = Math.min(probe + MS_PER_HOUR, toMs);
    if (offsetAt(nextProbe, zone) === offset) {
      probe = nextProbe;
      continue;
    }
    const transition = findTransition(zone, probe, nextProbe);
    spans.push({ from: spanStart, to: transition, offsetSeconds: offset });
    spanStart = transition;
    offset = offsetAt(transition, zone);
    probe = transition;
  }
  spans.push({ from: spanStart, to: toMs, offsetSeconds: offset });
  return spans;
}

function clampMs(ms: number): number {
  return Math.min(Math.max(ms, -MAX_EPOCH_MS), MAX_EPOCH_MS);
}

/**
 * Offset timeline covering every instant that can display a wall clock
 * between `from` and `to` (inclusive).
 *
 * @throws RuntimeError if either wall clock is outside the representable range
 */
export function wallClockTimeline(
  from: LocalDateTime,
  to: LocalDateTime,
  zone: Zone,
): OffsetSpan[] {
  const fromWallMs = wallClockMs(from);
  const toWallMs = wallClockMs(to);
  const offsets = [
    ...candidateOffsets(fromWallMs, zone),
    ...candidateOffsets(toWallMs, zone),
  ].map((offset) => offset * MS_PER_SECOND);
  return offsetTimeline(
    zone,
    clampMs(fromWallMs - Math.max(...offsets) - MS_PER_DAY),
    clampMs(toWallMs - Math.min(...offsets) + MS_PER_DAY),
  );
}

/**
 * Instants within a timeline that display the wall clock `wallMs`
 * (see {@link localDateTimeToMs}), in ascending order.
 */
export function instantsInTimeline(timeline: readonly OffsetSpan[], wallMs: number): number[] {
  const instants: number[] = [];
  for (const span of timeline) {
    const candidate = wallMs - span.offsetSeconds * MS_PER_SECOND;
    if (candidate >= span.from && candidate < span.to && !instants.includes(candidate)) {
      instants.push(candidate);
    }
  }
  return instants.sort((a, b) => a - b);
}

/**
 * Maps a wall clock in the zone back to the instants that display it.
 *
 * Candidate offsets are sampled a day either side of the wall clock, so any
 * single transition near it is seen.
 *
 * @throws RuntimeError if the wall clock is outside the representable range
 *
 * @example
 * // Europe/Berlin falls back at 03:00 CEST on 2026-10-25
 * toUtcCandidates({ year: 2026, month: 10, day: 25, hour: 2, minute: 30, second: 0, millisecond: 0 }, berlin)
 * // { kind: 'ambiguous', earlier: <00:30Z>, later: <01:30Z> }
 */
export function toUtcCandidates(local: LocalDateTime, zone: Zone): UtcCandidates {
  const wallMs = wallClockMs(local);
  const offsets = candidateOffsets(wallMs, zone);
  const instants = instantsFor(wallMs, offsets, zone);

  const earliest = instants[0];
  const latest = instants[instants.length - 1];
  if (earliest !== undefined && latest !== undefined) {
    return instants.length === 1
      ? { kind: 'unique', instant: earliest }
      : { kind: 'ambiguous', earlier: earliest, later: latest };
  }

  // Skipped: the jump happened somewhere between reading the wall clock
  // with the larger and with the smaller offset.
  const sorted = [...offsets].sort((a, b) => a - b);
  const smallest = sorted[0];
  const largest = sorted[sorted.length - 1];
  if (smallest === undefined || largest === undefined || smallest === largest) {
    throw new RuntimeError(
      `Could not resolve local time ${formatLocalDateTime(local)} in ${zone.name}`,
      { zone: zone.name },
    );
  }
  const transition = findTransition(
    zone,
    wallMs - largest * MS_PER_SECOND,
    wallMs - smallest * MS_PER_SECOND,
  );
  return { kind: 'skipped', transition };
}

/**
 * Resolves a wall clock to a single instant without consulting any policy:
 * the only instant, the earlier of two, or the end of the skipped range.
 */
export function localToUtc(local: LocalDateTime, zone: Zone): number {
  const candidates = toUtcCandidates(local, zone);
  switch (candidates.kind) {
    case 'unique':
      return candidates.instant;
    case 'ambiguous':
      return candidates.earlier;
    case 'skipped':
      return candidates.transition;
    default: {
      const _exhaustive: never = candidates;
      throw new Error(`Unknown candidates: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Formats an instant as local time with the offset in effect,
 * e.g. `2026-03-30T00:00:00+02:00`.
 */
export function formatLocal(epochMs: number, zone: Zone): string {
  const zoned = toLocal(epochMs, zone);
  return `${formatLocalDateTime(zoned.local)}${formatOffset(zoned.offsetSeconds)}`;
}
