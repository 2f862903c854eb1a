/**
 * Local time resolution.
 *
 * A wall clock in a zone is normal (shown by exactly one instant),
 * ambiguous (shown twice after a backward clock jump) or nonexistent
 * (skipped by a forward clock jump). Policies decide which instant an
 * ambiguous or nonexistent wall clock stands for.
 */

import { PolicyError, RuntimeError } from '../domain/errors.js';
import type {
  AmbiguousPolicy,
  AppliedPolicy,
  ExplainResult,
  LocalTimeStatus,
  NonexistentPolicy,
  ResolutionPolicy,
} from '../domain/types.js';
import { addSeconds, diffMs, localDateTimeToMs } from '../zone/calendar.js';
import type { LocalDateTime } from '../zone/calendar.js';
import { formatLocalDateTime } from '../zone/format.js';
import {
  formatLocal,
  instantsInTimeline,
  toLocal,
  toUtcCandidates,
  validInstants,
  wallClockTimeline,
} from '../zone/provider.js';
import type { Zone, ZonedDateTime } from '../zone/provider.js';
import { parseLocalDateTime } from '../parse/localTime.js';
import { GAP_SEARCH_BOUND_SECONDS, MS_PER_SECOND } from '../time/constants.js';

/**
 * Three-way classification of a wall clock in a zone.
 */
export type LocalTimeClassification =
  | { readonly status: 'normal'; readonly instant: number }
  | { readonly status: 'ambiguous'; readonly earlier: number; readonly later: number }
  | { readonly status: 'nonexistent'; readonly transition: number };

/**
 * A wall clock resolved to one instant.
 * `policy` is absent when the wall clock was normal.
 */
export interface ResolvedLocalTime {
  readonly status: LocalTimeStatus;
  readonly instant: number;
  readonly policy?: AppliedPolicy;
  /** Resolved instant as local time with offset */
  readonly result: string;
}

/**
 * Classifies a wall clock in a zone.
 *
 * @example
 * classifyLocalTime(parseLocalDateTime('2026-10-25T02:30:00'), berlin)
 * // { status: 'ambiguous', earlier: <00:30Z>, later: <01:30Z> }
 */
export function classifyLocalTime(local: LocalDateTime, zone: Zone): LocalTimeClassification {
  const candidates = toUtcCandidates(local, zone);
  switch (candidates.kind) {
    case 'unique':
      return { status: 'normal', instant: candidates.instant };
    case 'ambiguous':
      return { status: 'ambiguous', earlier: candidates.earlier, later: candidates.later };
    case 'skipped':
      return { status: 'nonexistent', transition: candidates.transition };
    default: {
      const _exhaustive: never = candidates;
      throw new Error(`Unknown candidates: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

type Pick = (instants: readonly number[]) => number | undefined;

function searchValid(local: LocalDateTime, zone: Zone, step: 1 | -1, pick: Pick): ZonedDateTime {
  const limit = addSeconds(local, step * GAP_SEARCH_BOUND_SECONDS);
  const timeline =
    step > 0 ? wallClockTimeline(local, limit, zone) : wallClockTimeline(limit, local, zone);
  const wallMs = localDateTimeToMs(local);

  for (let seconds = 1; seconds <= GAP_SEARCH_BOUND_SECONDS; seconds++) {
    const instant = pick(instantsInTimeline(timeline, wallMs + step * seconds * MS_PER_SECOND));
    if (instant !== undefined) {
      return toLocal(instant, zone);
    }
  }
  const direction = step > 0 ? 'after' : 'before';
  const localTime = formatLocalDateTime(local);
  throw new RuntimeError(
    `No valid local time within ${GAP_SEARCH_BOUND_SECONDS} seconds ${direction} '${localTime}' in timezone '${zone.name}'`,
    { zone: zone.name, localTime },
  );
}

/**
 * Latest wall clock strictly before `local` that some instant shows, searched
 * second by second up to two days back. A repeated wall clock yields its later instant.
 *
 * @throws RuntimeError if none is found within the bound
 */
export function findPreviousValid(local: LocalDateTime, zone: Zone): ZonedDateTime {
  return searchValid(local, zone, -1, (instants) => instants[instants.length - 1]);
}

/**
 * Earliest wall clock strictly after `local` that some instant shows, searched
 * second by second up to two days ahead. A repeated wall clock yields its earlier instant.
 *
 * @throws RuntimeError if none is found within the bound
 */
export function findNextValid(local: LocalDateTime, zone: Zone): ZonedDateTime {
  return searchValid(local, zone, 1, (instants) => instants[0]);
}

/**
 * Moves a skipped wall clock forward by the width of the gap it fell into,
 * keeping its distance from the start of the gap.
 *
 * @throws RuntimeError if no valid wall clock is found around the gap
 *
 * @example
 * // Europe/Berlin skips 02:00-02:59 on 2026-03-29
 * formatLocal(shiftForward(parseLocalDateTime('2026-03-29T02:30:00'), berlin), berlin)
 * // '2026-03-29T03:30:00+02:00'
 */
export function shiftForward(local: LocalDateTime, zone: Zone): number {
  const previous = findPreviousValid(local, zone);
  const next = findNextValid(local, zone);

  const gapSeconds = (diffMs(next.local, previous.local) - MS_PER_SECOND) / MS_PER_SECOND;
  const instants = validInstants(addSeconds(local, gapSeconds), zone);
  return instants[0] ?? next.epochMs;
}

function ambiguousMessage(local: LocalDateTime, zone: Zone): string {
  return (
    `Ambiguous time '${formatLocalDateTime(local)}' in timezone '${zone.name}'. ` +
    'Occurs twice due to DST fall back. ' +
    'Use --policy-ambiguous=first or --policy-ambiguous=second to resolve.'
  );
}

function nonexistentMessage(local: LocalDateTime, zone: Zone): string {
  return (
    `Nonexistent time '${formatLocalDateTime(local)}' in timezone '${zone.name}'. ` +
    'Skipped due to DST spring forward. ' +
    'Use --policy-nonexistent=shift_forward to resolve.'
  );
}

function resolveAmbiguous(
  local: LocalDateTime,
  zone: Zone,
  earlier: number,
  later: number,
  policy: AmbiguousPolicy,
): { instant: number; policy: AppliedPolicy } {
  switch (policy) {
    case 'error':
      throw new PolicyError(ambiguousMessage(local, zone), 'ambiguous');
    case 'first':
      return { instant: earlier, policy: 'first' };
    case 'second':
      return { instant: later, policy: 'second' };
    default: {
      const _exhaustive: never = policy;
      throw new Error(`Unknown ambiguous policy: ${String(_exhaustive)}`);
    }
  }
}

function resolveNonexistent(
  local: LocalDateTime,
  zone: Zone,
  policy: NonexistentPolicy,
): { instant: number; policy: AppliedPolicy } {
  switch (policy) {
    case 'error':
      throw new PolicyError(nonexistentMessage(local, zone), 'nonexistent');
    case 'shift_forward':
      return { instant: shiftForward(local, zone), policy: 'shift_forward' };
    default: {
      const _exhaustive: never = policy;
      throw new Error(`Unknown nonexistent policy: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Resolves a wall clock to a single instant, applying the policies when it is
 * ambiguous or nonexistent.
 *
 * @throws PolicyError if the matching policy is `error`
 * @throws RuntimeError if shifting forward finds no valid wall clock
 */
export function resolveLocalTime(
  local: LocalDateTime,
  zone: Zone,
  policies: ResolutionPolicy,
): ResolvedLocalTime {
  const classification = classifyLocalTime(local, zone);
  switch (classification.status) {
    case 'normal':
      return {
        status: 'normal',
        instant: classification.instant,
        result: formatLocal(classification.instant, zone),
      };
    case 'ambiguous': {
      const { instant, policy } = resolveAmbiguous(
        local,
        zone,
        classification.earlier,
        classification.later,
        policies.ambiguous,
      );
      return { status: 'ambiguous', instant, policy, result: formatLocal(instant, zone) };
    }
    case 'nonexistent': {
      const { instant, policy } = resolveNonexistent(local, zone, policies.nonexistent);
      return { status: 'nonexistent', instant, policy, result: formatLocal(instant, zone) };
    }
    default: {
      const _exhaustive: never = classification;
      throw new Error(`Unknown classification: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Explains a wall clock given as text: its status in the zone and, when it is
 * not normal, how the policies resolve it.
 *
 * @throws ParseError if the text is not a supported local time layout
 * @throws PolicyError if the matching policy is `error`
 * @throws RuntimeError if shifting forward finds no valid wall clock
 *
 * @example
 * explainLocalTime('2026-10-25T02:30:00', berlin, 'error', 'first')
 * // {
 * //   local_time: '2026-10-25T02:30:00',
 * //   tz: 'Europe/Berlin',
 * //   status: 'ambiguous',
 * //   resolution: { policy: 'first', result: '2026-10-25T02:30:00+02:00' },
 * // }
 */
export function explainLocalTime(
  text: string,
  zone: Zone,
  nonexistentPolicy: NonexistentPolicy,
  ambiguousPolicy: AmbiguousPolicy,
): ExplainResult {
  const local = parseLocalDateTime(text);
  const resolved = resolveLocalTime(local, zone, {
    nonexistent: nonexistentPolicy,
    ambiguous: ambiguousPolicy,
  });

  const explained = {
    local_time: formatLocalDateTime(local),
    tz: zone.name,
    status: resolved.status,
  };
  return resolved.policy === undefined
    ? explained
    : { ...explained, resolution: { policy: resolved.policy, result: resolved.result } };
}
