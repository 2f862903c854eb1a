import { describe, it, expect } from 'vitest';
import {
  classifyLocalTime,
  explainLocalTime,
  findNextValid,
  findPreviousValid,
  resolveLocalTime,
  shiftForward,
} from './resolver.js';
import { parseZone, formatLocal } from '../zone/provider.js';
import { parseLocalDateTime } from '../parse/localTime.js';
import { createJumpZone } from '../zone/jumpZone.js';
import { ParseError, PolicyError, RuntimeError } from '../domain/errors.js';

const berlin = parseZone('Europe/Berlin');

describe('classifyLocalTime', () => {
  it('should classify the three cases', () => {
    expect(classifyLocalTime(parseLocalDateTime('2026-03-28T12:00:00'), berlin)).toEqual({
      status: 'normal',
      instant: Date.UTC(2026, 2, 28, 11),
    });
    expect(classifyLocalTime(parseLocalDateTime('2026-10-25T02:30:00'), berlin)).toEqual({
      status: 'ambiguous',
      earlier: Date.UTC(2026, 9, 25, 0, 30),
      later: Date.UTC(2026, 9, 25, 1, 30),
    });
    expect(classifyLocalTime(parseLocalDateTime('2026-03-29T02:30:00'), berlin)).toEqual({
      status: 'nonexistent',
      transition: Date.UTC(2026, 2, 29, 1),
    });
  });
});

describe('bounded search', () => {
  const skipped = parseLocalDateTime('2026-03-29T02:30:00');

  it('should find the last valid second before a gap', () => {
    const previous = findPreviousValid(skipped, berlin);
    expect(previous.epochMs).toBe(Date.UTC(2026, 2, 29, 0, 59, 59));
    expect(previous.local).toEqual(parseLocalDateTime('2026-03-29T01:59:59'));
    expect(previous.offsetSeconds).toBe(3600);
  });

  it('should find the first valid second after a gap', () => {
    const next = findNextValid(skipped, berlin);
    expect(next.epochMs).toBe(Date.UTC(2026, 2, 29, 1));
    expect(next.local).toEqual(parseLocalDateTime('2026-03-29T03:00:00'));
    expect(next.offsetSeconds).toBe(7200);
  });

  it('should prefer the later instant when searching backward into an overlap', () => {
    const previous = findPreviousValid(parseLocalDateTime('2026-10-25T03:00:00'), berlin);
    expect(previous.epochMs).toBe(Date.UTC(2026, 9, 25, 1, 59, 59));
  });

  it('should prefer the earlier instant when searching forward into an overlap', () => {
    const next = findNextValid(parseLocalDateTime('2026-10-25T01:59:59'), berlin);
    expect(next.epochMs).toBe(Date.UTC(2026, 9, 25, 0));
  });
});

describe('search bound', () => {
  // Clocks jump five days forward at 2000-01-10T00:00Z, past the two-day search bound
  const jumpZone = createJumpZone('Test/Jump', Date.UTC(2000, 0, 10), 5);
  const stranded = parseLocalDateTime('2000-01-12T12:00:00');

  it('should classify a time inside the jump as nonexistent', () => {
    expect(classifyLocalTime(stranded, jumpZone)).toEqual({
      status: 'nonexistent',
      transition: Date.UTC(2000, 0, 10),
    });
  });

  it('should give up searching backward after two days', () => {
    expect(() => findPreviousValid(stranded, jumpZone)).toThrow(
      "No valid local time within 172800 seconds before '2000-01-12T12:00:00' in timezone 'Test/Jump'",
    );
  });

  it('should give up searching forward after two days', () => {
    expect(() => findNextValid(stranded, jumpZone)).toThrow(
      "No valid local time within 172800 seconds after '2000-01-12T12:00:00' in timezone 'Test/Jump'",
    );
  });

  it('should fail shift_forward with RuntimeError', () => {
    expect(() =>
      explainLocalTime('2000-01-12T12:00:00', jumpZone, 'shift_forward', 'error'),
    ).toThrow(RuntimeError);
  });
});

describe('shiftForward', () => {
  it('should move a skipped time forward by a one-hour gap', () => {
    const instant = shiftForward(parseLocalDateTime('2026-03-29T02:30:00'), berlin);
    expect(instant).toBe(Date.UTC(2026, 2, 29, 1, 30));
    expect(formatLocal(instant, berlin)).toBe('2026-03-29T03:30:00+02:00');
  });

  it('should measure gaps that are not one hour wide', () => {
    // Lord Howe Island moves its clocks 30 minutes forward
    const lordHowe = parseZone('Australia/Lord_Howe');
    const instant = shiftForward(parseLocalDateTime('2026-10-04T02:15:00'), lordHowe);
    expect(formatLocal(instant, lordHowe)).toBe('2026-10-04T02:45:00+11:00');
  });

  it('should shift across a skipped calendar day', () => {
    // Samoa skipped 2011-12-30 when it moved from UTC-10 to UTC+14
    const apia = parseZone('Pacific/Apia');
    const instant = shiftForward(parseLocalDateTime('2011-12-30T12:00:00'), apia);
    expect(instant).toBe(Date.UTC(2011, 11, 30, 22));
    expect(formatLocal(instant, apia)).toBe('2011-12-31T12:00:00+14:00');
  });

  it('should shift a skipped midnight', () => {
    const havana = parseZone('America/Havana');
    const instant = shiftForward(parseLocalDateTime('2026-03-08T00:30:00'), havana);
    expect(formatLocal(instant, havana)).toBe('2026-03-08T01:30:00-04:00');
  });
});

describe('resolveLocalTime', () => {
  const strict = { nonexistent: 'error', ambiguous: 'error' } as const;

  it('should resolve normal times without a policy', () => {
    expect(resolveLocalTime(parseLocalDateTime('2026-03-28T12:00:00'), berlin, strict)).toEqual({
      status: 'normal',
      instant: Date.UTC(2026, 2, 28, 11),
      result: '2026-03-28T12:00:00+01:00',
    });
  });

  it('should separate first and second by the DST delta', () => {
    const local = parseLocalDateTime('2026-10-25T02:30:00');
    const first = resolveLocalTime(local, berlin, { nonexistent: 'error', ambiguous: 'first' });
    const second = resolveLocalTime(local, berlin, { nonexistent: 'error', ambiguous: 'second' });
    expect(second.instant - first.instant).toBe(3_600_000);
    expect(first.result).toBe('2026-10-25T02:30:00+02:00');
    expect(second.result).toBe('2026-10-25T02:30:00+01:00');
  });
});

describe('explainLocalTime', () => {
  it('should explain a normal time without a resolution', () => {
    const result = explainLocalTime('2026-03-28 12:00', berlin, 'error', 'error');
    expect(result).toEqual({
      local_time: '2026-03-28T12:00:00',
      tz: 'Europe/Berlin',
      status: 'normal',
    });
    expect('resolution' in result).toBe(false);
  });

  it('should shift a nonexistent time past the gap', () => {
    expect(explainLocalTime('2026-03-29T02:30:00', berlin, 'shift_forward', 'error')).toEqual({
      local_time: '2026-03-29T02:30:00',
      tz: 'Europe/Berlin',
      status: 'nonexistent',
      resolution: { policy: 'shift_forward', result: '2026-03-29T03:30:00+02:00' },
    });
  });

  it('should apply the first and second policies to ambiguous times', () => {
    expect(explainLocalTime('2026-10-25T02:30:00', berlin, 'error', 'first').resolution).toEqual({
      policy: 'first',
      result: '2026-10-25T02:30:00+02:00',
    });
    expect(explainLocalTime('2026-10-25T02:30:00', berlin, 'error', 'second').resolution).toEqual({
      policy: 'second',
      result: '2026-10-25T02:30:00+01:00',
    });
  });

  it('should reject ambiguous times under the error policy', () => {
    try {
      explainLocalTime('2026-10-25T02:30:00', berlin, 'shift_forward', 'error');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyError);
      if (error instanceof PolicyError) {
        expect(error.status).toBe('ambiguous');
        expect(error.message).toBe(
          "Ambiguous time '2026-10-25T02:30:00' in timezone 'Europe/Berlin'. " +
            'Occurs twice due to DST fall back. ' +
            'Use --policy-ambiguous=first or --policy-ambiguous=second to resolve.',
        );
      }
    }
  });

  it('should reject nonexistent times under the error policy', () => {
    try {
      explainLocalTime('2026-03-29T02:30:00', berlin, 'error', 'first');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyError);
      if (error instanceof PolicyError) {
        expect(error.status).toBe('nonexistent');
        expect(error.message).toBe(
          "Nonexistent time '2026-03-29T02:30:00' in timezone 'Europe/Berlin'. " +
            'Skipped due to DST spring forward. ' +
            'Use --policy-nonexistent=shift_forward to resolve.',
        );
      }
    }
  });

  it('should reject malformed local times', () => {
    expect(() => explainLocalTime('yesterday', berlin, 'error', 'error')).toThrow(ParseError);
  });
});
