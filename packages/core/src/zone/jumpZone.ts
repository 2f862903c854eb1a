import { MS_PER_DAY } from '../time/constants.js';
import type { Zone } from './provider.js';

/**
 * Formatter for a made-up zone that is on UTC until `jumpAtMs`, then moves its
 * clocks forward by `jumpMs` for good. Used to model gaps longer than any real zone has.
 */
class JumpFormatter extends Intl.DateTimeFormat {
  private readonly jumpAtMs: number;
  private readonly jumpMs: number;

  constructor(jumpAtMs: number, jumpMs: number) {
    super('en-US', { timeZone: 'UTC' });
    this.jumpAtMs = jumpAtMs;
    this.jumpMs = jumpMs;
  }

  override formatToParts(date?: Date | number): Intl.DateTimeFormatPart[] {
    const epochMs = date instanceof Date ? date.getTime() : (date ?? Date.now());
    const wall = new Date(epochMs >= this.jumpAtMs ? epochMs + this.jumpMs : epochMs);
    return [
      { type: 'era', value: 'AD' },
      { type: 'year', value: String(wall.getUTCFullYear()) },
      { type: 'month', value: String(wall.getUTCMonth() + 1) },
      { type: 'day', value: String(wall.getUTCDate()) },
      { type: 'hour', value: String(wall.getUTCHours()) },
      { type: 'minute', value: String(wall.getUTCMinutes()) },
      { type: 'second', value: String(wall.getUTCSeconds()) },
    ];
  }
}

/**
 * A zone named `name` whose clocks jump forward by `days` days at `jumpAtMs`.
 */
export function createJumpZone(name: string, jumpAtMs: number, days: number): Zone {
  return { name, formatter: new JumpFormatter(jumpAtMs, days * MS_PER_DAY) };
}
