/**
 * Parse module public exports.
 */

export type { TimestampFormatOption } from './timestamp.js';
export {
  parseTimestamp,
  parseTimestampAuto,
  parseEpochMs,
  parseEpochSeconds,
  parseRfc3339,
} from './timestamp.js';
export { parseLocalDateTime } from './localTime.js';
