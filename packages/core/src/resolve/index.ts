/**
 * Local time resolution for skipped and repeated wall clocks.
 */

export type { LocalTimeClassification, ResolvedLocalTime } from './resolver.js';
export {
  classifyLocalTime,
  resolveLocalTime,
  explainLocalTime,
  findPreviousValid,
  findNextValid,
  shiftForward,
} from './resolver.js';
