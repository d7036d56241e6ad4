import { TimeRange } from '../types';

const TIME_RANGES: ReadonlyMap<number, TimeRange> = new Map([
  [0, 'short_term'],
  [1, 'medium_term'],
  [2, 'long_term']
]);

export class TimeRangeError extends Error {
  constructor(readonly value: number) {
    super(`Invalid time range: ${value}`);
    this.name = 'TimeRangeError';
  }
}

/**
 * Map a decoded selector byte to a listening-history window.
 * There is no fallback window: unknown bytes throw.
 */
export function timeRangeFromNumber(value: number): TimeRange {
  const range = TIME_RANGES.get(value);
  if (range === undefined) throw new TimeRangeError(value);
  return range;
}
