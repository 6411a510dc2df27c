import { Interval } from './contracts';
import { InvalidInputError } from '../utils/errorHandler';

export function intervalDuration(interval: Interval): number {
  return interval.end - interval.start;
}

export function totalDuration(intervals: Interval[]): number {
  return intervals.reduce((acc, interval) => acc + intervalDuration(interval), 0);
}

/**
 * Returns the overlap of two intervals, or null when they do not share any time.
 */
export function intersect(a: Interval, b: Interval): Interval | null {
  const start = Math.max(a.start, b.start);
  const end = Math.min(a.end, b.end);
  return start < end ? { start, end } : null;
}

/**
 * Sorts intervals and coalesces the ones that overlap or abut.
 * Zero-length intervals are dropped.
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
  const sorted = intervals
    .filter(interval => interval.start < interval.end)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: Interval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end);
    } else {
      merged.push({ start: interval.start, end: interval.end });
    }
  }
  return merged;
}

export function assertValidInterval(interval: Interval, label = 'interval'): void {
  if (!Number.isFinite(interval.start) || !Number.isFinite(interval.end)) {
    throw new InvalidInputError(`${label} has a non-finite boundary`);
  }
  if (interval.start >= interval.end) {
    throw new InvalidInputError(
      `${label} is inverted or empty: [${new Date(interval.start).toISOString()}, ${new Date(interval.end).toISOString()})`
    );
  }
}

/**
 * Checks that intervals are individually valid, ascending and mutually disjoint.
 */
export function assertOrderedDisjoint(intervals: Interval[]): void {
  intervals.forEach((interval, index) => {
    assertValidInterval(interval, `interval #${index}`);
    const previous = intervals[index - 1];
    if (previous && interval.start < previous.end) {
      throw new InvalidInputError(`interval #${index} overlaps or precedes interval #${index - 1}`);
    }
  });
}
