import { Interval, Observation, TimelineSegment } from './contracts';
import { assertOrderedDisjoint } from './intervals';
import { InvalidInputError } from '../utils/errorHandler';

/**
 * Validates timestamp order and collapses observations that share an instant,
 * keeping the last one seen.
 */
export function normalizeObservations(observations: Observation[]): Observation[] {
  const result: Observation[] = [];

  observations.forEach((observation, index) => {
    if (!Number.isFinite(observation.timestampUtc)) {
      throw new InvalidInputError(`observation #${index} has an invalid timestamp`);
    }
    const last = result[result.length - 1];
    if (last && observation.timestampUtc < last.timestampUtc) {
      throw new InvalidInputError(
        `observations are not sorted: #${index} (${new Date(observation.timestampUtc).toISOString()}) ` +
        `precedes ${new Date(last.timestampUtc).toISOString()}`
      );
    }
    if (last && observation.timestampUtc === last.timestampUtc) {
      result[result.length - 1] = observation;
    } else {
      result.push(observation);
    }
  });

  return result;
}

/**
 * Splits the business-hours timeline into segments, one per interval, each
 * carrying the observations inside it and the nearest observation on either
 * side. Both inputs are walked once.
 *
 * `leading` is the last observation strictly before the interval start;
 * `trailing` is the first observation at or after its (exclusive) end. Either
 * may lie outside every business interval.
 */
export function partitionTimeline(intervals: Interval[], observations: Observation[]): TimelineSegment[] {
  assertOrderedDisjoint(intervals);
  const points = normalizeObservations(observations);

  const segments: TimelineSegment[] = [];
  let cursor = 0;

  for (const interval of intervals) {
    while (cursor < points.length && points[cursor].timestampUtc < interval.start) {
      cursor++;
    }
    const leading = cursor > 0 ? points[cursor - 1] : null;

    const inside: Observation[] = [];
    while (cursor < points.length && points[cursor].timestampUtc < interval.end) {
      inside.push(points[cursor]);
      cursor++;
    }
    const trailing = cursor < points.length ? points[cursor] : null;

    segments.push({
      interval: { start: interval.start, end: interval.end },
      observations: inside,
      leading,
      trailing,
      unknown: inside.length === 0 && !leading && !trailing,
    });
  }

  return segments;
}
