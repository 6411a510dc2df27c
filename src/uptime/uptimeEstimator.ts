import { DataQualityFlag, Observation, TimelineSegment, WindowEstimate } from './contracts';
import { assertOrderedDisjoint, intervalDuration } from './intervals';
import { InvalidInputError } from '../utils/errorHandler';
import { formatUtc } from '../time/timeUtils';

const MINUTE_MS = 60 * 1000;

interface Accumulator {
  activeMs: number;
  inactiveMs: number;
}

function credit(acc: Accumulator, observation: Observation, from: number, to: number): void {
  if (to <= from) return;
  if (observation.status === 'active') {
    acc.activeMs += to - from;
  } else {
    acc.inactiveMs += to - from;
  }
}

function assertSegmentEvidence(segment: TimelineSegment, index: number): void {
  const { interval, observations, leading, trailing } = segment;

  if (leading && leading.timestampUtc >= interval.start) {
    throw new InvalidInputError(`segment #${index} leading observation is not before the segment`);
  }
  if (trailing && trailing.timestampUtc < interval.end) {
    throw new InvalidInputError(`segment #${index} trailing observation is inside the segment`);
  }
  observations.forEach((observation, i) => {
    if (observation.timestampUtc < interval.start || observation.timestampUtc >= interval.end) {
      throw new InvalidInputError(`segment #${index} observation #${i} lies outside the segment`);
    }
    if (i > 0 && observation.timestampUtc < observations[i - 1].timestampUtc) {
      throw new InvalidInputError(`segment #${index} observations are not sorted`);
    }
  });
}

/**
 * Credits one segment using nearest-observation step interpolation: between two
 * evidence points the status switches at their midpoint, and the outermost
 * points extend to the segment boundaries.
 */
function estimateSegment(segment: TimelineSegment, acc: Accumulator): boolean {
  const { start, end } = segment.interval;
  const evidence: Observation[] = [
    ...(segment.leading ? [segment.leading] : []),
    ...segment.observations,
    ...(segment.trailing ? [segment.trailing] : []),
  ];

  if (evidence.length === 0) {
    acc.activeMs += end - start;
    return false;
  }

  let from = start;
  for (let i = 0; i < evidence.length - 1; i++) {
    const switchAt = (evidence[i].timestampUtc + evidence[i + 1].timestampUtc) / 2;
    const to = Math.min(end, switchAt);
    credit(acc, evidence[i], from, to);
    from = Math.max(from, to);
    if (from >= end) return true;
  }
  credit(acc, evidence[evidence.length - 1], from, end);
  return true;
}

/**
 * Rounds both buckets to whole minutes so that they add up to the rounded
 * business-hours total. Both are floored and the leftover minutes go to the
 * bucket with the larger fractional part, uptime on a tie.
 */
export function reconcileMinutes(activeMs: number, inactiveMs: number): {
  uptimeMinutes: number;
  downtimeMinutes: number;
  businessMinutes: number;
} {
  if (activeMs < 0 || inactiveMs < 0) {
    throw new InvalidInputError('durations must not be negative');
  }

  const up = activeMs / MINUTE_MS;
  const down = inactiveMs / MINUTE_MS;
  const businessMinutes = Math.round((activeMs + inactiveMs) / MINUTE_MS);

  let uptimeMinutes = Math.floor(up);
  let downtimeMinutes = Math.floor(down);
  let leftover = businessMinutes - uptimeMinutes - downtimeMinutes;

  const upFraction = up - uptimeMinutes;
  const downFraction = down - downtimeMinutes;
  const order: Array<'up' | 'down'> = upFraction >= downFraction ? ['up', 'down'] : ['down', 'up'];

  for (const bucket of order) {
    if (leftover <= 0) break;
    if (bucket === 'up') uptimeMinutes++;
    else downtimeMinutes++;
    leftover--;
  }

  return { uptimeMinutes, downtimeMinutes, businessMinutes };
}

/**
 * Converts a partitioned business-hours timeline into active and inactive
 * minutes for one window.
 */
export function estimateUptime(segments: TimelineSegment[]): WindowEstimate {
  assertOrderedDisjoint(segments.map(segment => segment.interval));

  const acc: Accumulator = { activeMs: 0, inactiveMs: 0 };
  const flags: DataQualityFlag[] = [];

  segments.forEach((segment, index) => {
    assertSegmentEvidence(segment, index);
    const observed = estimateSegment(segment, acc);
    if (!observed) {
      flags.push({
        code: 'UNOBSERVED_INTERVAL',
        message: `No observations around ${formatUtc(segment.interval.start)} - ${formatUtc(segment.interval.end)} ` +
          `(${Math.round(intervalDuration(segment.interval) / MINUTE_MS)} min assumed active)`,
        interval: { ...segment.interval },
      });
    }
  });

  return {
    ...reconcileMinutes(acc.activeMs, acc.inactiveMs),
    activeMs: acc.activeMs,
    inactiveMs: acc.inactiveMs,
    flags,
  };
}
