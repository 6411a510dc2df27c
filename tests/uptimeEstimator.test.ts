import { describe, it, expect } from 'vitest';
import { estimateUptime, reconcileMinutes } from '../src/uptime/uptimeEstimator';
import { partitionTimeline } from '../src/uptime/observationPartition';
import { Observation, StoreStatus, TimelineSegment } from '../src/uptime/contracts';
import { InvalidInputError } from '../src/utils/errorHandler';

const MINUTE = 60 * 1000;

function obs(minute: number, status: StoreStatus): Observation {
  return { storeId: 'store-1', timestampUtc: minute * MINUTE, status };
}

function segment(partial: Partial<TimelineSegment> & Pick<TimelineSegment, 'interval'>): TimelineSegment {
  return { observations: [], leading: null, trailing: null, unknown: false, ...partial };
}

describe('estimateUptime()', () => {
  it('should switch status halfway between two observations', () => {
    const segments = partitionTimeline([{ start: 0, end: 60 * MINUTE }], [obs(0, 'active'), obs(60, 'inactive')]);
    const estimate = estimateUptime(segments);

    expect(estimate.uptimeMinutes).toBe(30);
    expect(estimate.downtimeMinutes).toBe(30);
    expect(estimate.businessMinutes).toBe(60);
    expect(estimate.flags).toEqual([]);
  });

  it('should extend the outermost observations to the segment edges', () => {
    const segments = partitionTimeline(
      [{ start: 0, end: 60 * MINUTE }],
      [obs(10, 'active'), obs(20, 'inactive'), obs(50, 'active')]
    );
    const estimate = estimateUptime(segments);

    // active [0,15) inactive [15,35) active [35,60)
    expect(estimate.activeMs).toBe(40 * MINUTE);
    expect(estimate.inactiveMs).toBe(20 * MINUTE);
  });

  it('should prefer a closer observation inside the segment over a distant neighbour', () => {
    const segments = partitionTimeline([{ start: 0, end: 60 * MINUTE }], [obs(-100, 'inactive'), obs(30, 'active')]);

    expect(estimateUptime(segments).uptimeMinutes).toBe(60);
  });

  it('should use a neighbour outside the segment when nothing falls inside', () => {
    const segments = partitionTimeline([{ start: 0, end: 60 * MINUTE }], [obs(-10, 'inactive')]);
    const estimate = estimateUptime(segments);

    expect(estimate.uptimeMinutes).toBe(0);
    expect(estimate.downtimeMinutes).toBe(60);
  });

  it('should assume active time and flag segments without evidence', () => {
    const estimate = estimateUptime([segment({ interval: { start: 0, end: 60 * MINUTE }, unknown: true })]);

    expect(estimate.uptimeMinutes).toBe(60);
    expect(estimate.downtimeMinutes).toBe(0);
    expect(estimate.flags).toHaveLength(1);
    expect(estimate.flags[0].code).toBe('UNOBSERVED_INTERVAL');
    expect(estimate.flags[0].interval).toEqual({ start: 0, end: 60 * MINUTE });
  });

  it('should sum across segments', () => {
    const segments = partitionTimeline(
      [{ start: 0, end: 30 * MINUTE }, { start: 60 * MINUTE, end: 90 * MINUTE }],
      [obs(0, 'active'), obs(70, 'inactive')]
    );
    const estimate = estimateUptime(segments);

    // first segment: active until 35 > 30; second: switch at 35 < 60, all inactive
    expect(estimate.uptimeMinutes).toBe(30);
    expect(estimate.downtimeMinutes).toBe(30);
  });

  it('should return zeros for no business hours', () => {
    expect(estimateUptime([])).toEqual({
      uptimeMinutes: 0,
      downtimeMinutes: 0,
      businessMinutes: 0,
      activeMs: 0,
      inactiveMs: 0,
      flags: [],
    });
  });

  it('should reject evidence that contradicts the segment boundaries', () => {
    expect(() => estimateUptime([
      segment({ interval: { start: 0, end: 60 * MINUTE }, observations: [obs(90, 'active')] }),
    ])).toThrow(InvalidInputError);

    expect(() => estimateUptime([
      segment({ interval: { start: 0, end: 60 * MINUTE }, leading: obs(5, 'active') }),
    ])).toThrow('leading observation is not before the segment');
  });

  it('should reject overlapping segments', () => {
    expect(() => estimateUptime([
      segment({ interval: { start: 0, end: 60 * MINUTE }, unknown: true }),
      segment({ interval: { start: 30 * MINUTE, end: 90 * MINUTE }, unknown: true }),
    ])).toThrow(InvalidInputError);
  });
});

describe('reconcileMinutes()', () => {
  it('should give a tied leftover minute to uptime', () => {
    expect(reconcileMinutes(1.5 * MINUTE, 1.5 * MINUTE)).toEqual({ uptimeMinutes: 2, downtimeMinutes: 1, businessMinutes: 3 });
  });

  it('should give the leftover minute to the larger fraction', () => {
    expect(reconcileMinutes(20 * 1000, 100 * 1000)).toEqual({ uptimeMinutes: 0, downtimeMinutes: 2, businessMinutes: 2 });
    expect(reconcileMinutes(100 * 1000, 80 * 1000)).toEqual({ uptimeMinutes: 2, downtimeMinutes: 1, businessMinutes: 3 });
  });

  it('should round sub-minute totals down to nothing', () => {
    expect(reconcileMinutes(29 * 1000, 0)).toEqual({ uptimeMinutes: 0, downtimeMinutes: 0, businessMinutes: 0 });
  });

  it('should reject negative durations', () => {
    expect(() => reconcileMinutes(-1, 0)).toThrow(InvalidInputError);
  });
});
