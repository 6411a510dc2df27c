import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { buildTimeWindows } from '../src/uptime/timeWindows';

const NOW = Date.UTC(2023, 0, 25, 18, 13, 22);
const HOUR = 60 * 60 * 1000;

describe('buildTimeWindows', () => {
  it('should end every window at the reference time', () => {
    const windows = buildTimeWindows(NOW);

    expect(windows.hour).toEqual({ start: NOW - HOUR, end: NOW });
    expect(windows.day).toEqual({ start: NOW - 24 * HOUR, end: NOW });
    expect(windows.week).toEqual({ start: NOW - 7 * 24 * HOUR, end: NOW });
  });

  it('should accept Date and luxon DateTime references', () => {
    const fromNumber = buildTimeWindows(NOW);

    expect(buildTimeWindows(new Date(NOW))).toEqual(fromNumber);
    expect(buildTimeWindows(DateTime.fromMillis(NOW, { zone: 'Asia/Tokyo' }))).toEqual(fromNumber);
  });
});
