import { describe, it, expect } from 'vitest';
import {
  assertOrderedDisjoint,
  assertValidInterval,
  intersect,
  mergeIntervals,
  totalDuration,
} from '../src/uptime/intervals';
import { InvalidInputError } from '../src/utils/errorHandler';

describe('intervals', () => {
  describe('intersect()', () => {
    it('should return the shared range', () => {
      expect(intersect({ start: 0, end: 10 }, { start: 5, end: 20 })).toEqual({ start: 5, end: 10 });
    });

    it('should return null for intervals that only touch', () => {
      expect(intersect({ start: 0, end: 10 }, { start: 10, end: 20 })).toBeNull();
    });
  });

  describe('mergeIntervals()', () => {
    it('should sort and coalesce overlapping and abutting intervals', () => {
      const merged = mergeIntervals([
        { start: 30, end: 40 },
        { start: 0, end: 10 },
        { start: 10, end: 15 },
        { start: 12, end: 20 },
      ]);

      expect(merged).toEqual([
        { start: 0, end: 20 },
        { start: 30, end: 40 },
      ]);
    });

    it('should drop zero-length intervals', () => {
      expect(mergeIntervals([{ start: 5, end: 5 }, { start: 6, end: 7 }])).toEqual([{ start: 6, end: 7 }]);
    });

    it('should not mutate its input', () => {
      const input = [{ start: 0, end: 10 }, { start: 5, end: 20 }];
      mergeIntervals(input);
      expect(input[0]).toEqual({ start: 0, end: 10 });
    });
  });

  it('should sum durations', () => {
    expect(totalDuration([{ start: 0, end: 10 }, { start: 20, end: 25 }])).toBe(15);
    expect(totalDuration([])).toBe(0);
  });

  describe('assertions', () => {
    it('should reject inverted and empty intervals', () => {
      expect(() => assertValidInterval({ start: 10, end: 5 })).toThrow(InvalidInputError);
      expect(() => assertValidInterval({ start: 5, end: 5 })).toThrow(InvalidInputError);
      expect(() => assertValidInterval({ start: 0, end: Number.NaN })).toThrow('non-finite');
    });

    it('should reject overlapping or unordered lists', () => {
      expect(() => assertOrderedDisjoint([{ start: 0, end: 10 }, { start: 10, end: 20 }])).not.toThrow();
      expect(() => assertOrderedDisjoint([{ start: 0, end: 10 }, { start: 9, end: 20 }])).toThrow(InvalidInputError);
      expect(() => assertOrderedDisjoint([{ start: 20, end: 30 }, { start: 0, end: 10 }])).toThrow(
        'interval #1 overlaps or precedes interval #0'
      );
    });
  });
});
