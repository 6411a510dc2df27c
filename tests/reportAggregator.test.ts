import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ReportAggregator } from '../src/reports/reportAggregator';
import { StatusRepository } from '../src/storage/statusRepository';
import { BusinessHoursRule, Observation, ReportRow, StoreStatus } from '../src/uptime/contracts';
import { InvalidInputError, JobCancelledError } from '../src/utils/errorHandler';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

// Wednesday 2023-01-25 18:00 UTC
const NOW = Date.UTC(2023, 0, 25, 18);

interface FakeStore {
  timezone?: string;
  rules?: BusinessHoursRule[];
  observations?: Observation[];
}

class FakeStatusRepository implements StatusRepository {
  public observationFetches: string[] = [];

  constructor(private readonly stores: Record<string, FakeStore>) {}

  async listStoreIds(): Promise<string[]> {
    return Object.keys(this.stores).sort();
  }

  async getRules(storeId: string): Promise<BusinessHoursRule[]> {
    return this.stores[storeId]?.rules ?? [];
  }

  async getTimezone(storeId: string): Promise<string | null> {
    return this.stores[storeId]?.timezone ?? null;
  }

  async getObservations(storeId: string): Promise<Observation[]> {
    this.observationFetches.push(storeId);
    return this.stores[storeId]?.observations ?? [];
  }

  async getLatestObservationTime(): Promise<number | null> {
    const all = Object.values(this.stores).flatMap(store => store.observations ?? []);
    return all.length > 0 ? Math.max(...all.map(o => o.timestampUtc)) : null;
  }
}

function obs(storeId: string, timestampUtc: number, status: StoreStatus): Observation {
  return { storeId, timestampUtc, status };
}

const STORES: Record<string, FakeStore> = {
  'always-up': {
    timezone: 'UTC',
    observations: [obs('always-up', NOW - 8 * DAY, 'active')],
  },
  'bad': {
    timezone: 'UTC',
    observations: [obs('bad', NOW - 10 * MINUTE, 'active'), obs('bad', NOW - 20 * MINUTE, 'active')],
  },
  'business': {
    timezone: 'UTC',
    rules: [{ storeId: 'business', dayOfWeek: 2, startTimeLocal: '09:00', endTimeLocal: '17:00' }],
    observations: [obs('business', NOW - 8 * DAY, 'active')],
  },
  'down-recently': {
    timezone: 'UTC',
    observations: [obs('down-recently', NOW - 8 * DAY, 'active'), obs('down-recently', NOW - 30 * MINUTE, 'inactive')],
  },
  'no-data': {
    timezone: 'Not/AZone',
  },
};

function rowFor(rows: ReportRow[], storeId: string): ReportRow | undefined {
  return rows.find(row => row.storeId === storeId);
}

describe('ReportAggregator', () => {
  let repository: FakeStatusRepository;
  let aggregator: ReportAggregator;

  beforeEach(() => {
    repository = new FakeStatusRepository(STORES);
    aggregator = new ReportAggregator(repository, { defaultTimezone: 'UTC', concurrency: 2, batchSize: 2 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('generate()', () => {
    it('should produce one row per valid store in store order', async () => {
      const report = await aggregator.generate({ now: NOW });

      expect(report.referenceTime).toBe(NOW);
      expect(report.rows.map(row => row.storeId)).toEqual(['always-up', 'business', 'down-recently', 'no-data']);
    });

    it('should count a store with one old active observation as up the whole time', async () => {
      const report = await aggregator.generate({ now: NOW });

      expect(rowFor(report.rows, 'always-up')).toEqual({
        storeId: 'always-up',
        uptimeLastHour: 60,
        uptimeLastDay: 1440,
        uptimeLastWeek: 10080,
        downtimeLastHour: 0,
        downtimeLastDay: 0,
        downtimeLastWeek: 0,
      });
    });

    it('should only count business hours', async () => {
      const report = await aggregator.generate({ now: NOW });

      // Open Wednesdays 09:00-17:00; the previous Wednesday's hours end before the week starts
      expect(rowFor(report.rows, 'business')).toEqual({
        storeId: 'business',
        uptimeLastHour: 0,
        uptimeLastDay: 480,
        uptimeLastWeek: 480,
        downtimeLastHour: 0,
        downtimeLastDay: 0,
        downtimeLastWeek: 0,
      });
    });

    it('should switch status halfway between observations', async () => {
      const report = await aggregator.generate({ now: NOW });

      // Switch point is halfway between NOW - 8d and NOW - 30m, i.e. NOW - 4d - 15m
      expect(rowFor(report.rows, 'down-recently')).toEqual({
        storeId: 'down-recently',
        uptimeLastHour: 0,
        uptimeLastDay: 0,
        uptimeLastWeek: 3 * 1440 - 15,
        downtimeLastHour: 60,
        downtimeLastDay: 1440,
        downtimeLastWeek: 4 * 1440 + 15,
      });
    });

    it('should assume a store without observations was up and flag it', async () => {
      const report = await aggregator.generate({ now: NOW });

      expect(rowFor(report.rows, 'no-data')).toMatchObject({ uptimeLastHour: 60, uptimeLastDay: 1440, uptimeLastWeek: 10080 });

      const flags = report.flags.filter(flag => flag.storeId === 'no-data');
      expect(flags.map(flag => flag.code)).toEqual([
        'NO_OBSERVATIONS',
        'UNOBSERVED_INTERVAL',
        'UNOBSERVED_INTERVAL',
        'UNOBSERVED_INTERVAL',
      ]);
      expect(flags.slice(1).map(flag => flag.message.slice(0, 6))).toEqual(['[hour]', '[day] ', '[week]']);
      expect(report.flags).toHaveLength(4);
    });

    it('should attach configuration warnings to their store', async () => {
      const report = await aggregator.generate({ now: NOW });

      expect(report.warnings).toEqual([
        { code: 'UNKNOWN_TIMEZONE', message: 'Unknown timezone "Not/AZone", using UTC', storeId: 'no-data' },
      ]);
    });

    it('should keep the windows nested', async () => {
      const report = await aggregator.generate({ now: NOW });

      for (const row of report.rows) {
        const hour = row.uptimeLastHour + row.downtimeLastHour;
        const day = row.uptimeLastDay + row.downtimeLastDay;
        const week = row.uptimeLastWeek + row.downtimeLastWeek;
        expect(hour).toBeLessThanOrEqual(60);
        expect(day).toBeGreaterThanOrEqual(hour);
        expect(week).toBeGreaterThanOrEqual(day);
      }
    });

    it('should fetch observations once per store', async () => {
      await aggregator.generate({ now: NOW });

      expect([...repository.observationFetches].sort()).toEqual(['always-up', 'bad', 'business', 'down-recently', 'no-data']);
    });

    it('should skip a store with invalid input by default', async () => {
      const report = await aggregator.generate({ now: NOW });

      expect(report.skipped).toHaveLength(1);
      expect(report.skipped[0].storeId).toBe('bad');
      expect(report.skipped[0].reason).toContain('observations are not sorted');
    });

    it('should fail the whole run when configured to', async () => {
      const strict = new ReportAggregator(repository, { defaultTimezone: 'UTC', onInvalidInput: 'fail-job' });

      await expect(strict.generate({ now: NOW })).rejects.toThrow(InvalidInputError);
    });

    it('should stop when the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(aggregator.generate({ now: NOW, signal: controller.signal })).rejects.toThrow(JobCancelledError);
      expect(repository.observationFetches).toEqual([]);
    });
  });

  describe('resolveReferenceTime()', () => {
    it('should default to the newest observation', async () => {
      expect(await aggregator.resolveReferenceTime()).toBe(NOW - 10 * MINUTE);
    });

    it('should use the clock when configured to', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW + DAY);
      const wallClock = new ReportAggregator(repository, { referenceTime: 'wall-clock' });

      expect(await wallClock.resolveReferenceTime()).toBe(NOW + DAY);
    });

    it('should fall back to the clock for an empty database', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      const empty = new ReportAggregator(new FakeStatusRepository({}));

      expect(await empty.resolveReferenceTime()).toBe(NOW);
    });
  });
});
