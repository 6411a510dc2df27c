import { StatusRepository } from '../storage/statusRepository';
import { BusinessHoursResolver } from '../uptime/businessHours';
import { buildTimeWindows } from '../uptime/timeWindows';
import { partitionTimeline } from '../uptime/observationPartition';
import { estimateUptime } from '../uptime/uptimeEstimator';
import { DataQualityFlag, Interval, Observation, WindowEstimate } from '../uptime/contracts';
import { SkippedStore, StoreReport, UptimeReport } from './contracts';
import { InvalidInputPolicy, ReferenceTimeStrategy } from '../config/config';
import { WindowName } from '../config/reporting';
import { InvalidInputError, JobCancelledError } from '../utils/errorHandler';
import { formatUtc } from '../time/timeUtils';
import { logger } from '../utils/logger';

export interface AggregatorOptions {
  defaultTimezone?: string;
  referenceTime?: ReferenceTimeStrategy;
  concurrency?: number;
  batchSize?: number;
  onInvalidInput?: InvalidInputPolicy;
}

export interface GenerateOptions {
  now?: number;
  signal?: AbortSignal;
}

type StoreOutcome =
  | { kind: 'row'; storeId: string; report: StoreReport }
  | { kind: 'skipped'; skipped: SkippedStore };

export class ReportAggregator {
  private readonly concurrency: number;
  private readonly batchSize: number;

  constructor(
    private readonly repository: StatusRepository,
    private readonly options: AggregatorOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency || 8);
    this.batchSize = Math.max(1, options.batchSize || 100);
  }

  /**
   * The instant the trailing windows end at: the newest observation in the
   * store by default, so that historical exports produce meaningful reports.
   */
  async resolveReferenceTime(): Promise<number> {
    if (this.options.referenceTime === 'wall-clock') {
      return Date.now();
    }
    const latest = await this.repository.getLatestObservationTime();
    return latest ?? Date.now();
  }

  async computeStoreReport(storeId: string, now: number): Promise<StoreReport> {
    const [timezone, rules] = await Promise.all([
      this.repository.getTimezone(storeId),
      this.repository.getRules(storeId),
    ]);
    const resolver = new BusinessHoursResolver(timezone, rules, {
      defaultTimezone: this.options.defaultTimezone,
    });

    const windows = buildTimeWindows(now);
    // The week window contains the other two; one fetch with its margins serves all three.
    const observations = await this.repository.getObservations(storeId, windows.week.start, windows.week.end);

    const flags: DataQualityFlag[] = [];
    if (observations.length === 0) {
      flags.push({
        code: 'NO_OBSERVATIONS',
        message: `Store ${storeId} has no observations; all business hours assumed active`,
      });
    }

    const estimate = (name: WindowName, window: Interval): WindowEstimate => {
      const result = this.estimateWindow(resolver, window, observations);
      flags.push(...result.flags.map(flag => ({ ...flag, message: `[${name}] ${flag.message}` })));
      return result;
    };

    const hour = estimate('hour', windows.hour);
    const day = estimate('day', windows.day);
    const week = estimate('week', windows.week);

    if (resolver.usesDefaultSchedule) {
      logger.debug(`Store ${storeId} has no usable business hours, using the all-day schedule`);
    }

    return {
      row: {
        storeId,
        uptimeLastHour: hour.uptimeMinutes,
        uptimeLastDay: day.uptimeMinutes,
        uptimeLastWeek: week.uptimeMinutes,
        downtimeLastHour: hour.downtimeMinutes,
        downtimeLastDay: day.downtimeMinutes,
        downtimeLastWeek: week.downtimeMinutes,
      },
      warnings: [...resolver.warnings],
      flags,
    };
  }

  async generate(options: GenerateOptions = {}): Promise<UptimeReport> {
    const now = options.now ?? await this.resolveReferenceTime();
    const storeIds = await this.repository.listStoreIds();
    logger.info(`Computing uptime for ${storeIds.length} stores at ${formatUtc(now)}`);

    const report: UptimeReport = { referenceTime: now, rows: [], skipped: [], warnings: [], flags: [] };
    let processed = 0;

    for (let i = 0; i < storeIds.length; i += this.concurrency) {
      if (options.signal?.aborted) {
        throw new JobCancelledError();
      }

      const chunk = storeIds.slice(i, i + this.concurrency);
      const outcomes = await Promise.all(chunk.map(storeId => this.computeStoreSafely(storeId, now)));

      for (const outcome of outcomes) {
        if (outcome.kind === 'skipped') {
          report.skipped.push(outcome.skipped);
          continue;
        }
        const { storeId, report: storeReport } = outcome;
        report.rows.push(storeReport.row);
        report.warnings.push(...storeReport.warnings.map(warning => ({ ...warning, storeId })));
        report.flags.push(...storeReport.flags.map(flag => ({ ...flag, storeId })));
      }

      const before = processed;
      processed += chunk.length;
      if (Math.floor(before / this.batchSize) !== Math.floor(processed / this.batchSize) || processed === storeIds.length) {
        logger.info(`Progress: ${processed}/${storeIds.length} stores (${Math.round((processed / storeIds.length) * 100)}%)`);
      }
    }

    logger.info(
      `Computed ${report.rows.length} rows (${report.skipped.length} skipped, ` +
      `${report.warnings.length} configuration warnings, ${report.flags.length} data quality flags)`
    );
    return report;
  }

  private estimateWindow(resolver: BusinessHoursResolver, window: Interval, observations: Observation[]): WindowEstimate {
    const businessIntervals = resolver.resolve(window);
    const segments = partitionTimeline(businessIntervals, observations);
    return estimateUptime(segments);
  }

  private async computeStoreSafely(storeId: string, now: number): Promise<StoreOutcome> {
    try {
      return { kind: 'row', storeId, report: await this.computeStoreReport(storeId, now) };
    } catch (error) {
      if (error instanceof InvalidInputError && this.options.onInvalidInput !== 'fail-job') {
        logger.warn(`Skipping store ${storeId}: ${error.message}`);
        return { kind: 'skipped', skipped: { storeId, reason: error.message } };
      }
      throw error;
    }
  }
}
