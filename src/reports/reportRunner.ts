import * as path from 'path';
import { logger } from '../utils/logger';
import { ReportJob, ReportSummary } from './contracts';
import { ReportAggregator } from './reportAggregator';
import { writeReportCsv } from './reportWriter';
import { JobCancelledError, JobFailure, errorMessage } from '../utils/errorHandler';
import { formatUtc } from '../time/timeUtils';

export interface ReportRunResult {
  artifactPath: string;
  referenceTime: string;
  summary: ReportSummary;
}

export interface JobRunner {
  runJob(job: ReportJob, signal?: AbortSignal): Promise<ReportRunResult>;
}

export class ReportRunner implements JobRunner {
  constructor(
    private readonly aggregator: ReportAggregator,
    private readonly reportsDir: string
  ) {}

  artifactPathFor(jobId: string): string {
    return path.join(this.reportsDir, `${jobId}.csv`);
  }

  async runJob(job: ReportJob, signal?: AbortSignal): Promise<ReportRunResult> {
    logger.info(`Starting uptime report ${job.jobId}`);

    const report = await this.aggregator.generate({ signal });
    if (signal?.aborted) {
      throw new JobCancelledError(job.jobId);
    }

    const artifactPath = this.artifactPathFor(job.jobId);
    logger.info(`Writing report to ${artifactPath}`);
    try {
      await writeReportCsv(artifactPath, report.rows);
    } catch (error) {
      throw new JobFailure(`Failed to write report artifact: ${errorMessage(error)}`, job.jobId);
    }

    return {
      artifactPath,
      referenceTime: formatUtc(report.referenceTime),
      summary: {
        storeCount: report.rows.length,
        skippedStores: report.skipped.map(skipped => skipped.storeId),
        warningCount: report.warnings.length,
        flagCount: report.flags.length,
        flaggedStores: [...new Set(report.flags.map(flag => flag.storeId))],
      },
    };
  }
}
