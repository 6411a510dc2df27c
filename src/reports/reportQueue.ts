import * as fs from 'fs-extra';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { ReportJob, ReportJobStatus, ReportPoll, isReportJob } from './contracts';
import { writeJsonAtomic, readJsonSafe } from '../storage/jsonStore';
import { JobRunner } from './reportRunner';
import { JobCancelledError, errorMessage, handleError } from '../utils/errorHandler';
import { getNowISO } from '../time/timeUtils';

type FinishedStatus = Extract<ReportJobStatus, 'complete' | 'failed'>;

interface ActiveJob {
  job: ReportJob;
  controller: AbortController;
  /** Outcome decided; a cancel can no longer change it. */
  settled: boolean;
}

export const CANCELLED_REASON = 'Cancelled';
export const RESTARTED_REASON = 'Server restarted during execution';

/**
 * File-backed report job queue. A job file lives in exactly one of the
 * queue/running/done/failed directories and only ever moves forward:
 * queued -> running -> complete | failed (queued -> failed on cancel).
 * One job runs at a time.
 */
export class ReportQueue {
  private baseDir: string;
  private queueDir: string;
  private runningDir: string;
  private doneDir: string;
  private failedDir: string;
  private processing: Promise<void> | null = null;
  private pendingKick = false;
  private interval: NodeJS.Timeout | null = null;
  private active: ActiveJob | null = null;
  // Serialises moves out of the queue directory (claim and cancel)
  private transitionLock: Promise<void> = Promise.resolve();

  constructor(
    stateDir: string,
    private readonly runner: JobRunner,
    private readonly pollIntervalMs: number = 5000
  ) {
    this.baseDir = path.join(stateDir, 'report-jobs');
    this.queueDir = path.join(this.baseDir, 'queue');
    this.runningDir = path.join(this.baseDir, 'running');
    this.doneDir = path.join(this.baseDir, 'done');
    this.failedDir = path.join(this.baseDir, 'failed');
  }

  async initialize(): Promise<void> {
    await fs.ensureDir(this.queueDir);
    await fs.ensureDir(this.runningDir);
    await fs.ensureDir(this.doneDir);
    await fs.ensureDir(this.failedDir);

    // Cleanup running jobs left by a previous process
    const runningFiles = await fs.readdir(this.runningDir);
    for (const file of runningFiles) {
      if (file.endsWith('.json')) {
        const job = readJsonSafe<ReportJob | null>(path.join(this.runningDir, file), null, isReportJob);
        if (job) {
          logger.info(`Cleaning up interrupted report ${job.jobId} from running directory.`);
          await this.finishJob(this.runningDir, job.jobId, 'failed', { error: RESTARTED_REASON });
        }
      }
    }
  }

  start(): void {
    if (this.interval) return;
    this.interval = setInterval(() => this.kick(), this.pollIntervalMs);
    this.interval.unref();
    logger.info('Report Queue Processor started');
    this.kick();
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  /**
   * Creates a new report job and schedules it. Returns the report id.
   */
  async enqueueJob(): Promise<string> {
    const job: ReportJob = {
      jobId: uuidv4(),
      status: 'queued',
      createdAt: getNowISO(),
    };

    await writeJsonAtomic(path.join(this.queueDir, `${job.jobId}.json`), job);
    logger.info(`Enqueued uptime report (ID: ${job.jobId})`);
    if (this.interval) {
      this.kick();
    }
    return job.jobId;
  }

  /**
   * Runs queued jobs one after another until the queue is empty. Concurrent
   * callers share the same drain.
   */
  processQueue(): Promise<void> {
    if (this.processing) {
      this.pendingKick = true;
      return this.processing;
    }
    this.processing = this.drain().finally(() => {
      this.processing = null;
    });
    return this.processing;
  }

  private kick(): void {
    this.processQueue().catch(err => handleError(err, 'report queue'));
  }

  private async drain(): Promise<void> {
    do {
      this.pendingKick = false;
      let claimed = await this.claimNextJob();
      while (claimed) {
        await this.execute(claimed);
        claimed = await this.claimNextJob();
      }
    } while (this.pendingKick);
  }

  private async withTransitionLock<T>(operation: () => Promise<T>): Promise<T> {
    const previousLock = this.transitionLock;
    let releaseLock: () => void = () => undefined;
    this.transitionLock = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });

    try {
      await previousLock;
      return await operation();
    } finally {
      releaseLock();
    }
  }

  private async execute(active: ActiveJob): Promise<void> {
    const { job, controller } = active;
    logger.info(`Starting execution of report ${job.jobId}`);

    try {
      if (controller.signal.aborted) {
        throw new JobCancelledError(job.jobId);
      }
      const result = await this.runner.runJob(job, controller.signal);
      if (controller.signal.aborted) {
        throw new JobCancelledError(job.jobId);
      }
      active.settled = true;
      await this.finishJob(this.runningDir, job.jobId, 'complete', {
        artifactPath: result.artifactPath,
        referenceTime: result.referenceTime,
        summary: result.summary,
      });
    } catch (err) {
      active.settled = true;
      const reason = err instanceof JobCancelledError ? CANCELLED_REASON : errorMessage(err);
      handleError(err, `report ${job.jobId}`);
      await this.finishJob(this.runningDir, job.jobId, 'failed', { error: reason });
    } finally {
      this.active = null;
    }
  }

  /**
   * Moves the oldest queued job into the running directory and makes it the
   * active job. Returns null when the queue is empty or a job is running.
   */
  private claimNextJob(): Promise<ActiveJob | null> {
    return this.withTransitionLock(async () => {
      if (!(await fs.pathExists(this.queueDir))) return null;

      // One report at a time
      const runningFiles = (await fs.readdir(this.runningDir)).filter(f => f.endsWith('.json'));
      if (runningFiles.length > 0) return null;

      const queued = await this.readJobs(this.queueDir);
      if (queued.length === 0) return null;
      queued.sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.jobId.localeCompare(b.jobId));

      const next = queued[0];
      const oldPath = path.join(this.queueDir, `${next.jobId}.json`);
      const newPath = path.join(this.runningDir, `${next.jobId}.json`);

      try {
        await fs.rename(oldPath, newPath);
      } catch (err) {
        logger.error(`Failed to claim report ${next.jobId}: ${err}`);
        return null;
      }

      const job: ReportJob = { ...next, status: 'running', startedAt: getNowISO() };
      const active: ActiveJob = { job, controller: new AbortController(), settled: false };
      await writeJsonAtomic(newPath, job);
      this.active = active;
      return active;
    });
  }

  /**
   * Requests cancellation. Returns false when the job is unknown or its
   * outcome is already decided.
   */
  async cancelJob(jobId: string): Promise<boolean> {
    return this.withTransitionLock(async () => {
      if (this.active && this.active.job.jobId === jobId) {
        if (this.active.settled) return false;
        logger.info(`Cancelling running report ${jobId}`);
        this.active.controller.abort();
        return true;
      }

      const cancelled = await this.finishJob(this.queueDir, jobId, 'failed', { error: CANCELLED_REASON });
      if (cancelled) {
        logger.info(`Cancelled queued report ${jobId}`);
      }
      return cancelled;
    });
  }

  private async finishJob(
    sourceDir: string,
    jobId: string,
    status: FinishedStatus,
    fields: Partial<Pick<ReportJob, 'artifactPath' | 'referenceTime' | 'summary' | 'error'>>
  ): Promise<boolean> {
    const fileName = `${jobId}.json`;
    const sourcePath = path.join(sourceDir, fileName);

    if (!(await fs.pathExists(sourcePath))) {
      logger.debug(`Report ${jobId} not found in ${path.basename(sourceDir)} directory.`);
      return false;
    }

    const job = readJsonSafe<ReportJob | null>(sourcePath, null, isReportJob);
    if (!job) return false;

    const finished: ReportJob = {
      ...job,
      ...fields,
      status,
      finishedAt: getNowISO(),
    };

    const destDir = status === 'complete' ? this.doneDir : this.failedDir;
    await writeJsonAtomic(sourcePath, finished);
    await fs.rename(sourcePath, path.join(destDir, fileName));
    logger.info(`Report ${jobId} finished with status ${status}${finished.error ? `: ${finished.error}` : ''}`);
    return true;
  }

  async getJobStatus(jobId: string): Promise<ReportJob | null> {
    const dirs = [this.queueDir, this.runningDir, this.doneDir, this.failedDir];
    for (const dir of dirs) {
      const filePath = path.join(dir, `${jobId}.json`);
      if (await fs.pathExists(filePath)) {
        return readJsonSafe<ReportJob | null>(filePath, null, isReportJob);
      }
    }
    return null;
  }

  async poll(jobId: string): Promise<ReportPoll | null> {
    const job = await this.getJobStatus(jobId);
    if (!job) return null;

    if (job.status === 'complete' && job.artifactPath) {
      return { status: 'complete', job, artifactPath: job.artifactPath };
    }
    if (job.status === 'failed' || job.status === 'complete') {
      return { status: 'failed', job, reason: job.error || 'Report artifact missing' };
    }
    return { status: 'running', job };
  }

  private async readJobs(dir: string): Promise<ReportJob[]> {
    const files = (await fs.readdir(dir)).filter(f => f.endsWith('.json'));
    const jobs: ReportJob[] = [];
    for (const file of files) {
      const job = readJsonSafe<ReportJob | null>(path.join(dir, file), null, isReportJob);
      if (job) jobs.push(job);
    }
    return jobs;
  }
}
