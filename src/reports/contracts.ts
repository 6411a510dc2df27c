import { ConfigurationWarning, DataQualityFlag, ReportRow } from '../uptime/contracts';

export type ReportJobStatus = 'queued' | 'running' | 'complete' | 'failed';

export interface ReportSummary {
  storeCount: number;
  skippedStores: string[];
  warningCount: number;
  flagCount: number;
  flaggedStores: string[]; // stores with at least one data quality flag
}

export interface ReportJob {
  jobId: string;
  status: ReportJobStatus;
  createdAt: string; // ISO date
  startedAt?: string; // ISO date
  finishedAt?: string; // ISO date
  referenceTime?: string; // ISO date the windows end at
  artifactPath?: string;
  error?: string;
  summary?: ReportSummary;
}

export type ReportPoll =
  | { status: 'running'; job: ReportJob }
  | { status: 'complete'; job: ReportJob; artifactPath: string }
  | { status: 'failed'; job: ReportJob; reason: string };

export interface StoreReport {
  row: ReportRow;
  warnings: ConfigurationWarning[];
  flags: DataQualityFlag[];
}

export interface SkippedStore {
  storeId: string;
  reason: string;
}

export interface UptimeReport {
  referenceTime: number; // epoch ms
  rows: ReportRow[];
  skipped: SkippedStore[];
  warnings: Array<ConfigurationWarning & { storeId: string }>;
  flags: Array<DataQualityFlag & { storeId: string }>;
}

const JOB_STATUSES: readonly ReportJobStatus[] = ['queued', 'running', 'complete', 'failed'];

export function isReportJob(value: unknown): value is ReportJob {
  if (typeof value !== 'object' || value === null) return false;
  if (!('jobId' in value) || !('status' in value) || !('createdAt' in value)) return false;
  const { jobId, status, createdAt } = value;
  return typeof jobId === 'string'
    && typeof createdAt === 'string'
    && JOB_STATUSES.some(candidate => candidate === status);
}
