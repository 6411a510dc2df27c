import axios, { AxiosInstance } from 'axios';
import { UptimeError } from '../utils/errorHandler';

export type RemoteReportState =
  | { status: 'running' }
  | { status: 'complete'; csv: string }
  | { status: 'failed'; reason: string };

export interface ReportClientOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
  requestTimeoutMs?: number;
}

function parseJsonBody(body: unknown): Record<string, unknown> {
  if (typeof body !== 'string') return {};
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
  } catch {
    return {};
  }
}

/**
 * HTTP client for the report endpoints: trigger, poll, download.
 */
export class ReportClient {
  private http: AxiosInstance;
  private pollIntervalMs: number;
  private timeoutMs: number;

  constructor(baseUrl: string, options: ReportClientOptions = {}) {
    this.http = axios.create({
      baseURL: baseUrl,
      timeout: options.requestTimeoutMs ?? 30 * 1000,
      responseType: 'text',
      validateStatus: () => true, // Status codes are part of the protocol
    });
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.timeoutMs = options.timeoutMs ?? 30 * 60 * 1000;
  }

  async trigger(): Promise<string> {
    const response = await this.http.post('/trigger_report');
    const body = parseJsonBody(response.data);
    if (response.status !== 200 || typeof body.report_id !== 'string') {
      throw new UptimeError(`Failed to trigger report (HTTP ${response.status})`, 'TRIGGER_FAILED', response.status);
    }
    return body.report_id;
  }

  async poll(reportId: string): Promise<RemoteReportState> {
    const response = await this.http.get('/get_report', { params: { report_id: reportId } });
    const contentType = String(response.headers['content-type'] || '');

    if (response.status === 200 && contentType.includes('text/csv')) {
      return { status: 'complete', csv: String(response.data) };
    }

    const body = parseJsonBody(response.data);
    if (response.status === 200 && body.status === 'Running') {
      return { status: 'running' };
    }
    if (response.status === 500 && body.status === 'Failed') {
      return { status: 'failed', reason: typeof body.error === 'string' ? body.error : 'Unknown error' };
    }

    const detail = typeof body.error === 'string' ? body.error : `HTTP ${response.status}`;
    throw new UptimeError(`Unexpected response for report ${reportId}: ${detail}`, 'POLL_FAILED', response.status);
  }

  /**
   * Polls until the report completes, fails, or the timeout passes.
   */
  async waitForReport(reportId: string, onPoll?: (state: RemoteReportState) => void): Promise<string> {
    const deadline = Date.now() + this.timeoutMs;

    for (;;) {
      const state = await this.poll(reportId);
      onPoll?.(state);

      if (state.status === 'complete') return state.csv;
      if (state.status === 'failed') {
        throw new UptimeError(`Report ${reportId} failed: ${state.reason}`, 'REPORT_FAILED');
      }
      if (Date.now() + this.pollIntervalMs > deadline) {
        throw new UptimeError(`Timed out waiting for report ${reportId}`, 'REPORT_TIMEOUT', 504);
      }
      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
    }
  }
}
