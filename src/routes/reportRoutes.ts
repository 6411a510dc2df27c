import { Router, Request, Response } from 'express';
import * as fs from 'fs-extra';
import { ReportQueue } from '../reports/reportQueue';
import { errorMessage } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export function createReportRouter(reportQueue: ReportQueue): Router {
  const router = Router();

  /**
   * POST /trigger_report
   * Starts a new report computation.
   */
  router.post('/trigger_report', async (_req: Request, res: Response) => {
    try {
      const reportId = await reportQueue.enqueueJob();
      res.json({ report_id: reportId });
    } catch (error) {
      logger.error(`Error triggering report: ${errorMessage(error)}`);
      res.status(500).json({ error: 'Failed to trigger report generation' });
    }
  });

  /**
   * GET /get_report?report_id=...
   * Running status while the report is computed, the CSV once it is complete.
   */
  router.get('/get_report', async (req: Request, res: Response) => {
    const reportId = typeof req.query.report_id === 'string' ? req.query.report_id.trim() : '';
    if (!reportId) {
      return res.status(400).json({ error: 'Missing report_id' });
    }

    try {
      const poll = await reportQueue.poll(reportId);
      if (!poll) {
        return res.status(404).json({ error: `Report with ID ${reportId} not found` });
      }

      if (poll.status === 'running') {
        return res.json({ status: 'Running' });
      }

      if (poll.status === 'failed') {
        logger.warn(`Report ${reportId} failed: ${poll.reason}`);
        return res.status(500).json({ status: 'Failed', error: poll.reason });
      }

      if (!(await fs.pathExists(poll.artifactPath))) {
        logger.error(`Report file for ${reportId} not found at ${poll.artifactPath}`);
        return res.status(404).json({ error: 'Report file not found' });
      }

      res.type('text/csv');
      return res.download(poll.artifactPath, `report_${reportId}.csv`);
    } catch (error) {
      logger.error(`Error retrieving report ${reportId}: ${errorMessage(error)}`);
      return res.status(500).json({ error: 'An error occurred while retrieving the report' });
    }
  });

  /**
   * GET /api/reports/jobs/:reportId
   * Returns the job record, including summary counts once finished.
   */
  router.get('/api/reports/jobs/:reportId', async (req: Request, res: Response) => {
    try {
      const job = await reportQueue.getJobStatus(req.params.reportId);
      if (!job) {
        return res.status(404).json({ error: 'Job not found' });
      }
      return res.json(job);
    } catch (error) {
      logger.error(`Error fetching job status: ${errorMessage(error)}`);
      return res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/reports/jobs/:reportId/cancel
   */
  router.post('/api/reports/jobs/:reportId/cancel', async (req: Request, res: Response) => {
    const { reportId } = req.params;
    try {
      const job = await reportQueue.getJobStatus(reportId);
      if (!job) {
        return res.status(404).json({ error: 'Job not found' });
      }
      const cancelled = await reportQueue.cancelJob(reportId);
      if (!cancelled) {
        return res.status(409).json({ error: `Report ${reportId} already ${job.status}` });
      }
      return res.status(202).json({ report_id: reportId, cancelled: true });
    } catch (error) {
      logger.error(`Error cancelling report ${reportId}: ${errorMessage(error)}`);
      return res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
