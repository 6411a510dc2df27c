import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { Config, loadConfig } from './config/config';
import { logger } from './utils/logger';
import { errorMessage, withErrorHandling } from './utils/errorHandler';
import { openDatabase } from './storage/database';
import { SqliteStatusRepository } from './storage/statusRepository';
import { cleanupOrphanedTempFiles } from './storage/jsonStore';
import { loadAllData } from './ingestion/csvLoader';
import { ReportAggregator } from './reports/reportAggregator';
import { ReportRunner } from './reports/reportRunner';
import { ReportQueue } from './reports/reportQueue';
import { createReportRouter } from './routes/reportRoutes';

export function createApp(reportQueue: ReportQueue): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Welcome to the Store Uptime Reporting API' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use(createReportRouter(reportQueue));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Unhandled request error: ${errorMessage(err)}`);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export interface RunningServer {
  server: Server;
  reportQueue: ReportQueue;
  close(): Promise<void>;
}

/**
 * Wires storage, the report pipeline and the HTTP layer together and starts listening.
 */
export async function startServer(config: Config = loadConfig(), options: { loadData?: boolean } = {}): Promise<RunningServer> {
  logger.info('Starting Store Uptime Reporting API');

  const db = openDatabase(config.storage.databasePath);
  const repository = new SqliteStatusRepository(db);

  if (options.loadData) {
    await withErrorHandling(loadAllData, 'data load')(repository, config.storage.dataDir);
  }

  const removed = await cleanupOrphanedTempFiles(config.storage.stateDir)
    + await cleanupOrphanedTempFiles(config.storage.reportsDir);
  if (removed > 0) {
    logger.info(`Cleaned up ${removed} orphaned temp file(s) on startup`);
  }

  const aggregator = new ReportAggregator(repository, config.report);
  const runner = new ReportRunner(aggregator, config.storage.reportsDir);
  const reportQueue = new ReportQueue(config.storage.stateDir, runner, config.report.queuePollIntervalMs);
  await reportQueue.initialize();
  reportQueue.start();

  const app = createApp(reportQueue);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.server.port, () => resolve(listening));
  });
  logger.info(`Server listening on port ${config.server.port}`);

  return {
    server,
    reportQueue,
    close: () => new Promise<void>((resolve, reject) => {
      reportQueue.stop();
      server.close(err => {
        db.close();
        if (err) reject(err);
        else resolve();
      });
    }),
  };
}
