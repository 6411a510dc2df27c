#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { loadConfig } from './config/config';
import { openDatabase } from './storage/database';
import { SqliteStatusRepository } from './storage/statusRepository';
import { loadAllData } from './ingestion/csvLoader';
import { ReportAggregator } from './reports/reportAggregator';
import { writeReportCsv } from './reports/reportWriter';
import { startServer } from './server';
import { ReportClient } from './client/reportClient';
import { parseUtcTimestamp, formatUtc } from './time/timeUtils';
import { errorMessage } from './utils/errorHandler';

function fail(error: unknown): never {
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('store-uptime')
    .description('Business-hours uptime and downtime reports for monitored stores')
    .version('1.0.0');

  program
    .command('load-data')
    .description('Load store_status.csv, menu_hours.csv and timezones.csv into the status database')
    .argument('[dir]', 'Directory holding the CSV exports')
    .option('-f, --force', 'Replace tables that already hold data', false)
    .action(async (dir: string | undefined, options: { force: boolean }) => {
      const config = loadConfig();
      const db = openDatabase(config.storage.databasePath);
      try {
        const results = await loadAllData(new SqliteStatusRepository(db), dir ? path.resolve(dir) : config.storage.dataDir, {
          force: options.force,
        });
        for (const result of results) {
          const note = result.alreadyLoaded ? chalk.gray('already loaded') : `${result.loaded} loaded, ${result.skipped} skipped`;
          console.log(chalk.green(`✓ ${result.table}: `) + note);
        }
      } catch (error) {
        fail(error);
      } finally {
        db.close();
      }
    });

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on')
    .option('--load-data', 'Load the CSV exports before listening', false)
    .action(async (options: { port?: string; loadData: boolean }) => {
      const config = loadConfig();
      if (options.port) {
        config.server.port = Number(options.port);
      }
      try {
        const running = await startServer(config, { loadData: options.loadData });
        const shutdown = () => {
          running.close().then(() => process.exit(0), fail);
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('generate')
    .description('Compute the report directly from the database and write it to a CSV file')
    .option('-n, --now <timestamp>', 'UTC reference time (defaults to the configured strategy)')
    .option('-o, --out <file>', 'Output file', 'report.csv')
    .action(async (options: { now?: string; out: string }) => {
      const config = loadConfig();
      const db = openDatabase(config.storage.databasePath);
      try {
        let now: number | undefined;
        if (options.now) {
          const parsed = parseUtcTimestamp(options.now);
          if (parsed === null) throw new Error(`Invalid --now timestamp: ${options.now}`);
          now = parsed;
        }

        const aggregator = new ReportAggregator(new SqliteStatusRepository(db), config.report);
        const report = await aggregator.generate({ now });
        await writeReportCsv(path.resolve(options.out), report.rows);

        console.log(chalk.green(`✓ ${report.rows.length} rows written to ${options.out} (reference time ${formatUtc(report.referenceTime)})`));
        if (report.skipped.length > 0) {
          console.log(chalk.yellow(`! ${report.skipped.length} stores skipped: ${report.skipped.map(s => s.storeId).join(', ')}`));
        }
        if (report.warnings.length > 0 || report.flags.length > 0) {
          console.log(chalk.gray(`${report.warnings.length} configuration warnings, ${report.flags.length} data quality flags`));
        }
      } catch (error) {
        fail(error);
      } finally {
        db.close();
      }
    });

  program
    .command('fetch')
    .description('Trigger a report on a running server, wait for it and download the CSV')
    .option('-u, --url <url>', 'Server base URL', 'http://localhost:8000')
    .option('-o, --out <file>', 'Output file', 'report.csv')
    .option('-i, --interval <ms>', 'Polling interval in milliseconds', '2000')
    .action(async (options: { url: string; out: string; interval: string }) => {
      try {
        const client = new ReportClient(options.url, { pollIntervalMs: Number(options.interval) });
        const reportId = await client.trigger();
        console.log(chalk.gray(`Report ${reportId} triggered`));

        const csv = await client.waitForReport(reportId, state => {
          if (state.status === 'running') console.log(chalk.gray('⟳ running...'));
        });
        await fs.outputFile(path.resolve(options.out), csv);
        console.log(chalk.green(`✓ Report ${reportId} saved to ${options.out}`));
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync().catch(fail);
}
