import csvParser from 'csv-parser';
import * as fs from 'fs-extra';
import * as path from 'path';
import { SqliteStatusRepository, StatusTable, StoreTimezone } from '../storage/statusRepository';
import { BusinessHoursRule, Observation, StoreStatus } from '../uptime/contracts';
import { parseLocalTime, parseUtcTimestamp } from '../time/timeUtils';
import { reportingConfig } from '../config/reporting';
import { DataLoadError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

type CsvRow = Record<string, string>;

export interface LoadOptions {
  force?: boolean;
  batchSize?: number;
}

export interface TableLoadResult {
  table: StatusTable;
  loaded: number;
  skipped: number;
  alreadyLoaded: boolean;
}

const DAY_COLUMNS = ['day_of_week', 'day', 'dayOfWeek'];

function toCsvRow(chunk: unknown): CsvRow {
  const row: CsvRow = {};
  if (typeof chunk === 'object' && chunk !== null) {
    for (const [key, value] of Object.entries(chunk)) {
      row[key] = value === undefined || value === null ? '' : String(value);
    }
  }
  return row;
}

async function* readCsv(filePath: string): AsyncGenerator<CsvRow> {
  const rows: AsyncIterable<unknown> = fs
    .createReadStream(filePath)
    .pipe(csvParser({ mapHeaders: ({ header }) => header.trim() }));

  for await (const chunk of rows) {
    yield toCsvRow(chunk);
  }
}

function parseStatus(value: string | undefined): StoreStatus | null {
  const normalized = (value || '').trim().toLowerCase();
  return normalized === 'active' || normalized === 'inactive' ? normalized : null;
}

/**
 * Streams a CSV file through `parse`, flushing accepted records in batches.
 * Tables that already hold rows are left alone unless `force` is set.
 */
async function loadTable<T>(
  repository: SqliteStatusRepository,
  table: StatusTable,
  filePath: string,
  parse: (row: CsvRow) => T | null,
  flush: (batch: T[]) => void,
  options: LoadOptions
): Promise<TableLoadResult> {
  const existing = repository.countRows(table);
  if (existing > 0 && !options.force) {
    logger.info(`${table} already holds ${existing} rows. Skipping ${path.basename(filePath)}.`);
    return { table, loaded: 0, skipped: 0, alreadyLoaded: true };
  }
  if (existing > 0) {
    logger.info(`Clearing ${existing} rows from ${table} before reload`);
    repository.clearTable(table);
  }

  const batchSize = options.batchSize || reportingConfig.ingestion.batchSize;
  let batch: T[] = [];
  let loaded = 0;
  let skipped = 0;

  logger.info(`Loading ${table} from ${filePath}`);
  for await (const row of readCsv(filePath)) {
    const record = parse(row);
    if (record === null) {
      skipped++;
      continue;
    }
    batch.push(record);
    if (batch.length >= batchSize) {
      flush(batch);
      loaded += batch.length;
      batch = [];
      logger.debug(`Committed ${loaded} ${table} rows so far`);
    }
  }
  if (batch.length > 0) {
    flush(batch);
    loaded += batch.length;
  }

  logger.info(`Loaded ${loaded} ${table} rows`);
  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} invalid rows in ${path.basename(filePath)}`);
  }
  return { table, loaded, skipped, alreadyLoaded: false };
}

export function parseObservationRow(row: CsvRow): Observation | null {
  const storeId = (row.store_id || '').trim();
  const status = parseStatus(row.status);
  const timestampUtc = parseUtcTimestamp(row.timestamp_utc || '');
  if (!storeId || !status || timestampUtc === null) {
    return null;
  }
  return { storeId, status, timestampUtc };
}

export function parseBusinessHoursRow(row: CsvRow): BusinessHoursRule | null {
  const storeId = (row.store_id || '').trim();
  const dayColumn = DAY_COLUMNS.find(column => column in row);
  const dayText = dayColumn ? row[dayColumn].trim() : '';
  const dayOfWeek = Number(dayText);
  const startTimeLocal = (row.start_time_local || '').trim();
  const endTimeLocal = (row.end_time_local || '').trim();

  if (!storeId || dayText === '' || !Number.isInteger(dayOfWeek) || dayOfWeek < 0 || dayOfWeek > 6) {
    return null;
  }
  if (!parseLocalTime(startTimeLocal) || !parseLocalTime(endTimeLocal, { allowEndOfDay: true })) {
    return null;
  }
  return { storeId, dayOfWeek, startTimeLocal, endTimeLocal };
}

export function parseTimezoneRow(row: CsvRow): StoreTimezone | null {
  const storeId = (row.store_id || '').trim();
  const timezone = (row.timezone_str || '').trim();
  return storeId && timezone ? { storeId, timezone } : null;
}

export async function loadStoreStatus(
  repository: SqliteStatusRepository,
  filePath: string,
  options: LoadOptions = {}
): Promise<TableLoadResult> {
  return loadTable(repository, 'store_status', filePath, parseObservationRow,
    batch => repository.insertObservations(batch), options);
}

export async function loadBusinessHours(
  repository: SqliteStatusRepository,
  filePath: string,
  options: LoadOptions = {}
): Promise<TableLoadResult> {
  return loadTable(repository, 'business_hours', filePath, parseBusinessHoursRow,
    batch => repository.insertRules(batch), options);
}

export async function loadTimezones(
  repository: SqliteStatusRepository,
  filePath: string,
  options: LoadOptions = {}
): Promise<TableLoadResult> {
  return loadTable(repository, 'timezones', filePath, parseTimezoneRow,
    batch => repository.upsertTimezones(batch), options);
}

/**
 * Loads the three input exports from `dataDir` into the status database.
 */
export async function loadAllData(
  repository: SqliteStatusRepository,
  dataDir: string,
  options: LoadOptions = {}
): Promise<TableLoadResult[]> {
  if (!(await fs.pathExists(dataDir))) {
    throw new DataLoadError(`Data directory not found: ${dataDir}`);
  }

  const { files } = reportingConfig.ingestion;
  const statusPath = path.join(dataDir, files.status);
  const hoursPath = path.join(dataDir, files.businessHours);
  const timezonesPath = path.join(dataDir, files.timezones);

  for (const filePath of [statusPath, hoursPath, timezonesPath]) {
    if (!(await fs.pathExists(filePath))) {
      throw new DataLoadError(`Required file not found: ${filePath}`);
    }
  }

  logger.info(`Starting data loading from ${dataDir}`);
  const started = Date.now();
  const results = [
    await loadStoreStatus(repository, statusPath, options),
    await loadBusinessHours(repository, hoursPath, options),
    await loadTimezones(repository, timezonesPath, options),
  ];
  logger.info(`Data loading completed in ${((Date.now() - started) / 1000).toFixed(2)}s`);
  return results;
}
