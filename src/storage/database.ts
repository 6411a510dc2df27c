import Database from 'better-sqlite3';
import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS store_status (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    store_id TEXT NOT NULL,
    timestamp_utc INTEGER NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('active', 'inactive'))
  );
  CREATE INDEX IF NOT EXISTS idx_store_status_store_ts ON store_status (store_id, timestamp_utc);
  CREATE INDEX IF NOT EXISTS idx_store_status_ts ON store_status (timestamp_utc);

  CREATE TABLE IF NOT EXISTS business_hours (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    store_id TEXT NOT NULL,
    day_of_week INTEGER NOT NULL,
    start_time_local TEXT NOT NULL,
    end_time_local TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_business_hours_store ON business_hours (store_id);

  CREATE TABLE IF NOT EXISTS timezones (
    store_id TEXT PRIMARY KEY,
    timezone_str TEXT NOT NULL
  );
`;

/**
 * Opens (creating if needed) the status database and applies the schema.
 * Pass `:memory:` for a throwaway in-process database.
 */
export function openDatabase(databasePath: string): SqliteDatabase {
  if (databasePath !== ':memory:') {
    fs.ensureDirSync(path.dirname(databasePath));
  }

  const db = new Database(databasePath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  logger.debug(`Opened status database at ${databasePath}`);
  return db;
}
