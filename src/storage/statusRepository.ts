import { SqliteDatabase } from './database';
import { BusinessHoursRule, Observation, StoreStatus } from '../uptime/contracts';

/**
 * Read side consumed by the report pipeline.
 */
export interface StatusRepository {
  listStoreIds(): Promise<string[]>;
  getRules(storeId: string): Promise<BusinessHoursRule[]>;
  getTimezone(storeId: string): Promise<string | null>;
  /**
   * Observations with `fromUtc <= t <= toUtc`, ascending, plus the closest
   * observation before `fromUtc` and the closest after `toUtc` when they exist.
   */
  getObservations(storeId: string, fromUtc: number, toUtc: number): Promise<Observation[]>;
  getLatestObservationTime(): Promise<number | null>;
}

export type StatusTable = 'store_status' | 'business_hours' | 'timezones';

export interface StoreTimezone {
  storeId: string;
  timezone: string;
}

interface ObservationRow {
  store_id: string;
  timestamp_utc: number;
  status: StoreStatus;
}

interface RuleRow {
  store_id: string;
  day_of_week: number;
  start_time_local: string;
  end_time_local: string;
}

function toObservation(row: ObservationRow): Observation {
  return { storeId: row.store_id, timestampUtc: row.timestamp_utc, status: row.status };
}

export class SqliteStatusRepository implements StatusRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async listStoreIds(): Promise<string[]> {
    const rows = this.db.prepare<[], { store_id: string }>(`
      SELECT store_id FROM store_status
      UNION SELECT store_id FROM business_hours
      UNION SELECT store_id FROM timezones
      ORDER BY store_id
    `).all();
    return rows.map(row => row.store_id);
  }

  async getRules(storeId: string): Promise<BusinessHoursRule[]> {
    const rows = this.db.prepare<[string], RuleRow>(`
      SELECT store_id, day_of_week, start_time_local, end_time_local
      FROM business_hours WHERE store_id = ? ORDER BY day_of_week, start_time_local, id
    `).all(storeId);

    return rows.map(row => ({
      storeId: row.store_id,
      dayOfWeek: row.day_of_week,
      startTimeLocal: row.start_time_local,
      endTimeLocal: row.end_time_local,
    }));
  }

  async getTimezone(storeId: string): Promise<string | null> {
    const row = this.db.prepare<[string], { timezone_str: string }>(
      'SELECT timezone_str FROM timezones WHERE store_id = ?'
    ).get(storeId);
    return row ? row.timezone_str : null;
  }

  async getObservations(storeId: string, fromUtc: number, toUtc: number): Promise<Observation[]> {
    const before = this.db.prepare<[string, number], ObservationRow>(`
      SELECT store_id, timestamp_utc, status FROM store_status
      WHERE store_id = ? AND timestamp_utc < ?
      ORDER BY timestamp_utc DESC, id DESC LIMIT 1
    `).get(storeId, fromUtc);

    const inside = this.db.prepare<[string, number, number], ObservationRow>(`
      SELECT store_id, timestamp_utc, status FROM store_status
      WHERE store_id = ? AND timestamp_utc >= ? AND timestamp_utc <= ?
      ORDER BY timestamp_utc ASC, id ASC
    `).all(storeId, fromUtc, toUtc);

    // Last row written at the earliest instant after the range
    const after = this.db.prepare<[string, string, number], ObservationRow>(`
      SELECT store_id, timestamp_utc, status FROM store_status
      WHERE store_id = ? AND timestamp_utc = (
        SELECT MIN(timestamp_utc) FROM store_status WHERE store_id = ? AND timestamp_utc > ?
      )
      ORDER BY id DESC LIMIT 1
    `).get(storeId, storeId, toUtc);

    return [
      ...(before ? [toObservation(before)] : []),
      ...inside.map(toObservation),
      ...(after ? [toObservation(after)] : []),
    ];
  }

  async getLatestObservationTime(): Promise<number | null> {
    const row = this.db.prepare<[], { latest: number | null }>(
      'SELECT MAX(timestamp_utc) AS latest FROM store_status'
    ).get();
    return row && row.latest !== null ? row.latest : null;
  }

  countRows(table: StatusTable): number {
    const row = this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
    return row ? row.total : 0;
  }

  clearTable(table: StatusTable): void {
    this.db.prepare(`DELETE FROM ${table}`).run();
  }

  insertObservations(observations: Observation[]): void {
    const insert = this.db.prepare<[string, number, StoreStatus]>(
      'INSERT INTO store_status (store_id, timestamp_utc, status) VALUES (?, ?, ?)'
    );
    this.db.transaction((batch: Observation[]) => {
      for (const observation of batch) {
        insert.run(observation.storeId, observation.timestampUtc, observation.status);
      }
    })(observations);
  }

  insertRules(rules: BusinessHoursRule[]): void {
    const insert = this.db.prepare<[string, number, string, string]>(
      'INSERT INTO business_hours (store_id, day_of_week, start_time_local, end_time_local) VALUES (?, ?, ?, ?)'
    );
    this.db.transaction((batch: BusinessHoursRule[]) => {
      for (const rule of batch) {
        insert.run(rule.storeId, rule.dayOfWeek, rule.startTimeLocal, rule.endTimeLocal);
      }
    })(rules);
  }

  upsertTimezones(timezones: StoreTimezone[]): void {
    const upsert = this.db.prepare<[string, string]>(
      'INSERT OR REPLACE INTO timezones (store_id, timezone_str) VALUES (?, ?)'
    );
    this.db.transaction((batch: StoreTimezone[]) => {
      for (const entry of batch) {
        upsert.run(entry.storeId, entry.timezone);
      }
    })(timezones);
  }
}
