import { DateTime, IANAZone } from 'luxon';
import { reportingConfig } from '../config/reporting';

export interface LocalTime {
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  /** Closes at the next local midnight rather than at a wall-clock time. */
  endOfDay: boolean;
}

const LOCAL_TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;

/**
 * Parses a local wall-clock time such as `09:00`, `17:30:00` or `23:59:59.999`.
 * With `allowEndOfDay`, `24:00` and anything at or after 23:59:59 mean
 * "until midnight". Returns null for malformed input.
 */
export function parseLocalTime(value: string, options: { allowEndOfDay?: boolean } = {}): LocalTime | null {
  const match = LOCAL_TIME_PATTERN.exec(value.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = match[3] ? Number(match[3]) : 0;
  const millisecond = match[4] ? Math.floor(Number(`0.${match[4]}`) * 1000) : 0;

  if (minute > 59 || second > 59) return null;

  if (hour === 24) {
    if (!options.allowEndOfDay || minute !== 0 || second !== 0 || millisecond !== 0) return null;
    return { hour: 0, minute: 0, second: 0, millisecond: 0, endOfDay: true };
  }
  if (hour > 23) return null;

  const secondsOfDay = hour * 3600 + minute * 60 + second;
  const endOfDay = Boolean(options.allowEndOfDay) && secondsOfDay >= reportingConfig.endOfDayThresholdSeconds;
  return { hour, minute, second, millisecond, endOfDay };
}

export function localTimeToMillisOfDay(time: LocalTime): number {
  if (time.endOfDay) return 24 * 3600 * 1000;
  return ((time.hour * 60 + time.minute) * 60 + time.second) * 1000 + time.millisecond;
}

/**
 * Places a wall-clock time on the given local calendar day. Times that fall in
 * a spring-forward gap are shifted forward by luxon.
 */
export function atLocalTime(day: DateTime, time: LocalTime): DateTime {
  const midnight = day.startOf('day');
  if (time.endOfDay) {
    return midnight.plus({ days: 1 }).startOf('day');
  }
  return midnight.set({
    hour: time.hour,
    minute: time.minute,
    second: time.second,
    millisecond: time.millisecond,
  });
}

/** Monday = 0 ... Sunday = 6 */
export function localDayOfWeek(day: DateTime): number {
  return day.weekday - 1;
}

export function isValidTimezone(name: string): boolean {
  return IANAZone.isValidZone(name);
}

/**
 * Parses a UTC timestamp. Accepts ISO-8601 and the poller export format
 * `2023-01-22 12:09:39.388884 UTC`. Offsetless values are read as UTC.
 */
export function parseUtcTimestamp(raw: string): number | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const normalized = trimmed
    .replace(/\s*UTC$/i, 'Z')
    .replace(/^(\d{4}-\d{2}-\d{2})\s+/, '$1T');

  const parsed = DateTime.fromISO(normalized, { zone: 'utc' });
  return parsed.isValid ? parsed.toMillis() : null;
}

export function formatUtc(ms: number): string {
  return DateTime.fromMillis(ms, { zone: 'utc' }).toISO() || new Date(ms).toISOString();
}

/**
 * Gets the current time as an ISO string.
 */
export function getNowISO(): string {
  return new Date().toISOString();
}
