export type StoreStatus = 'active' | 'inactive';

/** Half-open `[start, end)` range in epoch milliseconds (UTC). */
export interface Interval {
  start: number;
  end: number;
}

export interface Observation {
  storeId: string;
  timestampUtc: number; // epoch ms
  status: StoreStatus;
}

export interface BusinessHoursRule {
  storeId: string;
  dayOfWeek: number; // 0 = Monday ... 6 = Sunday
  startTimeLocal: string; // HH:MM[:SS[.ffffff]]
  endTimeLocal: string;
}

export type ConfigurationWarningCode = 'INVALID_RULE' | 'OVERLAPPING_RULES' | 'UNKNOWN_TIMEZONE';

export interface ConfigurationWarning {
  code: ConfigurationWarningCode;
  message: string;
  rule?: BusinessHoursRule;
}

export type DataQualityFlagCode = 'UNOBSERVED_INTERVAL' | 'NO_OBSERVATIONS';

export interface DataQualityFlag {
  code: DataQualityFlagCode;
  message: string;
  interval?: Interval;
}

export interface TimelineSegment {
  interval: Interval;
  observations: Observation[]; // inside [start, end), ascending
  leading: Observation | null; // last observation before start
  trailing: Observation | null; // first observation at or after end
  unknown: boolean;
}

export interface WindowEstimate {
  uptimeMinutes: number;
  downtimeMinutes: number;
  businessMinutes: number;
  activeMs: number;
  inactiveMs: number;
  flags: DataQualityFlag[];
}

export interface TimeWindows {
  hour: Interval;
  day: Interval;
  week: Interval;
}

export interface ReportRow {
  storeId: string;
  uptimeLastHour: number;
  uptimeLastDay: number;
  uptimeLastWeek: number;
  downtimeLastHour: number;
  downtimeLastDay: number;
  downtimeLastWeek: number;
}
