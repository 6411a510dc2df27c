/**
 * Reporting constants shared by the estimation pipeline and the report writer
 */
export const reportingConfig = {
  // Timezone applied to stores without a timezone record
  defaultTimezone: 'America/Chicago',

  // Trailing report windows, in milliseconds
  windows: {
    hour: 60 * 60 * 1000,
    day: 24 * 60 * 60 * 1000,
    week: 7 * 24 * 60 * 60 * 1000,
  },

  // A local end time at or after this many seconds into the day closes at midnight
  endOfDayThresholdSeconds: 23 * 3600 + 59 * 60 + 59,

  // Column order of the delivered report
  csvColumns: [
    'store_id',
    'uptime_last_hour',
    'uptime_last_day',
    'uptime_last_week',
    'downtime_last_hour',
    'downtime_last_day',
    'downtime_last_week',
  ],

  ingestion: {
    batchSize: 10000,
    files: {
      status: 'store_status.csv',
      businessHours: 'menu_hours.csv',
      timezones: 'timezones.csv',
    },
  },
} as const;

export type WindowName = keyof typeof reportingConfig.windows;
