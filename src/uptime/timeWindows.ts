import { DateTime } from 'luxon';
import { TimeWindows } from './contracts';
import { reportingConfig } from '../config/reporting';

const { hour, day, week } = reportingConfig.windows;

/**
 * Builds the trailing last-hour, last-day and last-week ranges ending at `now`.
 */
export function buildTimeWindows(now: number | Date | DateTime): TimeWindows {
  const end = typeof now === 'number'
    ? now
    : now instanceof Date ? now.getTime() : now.toMillis();

  return {
    hour: { start: end - hour, end },
    day: { start: end - day, end },
    week: { start: end - week, end },
  };
}
