import { DateTime } from 'luxon';
import { BusinessHoursRule, ConfigurationWarning, Interval } from './contracts';
import { assertValidInterval, intersect, mergeIntervals } from './intervals';
import {
  LocalTime,
  atLocalTime,
  isValidTimezone,
  localDayOfWeek,
  localTimeToMillisOfDay,
  parseLocalTime,
} from '../time/timeUtils';
import { reportingConfig } from '../config/reporting';

const DAY_MS = 24 * 60 * 60 * 1000;
const WEEK_MS = 7 * DAY_MS;

interface CompiledRule {
  dayOfWeek: number;
  open: LocalTime;
  close: LocalTime;
  /** Close time belongs to the following local day. */
  wrapsMidnight: boolean;
  source?: BusinessHoursRule;
}

export interface ResolverOptions {
  defaultTimezone?: string;
}

const MIDNIGHT: LocalTime = { hour: 0, minute: 0, second: 0, millisecond: 0, endOfDay: false };
const END_OF_DAY: LocalTime = { ...MIDNIGHT, endOfDay: true };

const ALL_DAY_SCHEDULE: CompiledRule[] = [0, 1, 2, 3, 4, 5, 6].map(dayOfWeek => ({
  dayOfWeek,
  open: MIDNIGHT,
  close: END_OF_DAY,
  wrapsMidnight: false,
}));

function describeRule(rule: BusinessHoursRule): string {
  return `store ${rule.storeId} day ${rule.dayOfWeek} ${rule.startTimeLocal}-${rule.endTimeLocal}`;
}

/**
 * Maps a store's weekly local-time schedule onto UTC.
 *
 * Rules are validated once at construction; invalid ones are dropped and
 * reported through `warnings`. A store with no usable rule is open all day,
 * every day. Open and close times are applied on each local calendar day and
 * converted afterwards, so on DST transition days a span's UTC length differs
 * from its wall-clock length.
 */
export class BusinessHoursResolver {
  readonly timezone: string;
  readonly warnings: ConfigurationWarning[] = [];
  readonly usesDefaultSchedule: boolean;
  private readonly rulesByDay: CompiledRule[][];

  constructor(timezone: string | null | undefined, rules: BusinessHoursRule[], options: ResolverOptions = {}) {
    const fallbackZone = options.defaultTimezone || reportingConfig.defaultTimezone;

    if (!timezone) {
      this.timezone = fallbackZone;
    } else if (isValidTimezone(timezone)) {
      this.timezone = timezone;
    } else {
      this.timezone = fallbackZone;
      this.warnings.push({
        code: 'UNKNOWN_TIMEZONE',
        message: `Unknown timezone "${timezone}", using ${fallbackZone}`,
      });
    }

    const compiled = this.compileRules(rules);
    this.usesDefaultSchedule = compiled.length === 0;
    const schedule = this.usesDefaultSchedule ? ALL_DAY_SCHEDULE : compiled;

    this.rulesByDay = [[], [], [], [], [], [], []];
    for (const rule of schedule) {
      this.rulesByDay[rule.dayOfWeek].push(rule);
    }
    this.checkOverlaps(schedule);
  }

  /**
   * Returns the ordered, disjoint UTC sub-intervals of `interval` that fall
   * inside business hours.
   */
  resolve(interval: Interval): Interval[] {
    assertValidInterval(interval, 'window');

    const zone = this.timezone;
    // Start one day early so spans opened the previous evening are seen.
    let day = DateTime.fromMillis(interval.start, { zone }).startOf('day').minus({ days: 1 });
    const lastDay = DateTime.fromMillis(interval.end, { zone }).startOf('day');

    const spans: Interval[] = [];
    while (day.toMillis() <= lastDay.toMillis()) {
      const nextDay = day.plus({ days: 1 }).startOf('day');

      for (const rule of this.rulesByDay[localDayOfWeek(day)]) {
        const open = atLocalTime(day, rule.open);
        const close = atLocalTime(rule.wrapsMidnight ? nextDay : day, rule.close);
        const span = intersect({ start: open.toMillis(), end: close.toMillis() }, interval);
        if (span) spans.push(span);
      }

      day = nextDay;
    }

    return mergeIntervals(spans);
  }

  private compileRules(rules: BusinessHoursRule[]): CompiledRule[] {
    const compiled: CompiledRule[] = [];

    for (const rule of rules) {
      if (!Number.isInteger(rule.dayOfWeek) || rule.dayOfWeek < 0 || rule.dayOfWeek > 6) {
        this.invalid(rule, `day of week must be 0-6`);
        continue;
      }

      const open = parseLocalTime(rule.startTimeLocal);
      const close = parseLocalTime(rule.endTimeLocal, { allowEndOfDay: true });
      if (!open || !close) {
        this.invalid(rule, 'malformed time');
        continue;
      }

      const openMs = localTimeToMillisOfDay(open);
      const closeMs = localTimeToMillisOfDay(close);
      if (openMs === closeMs) {
        this.invalid(rule, 'start equals end');
        continue;
      }

      compiled.push({
        dayOfWeek: rule.dayOfWeek,
        open,
        close,
        wrapsMidnight: closeMs < openMs,
        source: rule,
      });
    }

    return compiled;
  }

  private invalid(rule: BusinessHoursRule, reason: string): void {
    this.warnings.push({
      code: 'INVALID_RULE',
      message: `Skipping business hours rule (${describeRule(rule)}): ${reason}`,
      rule,
    });
  }

  // Overlapping rules are coalesced by resolve(); they are only reported here.
  private checkOverlaps(schedule: CompiledRule[]): void {
    const weekSpans = schedule.map(rule => {
      const start = rule.dayOfWeek * DAY_MS + localTimeToMillisOfDay(rule.open);
      const closeMs = localTimeToMillisOfDay(rule.close);
      return { rule, start, end: rule.dayOfWeek * DAY_MS + closeMs + (rule.wrapsMidnight ? DAY_MS : 0) };
    });
    // Spans running past the end of Sunday continue into Monday.
    const spilled = weekSpans
      .filter(span => span.end > WEEK_MS)
      .map(span => ({ rule: span.rule, start: span.start - WEEK_MS, end: span.end - WEEK_MS }));
    const spans = [...spilled, ...weekSpans].sort((a, b) => a.start - b.start);

    const reported = new Set<CompiledRule>();
    let furthestEnd = -Infinity;
    for (const span of spans) {
      const source = span.rule.source;
      if (span.start < furthestEnd && source && !reported.has(span.rule)) {
        reported.add(span.rule);
        this.warnings.push({
          code: 'OVERLAPPING_RULES',
          message: `Business hours rule overlaps another rule (${describeRule(source)})`,
          rule: source,
        });
      }
      furthestEnd = Math.max(furthestEnd, span.end);
    }
  }
}

/**
 * One-shot form of {@link BusinessHoursResolver.resolve}.
 */
export function resolveBusinessHours(
  timezone: string | null | undefined,
  rules: BusinessHoursRule[],
  interval: Interval,
  options: ResolverOptions = {}
): { intervals: Interval[]; warnings: ConfigurationWarning[] } {
  const resolver = new BusinessHoursResolver(timezone, rules, options);
  return { intervals: resolver.resolve(interval), warnings: resolver.warnings };
}
