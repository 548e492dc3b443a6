import { addDays, format, parseISO, startOfMonth, startOfWeek, startOfYear, subDays } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { AppError } from '../../utils/appError.js';
import { CommissionPeriod } from '../../utils/constants.js';

const DAY = 'yyyy-MM-dd';

export interface PeriodRange {
  period: CommissionPeriod;
  /** First calendar day, inclusive. */
  startDay: string;
  /** Last calendar day, inclusive. */
  endDay: string;
  /** Instant the first day starts in the shop's time zone. */
  start: Date;
  /** Instant the day after `endDay` starts; use with `$lt`. */
  end: Date;
  label: string;
}

export interface PeriodOptions {
  startDate?: string;
  endDate?: string;
  /** Custom ranges without dates fall back to the last 7 days for tailors, month-to-date otherwise. */
  audience: 'tailor' | 'admin';
  timeZone: string;
  now?: Date;
}

const toDay = (value: Date) => format(value, DAY);

/** Instant a calendar day begins in `timeZone`. */
export function zonedDayStart(day: string, timeZone: string): Date {
  return fromZonedTime(`${day}T00:00:00`, timeZone);
}

/** Instant the day after `day` begins in `timeZone`. */
export function zonedDayEnd(day: string, timeZone: string): Date {
  return zonedDayStart(toDay(addDays(parseISO(day), 1)), timeZone);
}

function customStartDay(today: Date, audience: PeriodOptions['audience']) {
  return audience === 'tailor' ? subDays(today, 7) : startOfMonth(today);
}

/**
 * Calendar range of a reporting period. Days are counted in the shop's time
 * zone: weeks start on Monday, months on the 1st, years on January 1.
 */
export function resolvePeriod(period: CommissionPeriod, options: PeriodOptions): PeriodRange {
  const todayDay = formatInTimeZone(options.now ?? new Date(), options.timeZone, DAY);
  const today = parseISO(todayDay);

  let startDay: string;
  let endDay = todayDay;

  switch (period) {
    case CommissionPeriod.WEEKLY:
      startDay = toDay(startOfWeek(today, { weekStartsOn: 1 }));
      break;
    case CommissionPeriod.MONTHLY:
      startDay = toDay(startOfMonth(today));
      break;
    case CommissionPeriod.YEARLY:
      startDay = toDay(startOfYear(today));
      break;
    case CommissionPeriod.CUSTOM:
      if (options.startDate && options.endDate) {
        startDay = options.startDate;
        endDay = options.endDate;
      } else {
        startDay = toDay(customStartDay(today, options.audience));
      }
      break;
  }

  if (startDay > endDay) {
    throw AppError.badRequest('Start date must be on or before end date');
  }

  return {
    period,
    startDay,
    endDay,
    start: zonedDayStart(startDay, options.timeZone),
    end: zonedDayEnd(endDay, options.timeZone),
    label: `${format(parseISO(startDay), 'MMMM d, yyyy')} - ${format(parseISO(endDay), 'MMMM d, yyyy')}`,
  };
}

/**
 * The last `count` calendar days in `timeZone`, oldest first, ending today.
 */
export function recentDays(count: number, timeZone: string, now: Date = new Date()): string[] {
  const today = parseISO(formatInTimeZone(now, timeZone, DAY));
  return Array.from({ length: count }, (_, i) => toDay(subDays(today, count - 1 - i)));
}
