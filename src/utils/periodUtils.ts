import { endOfMonth, format, parse } from 'date-fns';
import {
  AppError,
  BiweeklyPeriod,
  BiweeklyRule,
  DateRange,
  ErrorCode,
} from '../types/access';
import {
  addDaysToKey,
  daysBetween,
  isValidDateKey,
  isoWeekday,
  DATE_KEY_FORMAT,
} from './dateUtils';

const FIXED_PERIOD_DAYS = 14;

export function assertValidRange(range: DateRange): void {
  if (!isValidDateKey(range.startDate) || !isValidDateKey(range.endDate)) {
    throw new AppError({
      code: ErrorCode.INVALID_DATE_RANGE,
      message: 'Dates must use the yyyy-MM-dd format',
      details: { ...range },
    });
  }
  if (range.startDate > range.endDate) {
    throw new AppError({
      code: ErrorCode.INVALID_DATE_RANGE,
      message: `Start date ${range.startDate} is after end date ${range.endDate}`,
      details: { ...range },
    });
  }
}

// Monday to Sunday
export function getWeekRange(dateKey: string): DateRange {
  const startDate = addDaysToKey(dateKey, 1 - isoWeekday(dateKey));
  return { startDate, endDate: addDaysToKey(startDate, 6) };
}

export function getMonthRange(year: number, month: number): DateRange {
  const first = parse(
    `${year}-${String(month).padStart(2, '0')}-01`,
    DATE_KEY_FORMAT,
    new Date(),
  );
  return {
    startDate: format(first, DATE_KEY_FORMAT),
    endDate: format(endOfMonth(first), DATE_KEY_FORMAT),
  };
}

export function getFortnightPeriod(
  year: number,
  month: number,
  fortnight: 1 | 2,
): BiweeklyPeriod {
  const { startDate: monthStart, endDate: monthEnd } = getMonthRange(
    year,
    month,
  );
  const monthKey = monthStart.slice(0, 7);

  return fortnight === 1
    ? {
        periodId: `${monthKey}-Q1`,
        startDate: monthStart,
        endDate: `${monthKey}-15`,
      }
    : {
        periodId: `${monthKey}-Q2`,
        startDate: `${monthKey}-16`,
        endDate: monthEnd,
      };
}

export function getBiweeklyPeriodContaining(
  dateKey: string,
  rule: BiweeklyRule,
): BiweeklyPeriod {
  if (rule.kind === 'semi-monthly') {
    const [year, month, day] = dateKey.split('-').map(Number);
    return getFortnightPeriod(year, month, day <= 15 ? 1 : 2);
  }

  const offset = Math.floor(
    daysBetween(rule.anchorDate, dateKey) / FIXED_PERIOD_DAYS,
  );
  const startDate = addDaysToKey(rule.anchorDate, offset * FIXED_PERIOD_DAYS);
  return {
    periodId: `BW-${startDate}`,
    startDate,
    endDate: addDaysToKey(startDate, FIXED_PERIOD_DAYS - 1),
  };
}

/**
 * Returns the configured biweekly period that `range` matches exactly,
 * or null when the range is not aligned to the configured boundaries.
 */
export function resolveBiweeklyPeriod(
  range: DateRange,
  rule: BiweeklyRule,
): BiweeklyPeriod | null {
  const period = getBiweeklyPeriodContaining(range.startDate, rule);
  return period.startDate === range.startDate &&
    period.endDate === range.endDate
    ? period
    : null;
}

// Calendar weeks (Monday to Sunday) clipped to the range bounds
export function calendarWeekWindows(range: DateRange): DateRange[] {
  const windows: DateRange[] = [];
  let cursor = range.startDate;

  while (cursor <= range.endDate) {
    const week = getWeekRange(cursor);
    const endDate = week.endDate < range.endDate ? week.endDate : range.endDate;
    windows.push({ startDate: cursor, endDate });
    cursor = addDaysToKey(endDate, 1);
  }

  return windows;
}

// Every 7-day window inside the range; a shorter range is one window
export function rollingWeekWindows(range: DateRange): DateRange[] {
  const span = daysBetween(range.startDate, range.endDate) + 1;
  if (span <= 7) return [{ ...range }];

  const windows: DateRange[] = [];
  for (let offset = 0; offset + 7 <= span; offset++) {
    const startDate = addDaysToKey(range.startDate, offset);
    windows.push({ startDate, endDate: addDaysToKey(startDate, 6) });
  }
  return windows;
}
