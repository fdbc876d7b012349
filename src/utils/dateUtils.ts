import {
  addDays,
  differenceInCalendarDays,
  format,
  getISODay,
  isValid,
  parse,
  parseISO,
} from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

export const DATE_KEY_FORMAT = 'yyyy-MM-dd';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const OFFSET_PATTERN = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function isValidDateKey(value: string): boolean {
  if (!DATE_KEY_PATTERN.test(value)) return false;
  const parsed = parse(value, DATE_KEY_FORMAT, new Date());
  return isValid(parsed) && format(parsed, DATE_KEY_FORMAT) === value;
}

function fromDateKey(dateKey: string): Date {
  return parse(dateKey, DATE_KEY_FORMAT, new Date());
}

export function addDaysToKey(dateKey: string, amount: number): string {
  return format(addDays(fromDateKey(dateKey), amount), DATE_KEY_FORMAT);
}

export function daysBetween(startKey: string, endKey: string): number {
  return differenceInCalendarDays(fromDateKey(endKey), fromDateKey(startKey));
}

export function eachDateKey(startKey: string, endKey: string): string[] {
  const keys: string[] = [];
  for (let key = startKey; key <= endKey; key = addDaysToKey(key, 1)) {
    keys.push(key);
  }
  return keys;
}

/** ISO weekday: 1 = Monday ... 7 = Sunday */
export function isoWeekday(dateKey: string): number {
  return getISODay(fromDateKey(dateKey));
}

export function isSunday(dateKey: string): boolean {
  return isoWeekday(dateKey) === 7;
}

export function toLocalDateKey(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, DATE_KEY_FORMAT);
}

export function toLocalTime(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, 'HH:mm:ss');
}

export function currentDateKey(timezone: string, now: Date = new Date()) {
  return toLocalDateKey(now, timezone);
}

/**
 * Wall-clock date and time in `timezone` to an instant.
 * `time` is HH:mm or HH:mm:ss.
 */
export function localDateTimeToInstant(
  dateKey: string,
  time: string,
  timezone: string,
): Date {
  const normalizedTime = time.length === 5 ? `${time}:00` : time;
  return fromZonedTime(`${dateKey}T${normalizedTime}`, timezone);
}

/**
 * Parses a raw timestamp. Strings with an explicit offset are absolute;
 * strings without one are read as wall-clock time in `timezone`.
 * Returns null when the value cannot be read as an instant.
 */
export function parseInstant(
  value: Date | string | null | undefined,
  timezone: string,
): Date | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }

  const trimmed = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?/.test(trimmed)) {
    return null;
  }

  const isoLike = trimmed.replace(' ', 'T');
  const instant = OFFSET_PATTERN.test(isoLike)
    ? parseISO(isoLike)
    : fromZonedTime(isoLike, timezone);

  return isValid(instant) ? instant : null;
}
