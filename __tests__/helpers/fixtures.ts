// __tests__/helpers/fixtures.ts
import { createEngineConfig } from '@/config/engineConfig';
import { calculateDailyHours } from '@/services/TimeAccounting';
import { DailyHours, EngineConfig, RawEvent, WorkSession } from '@/types/access';
import { localDateTimeToInstant } from '@/utils/dateUtils';

export const TZ = 'America/Bogota';

export const testConfig: EngineConfig = createEngineConfig({ timezone: TZ });

export function rawEvent(
  employeeCode: string,
  localDateTime: string,
  direction: string | null,
): RawEvent {
  return { employeeCode, timestamp: localDateTime, direction };
}

export function instant(date: string, time: string): Date {
  return localDateTimeToInstant(date, time, TZ);
}

export function session(
  employeeCode: string,
  date: string,
  entry: string,
  exit: string | null,
  exitDate: string = date,
): WorkSession {
  return {
    employeeCode,
    date,
    entry: instant(date, entry),
    exit: exit === null ? null : instant(exitDate, exit),
  };
}

/** A day with one closed session of `hours` starting at 08:00 */
export function workedDay(
  employeeCode: string,
  date: string,
  hours: number,
  config: EngineConfig = testConfig,
): DailyHours {
  const entry = instant(date, '08:00');
  return calculateDailyHours(
    {
      employeeCode,
      date,
      sessions: [
        {
          employeeCode,
          date,
          entry,
          exit: new Date(entry.getTime() + hours * 3600 * 1000),
        },
      ],
    },
    config,
  );
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
