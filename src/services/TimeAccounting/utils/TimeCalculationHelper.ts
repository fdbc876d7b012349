// services/TimeAccounting/utils/TimeCalculationHelper.ts

import { NightWindow } from '../../../types/access';
import {
  addDaysToKey,
  localDateTimeToInstant,
  toLocalDateKey,
} from '../../../utils/dateUtils';

function minutesToClock(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  return `${String(hours).padStart(2, '0')}:${String(minutes % 60).padStart(2, '0')}`;
}

export class TimeCalculationHelper {
  static overlapSeconds(
    start: Date,
    end: Date,
    windowStart: Date,
    windowEnd: Date,
  ): number {
    const from = Math.max(start.getTime(), windowStart.getTime());
    const to = Math.min(end.getTime(), windowEnd.getTime());
    return to > from ? Math.floor((to - from) / 1000) : 0;
  }

  /**
   * Seconds of [entry, exit] that fall inside the nightly window in local
   * time. The window may wrap midnight (21:00-06:00).
   */
  static calculateNightSeconds(
    entry: Date,
    exit: Date,
    window: NightWindow,
    timezone: string,
  ): number {
    if (window.startMinute === window.endMinute || exit <= entry) return 0;

    const wraps = window.startMinute > window.endMinute;
    const startClock = minutesToClock(window.startMinute);
    const endClock = minutesToClock(window.endMinute);
    const lastDate = toLocalDateKey(exit, timezone);

    let total = 0;
    for (
      let date = addDaysToKey(toLocalDateKey(entry, timezone), -1);
      date <= lastDate;
      date = addDaysToKey(date, 1)
    ) {
      const windowStart = localDateTimeToInstant(date, startClock, timezone);
      const windowEnd = localDateTimeToInstant(
        wraps ? addDaysToKey(date, 1) : date,
        endClock,
        timezone,
      );
      total += this.overlapSeconds(entry, exit, windowStart, windowEnd);
    }

    return total;
  }
}
