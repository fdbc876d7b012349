// services/TimeAccounting/TimeAccountingEngine.ts

import {
  AttendanceStatistics,
  DailyHours,
  DateRange,
  EngineConfig,
  InvalidEventReport,
  PayrollOptions,
  PayrollSummary,
  PeriodSummary,
  RawEvent,
  WorkSession,
} from '../../types/access';
import { calculateDailyHours } from './DailyHoursCalculator';
import { normalizeEvents } from './EventNormalizer';
import {
  aggregatePeriod,
  computeAttendanceStatistics,
} from './PeriodAggregator';
import { summarizePayroll } from './PayrollSummarizer';
import { pairSessions } from './SessionPairer';

export interface DailyHoursResult {
  days: DailyHours[];
  rejected: InvalidEventReport[];
}

export interface PeriodSummariesResult {
  summaries: PeriodSummary[];
  rejected: InvalidEventReport[];
}

export interface PendingExit {
  employeeCode: string;
  date: string;
  openSession: WorkSession;
}

/**
 * Runs raw rows through normalizer, pairer, daily calculator and
 * aggregator. Holds nothing but the configuration it was built with.
 */
export class TimeAccountingEngine {
  constructor(private readonly config: EngineConfig) {}

  get configuration(): EngineConfig {
    return this.config;
  }

  computeDailyHours(rows: readonly RawEvent[]): DailyHoursResult {
    const { days, rejected } = normalizeEvents(rows, this.config);

    return {
      days: days.map((day) => {
        const pairing = pairSessions(day);
        return calculateDailyHours(
          {
            employeeCode: day.employeeCode,
            date: day.date,
            sessions: pairing.sessions,
            anomalies: [...day.anomalies, ...pairing.anomalies],
          },
          this.config,
        );
      }),
      rejected,
    };
  }

  /**
   * One summary per employee code. Codes listed in `employeeCodes` get a
   * summary even without rows; other employees appear in row order.
   */
  summarizePeriods(
    rows: readonly RawEvent[],
    range: DateRange,
    employeeCodes: readonly string[] = [],
  ): PeriodSummariesResult {
    const { days, rejected } = this.computeDailyHours(rows);
    const codes = new Set(employeeCodes);
    days.forEach((day) => codes.add(day.employeeCode));

    return {
      summaries: [...codes].map((code) =>
        aggregatePeriod(code, days, range, this.config),
      ),
      rejected,
    };
  }

  summarizePayroll(
    summary: PeriodSummary,
    options: PayrollOptions = {},
  ): PayrollSummary {
    return summarizePayroll(summary, this.config, options);
  }

  computeStatistics(
    summaries: readonly PeriodSummary[],
  ): AttendanceStatistics {
    return computeAttendanceStatistics(summaries);
  }

  /** Employees whose day `date` ends with a session still open */
  findPendingExits(rows: readonly RawEvent[], date: string): PendingExit[] {
    return this.computeDailyHours(rows)
      .days.filter((day) => day.date === date)
      .flatMap((day) => {
        const last = day.sessions[day.sessions.length - 1];
        return last && last.exit === null
          ? [{ employeeCode: day.employeeCode, date, openSession: last }]
          : [];
      });
  }
}
