// services/TimeAccounting/PeriodAggregator.ts

import {
  AttendanceStatistics,
  DailyHours,
  DateRange,
  EmployeeAttendanceStatistics,
  EngineConfig,
  PeriodAlert,
  PeriodSummary,
} from '../../types/access';
import {
  assertValidRange,
  calendarWeekWindows,
  rollingWeekWindows,
} from '../../utils/periodUtils';

function sumWorked(days: readonly DailyHours[], window: DateRange): number {
  return days
    .filter((day) => day.date >= window.startDate && day.date <= window.endDate)
    .reduce((sum, day) => sum + day.workedSeconds, 0);
}

function buildAlerts(
  days: readonly DailyHours[],
  range: DateRange,
  config: EngineConfig,
): PeriodAlert[] {
  const alerts: PeriodAlert[] = [];

  for (const day of days) {
    if (day.workedSeconds > config.dailyOvertimeThresholdSeconds) {
      alerts.push({
        kind: 'EXCESS_DAILY',
        date: day.date,
        workedSeconds: day.workedSeconds,
        thresholdSeconds: config.dailyOvertimeThresholdSeconds,
      });
    }
  }

  const windows =
    config.weeklyWindow === 'rolling'
      ? rollingWeekWindows(range)
      : calendarWeekWindows(range);

  for (const window of windows) {
    const workedSeconds = sumWorked(days, window);
    if (workedSeconds > config.weeklyOvertimeThresholdSeconds) {
      alerts.push({
        kind: 'EXCESS_WEEKLY',
        windowStart: window.startDate,
        windowEnd: window.endDate,
        workedSeconds,
        thresholdSeconds: config.weeklyOvertimeThresholdSeconds,
      });
    }
  }

  const incompleteDates = days
    .filter((day) => day.incomplete)
    .map((day) => day.date);
  if (incompleteDates.length > 0) {
    alerts.push({ kind: 'INCOMPLETE_DAYS', dates: incompleteDates });
  }

  return alerts;
}

/**
 * Rolls the daily results of one employee into a summary for
 * [startDate, endDate]. Days outside the range are ignored.
 */
export function aggregatePeriod(
  employeeCode: string,
  dailyHours: readonly DailyHours[],
  range: DateRange,
  config: EngineConfig,
): PeriodSummary {
  assertValidRange(range);

  const days = dailyHours
    .filter(
      (day) =>
        day.employeeCode === employeeCode &&
        day.date >= range.startDate &&
        day.date <= range.endDate,
    )
    .sort((a, b) => a.date.localeCompare(b.date));

  return {
    employeeCode,
    startDate: range.startDate,
    endDate: range.endDate,
    totalSeconds: days.reduce((sum, day) => sum + day.workedSeconds, 0),
    regularSeconds: days.reduce((sum, day) => sum + day.regularSeconds, 0),
    overtimeSeconds: days.reduce((sum, day) => sum + day.overtimeSeconds, 0),
    days,
    alerts: buildAlerts(days, range, config),
  };
}

function employeeStatistics(
  summary: PeriodSummary,
): EmployeeAttendanceStatistics {
  const daysWorked = summary.days.filter((day) => day.workedSeconds > 0).length;
  return {
    employeeCode: summary.employeeCode,
    daysWithRecords: summary.days.length,
    daysWorked,
    incompleteDays: summary.days.filter((day) => day.incomplete).length,
    totalSeconds: summary.totalSeconds,
    averageWorkedSecondsPerDay:
      daysWorked > 0 ? Math.round(summary.totalSeconds / daysWorked) : 0,
  };
}

export function computeAttendanceStatistics(
  summaries: readonly PeriodSummary[],
): AttendanceStatistics {
  const employees = summaries.map(employeeStatistics);
  const daysWorked = employees.reduce((sum, e) => sum + e.daysWorked, 0);
  const totalSeconds = employees.reduce((sum, e) => sum + e.totalSeconds, 0);

  return {
    employeeCount: employees.length,
    daysWithRecords: employees.reduce((sum, e) => sum + e.daysWithRecords, 0),
    daysWorked,
    incompleteDays: employees.reduce((sum, e) => sum + e.incompleteDays, 0),
    totalSeconds,
    averageWorkedSecondsPerDay:
      daysWorked > 0 ? Math.round(totalSeconds / daysWorked) : 0,
    employees,
  };
}
