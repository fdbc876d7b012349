// services/TimeAccounting/PayrollSummarizer.ts

import {
  AppError,
  BiweeklyPeriod,
  DateRange,
  EngineConfig,
  ErrorCode,
  PayrollOptions,
  PayrollSummary,
  PeriodSummary,
} from '../../types/access';
import { PayrollUtils } from '../../utils/payrollUtils';
import { resolveBiweeklyPeriod } from '../../utils/periodUtils';
import { secondsToHours } from '../../utils/timeUtils';

/** The configured fortnight `range` covers exactly, or PERIOD_MISMATCH */
export function requireBiweeklyPeriod(
  range: DateRange,
  config: EngineConfig,
): BiweeklyPeriod {
  const period = resolveBiweeklyPeriod(range, config.biweekly);

  if (!period) {
    throw new AppError({
      code: ErrorCode.PERIOD_MISMATCH,
      message: `${range.startDate}..${range.endDate} is not a configured biweekly period`,
      details: {
        startDate: range.startDate,
        endDate: range.endDate,
        rule: config.biweekly.kind,
      },
    });
  }

  return period;
}

/**
 * Payroll view of a period summary. The summary must cover exactly one
 * configured fortnight; choosing the boundaries is the caller's job.
 */
export function summarizePayroll(
  summary: PeriodSummary,
  config: EngineConfig,
  options: PayrollOptions = {},
): PayrollSummary {
  const period = requireBiweeklyPeriod(
    { startDate: summary.startDate, endDate: summary.endDate },
    config,
  );

  const hours = PayrollUtils.toHoursBreakdown(
    PayrollUtils.sumClassifications(
      summary.days.map((day) => day.classification),
    ),
    config,
  );

  const payroll: PayrollSummary = {
    ...period,
    employeeCode: summary.employeeCode,
    regularHours: secondsToHours(summary.regularSeconds, config.rounding),
    overtimeHours: secondsToHours(summary.overtimeSeconds, config.rounding),
    incompleteDayCount: summary.days.filter((day) => day.incomplete).length,
    hours,
  };

  if (options.rates) {
    payroll.valuation = PayrollUtils.calculateHourValues(
      hours,
      options.rates,
      options.paysSundaySurcharge ?? false,
    );
  }

  return payroll;
}
