// services/AccessReportService.ts

import { describeConfig } from '../config/engineConfig';
import {
  AccessRecord,
  AppError,
  AttendanceStatistics,
  BiweeklyPeriod,
  ConfigSnapshot,
  ConfigurationEntry,
  DailyHours,
  DateRange,
  Employee,
  EmployeeFilters,
  ErrorCode,
  InvalidEventReport,
  PayRates,
  PayrollSummary,
  PeriodSummary,
  RawEvent,
  RecordFilters,
  WorkplaceRecordCounts,
} from '../types/access';
import {
  addDaysToKey,
  currentDateKey,
  isValidDateKey,
  toLocalTime,
} from '../utils/dateUtils';
import { createLogger } from '../utils/loggers';
import {
  assertValidRange,
  getBiweeklyPeriodContaining,
  getFortnightPeriod,
  getMonthRange,
  getWeekRange,
} from '../utils/periodUtils';
import { roundTo, SECONDS_PER_HOUR } from '../utils/timeUtils';
import { AccessLogRepository } from './AccessLogRepository';
import {
  calculateDailyHours,
  requireBiweeklyPeriod,
  TimeAccountingEngine,
} from './TimeAccounting';

const logger = createLogger('AccessReportService');

export type Clock = () => Date;

export type NextAction = 'ENTRADA' | 'SALIDA';

export interface EmployeeListResult {
  total: number;
  employees: Employee[];
}

export interface EmployeeSearchResult extends EmployeeListResult {
  term: string;
}

export interface RecordListResult extends DateRange {
  total: number;
  records: AccessRecord[];
}

export interface LastRecordResult {
  employee: Employee;
  lastRecord: AccessRecord | null;
  nextAction: NextAction;
}

export interface PendingExitEntry {
  employeeId: string | null;
  employeeCode: string;
  employeeName: string | null;
  workplace: string | null;
  entryTime: string;
  elapsedHours: number;
}

export interface PendingExitsResult {
  date: string;
  total: number;
  employees: PendingExitEntry[];
}

export interface DailyHoursReport {
  employee: Employee;
  day: DailyHours;
  rejected: InvalidEventReport[];
}

export interface PeriodReport extends DateRange {
  totalEmployees: number;
  summaries: PeriodSummary[];
  rejected: InvalidEventReport[];
}

export interface RecordTotals {
  records: number;
  uniqueEmployees: number;
  entries: number;
  exits: number;
  forced: number;
}

export interface AttendanceStatisticsReport extends DateRange {
  totals: RecordTotals;
  byWorkplace: WorkplaceRecordCounts[];
  hours: AttendanceStatistics;
}

export interface ConfigurationReport {
  engine: ConfigSnapshot;
  total: number;
  entries: ConfigurationEntry[];
}

export interface PayrollEmployeeSummary extends PayrollSummary {
  employeeName: string | null;
}

export interface PayrollReport extends BiweeklyPeriod {
  rates: PayRates;
  totalEmployees: number;
  totals: {
    regularHours: number;
    overtimeHours: number;
    amount: number;
  };
  employees: PayrollEmployeeSummary[];
  rejected: InvalidEventReport[];
}

export interface ReportScope {
  employee?: string | null;
  workplace?: string | null;
}

export interface WeeklyReportRequest extends ReportScope {
  date?: string | null;
}

export interface MonthlyReportRequest extends ReportScope {
  year: number;
  month: number;
}

/**
 * A payroll period is picked by year/month/fortnight (semi-monthly
 * calendars), by any date inside it, or by its exact bounds.
 */
export interface PayrollRequest extends ReportScope {
  year?: number | null;
  month?: number | null;
  fortnight?: 1 | 2 | null;
  date?: string | null;
  range?: DateRange | null;
}

// Sessions may start the day before or end the day after the requested dates
function eventWindow(range: DateRange): DateRange {
  return {
    startDate: addDaysToKey(range.startDate, -1),
    endDate: addDaysToKey(range.endDate, 1),
  };
}

function assertDateKey(value: string, field: string): void {
  if (!isValidDateKey(value)) {
    throw new AppError({
      code: ErrorCode.INVALID_INPUT,
      message: `${field} must be a yyyy-MM-dd date`,
      details: { [field]: value },
    });
  }
}

export class AccessReportService {
  constructor(
    private readonly repository: AccessLogRepository,
    private readonly engine: TimeAccountingEngine,
    private readonly clock: Clock = () => new Date(),
  ) {}

  private get timezone(): string {
    return this.engine.configuration.timezone;
  }

  private today(): string {
    return currentDateKey(this.timezone, this.clock());
  }

  private async resolveEmployee(
    reference: string | null | undefined,
  ): Promise<Employee | null> {
    return reference ? this.repository.fetchEmployee(reference) : null;
  }

  private async summarize(
    range: DateRange,
    scope: ReportScope,
  ): Promise<PeriodReport> {
    assertValidRange(range);
    const employee = await this.resolveEmployee(scope.employee);
    const rows = await this.repository.fetchEvents({
      ...eventWindow(range),
      employeeCode: employee?.code ?? null,
      workplace: scope.workplace ?? null,
    });

    const requested = employee ? [employee.code] : [];
    const { summaries, rejected } = this.engine.summarizePeriods(
      rows,
      range,
      requested,
    );
    const relevant = summaries.filter(
      (summary) =>
        summary.days.length > 0 || requested.includes(summary.employeeCode),
    );

    if (rejected.length > 0) {
      logger.warn(`Rejected ${rejected.length} malformed events`, {
        range,
        rejected,
      });
    }

    return {
      startDate: range.startDate,
      endDate: range.endDate,
      totalEmployees: relevant.length,
      summaries: relevant,
      rejected,
    };
  }

  async listEmployees(filters: EmployeeFilters): Promise<EmployeeListResult> {
    const employees = await this.repository.listEmployees(filters);
    return { total: employees.length, employees };
  }

  async searchEmployees(term: string): Promise<EmployeeSearchResult> {
    const employees = await this.repository.searchEmployees(term.trim());
    return { term, total: employees.length, employees };
  }

  async getRecordsForDate(
    date: string,
    filters: RecordFilters = {},
  ): Promise<RecordListResult> {
    assertDateKey(date, 'fecha');
    return this.getRecordsForRange({ startDate: date, endDate: date }, filters);
  }

  async getRecordsForRange(
    range: DateRange,
    filters: RecordFilters = {},
  ): Promise<RecordListResult> {
    assertValidRange(range);
    const records = await this.repository.fetchRecords(range, filters);
    return { ...range, total: records.length, records };
  }

  async getLastRecord(employeeReference: string): Promise<LastRecordResult> {
    const employee = await this.repository.fetchEmployee(employeeReference);
    const lastRecord = await this.repository.fetchLastRecord(employee.id);

    return {
      employee,
      lastRecord,
      nextAction: lastRecord?.direction === 'ENTRADA' ? 'SALIDA' : 'ENTRADA',
    };
  }

  async getPendingExits(date?: string | null): Promise<PendingExitsResult> {
    const day = date ?? this.today();
    assertDateKey(day, 'fecha');

    const rows = await this.repository.fetchEvents(
      eventWindow({ startDate: day, endDate: day }),
    );
    const byCode = new Map<string, RawEvent>();
    rows.forEach((row) => byCode.set(row.employeeCode, row));

    const now = this.clock();
    const employees = this.engine
      .findPendingExits(rows, day)
      .map(({ employeeCode, openSession }) => {
        const row = byCode.get(employeeCode);
        return {
          employeeId: row?.employeeId ?? null,
          employeeCode,
          employeeName: row?.employeeName ?? null,
          workplace: row?.workplace ?? null,
          entryTime: toLocalTime(openSession.entry, this.timezone),
          elapsedHours: roundTo(
            Math.max(0, now.getTime() - openSession.entry.getTime()) /
              1000 /
              SECONDS_PER_HOUR,
          ),
        };
      })
      .sort((a, b) => a.entryTime.localeCompare(b.entryTime));

    return { date: day, total: employees.length, employees };
  }

  async calculateDailyHours(
    employeeReference: string,
    date: string,
  ): Promise<DailyHoursReport> {
    assertDateKey(date, 'fecha');
    const employee = await this.repository.fetchEmployee(employeeReference);
    const rows = await this.repository.fetchEvents({
      ...eventWindow({ startDate: date, endDate: date }),
      employeeCode: employee.code,
    });

    const { days, rejected } = this.engine.computeDailyHours(rows);
    const day =
      days.find((candidate) => candidate.date === date) ??
      calculateDailyHours(
        { employeeCode: employee.code, date, sessions: [] },
        this.engine.configuration,
      );

    return { employee, day, rejected };
  }

  async weeklyReport(request: WeeklyReportRequest): Promise<PeriodReport> {
    const date = request.date ?? this.today();
    assertDateKey(date, 'fecha_semana');
    logger.info(`Weekly report for week of ${date}`, {
      employee: request.employee ?? null,
      workplace: request.workplace ?? null,
    });
    return this.summarize(getWeekRange(date), request);
  }

  async monthlyReport(request: MonthlyReportRequest): Promise<PeriodReport> {
    logger.info(`Monthly report for ${request.year}-${request.month}`, {
      employee: request.employee ?? null,
      workplace: request.workplace ?? null,
    });
    return this.summarize(getMonthRange(request.year, request.month), request);
  }

  async attendanceStatistics(
    range: DateRange,
    workplace?: string | null,
  ): Promise<AttendanceStatisticsReport> {
    assertValidRange(range);
    const [counts, report] = await Promise.all([
      this.repository.fetchRecordCounts(range, workplace ?? null),
      this.summarize(range, { workplace }),
    ]);

    const totals = counts.byWorkplace.reduce<RecordTotals>(
      (sum, row) => ({
        ...sum,
        records: sum.records + row.records,
        entries: sum.entries + row.entries,
        exits: sum.exits + row.exits,
        forced: sum.forced + row.forced,
      }),
      {
        records: 0,
        uniqueEmployees: counts.uniqueEmployees,
        entries: 0,
        exits: 0,
        forced: 0,
      },
    );

    return {
      ...range,
      totals,
      byWorkplace: counts.byWorkplace,
      hours: this.engine.computeStatistics(report.summaries),
    };
  }

  async getConfiguration(key?: string | null): Promise<ConfigurationReport> {
    const entries = await this.repository.fetchConfigurationEntries(
      key ?? null,
    );
    return {
      engine: describeConfig(this.engine.configuration),
      total: entries.length,
      entries,
    };
  }

  private resolvePayrollRange(request: PayrollRequest): DateRange {
    if (request.range) {
      return request.range;
    }
    if (request.date) {
      assertDateKey(request.date, 'fecha');
      return getBiweeklyPeriodContaining(
        request.date,
        this.engine.configuration.biweekly,
      );
    }
    if (request.year && request.month && request.fortnight) {
      const { biweekly } = this.engine.configuration;
      if (biweekly.kind !== 'semi-monthly') {
        throw new AppError({
          code: ErrorCode.INVALID_INPUT,
          message: `anio, mes and quincena name semi-monthly periods but the biweekly rule is ${biweekly.kind}; use fecha or fecha_inicio and fecha_fin`,
          details: { rule: biweekly.kind },
        });
      }
      return getFortnightPeriod(request.year, request.month, request.fortnight);
    }

    throw new AppError({
      code: ErrorCode.INVALID_INPUT,
      message:
        'A payroll period needs anio, mes and quincena, a fecha inside it, or fecha_inicio and fecha_fin',
    });
  }

  async payrollSummary(request: PayrollRequest): Promise<PayrollReport> {
    const period = requireBiweeklyPeriod(
      this.resolvePayrollRange(request),
      this.engine.configuration,
    );
    const range = { startDate: period.startDate, endDate: period.endDate };
    const [report, rates, employees] = await Promise.all([
      this.summarize(range, request),
      this.repository.fetchPayRates(),
      this.repository.listEmployees({
        activeOnly: false,
        workplace: request.workplace ?? null,
      }),
    ]);
    const directory = new Map(
      employees.map((employee) => [employee.code, employee]),
    );

    const summaries = report.summaries.map((summary) => {
      const employee = directory.get(summary.employeeCode);
      return {
        ...this.engine.summarizePayroll(summary, {
          rates,
          paysSundaySurcharge: employee?.paysSundaySurcharge ?? false,
        }),
        employeeName: employee?.fullName ?? null,
      };
    });

    logger.info(`Payroll summary for ${period.periodId}`, {
      employees: summaries.length,
    });

    return {
      periodId: period.periodId,
      startDate: period.startDate,
      endDate: period.endDate,
      rates,
      totalEmployees: summaries.length,
      totals: {
        regularHours: roundTo(
          summaries.reduce((sum, item) => sum + item.regularHours, 0),
        ),
        overtimeHours: roundTo(
          summaries.reduce((sum, item) => sum + item.overtimeHours, 0),
        ),
        amount: roundTo(
          summaries.reduce((sum, item) => sum + (item.valuation?.total ?? 0), 0),
        ),
      },
      employees: summaries,
      rejected: report.rejected,
    };
  }
}
