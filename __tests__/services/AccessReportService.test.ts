// __tests__/services/AccessReportService.test.ts
import { createEngineConfig } from '@/config/engineConfig';
import { createToolRegistry } from '@/lib/tools';
import { AccessReportService } from '@/services/AccessReportService';
import { TimeAccountingEngine } from '@/services/TimeAccounting';
import { ErrorCode } from '@/types/access';
import { testConfig, TZ } from '../helpers/fixtures';
import {
  buildEmployee,
  InMemoryAccessLogRepository,
  StoredRecord,
} from '../helpers/InMemoryAccessLogRepository';

const employees = [
  buildEmployee('u-1', 'E001', 'Ana', 'Gómez', { paysSundaySurcharge: true }),
  buildEmployee('u-2', 'E002', 'Luis', 'Pérez', { workplace: 'Norte' }),
  buildEmployee('u-3', 'E003', 'Marta', 'Ruiz', { active: false }),
];

function record(
  id: string,
  employeeId: string,
  date: string,
  time: string,
  direction: 'ENTRADA' | 'SALIDA',
  workplace: string,
  observations: string | null = null,
): StoredRecord {
  return { id, employeeId, date, time, direction, workplace, observations };
}

const records: StoredRecord[] = [
  record('r1', 'u-1', '2024-03-04', '08:00:00', 'ENTRADA', 'Centro'),
  record('r2', 'u-1', '2024-03-04', '12:00:00', 'SALIDA', 'Centro'),
  record('r3', 'u-1', '2024-03-04', '13:00:00', 'ENTRADA', 'Centro'),
  record('r4', 'u-1', '2024-03-04', '19:00:00', 'SALIDA', 'Centro'),
  record('r5', 'u-1', '2024-03-05', '22:00:00', 'ENTRADA', 'Centro'),
  record('r6', 'u-1', '2024-03-06', '06:30:00', 'SALIDA', 'Centro'),
  record('r7', 'u-1', '2024-03-10', '08:00:00', 'ENTRADA', 'Centro'),
  record('r8', 'u-1', '2024-03-10', '12:00:00', 'SALIDA', 'Centro'),
  record('r9', 'u-2', '2024-03-04', '09:00:00', 'ENTRADA', 'Norte'),
  record('r10', 'u-2', '2024-03-04', '13:00:00', 'SALIDA', 'Norte', 'FORZADO por supervisor'),
  record('r11', 'u-2', '2024-03-07', '08:00:00', 'ENTRADA', 'Norte'),
];

const configuration = [
  { key: 'valor_hora_ordinaria', value: '10000', description: 'Hora ordinaria', dataType: 'number' },
  { key: 'valor_hora_extra_diurna', value: '12500', description: 'Hora extra diurna', dataType: 'number' },
  { key: 'valor_hora_extra_nocturna', value: '17500', description: 'Hora extra nocturna', dataType: 'number' },
];

// 10:30 in Bogota on Thursday 2024-03-07
const NOW = new Date('2024-03-07T15:30:00Z');

describe('AccessReportService', () => {
  let repository: InMemoryAccessLogRepository;
  let reports: AccessReportService;
  const registry = createToolRegistry();

  const call = (tool: string, args: unknown) =>
    registry.dispatch(tool, args, { reports });

  beforeEach(() => {
    repository = new InMemoryAccessLogRepository(employees, records, configuration);
    reports = new AccessReportService(
      repository,
      new TimeAccountingEngine(testConfig),
      () => NOW,
    );
  });

  describe('employees', () => {
    it('should list active employees by default', async () => {
      await expect(call('consultar_empleados', {})).resolves.toMatchObject({
        total: 2,
      });
      await expect(
        call('consultar_empleados', { activos_solo: false }),
      ).resolves.toMatchObject({ total: 3 });
    });

    it('should search by name fragment', async () => {
      const result = await reports.searchEmployees('gómez');
      expect(result.total).toBe(1);
      expect(result.employees[0].code).toBe('E001');
    });
  });

  describe('records', () => {
    it('should filter the records of a date by direction', async () => {
      const result = await reports.getRecordsForDate('2024-03-04', {
        direction: 'SALIDA',
      });
      expect(result.records.map((item) => item.id)).toEqual(['r2', 'r10', 'r4']);
    });

    it('should accept a lowercase direction through the tool', async () => {
      await expect(
        call('consultar_registros_fecha', { fecha: '2024-03-04', tipo: 'salida' }),
      ).resolves.toMatchObject({ total: 3 });
    });

    it('should reject an inverted range', async () => {
      await expect(
        call('consultar_registros_rango', {
          fecha_inicio: '2024-03-10',
          fecha_fin: '2024-03-04',
        }),
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_DATE_RANGE });
    });

    it('should expect an exit after a last entry', async () => {
      const result = await reports.getLastRecord('E002');
      expect(result.lastRecord?.id).toBe('r11');
      expect(result.nextAction).toBe('SALIDA');
    });

    it('should expect an entry from an employee without records', async () => {
      const result = await reports.getLastRecord('E003');
      expect(result.lastRecord).toBeNull();
      expect(result.nextAction).toBe('ENTRADA');
    });
  });

  describe('getPendingExits', () => {
    it('should list employees still clocked in today', async () => {
      await expect(reports.getPendingExits()).resolves.toEqual({
        date: '2024-03-07',
        total: 1,
        employees: [
          {
            employeeId: 'u-2',
            employeeCode: 'E002',
            employeeName: 'Luis Pérez',
            workplace: 'Norte',
            entryTime: '08:00:00',
            elapsedHours: 2.5,
          },
        ],
      });
    });

    it('should not list an overnight shift closed the next morning', async () => {
      await expect(reports.getPendingExits('2024-03-05')).resolves.toMatchObject({
        total: 0,
      });
    });
  });

  describe('calculateDailyHours', () => {
    it('should attribute an overnight shift to its entry date', async () => {
      const { employee, day } = await reports.calculateDailyHours('E001', '2024-03-05');

      expect(employee.fullName).toBe('Ana Gómez');
      expect(day).toMatchObject({
        date: '2024-03-05',
        workedSeconds: 30600,
        regularSeconds: 28800,
        overtimeSeconds: 1800,
        incomplete: false,
        classification: {
          ordinarySeconds: 1694,
          nightSurchargeSeconds: 27106,
          extraDaySeconds: 106,
          extraNightSeconds: 1694,
          sundaySeconds: 0,
        },
      });
      expect(repository.eventQueries[0]).toEqual({
        startDate: '2024-03-04',
        endDate: '2024-03-06',
        employeeCode: 'E001',
      });
    });

    it('should report a lone entry as zero hours and incomplete', async () => {
      const { day } = await reports.calculateDailyHours('E002', '2024-03-07');
      expect(day).toMatchObject({ workedSeconds: 0, incomplete: true });
    });

    it('should return an empty day when there are no records', async () => {
      const { day } = await reports.calculateDailyHours('E002', '2024-03-05');
      expect(day).toMatchObject({
        employeeCode: 'E002',
        workedSeconds: 0,
        incomplete: false,
        sessions: [],
      });
    });

    it('should fail for an unknown employee', async () => {
      await expect(
        call('calcular_horas_trabajadas_dia', { empleado_id: 'ZZZ', fecha: '2024-03-05' }),
      ).rejects.toMatchObject({ code: ErrorCode.EMPLOYEE_NOT_FOUND });
    });
  });

  describe('period reports', () => {
    it('should summarize the week of a date per employee', async () => {
      const report = await reports.weeklyReport({ date: '2024-03-06' });

      expect(report).toMatchObject({
        startDate: '2024-03-04',
        endDate: '2024-03-10',
        totalEmployees: 2,
      });
      expect(report.summaries[0]).toMatchObject({
        employeeCode: 'E001',
        totalSeconds: 81000,
        regularSeconds: 72000,
        overtimeSeconds: 9000,
        alerts: [
          {
            kind: 'EXCESS_DAILY',
            date: '2024-03-04',
            workedSeconds: 36000,
            thresholdSeconds: 28800,
          },
          {
            kind: 'EXCESS_DAILY',
            date: '2024-03-05',
            workedSeconds: 30600,
            thresholdSeconds: 28800,
          },
        ],
      });
      expect(report.summaries[1]).toMatchObject({
        employeeCode: 'E002',
        totalSeconds: 14400,
        alerts: [{ kind: 'INCOMPLETE_DAYS', dates: ['2024-03-07'] }],
      });
    });

    it('should narrow the weekly report to one employee', async () => {
      const report = await call('reporte_horas_semanal', {
        fecha_semana: '2024-03-06',
        empleado_id: 'Luis',
        extra: true,
      });
      expect(report).toMatchObject({
        totalEmployees: 1,
        summaries: [{ employeeCode: 'E002' }],
      });
    });

    it('should summarize a month for one workplace', async () => {
      const report = await call('reporte_horas_mensual', {
        anio: '2024',
        mes: 3,
        restaurante: 'Norte',
      });
      expect(report).toMatchObject({
        startDate: '2024-03-01',
        endDate: '2024-03-31',
        totalEmployees: 1,
        summaries: [{ employeeCode: 'E002', totalSeconds: 14400 }],
      });
    });
  });

  describe('attendanceStatistics', () => {
    it('should combine record counts with worked-time statistics', async () => {
      const report = await reports.attendanceStatistics({
        startDate: '2024-03-04',
        endDate: '2024-03-10',
      });

      expect(report.totals).toEqual({
        records: 11,
        uniqueEmployees: 2,
        entries: 6,
        exits: 5,
        forced: 1,
      });
      expect(report.byWorkplace).toEqual([
        { workplace: 'Centro', records: 8, employees: 1, entries: 4, exits: 4, forced: 0 },
        { workplace: 'Norte', records: 3, employees: 1, entries: 2, exits: 1, forced: 1 },
      ]);
      expect(report.hours).toMatchObject({
        employeeCount: 2,
        daysWithRecords: 5,
        daysWorked: 4,
        incompleteDays: 1,
        totalSeconds: 95400,
        averageWorkedSecondsPerDay: 23850,
      });
    });
  });

  describe('getConfiguration', () => {
    it('should return the engine settings with the matching entries', async () => {
      const result = await reports.getConfiguration('valor_hora_ordinaria');
      expect(result.total).toBe(1);
      expect(result.entries[0].value).toBe('10000');
      expect(result.engine.timezone).toBe('America/Bogota');
    });
  });

  describe('payrollSummary', () => {
    it('should value the first fortnight per employee', async () => {
      const report = await call('resumen_nomina_quincenal', {
        anio: 2024,
        mes: 3,
        quincena: 1,
      });

      expect(report).toMatchObject({
        periodId: '2024-03-Q1',
        startDate: '2024-03-01',
        endDate: '2024-03-15',
        rates: {
          ordinaryHourly: 10000,
          extraDayHourly: 12500,
          extraNightHourly: 17500,
        },
        totalEmployees: 2,
        totals: { regularHours: 24, overtimeHours: 2.5, amount: 329955 },
        employees: [
          {
            employeeCode: 'E001',
            employeeName: 'Ana Gómez',
            regularHours: 20,
            overtimeHours: 2.5,
            incompleteDayCount: 0,
            hours: {
              ordinaryHours: 8.47,
              nightSurchargeHours: 7.53,
              extraDayHours: 2.03,
              extraNightHours: 0.47,
              sundayHours: 4,
            },
            valuation: { sunday: 70000, total: 289955 },
          },
          {
            employeeCode: 'E002',
            employeeName: 'Luis Pérez',
            regularHours: 4,
            overtimeHours: 0,
            incompleteDayCount: 1,
            valuation: { ordinary: 40000, total: 40000 },
          },
        ],
      });
    });

    it('should pick the period containing a date', async () => {
      const report = await reports.payrollSummary({ date: '2024-03-20' });
      expect(report).toMatchObject({
        periodId: '2024-03-Q2',
        totalEmployees: 0,
        totals: { regularHours: 0, overtimeHours: 0, amount: 0 },
      });
    });

    it('should refuse bounds that are not a configured fortnight', async () => {
      await expect(
        call('resumen_nomina_quincenal', {
          fecha_inicio: '2024-03-01',
          fecha_fin: '2024-03-14',
        }),
      ).rejects.toMatchObject({ code: ErrorCode.PERIOD_MISMATCH });
      expect(repository.eventQueries).toEqual([]);
    });

    it('should refuse a fortnight number under fixed fourteen-day periods', async () => {
      const fixedReports = new AccessReportService(
        repository,
        new TimeAccountingEngine(
          createEngineConfig({
            timezone: TZ,
            biweekly: { kind: 'fixed', anchorDate: '2024-03-04' },
          }),
        ),
        () => NOW,
      );

      await expect(
        fixedReports.payrollSummary({ year: 2024, month: 3, fortnight: 1 }),
      ).rejects.toMatchObject({
        code: ErrorCode.INVALID_INPUT,
        details: { rule: 'fixed' },
      });
      expect(repository.eventQueries).toEqual([]);
    });

    it('should require a way to pick the period', async () => {
      await expect(call('resumen_nomina_quincenal', {})).rejects.toMatchObject({
        code: ErrorCode.INVALID_INPUT,
      });
    });
  });
});
