// __tests__/services/TimeAccounting/PeriodAggregator.test.ts
import { createEngineConfig } from '@/config/engineConfig';
import {
  aggregatePeriod,
  calculateDailyHours,
  computeAttendanceStatistics,
} from '@/services/TimeAccounting';
import { AppError, ErrorCode } from '@/types/access';
import {
  captureError,
  session,
  testConfig,
  workedDay,
} from '../../helpers/fixtures';

describe('PeriodAggregator', () => {
  describe('aggregatePeriod', () => {
    it('should raise a daily alert for a day above the threshold', () => {
      const days = [workedDay('E001', '2024-03-04', 10), workedDay('E001', '2024-03-05', 8)];

      const summary = aggregatePeriod(
        'E001',
        days,
        { startDate: '2024-03-04', endDate: '2024-03-10' },
        testConfig,
      );

      expect(summary).toMatchObject({
        employeeCode: 'E001',
        totalSeconds: 64800,
        regularSeconds: 57600,
        overtimeSeconds: 7200,
      });
      expect(summary.alerts).toEqual([
        {
          kind: 'EXCESS_DAILY',
          date: '2024-03-04',
          workedSeconds: 36000,
          thresholdSeconds: 28800,
        },
      ]);
    });

    it('should ignore days outside the range and of other employees', () => {
      const days = [
        workedDay('E001', '2024-03-03', 8),
        workedDay('E001', '2024-03-04', 8),
        workedDay('E002', '2024-03-04', 8),
        workedDay('E001', '2024-03-11', 8),
      ];

      const summary = aggregatePeriod(
        'E001',
        days,
        { startDate: '2024-03-04', endDate: '2024-03-10' },
        testConfig,
      );

      expect(summary.days.map((day) => day.date)).toEqual(['2024-03-04']);
      expect(summary.totalSeconds).toBe(28800);
    });

    it('should keep period totals equal to the sum of its days', () => {
      const days = [
        workedDay('E001', '2024-03-06', 7.5),
        workedDay('E001', '2024-03-04', 9.25),
        workedDay('E001', '2024-03-05', 3),
      ];

      const summary = aggregatePeriod(
        'E001',
        days,
        { startDate: '2024-03-04', endDate: '2024-03-06' },
        testConfig,
      );

      expect(summary.days.map((day) => day.date)).toEqual([
        '2024-03-04',
        '2024-03-05',
        '2024-03-06',
      ]);
      expect(summary.totalSeconds).toBe(
        summary.days.reduce((sum, day) => sum + day.workedSeconds, 0),
      );
      expect(summary.totalSeconds).toBe(71100);
    });

    it('should list incomplete days in one alert', () => {
      const open = calculateDailyHours(
        {
          employeeCode: 'E001',
          date: '2024-03-05',
          sessions: [session('E001', '2024-03-05', '08:00', null)],
        },
        testConfig,
      );

      const summary = aggregatePeriod(
        'E001',
        [workedDay('E001', '2024-03-04', 8), open],
        { startDate: '2024-03-04', endDate: '2024-03-10' },
        testConfig,
      );

      expect(summary.alerts).toEqual([
        { kind: 'INCOMPLETE_DAYS', dates: ['2024-03-05'] },
      ]);
    });

    it('should reject a range that ends before it starts', () => {
      const error = captureError(() =>
        aggregatePeriod(
          'E001',
          [],
          { startDate: '2024-03-10', endDate: '2024-03-04' },
          testConfig,
        ),
      );

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_DATE_RANGE });
    });

    describe('weekly windows', () => {
      const range = { startDate: '2024-03-01', endDate: '2024-03-14' };
      const days = [
        '2024-03-08',
        '2024-03-09',
        '2024-03-10',
        '2024-03-11',
        '2024-03-12',
        '2024-03-13',
      ].map((date) => workedDay('E001', date, 9));

      it('should measure calendar weeks clipped to the period', () => {
        const summary = aggregatePeriod('E001', days, range, testConfig);

        expect(
          summary.alerts.filter((alert) => alert.kind === 'EXCESS_WEEKLY'),
        ).toEqual([]);
        expect(
          summary.alerts.filter((alert) => alert.kind === 'EXCESS_DAILY'),
        ).toHaveLength(6);
      });

      it('should measure every rolling seven-day window when configured', () => {
        const config = createEngineConfig({
          timezone: testConfig.timezone,
          weeklyWindow: 'rolling',
        });
        const summary = aggregatePeriod('E001', days, range, config);

        expect(
          summary.alerts.filter((alert) => alert.kind === 'EXCESS_WEEKLY'),
        ).toEqual([
          {
            kind: 'EXCESS_WEEKLY',
            windowStart: '2024-03-07',
            windowEnd: '2024-03-13',
            workedSeconds: 194400,
            thresholdSeconds: 172800,
          },
          {
            kind: 'EXCESS_WEEKLY',
            windowStart: '2024-03-08',
            windowEnd: '2024-03-14',
            workedSeconds: 194400,
            thresholdSeconds: 172800,
          },
        ]);
      });

      it('should raise a weekly alert for a calendar week above the threshold', () => {
        const week = [
          '2024-03-04',
          '2024-03-05',
          '2024-03-06',
          '2024-03-07',
          '2024-03-08',
          '2024-03-09',
        ].map((date) => workedDay('E001', date, 9));

        const summary = aggregatePeriod(
          'E001',
          week,
          { startDate: '2024-03-04', endDate: '2024-03-10' },
          testConfig,
        );

        expect(summary.alerts[summary.alerts.length - 1]).toEqual({
          kind: 'EXCESS_WEEKLY',
          windowStart: '2024-03-04',
          windowEnd: '2024-03-10',
          workedSeconds: 194400,
          thresholdSeconds: 172800,
        });
      });
    });
  });

  describe('computeAttendanceStatistics', () => {
    it('should count worked, recorded and incomplete days per employee and overall', () => {
      const range = { startDate: '2024-03-04', endDate: '2024-03-10' };
      const open = calculateDailyHours(
        {
          employeeCode: 'E001',
          date: '2024-03-05',
          sessions: [session('E001', '2024-03-05', '08:00', null)],
        },
        testConfig,
      );
      const days = [
        workedDay('E001', '2024-03-04', 8),
        open,
        workedDay('E002', '2024-03-04', 4),
      ];

      const statistics = computeAttendanceStatistics([
        aggregatePeriod('E001', days, range, testConfig),
        aggregatePeriod('E002', days, range, testConfig),
      ]);

      expect(statistics).toEqual({
        employeeCount: 2,
        daysWithRecords: 3,
        daysWorked: 2,
        incompleteDays: 1,
        totalSeconds: 43200,
        averageWorkedSecondsPerDay: 21600,
        employees: [
          {
            employeeCode: 'E001',
            daysWithRecords: 2,
            daysWorked: 1,
            incompleteDays: 1,
            totalSeconds: 28800,
            averageWorkedSecondsPerDay: 28800,
          },
          {
            employeeCode: 'E002',
            daysWithRecords: 1,
            daysWorked: 1,
            incompleteDays: 0,
            totalSeconds: 14400,
            averageWorkedSecondsPerDay: 14400,
          },
        ],
      });
    });

    it('should report zero averages when nobody worked', () => {
      expect(computeAttendanceStatistics([])).toEqual({
        employeeCount: 0,
        daysWithRecords: 0,
        daysWorked: 0,
        incompleteDays: 0,
        totalSeconds: 0,
        averageWorkedSecondsPerDay: 0,
        employees: [],
      });
    });
  });
});
