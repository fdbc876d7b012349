// types/access/hours.ts

import { Anomaly } from './events';

export interface WorkSession {
  employeeCode: string;
  date: string;
  entry: Date;
  /** null while the employee has not clocked out */
  exit: Date | null;
}

export interface PairingResult {
  sessions: WorkSession[];
  anomalies: Anomaly[];
}

export interface HoursClassification {
  ordinarySeconds: number;
  nightSurchargeSeconds: number;
  extraDaySeconds: number;
  extraNightSeconds: number;
  sundaySeconds: number;
}

export interface DailyHours {
  employeeCode: string;
  date: string;
  workedSeconds: number;
  regularSeconds: number;
  overtimeSeconds: number;
  sessions: WorkSession[];
  incomplete: boolean;
  anomalies: Anomaly[];
  classification: HoursClassification;
}

export interface DateRange {
  startDate: string;
  endDate: string;
}

export type PeriodAlert =
  | {
      kind: 'EXCESS_DAILY';
      date: string;
      workedSeconds: number;
      thresholdSeconds: number;
    }
  | {
      kind: 'EXCESS_WEEKLY';
      windowStart: string;
      windowEnd: string;
      workedSeconds: number;
      thresholdSeconds: number;
    }
  | {
      kind: 'INCOMPLETE_DAYS';
      dates: string[];
    };

export interface PeriodSummary extends DateRange {
  employeeCode: string;
  totalSeconds: number;
  regularSeconds: number;
  overtimeSeconds: number;
  days: DailyHours[];
  alerts: PeriodAlert[];
}

export interface EmployeeAttendanceStatistics {
  employeeCode: string;
  daysWithRecords: number;
  daysWorked: number;
  incompleteDays: number;
  totalSeconds: number;
  averageWorkedSecondsPerDay: number;
}

export interface AttendanceStatistics {
  employeeCount: number;
  daysWithRecords: number;
  daysWorked: number;
  incompleteDays: number;
  totalSeconds: number;
  averageWorkedSecondsPerDay: number;
  employees: EmployeeAttendanceStatistics[];
}
