// types/access/payroll.ts

export interface BiweeklyPeriod {
  periodId: string;
  startDate: string;
  endDate: string;
}

export interface PayRates {
  ordinaryHourly: number;
  extraDayHourly: number;
  extraNightHourly: number;
}

export interface HoursBreakdown {
  ordinaryHours: number;
  nightSurchargeHours: number;
  extraDayHours: number;
  extraNightHours: number;
  sundayHours: number;
}

export interface PayrollValuation {
  ordinary: number;
  extraDay: number;
  extraNight: number;
  nightSurcharge: number;
  sunday: number;
  total: number;
}

export interface PayrollSummary extends BiweeklyPeriod {
  employeeCode: string;
  regularHours: number;
  overtimeHours: number;
  incompleteDayCount: number;
  hours: HoursBreakdown;
  valuation?: PayrollValuation;
}

export interface PayrollOptions {
  rates?: PayRates;
  paysSundaySurcharge?: boolean;
}
