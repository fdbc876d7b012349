// types/access/config.ts

export type RoundingMode = 'nearest' | 'floor' | 'ceil';

export interface RoundingRule {
  unitSeconds: number;
  mode: RoundingMode;
}

export type WeeklyWindowPolicy = 'calendar' | 'rolling';

/**
 * How payroll fortnights are laid out on the calendar.
 * - `semi-monthly`: days 1-15 and 16 to the end of every month.
 * - `fixed`: consecutive 14-day windows counted from `anchorDate`.
 */
export type BiweeklyRule =
  | { kind: 'semi-monthly' }
  | { kind: 'fixed'; anchorDate: string };

export interface NightWindow {
  /** minutes from local midnight */
  startMinute: number;
  endMinute: number;
}

export interface EngineConfig {
  readonly timezone: string;
  readonly dailyOvertimeThresholdSeconds: number;
  readonly weeklyOvertimeThresholdSeconds: number;
  readonly rounding: Readonly<RoundingRule>;
  readonly weeklyWindow: WeeklyWindowPolicy;
  readonly biweekly: Readonly<BiweeklyRule>;
  /** Longest gap after which an exit can still close the previous day's entry */
  readonly maxShiftSeconds: number;
  readonly nightWindow: Readonly<NightWindow>;
}

export interface DatabaseConfig {
  url?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectionLimit: number;
}

export type ConfigSnapshot = Record<string, string | number | boolean>;
