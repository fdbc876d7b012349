// config/engineConfig.ts

import { z } from 'zod';
import {
  AppError,
  ConfigSnapshot,
  DatabaseConfig,
  EngineConfig,
  ErrorCode,
} from '../types/access';
import { isValidDateKey, isValidTimezone } from '../utils/dateUtils';
import { TIME_REGEX, parseTimeToMinutes } from '../utils/timeUtils';

type Environment = Record<string, string | undefined>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  timezone: 'America/Bogota',
  dailyOvertimeThresholdSeconds: 8 * 3600,
  weeklyOvertimeThresholdSeconds: 48 * 3600,
  rounding: Object.freeze({ unitSeconds: 60, mode: 'nearest' as const }),
  weeklyWindow: 'calendar' as const,
  biweekly: Object.freeze({ kind: 'semi-monthly' as const }),
  maxShiftSeconds: 16 * 3600,
  nightWindow: Object.freeze({ startMinute: 21 * 60, endMinute: 6 * 60 }),
});

const engineEnvSchema = z
  .object({
    TIMEZONE: z
      .string()
      .default(DEFAULT_ENGINE_CONFIG.timezone)
      .refine(isValidTimezone, 'Unknown IANA timezone'),
    DAILY_OVERTIME_THRESHOLD_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_ENGINE_CONFIG.dailyOvertimeThresholdSeconds),
    WEEKLY_OVERTIME_THRESHOLD_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_ENGINE_CONFIG.weeklyOvertimeThresholdSeconds),
    ROUNDING_UNIT_SECONDS: z.coerce.number().int().min(1).default(60),
    ROUNDING_MODE: z.enum(['nearest', 'floor', 'ceil']).default('nearest'),
    WEEKLY_WINDOW: z.enum(['calendar', 'rolling']).default('calendar'),
    BIWEEKLY_RULE: z.enum(['semi-monthly', 'fixed']).default('semi-monthly'),
    BIWEEKLY_ANCHOR_DATE: z.string().optional(),
    MAX_SHIFT_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_ENGINE_CONFIG.maxShiftSeconds),
    NIGHT_START: z.string().regex(TIME_REGEX).default('21:00'),
    NIGHT_END: z.string().regex(TIME_REGEX).default('06:00'),
  })
  .superRefine((env, ctx) => {
    if (
      env.BIWEEKLY_RULE === 'fixed' &&
      !(env.BIWEEKLY_ANCHOR_DATE && isValidDateKey(env.BIWEEKLY_ANCHOR_DATE))
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BIWEEKLY_ANCHOR_DATE'],
        message: 'A yyyy-MM-dd anchor date is required for fixed fortnights',
      });
    }
  });

const databaseEnvSchema = z.object({
  DATABASE_URL: z.string().optional(),
  DATABASE_URL_FALLBACK: z.string().optional(),
  MYSQL_HOST: z.string().default('localhost'),
  MYSQL_PORT: z.coerce.number().int().positive().default(3306),
  MYSQL_USER: z.string().default('root'),
  MYSQL_PASSWORD: z.string().default(''),
  MYSQL_DATABASE: z.string().default('control_acceso'),
  MYSQL_CONNECTION_LIMIT: z.coerce.number().int().positive().default(10),
});

function configurationError(error: z.ZodError): AppError {
  return new AppError({
    code: ErrorCode.CONFIGURATION_ERROR,
    message: `Invalid configuration: ${error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')}`,
    originalError: error,
  });
}

// Blank variables count as unset
function withoutBlanks(env: Environment): Environment {
  return Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== ''),
  );
}

export function createEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  return Object.freeze({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
}

export function loadEngineConfig(
  env: Environment = process.env,
): EngineConfig {
  const parsed = engineEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw configurationError(parsed.error);
  }

  const values = parsed.data;
  return createEngineConfig({
    timezone: values.TIMEZONE,
    dailyOvertimeThresholdSeconds: values.DAILY_OVERTIME_THRESHOLD_SECONDS,
    weeklyOvertimeThresholdSeconds: values.WEEKLY_OVERTIME_THRESHOLD_SECONDS,
    rounding: Object.freeze({
      unitSeconds: values.ROUNDING_UNIT_SECONDS,
      mode: values.ROUNDING_MODE,
    }),
    weeklyWindow: values.WEEKLY_WINDOW,
    biweekly: Object.freeze(
      values.BIWEEKLY_RULE === 'fixed' && values.BIWEEKLY_ANCHOR_DATE
        ? { kind: 'fixed' as const, anchorDate: values.BIWEEKLY_ANCHOR_DATE }
        : { kind: 'semi-monthly' as const },
    ),
    maxShiftSeconds: values.MAX_SHIFT_SECONDS,
    nightWindow: Object.freeze({
      startMinute: parseTimeToMinutes(values.NIGHT_START),
      endMinute: parseTimeToMinutes(values.NIGHT_END),
    }),
  });
}

export function loadDatabaseConfig(
  env: Environment = process.env,
): DatabaseConfig {
  const parsed = databaseEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw configurationError(parsed.error);
  }

  const values = parsed.data;
  return {
    url: values.DATABASE_URL ?? values.DATABASE_URL_FALLBACK,
    host: values.MYSQL_HOST,
    port: values.MYSQL_PORT,
    user: values.MYSQL_USER,
    password: values.MYSQL_PASSWORD,
    database: values.MYSQL_DATABASE,
    connectionLimit: values.MYSQL_CONNECTION_LIMIT,
  };
}

function minutesToTime(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  return `${String(hours).padStart(2, '0')}:${String(minutes % 60).padStart(2, '0')}`;
}

/** Flat, read-only view of the engine settings for observability */
export function describeConfig(config: EngineConfig): ConfigSnapshot {
  const snapshot: ConfigSnapshot = {
    timezone: config.timezone,
    daily_overtime_threshold_seconds: config.dailyOvertimeThresholdSeconds,
    weekly_overtime_threshold_seconds: config.weeklyOvertimeThresholdSeconds,
    rounding_unit_seconds: config.rounding.unitSeconds,
    rounding_mode: config.rounding.mode,
    weekly_window: config.weeklyWindow,
    biweekly_rule: config.biweekly.kind,
    max_shift_seconds: config.maxShiftSeconds,
    night_start: minutesToTime(config.nightWindow.startMinute),
    night_end: minutesToTime(config.nightWindow.endMinute),
  };

  if (config.biweekly.kind === 'fixed') {
    snapshot.biweekly_anchor_date = config.biweekly.anchorDate;
  }

  return snapshot;
}
