// services/TimeAccounting/DailyHoursCalculator.ts

import {
  Anomaly,
  DailyHours,
  EngineConfig,
  WorkSession,
} from '../../types/access';
import { applyRounding, elapsedSeconds } from '../../utils/timeUtils';
import { classifyHours } from './HoursClassifier';

export interface DailyHoursInput {
  employeeCode: string;
  date: string;
  sessions: WorkSession[];
  anomalies?: Anomaly[];
}

export function calculateDailyHours(
  input: DailyHoursInput,
  config: EngineConfig,
): DailyHours {
  const anomalies = input.anomalies ?? [];
  const rawSeconds = input.sessions.reduce(
    (sum, session) =>
      session.exit ? sum + elapsedSeconds(session.entry, session.exit) : sum,
    0,
  );

  const workedSeconds = applyRounding(rawSeconds, config.rounding);
  const regularSeconds = Math.min(
    workedSeconds,
    config.dailyOvertimeThresholdSeconds,
  );
  const overtimeSeconds = workedSeconds - regularSeconds;

  return {
    employeeCode: input.employeeCode,
    date: input.date,
    workedSeconds,
    regularSeconds,
    overtimeSeconds,
    sessions: input.sessions,
    incomplete:
      input.sessions.some((session) => session.exit === null) ||
      anomalies.length > 0,
    anomalies,
    classification: classifyHours(
      {
        date: input.date,
        sessions: input.sessions,
        workedSeconds,
        regularSeconds,
        overtimeSeconds,
      },
      config,
    ),
  };
}
