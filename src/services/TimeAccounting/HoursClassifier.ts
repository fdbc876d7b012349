// services/TimeAccounting/HoursClassifier.ts

import {
  EngineConfig,
  HoursClassification,
  WorkSession,
} from '../../types/access';
import { isSunday } from '../../utils/dateUtils';
import { elapsedSeconds } from '../../utils/timeUtils';
import { TimeCalculationHelper } from './utils/TimeCalculationHelper';

export interface ClassificationInput {
  date: string;
  sessions: readonly WorkSession[];
  workedSeconds: number;
  regularSeconds: number;
  overtimeSeconds: number;
}

export const EMPTY_CLASSIFICATION: Readonly<HoursClassification> =
  Object.freeze({
    ordinarySeconds: 0,
    nightSurchargeSeconds: 0,
    extraDaySeconds: 0,
    extraNightSeconds: 0,
    sundaySeconds: 0,
  });

/**
 * Splits a day's worked time into payroll buckets. Sunday work goes to the
 * Sunday bucket whole; otherwise the night share of the raw session time
 * splits both the regular and the overtime seconds. Buckets always add up
 * to `workedSeconds`.
 */
export function classifyHours(
  input: ClassificationInput,
  config: EngineConfig,
): HoursClassification {
  if (input.workedSeconds === 0) return { ...EMPTY_CLASSIFICATION };

  if (isSunday(input.date)) {
    return { ...EMPTY_CLASSIFICATION, sundaySeconds: input.workedSeconds };
  }

  let rawSeconds = 0;
  let nightSeconds = 0;
  for (const session of input.sessions) {
    if (!session.exit) continue;
    rawSeconds += elapsedSeconds(session.entry, session.exit);
    nightSeconds += TimeCalculationHelper.calculateNightSeconds(
      session.entry,
      session.exit,
      config.nightWindow,
      config.timezone,
    );
  }

  const nightShare = rawSeconds > 0 ? nightSeconds / rawSeconds : 0;
  const nightSurchargeSeconds = Math.round(input.regularSeconds * nightShare);
  const extraNightSeconds = Math.round(input.overtimeSeconds * nightShare);

  return {
    ordinarySeconds: input.regularSeconds - nightSurchargeSeconds,
    nightSurchargeSeconds,
    extraDaySeconds: input.overtimeSeconds - extraNightSeconds,
    extraNightSeconds,
    sundaySeconds: 0,
  };
}
