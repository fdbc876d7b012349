// utils/payrollUtils.ts

import { PAYROLL_CONSTANTS } from '../constants/payroll';
import {
  EngineConfig,
  HoursBreakdown,
  HoursClassification,
  PayRates,
  PayrollValuation,
} from '../types/access';
import { roundTo, secondsToHours } from './timeUtils';

export class PayrollUtils {
  static toHoursBreakdown(
    classification: HoursClassification,
    config: EngineConfig,
  ): HoursBreakdown {
    return {
      ordinaryHours: secondsToHours(
        classification.ordinarySeconds,
        config.rounding,
      ),
      nightSurchargeHours: secondsToHours(
        classification.nightSurchargeSeconds,
        config.rounding,
      ),
      extraDayHours: secondsToHours(
        classification.extraDaySeconds,
        config.rounding,
      ),
      extraNightHours: secondsToHours(
        classification.extraNightSeconds,
        config.rounding,
      ),
      sundayHours: secondsToHours(classification.sundaySeconds, config.rounding),
    };
  }

  static sumClassifications(
    classifications: readonly HoursClassification[],
  ): HoursClassification {
    return classifications.reduce<HoursClassification>(
      (total, current) => ({
        ordinarySeconds: total.ordinarySeconds + current.ordinarySeconds,
        nightSurchargeSeconds:
          total.nightSurchargeSeconds + current.nightSurchargeSeconds,
        extraDaySeconds: total.extraDaySeconds + current.extraDaySeconds,
        extraNightSeconds: total.extraNightSeconds + current.extraNightSeconds,
        sundaySeconds: total.sundaySeconds + current.sundaySeconds,
      }),
      {
        ordinarySeconds: 0,
        nightSurchargeSeconds: 0,
        extraDaySeconds: 0,
        extraNightSeconds: 0,
        sundaySeconds: 0,
      },
    );
  }

  /**
   * Monetary value of a fortnight's hours. Night surcharge and Sunday hours
   * are paid on the ordinary rate times their factor; Sunday hours only
   * count for employees who are paid the Sunday surcharge.
   */
  static calculateHourValues(
    hours: HoursBreakdown,
    rates: PayRates,
    paysSundaySurcharge: boolean,
  ): PayrollValuation {
    const { NIGHT_SURCHARGE, SUNDAY } = PAYROLL_CONSTANTS.FACTORS;

    const ordinary = roundTo(hours.ordinaryHours * rates.ordinaryHourly);
    const extraDay = roundTo(hours.extraDayHours * rates.extraDayHourly);
    const extraNight = roundTo(hours.extraNightHours * rates.extraNightHourly);
    const nightSurcharge = roundTo(
      hours.nightSurchargeHours * rates.ordinaryHourly * NIGHT_SURCHARGE,
    );
    const sunday = paysSundaySurcharge
      ? roundTo(hours.sundayHours * rates.ordinaryHourly * SUNDAY)
      : 0;

    return {
      ordinary,
      extraDay,
      extraNight,
      nightSurcharge,
      sunday,
      total: roundTo(ordinary + extraDay + extraNight + nightSurcharge + sunday),
    };
  }

  static parseRates(entries: Record<string, string | undefined>): PayRates {
    const read = (key: string) => {
      const value = Number(entries[key] ?? 0);
      return Number.isFinite(value) ? value : 0;
    };

    return {
      ordinaryHourly: read(PAYROLL_CONSTANTS.RATE_KEYS.ORDINARY),
      extraDayHourly: read(PAYROLL_CONSTANTS.RATE_KEYS.EXTRA_DAY),
      extraNightHourly: read(PAYROLL_CONSTANTS.RATE_KEYS.EXTRA_NIGHT),
    };
  }
}
