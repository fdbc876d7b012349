export const PAYROLL_CONSTANTS = {
  FACTORS: {
    NIGHT_SURCHARGE: 1.35,
    SUNDAY: 1.75,
  },

  // Keys of the hourly rates in the `configuracion` table
  RATE_KEYS: {
    ORDINARY: 'valor_hora_ordinaria',
    EXTRA_DAY: 'valor_hora_extra_diurna',
    EXTRA_NIGHT: 'valor_hora_extra_nocturna',
  },
} as const;
