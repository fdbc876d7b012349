export * from './DailyHoursCalculator';
export * from './EventNormalizer';
export * from './HoursClassifier';
export * from './PayrollSummarizer';
export * from './PeriodAggregator';
export * from './SessionPairer';
export * from './TimeAccountingEngine';
