// utils/timeUtils.ts

import { RoundingRule } from '../types/access';

export const TIME_REGEX = /^([0-1]?[0-9]|2[0-3]):([0-5][0-9])$/;

export const SECONDS_PER_HOUR = 3600;

export function isValidTimeString(time: string | null | undefined): boolean {
  if (!time) return false;
  return TIME_REGEX.test(time);
}

export function parseTimeToMinutes(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

export function elapsedSeconds(start: Date, end: Date): number {
  return Math.floor((end.getTime() - start.getTime()) / 1000);
}

export function applyRounding(seconds: number, rule: RoundingRule): number {
  const unit = rule.unitSeconds;
  if (unit <= 1) return Math.round(seconds);

  switch (rule.mode) {
    case 'floor':
      return Math.floor(seconds / unit) * unit;
    case 'ceil':
      return Math.ceil(seconds / unit) * unit;
    default:
      return Math.round(seconds / unit) * unit;
  }
}

export function roundTo(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function secondsToHours(seconds: number, rule: RoundingRule): number {
  return roundTo(applyRounding(seconds, rule) / SECONDS_PER_HOUR);
}
