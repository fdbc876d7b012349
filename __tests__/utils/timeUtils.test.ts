// __tests__/utils/timeUtils.test.ts
import {
  currentDateKey,
  isValidDateKey,
  isValidTimezone,
  parseInstant,
  toLocalDateKey,
} from '@/utils/dateUtils';
import {
  applyRounding,
  parseTimeToMinutes,
  secondsToHours,
} from '@/utils/timeUtils';
import { TZ } from '../helpers/fixtures';

describe('timeUtils', () => {
  describe('applyRounding', () => {
    it('should round to the nearest unit', () => {
      expect(applyRounding(89, { unitSeconds: 60, mode: 'nearest' })).toBe(60);
      expect(applyRounding(90, { unitSeconds: 60, mode: 'nearest' })).toBe(120);
    });

    it('should round down and up when asked', () => {
      expect(applyRounding(1799, { unitSeconds: 900, mode: 'floor' })).toBe(900);
      expect(applyRounding(901, { unitSeconds: 900, mode: 'ceil' })).toBe(1800);
    });

    it('should keep whole seconds for a unit of one', () => {
      expect(applyRounding(1234, { unitSeconds: 1, mode: 'floor' })).toBe(1234);
    });
  });

  describe('secondsToHours', () => {
    it('should round seconds then report hours with two decimals', () => {
      expect(secondsToHours(5460, { unitSeconds: 60, mode: 'nearest' })).toBe(1.52);
      expect(secondsToHours(5430, { unitSeconds: 900, mode: 'floor' })).toBe(1.5);
    });
  });

  describe('parseTimeToMinutes', () => {
    it('should count minutes from midnight', () => {
      expect(parseTimeToMinutes('21:00')).toBe(1260);
      expect(parseTimeToMinutes('06:30')).toBe(390);
    });
  });
});

describe('dateUtils', () => {
  it('should validate calendar dates', () => {
    expect(isValidDateKey('2024-02-29')).toBe(true);
    expect(isValidDateKey('2023-02-29')).toBe(false);
    expect(isValidDateKey('2024-3-4')).toBe(false);
  });

  it('should validate timezone names', () => {
    expect(isValidTimezone('America/Bogota')).toBe(true);
    expect(isValidTimezone('Mars/Olympus')).toBe(false);
  });

  describe('parseInstant', () => {
    it('should read naive timestamps as wall-clock time in the timezone', () => {
      expect(parseInstant('2024-03-04 08:00:00', TZ)).toEqual(
        new Date('2024-03-04T13:00:00Z'),
      );
    });

    it('should honour an explicit offset', () => {
      expect(parseInstant('2024-03-04T08:00:00-03:00', TZ)).toEqual(
        new Date('2024-03-04T11:00:00Z'),
      );
    });

    it('should accept hour-only and compact offsets', () => {
      const expected = new Date('2024-03-04T13:00:00Z');
      expect(parseInstant('2024-03-04 08:00:00-05', TZ)).toEqual(expected);
      expect(parseInstant('2024-03-04 08:00:00-0500', TZ)).toEqual(expected);
      expect(parseInstant('2024-03-04 13:00:00+00:00', TZ)).toEqual(expected);
      expect(parseInstant('2024-03-04T13:00:00.000Z', TZ)).toEqual(expected);
    });

    it('should return null for values that are not timestamps', () => {
      expect(parseInstant('yesterday', TZ)).toBeNull();
      expect(parseInstant(null, TZ)).toBeNull();
      expect(parseInstant(new Date('invalid'), TZ)).toBeNull();
    });
  });

  it('should derive the local date of an instant', () => {
    const lateEvening = new Date('2024-03-05T03:30:00Z');
    expect(toLocalDateKey(lateEvening, TZ)).toBe('2024-03-04');
    expect(currentDateKey(TZ, lateEvening)).toBe('2024-03-04');
  });
});
