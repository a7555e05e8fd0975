import { describe, expect, it } from 'vitest';

import {
  addDays,
  daysBetween,
  formatDayMonthYear,
  isIsoDate,
  startOfMonth,
  todayIn,
} from '@/common/dates.js';

describe('dates', () => {
  describe('isIsoDate', () => {
    it('accepts real calendar dates', () => {
      expect(isIsoDate('2024-02-29')).toBe(true);
      expect(isIsoDate('2024-12-31')).toBe(true);
    });

    it('rejects impossible or malformed dates', () => {
      expect(isIsoDate('2023-02-29')).toBe(false);
      expect(isIsoDate('2024-13-01')).toBe(false);
      expect(isIsoDate('2024-1-01')).toBe(false);
      expect(isIsoDate('01/02/2024')).toBe(false);
    });
  });

  describe('todayIn', () => {
    it('returns the calendar day in the given timezone', () => {
      const lateEvening = new Date('2024-06-02T01:30:00.000Z');

      expect(todayIn('UTC', lateEvening)).toBe('2024-06-02');
      expect(todayIn('America/Sao_Paulo', lateEvening)).toBe('2024-06-01');
    });
  });

  describe('daysBetween', () => {
    it('counts whole days, negative when the target is in the past', () => {
      expect(daysBetween('2024-06-01', '2024-07-01')).toBe(30);
      expect(daysBetween('2024-06-01', '2024-06-01')).toBe(0);
      expect(daysBetween('2024-06-10', '2024-06-01')).toBe(-9);
    });

    it('crosses leap days', () => {
      expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
    });

    it('throws on malformed input', () => {
      expect(() => daysBetween('2024-06-01', 'tomorrow')).toThrow('Invalid ISO date: tomorrow');
    });
  });

  describe('addDays', () => {
    it('moves across month and year boundaries', () => {
      expect(addDays('2024-01-31', 1)).toBe('2024-02-01');
      expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
      expect(addDays('2025-01-01', -180)).toBe('2024-07-05');
    });
  });

  it('startOfMonth returns the first day', () => {
    expect(startOfMonth('2024-06-17')).toBe('2024-06-01');
  });

  it('formatDayMonthYear uses dd/mm/yyyy', () => {
    expect(formatDayMonthYear('2024-06-07')).toBe('07/06/2024');
  });
});
