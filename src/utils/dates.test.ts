import { describe, expect, it } from 'vitest';
import { backupStamp, isCalendarDate, monthRange, periodBounds, periodLabel, periodOf } from './dates';

describe('dates', () => {
  it('accepts only real YYYY-MM-DD days', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2025-02-29')).toBe(false);
    expect(isCalendarDate('2025-9-1')).toBe(false);
    expect(isCalendarDate('2025-09-01T00:00')).toBe(false);
    expect(isCalendarDate('')).toBe(false);
  });

  it('bounds months and years', () => {
    const ref = new Date(2025, 8, 15);
    expect(periodBounds('monthly', ref)).toEqual({ start: '2025-09-01', end: '2025-09-30' });
    expect(periodBounds('yearly', ref)).toEqual({ start: '2025-01-01', end: '2025-12-31' });
    expect(monthRange({ year: 2025, month: 12 })).toEqual({ start: '2025-12-01', end: '2025-12-31' });
  });

  it('keeps years below 100 as written', () => {
    expect(monthRange({ year: 50, month: 1 })).toEqual({ start: '0050-01-01', end: '0050-01-31' });
    expect(periodLabel({ year: 50, month: 1 })).toBe('January 0050');
    expect(isCalendarDate('0050-01-05')).toBe(true);
  });

  it('names budget periods', () => {
    expect(periodOf(new Date(2025, 0, 31))).toEqual({ year: 2025, month: 1 });
    expect(periodLabel({ year: 2025, month: 9 })).toBe('September 2025');
  });

  it('stamps backup files', () => {
    expect(backupStamp(new Date(2025, 8, 30, 7, 5, 9))).toBe('20250930_070509');
  });
});
