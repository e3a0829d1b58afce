import { endOfMonth, endOfYear, format, isValid, parse, startOfMonth, startOfYear } from 'date-fns';
import type { BudgetPeriod, DateRange, ReportPeriod } from '../domain/types';

export const DATE_FORMAT = 'yyyy-MM-dd';

const DATE_SHAPE = /^\d{4}-\d{2}-\d{2}$/;

/** Parses a `YYYY-MM-DD` calendar date; returns null for anything else (including 2025-02-30). */
export function parseDate(value: string): Date | null {
  if (!DATE_SHAPE.test(value)) return null;
  const d = parse(value, DATE_FORMAT, new Date(2000, 0, 1));
  if (!isValid(d) || format(d, DATE_FORMAT) !== value) return null;
  return d;
}

export function isCalendarDate(value: string): boolean {
  return parseDate(value) !== null;
}

export function formatDate(d: Date): string {
  return format(d, DATE_FORMAT);
}

export function today(now: Date = new Date()): string {
  return formatDate(now);
}

export function periodOf(date: Date): BudgetPeriod {
  return { year: date.getFullYear(), month: date.getMonth() + 1 };
}

/** Local midnight on the 1st; `new Date(y, m)` would read years 0-99 as 1900-1999. */
function firstOfMonth(period: BudgetPeriod): Date {
  const d = new Date(2000, 0, 1);
  d.setFullYear(period.year, period.month - 1, 1);
  return d;
}

export function periodLabel(period: BudgetPeriod): string {
  return format(firstOfMonth(period), 'MMMM yyyy');
}

export function monthRange(period: BudgetPeriod): DateRange {
  const first = firstOfMonth(period);
  return { start: formatDate(startOfMonth(first)), end: formatDate(endOfMonth(first)) };
}

export function periodBounds(kind: ReportPeriod, reference: Date): DateRange {
  if (kind === 'monthly') {
    return { start: formatDate(startOfMonth(reference)), end: formatDate(endOfMonth(reference)) };
  }
  return { start: formatDate(startOfYear(reference)), end: formatDate(endOfYear(reference)) };
}

export function backupStamp(now: Date = new Date()): string {
  return format(now, 'yyyyMMdd_HHmmss');
}
