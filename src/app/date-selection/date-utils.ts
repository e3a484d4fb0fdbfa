import type { CalendarCell } from './date-selection.types';

const LOCALE = 'en-US';

export const GRID_ROWS = 6;
export const DAYS_PER_WEEK = 7;

export function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

export function endOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate(), 23, 59, 59, 999);
}

export function startOfMonth(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), 1);
}

export function endOfMonth(d: Date): Date {
  return endOfDay(new Date(d.getFullYear(), d.getMonth(), daysInMonth(d)));
}

export function addDays(d: Date, delta: number): Date {
  const out = startOfDay(d);
  out.setDate(out.getDate() + delta);
  return startOfDay(out);
}

/** Month arithmetic that lands on the first day of the target month. */
export function addMonths(d: Date, delta: number): Date {
  return new Date(d.getFullYear(), d.getMonth() + delta, 1);
}

/**
 * Month arithmetic that keeps the day of month, clamped to the target month.
 * Mar 31 shifted by -1 gives Feb 28 (or 29).
 */
export function shiftMonths(d: Date, delta: number): Date {
  const target = addMonths(d, delta);
  const day = Math.min(d.getDate(), daysInMonth(target));
  return new Date(target.getFullYear(), target.getMonth(), day);
}

export function daysInMonth(d: Date): number {
  return new Date(d.getFullYear(), d.getMonth() + 1, 0).getDate();
}

export function isSameMonth(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth();
}

export function isSameDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

export function monthIndex(d: Date): number {
  return d.getFullYear() * 12 + d.getMonth(); // month: 0..11
}

export function monthLabel(d: Date, locale = LOCALE): string {
  return d.toLocaleString(locale, { month: 'long', year: 'numeric' });
}

export function monthName(index: number, locale = LOCALE): string {
  return new Date(2020, index, 1).toLocaleString(locale, {
    month: 'long',
  });
}

export function yearOptions(first: number, last: number): number[] {
  const years: number[] = [];
  for (let y = first; y <= last; y++) years.push(y);
  return years;
}

/**
 * Six full weeks around `month`: leading days of the previous month,
 * every day of the month, then trailing days of the next one.
 * `firstDayOfWeek` is 0 for Sunday .. 6 for Saturday.
 */
export function buildMonthGrid(month: Date, section: number, firstDayOfWeek = 0): CalendarCell[] {
  const start = startOfMonth(month);
  const leading = (start.getDay() - firstDayOfWeek + DAYS_PER_WEEK) % DAYS_PER_WEEK;
  const first = addDays(start, -leading);

  const cells: CalendarCell[] = [];
  for (let item = 0; item < GRID_ROWS * DAYS_PER_WEEK; item++) {
    const date = addDays(first, item);
    cells.push({
      date,
      position: { section, item },
      belongsToMonth: isSameMonth(date, start),
    });
  }
  return cells;
}
