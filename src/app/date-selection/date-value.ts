import { endOfDay, isSameDay, startOfDay } from './date-utils';
import type { DateRange, PickerValue, SingleDate } from './date-selection.types';

export function singleDate(date: Date): SingleDate {
  return { kind: 'single', date };
}

/**
 * Builds a range covering whole days. Endpoints given in the wrong order are swapped.
 */
export function dateRange(from: Date, to: Date): DateRange {
  const [a, b] = from.getTime() <= to.getTime() ? [from, to] : [to, from];
  return { kind: 'range', from: startOfDay(a), to: endOfDay(b) };
}

export function singleDayRange(date: Date): DateRange {
  return dateRange(date, date);
}

/** Ranges are rebuilt as ordered whole-day ranges; single dates keep their time. */
export function normalizeValue(value: PickerValue): PickerValue {
  return value.kind === 'range' ? dateRange(value.from, value.to) : value;
}

/** Same variant and every endpoint on the same day. */
export function isSameValue(a: PickerValue | null, b: PickerValue | null): boolean {
  if (!a || !b) return a === b;
  if (a.kind === 'single') return b.kind === 'single' && isSameDay(a.date, b.date);
  return b.kind === 'range' && isSameDay(a.from, b.from) && isSameDay(a.to, b.to);
}

/** A range whose endpoints share a day is still being picked. */
export function isRangeInProgress(range: DateRange): boolean {
  return isSameDay(range.from, range.to);
}

/** First date shown for a value: the date itself, or where the range starts. */
export function anchorDate(value: PickerValue): Date {
  return value.kind === 'single' ? value.date : value.from;
}
