import { addMonths, endOfDay, endOfMonth, startOfDay, startOfMonth } from './date-utils';
import type { Bounds, CalendarWindow, DateRange, PickerValue } from './date-selection.types';

/** Scrollable extent used when the bounds do not define one. */
export const DEFAULT_WINDOW_START = new Date(2000, 0, 1);
export const DEFAULT_WINDOW_END = endOfMonth(new Date(2030, 11, 1));

export type BoundsInput = {
  minimumDate?: Date | null;
  maximumDate?: Date | null;
  minimumMonthWindow?: number | null;
  maximumMonthWindow?: number | null;
};

/** Minimum snaps to the start of its day, maximum to the end of its day. */
export function normalizeBounds(input: BoundsInput): Bounds {
  return {
    minimumDate: input.minimumDate ? startOfDay(input.minimumDate) : null,
    maximumDate: input.maximumDate ? endOfDay(input.maximumDate) : null,
    minimumMonthWindow: input.minimumMonthWindow ?? null,
    maximumMonthWindow: input.maximumMonthWindow ?? null,
  };
}

export function isOutOfRange(
  value: PickerValue,
  minDate: Date | null,
  maxDate: Date | null
): boolean {
  const first = value.kind === 'single' ? value.date : value.from;
  const last = value.kind === 'single' ? value.date : value.to;
  if (minDate && first.getTime() < minDate.getTime()) return true;
  if (maxDate && last.getTime() > maxDate.getTime()) return true;
  return false;
}

/** Grid dates outside the bounds are rendered as non-selectable. */
export function isDateDisabled(date: Date, bounds: Bounds): boolean {
  const day = startOfDay(date).getTime();
  if (bounds.minimumDate && day < bounds.minimumDate.getTime()) return true;
  if (bounds.maximumDate && day > bounds.maximumDate.getTime()) return true;
  return false;
}

/**
 * Start and end of the scrollable grid. Each side only moves away from the
 * default when both its bound and its month window are configured.
 */
export function calendarWindow(bounds: Bounds): CalendarWindow {
  let start = DEFAULT_WINDOW_START;
  let end = DEFAULT_WINDOW_END;

  if (bounds.minimumDate && bounds.minimumMonthWindow !== null) {
    start = startOfMonth(addMonths(bounds.minimumDate, -bounds.minimumMonthWindow));
  }
  if (bounds.maximumDate && bounds.maximumMonthWindow !== null) {
    end = endOfMonth(addMonths(bounds.maximumDate, bounds.maximumMonthWindow));
  }
  return { start, end };
}

/**
 * Whole-month range for a tap on a month header, trimmed to the bounds.
 * Returns null when no day of the month is selectable.
 */
export function monthSelection(month: Date, bounds: Bounds): DateRange | null {
  let from = startOfMonth(month);
  let to = endOfMonth(month);
  const { minimumDate, maximumDate } = bounds;

  if (minimumDate) {
    if (to.getTime() < minimumDate.getTime()) return null;
    if (from.getTime() < minimumDate.getTime()) from = startOfDay(minimumDate);
  }
  if (maximumDate) {
    if (from.getTime() > maximumDate.getTime()) return null;
    if (to.getTime() > maximumDate.getTime()) to = endOfDay(maximumDate);
  }
  return { kind: 'range', from, to };
}
