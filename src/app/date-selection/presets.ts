import { addDays, endOfDay, shiftMonths, startOfDay } from './date-utils';
import { dateRange, isSameValue, singleDate } from './date-value';
import type { DateRange, PickerValue, Shortcut, SingleDate } from './date-selection.types';

export type SinglePresetKey = 'today' | 'tomorrow' | 'yesterday';
export type RangePresetKey = 'today' | 'lastWeek' | 'lastMonth';

export const SINGLE_PRESETS: ReadonlyArray<{ key: SinglePresetKey; label: string }> = [
  { key: 'today', label: 'Today' },
  { key: 'tomorrow', label: 'Tomorrow' },
  { key: 'yesterday', label: 'Yesterday' },
];

export const RANGE_PRESETS: ReadonlyArray<{ key: RangePresetKey; label: string }> = [
  { key: 'today', label: 'Today' },
  { key: 'lastWeek', label: 'Last week' },
  { key: 'lastMonth', label: 'Last month' },
];

/** Calculate the date for a single-mode preset. */
export function calcSinglePreset(key: SinglePresetKey, today: Date): SingleDate {
  const t = startOfDay(today);
  if (key === 'tomorrow') return singleDate(addDays(t, 1));
  if (key === 'yesterday') return singleDate(addDays(t, -1));
  return singleDate(t);
}

/** Calculate the range for a range-mode preset. Every preset ends with today. */
export function calcRangePreset(key: RangePresetKey, today: Date): DateRange {
  const end = endOfDay(today);
  if (key === 'lastWeek') return dateRange(addDays(today, -7), end);
  if (key === 'lastMonth') return dateRange(shiftMonths(today, -1), end);
  return dateRange(today, end);
}

export function singleShortcuts(
  keys: ReadonlyArray<SinglePresetKey> = SINGLE_PRESETS.map((p) => p.key),
  now: () => Date = () => new Date()
): Shortcut<SingleDate>[] {
  return keys.map((key) => ({
    name: SINGLE_PRESETS.find((p) => p.key === key)?.label ?? key,
    action: () => calcSinglePreset(key, now()),
  }));
}

export function rangeShortcuts(
  keys: ReadonlyArray<RangePresetKey> = RANGE_PRESETS.map((p) => p.key),
  now: () => Date = () => new Date()
): Shortcut<DateRange>[] {
  return keys.map((key) => ({
    name: RANGE_PRESETS.find((p) => p.key === key)?.label ?? key,
    action: () => calcRangePreset(key, now()),
  }));
}

/**
 * Preset detection: the first shortcut producing the current value
 * (compared day by day) is the one to highlight.
 */
export function findMatchingShortcut<V extends PickerValue>(
  shortcuts: ReadonlyArray<Shortcut<V>>,
  value: V | null
): Shortcut<V> | null {
  if (!value) return null;
  return shortcuts.find((s) => isSameValue(s.action(), value)) ?? null;
}
