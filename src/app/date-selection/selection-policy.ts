import { endOfDay, isSameDay, startOfDay } from './date-utils';
import { isRangeInProgress, singleDate, singleDayRange } from './date-value';
import type {
  DateRange,
  PickerMode,
  PickerValue,
  SelectionFlags,
  SingleDate,
} from './date-selection.types';

export const DEFAULT_SELECTION_FLAGS: SelectionFlags = {
  allowNilSelection: false,
  allowRangeModification: true,
};

export function nextSingleValue(
  current: SingleDate | null,
  tapped: Date,
  flags: SelectionFlags
): SingleDate | null {
  if (current && flags.allowNilSelection && isSameDay(current.date, tapped)) return null;
  return singleDate(tapped);
}

/**
 * Range selection rules. The order of the checks below decides ambiguous taps:
 * on a single-day range, tapping that day matches the `from` rule first.
 */
export function nextRangeValue(
  current: DateRange | null,
  tapped: Date,
  flags: SelectionFlags
): DateRange | null {
  if (!current) return singleDayRange(tapped);

  if (
    flags.allowNilSelection &&
    isSameDay(tapped, current.from) &&
    isSameDay(tapped, current.to)
  ) {
    return null;
  }

  // With modification disabled, a completed range is replaced, not edited.
  if (!flags.allowRangeModification && !isRangeInProgress(current)) {
    return singleDayRange(tapped);
  }

  if (isSameDay(tapped, current.from)) {
    return { kind: 'range', from: current.from, to: endOfDay(tapped) };
  }
  if (isSameDay(tapped, current.to)) {
    return { kind: 'range', from: startOfDay(tapped), to: current.to };
  }
  if (tapped.getTime() < current.from.getTime()) {
    return { kind: 'range', from: startOfDay(tapped), to: current.to };
  }
  return { kind: 'range', from: current.from, to: endOfDay(tapped) };
}

/**
 * Mode-dispatching form of the policy. A current value of the other
 * variant than `mode` counts as no selection.
 */
export function nextValue(
  current: PickerValue | null,
  tapped: Date,
  mode: PickerMode,
  flags: SelectionFlags = DEFAULT_SELECTION_FLAGS
): PickerValue | null {
  if (mode === 'single') {
    return nextSingleValue(current?.kind === 'single' ? current : null, tapped, flags);
  }
  return nextRangeValue(current?.kind === 'range' ? current : null, tapped, flags);
}
