import { monthSelection } from './bounds';
import { dateRange, normalizeValue } from './date-value';
import { nextRangeValue, nextSingleValue, nextValue } from './selection-policy';
import type {
  Bounds,
  DateRange,
  PickerMode,
  PickerValue,
  SelectionFlags,
  SingleDate,
} from './date-selection.types';

/**
 * Binds the value variant a controller works with to the policy that produces it,
 * so a single-mode controller can never end up holding a range and vice versa.
 */
export interface SelectionMode<V extends PickerValue> {
  readonly kind: PickerMode;
  next(current: V | null, tapped: Date, flags: SelectionFlags): V | null;
  /** Brings a caller-supplied value into shape before it is stored. */
  normalize(value: V): V;
  /** Whole-month value for a month header tap. Only range selection has one. */
  readonly fromMonth?: (month: Date, bounds: Bounds) => V | null;
}

export const SINGLE_MODE: SelectionMode<SingleDate> = {
  kind: 'single',
  next: nextSingleValue,
  normalize: (value) => value,
};

export const RANGE_MODE: SelectionMode<DateRange> = {
  kind: 'range',
  next: nextRangeValue,
  normalize: (value) => dateRange(value.from, value.to),
  fromMonth: monthSelection,
};

/** Mode chosen at run time, e.g. from a component input. */
export function selectionModeFor(kind: PickerMode): SelectionMode<PickerValue> {
  return {
    kind,
    next: (current, tapped, flags) => nextValue(current, tapped, kind, flags),
    normalize: normalizeValue,
    fromMonth: kind === 'range' ? monthSelection : undefined,
  };
}
