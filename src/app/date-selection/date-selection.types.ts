export type PickerMode = 'single' | 'range';

export type SingleDate = { readonly kind: 'single'; readonly date: Date };

/** `from` is always start of day and `to` end of day, with `from <= to`. */
export type DateRange = { readonly kind: 'range'; readonly from: Date; readonly to: Date };

export type PickerValue = SingleDate | DateRange;

export type SelectionFlags = {
  allowNilSelection: boolean;
  allowRangeModification: boolean;
};

export type Bounds = {
  minimumDate: Date | null;
  maximumDate: Date | null;
  minimumMonthWindow: number | null;
  maximumMonthWindow: number | null;
};

export type CalendarWindow = { start: Date; end: Date };

export type Shortcut<V extends PickerValue> = {
  name: string;
  action: () => V;
};

export type DismissAction<V extends PickerValue> =
  | { type: 'done'; value: V | null }
  | { type: 'cancel' };

/** Section is the month offset inside the visible window, item the 0..41 slot. */
export type GridPosition = { section: number; item: number };

export type CalendarCell = {
  date: Date;
  position: GridPosition;
  belongsToMonth: boolean;
};

export type RangePosition = 'none' | 'single' | 'start' | 'middle' | 'end';

export type CellViewModel = {
  label: string | null;
  isSelected: boolean;
  isToday: boolean;
  isDisabled: boolean;
  rangePosition: RangePosition;
};

/** Who caused a grid (de)selection event. Only `user` events reach the selection policy. */
export type SelectionTrigger = 'user' | 'programmatic';

/**
 * What the controller needs from the month-grid widget. The grid reads
 * selection state from the cell view-models, so it only has to redraw
 * and scroll when asked.
 */
export interface CalendarGrid {
  reloadData(): void;
  scrollToDate(date: Date): void;
}
