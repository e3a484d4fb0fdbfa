import { computed, signal } from '@angular/core';

import { type BoundsInput, calendarWindow, isDateDisabled, isOutOfRange, normalizeBounds } from './bounds';
import { CellViewModelCache, makeCellViewModel } from './cell-cache';
import { dayFormatter, formatValue } from './date-format';
import { addDays, endOfDay } from './date-utils';
import { anchorDate } from './date-value';
import { findMatchingShortcut } from './presets';
import { DEFAULT_SELECTION_FLAGS } from './selection-policy';
import { RANGE_MODE, SINGLE_MODE, type SelectionMode } from './selection-modes';
import type {
  Bounds,
  CalendarCell,
  CalendarGrid,
  CalendarWindow,
  CellViewModel,
  DateRange,
  DismissAction,
  PickerValue,
  SelectionFlags,
  SelectionTrigger,
  Shortcut,
  SingleDate,
} from './date-selection.types';

export type DatePickerOptions<V extends PickerValue> = BoundsInput & {
  /** Value selected when the picker opens. */
  initialValue?: V | null;

  /**
   * When true:
   * - confirming is always possible, even with nothing selected
   * - tapping the selected date (or single-day range) again clears it
   */
  allowNilSelection?: boolean;

  /**
   * When false, the next tap after a multi-day range is picked
   * starts a new range instead of moving an endpoint.
   */
  allowRangeModification?: boolean;

  /** Range mode only: tapping a month header selects the whole month. */
  selectMonthOnHeaderTap?: boolean;

  /** Single mode only: confirm as soon as a date is picked. */
  closeOnSelectionImmediately?: boolean;

  /** Each tap moves the maximum date to this many days after the tapped date. */
  maxDaysAfterSelection?: number | null;

  shortcuts?: ReadonlyArray<Shortcut<V>>;
  locale?: string;
  now?: () => Date;

  /** Fired exactly once, after the picker has been dismissed. */
  onDismiss?: (action: DismissAction<V>) => void;

  /** The picker asks its host to close it (Done, Cancel, immediate close). */
  onCloseRequested?: () => void;
};

/**
 * Owns the current value of one picker presentation and the cell view-model cache.
 * Every state change goes through here; the grid only reports user taps.
 *
 * Single use: once `dismiss()` ran, every further event is ignored.
 */
export class DatePickerController<V extends PickerValue> {
  private readonly state = signal<V | null>(null);
  private readonly boundsState = signal<Bounds>(normalizeBounds({}));
  private readonly cache = new CellViewModelCache();
  private readonly flags: SelectionFlags;
  private readonly formatDay: (date: Date) => string;
  private readonly now: () => Date;
  private grid: CalendarGrid | null = null;
  private isDone = false;
  private dismissed = false;

  readonly shortcuts: ReadonlyArray<Shortcut<V>>;

  readonly value = this.state.asReadonly();
  readonly bounds = this.boundsState.asReadonly();

  /**
   * Shortcut matching the current value, if any.
   * Recomputed when the value changes, not when the clock does: a picker left
   * open across midnight keeps the highlight it had.
   */
  readonly selectedShortcut = computed(() => findMatchingShortcut(this.shortcuts, this.value()));

  /** Text of the current-value display. */
  readonly valueLabel = computed(() => formatValue(this.value(), this.mode.kind));

  /** Done is enabled when a value exists or an empty result is allowed. */
  readonly canConfirm = computed(() => this.flags.allowNilSelection || this.value() !== null);

  constructor(
    readonly mode: SelectionMode<V>,
    private readonly options: DatePickerOptions<V> = {}
  ) {
    this.flags = {
      allowNilSelection: options.allowNilSelection ?? DEFAULT_SELECTION_FLAGS.allowNilSelection,
      allowRangeModification:
        options.allowRangeModification ?? DEFAULT_SELECTION_FLAGS.allowRangeModification,
    };
    this.shortcuts = options.shortcuts ?? [];
    this.formatDay = dayFormatter(options.locale ?? 'en-US');
    this.now = options.now ?? (() => new Date());
    this.boundsState.set(normalizeBounds(options));
    this.state.set(options.initialValue ? mode.normalize(options.initialValue) : null);
  }

  get isDismissed(): boolean {
    return this.dismissed;
  }

  attachGrid(grid: CalendarGrid | null) {
    this.grid = grid;
  }

  /**
   * Shows the initial state in the grid:
   * - an initial value is selected and scrolled to
   * - otherwise scroll to today, or to the maximum date when it is already past
   */
  start() {
    const current = this.value();
    if (current) {
      this.grid?.reloadData();
      this.grid?.scrollToDate(anchorDate(current));
      return;
    }
    this.grid?.scrollToDate(this.defaultScrollTarget());
  }

  visibleWindow(): CalendarWindow {
    return calendarWindow(this.bounds());
  }

  isDateSelectable(date: Date): boolean {
    return !isDateDisabled(date, this.bounds());
  }

  /** Per-cell query of the grid, called on every (re)display of a cell. */
  cellViewModel(cell: CalendarCell): CellViewModel {
    const cached = this.cache.get(cell.position);
    if (cached) return cached;

    const vm = makeCellViewModel(cell, {
      bounds: this.bounds(),
      value: this.value(),
      today: this.now(),
      formatDay: this.formatDay,
    });
    this.cache.put(cell.position, vm);
    return vm;
  }

  /**
   * Asked by the grid before it accepts a tap. The cache is dropped first
   * so no highlight from the previous selection survives the re-render.
   */
  shouldChangeSelection(): boolean {
    this.cache.invalidateAll();
    return !this.dismissed;
  }

  /** Selection and deselection events of the grid. Programmatic echoes are ignored. */
  onDateTapped(date: Date, trigger: SelectionTrigger) {
    if (trigger !== 'user' || this.dismissed) return;

    this.cache.invalidateAll();
    if (!this.isDateSelectable(date)) return;

    // Only accepted taps move the maximum; commit/clear below redraw the grid.
    const { maxDaysAfterSelection } = this.options;
    if (maxDaysAfterSelection !== undefined && maxDaysAfterSelection !== null) {
      const maximumDate = endOfDay(addDays(date, maxDaysAfterSelection));
      this.boundsState.update((b) => ({ ...b, maximumDate }));
    }

    const next = this.mode.next(this.value(), date, this.flags);
    if (next) this.commit(next);
    else this.clear();

    if (
      this.options.closeOnSelectionImmediately &&
      this.mode.kind === 'single' &&
      this.value() !== null
    ) {
      this.confirm();
    }
  }

  /** Applies a shortcut unless its value falls outside the bounds. */
  selectShortcut(shortcut: Shortcut<V>): boolean {
    if (this.dismissed) return false;
    this.cache.invalidateAll();

    const next = this.mode.normalize(shortcut.action());
    const { minimumDate, maximumDate } = this.bounds();
    if (isOutOfRange(next, minimumDate, maximumDate)) return false;

    this.commit(next);
    return true;
  }

  /** Month header tap: selects the selectable part of that month. */
  selectMonth(month: Date): boolean {
    const fromMonth = this.mode.fromMonth;
    if (this.dismissed || !this.options.selectMonthOnHeaderTap || !fromMonth) return false;
    this.cache.invalidateAll();

    const next = fromMonth(month, this.bounds());
    if (!next) return false;
    const { minimumDate, maximumDate } = this.bounds();
    if (isOutOfRange(next, minimumDate, maximumDate)) return false;

    this.commit(next);
    return true;
  }

  clear() {
    if (this.dismissed) return;
    this.cache.invalidateAll();
    this.state.set(null);
    this.grid?.reloadData();
  }

  confirm() {
    if (this.dismissed || !this.canConfirm()) return;
    this.isDone = true;
    this.options.onCloseRequested?.();
  }

  cancel() {
    if (this.dismissed) return;
    this.isDone = false;
    this.options.onCloseRequested?.();
  }

  /** Called once the picker view is gone. Reports the result exactly once. */
  dismiss() {
    if (this.dismissed) return;
    this.dismissed = true;

    const action: DismissAction<V> = this.isDone
      ? { type: 'done', value: this.value() }
      : { type: 'cancel' };
    this.options.onDismiss?.(action);
  }

  private commit(value: V) {
    this.cache.invalidateAll();
    this.state.set(this.mode.normalize(value));
    this.grid?.reloadData();
  }

  private defaultScrollTarget(): Date {
    const now = this.now();
    const max = this.bounds().maximumDate;
    return max && max.getTime() < now.getTime() ? max : now;
  }
}

export function createSingleDatePicker(
  options: DatePickerOptions<SingleDate> = {}
): DatePickerController<SingleDate> {
  return new DatePickerController(SINGLE_MODE, options);
}

/** Range pickers select whole months on header taps unless told otherwise. */
export function createRangeDatePicker(
  options: DatePickerOptions<DateRange> = {}
): DatePickerController<DateRange> {
  return new DatePickerController(RANGE_MODE, { selectMonthOnHeaderTap: true, ...options });
}
