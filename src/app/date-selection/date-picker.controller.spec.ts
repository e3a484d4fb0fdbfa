import { describe, expect, it } from 'vitest';
import {
  DatePickerController,
  type DatePickerOptions,
  createRangeDatePicker,
  createSingleDatePicker,
} from './date-picker.controller';
import { buildMonthGrid, endOfDay } from './date-utils';
import { dateRange, singleDate, singleDayRange } from './date-value';
import { SINGLE_MODE } from './selection-modes';
import type {
  CalendarGrid,
  DateRange,
  DismissAction,
  Shortcut,
  SingleDate,
} from './date-selection.types';

class FakeGrid implements CalendarGrid {
  reloads = 0;
  scrolledTo: Date[] = [];

  reloadData() {
    this.reloads++;
  }

  scrollToDate(date: Date) {
    this.scrolledTo.push(date);
  }
}

const day = (month: number, date: number) => new Date(2024, month, date);

function rangePicker(options: DatePickerOptions<DateRange> = {}) {
  const dismissals: DismissAction<DateRange>[] = [];
  let closeRequests = 0;
  const grid = new FakeGrid();
  const picker = createRangeDatePicker({
    now: () => day(5, 1),
    onDismiss: (action) => dismissals.push(action),
    onCloseRequested: () => closeRequests++,
    ...options,
  });
  picker.attachGrid(grid);
  return { picker, grid, dismissals, closeRequests: () => closeRequests };
}

function singlePicker(options: DatePickerOptions<SingleDate> = {}) {
  const dismissals: DismissAction<SingleDate>[] = [];
  let closeRequests = 0;
  const picker = createSingleDatePicker({
    now: () => day(5, 1),
    onDismiss: (action) => dismissals.push(action),
    onCloseRequested: () => closeRequests++,
    ...options,
  });
  return { picker, dismissals, closeRequests: () => closeRequests };
}

describe('DatePickerController', () => {
  it('selects a year-long range and reports it on confirm', () => {
    const { picker, dismissals } = rangePicker({
      minimumDate: day(0, 1),
      maximumDate: day(11, 31),
    });

    picker.onDateTapped(day(0, 1), 'user');
    expect(picker.value()).toEqual({ kind: 'range', from: day(0, 1), to: endOfDay(day(0, 1)) });

    picker.onDateTapped(day(0, 15), 'user');
    expect(picker.value()).toEqual({ kind: 'range', from: day(0, 1), to: endOfDay(day(0, 15)) });

    picker.onDateTapped(day(11, 31), 'user');
    expect(picker.value()).toEqual({ kind: 'range', from: day(0, 1), to: endOfDay(day(11, 31)) });

    picker.confirm();
    picker.dismiss();
    expect(dismissals).toEqual([{ type: 'done', value: dateRange(day(0, 1), day(11, 31)) }]);
  });

  it('ignores programmatic selection echoes', () => {
    const { picker } = rangePicker();
    picker.onDateTapped(day(2, 3), 'programmatic');
    expect(picker.value()).toBeNull();
  });

  it('ignores taps on dates outside the bounds', () => {
    const { picker } = rangePicker({ minimumDate: day(0, 10) });
    picker.onDateTapped(day(0, 9), 'user');
    expect(picker.value()).toBeNull();
  });

  it('asks the grid to redraw on every change', () => {
    const { picker, grid } = rangePicker();
    picker.onDateTapped(day(2, 3), 'user');
    picker.clear();
    expect(grid.reloads).toBe(2);
  });

  describe('cell view-models', () => {
    const [cell] = buildMonthGrid(day(0, 1), 0).filter((c) => c.date.getDate() === 9);

    it('serves cached entries until the selection changes', () => {
      const { picker } = rangePicker();
      const first = picker.cellViewModel(cell);
      expect(picker.cellViewModel(cell)).toBe(first);
      expect(first.isSelected).toBe(false);

      picker.onDateTapped(day(0, 9), 'user');
      const second = picker.cellViewModel(cell);
      expect(second).not.toBe(first);
      expect(second.isSelected).toBe(true);
      expect(second.rangePosition).toBe('single');
    });

    it('drops cached entries before a tap is accepted', () => {
      const { picker } = rangePicker();
      const first = picker.cellViewModel(cell);
      expect(picker.shouldChangeSelection()).toBe(true);
      expect(picker.cellViewModel(cell)).not.toBe(first);
    });

    it('drops cached entries when cleared', () => {
      const { picker } = rangePicker({ initialValue: singleDayRange(day(0, 9)) });
      expect(picker.cellViewModel(cell).isSelected).toBe(true);
      picker.clear();
      expect(picker.cellViewModel(cell).isSelected).toBe(false);
    });
  });

  describe('shortcuts', () => {
    const lastTen: Shortcut<DateRange> = {
      name: 'First ten days',
      action: () => dateRange(day(0, 1), day(0, 10)),
    };

    it('applies a shortcut inside the bounds and highlights it', () => {
      const { picker } = rangePicker({ shortcuts: [lastTen] });
      expect(picker.selectedShortcut()).toBeNull();

      expect(picker.selectShortcut(lastTen)).toBe(true);
      expect(picker.value()).toEqual(dateRange(day(0, 1), day(0, 10)));
      expect(picker.selectedShortcut()).toBe(lastTen);
    });

    it('rejects a shortcut starting before the minimum date', () => {
      const initial = dateRange(day(0, 20), day(0, 25));
      const { picker } = rangePicker({
        minimumDate: day(0, 5),
        initialValue: initial,
        shortcuts: [lastTen],
      });

      expect(picker.selectShortcut(lastTen)).toBe(false);
      expect(picker.value()).toEqual(initial);
    });

    it('stores shortcut ranges as ordered whole days', () => {
      const reversed: Shortcut<DateRange> = {
        name: 'Reversed',
        action: () => ({ kind: 'range', from: new Date(2024, 0, 10, 12), to: new Date(2024, 0, 5, 8) }),
      };
      const { picker } = rangePicker();

      expect(picker.selectShortcut(reversed)).toBe(true);
      expect(picker.value()).toEqual({ kind: 'range', from: day(0, 5), to: endOfDay(day(0, 10)) });
    });

    it('rejects a reversed shortcut range once ordered outside the bounds', () => {
      const reversed: Shortcut<DateRange> = {
        name: 'Reversed',
        action: () => ({ kind: 'range', from: day(0, 20), to: day(0, 5) }),
      };
      const { picker } = rangePicker({ minimumDate: day(0, 10) });

      expect(picker.selectShortcut(reversed)).toBe(false);
      expect(picker.value()).toBeNull();
    });

    it('stops highlighting once the value no longer matches', () => {
      const { picker } = rangePicker({ shortcuts: [lastTen] });
      picker.selectShortcut(lastTen);
      picker.onDateTapped(day(0, 12), 'user');
      expect(picker.selectedShortcut()).toBeNull();
    });
  });

  describe('month header taps', () => {
    it('selects the selectable part of the month', () => {
      const { picker } = rangePicker({ minimumDate: day(0, 10) });
      expect(picker.selectMonth(day(0, 1))).toBe(true);
      expect(picker.value()).toEqual(dateRange(day(0, 10), day(0, 31)));
    });

    it('leaves the value alone for a month outside the bounds', () => {
      const { picker } = rangePicker({ maximumDate: day(0, 31) });
      expect(picker.selectMonth(day(1, 1))).toBe(false);
      expect(picker.value()).toBeNull();
    });

    it('can be switched off', () => {
      const { picker } = rangePicker({ selectMonthOnHeaderTap: false });
      expect(picker.selectMonth(day(0, 1))).toBe(false);
    });

    it('has no effect in single mode', () => {
      const picker = new DatePickerController(SINGLE_MODE, { selectMonthOnHeaderTap: true });
      expect(picker.selectMonth(day(0, 1))).toBe(false);
    });
  });

  describe('confirming and dismissing', () => {
    it('disables confirm while nothing is selected', () => {
      const { picker, closeRequests } = rangePicker();
      expect(picker.canConfirm()).toBe(false);
      picker.confirm();
      expect(closeRequests()).toBe(0);
    });

    it('allows an empty result when nil selection is allowed', () => {
      const { picker, dismissals } = rangePicker({ allowNilSelection: true });
      expect(picker.canConfirm()).toBe(true);
      picker.confirm();
      picker.dismiss();
      expect(dismissals).toEqual([{ type: 'done', value: null }]);
    });

    it('reports cancel when closed without confirming', () => {
      const { picker, dismissals, closeRequests } = rangePicker();
      picker.onDateTapped(day(0, 3), 'user');
      picker.cancel();
      picker.dismiss();
      expect(closeRequests()).toBe(1);
      expect(dismissals).toEqual([{ type: 'cancel' }]);
    });

    it('reports exactly once and ignores later events', () => {
      const { picker, dismissals } = rangePicker();
      picker.onDateTapped(day(0, 3), 'user');
      picker.confirm();
      picker.dismiss();
      picker.dismiss();
      picker.onDateTapped(day(0, 8), 'user');

      expect(picker.isDismissed).toBe(true);
      expect(dismissals).toHaveLength(1);
      expect(picker.value()).toEqual(singleDayRange(day(0, 3)));
      expect(picker.shouldChangeSelection()).toBe(false);
    });
  });

  describe('single mode', () => {
    it('clears the date when tapped again with nil allowed', () => {
      const { picker } = singlePicker({ allowNilSelection: true });
      picker.onDateTapped(day(3, 4), 'user');
      expect(picker.value()).toEqual(singleDate(day(3, 4)));
      picker.onDateTapped(day(3, 4), 'user');
      expect(picker.value()).toBeNull();
    });

    it('closes right after a selection when asked to', () => {
      const { picker, dismissals, closeRequests } = singlePicker({
        closeOnSelectionImmediately: true,
      });
      picker.onDateTapped(day(3, 4), 'user');
      expect(closeRequests()).toBe(1);

      picker.dismiss();
      expect(dismissals).toEqual([{ type: 'done', value: singleDate(day(3, 4)) }]);
    });

    it('shows the value in the current-value display', () => {
      const { picker } = singlePicker();
      expect(picker.valueLabel()).toBe('Select a date');
      picker.onDateTapped(day(3, 4), 'user');
      expect(picker.valueLabel()).toBe('04/04/2024');
    });
  });

  it('stores an initial range as ordered whole days', () => {
    const { picker } = rangePicker({
      initialValue: { kind: 'range', from: new Date(2024, 2, 9, 15), to: new Date(2024, 2, 2, 6) },
    });
    expect(picker.value()).toEqual(dateRange(day(2, 2), day(2, 9)));
  });

  describe('range modification disabled', () => {
    it('starts a new range after a completed one', () => {
      const { picker } = rangePicker({
        allowRangeModification: false,
        initialValue: dateRange(day(0, 1), day(0, 10)),
      });
      picker.onDateTapped(day(0, 5), 'user');
      expect(picker.value()).toEqual(singleDayRange(day(0, 5)));
    });
  });

  describe('maxDaysAfterSelection', () => {
    it('moves the maximum date after each tap', () => {
      const { picker } = rangePicker({ maxDaysAfterSelection: 5 });
      picker.onDateTapped(day(0, 10), 'user');
      expect(picker.bounds().maximumDate).toEqual(endOfDay(day(0, 15)));
      expect(picker.isDateSelectable(day(0, 16))).toBe(false);
    });

    it('ignores a tap past the configured maximum', () => {
      const { picker } = rangePicker({ maximumDate: day(0, 31), maxDaysAfterSelection: 5 });
      picker.onDateTapped(day(5, 15), 'user');

      expect(picker.value()).toBeNull();
      expect(picker.bounds().maximumDate).toEqual(endOfDay(day(0, 31)));
    });

    it('leaves the maximum alone on a tap before the minimum', () => {
      const { picker } = rangePicker({
        minimumDate: day(0, 10),
        maximumDate: day(0, 31),
        maxDaysAfterSelection: 5,
      });
      picker.onDateTapped(day(0, 1), 'user');

      expect(picker.value()).toBeNull();
      expect(picker.bounds().maximumDate).toEqual(endOfDay(day(0, 31)));
    });

    it('redraws the grid with the moved maximum', () => {
      const { picker, grid } = rangePicker({ maxDaysAfterSelection: 5 });
      picker.onDateTapped(day(0, 10), 'user');
      expect(grid.reloads).toBe(1);

      const [cell] = buildMonthGrid(day(0, 1), 0).filter((c) => c.date.getDate() === 16);
      expect(picker.cellViewModel(cell).isDisabled).toBe(true);
    });
  });

  describe('start', () => {
    it('scrolls to the start of the initial range', () => {
      const { picker, grid } = rangePicker({ initialValue: dateRange(day(3, 2), day(4, 9)) });
      picker.start();
      expect(grid.scrolledTo).toEqual([day(3, 2)]);
      expect(grid.reloads).toBe(1);
    });

    it('scrolls to a maximum date that is already past', () => {
      const { picker, grid } = rangePicker({ maximumDate: day(0, 31) });
      picker.start();
      expect(grid.scrolledTo).toEqual([endOfDay(day(0, 31))]);
    });

    it('scrolls to today otherwise', () => {
      const { picker, grid } = rangePicker({ maximumDate: day(11, 31) });
      picker.start();
      expect(grid.scrolledTo).toEqual([day(5, 1)]);
    });
  });

  it('derives the visible window from the bounds', () => {
    const { picker } = rangePicker({
      minimumDate: day(0, 1),
      maximumDate: day(11, 31),
      minimumMonthWindow: 0,
      maximumMonthWindow: 1,
    });
    expect(picker.visibleWindow()).toEqual({
      start: day(0, 1),
      end: new Date(2025, 0, 31, 23, 59, 59, 999),
    });
  });
});
