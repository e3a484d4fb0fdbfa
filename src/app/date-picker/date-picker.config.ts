import { InjectionToken, type ValueProvider } from '@angular/core';

export type DatePickerAppearance = {
  cancelButtonTitle: string;
  doneButtonTitle: string;
  clearButtonTitle: string;
  /** 0 = Sunday .. 6 = Saturday */
  firstDayOfWeek: number;
  locale: string;
};

export const DEFAULT_APPEARANCE: DatePickerAppearance = {
  cancelButtonTitle: 'Cancel',
  doneButtonTitle: 'Done',
  clearButtonTitle: 'Clear',
  firstDayOfWeek: 0,
  locale: 'en-US',
};

export const DATE_PICKER_APPEARANCE = new InjectionToken<Partial<DatePickerAppearance>>(
  'DATE_PICKER_APPEARANCE'
);

/** App-wide overrides, e.g. `providers: [provideDatePickerAppearance({ firstDayOfWeek: 1 })]`. */
export function provideDatePickerAppearance(
  appearance: Partial<DatePickerAppearance>
): ValueProvider {
  return { provide: DATE_PICKER_APPEARANCE, useValue: appearance };
}

export function resolveAppearance(
  overrides: Partial<DatePickerAppearance> | null | undefined
): DatePickerAppearance {
  return { ...DEFAULT_APPEARANCE, ...overrides };
}

const WEEKDAY_SHORT = ['Su', 'Mo', 'Tu', 'We', 'Th', 'Fr', 'Sa'];

/** Weekday header labels, starting with `firstDayOfWeek`. */
export function weekdayLabels(firstDayOfWeek: number): string[] {
  return WEEKDAY_SHORT.map((_, i) => WEEKDAY_SHORT[(firstDayOfWeek + i) % 7]);
}
