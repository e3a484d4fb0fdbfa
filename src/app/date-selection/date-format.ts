import type { PickerMode, PickerValue } from './date-selection.types';

export const PLACEHOLDERS: Record<PickerMode, string> = {
  single: 'Select a date',
  range: 'Select a date range',
};

export function formatMMDDYYYY(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  const yy = String(d.getFullYear());
  return `${mm}/${dd}/${yy}`;
}

/**
 * Text for the current-value display:
 * - nothing selected -> placeholder for the mode
 * - single date -> MM/DD/YYYY
 * - range -> MM/DD/YYYY - MM/DD/YYYY
 */
export function formatValue(value: PickerValue | null, mode: PickerMode): string {
  if (!value) return PLACEHOLDERS[mode];
  if (value.kind === 'single') return formatMMDDYYYY(value.date);
  return `${formatMMDDYYYY(value.from)} - ${formatMMDDYYYY(value.to)}`;
}

export function dayFormatter(locale: string): (date: Date) => string {
  const fmt = new Intl.DateTimeFormat(locale, { day: 'numeric' });
  return (date) => fmt.format(date);
}
