import { describe, expect, it } from 'vitest';
import { dayFormatter, formatMMDDYYYY, formatValue } from './date-format';
import { dateRange, singleDate } from './date-value';

describe('formatValue', () => {
  it('shows a placeholder per mode', () => {
    expect(formatValue(null, 'single')).toBe('Select a date');
    expect(formatValue(null, 'range')).toBe('Select a date range');
  });

  it('formats dates as MM/DD/YYYY', () => {
    expect(formatValue(singleDate(new Date(2024, 6, 4)), 'single')).toBe('07/04/2024');
    expect(formatValue(dateRange(new Date(2024, 0, 1), new Date(2024, 0, 15)), 'range')).toBe(
      '01/01/2024 - 01/15/2024'
    );
  });
});

describe('formatMMDDYYYY', () => {
  it('pads month and day', () => {
    expect(formatMMDDYYYY(new Date(2024, 1, 3))).toBe('02/03/2024');
  });
});

describe('dayFormatter', () => {
  it('labels a day with its number', () => {
    expect(dayFormatter('en-US')(new Date(2024, 1, 3))).toBe('3');
  });
});
