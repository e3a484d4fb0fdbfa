/*
 * Public API of the date picker library.
 */

export * from './app/date-selection/date-selection.types';
export * from './app/date-selection/date-utils';
export * from './app/date-selection/date-value';
export * from './app/date-selection/date-format';
export * from './app/date-selection/selection-policy';
export * from './app/date-selection/selection-modes';
export * from './app/date-selection/bounds';
export * from './app/date-selection/presets';
export * from './app/date-selection/cell-cache';
export * from './app/date-selection/date-picker.controller';
export * from './app/date-picker/date-picker.config';
export * from './app/date-picker/date-picker.component';
