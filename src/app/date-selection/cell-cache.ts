import { isDateDisabled } from './bounds';
import { isSameDay, startOfDay } from './date-utils';
import type {
  Bounds,
  CalendarCell,
  CellViewModel,
  GridPosition,
  PickerValue,
  RangePosition,
} from './date-selection.types';

export type CellContext = {
  bounds: Bounds;
  value: PickerValue | null;
  today: Date;
  formatDay: (date: Date) => string;
};

function rangePosition(date: Date, value: PickerValue | null): RangePosition {
  if (!value || value.kind !== 'range') return 'none';
  const day = startOfDay(date).getTime();
  if (day < value.from.getTime() || day > value.to.getTime()) return 'none';
  const isStart = isSameDay(date, value.from);
  const isEnd = isSameDay(date, value.to);
  if (isStart && isEnd) return 'single';
  if (isStart) return 'start';
  if (isEnd) return 'end';
  return 'middle';
}

/**
 * Derived visual state of one grid cell. Days of neighbouring months
 * carry no label and are never shown as selected, but keep their range
 * position so the highlight band stays continuous.
 */
export function makeCellViewModel(cell: CalendarCell, ctx: CellContext): CellViewModel {
  const position = rangePosition(cell.date, ctx.value);
  let isSelected = false;
  if (cell.belongsToMonth && ctx.value) {
    isSelected =
      ctx.value.kind === 'single' ? isSameDay(cell.date, ctx.value.date) : position !== 'none';
  }

  return {
    label: cell.belongsToMonth ? ctx.formatDay(cell.date) : null,
    isSelected,
    isToday: isSameDay(cell.date, ctx.today),
    isDisabled: isDateDisabled(cell.date, ctx.bounds),
    rangePosition: position,
  };
}

function keyOf(position: GridPosition): string {
  return `${position.section}:${position.item}`;
}

/** Memo of cell view-models by grid position. Never the source of truth for the selection. */
export class CellViewModelCache {
  private entries = new Map<string, CellViewModel>();

  get size(): number {
    return this.entries.size;
  }

  get(position: GridPosition): CellViewModel | null {
    return this.entries.get(keyOf(position)) ?? null;
  }

  put(position: GridPosition, vm: CellViewModel) {
    this.entries.set(keyOf(position), vm);
  }

  /** Drops every entry at once; there is no partial invalidation. */
  invalidateAll() {
    this.entries = new Map();
  }
}
