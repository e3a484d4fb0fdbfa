import { CommonModule } from '@angular/common';
import {
  Component,
  EventEmitter,
  HostListener,
  Inject,
  Input,
  OnDestroy,
  OnInit,
  Optional,
  Output,
  computed,
  signal,
} from '@angular/core';
import { FormsModule } from '@angular/forms';

import { DatePickerController } from '../date-selection/date-picker.controller';
import {
  addMonths,
  buildMonthGrid,
  monthIndex,
  monthLabel,
  monthName,
  startOfMonth,
  yearOptions,
} from '../date-selection/date-utils';
import { isSameValue } from '../date-selection/date-value';
import { selectionModeFor } from '../date-selection/selection-modes';
import type {
  CalendarCell,
  CalendarGrid,
  CalendarWindow,
  CellViewModel,
  DismissAction,
  PickerMode,
  PickerValue,
  Shortcut,
} from '../date-selection/date-selection.types';
import {
  DATE_PICKER_APPEARANCE,
  type DatePickerAppearance,
  resolveAppearance,
  weekdayLabels,
} from './date-picker.config';

export type RenderedCell = { cell: CalendarCell; vm: CellViewModel };

/**
 * Calendar picker for one presentation.
 * The host shows it, listens to `closeRequest` to remove it, and reads the
 * outcome from `dismissed`, which fires once when the component is destroyed.
 */
@Component({
  selector: 'app-date-picker',
  standalone: true,
  imports: [CommonModule, FormsModule],
  template: `
    <div class="picker" *ngIf="controller() as ctrl">
      <header class="bar">
        <button type="button" (click)="cancel()">{{ appearance.cancelButtonTitle }}</button>
        <span class="title">{{ title }}</span>
        <button type="button" [disabled]="!ctrl.canConfirm()" (click)="done()">
          {{ appearance.doneButtonTitle }}
        </button>
      </header>

      <div class="current" *ngIf="!closeOnSelectionImmediately">
        <span>{{ ctrl.valueLabel() }}</span>
        <button type="button" *ngIf="ctrl.value()" (click)="clear()">
          {{ appearance.clearButtonTitle }}
        </button>
      </div>

      <div class="nav">
        <button type="button" [disabled]="!canGoPrev()" (click)="prevMonth()">‹</button>
        <button type="button" class="month-title" (click)="onHeaderTap()">{{ monthTitle() }}</button>
        <select [ngModel]="visibleMonthIndex()" (ngModelChange)="setMonthIndex($event)">
          <option *ngFor="let m of months; let i = index" [ngValue]="i">{{ m }}</option>
        </select>
        <select [ngModel]="visibleYear()" (ngModelChange)="setYearValue($event)">
          <option *ngFor="let y of years()" [ngValue]="y">{{ y }}</option>
        </select>
        <button type="button" [disabled]="!canGoNext()" (click)="nextMonth()">›</button>
      </div>

      <div class="dow">
        <span *ngFor="let d of dow">{{ d }}</span>
      </div>

      <div class="week" *ngFor="let week of weeks()">
        <button
          type="button"
          *ngFor="let c of week"
          class="day"
          [class.selected]="c.vm.isSelected"
          [class.today]="c.vm.isToday"
          [class.outside]="!c.cell.belongsToMonth"
          [attr.data-range]="c.vm.rangePosition"
          [disabled]="c.vm.isDisabled"
          (click)="onCellTap(c)"
        >
          {{ c.vm.label }}
        </button>
      </div>

      <footer class="shortcuts" *ngIf="shortcuts.length">
        <button
          type="button"
          *ngFor="let s of shortcuts"
          [class.active]="ctrl.selectedShortcut() === s"
          (click)="selectShortcut(s)"
        >
          {{ s.name }}
        </button>
      </footer>
    </div>
  `,
})
export class DatePickerComponent implements OnInit, OnDestroy, CalendarGrid {
  @Input() mode: PickerMode = 'range';
  @Input() title = '';
  @Input() initialValue: PickerValue | null = null;
  @Input() minimumDate: Date | null = null;
  @Input() maximumDate: Date | null = null;
  @Input() minimumMonthWindow: number | null = null;
  @Input() maximumMonthWindow: number | null = null;
  @Input() allowNilSelection = false;
  @Input() allowRangeModification = true;
  @Input() selectMonthOnHeaderTap = false;
  @Input() closeOnSelectionImmediately = false;
  @Input() maxDaysAfterSelection: number | null = null;
  @Input() shortcuts: ReadonlyArray<Shortcut<PickerValue>> = [];

  @Output() valueChange = new EventEmitter<PickerValue | null>();
  @Output() closeRequest = new EventEmitter<void>();
  @Output() dismissed = new EventEmitter<DismissAction<PickerValue>>();

  readonly appearance: DatePickerAppearance;
  readonly dow: string[];
  readonly months: string[];

  readonly controller = signal<DatePickerController<PickerValue> | null>(null);

  /** Month currently on screen and the scrollable extent around it. */
  readonly visibleMonth = signal<Date>(startOfMonth(new Date()));
  readonly window = signal<CalendarWindow>({ start: new Date(2000, 0, 1), end: new Date() });

  /** Bumped by `reloadData()`; cells are re-read from the controller on every bump. */
  private readonly revision = signal(0);

  readonly visibleMonthIndex = computed(() => this.visibleMonth().getMonth());
  readonly visibleYear = computed(() => this.visibleMonth().getFullYear());
  readonly monthTitle = computed(() => monthLabel(this.visibleMonth(), this.appearance.locale));

  readonly years = computed(() =>
    yearOptions(this.window().start.getFullYear(), this.window().end.getFullYear())
  );

  readonly canGoPrev = computed(
    () => monthIndex(this.visibleMonth()) > monthIndex(this.window().start)
  );
  readonly canGoNext = computed(
    () => monthIndex(this.visibleMonth()) < monthIndex(this.window().end)
  );

  readonly cells = computed<RenderedCell[]>(() => {
    this.revision();
    const ctrl = this.controller();
    if (!ctrl) return [];

    const month = this.visibleMonth();
    const section = monthIndex(month) - monthIndex(this.window().start);
    return buildMonthGrid(month, section, this.appearance.firstDayOfWeek).map((cell) => ({
      cell,
      vm: ctrl.cellViewModel(cell),
    }));
  });

  readonly weeks = computed(() => {
    const rows: RenderedCell[][] = [];
    const cells = this.cells();
    for (let i = 0; i < cells.length; i += 7) rows.push(cells.slice(i, i + 7));
    return rows;
  });

  constructor(
    @Optional() @Inject(DATE_PICKER_APPEARANCE) appearance: Partial<DatePickerAppearance> | null
  ) {
    this.appearance = resolveAppearance(appearance);
    this.dow = weekdayLabels(this.appearance.firstDayOfWeek);
    this.months = Array.from({ length: 12 }, (_, i) => monthName(i, this.appearance.locale));
  }

  ngOnInit() {
    // An initial value of the other variant than `mode` is ignored.
    const initial = this.initialValue?.kind === this.mode ? this.initialValue : null;

    const ctrl = new DatePickerController(selectionModeFor(this.mode), {
      initialValue: initial,
      minimumDate: this.minimumDate,
      maximumDate: this.maximumDate,
      minimumMonthWindow: this.minimumMonthWindow,
      maximumMonthWindow: this.maximumMonthWindow,
      allowNilSelection: this.allowNilSelection,
      allowRangeModification: this.allowRangeModification,
      selectMonthOnHeaderTap: this.selectMonthOnHeaderTap,
      closeOnSelectionImmediately: this.closeOnSelectionImmediately,
      maxDaysAfterSelection: this.maxDaysAfterSelection,
      shortcuts: this.shortcuts,
      locale: this.appearance.locale,
      onDismiss: (action) => this.dismissed.emit(action),
      onCloseRequested: () => this.closeRequest.emit(),
    });

    ctrl.attachGrid(this);
    this.window.set(ctrl.visibleWindow());
    this.controller.set(ctrl);
    ctrl.start();
  }

  ngOnDestroy() {
    this.controller()?.dismiss();
  }

  /** CalendarGrid */
  reloadData() {
    this.revision.update((n) => n + 1);
  }

  /** CalendarGrid */
  scrollToDate(date: Date) {
    this.showMonth(startOfMonth(date));
  }

  onCellTap(rendered: RenderedCell) {
    const ctrl = this.controller();
    if (!ctrl || !ctrl.shouldChangeSelection()) return;
    if (rendered.vm.isDisabled) return;
    this.track(ctrl, () => ctrl.onDateTapped(rendered.cell.date, 'user'));
  }

  onHeaderTap() {
    const ctrl = this.controller();
    if (!ctrl) return;
    this.track(ctrl, () => ctrl.selectMonth(this.visibleMonth()));
  }

  selectShortcut(shortcut: Shortcut<PickerValue>) {
    const ctrl = this.controller();
    if (!ctrl) return;
    this.track(ctrl, () => ctrl.selectShortcut(shortcut));
  }

  clear() {
    const ctrl = this.controller();
    if (!ctrl) return;
    this.track(ctrl, () => ctrl.clear());
  }

  done() {
    this.controller()?.confirm();
  }

  cancel() {
    this.controller()?.cancel();
  }

  @HostListener('document:keydown.escape')
  onEscape() {
    this.cancel();
  }

  prevMonth() {
    if (!this.canGoPrev()) return;
    this.visibleMonth.set(addMonths(this.visibleMonth(), -1));
  }

  nextMonth() {
    if (!this.canGoNext()) return;
    this.visibleMonth.set(addMonths(this.visibleMonth(), 1));
  }

  setMonthIndex(index: number) {
    this.showMonth(new Date(this.visibleYear(), Number(index), 1));
  }

  setYearValue(year: number) {
    this.showMonth(new Date(Number(year), this.visibleMonthIndex(), 1));
  }

  /** Keeps the visible month inside the window. */
  private showMonth(month: Date) {
    const { start, end } = this.window();
    if (monthIndex(month) < monthIndex(start)) this.visibleMonth.set(startOfMonth(start));
    else if (monthIndex(month) > monthIndex(end)) this.visibleMonth.set(startOfMonth(end));
    else this.visibleMonth.set(startOfMonth(month));
  }

  /** Runs an action and emits `valueChange` when the value moved to other days. */
  private track(ctrl: DatePickerController<PickerValue>, action: () => unknown) {
    const before = ctrl.value();
    action();
    const after = ctrl.value();
    if (!isSameValue(before, after)) this.valueChange.emit(after);
  }
}
