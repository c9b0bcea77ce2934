/**
 * Plan shape conversions
 *
 * The canonical form is the (weekday, slot, menu) relation. WeeklyPlan holds it
 * as one row per weekday; the spreadsheet grid holds it transposed, one row per
 * slot and one column per weekday.
 */

import { MissingWeekdayColumnError } from './errors.js';
import {
  SLOTS,
  WEEKDAYS,
  isSlot,
  isWeekday,
  type DayPlan,
  type PlanCell,
  type Slot,
  type Weekday,
  type WeeklyPlan,
} from '../types/index.js';

// Row 0 is the weekday header, column 0 the slot labels
export type SheetGrid = string[][];

export const emptySlots = (): Record<Slot, string> => ({
  Rice: '',
  Soup: '',
  Main: '',
  Side1: '',
  Side2: '',
  Other: '',
});

const byWeekdayOrder = (a: Weekday, b: Weekday): number => WEEKDAYS.indexOf(a) - WEEKDAYS.indexOf(b);

/**
 * Flatten a plan into cells, weekday then slot order, empty cells included
 */
export function toCells(plan: WeeklyPlan): PlanCell[] {
  return [...plan]
    .sort((a, b) => byWeekdayOrder(a.weekday, b.weekday))
    .flatMap((day) => SLOTS.map((slot) => ({ weekday: day.weekday, slot, menu: day.slots[slot] })));
}

/**
 * Rebuild weekday rows from cells; only weekdays that appear get a row
 */
export function fromCells(cells: readonly PlanCell[]): WeeklyPlan {
  const days = new Map<Weekday, DayPlan>();

  for (const cell of cells) {
    let day = days.get(cell.weekday);
    if (!day) {
      day = { weekday: cell.weekday, slots: emptySlots() };
      days.set(cell.weekday, day);
    }
    // First value wins for a repeated coordinate
    if (!day.slots[cell.slot]) {
      day.slots[cell.slot] = cell.menu;
    }
  }

  return WEEKDAYS.flatMap((weekday) => {
    const day = days.get(weekday);
    return day ? [day] : [];
  });
}

/**
 * Transposed spreadsheet form; every slot row is present even when empty
 */
export function toSheetGrid(plan: WeeklyPlan): SheetGrid {
  const lookup = new Map<string, string>();
  for (const cell of toCells(plan)) {
    lookup.set(`${cell.weekday}:${cell.slot}`, cell.menu);
  }

  const header = ['', ...WEEKDAYS];
  const rows = SLOTS.map((slot) => [slot, ...WEEKDAYS.map((weekday) => lookup.get(`${weekday}:${slot}`) ?? '')]);
  return [header, ...rows];
}

const label = (value: string | undefined): string => (value ?? '').trim();

/**
 * Read the transposed form back. Labels are trimmed and matched exactly;
 * unknown rows and columns are dropped.
 */
export function fromSheetGrid(grid: SheetGrid): WeeklyPlan {
  const header = grid[0] ?? [];

  const columns = new Map<Weekday, number>();
  header.forEach((value, index) => {
    if (index === 0) return;
    const weekday = label(value);
    if (isWeekday(weekday) && !columns.has(weekday)) {
      columns.set(weekday, index);
    }
  });

  if (columns.size === 0) {
    throw new MissingWeekdayColumnError();
  }

  const rows = new Map<Slot, string[]>();
  for (const row of grid.slice(1)) {
    const slot = label(row[0]);
    if (isSlot(slot) && !rows.has(slot)) {
      rows.set(slot, row);
    }
  }

  const cells: PlanCell[] = [];
  for (const weekday of WEEKDAYS) {
    const column = columns.get(weekday);
    if (column === undefined) continue;
    for (const slot of SLOTS) {
      cells.push({ weekday, slot, menu: label(rows.get(slot)?.[column]) });
    }
  }

  return fromCells(cells);
}
