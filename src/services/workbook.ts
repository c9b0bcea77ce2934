/**
 * Spreadsheet import/export of weekly plans (xlsx via exceljs)
 *
 * Export: one sheet per meal period with the transposed plan, a "Nutrition Detail"
 * sheet and, when there are records, a "Daily Totals" sheet.
 * Import: the first sheet named "Lunch" or "Dinner".
 */

import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { InvalidMenuSheetError, MissingPlanSheetError } from './errors.js';
import { fromSheetGrid, toSheetGrid, type SheetGrid } from './planNormalizer.js';
import { MEAL_PERIODS, type MealPeriod, type NutritionAnalysis, type WeeklyPlan } from '../types/index.js';

export const NUTRITION_DETAIL_SHEET = 'Nutrition Detail';
export const DAILY_TOTALS_SHEET = 'Daily Totals';
export const MENU_COLUMN_TITLE = 'Menu';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const NUTRITION_DETAIL_HEADER = ['Weekday', 'Slot', 'Menu', 'Calories', 'Protein', 'Fat', 'Carbs', 'Sodium'];
export const DAILY_TOTALS_HEADER = ['Weekday', 'Calories', 'Protein', 'Fat', 'Carbs', 'Sodium'];

/**
 * Meal periods named by the file name: Dinner when it says so,
 * Lunch when it says so or says neither
 */
export function detectMealPeriods(filename: string): MealPeriod[] {
  const name = filename.toLowerCase();
  const hasLunch = name.includes('lunch');
  const hasDinner = name.includes('dinner');

  const periods: MealPeriod[] = [];
  if (hasLunch || !hasDinner) periods.push('Lunch');
  if (hasDinner) periods.push('Dinner');
  return periods;
}

export async function buildWorkbook(
  plan: WeeklyPlan,
  analysis: NutritionAnalysis,
  periods: readonly MealPeriod[]
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const grid = toSheetGrid(plan);

  for (const period of periods) {
    const sheet = workbook.addWorksheet(period);
    sheet.addRows(grid);
    sheet.getRow(1).font = { bold: true };
  }

  const detail = workbook.addWorksheet(NUTRITION_DETAIL_SHEET);
  detail.addRow(NUTRITION_DETAIL_HEADER);
  for (const r of analysis.records) {
    detail.addRow([r.weekday, r.slot, r.menu, r.calories, r.protein, r.fat, r.carbs, r.sodium]);
  }

  if (analysis.records.length > 0) {
    const totals = workbook.addWorksheet(DAILY_TOTALS_SHEET);
    totals.addRow(DAILY_TOTALS_HEADER);
    for (const t of analysis.dailyTotals) {
      totals.addRow([t.weekday, t.calories, t.protein, t.fat, t.carbs, t.sodium]);
    }
  }

  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}

/**
 * Copy into a standalone ArrayBuffer for the zip reader
 */
const toArrayBuffer = (data: Uint8Array): ArrayBuffer => {
  const copy = new ArrayBuffer(data.byteLength);
  new Uint8Array(copy).set(data);
  return copy;
};

async function loadWorkbook(data: Uint8Array): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(toArrayBuffer(data));
  return workbook;
}

/**
 * Every cell as display text, rows and columns from 1
 */
export function readGrid(sheet: Worksheet): SheetGrid {
  const grid: SheetGrid = [];
  const columnCount = sheet.columnCount;

  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const values: string[] = [];
    for (let c = 1; c <= columnCount; c++) {
      values.push(row.getCell(c).text);
    }
    grid.push(values);
  }
  return grid;
}

const isMealPeriod = (name: string): name is MealPeriod => (MEAL_PERIODS as readonly string[]).includes(name);

export interface ImportedPlan {
  sheetName: MealPeriod;
  plan: WeeklyPlan;
}

export async function readPlanWorkbook(data: Uint8Array): Promise<ImportedPlan> {
  const workbook = await loadWorkbook(data);

  for (const sheet of workbook.worksheets) {
    const name = sheet.name.trim();
    if (isMealPeriod(name)) {
      return { sheetName: name, plan: fromSheetGrid(readGrid(sheet)) };
    }
  }

  throw new MissingPlanSheetError();
}

/**
 * Menu names from the first sheet, under a "Menu" title in A1
 */
export async function readMenuNames(data: Uint8Array): Promise<string[]> {
  const workbook = await loadWorkbook(data);
  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new InvalidMenuSheetError();
  }

  const [header, ...rows] = readGrid(sheet);
  if ((header?.[0] ?? '').trim() !== MENU_COLUMN_TITLE) {
    throw new InvalidMenuSheetError();
  }

  const names = rows.map((row) => (row[0] ?? '').trim()).filter(Boolean);
  return [...new Set(names)];
}
