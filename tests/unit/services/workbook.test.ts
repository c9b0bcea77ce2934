import { describe, expect, it } from 'vitest';
import ExcelJS from 'exceljs';
import {
  DAILY_TOTALS_SHEET,
  NUTRITION_DETAIL_SHEET,
  buildWorkbook,
  detectMealPeriods,
  readGrid,
  readMenuNames,
  readPlanWorkbook,
} from '../../../src/services/workbook.js';
import { InvalidMenuSheetError, MissingPlanSheetError } from '../../../src/services/errors.js';
import { generatePlan } from '../../../src/services/planGenerator.js';
import { createSeededRandom } from '../../../src/services/random.js';
import { makeDay, standardCatalog } from '../../helpers.js';
import type { NutritionAnalysis } from '../../../src/types/index.js';

const emptyAnalysis: NutritionAnalysis = {
  records: [],
  dailyTotals: [],
  planTotals: { calories: 0, protein: 0, fat: 0, carbs: 0, sodium: 0 },
};

const sheetFile = async (sheets: Record<string, string[][]>): Promise<Buffer> => {
  const workbook = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    workbook.addWorksheet(name).addRows(rows);
  }
  return Buffer.from(await workbook.xlsx.writeBuffer());
};

const loadSheets = async (file: Buffer) => {
  const copy = new ArrayBuffer(file.byteLength);
  new Uint8Array(copy).set(file);
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(copy);
  return workbook;
};

describe('detectMealPeriods', () => {
  it('reads the meal period from the file name', () => {
    expect(detectMealPeriods('meal_plan_lunch_20240101.xlsx')).toEqual(['Lunch']);
    expect(detectMealPeriods('Dinner_week2.xlsx')).toEqual(['Dinner']);
    expect(detectMealPeriods('lunch_and_dinner.xlsx')).toEqual(['Lunch', 'Dinner']);
    expect(detectMealPeriods('week.xlsx')).toEqual(['Lunch']);
  });
});

describe('buildWorkbook', () => {
  it('writes a plan that reads back unchanged', async () => {
    const plan = generatePlan(standardCatalog(), createSeededRandom(17));
    const file = await buildWorkbook(plan, emptyAnalysis, ['Lunch']);

    const imported = await readPlanWorkbook(file);

    expect(imported.sheetName).toBe('Lunch');
    expect(imported.plan).toEqual(plan);
  });

  it('omits the daily totals sheet when nothing was analysed', async () => {
    const file = await buildWorkbook([makeDay('Mon', { Soup: 'Miso Soup' })], emptyAnalysis, ['Lunch']);

    const workbook = await loadSheets(file);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['Lunch', NUTRITION_DETAIL_SHEET]);
  });

  it('writes detail rows and daily totals', async () => {
    const analysis: NutritionAnalysis = {
      records: [
        { weekday: 'Mon', slot: 'Soup', menu: 'Miso Soup', calories: 300, protein: 10, fat: 5, carbs: 20, sodium: 800 },
      ],
      dailyTotals: [{ weekday: 'Mon', calories: 300, protein: 10, fat: 5, carbs: 20, sodium: 800 }],
      planTotals: { calories: 300, protein: 10, fat: 5, carbs: 20, sodium: 800 },
    };
    const file = await buildWorkbook([makeDay('Mon', { Soup: 'Miso Soup' })], analysis, ['Lunch', 'Dinner']);

    const workbook = await loadSheets(file);
    const detail = workbook.getWorksheet(NUTRITION_DETAIL_SHEET);
    const totals = workbook.getWorksheet(DAILY_TOTALS_SHEET);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual([
      'Lunch',
      'Dinner',
      NUTRITION_DETAIL_SHEET,
      DAILY_TOTALS_SHEET,
    ]);
    expect(detail && readGrid(detail)[1]).toEqual(['Mon', 'Soup', 'Miso Soup', '300', '10', '5', '20', '800']);
    expect(totals && readGrid(totals)[1]).toEqual(['Mon', '300', '10', '5', '20', '800']);
  });
});

describe('readPlanWorkbook', () => {
  it('uses the first Lunch or Dinner sheet', async () => {
    const file = await sheetFile({
      Notes: [['', 'Mon'], ['Soup', 'Ignored']],
      Dinner: [['', 'Tue'], ['Main', 'Bulgogi']],
    });

    const { sheetName, plan } = await readPlanWorkbook(file);

    expect(sheetName).toBe('Dinner');
    expect(plan).toEqual([makeDay('Tue', { Rice: '', Main: 'Bulgogi' })]);
  });

  it('throws MissingPlanSheetError without a meal sheet', async () => {
    const file = await sheetFile({ Sheet1: [['', 'Mon'], ['Soup', 'Miso Soup']] });

    await expect(readPlanWorkbook(file)).rejects.toBeInstanceOf(MissingPlanSheetError);
  });
});

describe('readMenuNames', () => {
  it('reads trimmed, distinct names under the Menu title', async () => {
    const file = await sheetFile({ Menus: [['Menu'], ['Kimchi'], [' Bulgogi '], ['Kimchi'], ['']] });

    await expect(readMenuNames(file)).resolves.toEqual(['Kimchi', 'Bulgogi']);
  });

  it('rejects a sheet without the Menu title', async () => {
    const file = await sheetFile({ Menus: [['Name'], ['Kimchi']] });

    await expect(readMenuNames(file)).rejects.toBeInstanceOf(InvalidMenuSheetError);
  });
});
