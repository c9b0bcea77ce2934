/**
 * Nutrition analysis of a weekly plan
 * Unknown menus are classified and added to the catalog on the way; a menu that
 * cannot be classified or stored is left out of the result.
 */

import { toCells } from './planNormalizer.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import {
  NUTRIENT_KEYS,
  NUTRITION_SLOTS,
  WEEKDAYS,
  type CatalogStore,
  type DailyTotals,
  type MenuClassifier,
  type MenuItem,
  type Nutrition,
  type NutritionAnalysis,
  type NutritionRecord,
  type NutritionSlot,
  type Slot,
  type WeeklyPlan,
} from '../types/index.js';

export interface AnalyzerDeps {
  store: CatalogStore;
  classifier: MenuClassifier;
  logger?: Logger;
}

const isNutritionSlot = (slot: Slot): slot is NutritionSlot =>
  (NUTRITION_SLOTS as readonly string[]).includes(slot);

export const zeroNutrition = (): Nutrition => ({ calories: 0, protein: 0, fat: 0, carbs: 0, sodium: 0 });

/**
 * Sum each nutrient over the given rows
 */
export function sumNutrition(rows: readonly Nutrition[]): Nutrition {
  return rows.reduce((total, row) => {
    for (const key of NUTRIENT_KEYS) {
      total[key] += row[key];
    }
    return total;
  }, zeroNutrition());
}

/**
 * Per-weekday totals for the weekdays that have records, in weekday order
 */
export function summarizeDailyTotals(records: readonly NutritionRecord[]): DailyTotals[] {
  return WEEKDAYS.flatMap((weekday) => {
    const group = records.filter((record) => record.weekday === weekday);
    return group.length > 0 ? [{ weekday, ...sumNutrition(group) }] : [];
  });
}

const compareRecords = (a: NutritionRecord, b: NutritionRecord): number =>
  WEEKDAYS.indexOf(a.weekday) - WEEKDAYS.indexOf(b.weekday) ||
  NUTRITION_SLOTS.indexOf(a.slot) - NUTRITION_SLOTS.indexOf(b.slot);

const indexByName = (items: readonly MenuItem[]): Map<string, MenuItem> =>
  new Map(items.map((item) => [item.name, item]));

export async function analyzePlan(plan: WeeklyPlan, deps: AnalyzerDeps): Promise<NutritionAnalysis> {
  const { store, classifier, logger = defaultLogger } = deps;
  let catalog = indexByName(store.getAll());
  const records: NutritionRecord[] = [];

  for (const cell of toCells(plan)) {
    if (!isNutritionSlot(cell.slot)) continue;
    const menu = cell.menu.trim();
    if (!menu) continue;

    let item = catalog.get(menu);
    if (!item) {
      try {
        const classification = await classifier.classify(menu);
        store.insert({ name: menu, ...classification });
        catalog = indexByName(store.getAll());
        logger.success('Added menu from classification', { menu, category: classification.category });
      } catch (error) {
        logger.error(`Skipping "${menu}" (${cell.weekday} ${cell.slot})`, error);
        continue;
      }
      item = catalog.get(menu);
      if (!item) {
        logger.alert('Menu missing from catalog after insert', { menu });
        continue;
      }
    }

    records.push({ weekday: cell.weekday, slot: cell.slot, menu, ...item.nutrition });
  }

  records.sort(compareRecords);

  return {
    records,
    dailyTotals: summarizeDailyTotals(records),
    planTotals: sumNutrition(records),
  };
}
