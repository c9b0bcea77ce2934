import { NUTRIENT_KEYS, type DailyTotals, type NutrientKey, type Nutrition, type NutritionTargets, type Weekday } from '../types/index.js';

export type TargetStatus = 'low' | 'ok' | 'high';

export interface NutrientCheck {
  nutrient: NutrientKey;
  actual: number;
  target: number;
  ratioPercent: number;
  status: TargetStatus;
}

export interface DailyCheck {
  weekday: Weekday;
  checks: NutrientCheck[];
}

const round1 = (n: number): number => Math.round(n * 10) / 10;

/**
 * Judge each nutrient against its target with a symmetric tolerance band
 */
export function compareToTargets(totals: Nutrition, settings: NutritionTargets): NutrientCheck[] {
  const tolerance = settings.tolerancePercent / 100;

  return NUTRIENT_KEYS.map((nutrient) => {
    const actual = totals[nutrient];
    const target = settings.targets[nutrient];

    if (target === 0) {
      return { nutrient, actual, target, ratioPercent: 0, status: actual === 0 ? 'ok' : 'high' };
    }

    let status: TargetStatus = 'ok';
    if (actual < target * (1 - tolerance)) status = 'low';
    else if (actual > target * (1 + tolerance)) status = 'high';

    return { nutrient, actual, target, ratioPercent: round1((actual / target) * 100), status };
  });
}

export function checkDailyTotals(dailyTotals: readonly DailyTotals[], settings: NutritionTargets): DailyCheck[] {
  return dailyTotals.map(({ weekday, ...totals }) => ({
    weekday,
    checks: compareToTargets(totals, settings),
  }));
}
