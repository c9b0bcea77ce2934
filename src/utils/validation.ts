/**
 * Request body checks shared by the routes.
 * Each parser returns the typed value, or an error message string.
 */

import { emptySlots } from '../services/planNormalizer.js';
import { NUTRIENT_KEYS, SLOTS, WEEKDAYS, isWeekday, type Nutrition, type NutritionTargets, type WeeklyPlan } from '../types/index.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isNonNegativeNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0;

export function parseNutrition(value: unknown): Nutrition | string {
  if (!isRecord(value)) return 'nutrition must be an object';

  const nutrition: Nutrition = { calories: 0, protein: 0, fat: 0, carbs: 0, sodium: 0 };
  for (const key of NUTRIENT_KEYS) {
    const amount = value[key];
    if (!isNonNegativeNumber(amount)) {
      return `nutrition.${key} must be a non-negative number`;
    }
    nutrition[key] = amount;
  }
  return nutrition;
}

export function parseTargets(value: unknown): NutritionTargets | string {
  if (!isRecord(value)) return 'body must be an object';

  const targets = parseNutrition(value.targets);
  if (typeof targets === 'string') return targets.replace('nutrition', 'targets');

  const { tolerancePercent } = value;
  if (!isNonNegativeNumber(tolerancePercent) || tolerancePercent > 100) {
    return 'tolerancePercent must be a number between 0 and 100';
  }
  return { targets, tolerancePercent };
}

/**
 * Weekly plan from a JSON body: known weekdays only, unknown slot keys ignored,
 * missing slots empty
 */
export function parsePlanBody(value: unknown): WeeklyPlan | string {
  if (!Array.isArray(value)) return 'plan must be an array of days';

  const plan: WeeklyPlan = [];
  const seen = new Set<string>();

  for (const entry of value) {
    if (!isRecord(entry)) return 'each day must be an object';

    const { weekday, slots } = entry;
    if (typeof weekday !== 'string' || !isWeekday(weekday)) {
      return `weekday must be one of ${WEEKDAYS.join(', ')}`;
    }
    if (seen.has(weekday)) return `duplicate weekday ${weekday}`;
    seen.add(weekday);

    if (!isRecord(slots)) return `slots of ${weekday} must be an object`;

    const day = { weekday, slots: emptySlots() };
    for (const slot of SLOTS) {
      const menu = slots[slot];
      if (menu === undefined || menu === null) continue;
      if (typeof menu !== 'string') return `${weekday}.${slot} must be a string`;
      day.slots[slot] = menu;
    }
    plan.push(day);
  }

  return plan;
}

export function parseNameList(value: unknown): string[] | string {
  if (!Array.isArray(value) || !value.every((name): name is string => typeof name === 'string')) {
    return 'names must be an array of strings';
  }
  return value;
}
