/**
 * Weekly plan generator
 * Fills Mon..Fri with one soup, one main, two sides and an occasional extra,
 * preferring menus not used earlier in the week
 */

import { EmptyCatalogError } from './errors.js';
import { defaultRandom, pickOne, type RandomSource } from './random.js';
import {
  MANDATORY_CATEGORIES,
  RICE,
  WEEKDAYS,
  type DayPlan,
  type MandatoryCategory,
  type MenuItem,
  type WeeklyPlan,
} from '../types/index.js';

export const OTHER_SLOT_PROBABILITY = 0.2;

export const isMandatoryCategory = (category: string): category is MandatoryCategory =>
  (MANDATORY_CATEGORIES as readonly string[]).includes(category);

/**
 * Items not used yet this week; all items once every one has been used
 */
export function pickCandidates(items: readonly MenuItem[], used: ReadonlySet<string>): readonly MenuItem[] {
  const unused = items.filter((item) => !used.has(item.name));
  return unused.length > 0 ? unused : items;
}

const nameOf = (item: MenuItem | undefined): string => item?.name ?? '';

export function generatePlan(catalog: readonly MenuItem[], random: RandomSource = defaultRandom): WeeklyPlan {
  const byCategory: Record<MandatoryCategory, MenuItem[]> = { Soup: [], Main: [], Side: [] };
  const others: MenuItem[] = [];

  for (const item of catalog) {
    if (isMandatoryCategory(item.category)) {
      byCategory[item.category].push(item);
    } else {
      others.push(item);
    }
  }

  for (const category of MANDATORY_CATEGORIES) {
    if (byCategory[category].length === 0) {
      throw new EmptyCatalogError(category);
    }
  }

  const used = new Set<string>();

  return WEEKDAYS.map((weekday): DayPlan => {
    const soup = pickOne(pickCandidates(byCategory.Soup, used), random);
    const main = pickOne(pickCandidates(byCategory.Main, used), random);

    const sides = pickCandidates(byCategory.Side, used);
    const side1 = pickOne(sides, random);
    const side2 = pickOne(
      sides.filter((item) => item.name !== side1?.name),
      random
    );

    let other: MenuItem | undefined;
    if (random() < OTHER_SLOT_PROBABILITY) {
      other = pickOne(
        others.filter((item) => !used.has(item.name)),
        random
      );
    }

    const day: DayPlan = {
      weekday,
      slots: {
        Rice: RICE,
        Soup: nameOf(soup),
        Main: nameOf(main),
        Side1: nameOf(side1),
        Side2: nameOf(side2),
        Other: nameOf(other),
      },
    };

    for (const name of Object.values(day.slots)) {
      if (name) used.add(name);
    }

    return day;
  });
}
