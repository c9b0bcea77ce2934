/**
 * Nutrition settings model
 * Keeps the reference daily intake and the accepted tolerance
 */

import { getDatabase } from '../db/database.js';
import type { NutritionTargets } from '../types/index.js';

export interface NutritionSettingsRow {
  id: number;
  calories: number;
  protein: number;
  fat: number;
  carbs: number;
  sodium: number;
  tolerance_percent: number;
  updated_at?: string;
}

export const DEFAULT_TARGETS: NutritionTargets = {
  targets: { calories: 2000, protein: 50, fat: 65, carbs: 300, sodium: 2300 },
  tolerancePercent: 10,
};

const toTargets = (row: NutritionSettingsRow): NutritionTargets => ({
  targets: {
    calories: row.calories,
    protein: row.protein,
    fat: row.fat,
    carbs: row.carbs,
    sodium: row.sodium,
  },
  tolerancePercent: row.tolerance_percent,
});

export class NutritionSettings {
  /**
   * Current settings, defaults when the table is empty
   */
  static get(): NutritionTargets {
    const db = getDatabase();
    const stmt = db.prepare('SELECT * FROM nutrition_settings ORDER BY id DESC LIMIT 1');
    const row = stmt.get() as NutritionSettingsRow | undefined;
    return row ? toTargets(row) : DEFAULT_TARGETS;
  }

  /**
   * Replace the targets and tolerance
   */
  static update(settings: NutritionTargets): NutritionTargets {
    const db = getDatabase();
    const existing = db.prepare('SELECT id FROM nutrition_settings ORDER BY id DESC LIMIT 1').get() as
      | { id: number }
      | undefined;
    const { targets, tolerancePercent } = settings;

    if (existing) {
      db.prepare(`
        UPDATE nutrition_settings
        SET calories = ?, protein = ?, fat = ?, carbs = ?, sodium = ?,
            tolerance_percent = ?, updated_at = CURRENT_TIMESTAMP
        WHERE id = ?
      `).run(
        targets.calories,
        targets.protein,
        targets.fat,
        targets.carbs,
        targets.sodium,
        tolerancePercent,
        existing.id
      );
    } else {
      db.prepare(`
        INSERT INTO nutrition_settings (calories, protein, fat, carbs, sodium, tolerance_percent)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(targets.calories, targets.protein, targets.fat, targets.carbs, targets.sodium, tolerancePercent);
    }

    return this.get();
  }
}
