/**
 * Menu catalog model
 * Reads and writes menu items in SQLite; the name is the only stable key
 */

import { v4 as uuidv4 } from 'uuid';
import { getDatabase } from '../db/database.js';
import { CatalogWriteFailure } from '../services/errors.js';
import type { MenuItem, Nutrition } from '../types/index.js';

export interface MenuRow {
  id: string;
  name: string;
  category: string;
  calories: number;
  protein: number;
  fat: number;
  carbs: number;
  sodium: number;
  created_at?: string;
}

const toMenuItem = (row: MenuRow): MenuItem => ({
  name: row.name,
  category: row.category,
  nutrition: {
    calories: row.calories,
    protein: row.protein,
    fat: row.fat,
    carbs: row.carbs,
    sodium: row.sodium,
  },
});

export class Menu {
  /**
   * All menu items, ordered by name
   */
  static getAll(): MenuItem[] {
    const db = getDatabase();
    const stmt = db.prepare('SELECT * FROM menus ORDER BY name');
    return (stmt.all() as MenuRow[]).map(toMenuItem);
  }

  /**
   * Menu item by name
   */
  static getByName(name: string): MenuItem | null {
    const db = getDatabase();
    const stmt = db.prepare('SELECT * FROM menus WHERE name = ?');
    const row = stmt.get(name) as MenuRow | undefined;
    return row ? toMenuItem(row) : null;
  }

  /**
   * Insert a new menu item. Duplicate names and SQLite errors surface as CatalogWriteFailure
   */
  static insert(item: MenuItem): MenuItem {
    const db = getDatabase();
    const stmt = db.prepare(`
      INSERT INTO menus (id, name, category, calories, protein, fat, carbs, sodium)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    try {
      stmt.run(
        uuidv4(),
        item.name,
        item.category,
        item.nutrition.calories,
        item.nutrition.protein,
        item.nutrition.fat,
        item.nutrition.carbs,
        item.nutrition.sodium
      );
    } catch (error) {
      throw new CatalogWriteFailure(item.name, { cause: error });
    }

    const created = Menu.getByName(item.name);
    if (!created) {
      throw new CatalogWriteFailure(item.name);
    }
    return created;
  }

  static updateCategory(name: string, category: string): boolean {
    const db = getDatabase();
    const stmt = db.prepare('UPDATE menus SET category = ? WHERE name = ?');
    return stmt.run(category, name).changes > 0;
  }

  static updateNutrition(name: string, nutrition: Nutrition): boolean {
    const db = getDatabase();
    const stmt = db.prepare(`
      UPDATE menus
      SET calories = ?, protein = ?, fat = ?, carbs = ?, sodium = ?
      WHERE name = ?
    `);
    const result = stmt.run(
      nutrition.calories,
      nutrition.protein,
      nutrition.fat,
      nutrition.carbs,
      nutrition.sodium,
      name
    );
    return result.changes > 0;
  }

  static deleteByName(name: string): boolean {
    const db = getDatabase();
    const stmt = db.prepare('DELETE FROM menus WHERE name = ?');
    return stmt.run(name).changes > 0;
  }
}
