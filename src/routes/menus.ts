/**
 * Menu catalog routes
 * GET    /api/menus          - list the catalog
 * POST   /api/menus          - classify and add menus by name
 * POST   /api/menus/import   - classify and add menus from an xlsx "Menu" column
 * POST   /api/menus/delete   - delete several menus
 * PATCH  /api/menus/:name    - change category and/or nutrition
 * DELETE /api/menus/:name    - delete one menu
 */

import express from 'express';
import { addMenus, parseMenuList } from '../services/menuIntake.js';
import { isStructuralError } from '../services/errors.js';
import { readMenuNames } from '../services/workbook.js';
import { logger } from '../utils/logger.js';
import { parseNameList, parseNutrition } from '../utils/validation.js';
import type { RouteDeps } from './deps.js';

export function createMenuRouter(deps: RouteDeps): express.Router {
  const { store, classifier } = deps;
  const router = express.Router();

  router.get('/', (req, res) => {
    try {
      const menus = store.getAll();
      res.json({ menus, total: menus.length });
    } catch (error) {
      logger.error('Error listing menus', error);
      res.status(500).json({ error: 'Failed to list menus' });
    }
  });

  /**
   * Body: { names: string[] } or { text: "name, name, ..." }
   */
  router.post('/', async (req, res) => {
    try {
      const { names, text } = req.body ?? {};

      let list: string[];
      if (typeof text === 'string') {
        list = parseMenuList(text);
      } else {
        const parsed = parseNameList(names);
        if (typeof parsed === 'string') {
          return res.status(400).json({ error: parsed });
        }
        list = parsed;
      }

      if (list.length === 0) {
        return res.status(400).json({ error: 'At least one menu name is required' });
      }

      const result = await addMenus(list, { store, classifier });
      res.status(201).json(result);
    } catch (error) {
      logger.error('Error adding menus', error);
      res.status(500).json({ error: 'Failed to add menus' });
    }
  });

  /**
   * Body: raw xlsx bytes
   */
  router.post('/import', express.raw({ type: () => true, limit: '10mb' }), async (req, res) => {
    try {
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        return res.status(400).json({ error: 'An xlsx file body is required' });
      }

      const names = await readMenuNames(req.body);
      if (names.length === 0) {
        return res.status(400).json({ error: 'The sheet lists no menus' });
      }

      const result = await addMenus(names, { store, classifier });
      res.status(201).json(result);
    } catch (error) {
      if (isStructuralError(error)) {
        return res.status(422).json({ error: error.message });
      }
      logger.error('Error importing menus', error);
      res.status(500).json({ error: 'Failed to import menus' });
    }
  });

  /**
   * Body: { names: string[] }
   */
  router.post('/delete', (req, res) => {
    try {
      const names = parseNameList(req.body?.names);
      if (typeof names === 'string') {
        return res.status(400).json({ error: names });
      }

      const deleted = names.filter((name) => store.deleteByName(name)).length;
      res.json({ deleted });
    } catch (error) {
      logger.error('Error deleting menus', error);
      res.status(500).json({ error: 'Failed to delete menus' });
    }
  });

  /**
   * Body: { category?: string, nutrition?: Nutrition }
   */
  router.patch('/:name', (req, res) => {
    try {
      const { name } = req.params;
      const { category, nutrition } = req.body ?? {};

      if (category === undefined && nutrition === undefined) {
        return res.status(400).json({ error: 'category or nutrition is required' });
      }
      if (category !== undefined && (typeof category !== 'string' || !category.trim())) {
        return res.status(400).json({ error: 'category must be a non-empty string' });
      }

      const parsedNutrition = nutrition === undefined ? undefined : parseNutrition(nutrition);
      if (typeof parsedNutrition === 'string') {
        return res.status(400).json({ error: parsedNutrition });
      }

      const exists = store.getAll().some((item) => item.name === name);
      if (!exists) {
        return res.status(404).json({ error: 'Menu not found' });
      }

      if (typeof category === 'string') {
        store.updateCategory(name, category.trim());
      }
      if (parsedNutrition) {
        store.updateNutrition(name, parsedNutrition);
      }

      const updated = store.getAll().find((item) => item.name === name);
      res.json(updated);
    } catch (error) {
      logger.error('Error updating menu', error);
      res.status(500).json({ error: 'Failed to update menu' });
    }
  });

  router.delete('/:name', (req, res) => {
    try {
      const deleted = store.deleteByName(req.params.name);
      if (!deleted) {
        return res.status(404).json({ error: 'Menu not found' });
      }
      res.json({ success: true });
    } catch (error) {
      logger.error('Error deleting menu', error);
      res.status(500).json({ error: 'Failed to delete menu' });
    }
  });

  return router;
}
