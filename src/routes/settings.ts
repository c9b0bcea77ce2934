/**
 * Nutrition settings routes
 * GET /api/settings/nutrition - current targets and tolerance
 * PUT /api/settings/nutrition - replace them
 */

import express from 'express';
import { NutritionSettings } from '../models/NutritionSettings.js';
import { logger } from '../utils/logger.js';
import { parseTargets } from '../utils/validation.js';

const router = express.Router();

router.get('/nutrition', (req, res) => {
  try {
    res.json(NutritionSettings.get());
  } catch (error) {
    logger.error('Error getting nutrition settings', error);
    res.status(500).json({ error: 'Failed to get nutrition settings' });
  }
});

/**
 * Body: { targets: Nutrition, tolerancePercent: number }
 */
router.put('/nutrition', (req, res) => {
  try {
    const settings = parseTargets(req.body);
    if (typeof settings === 'string') {
      return res.status(400).json({ error: settings });
    }

    res.json(NutritionSettings.update(settings));
  } catch (error) {
    logger.error('Error updating nutrition settings', error);
    res.status(500).json({ error: 'Failed to update nutrition settings' });
  }
});

export default router;
