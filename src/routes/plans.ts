/**
 * Weekly plan routes
 * POST /api/plans/generate       - random plan from the catalog
 * POST /api/plans/analyze        - nutrition of a plan given as JSON
 * POST /api/plans/export         - plan + nutrition as an xlsx download
 * POST /api/plans/import         - nutrition of an uploaded xlsx plan
 * POST /api/plans/import/export  - uploaded xlsx plan analysed, as an xlsx download
 */

import express from 'express';
import { analyzePlan } from '../services/nutritionAnalyzer.js';
import { checkDailyTotals, compareToTargets } from '../services/nutritionTargets.js';
import { generatePlan } from '../services/planGenerator.js';
import { createSeededRandom, defaultRandom } from '../services/random.js';
import { isStructuralError } from '../services/errors.js';
import { XLSX_MIME_TYPE, buildWorkbook, detectMealPeriods, readPlanWorkbook } from '../services/workbook.js';
import { NutritionSettings } from '../models/NutritionSettings.js';
import { logger } from '../utils/logger.js';
import { parsePlanBody } from '../utils/validation.js';
import type { RouteDeps } from './deps.js';
import type { NutritionAnalysis } from '../types/index.js';

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * 20240102 or, with time, 20240102_130405
 */
export function formatStamp(date: Date, withTime = false): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  return withTime ? `${day}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` : day;
}

const withChecks = (analysis: NutritionAnalysis) => {
  const settings = NutritionSettings.get();
  return {
    ...analysis,
    dailyChecks: checkDailyTotals(analysis.dailyTotals, settings),
    planChecks: compareToTargets(analysis.planTotals, settings),
  };
};

const rawXlsx = express.raw({ type: () => true, limit: '10mb' });

export function createPlanRouter(deps: RouteDeps): express.Router {
  const { store, classifier } = deps;
  const router = express.Router();

  /**
   * Body: { seed?: number } - a seed makes the plan reproducible
   */
  router.post('/generate', (req, res) => {
    try {
      const { seed } = req.body ?? {};
      const random = typeof seed === 'number' && Number.isFinite(seed) ? createSeededRandom(seed) : defaultRandom;

      const plan = generatePlan(store.getAll(), random);
      logger.info('Generated weekly plan', { days: plan.length });
      res.json({ plan });
    } catch (error) {
      if (isStructuralError(error)) {
        return res.status(422).json({ error: error.message });
      }
      logger.error('Error generating plan', error);
      res.status(500).json({ error: 'Failed to generate plan' });
    }
  });

  /**
   * Body: { plan: DayPlan[] }
   */
  router.post('/analyze', async (req, res) => {
    try {
      const plan = parsePlanBody(req.body?.plan);
      if (typeof plan === 'string') {
        return res.status(400).json({ error: plan });
      }

      const analysis = await analyzePlan(plan, { store, classifier });
      res.json(withChecks(analysis));
    } catch (error) {
      logger.error('Error analyzing plan', error);
      res.status(500).json({ error: 'Failed to analyze plan' });
    }
  });

  /**
   * Body: { plan: DayPlan[], filename?: string }
   */
  router.post('/export', async (req, res) => {
    try {
      const plan = parsePlanBody(req.body?.plan);
      if (typeof plan === 'string') {
        return res.status(400).json({ error: plan });
      }

      const requested = req.body?.filename;
      const filename =
        typeof requested === 'string' && requested.trim()
          ? requested.trim()
          : `meal_plan_lunch_${formatStamp(new Date())}.xlsx`;

      const analysis = await analyzePlan(plan, { store, classifier });
      const file = await buildWorkbook(plan, analysis, detectMealPeriods(filename));

      res.attachment(filename);
      res.type(XLSX_MIME_TYPE).send(file);
    } catch (error) {
      logger.error('Error exporting plan', error);
      res.status(500).json({ error: 'Failed to export plan' });
    }
  });

  router.post('/import', rawXlsx, async (req, res) => {
    try {
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        return res.status(400).json({ error: 'An xlsx file body is required' });
      }

      const { sheetName, plan } = await readPlanWorkbook(req.body);
      const analysis = await analyzePlan(plan, { store, classifier });
      res.json({ sheetName, plan, ...withChecks(analysis) });
    } catch (error) {
      if (isStructuralError(error)) {
        return res.status(422).json({ error: error.message });
      }
      logger.error('Error importing plan', error);
      res.status(500).json({ error: 'Failed to import plan' });
    }
  });

  router.post('/import/export', rawXlsx, async (req, res) => {
    try {
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        return res.status(400).json({ error: 'An xlsx file body is required' });
      }

      const { sheetName, plan } = await readPlanWorkbook(req.body);
      const analysis = await analyzePlan(plan, { store, classifier });
      const file = await buildWorkbook(plan, analysis, detectMealPeriods(sheetName));

      res.attachment(`nutrition_analysis_${formatStamp(new Date(), true)}.xlsx`);
      res.type(XLSX_MIME_TYPE).send(file);
    } catch (error) {
      if (isStructuralError(error)) {
        return res.status(422).json({ error: error.message });
      }
      logger.error('Error exporting imported plan', error);
      res.status(500).json({ error: 'Failed to export analysis' });
    }
  });

  return router;
}
