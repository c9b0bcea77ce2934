import { describe, expect, it } from 'vitest';
import { analyzePlan, sumNutrition, summarizeDailyTotals } from '../../../src/services/nutritionAnalyzer.js';
import { ClassificationFailure } from '../../../src/services/errors.js';
import { createLogger } from '../../../src/utils/logger.js';
import { FakeClassifier, MemoryCatalog, makeDay, makeItem, nutrition } from '../../helpers.js';
import type { NutritionRecord } from '../../../src/types/index.js';

const logger = createLogger({ silent: true });

const catalog = () =>
  new MemoryCatalog([
    makeItem('Miso Soup', 'Soup', { calories: 300, protein: 10, fat: 5, carbs: 20, sodium: 800 }),
    makeItem('Bulgogi', 'Main', { calories: 450, protein: 30, fat: 20, carbs: 15, sodium: 900 }),
    makeItem('Kimchi', 'Side', { calories: 20, protein: 1, fat: 0, carbs: 4, sodium: 500 }),
    makeItem('Spinach', 'Side', { calories: 40, protein: 3, fat: 2, carbs: 5, sodium: 150 }),
  ]);

describe('analyzePlan', () => {
  it('emits one record per non-empty, non-rice cell without classifying known menus', async () => {
    const store = catalog();
    const classifier = new FakeClassifier();
    const plan = [
      makeDay('Mon', { Soup: 'Miso Soup', Main: 'Bulgogi', Side1: 'Kimchi' }),
      makeDay('Tue', { Soup: 'Miso Soup', Main: 'Bulgogi', Side1: 'Kimchi', Side2: 'Spinach', Other: '   ' }),
    ];

    const { records } = await analyzePlan(plan, { store, classifier, logger });

    expect(classifier.calls).toEqual([]);
    expect(records).toHaveLength(7);
    expect(records.some((record) => record.menu === 'Rice')).toBe(false);
  });

  it('classifies an unknown menu once and uses its nutrition', async () => {
    const store = catalog();
    const classified = { category: 'Side', nutrition: nutrition({ calories: 120, protein: 8, fat: 7, carbs: 3, sodium: 400 }) };
    const classifier = new FakeClassifier({ 'Rolled Omelet': classified });
    const plan = [
      makeDay('Mon', { Soup: 'Miso Soup', Side1: 'Rolled Omelet' }),
      makeDay('Tue', { Side2: 'Rolled Omelet' }),
    ];

    const { records } = await analyzePlan(plan, { store, classifier, logger });

    expect(classifier.calls).toEqual(['Rolled Omelet']);
    expect(records).toEqual([
      { weekday: 'Mon', slot: 'Soup', menu: 'Miso Soup', calories: 300, protein: 10, fat: 5, carbs: 20, sodium: 800 },
      { weekday: 'Mon', slot: 'Side1', menu: 'Rolled Omelet', calories: 120, protein: 8, fat: 7, carbs: 3, sodium: 400 },
      { weekday: 'Tue', slot: 'Side2', menu: 'Rolled Omelet', calories: 120, protein: 8, fat: 7, carbs: 3, sodium: 400 },
    ]);
    expect(store.items.get('Rolled Omelet')).toEqual({ name: 'Rolled Omelet', ...classified });
  });

  it('re-reads the catalog after each insert', async () => {
    const store = catalog();
    const classifier = new FakeClassifier({ Jabchae: { category: 'Side', nutrition: nutrition() } });

    await analyzePlan([makeDay('Mon', { Side1: 'Jabchae' })], { store, classifier, logger });

    expect(store.getAllCalls).toBe(2);
  });

  it('skips a menu whose classification fails and keeps the rest', async () => {
    const store = catalog();
    const classifier = new FakeClassifier({
      Mystery: new ClassificationFailure('Mystery', 'malformed', 'missing category'),
    });
    const plan = [makeDay('Mon', { Soup: 'Miso Soup', Main: 'Mystery', Side1: 'Kimchi' })];

    const { records } = await analyzePlan(plan, { store, classifier, logger });

    expect(records.map((record) => record.menu)).toEqual(['Miso Soup', 'Kimchi']);
    expect(store.items.has('Mystery')).toBe(false);
  });

  it('skips a menu whose catalog write fails', async () => {
    const store = catalog();
    store.failInsertFor.add('Jabchae');
    const classifier = new FakeClassifier({ Jabchae: { category: 'Side', nutrition: nutrition() } });

    const { records } = await analyzePlan([makeDay('Mon', { Main: 'Bulgogi', Side1: 'Jabchae' })], {
      store,
      classifier,
      logger,
    });

    expect(records.map((record) => record.menu)).toEqual(['Bulgogi']);
  });

  it('trims menu names before looking them up', async () => {
    const store = catalog();
    const classifier = new FakeClassifier();

    const { records } = await analyzePlan([makeDay('Mon', { Soup: '  Miso Soup ' })], { store, classifier, logger });

    expect(classifier.calls).toEqual([]);
    expect(records[0].menu).toBe('Miso Soup');
  });

  it('sorts records by weekday, then slot order', async () => {
    const store = catalog();
    const plan = [
      makeDay('Wed', { Side2: 'Kimchi', Soup: 'Miso Soup' }),
      makeDay('Mon', { Other: 'Spinach', Main: 'Bulgogi' }),
    ];

    const { records } = await analyzePlan(plan, { store, classifier: new FakeClassifier(), logger });

    expect(records.map((record) => `${record.weekday}:${record.slot}`)).toEqual([
      'Mon:Main',
      'Mon:Other',
      'Wed:Soup',
      'Wed:Side2',
    ]);
  });

  it('sums each weekday and the whole plan', async () => {
    const store = catalog();
    const plan = [
      makeDay('Mon', { Soup: 'Miso Soup', Main: 'Bulgogi' }),
      makeDay('Tue', {}),
      makeDay('Wed', { Side1: 'Kimchi', Side2: 'Spinach' }),
    ];

    const { dailyTotals, planTotals } = await analyzePlan(plan, { store, classifier: new FakeClassifier(), logger });

    expect(dailyTotals).toEqual([
      { weekday: 'Mon', calories: 750, protein: 40, fat: 25, carbs: 35, sodium: 1700 },
      { weekday: 'Wed', calories: 60, protein: 4, fat: 2, carbs: 9, sodium: 650 },
    ]);
    expect(planTotals).toEqual({ calories: 810, protein: 44, fat: 27, carbs: 44, sodium: 2350 });
  });

  it('returns empty results for an empty plan', async () => {
    const analysis = await analyzePlan([], { store: catalog(), classifier: new FakeClassifier(), logger });

    expect(analysis).toEqual({
      records: [],
      dailyTotals: [],
      planTotals: { calories: 0, protein: 0, fat: 0, carbs: 0, sodium: 0 },
    });
  });
});

describe('summarizeDailyTotals', () => {
  const record = (weekday: NutritionRecord['weekday'], calories: number): NutritionRecord => ({
    weekday,
    slot: 'Main',
    menu: 'x',
    calories,
    protein: 1,
    fat: 0,
    carbs: 2,
    sodium: 10,
  });

  it('adds up Monday calories 300 + 450 = 750', () => {
    expect(summarizeDailyTotals([record('Mon', 300), record('Mon', 450)])).toEqual([
      { weekday: 'Mon', calories: 750, protein: 2, fat: 0, carbs: 4, sodium: 20 },
    ]);
  });

  it('has no row for weekdays without records', () => {
    const totals = summarizeDailyTotals([record('Fri', 100), record('Tue', 200)]);

    expect(totals.map((row) => row.weekday)).toEqual(['Tue', 'Fri']);
  });
});

describe('sumNutrition', () => {
  it('returns zeros for no rows', () => {
    expect(sumNutrition([])).toEqual({ calories: 0, protein: 0, fat: 0, carbs: 0, sodium: 0 });
  });
});
