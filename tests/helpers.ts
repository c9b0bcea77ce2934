import { ClassificationFailure, CatalogWriteFailure } from '../src/services/errors.js';
import type {
  CatalogStore,
  Classification,
  DayPlan,
  MenuClassifier,
  MenuItem,
  Nutrition,
  Slot,
  Weekday,
} from '../src/types/index.js';

export function nutrition(overrides: Partial<Nutrition> = {}): Nutrition {
  return { calories: 100, protein: 5, fat: 3, carbs: 10, sodium: 200, ...overrides };
}

export function makeItem(name: string, category: string, overrides: Partial<Nutrition> = {}): MenuItem {
  return { name, category, nutrition: nutrition(overrides) };
}

export function makeDay(weekday: Weekday, slots: Partial<Record<Slot, string>>): DayPlan {
  return {
    weekday,
    slots: { Rice: 'Rice', Soup: '', Main: '', Side1: '', Side2: '', Other: '', ...slots },
  };
}

/**
 * In-memory catalog with an optional insert failure
 */
export class MemoryCatalog implements CatalogStore {
  readonly items = new Map<string, MenuItem>();
  getAllCalls = 0;
  failInsertFor = new Set<string>();

  constructor(items: MenuItem[] = []) {
    for (const item of items) this.items.set(item.name, item);
  }

  getAll(): MenuItem[] {
    this.getAllCalls++;
    return [...this.items.values()];
  }

  insert(item: MenuItem): MenuItem {
    if (this.failInsertFor.has(item.name) || this.items.has(item.name)) {
      throw new CatalogWriteFailure(item.name);
    }
    this.items.set(item.name, item);
    return item;
  }

  updateCategory(name: string, category: string): boolean {
    const item = this.items.get(name);
    if (!item) return false;
    this.items.set(name, { ...item, category });
    return true;
  }

  updateNutrition(name: string, value: Nutrition): boolean {
    const item = this.items.get(name);
    if (!item) return false;
    this.items.set(name, { ...item, nutrition: value });
    return true;
  }

  deleteByName(name: string): boolean {
    return this.items.delete(name);
  }
}

/**
 * Classifier answering from a fixed table; unknown names fail as a service error
 */
export class FakeClassifier implements MenuClassifier {
  readonly calls: string[] = [];
  private readonly answers: Record<string, Classification | Error>;

  constructor(answers: Record<string, Classification | Error> = {}) {
    this.answers = answers;
  }

  async classify(menuName: string): Promise<Classification> {
    this.calls.push(menuName);
    const answer = this.answers[menuName];
    if (answer === undefined) {
      throw new ClassificationFailure(menuName, 'service', 'no answer');
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}

export const standardCatalog = (): MenuItem[] => [
  makeItem('Seaweed Soup', 'Soup'),
  makeItem('Miso Soup', 'Soup'),
  makeItem('Tofu Stew', 'Soup'),
  makeItem('Bulgogi', 'Main'),
  makeItem('Spicy Pork', 'Main'),
  makeItem('Grilled Mackerel', 'Main'),
  makeItem('Kimchi', 'Side'),
  makeItem('Spinach', 'Side'),
  makeItem('Rolled Omelet', 'Side'),
  makeItem('Braised Tofu', 'Side'),
  makeItem('Yogurt', 'Dessert'),
];
