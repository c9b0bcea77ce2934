/**
 * Domain types for the weekly menu planner
 */

// Per-item nutrition facts (kcal, g, g, g, mg)
export interface Nutrition {
  calories: number;
  protein: number;
  fat: number;
  carbs: number;
  sodium: number;
}

export type NutrientKey = keyof Nutrition;

export const NUTRIENT_KEYS: readonly NutrientKey[] = ['calories', 'protein', 'fat', 'carbs', 'sodium'];

// Canonical categories; anything else is treated as "Other"
export type MandatoryCategory = 'Soup' | 'Main' | 'Side';

export const MANDATORY_CATEGORIES: readonly MandatoryCategory[] = ['Soup', 'Main', 'Side'];

// Menu catalog entry, keyed by name
export interface MenuItem {
  name: string;
  category: string;
  nutrition: Nutrition;
}

export type Weekday = 'Mon' | 'Tue' | 'Wed' | 'Thu' | 'Fri';

export const WEEKDAYS: readonly Weekday[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri'];

export type Slot = 'Rice' | 'Soup' | 'Main' | 'Side1' | 'Side2' | 'Other';

export const SLOTS: readonly Slot[] = ['Rice', 'Soup', 'Main', 'Side1', 'Side2', 'Other'];

// Slots that carry nutrition; Rice is a fixed staple and is not accounted
export type NutritionSlot = Exclude<Slot, 'Rice'>;

export const NUTRITION_SLOTS: readonly NutritionSlot[] = ['Soup', 'Main', 'Side1', 'Side2', 'Other'];

export const RICE = 'Rice';

// One weekday row; empty string marks an empty slot
export interface DayPlan {
  weekday: Weekday;
  slots: Record<Slot, string>;
}

export type WeeklyPlan = DayPlan[];

// One row of the canonical (weekday, slot, menu) relation
export interface PlanCell {
  weekday: Weekday;
  slot: Slot;
  menu: string;
}

export interface NutritionRecord extends Nutrition {
  weekday: Weekday;
  slot: NutritionSlot;
  menu: string;
}

export interface DailyTotals extends Nutrition {
  weekday: Weekday;
}

export interface NutritionAnalysis {
  records: NutritionRecord[];
  dailyTotals: DailyTotals[];
  planTotals: Nutrition;
}

// Reference daily intake and accepted deviation
export interface NutritionTargets {
  targets: Nutrition;
  tolerancePercent: number;
}

export type MealPeriod = 'Lunch' | 'Dinner';

export const MEAL_PERIODS: readonly MealPeriod[] = ['Lunch', 'Dinner'];

/**
 * Storage of the menu catalog
 */
export interface CatalogStore {
  getAll(): MenuItem[];
  insert(item: MenuItem): MenuItem;
  updateCategory(name: string, category: string): boolean;
  updateNutrition(name: string, nutrition: Nutrition): boolean;
  deleteByName(name: string): boolean;
}

export interface Classification {
  category: string;
  nutrition: Nutrition;
}

/**
 * Derives category and nutrition for an unseen menu name
 */
export interface MenuClassifier {
  classify(menuName: string): Promise<Classification>;
}

export const isWeekday = (value: string): value is Weekday =>
  (WEEKDAYS as readonly string[]).includes(value);

export const isSlot = (value: string): value is Slot =>
  (SLOTS as readonly string[]).includes(value);
