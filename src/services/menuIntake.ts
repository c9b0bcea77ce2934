/**
 * Bulk menu intake: classify new names one at a time and store them
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { CatalogStore, MenuClassifier, MenuItem } from '../types/index.js';

export interface IntakeDeps {
  store: CatalogStore;
  classifier: MenuClassifier;
  logger?: Logger;
}

export interface IntakeResult {
  added: MenuItem[];
  skipped: string[];
  failed: Array<{ name: string; reason: string }>;
}

/**
 * Split "a, b ,c" into trimmed, non-empty names
 */
export const parseMenuList = (text: string): string[] =>
  text
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);

export async function addMenus(names: readonly string[], deps: IntakeDeps): Promise<IntakeResult> {
  const { store, classifier, logger = defaultLogger } = deps;
  const existing = new Set(store.getAll().map((item) => item.name));
  const result: IntakeResult = { added: [], skipped: [], failed: [] };
  const seen = new Set<string>();

  for (const rawName of names) {
    const name = rawName.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);

    if (existing.has(name)) {
      logger.skip(`${name} is already in the catalog`);
      result.skipped.push(name);
      continue;
    }

    try {
      const classification = await classifier.classify(name);
      const item = store.insert({ name, ...classification });
      existing.add(name);
      result.added.push(item);
      logger.success(`Added ${name}`, { category: item.category });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to add ${name}`, error);
      result.failed.push({ name, reason });
    }
  }

  return result;
}
