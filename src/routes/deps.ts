import type { CatalogStore, MenuClassifier } from '../types/index.js';

export interface RouteDeps {
  store: CatalogStore;
  classifier: MenuClassifier;
}
