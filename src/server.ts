/**
 * API server entry point
 * Opens the catalog database, wires the Gemini classifier and starts listening
 */

import { createApp } from './app.js';
import { config } from './config.js';
import { initDatabase } from './db/database.js';
import { Menu } from './models/Menu.js';
import { GeminiMenuClassifier, UnconfiguredClassifier, createAIClient } from './services/menuClassifier.js';
import { logger } from './utils/logger.js';
import type { MenuClassifier } from './types/index.js';

initDatabase();

const classifier: MenuClassifier = config.geminiApiKey
  ? new GeminiMenuClassifier(createAIClient(config.geminiApiKey), { model: config.geminiModel })
  : new UnconfiguredClassifier();

if (!config.geminiApiKey) {
  logger.alert('GEMINI_API_KEY is not set; unknown menus cannot be classified');
}

const app = createApp({
  store: Menu,
  classifier,
  classifierConfigured: Boolean(config.geminiApiKey),
});

app.listen(config.port, () => {
  logger.info(`🚀 Menu planner API running on http://localhost:${config.port}`);
});
