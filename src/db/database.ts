/**
 * SQLite connection and schema setup
 * Creates the menu catalog and nutrition settings tables
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

export const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

/**
 * Open the database (once) and create the tables
 */
export function initDatabase(dbPath: string = config.dbPath): Database.Database {
  if (db) {
    return db;
  }

  // Make sure the directory exists for file-backed databases
  if (dbPath !== IN_MEMORY) {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  db = new Database(dbPath);
  createTables(db);

  logger.success('Database initialized', { path: dbPath });
  return db;
}

/**
 * Current database instance, opened on first use
 */
export function getDatabase(): Database.Database {
  if (!db) {
    return initDatabase();
  }
  return db;
}

/**
 * Close the connection; the next getDatabase() opens a fresh one
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function createTables(database: Database.Database): void {
  // Menu catalog, name is the stable key
  database.exec(`
    CREATE TABLE IF NOT EXISTS menus (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      category TEXT NOT NULL,
      calories REAL NOT NULL DEFAULT 0,
      protein REAL NOT NULL DEFAULT 0,
      fat REAL NOT NULL DEFAULT 0,
      carbs REAL NOT NULL DEFAULT 0,
      sodium REAL NOT NULL DEFAULT 0,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP
    )
  `);

  // Reference daily intake used to judge a day's totals
  database.exec(`
    CREATE TABLE IF NOT EXISTS nutrition_settings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      calories REAL NOT NULL DEFAULT 2000,
      protein REAL NOT NULL DEFAULT 50,
      fat REAL NOT NULL DEFAULT 65,
      carbs REAL NOT NULL DEFAULT 300,
      sodium REAL NOT NULL DEFAULT 2300,
      tolerance_percent REAL NOT NULL DEFAULT 10,
      updated_at TEXT DEFAULT CURRENT_TIMESTAMP
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_menus_category ON menus(category);
  `);

  // Seed default settings
  const settingsCount = database.prepare('SELECT COUNT(*) as count FROM nutrition_settings').get() as { count: number };
  if (settingsCount.count === 0) {
    database.prepare('INSERT INTO nutrition_settings DEFAULT VALUES').run();
  }
}
