/**
 * Database Connection Module
 *
 * Handles database lifecycle: initialization, connection management, and shutdown.
 *
 * @module db/connection
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { runMigrations } from './migrations/index.js';

let db: Database.Database | null = null;

/**
 * Apply the connection pragmas every writer relies on
 */
export function configureConnection(database: Database.Database): void {
  // WAL keeps readers off the writer's lock; busy_timeout bounds writer waits
  database.pragma('journal_mode = WAL');
  database.pragma('busy_timeout = 5000');
  database.pragma('foreign_keys = ON');
}

/**
 * Initialize the database connection and run migrations
 */
export function initDatabase(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = config.database.path;

  // For file-based SQLite, ensure data directory exists
  if (dbPath !== ':memory:') {
    const dbDir = dirname(dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      logger.info({ path: dbDir }, 'Created database directory');
    }
  }

  db = new Database(dbPath);
  logger.info({ path: dbPath }, 'Database connection established');

  configureConnection(db);
  runMigrations(db);
  logger.info('Database schema initialized');

  return db;
}

/**
 * Get the database instance (must call initDatabase first)
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

// Re-export Database type for consumers
export type { Database };
