/**
 * Migration 003: Back-Office Stock Pool
 *
 * Central stock that has not been handed to an employee yet. One row per
 * counter, seeded at zero. Pool movements are journaled with a NULL
 * employee_id, so the pool obeys the same conservation law as balances:
 * quantity == Σ delta of its journal entries.
 *
 * Pre-check: inventory_journal must exist (001_sales_ledger).
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const BACKOFFICE_STOCK_SQL = `
CREATE TABLE IF NOT EXISTS backoffice_stock (
  counter TEXT PRIMARY KEY CHECK (counter IN ('sim', 'swap', 'credit50', 'credit100')),
  quantity INTEGER NOT NULL DEFAULT 0 CHECK (quantity >= 0),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

INSERT OR IGNORE INTO backoffice_stock (counter) VALUES
  ('sim'), ('swap'), ('credit50'), ('credit100');

CREATE INDEX IF NOT EXISTS idx_inventory_journal_backoffice
  ON inventory_journal(item_kind)
  WHERE employee_id IS NULL;
`;

export const ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_inventory_journal_backoffice;
DROP TABLE IF EXISTS backoffice_stock;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 003_backoffice_stock: Creating back-office stock pool');

  const tableExists = db.prepare(
    `SELECT name FROM sqlite_master WHERE type='table' AND name='inventory_journal'`
  ).get();

  if (!tableExists) {
    throw new Error('Migration 003 requires inventory_journal table (from migration 001)');
  }

  db.exec(BACKOFFICE_STOCK_SQL);
  logger.info('Migration 003_backoffice_stock completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 003_backoffice_stock');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 003_backoffice_stock reverted');
}
