/**
 * Migration 002: Journal Immutability Triggers
 *
 * Adds BEFORE UPDATE and BEFORE DELETE triggers on inventory_journal so
 * that entries cannot change after they are written. Any attempt is
 * ABORTed by SQLite, which also rolls back the surrounding statement.
 *
 * Pre-check: inventory_journal must exist (001_sales_ledger).
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const JOURNAL_IMMUTABILITY_SQL = `
CREATE TRIGGER IF NOT EXISTS trg_inventory_journal_no_update
  BEFORE UPDATE ON inventory_journal
BEGIN
  SELECT RAISE(ABORT, 'inventory journal is immutable');
END;

CREATE TRIGGER IF NOT EXISTS trg_inventory_journal_no_delete
  BEFORE DELETE ON inventory_journal
BEGIN
  SELECT RAISE(ABORT, 'inventory journal is immutable');
END;
`;

export const ROLLBACK_SQL = `
DROP TRIGGER IF EXISTS trg_inventory_journal_no_update;
DROP TRIGGER IF EXISTS trg_inventory_journal_no_delete;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 002_journal_immutability: Adding immutability triggers to journal');

  const tableExists = db.prepare(
    `SELECT name FROM sqlite_master WHERE type='table' AND name='inventory_journal'`
  ).get();

  if (!tableExists) {
    throw new Error('Migration 002 requires inventory_journal table (from migration 001)');
  }

  db.exec(JOURNAL_IMMUTABILITY_SQL);
  logger.info('Migration 002_journal_immutability completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 002_journal_immutability');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 002_journal_immutability reverted');
}
