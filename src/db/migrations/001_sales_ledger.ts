/**
 * Migration 001: Sales Ledger Foundation
 *
 * Creates the tables the reconciliation engine works on:
 * - employees: one account per employee (Telegram username)
 * - inventory_balances: per-employee counters, never negative
 * - sale_line_items: live sales, replaced per (employee, report_date)
 * - inventory_journal: append-only record of every counter delta
 * - reconciliation_locks: ownership records for (employee, report_date) keys
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const SALES_LEDGER_SCHEMA_SQL = `
-- =============================================================================
-- employees: accounts are created on first contact and never deleted
-- =============================================================================

CREATE TABLE IF NOT EXISTS employees (
  id TEXT PRIMARY KEY,
  display_name TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- =============================================================================
-- inventory_balances: one row per employee
-- =============================================================================
-- CHECK constraints back the non-negative invariant at the storage layer.

CREATE TABLE IF NOT EXISTS inventory_balances (
  employee_id TEXT PRIMARY KEY REFERENCES employees(id),
  sim INTEGER NOT NULL DEFAULT 0 CHECK (sim >= 0),
  swap INTEGER NOT NULL DEFAULT 0 CHECK (swap >= 0),
  credit_50 INTEGER NOT NULL DEFAULT 0 CHECK (credit_50 >= 0),
  credit_100 INTEGER NOT NULL DEFAULT 0 CHECK (credit_100 >= 0),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- =============================================================================
-- sale_line_items: the live sales of each (employee_id, report_date) key
-- =============================================================================
-- quantity is the number of units the row deducted. Rows are never updated;
-- a re-upload deletes them after reverting their journaled deductions.

CREATE TABLE IF NOT EXISTS sale_line_items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  employee_id TEXT NOT NULL REFERENCES employees(id),
  report_date TEXT NOT NULL,
  item_kind TEXT NOT NULL CHECK (item_kind IN ('SIM', 'SWAP', 'CREDIT50', 'CREDIT100')),
  unit_identifier TEXT,
  quantity INTEGER NOT NULL CHECK (quantity >= 0),
  contact_number TEXT,
  amount REAL NOT NULL DEFAULT 0,
  notes TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_sale_line_items_key
  ON sale_line_items(employee_id, report_date);

CREATE INDEX IF NOT EXISTS idx_sale_line_items_unit
  ON sale_line_items(item_kind, unit_identifier)
  WHERE unit_identifier IS NOT NULL;

CREATE INDEX IF NOT EXISTS idx_sale_line_items_date
  ON sale_line_items(report_date);

-- =============================================================================
-- inventory_journal: append-only counter deltas
-- =============================================================================
-- item_kind holds the counter that moved. source_ref is the sale id for
-- 'sale' entries; it is not a foreign key because reverted sales are deleted.
-- revert_refs is a JSON array of the sale ids a 'revert' entry undid.

CREATE TABLE IF NOT EXISTS inventory_journal (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  employee_id TEXT REFERENCES employees(id),
  item_kind TEXT NOT NULL CHECK (item_kind IN ('sim', 'swap', 'credit50', 'credit100')),
  delta INTEGER NOT NULL,
  reason TEXT NOT NULL CHECK (reason IN ('sale', 'revert', 'admin-transfer')),
  source TEXT NOT NULL,
  source_ref INTEGER,
  revert_refs TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_inventory_journal_sale_ref
  ON inventory_journal(source_ref)
  WHERE reason = 'sale';

CREATE INDEX IF NOT EXISTS idx_inventory_journal_employee
  ON inventory_journal(employee_id, id);

-- =============================================================================
-- reconciliation_locks: key ownership with expiry (epoch milliseconds)
-- =============================================================================

CREATE TABLE IF NOT EXISTS reconciliation_locks (
  lock_key TEXT PRIMARY KEY,
  owner_id TEXT NOT NULL,
  acquired_at INTEGER NOT NULL,
  expires_at INTEGER NOT NULL
);
`;

export const ROLLBACK_SQL = `
DROP TABLE IF EXISTS reconciliation_locks;
DROP TABLE IF EXISTS inventory_journal;
DROP TABLE IF EXISTS sale_line_items;
DROP TABLE IF EXISTS inventory_balances;
DROP TABLE IF EXISTS employees;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 001_sales_ledger: Creating sales ledger tables');
  db.exec(SALES_LEDGER_SCHEMA_SQL);
  logger.info('Migration 001_sales_ledger completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 001_sales_ledger');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 001_sales_ledger reverted');
}
