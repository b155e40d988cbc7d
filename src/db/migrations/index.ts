import type Database from 'better-sqlite3';
import * as salesLedger from './001_sales_ledger.js';
import * as journalImmutability from './002_journal_immutability.js';
import * as backofficeStock from './003_backoffice_stock.js';

interface Migration {
  up(db: Database.Database): void;
  down(db: Database.Database): void;
}

/** Applied in order; every migration is idempotent. */
export const MIGRATIONS: readonly Migration[] = [salesLedger, journalImmutability, backofficeStock];

export function runMigrations(db: Database.Database): void {
  for (const migration of MIGRATIONS) {
    migration.up(db);
  }
}

export { SALES_LEDGER_SCHEMA_SQL } from './001_sales_ledger.js';
export { JOURNAL_IMMUTABILITY_SQL } from './002_journal_immutability.js';
export { BACKOFFICE_STOCK_SQL } from './003_backoffice_stock.js';
