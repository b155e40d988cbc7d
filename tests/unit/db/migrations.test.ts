/**
 * Migration tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { configureConnection } from '../../../src/db/connection.js';
import { MIGRATIONS, runMigrations } from '../../../src/db/migrations/index.js';

function tableNames(db: Database.Database): string[] {
  const rows = db.prepare(
    `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
  ).all() as Array<{ name: string }>;
  return rows.map((row) => row.name);
}

describe('migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    configureConnection(db);
  });

  afterEach(() => {
    db.close();
  });

  it('creates every ledger table', () => {
    runMigrations(db);

    expect(tableNames(db)).toEqual([
      'backoffice_stock',
      'employees',
      'inventory_balances',
      'inventory_journal',
      'reconciliation_locks',
      'sale_line_items',
    ]);
  });

  it('seeds one back-office row per counter', () => {
    runMigrations(db);
    runMigrations(db);

    const rows = db.prepare(
      `SELECT counter, quantity FROM backoffice_stock ORDER BY counter`
    ).all();
    expect(rows).toEqual([
      { counter: 'credit100', quantity: 0 },
      { counter: 'credit50', quantity: 0 },
      { counter: 'sim', quantity: 0 },
      { counter: 'swap', quantity: 0 },
    ]);
  });

  it('can run again on an up-to-date database', () => {
    runMigrations(db);
    expect(() => runMigrations(db)).not.toThrow();
  });

  it('installs the journal immutability triggers', () => {
    runMigrations(db);

    const triggers = db.prepare(
      `SELECT name FROM sqlite_master WHERE type = 'trigger' ORDER BY name`
    ).all() as Array<{ name: string }>;
    expect(triggers.map((t) => t.name)).toEqual([
      'trg_inventory_journal_no_delete',
      'trg_inventory_journal_no_update',
    ]);
  });

  it('reverts in reverse order', () => {
    runMigrations(db);

    for (const migration of [...MIGRATIONS].reverse()) {
      migration.down(db);
    }

    expect(tableNames(db)).toEqual([]);
  });

  it('enforces foreign keys on configured connections', () => {
    runMigrations(db);
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    expect(() =>
      db.prepare(`INSERT INTO inventory_balances (employee_id) VALUES ('ghost')`).run()
    ).toThrow(/FOREIGN KEY/);
  });
});
