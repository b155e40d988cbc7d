/**
 * BackofficeStock Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { BackofficeStock } from '../../../../../src/packages/adapters/inventory/BackofficeStock.js';
import { InsufficientStockError, ValidationError } from '../../../../../src/utils/errors.js';
import { createTestDb } from '../../../../helpers/inventory-db.js';

describe('BackofficeStock', () => {
  let db: Database.Database;
  let pool: BackofficeStock;

  beforeEach(() => {
    db = createTestDb();
    pool = new BackofficeStock(db);
  });

  afterEach(() => {
    db.close();
  });

  it('starts with every counter at zero', () => {
    expect(pool.list().map((level) => [level.counter, level.quantity])).toEqual([
      ['sim', 0],
      ['swap', 0],
      ['credit50', 0],
      ['credit100', 0],
    ]);
    expect(pool.get('credit100')).toBe(0);
  });

  it('returns the new quantity after each adjustment', () => {
    expect(pool.adjust('swap', 7)).toBe(7);
    expect(pool.adjust('swap', -7)).toBe(0);
    expect(pool.adjust('credit100', 3)).toBe(3);
    expect(pool.get('credit100')).toBe(3);
  });

  it('refuses to go below zero and changes nothing', () => {
    pool.adjust('sim', 2);

    expect(() => pool.adjust('sim', -3)).toThrow(InsufficientStockError);
    expect(() => pool.adjust('sim', -3)).toThrow(
      'Insufficient sim for backoffice: requested 3, available 2'
    );
    expect(pool.get('sim')).toBe(2);
  });

  it('rejects deltas that are not safe integers', () => {
    expect(() => pool.adjust('sim', 0.5)).toThrow(ValidationError);
    expect(() => pool.adjust('sim', 1e300)).toThrow(ValidationError);
  });

  it('is backed by a CHECK constraint', () => {
    expect(() =>
      db.prepare(`UPDATE backoffice_stock SET quantity = -1 WHERE counter = 'sim'`).run()
    ).toThrow(/CHECK constraint failed/);
  });
});
