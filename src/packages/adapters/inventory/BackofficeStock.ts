/**
 * BackofficeStock - SQLite implementation of IBackofficeStock
 *
 * @module packages/adapters/inventory/BackofficeStock
 */

import type Database from 'better-sqlite3';
import type {
  BackofficeStockLevel,
  IBackofficeStock,
} from '../../core/ports/IBackofficeStock.js';
import { COUNTERS, type Counter } from '../../core/protocol/item-kinds.js';
import { sqliteTimestamp } from '../../core/protocol/timestamps.js';
import { InsufficientStockError, ValidationError } from '../../../utils/errors.js';

/** Stands in for an employee id in errors about the pool */
export const BACKOFFICE_HOLDER = 'backoffice';

export class BackofficeStock implements IBackofficeStock {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  get(counter: Counter): number {
    const row = this.db.prepare(
      `SELECT quantity FROM backoffice_stock WHERE counter = ?`
    ).get(counter) as { quantity: number } | undefined;
    return row?.quantity ?? 0;
  }

  list(): BackofficeStockLevel[] {
    const rows = this.db.prepare(
      `SELECT * FROM backoffice_stock`
    ).all() as BackofficeRow[];
    const byCounter = new Map(rows.map((row) => [row.counter, row]));

    return COUNTERS.map((counter) => {
      const row = byCounter.get(counter);
      return {
        counter,
        quantity: row?.quantity ?? 0,
        updatedAt: row?.updated_at ?? '',
      };
    });
  }

  adjust(counter: Counter, delta: number): number {
    if (!Number.isSafeInteger(delta)) {
      throw new ValidationError(`Counter delta must be a safe integer, got ${delta}`, 'delta');
    }

    const row = this.db.prepare(
      `UPDATE backoffice_stock
       SET quantity = quantity + ?, updated_at = ?
       WHERE counter = ? AND quantity + ? >= 0
       RETURNING quantity`
    ).get(delta, sqliteTimestamp(), counter, delta) as { quantity: number } | undefined;

    if (row) {
      return row.quantity;
    }
    throw new InsufficientStockError(BACKOFFICE_HOLDER, counter, this.get(counter), -delta);
  }
}

// =============================================================================
// Row Types
// =============================================================================

interface BackofficeRow {
  counter: string;
  quantity: number;
  updated_at: string;
}
