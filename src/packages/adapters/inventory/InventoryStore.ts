/**
 * InventoryStore - SQLite implementation of IInventoryStore
 *
 * Counter writes are guarded updates (`col + delta >= 0`), so a write that
 * would go negative changes nothing and raises instead. Every method is
 * synchronous and joins the caller's transaction.
 *
 * @module packages/adapters/inventory/InventoryStore
 */

import type Database from 'better-sqlite3';
import type {
  EmployeeAccount,
  IInventoryStore,
  InventoryBalance,
  InventoryTotals,
} from '../../core/ports/IInventoryStore.js';
import { COUNTER_COLUMNS, type Counter } from '../../core/protocol/item-kinds.js';
import { sqliteTimestamp } from '../../core/protocol/timestamps.js';
import { InsufficientStockError, NotFoundError, ValidationError } from '../../../utils/errors.js';

export class InventoryStore implements IInventoryStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  ensure(employeeId: string, displayName?: string): EmployeeAccount {
    if (employeeId.trim() === '') {
      throw new ValidationError('Employee id must not be empty', 'employeeId');
    }

    const now = sqliteTimestamp();
    this.db.prepare(
      `INSERT INTO employees (id, display_name, created_at)
       VALUES (?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         display_name = COALESCE(excluded.display_name, employees.display_name)`
    ).run(employeeId, displayName ?? null, now);

    this.db.prepare(
      `INSERT OR IGNORE INTO inventory_balances (employee_id, updated_at)
       VALUES (?, ?)`
    ).run(employeeId, now);

    const row = this.db.prepare(
      `SELECT * FROM employees WHERE id = ?`
    ).get(employeeId) as EmployeeRow;
    return rowToAccount(row);
  }

  get(employeeId: string): InventoryBalance | null {
    const row = this.db.prepare(
      `SELECT * FROM inventory_balances WHERE employee_id = ?`
    ).get(employeeId) as BalanceRow | undefined;
    return row ? rowToBalance(row) : null;
  }

  adjust(employeeId: string, counter: Counter, delta: number): number {
    if (!Number.isSafeInteger(delta)) {
      throw new ValidationError(`Counter delta must be a safe integer, got ${delta}`, 'delta');
    }

    const column = COUNTER_COLUMNS[counter];
    const row = this.db.prepare(
      `UPDATE inventory_balances
       SET ${column} = ${column} + ?
       WHERE employee_id = ? AND ${column} + ? >= 0
       RETURNING ${column} AS value`
    ).get(delta, employeeId, delta) as { value: number } | undefined;

    if (row) {
      return row.value;
    }

    const current = this.get(employeeId);
    if (!current) {
      throw new NotFoundError('Employee', employeeId);
    }
    throw new InsufficientStockError(employeeId, counter, current[counter], -delta);
  }

  setUpdatedTimestamp(employeeId: string, at?: Date): void {
    this.db.prepare(
      `UPDATE inventory_balances SET updated_at = ? WHERE employee_id = ?`
    ).run(sqliteTimestamp(at), employeeId);
  }

  list(): InventoryBalance[] {
    const rows = this.db.prepare(
      `SELECT * FROM inventory_balances ORDER BY employee_id`
    ).all() as BalanceRow[];
    return rows.map(rowToBalance);
  }

  totals(): InventoryTotals {
    const row = this.db.prepare(
      `SELECT
         COUNT(*) AS employees,
         COALESCE(SUM(sim), 0) AS sim,
         COALESCE(SUM(swap), 0) AS swap,
         COALESCE(SUM(credit_50), 0) AS credit_50,
         COALESCE(SUM(credit_100), 0) AS credit_100
       FROM inventory_balances`
    ).get() as TotalsRow;

    return {
      employees: row.employees,
      sim: row.sim,
      swap: row.swap,
      credit50: row.credit_50,
      credit100: row.credit_100,
    };
  }
}

// =============================================================================
// Row Types
// =============================================================================

interface EmployeeRow {
  id: string;
  display_name: string | null;
  created_at: string;
}

interface BalanceRow {
  employee_id: string;
  sim: number;
  swap: number;
  credit_50: number;
  credit_100: number;
  updated_at: string;
}

interface TotalsRow {
  employees: number;
  sim: number;
  swap: number;
  credit_50: number;
  credit_100: number;
}

function rowToAccount(row: EmployeeRow): EmployeeAccount {
  return {
    id: row.id,
    displayName: row.display_name,
    createdAt: row.created_at,
  };
}

function rowToBalance(row: BalanceRow): InventoryBalance {
  return {
    employeeId: row.employee_id,
    sim: row.sim,
    swap: row.swap,
    credit50: row.credit_50,
    credit100: row.credit_100,
    updatedAt: row.updated_at,
  };
}
