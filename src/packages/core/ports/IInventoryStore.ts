/**
 * IInventoryStore - Inventory Store Port
 *
 * Durable per-employee counters. Methods are synchronous and run inside
 * the caller's transaction; only the reconciliation engine writes.
 *
 * @module packages/core/ports/IInventoryStore
 */

import type { Counter } from '../protocol/item-kinds.js';

export type CounterValues = Record<Counter, number>;

export interface EmployeeAccount {
  id: string;
  displayName: string | null;
  createdAt: string;
}

export interface InventoryBalance extends CounterValues {
  employeeId: string;
  updatedAt: string;
}

export interface InventoryTotals extends CounterValues {
  employees: number;
}

export interface IInventoryStore {
  /**
   * Provision an account with all counters at zero.
   * Idempotent; a given displayName replaces the stored one.
   */
  ensure(employeeId: string, displayName?: string): EmployeeAccount;

  get(employeeId: string): InventoryBalance | null;

  /**
   * Add `delta` to one counter and return the new value.
   * Throws InsufficientStockError instead of writing a negative value,
   * NotFoundError when the employee has no balance row.
   */
  adjust(employeeId: string, counter: Counter, delta: number): number;

  setUpdatedTimestamp(employeeId: string, at?: Date): void;

  list(): InventoryBalance[];

  totals(): InventoryTotals;
}
