/**
 * ISalesReconciliationService - Sales Reconciliation Port
 *
 * Applies one batch of parsed sale rows per (employee, report date) with
 * last-upload-wins semantics: the previous batch of the key is reverted
 * from the journal, then the new rows are applied, all in one transaction
 * under the key lock.
 *
 * Row-level problems are returned as SkippedRow data. Key-level problems
 * (lock timeout, lost lock, journal inconsistency, storage failure) throw
 * and leave no change behind.
 *
 * @module packages/core/ports/ISalesReconciliationService
 */

import type { Counter } from '../protocol/item-kinds.js';
import type { SaleEntry } from '../protocol/sale-entry.js';
import type { CounterDeltas, JournalEntry, JournalHistoryOptions } from './IAuditJournal.js';
import type { BackofficeStockLevel } from './IBackofficeStock.js';
import type { EmployeeAccount, InventoryBalance, InventoryTotals } from './IInventoryStore.js';
import type { SaleLineItem, UnitSaleLocation } from './ISaleLedger.js';

// =============================================================================
// Batch Result
// =============================================================================

export type SkipReason =
  | 'duplicate-in-batch'
  | 'duplicate-global'
  | 'insufficient-stock'
  | 'invalid-item-kind'
  | 'invalid-quantity';

interface SkippedRowBase {
  /** Position of the row in the submitted batch */
  index: number;
  itemKind: string;
}

export type SkippedRow =
  | (SkippedRowBase & {
      reason: 'duplicate-in-batch';
      identifier: string;
      firstIndex: number;
    })
  | (SkippedRowBase & {
      reason: 'duplicate-global';
      identifier: string;
      conflict: UnitSaleLocation;
    })
  | (SkippedRowBase & {
      reason: 'insufficient-stock';
      counter: Counter;
      available: number;
      requested: number;
      /** True when the skipped part is a credit sub-count carried by the row */
      auxiliary: boolean;
    })
  | (SkippedRowBase & { reason: 'invalid-item-kind' })
  | (SkippedRowBase & { reason: 'invalid-quantity'; requested: number });

export interface BatchResult {
  /** Line items written, auxiliary credit rows included */
  inserted: number;
  skippedDuplicates: number;
  skippedInsufficient: number;
  skippedInvalid: number;
  reverted: {
    saleIds: number[];
    deltas: CounterDeltas;
  };
  skipped: SkippedRow[];
}

export interface StockTransferResult {
  from: InventoryBalance;
  to: InventoryBalance;
}

export interface InventorySummary {
  balances: InventoryBalance[];
  totals: InventoryTotals;
}

// =============================================================================
// Service Interface
// =============================================================================

export interface ISalesReconciliationService {
  /**
   * Replace the batch of (employeeId, reportDate) with `entries`.
   * An empty batch is a pure revert.
   */
  applyBatch(
    employeeId: string,
    reportDate: string,
    entries: readonly SaleEntry[]
  ): Promise<BatchResult>;

  /** Revert and delete the live sales of a key; returns rows deleted */
  revert(employeeId: string, reportDate: string): Promise<number>;

  getBalance(employeeId: string): Promise<InventoryBalance | null>;

  listSales(employeeId: string, reportDate: string): Promise<SaleLineItem[]>;

  /** Revert a single line item; false when it is no longer live */
  deleteSale(saleId: number): Promise<boolean>;

  /** Admin stock-in (positive) or stock-out (negative) */
  adjustStock(
    employeeId: string,
    counter: Counter,
    delta: number,
    actor: string
  ): Promise<InventoryBalance>;

  transferStock(
    fromEmployeeId: string,
    toEmployeeId: string,
    counter: Counter,
    quantity: number,
    actor: string
  ): Promise<StockTransferResult>;

  /** Stock-in to the back-office pool */
  addBackofficeStock(
    counter: Counter,
    quantity: number,
    actor: string
  ): Promise<BackofficeStockLevel[]>;

  /** Move pool stock into an employee balance */
  transferFromBackoffice(
    toEmployeeId: string,
    counter: Counter,
    quantity: number,
    actor: string
  ): Promise<InventoryBalance>;

  listBackofficeStock(): Promise<BackofficeStockLevel[]>;

  /** Unlocked read; may lag an in-flight batch */
  listSalesByDate(reportDate: string): Promise<SaleLineItem[]>;

  /** Unlocked read; may lag an in-flight batch */
  summarizeInventory(): Promise<InventorySummary>;

  ensureEmployee(employeeId: string, displayName?: string): Promise<EmployeeAccount>;

  getJournal(employeeId: string, options?: JournalHistoryOptions): Promise<JournalEntry[]>;
}
