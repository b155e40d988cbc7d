/**
 * IAuditJournal - Audit Journal Port
 *
 * Append-only log of counter deltas. Every balance change is journaled in
 * the same transaction as the change itself, so for each employee and
 * counter the balance equals the sum of its journal deltas.
 *
 * @module packages/core/ports/IAuditJournal
 */

import type { Counter } from '../protocol/item-kinds.js';
import type { ReconciliationKey } from '../protocol/reconciliation-key.js';

export type JournalReason = 'sale' | 'revert' | 'admin-transfer';

export interface JournalEntry {
  id: number;
  /** null for back-office pool movements */
  employeeId: string | null;
  counter: Counter;
  delta: number;
  reason: JournalReason;
  source: string;
  /** Sale id for 'sale' entries */
  sourceRef: number | null;
  /** Sale ids undone by a 'revert' entry */
  revertRefs: number[] | null;
  createdAt: string;
}

export interface NewJournalEntry {
  employeeId: string | null;
  counter: Counter;
  delta: number;
  reason: JournalReason;
  source: string;
  sourceRef?: number | null;
  revertRefs?: readonly number[] | null;
}

export type CounterDeltas = Partial<Record<Counter, number>>;

/**
 * Units to give back, per counter, for a set of live sales.
 */
export interface RevertPlan {
  key: ReconciliationKey;
  saleIds: number[];
  deltas: CounterDeltas;
}

export interface JournalHistoryOptions {
  limit?: number;
  reason?: JournalReason;
}

export interface JournalTotal {
  employeeId: string;
  counter: Counter;
  total: number;
}

export interface IAuditJournal {
  append(entry: NewJournalEntry): JournalEntry;

  /**
   * Plan the revert of every live sale under `key` from durable journal
   * state. Throws RevertFailureError when a sale's journaled deduction
   * does not match its quantity.
   */
  computeRevert(key: ReconciliationKey): RevertPlan;

  /** Same as computeRevert, for one live sale */
  computeSaleRevert(saleId: number): RevertPlan;

  /**
   * Give the planned deltas back to the store, journal one 'revert' entry
   * per counter and delete the planned sales. Returns the rows deleted.
   */
  applyRevert(key: ReconciliationKey, plan: RevertPlan, source: string): number;

  /** Newest first */
  history(employeeId: string, options?: JournalHistoryOptions): JournalEntry[];

  /** Σ delta per employee and counter */
  sumDeltas(employeeId?: string): JournalTotal[];

  /** Σ delta per counter over back-office entries (employeeId null) */
  sumBackofficeDeltas(): CounterDeltas;
}
