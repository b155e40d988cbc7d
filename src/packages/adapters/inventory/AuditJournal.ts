/**
 * AuditJournal - SQLite implementation of IAuditJournal
 *
 * Reverts are computed from what the journal says each live sale took,
 * never from re-running the deduction rules. A sale whose journaled
 * deduction does not equal its quantity means ledger and journal have
 * drifted apart; that raises RevertFailureError and aborts the caller's
 * transaction.
 *
 * Rows are protected by the immutability triggers of migration 002.
 *
 * @module packages/adapters/inventory/AuditJournal
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  CounterDeltas,
  IAuditJournal,
  JournalEntry,
  JournalHistoryOptions,
  JournalReason,
  JournalTotal,
  NewJournalEntry,
  RevertPlan,
} from '../../core/ports/IAuditJournal.js';
import type { IInventoryStore } from '../../core/ports/IInventoryStore.js';
import type { ISaleLedger, SaleLineItem } from '../../core/ports/ISaleLedger.js';
import { COUNTERS, counterFor, type Counter } from '../../core/protocol/item-kinds.js';
import { lockKeyOf, type ReconciliationKey } from '../../core/protocol/reconciliation-key.js';
import { sqliteTimestamp } from '../../core/protocol/timestamps.js';
import { NotFoundError, RevertFailureError } from '../../../utils/errors.js';

const DEFAULT_HISTORY_LIMIT = 20;

const revertRefsSchema = z.array(z.number().int());

export class AuditJournal implements IAuditJournal {
  private db: Database.Database;
  private store: IInventoryStore;
  private ledger: ISaleLedger;

  constructor(db: Database.Database, store: IInventoryStore, ledger: ISaleLedger) {
    this.db = db;
    this.store = store;
    this.ledger = ledger;
  }

  append(entry: NewJournalEntry): JournalEntry {
    const row = this.db.prepare(
      `INSERT INTO inventory_journal
       (employee_id, item_kind, delta, reason, source, source_ref, revert_refs, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       RETURNING *`
    ).get(
      entry.employeeId,
      entry.counter,
      entry.delta,
      entry.reason,
      entry.source,
      entry.sourceRef ?? null,
      entry.revertRefs ? JSON.stringify(entry.revertRefs) : null,
      sqliteTimestamp()
    ) as JournalRow;
    return rowToEntry(row);
  }

  computeRevert(key: ReconciliationKey): RevertPlan {
    return this.planFor(key, this.ledger.listByKey(key));
  }

  computeSaleRevert(saleId: number): RevertPlan {
    const sale = this.ledger.getById(saleId);
    if (!sale) {
      throw new NotFoundError('Sale', String(saleId));
    }
    return this.planFor({ employeeId: sale.employeeId, reportDate: sale.reportDate }, [sale]);
  }

  applyRevert(key: ReconciliationKey, plan: RevertPlan, source: string): number {
    for (const counter of COUNTERS) {
      const amount = plan.deltas[counter];
      if (!amount) continue;

      this.store.adjust(key.employeeId, counter, amount);
      this.append({
        employeeId: key.employeeId,
        counter,
        delta: amount,
        reason: 'revert',
        source,
        revertRefs: plan.saleIds,
      });
    }

    const deleted = this.ledger.deleteByIds(plan.saleIds);
    if (deleted !== plan.saleIds.length) {
      throw new RevertFailureError(
        `Expected to delete ${plan.saleIds.length} sales under ${lockKeyOf(key)}, deleted ${deleted}`,
        lockKeyOf(key)
      );
    }
    return deleted;
  }

  history(employeeId: string, options?: JournalHistoryOptions): JournalEntry[] {
    const limit = options?.limit ?? DEFAULT_HISTORY_LIMIT;
    const rows = options?.reason
      ? this.db.prepare(
          `SELECT * FROM inventory_journal
           WHERE employee_id = ? AND reason = ?
           ORDER BY id DESC LIMIT ?`
        ).all(employeeId, options.reason, limit)
      : this.db.prepare(
          `SELECT * FROM inventory_journal
           WHERE employee_id = ?
           ORDER BY id DESC LIMIT ?`
        ).all(employeeId, limit);
    return (rows as JournalRow[]).map(rowToEntry);
  }

  sumDeltas(employeeId?: string): JournalTotal[] {
    const rows = (employeeId
      ? this.db.prepare(
          `SELECT employee_id, item_kind, SUM(delta) AS total FROM inventory_journal
           WHERE employee_id = ?
           GROUP BY employee_id, item_kind
           ORDER BY employee_id, item_kind`
        ).all(employeeId)
      : this.db.prepare(
          `SELECT employee_id, item_kind, SUM(delta) AS total FROM inventory_journal
           WHERE employee_id IS NOT NULL
           GROUP BY employee_id, item_kind
           ORDER BY employee_id, item_kind`
        ).all()) as Array<{ employee_id: string; item_kind: string; total: number }>;

    return rows.map((row) => ({
      employeeId: row.employee_id,
      counter: row.item_kind as Counter,
      total: row.total,
    }));
  }

  sumBackofficeDeltas(): CounterDeltas {
    const rows = this.db.prepare(
      `SELECT item_kind, SUM(delta) AS total FROM inventory_journal
       WHERE employee_id IS NULL
       GROUP BY item_kind`
    ).all() as Array<{ item_kind: string; total: number }>;

    const totals: CounterDeltas = {};
    for (const row of rows) {
      totals[row.item_kind as Counter] = row.total;
    }
    return totals;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private planFor(key: ReconciliationKey, sales: SaleLineItem[]): RevertPlan {
    const deltas: CounterDeltas = {};
    const lockKey = lockKeyOf(key);
    const stmt = this.db.prepare(
      `SELECT employee_id, item_kind, SUM(delta) AS total
       FROM inventory_journal
       WHERE reason = 'sale' AND source_ref = ?
       GROUP BY employee_id, item_kind`
    );

    for (const sale of sales) {
      const entries = stmt.all(sale.id) as Array<{
        employee_id: string | null;
        item_kind: string;
        total: number;
      }>;
      const counter = counterFor(sale.itemKind);

      if (entries.length === 0 && sale.quantity === 0) {
        continue;
      }

      const [entry] = entries;
      if (
        entries.length !== 1 ||
        entry.employee_id !== sale.employeeId ||
        entry.item_kind !== counter ||
        entry.total !== -sale.quantity
      ) {
        throw new RevertFailureError(
          `Journal does not match sale ${sale.id} under ${lockKey}: ` +
          `expected ${-sale.quantity} on ${counter}, found ${describeEntries(entries)}`,
          lockKey
        );
      }

      deltas[counter] = (deltas[counter] ?? 0) + sale.quantity;
    }

    return { key, saleIds: sales.map((sale) => sale.id), deltas };
  }
}

// =============================================================================
// Row Types
// =============================================================================

interface JournalRow {
  id: number;
  employee_id: string | null;
  item_kind: string;
  delta: number;
  reason: string;
  source: string;
  source_ref: number | null;
  revert_refs: string | null;
  created_at: string;
}

function rowToEntry(row: JournalRow): JournalEntry {
  return {
    id: row.id,
    employeeId: row.employee_id,
    // CHECK constraints admit only counters and known reasons
    counter: row.item_kind as Counter,
    delta: row.delta,
    reason: row.reason as JournalReason,
    source: row.source,
    sourceRef: row.source_ref,
    revertRefs: row.revert_refs ? revertRefsSchema.parse(JSON.parse(row.revert_refs)) : null,
    createdAt: row.created_at,
  };
}

function describeEntries(
  entries: Array<{ employee_id: string | null; item_kind: string; total: number }>
): string {
  if (entries.length === 0) return 'no sale entry';
  return entries
    .map((e) => `${e.total} on ${e.item_kind} for ${e.employee_id ?? '(none)'}`)
    .join(', ');
}
