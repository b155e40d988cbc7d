/**
 * ConservationAuditor - alert-only conservation check
 *
 * Accounts start at zero and every later change is journaled, so for each
 * employee and counter: balance == Σ journal delta. The back-office pool
 * follows the same law over its NULL-employee entries. Divergence is logged
 * and reported for human review; nothing is ever corrected here.
 *
 * @module packages/adapters/inventory/ConservationAuditor
 */

import type { IAuditJournal } from '../../core/ports/IAuditJournal.js';
import type { IBackofficeStock } from '../../core/ports/IBackofficeStock.js';
import type {
  ConservationDivergence,
  ConservationReport,
  IConservationAuditor,
} from '../../core/ports/IConservationAuditor.js';
import type { IInventoryStore, InventoryBalance } from '../../core/ports/IInventoryStore.js';
import { COUNTERS, type Counter } from '../../core/protocol/item-kinds.js';
import { sqliteTimestamp } from '../../core/protocol/timestamps.js';
import { logger } from '../../../utils/logger.js';

export class ConservationAuditor implements IConservationAuditor {
  private store: IInventoryStore;
  private journal: IAuditJournal;
  private backoffice: IBackofficeStock;

  constructor(store: IInventoryStore, journal: IAuditJournal, backoffice: IBackofficeStock) {
    this.store = store;
    this.journal = journal;
    this.backoffice = backoffice;
  }

  async check(employeeId?: string): Promise<ConservationReport> {
    const checkedAt = sqliteTimestamp();
    let balances: InventoryBalance[];
    if (employeeId) {
      const balance = this.store.get(employeeId);
      balances = balance ? [balance] : [];
    } else {
      balances = this.store.list();
    }

    const totals = new Map<string, number>();
    for (const row of this.journal.sumDeltas(employeeId)) {
      totals.set(totalKey(row.employeeId, row.counter), row.total);
    }

    const divergences: ConservationDivergence[] = [];
    for (const balance of balances) {
      for (const counter of COUNTERS) {
        const journalTotal = totals.get(totalKey(balance.employeeId, counter)) ?? 0;
        if (balance[counter] !== journalTotal) {
          divergences.push({
            employeeId: balance.employeeId,
            counter,
            balance: balance[counter],
            journalTotal,
          });
        }
      }
    }

    if (!employeeId) {
      const poolTotals = this.journal.sumBackofficeDeltas();
      for (const level of this.backoffice.list()) {
        const journalTotal = poolTotals[level.counter] ?? 0;
        if (level.quantity !== journalTotal) {
          divergences.push({
            employeeId: null,
            counter: level.counter,
            balance: level.quantity,
            journalTotal,
          });
        }
      }
    }

    const passed = divergences.length === 0;
    if (passed) {
      logger.info({
        event: 'conservation.passed',
        employeesChecked: balances.length,
      }, 'Conservation check passed');
    } else {
      for (const divergence of divergences) {
        logger.error({ event: 'conservation.divergence', ...divergence }, 'Balance diverges from journal');
      }
    }

    return { passed, checkedAt, employeesChecked: balances.length, divergences };
  }
}

function totalKey(employeeId: string, counter: Counter): string {
  return `${employeeId}\u0000${counter}`;
}
