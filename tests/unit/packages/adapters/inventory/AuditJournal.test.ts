/**
 * AuditJournal Tests
 *
 * Append-only journal, revert planning from journaled deductions and the
 * revert guard.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { AuditJournal } from '../../../../../src/packages/adapters/inventory/AuditJournal.js';
import { InventoryStore } from '../../../../../src/packages/adapters/inventory/InventoryStore.js';
import { SaleLedger } from '../../../../../src/packages/adapters/inventory/SaleLedger.js';
import type { SaleLineItem } from '../../../../../src/packages/core/ports/ISaleLedger.js';
import { counterFor, type StockedItemKind } from '../../../../../src/packages/core/protocol/item-kinds.js';
import { NotFoundError, RevertFailureError } from '../../../../../src/utils/errors.js';
import { createTestDb } from '../../../../helpers/inventory-db.js';

const KEY = { employeeId: 'alice', reportDate: '2026-10-18' };

describe('AuditJournal', () => {
  let db: Database.Database;
  let store: InventoryStore;
  let ledger: SaleLedger;
  let journal: AuditJournal;

  function stock(counter: 'sim' | 'credit50', quantity: number): void {
    store.adjust('alice', counter, quantity);
    journal.append({ employeeId: 'alice', counter, delta: quantity, reason: 'admin-transfer', source: 'admin:boss' });
  }

  function sell(itemKind: StockedItemKind, quantity: number): SaleLineItem {
    const item = ledger.insert({
      ...KEY,
      itemKind,
      unitIdentifier: null,
      quantity,
      contactNumber: null,
      amount: 0,
      notes: null,
    });
    const counter = counterFor(itemKind);
    store.adjust('alice', counter, -quantity);
    journal.append({ employeeId: 'alice', counter, delta: -quantity, reason: 'sale', source: 'upload', sourceRef: item.id });
    return item;
  }

  beforeEach(() => {
    db = createTestDb();
    store = new InventoryStore(db);
    ledger = new SaleLedger(db);
    journal = new AuditJournal(db, store, ledger);
    store.ensure('alice');
    stock('sim', 10);
    stock('credit50', 5);
  });

  afterEach(() => {
    db.close();
  });

  describe('append and history', () => {
    it('returns the stored entry', () => {
      const entry = journal.append({
        employeeId: 'alice',
        counter: 'swap',
        delta: 2,
        reason: 'admin-transfer',
        source: 'admin:boss',
      });

      expect(entry).toMatchObject({
        employeeId: 'alice',
        counter: 'swap',
        delta: 2,
        reason: 'admin-transfer',
        source: 'admin:boss',
        sourceRef: null,
        revertRefs: null,
      });
    });

    it('lists newest first with limit and reason filters', () => {
      const sold = sell('SIM', 1);

      const all = journal.history('alice');
      expect(all.map((e) => e.reason)).toEqual(['sale', 'admin-transfer', 'admin-transfer']);
      expect(all[0].sourceRef).toBe(sold.id);

      expect(journal.history('alice', { limit: 1 })).toHaveLength(1);
      expect(journal.history('alice', { reason: 'admin-transfer' }).map((e) => e.counter))
        .toEqual(['credit50', 'sim']);
    });

    it('sums deltas per employee and counter', () => {
      sell('SIM', 1);
      sell('CREDIT50', 3);

      expect(journal.sumDeltas('alice')).toEqual([
        { employeeId: 'alice', counter: 'credit50', total: 2 },
        { employeeId: 'alice', counter: 'sim', total: 9 },
      ]);
    });

    it('sums back-office entries apart from employee entries', () => {
      journal.append({ employeeId: null, counter: 'swap', delta: 8, reason: 'admin-transfer', source: 'backoffice:boss' });
      journal.append({ employeeId: null, counter: 'swap', delta: -3, reason: 'admin-transfer', source: 'backoffice:boss' });

      expect(journal.sumBackofficeDeltas()).toEqual({ swap: 5 });
      expect(journal.sumDeltas().map((row) => row.employeeId)).toEqual(['alice', 'alice']);
    });
  });

  describe('immutability', () => {
    it('refuses updates', () => {
      expect(() => db.prepare(`UPDATE inventory_journal SET delta = 0`).run())
        .toThrow('inventory journal is immutable');
    });

    it('refuses deletes', () => {
      expect(() => db.prepare(`DELETE FROM inventory_journal`).run())
        .toThrow('inventory journal is immutable');
    });
  });

  describe('computeRevert', () => {
    it('plans the restoration of every live sale of the key', () => {
      const a = sell('SIM', 1);
      const b = sell('SIM', 1);
      const c = sell('CREDIT50', 3);

      expect(journal.computeRevert(KEY)).toEqual({
        key: KEY,
        saleIds: [a.id, b.id, c.id],
        deltas: { sim: 2, credit50: 3 },
      });
    });

    it('returns an empty plan when nothing is live', () => {
      expect(journal.computeRevert(KEY)).toEqual({ key: KEY, saleIds: [], deltas: {} });
    });

    it('fails when a sale has no journaled deduction', () => {
      ledger.insert({
        ...KEY,
        itemKind: 'SIM',
        unitIdentifier: null,
        quantity: 1,
        contactNumber: null,
        amount: 0,
        notes: null,
      });

      expect(() => journal.computeRevert(KEY)).toThrow(RevertFailureError);
    });

    it('fails when the journaled deduction differs from the sale quantity', () => {
      const item = ledger.insert({
        ...KEY,
        itemKind: 'SIM',
        unitIdentifier: null,
        quantity: 2,
        contactNumber: null,
        amount: 0,
        notes: null,
      });
      journal.append({ employeeId: 'alice', counter: 'sim', delta: -1, reason: 'sale', source: 'upload', sourceRef: item.id });

      expect(() => journal.computeRevert(KEY)).toThrow(`Journal does not match sale ${item.id}`);
    });

    it('fails when the deduction was journaled on another counter', () => {
      const item = ledger.insert({
        ...KEY,
        itemKind: 'SIM',
        unitIdentifier: null,
        quantity: 1,
        contactNumber: null,
        amount: 0,
        notes: null,
      });
      journal.append({ employeeId: 'alice', counter: 'credit50', delta: -1, reason: 'sale', source: 'upload', sourceRef: item.id });

      expect(() => journal.computeRevert(KEY)).toThrow(RevertFailureError);
    });

    it('accepts a zero-quantity sale without a journal entry', () => {
      const item = ledger.insert({
        ...KEY,
        itemKind: 'CREDIT100',
        unitIdentifier: null,
        quantity: 0,
        contactNumber: null,
        amount: 0,
        notes: null,
      });

      expect(journal.computeRevert(KEY)).toEqual({ key: KEY, saleIds: [item.id], deltas: {} });
    });
  });

  describe('computeSaleRevert', () => {
    it('plans a single sale', () => {
      sell('SIM', 1);
      const credit = sell('CREDIT50', 2);

      expect(journal.computeSaleRevert(credit.id)).toEqual({
        key: KEY,
        saleIds: [credit.id],
        deltas: { credit50: 2 },
      });
    });

    it('throws NotFoundError for an unknown sale', () => {
      expect(() => journal.computeSaleRevert(4242)).toThrow(NotFoundError);
    });
  });

  describe('applyRevert', () => {
    it('restores balances, journals the revert and deletes the sales', () => {
      const a = sell('SIM', 1);
      const b = sell('CREDIT50', 3);
      const plan = journal.computeRevert(KEY);

      expect(journal.applyRevert(KEY, plan, 'reupload')).toBe(2);

      expect(store.get('alice')).toMatchObject({ sim: 10, credit50: 5 });
      expect(ledger.listByKey(KEY)).toEqual([]);

      const reverts = journal.history('alice', { reason: 'revert' });
      expect(reverts.map((e) => [e.counter, e.delta, e.source])).toEqual([
        ['credit50', 3, 'reupload'],
        ['sim', 1, 'reupload'],
      ]);
      expect(reverts[0].revertRefs).toEqual([a.id, b.id]);
    });

    it('fails when a planned sale is already gone', () => {
      const a = sell('SIM', 1);
      const plan = journal.computeRevert(KEY);
      ledger.deleteByIds([a.id]);

      expect(() => journal.applyRevert(KEY, plan, 'reupload')).toThrow(RevertFailureError);
    });
  });
});
