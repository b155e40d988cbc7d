/**
 * DuplicateDetector Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { DuplicateDetector } from '../../../../../src/packages/adapters/inventory/DuplicateDetector.js';
import { InventoryStore } from '../../../../../src/packages/adapters/inventory/InventoryStore.js';
import { SaleLedger } from '../../../../../src/packages/adapters/inventory/SaleLedger.js';
import type { UnitCountedKind } from '../../../../../src/packages/core/protocol/item-kinds.js';
import { createTestDb } from '../../../../helpers/inventory-db.js';

const BOB_TODAY = { employeeId: 'bob', reportDate: '2026-10-19' };

describe('DuplicateDetector', () => {
  let db: Database.Database;
  let ledger: SaleLedger;
  let detector: DuplicateDetector;

  function recordUnit(employeeId: string, reportDate: string, itemKind: UnitCountedKind, identifier: string): number {
    return ledger.insert({
      employeeId,
      reportDate,
      itemKind,
      unitIdentifier: identifier,
      quantity: 1,
      contactNumber: null,
      amount: 0,
      notes: null,
    }).id;
  }

  beforeEach(() => {
    db = createTestDb();
    const store = new InventoryStore(db);
    store.ensure('alice');
    store.ensure('bob');
    ledger = new SaleLedger(db);
    detector = new DuplicateDetector(ledger);
  });

  afterEach(() => {
    db.close();
  });

  it('accepts unique identifiers', () => {
    const findings = detector.detect(BOB_TODAY, [
      { index: 0, kind: 'SIM', identifier: '111111111' },
      { index: 1, kind: 'SIM', identifier: '222222222' },
    ]);
    expect(findings.size).toBe(0);
  });

  it('flags later occurrences within the batch', () => {
    const findings = detector.detect(BOB_TODAY, [
      { index: 0, kind: 'SIM', identifier: '111111111' },
      { index: 2, kind: 'SIM', identifier: '111111111' },
      { index: 5, kind: 'SIM', identifier: '111111111' },
    ]);

    expect(findings.get(0)).toBeUndefined();
    expect(findings.get(2)).toEqual({
      index: 2,
      identifier: '111111111',
      reason: 'duplicate-in-batch',
      firstIndex: 0,
    });
    expect(findings.get(5)).toMatchObject({ reason: 'duplicate-in-batch', firstIndex: 0 });
  });

  it('treats the same number under another kind as a different unit', () => {
    const findings = detector.detect(BOB_TODAY, [
      { index: 0, kind: 'SIM', identifier: '111111111' },
      { index: 1, kind: 'SWAP', identifier: '111111111' },
    ]);
    expect(findings.size).toBe(0);
  });

  it('flags units already sold under another key', () => {
    const saleId = recordUnit('alice', '2026-10-18', 'SIM', '111111111');

    const findings = detector.detect(BOB_TODAY, [{ index: 0, kind: 'SIM', identifier: '111111111' }]);

    expect(findings.get(0)).toEqual({
      index: 0,
      identifier: '111111111',
      reason: 'duplicate-global',
      conflict: { saleId, employeeId: 'alice', reportDate: '2026-10-18' },
    });
  });

  it('ignores live sales of the key being replaced', () => {
    recordUnit('bob', '2026-10-19', 'SIM', '111111111');

    const findings = detector.detect(BOB_TODAY, [{ index: 0, kind: 'SIM', identifier: '111111111' }]);
    expect(findings.size).toBe(0);
  });

  it('reports repeats of a global duplicate as in-batch', () => {
    recordUnit('alice', '2026-10-18', 'SWAP', '333333333');

    const findings = detector.detect(BOB_TODAY, [
      { index: 0, kind: 'SWAP', identifier: '333333333' },
      { index: 1, kind: 'SWAP', identifier: '333333333' },
    ]);

    expect(findings.get(0)?.reason).toBe('duplicate-global');
    expect(findings.get(1)).toMatchObject({ reason: 'duplicate-in-batch', firstIndex: 0 });
  });
});
