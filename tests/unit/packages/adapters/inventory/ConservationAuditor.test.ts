/**
 * ConservationAuditor Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { InventoryServices } from '../../../../../src/packages/adapters/inventory/index.js';
import { createTestDb, createTestServices, seedEmployee } from '../../../../helpers/inventory-db.js';

describe('ConservationAuditor', () => {
  let db: Database.Database;
  let services: InventoryServices;

  beforeEach(async () => {
    db = createTestDb();
    services = createTestServices(db);
    await seedEmployee(services, 'alice', { sim: 10, credit50: 3 });
    await seedEmployee(services, 'bob', { swap: 4 });
  });

  afterEach(() => {
    db.close();
  });

  it('passes when every balance matches its journal', async () => {
    await services.engine.applyBatch('alice', '2026-10-19', [
      { itemKind: 'SIM', unit: { type: 'identifier', value: '111111111' }, amount: 10 },
    ]);
    await services.engine.transferStock('alice', 'bob', 'credit50', 2, 'boss');

    const report = await services.auditor.check();

    expect(report.passed).toBe(true);
    expect(report.employeesChecked).toBe(2);
    expect(report.divergences).toEqual([]);
  });

  it('reports a balance changed outside the journal', async () => {
    db.prepare(`UPDATE inventory_balances SET sim = sim + 1 WHERE employee_id = ?`).run('alice');

    const report = await services.auditor.check();

    expect(report.passed).toBe(false);
    expect(report.divergences).toEqual([
      { employeeId: 'alice', counter: 'sim', balance: 11, journalTotal: 10 },
    ]);
  });

  it('compares counters without journal entries against zero', async () => {
    db.prepare(`UPDATE inventory_balances SET credit_100 = 2 WHERE employee_id = ?`).run('bob');

    const report = await services.auditor.check('bob');

    expect(report.employeesChecked).toBe(1);
    expect(report.divergences).toEqual([
      { employeeId: 'bob', counter: 'credit100', balance: 2, journalTotal: 0 },
    ]);
  });

  it('limits the check to one employee', async () => {
    db.prepare(`UPDATE inventory_balances SET sim = 0 WHERE employee_id = ?`).run('alice');

    const report = await services.auditor.check('bob');

    expect(report.passed).toBe(true);
    expect(report.employeesChecked).toBe(1);
  });

  it('checks the back-office pool against its journal', async () => {
    await services.engine.addBackofficeStock('swap', 6, 'boss');
    await services.engine.transferFromBackoffice('bob', 'swap', 2, 'boss');
    expect((await services.auditor.check()).passed).toBe(true);

    db.prepare(`UPDATE backoffice_stock SET quantity = 3 WHERE counter = 'swap'`).run();

    const report = await services.auditor.check();
    expect(report.divergences).toEqual([
      { employeeId: null, counter: 'swap', balance: 3, journalTotal: 4 },
    ]);
  });

  it('leaves the pool out of a single-employee check', async () => {
    db.prepare(`UPDATE backoffice_stock SET quantity = 3 WHERE counter = 'sim'`).run();

    const report = await services.auditor.check('bob');
    expect(report.passed).toBe(true);
  });

  it('checks nobody for an unknown employee', async () => {
    const report = await services.auditor.check('nobody');
    expect(report).toMatchObject({ passed: true, employeesChecked: 0 });
  });
});
