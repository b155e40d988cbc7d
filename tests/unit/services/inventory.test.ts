/**
 * Inventory service locator tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { closeDatabase, initDatabase } from '../../../src/db/connection.js';
import { getInventoryServices, resetInventoryServices } from '../../../src/services/inventory.js';

describe('getInventoryServices', () => {
  afterEach(() => {
    resetInventoryServices();
    closeDatabase();
  });

  it('requires an initialized database', () => {
    expect(() => getInventoryServices()).toThrow('Database not initialized');
  });

  it('builds the services once per connection', async () => {
    initDatabase();

    const services = getInventoryServices();
    expect(getInventoryServices()).toBe(services);

    await services.engine.ensureEmployee('alice');
    const report = await services.auditor.check();
    expect(report).toMatchObject({ passed: true, employeesChecked: 1 });
  });

  it('starts over after a reset', () => {
    initDatabase();
    const first = getInventoryServices();

    resetInventoryServices();

    expect(getInventoryServices()).not.toBe(first);
  });
});
