/**
 * Inventory service singletons, built on first use from the shared
 * connection and the validated config.
 */

import { config } from '../config.js';
import { getDatabase } from '../db/connection.js';
import {
  createInventoryServices,
  type InventoryServices,
} from '../packages/adapters/inventory/index.js';

let services: InventoryServices | null = null;

export function getInventoryServices(): InventoryServices {
  if (!services) {
    services = createInventoryServices(getDatabase(), {
      engine: {
        lockTimeoutMs: config.lock.timeoutMs,
        identifierPattern: config.sales.unitIdentifierPattern,
      },
      locks: {
        timeoutMs: config.lock.timeoutMs,
        ttlMs: config.lock.ttlMs,
        pollIntervalMs: config.lock.pollIntervalMs,
      },
    });
  }
  return services;
}

/** Drop the singletons, e.g. after closeDatabase() */
export function resetInventoryServices(): void {
  services = null;
}
