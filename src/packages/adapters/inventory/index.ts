import type Database from 'better-sqlite3';
import { AuditJournal } from './AuditJournal.js';
import { BackofficeStock } from './BackofficeStock.js';
import { ConservationAuditor } from './ConservationAuditor.js';
import { InventoryStore } from './InventoryStore.js';
import { SaleLedger } from './SaleLedger.js';
import {
  SalesReconciliationEngine,
  type SalesReconciliationOptions,
} from './SalesReconciliationEngine.js';
import { SqliteKeyLockManager, type KeyLockManagerOptions } from './SqliteKeyLockManager.js';

export { AuditJournal } from './AuditJournal.js';
export { BACKOFFICE_HOLDER, BackofficeStock } from './BackofficeStock.js';
export { ConservationAuditor } from './ConservationAuditor.js';
export { DuplicateDetector } from './DuplicateDetector.js';
export type { DuplicateCandidate, DuplicateFinding } from './DuplicateDetector.js';
export { InventoryStore } from './InventoryStore.js';
export { SaleLedger } from './SaleLedger.js';
export { SalesReconciliationEngine } from './SalesReconciliationEngine.js';
export type {
  SalesReconciliationComponents,
  SalesReconciliationOptions,
} from './SalesReconciliationEngine.js';
export { SqliteKeyLockManager } from './SqliteKeyLockManager.js';
export type { KeyLockManagerOptions } from './SqliteKeyLockManager.js';

export interface InventoryServices {
  engine: SalesReconciliationEngine;
  auditor: ConservationAuditor;
  store: InventoryStore;
  backoffice: BackofficeStock;
  ledger: SaleLedger;
  journal: AuditJournal;
  locks: SqliteKeyLockManager;
}

/**
 * Wire every inventory component onto one connection
 */
export function createInventoryServices(
  db: Database.Database,
  options: { engine?: SalesReconciliationOptions; locks?: KeyLockManagerOptions } = {},
): InventoryServices {
  const store = new InventoryStore(db);
  const backoffice = new BackofficeStock(db);
  const ledger = new SaleLedger(db);
  const journal = new AuditJournal(db, store, ledger);
  const locks = new SqliteKeyLockManager(db, options.locks);
  const engine = new SalesReconciliationEngine(db, { store, ledger, journal, locks, backoffice }, options.engine);
  const auditor = new ConservationAuditor(store, journal, backoffice);

  return { engine, auditor, store, backoffice, ledger, journal, locks };
}
