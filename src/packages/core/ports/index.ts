export type * from './IAuditJournal.js';
export type * from './IBackofficeStock.js';
export type * from './IConservationAuditor.js';
export type * from './IInventoryStore.js';
export type * from './IKeyLockManager.js';
export type * from './ISaleLedger.js';
export type * from './ISalesReconciliationService.js';
