export * from './item-kinds.js';
export * from './reconciliation-key.js';
export * from './sale-entry.js';
export * from './timestamps.js';
