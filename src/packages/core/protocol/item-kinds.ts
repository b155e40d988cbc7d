/**
 * Item kinds and inventory counters.
 *
 * An item kind is what a sale row says it sold; a counter is the
 * inventory column that kind draws from. OTHER (recharges and the like)
 * has no counter and is never written to the ledger.
 */

export const ITEM_KINDS = ['SIM', 'SWAP', 'CREDIT50', 'CREDIT100', 'OTHER'] as const;
export type ItemKind = (typeof ITEM_KINDS)[number];

/** Kinds that map onto a counter */
export type StockedItemKind = Exclude<ItemKind, 'OTHER'>;

/** Kinds where a row is one physical unit, usually named by a subscriber number */
export type UnitCountedKind = 'SIM' | 'SWAP';

/** Kinds where a row carries an explicit count */
export type CreditKind = 'CREDIT50' | 'CREDIT100';

export const COUNTERS = ['sim', 'swap', 'credit50', 'credit100'] as const;
export type Counter = (typeof COUNTERS)[number];

/** inventory_balances column behind each counter */
export const COUNTER_COLUMNS = {
  sim: 'sim',
  swap: 'swap',
  credit50: 'credit_50',
  credit100: 'credit_100',
} as const satisfies Record<Counter, string>;

const KIND_TO_COUNTER: Record<StockedItemKind, Counter> = {
  SIM: 'sim',
  SWAP: 'swap',
  CREDIT50: 'credit50',
  CREDIT100: 'credit100',
};

/** Spellings the sheet parser emits, lower-cased */
const ITEM_KIND_ALIASES: Record<string, StockedItemKind> = {
  sim: 'SIM',
  simcard: 'SIM',
  sim_card: 'SIM',
  swap: 'SWAP',
  credit50: 'CREDIT50',
  credit_50: 'CREDIT50',
  'credit-50': 'CREDIT50',
  credit100: 'CREDIT100',
  credit_100: 'CREDIT100',
  'credit-100': 'CREDIT100',
};

/**
 * Resolve a raw item kind to a stocked kind.
 * Returns null for OTHER and anything unrecognised.
 */
export function resolveItemKind(raw: string): StockedItemKind | null {
  const normalized = raw.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(ITEM_KIND_ALIASES, normalized)
    ? ITEM_KIND_ALIASES[normalized]
    : null;
}

export function counterFor(kind: StockedItemKind): Counter {
  return KIND_TO_COUNTER[kind];
}

export function isUnitCountedKind(kind: StockedItemKind): kind is UnitCountedKind {
  return kind === 'SIM' || kind === 'SWAP';
}

/**
 * Resolve a counter from user input (counter name or any item kind alias)
 */
export function parseCounter(raw: string): Counter | null {
  const kind = resolveItemKind(raw);
  return kind ? counterFor(kind) : null;
}
