/**
 * Sale entry schema and deduction rules.
 *
 * The sheet parser hands the engine one SaleEntry per row. Whether the
 * number column held a subscriber number or a quantity is settled by the
 * parser and arrives as a tagged `unit`; the engine never guesses.
 *
 * Shape errors (wrong types, non-integer counts) reject the whole batch.
 * Value errors (unknown kind, zero or negative deduction) only skip the row.
 */

import { z } from 'zod';
import {
  isUnitCountedKind,
  type CreditKind,
  type StockedItemKind,
} from './item-kinds.js';

export const saleUnitSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('identifier'), value: z.string() }),
  z.object({ type: z.literal('quantity'), value: z.number().int() }),
]);

export const saleEntrySchema = z.object({
  itemKind: z.string(),
  unit: saleUnitSchema.optional(),
  credit50Count: z.number().int().optional(),
  credit100Count: z.number().int().optional(),
  amount: z.number().finite(),
  notes: z.string().optional(),
  contactNumber: z.string().optional(),
});

export const saleBatchSchema = z.array(saleEntrySchema);

export type SaleUnit = z.infer<typeof saleUnitSchema>;
export type SaleEntry = z.infer<typeof saleEntrySchema>;

export interface ResolvedDeduction {
  /** Units the row takes from its counter; <= 0 means the row is invalid */
  quantity: number;
  /** Identifier stored on the line item, well formed or not */
  unitIdentifier: string | null;
  /** Identifier that takes part in duplicate detection */
  trackedIdentifier: string | null;
}

/**
 * Work out how many units a row deducts from its own counter.
 *
 * - SIM/SWAP: 1 per identifier; a malformed identifier still deducts 1 but
 *   is not tracked; Quantity(n) deducts n; no unit deducts 1.
 * - Credits: the denomination's sub-count, else Quantity(n), else 0.
 */
export function resolveDeduction(
  entry: SaleEntry,
  kind: StockedItemKind,
  identifierPattern: RegExp
): ResolvedDeduction {
  const unit = entry.unit;

  if (isUnitCountedKind(kind)) {
    if (unit?.type === 'quantity') {
      return { quantity: unit.value, unitIdentifier: null, trackedIdentifier: null };
    }
    if (unit?.type === 'identifier') {
      const value = unit.value.trim();
      return {
        quantity: 1,
        unitIdentifier: value === '' ? null : value,
        trackedIdentifier: identifierPattern.test(value) ? value : null,
      };
    }
    return { quantity: 1, unitIdentifier: null, trackedIdentifier: null };
  }

  const subCount = kind === 'CREDIT50' ? entry.credit50Count : entry.credit100Count;
  if (subCount !== undefined) {
    return { quantity: subCount, unitIdentifier: null, trackedIdentifier: null };
  }
  if (unit?.type === 'quantity') {
    return { quantity: unit.value, unitIdentifier: null, trackedIdentifier: null };
  }
  return { quantity: 0, unitIdentifier: null, trackedIdentifier: null };
}

/**
 * Credit sub-counts a row carries for denominations other than its own.
 * Each becomes an auxiliary CREDIT line item after the row is inserted.
 */
export function auxiliaryCredits(
  entry: SaleEntry,
  kind: StockedItemKind
): Array<{ kind: CreditKind; quantity: number }> {
  const extras: Array<{ kind: CreditKind; quantity: number }> = [];
  if (kind !== 'CREDIT50' && entry.credit50Count !== undefined && entry.credit50Count > 0) {
    extras.push({ kind: 'CREDIT50', quantity: entry.credit50Count });
  }
  if (kind !== 'CREDIT100' && entry.credit100Count !== undefined && entry.credit100Count > 0) {
    extras.push({ kind: 'CREDIT100', quantity: entry.credit100Count });
  }
  return extras;
}

/** Build the identifier pattern without flags so `test` keeps no state */
export function compileIdentifierPattern(source: string): RegExp {
  return new RegExp(source);
}
