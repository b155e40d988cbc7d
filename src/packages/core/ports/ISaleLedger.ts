/**
 * ISaleLedger - Sale Ledger Port
 *
 * Live sale line items. Rows are inserted by an apply and deleted by the
 * next revert of the same key; they are never updated.
 *
 * @module packages/core/ports/ISaleLedger
 */

import type { StockedItemKind, UnitCountedKind } from '../protocol/item-kinds.js';
import type { ReconciliationKey } from '../protocol/reconciliation-key.js';

export interface SaleLineItem {
  id: number;
  employeeId: string;
  reportDate: string;
  itemKind: StockedItemKind;
  unitIdentifier: string | null;
  /** Units this row deducted */
  quantity: number;
  contactNumber: string | null;
  amount: number;
  notes: string | null;
  createdAt: string;
}

export type NewSaleLineItem = Omit<SaleLineItem, 'id' | 'createdAt'>;

/** Where a unit identifier is already recorded */
export interface UnitSaleLocation {
  saleId: number;
  employeeId: string;
  reportDate: string;
}

export interface ISaleLedger {
  insert(item: NewSaleLineItem): SaleLineItem;

  getById(saleId: number): SaleLineItem | null;

  /** Live rows of a key, in insertion order */
  listByKey(key: ReconciliationKey): SaleLineItem[];

  /** Live rows of every employee for one date */
  listByDate(reportDate: string): SaleLineItem[];

  /**
   * Find a live row with the same kind and identifier outside `excludeKey`.
   */
  findUnit(
    kind: UnitCountedKind,
    identifier: string,
    excludeKey: ReconciliationKey
  ): UnitSaleLocation | null;

  /** Delete the given rows; returns the number deleted */
  deleteByIds(saleIds: readonly number[]): number;
}
