/**
 * IBackofficeStock - Back-Office Stock Pool Port
 *
 * Central stock not yet handed to any employee. Same guarantees as the
 * Inventory Store: synchronous, joins the caller's transaction, never
 * goes negative.
 *
 * @module packages/core/ports/IBackofficeStock
 */

import type { Counter } from '../protocol/item-kinds.js';

export interface BackofficeStockLevel {
  counter: Counter;
  quantity: number;
  updatedAt: string;
}

export interface IBackofficeStock {
  get(counter: Counter): number;

  /** One level per counter, in counter order */
  list(): BackofficeStockLevel[];

  /**
   * Add `delta` to the pool and return the new quantity.
   * Throws InsufficientStockError instead of writing a negative value.
   */
  adjust(counter: Counter, delta: number): number;
}
