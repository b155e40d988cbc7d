/**
 * SaleLedger - SQLite implementation of ISaleLedger
 *
 * @module packages/adapters/inventory/SaleLedger
 */

import type Database from 'better-sqlite3';
import type {
  ISaleLedger,
  NewSaleLineItem,
  SaleLineItem,
  UnitSaleLocation,
} from '../../core/ports/ISaleLedger.js';
import type { StockedItemKind, UnitCountedKind } from '../../core/protocol/item-kinds.js';
import type { ReconciliationKey } from '../../core/protocol/reconciliation-key.js';
import { sqliteTimestamp } from '../../core/protocol/timestamps.js';

export class SaleLedger implements ISaleLedger {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  insert(item: NewSaleLineItem): SaleLineItem {
    const row = this.db.prepare(
      `INSERT INTO sale_line_items
       (employee_id, report_date, item_kind, unit_identifier, quantity,
        contact_number, amount, notes, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       RETURNING *`
    ).get(
      item.employeeId, item.reportDate, item.itemKind, item.unitIdentifier,
      item.quantity, item.contactNumber, item.amount, item.notes, sqliteTimestamp()
    ) as SaleLineItemRow;
    return rowToSale(row);
  }

  getById(saleId: number): SaleLineItem | null {
    const row = this.db.prepare(
      `SELECT * FROM sale_line_items WHERE id = ?`
    ).get(saleId) as SaleLineItemRow | undefined;
    return row ? rowToSale(row) : null;
  }

  listByKey(key: ReconciliationKey): SaleLineItem[] {
    const rows = this.db.prepare(
      `SELECT * FROM sale_line_items
       WHERE employee_id = ? AND report_date = ?
       ORDER BY id`
    ).all(key.employeeId, key.reportDate) as SaleLineItemRow[];
    return rows.map(rowToSale);
  }

  listByDate(reportDate: string): SaleLineItem[] {
    const rows = this.db.prepare(
      `SELECT * FROM sale_line_items
       WHERE report_date = ?
       ORDER BY employee_id, id`
    ).all(reportDate) as SaleLineItemRow[];
    return rows.map(rowToSale);
  }

  findUnit(
    kind: UnitCountedKind,
    identifier: string,
    excludeKey: ReconciliationKey
  ): UnitSaleLocation | null {
    const row = this.db.prepare(
      `SELECT id, employee_id, report_date FROM sale_line_items
       WHERE item_kind = ? AND unit_identifier = ?
         AND NOT (employee_id = ? AND report_date = ?)
       ORDER BY id
       LIMIT 1`
    ).get(kind, identifier, excludeKey.employeeId, excludeKey.reportDate) as
      | { id: number; employee_id: string; report_date: string }
      | undefined;

    return row
      ? { saleId: row.id, employeeId: row.employee_id, reportDate: row.report_date }
      : null;
  }

  deleteByIds(saleIds: readonly number[]): number {
    const stmt = this.db.prepare(`DELETE FROM sale_line_items WHERE id = ?`);
    let deleted = 0;
    for (const saleId of saleIds) {
      deleted += stmt.run(saleId).changes;
    }
    return deleted;
  }
}

// =============================================================================
// Row Types
// =============================================================================

interface SaleLineItemRow {
  id: number;
  employee_id: string;
  report_date: string;
  item_kind: string;
  unit_identifier: string | null;
  quantity: number;
  contact_number: string | null;
  amount: number;
  notes: string | null;
  created_at: string;
}

function rowToSale(row: SaleLineItemRow): SaleLineItem {
  return {
    id: row.id,
    employeeId: row.employee_id,
    reportDate: row.report_date,
    // CHECK constraint on item_kind admits only stocked kinds
    itemKind: row.item_kind as StockedItemKind,
    unitIdentifier: row.unit_identifier,
    quantity: row.quantity,
    contactNumber: row.contact_number,
    amount: row.amount,
    notes: row.notes,
    createdAt: row.created_at,
  };
}
