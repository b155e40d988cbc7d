/**
 * Message formatting for Telegram replies (Markdown parse mode)
 */

import type { BackofficeStockLevel } from '../packages/core/ports/IBackofficeStock.js';
import type { ConservationReport } from '../packages/core/ports/IConservationAuditor.js';
import type { InventoryBalance, InventoryTotals } from '../packages/core/ports/IInventoryStore.js';
import type { JournalEntry } from '../packages/core/ports/IAuditJournal.js';
import type { SaleLineItem } from '../packages/core/ports/ISaleLedger.js';
import type { BatchResult, SkippedRow } from '../packages/core/ports/ISalesReconciliationService.js';
import { COUNTERS, type Counter } from '../packages/core/protocol/item-kinds.js';

/** Lines per /all_sales message; Telegram caps a message at 4096 chars */
export const ALL_SALES_PAGE_SIZE = 30;

const COUNTER_LABELS: Record<Counter, string> = {
  sim: 'SIM',
  swap: 'SWAP',
  credit50: 'Credit 50',
  credit100: 'Credit 100',
};

/**
 * Escape Telegram legacy-Markdown control characters
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function counterLabel(counter: Counter): string {
  return COUNTER_LABELS[counter];
}

function counterLines(values: Record<Counter, number>): string {
  return COUNTERS.map((counter) => `${COUNTER_LABELS[counter]}: *${values[counter]}*`).join('\n');
}

export function formatBalance(balance: InventoryBalance): string {
  return (
    `📦 *Stock of ${escapeMarkdown(balance.employeeId)}*\n\n` +
    `${counterLines(balance)}\n\n` +
    `_Updated ${balance.updatedAt} UTC_`
  );
}

export function formatTotals(totals: InventoryTotals): string {
  return (
    `📊 *Inventory Summary*\n\n` +
    `Employees: *${totals.employees}*\n` +
    counterLines(totals)
  );
}

export function formatBackofficeStock(levels: BackofficeStockLevel[]): string {
  const values: Record<Counter, number> = { sim: 0, swap: 0, credit50: 0, credit100: 0 };
  for (const level of levels) {
    values[level.counter] = level.quantity;
  }
  return `🏢 *Back-Office Stock*\n\n${counterLines(values)}`;
}

/**
 * Every sale of a date, split into messages of ALL_SALES_PAGE_SIZE lines
 */
export function formatAllSales(reportDate: string, sales: SaleLineItem[]): string[] {
  if (sales.length === 0) {
    return [`No sales recorded on ${reportDate}.`];
  }

  const lines = sales.map((sale) => {
    const unit = sale.unitIdentifier ? ` \`${sale.unitIdentifier}\`` : '';
    return `#${sale.id} ${escapeMarkdown(sale.employeeId)} ${sale.itemKind} x${sale.quantity}${unit} ${sale.amount}`;
  });

  const pages: string[] = [];
  const pageCount = Math.ceil(lines.length / ALL_SALES_PAGE_SIZE);
  for (let page = 0; page < pageCount; page++) {
    const chunk = lines.slice(page * ALL_SALES_PAGE_SIZE, (page + 1) * ALL_SALES_PAGE_SIZE);
    pages.push(
      `🧾 *All sales on ${reportDate}* (${page + 1}/${pageCount})\n\n${chunk.join('\n')}`
    );
  }
  return pages;
}

export function formatSales(employeeId: string, reportDate: string, sales: SaleLineItem[]): string {
  if (sales.length === 0) {
    return `No sales recorded for ${escapeMarkdown(employeeId)} on ${reportDate}.`;
  }

  const lines = sales.map((sale) => {
    const unit = sale.unitIdentifier ? ` \`${sale.unitIdentifier}\`` : '';
    const notes = sale.notes ? ` (${escapeMarkdown(sale.notes)})` : '';
    return `#${sale.id} ${sale.itemKind} x${sale.quantity}${unit} ${sale.amount}${notes}`;
  });
  const total = sales.reduce((sum, sale) => sum + sale.amount, 0);

  return (
    `🧾 *Sales of ${escapeMarkdown(employeeId)} on ${reportDate}*\n\n` +
    `${lines.join('\n')}\n\n` +
    `Total amount: *${total}*`
  );
}

export function formatJournal(entries: JournalEntry[]): string {
  if (entries.length === 0) {
    return '_No stock movements yet_';
  }
  return entries
    .map((entry) => {
      const sign = entry.delta > 0 ? '+' : '';
      return `${entry.createdAt} ${COUNTER_LABELS[entry.counter]} ${sign}${entry.delta} ${entry.reason} (${escapeMarkdown(entry.source)})`;
    })
    .join('\n');
}

function describeSkip(row: SkippedRow): string {
  const position = `Row ${row.index + 1}`;
  switch (row.reason) {
    case 'duplicate-in-batch':
      return `${position}: \`${row.identifier}\` repeats row ${row.firstIndex + 1}`;
    case 'duplicate-global':
      return (
        `${position}: \`${row.identifier}\` already sold by ` +
        `${escapeMarkdown(row.conflict.employeeId)} on ${row.conflict.reportDate}`
      );
    case 'insufficient-stock':
      return (
        `${position}: not enough ${COUNTER_LABELS[row.counter]} ` +
        `(available ${row.available}, requested ${row.requested})`
      );
    case 'invalid-item-kind':
      return `${position}: unknown item "${escapeMarkdown(row.itemKind)}"`;
    case 'invalid-quantity':
      return `${position}: invalid quantity ${row.requested}`;
  }
}

export function formatBatchResult(reportDate: string, result: BatchResult): string {
  const lines = [`✅ *Sales for ${reportDate} applied*`, '', `Inserted: *${result.inserted}*`];

  if (result.reverted.saleIds.length > 0) {
    lines.push(`Replaced previous upload: ${result.reverted.saleIds.length} sale(s) reverted`);
  }
  if (result.skippedDuplicates > 0) lines.push(`Duplicates skipped: ${result.skippedDuplicates}`);
  if (result.skippedInsufficient > 0) lines.push(`Insufficient stock: ${result.skippedInsufficient}`);
  if (result.skippedInvalid > 0) lines.push(`Invalid rows: ${result.skippedInvalid}`);

  if (result.inserted === 0 && result.skippedInsufficient > 0) {
    lines.push('', 'No stock available for these items.');
  }
  if (result.skipped.length > 0) {
    lines.push('', ...result.skipped.map(describeSkip));
  }

  return lines.join('\n');
}

export function formatConservationReport(report: ConservationReport): string {
  if (report.passed) {
    return (
      `✅ *Audit passed*\n\n` +
      `${report.employeesChecked} employee(s) checked at ${report.checkedAt} UTC.\n` +
      `Every balance matches its journal.`
    );
  }

  const lines = report.divergences.map(
    (d) =>
      `${d.employeeId === null ? 'Back office' : escapeMarkdown(d.employeeId)} ${COUNTER_LABELS[d.counter]}: ` +
      `balance ${d.balance}, journal ${d.journalTotal}`
  );
  return (
    `🚨 *Audit found ${report.divergences.length} divergence(s)*\n\n` +
    lines.join('\n')
  );
}
