/**
 * Telegram message formatting tests
 */

import { describe, it, expect } from 'vitest';
import {
  ALL_SALES_PAGE_SIZE,
  escapeMarkdown,
  formatAllSales,
  formatBackofficeStock,
  formatBalance,
  formatBatchResult,
  formatConservationReport,
  formatJournal,
  formatSales,
  formatTotals,
} from '../../src/telegram/format.js';
import type { BatchResult } from '../../src/packages/core/ports/ISalesReconciliationService.js';
import type { SaleLineItem } from '../../src/packages/core/ports/ISaleLedger.js';

const BALANCE = {
  employeeId: 'alice_a',
  sim: 1,
  swap: 2,
  credit50: 3,
  credit100: 4,
  updatedAt: '2026-10-19 12:00:00',
};

describe('escapeMarkdown', () => {
  it('escapes legacy Markdown control characters', () => {
    expect(escapeMarkdown('sim_card*x`[y')).toBe('sim\\_card\\*x\\`\\[y');
    expect(escapeMarkdown('plain text')).toBe('plain text');
  });
});

describe('formatBalance', () => {
  it('lists every counter with its label', () => {
    expect(formatBalance(BALANCE)).toBe(
      '📦 *Stock of alice\\_a*\n\n' +
      'SIM: *1*\nSWAP: *2*\nCredit 50: *3*\nCredit 100: *4*\n\n' +
      '_Updated 2026-10-19 12:00:00 UTC_'
    );
  });
});

describe('formatTotals', () => {
  it('shows the employee count and counter totals', () => {
    expect(formatTotals({ employees: 2, sim: 7, swap: 0, credit50: 1, credit100: 0 })).toBe(
      '📊 *Inventory Summary*\n\nEmployees: *2*\nSIM: *7*\nSWAP: *0*\nCredit 50: *1*\nCredit 100: *0*'
    );
  });
});

describe('formatBackofficeStock', () => {
  it('lists the pool in counter order', () => {
    expect(formatBackofficeStock([
      { counter: 'sim', quantity: 5, updatedAt: '2026-10-19 12:00:00' },
      { counter: 'swap', quantity: 0, updatedAt: '2026-10-19 12:00:00' },
      { counter: 'credit50', quantity: 2, updatedAt: '2026-10-19 12:00:00' },
      { counter: 'credit100', quantity: 0, updatedAt: '2026-10-19 12:00:00' },
    ])).toBe('🏢 *Back-Office Stock*\n\nSIM: *5*\nSWAP: *0*\nCredit 50: *2*\nCredit 100: *0*');
  });
});

describe('formatAllSales', () => {
  function sale(id: number, employeeId: string, unitIdentifier: string | null = null): SaleLineItem {
    return {
      id,
      employeeId,
      reportDate: '2026-10-19',
      itemKind: unitIdentifier ? 'SIM' : 'CREDIT100',
      unitIdentifier,
      quantity: 1,
      contactNumber: null,
      amount: 20,
      notes: null,
      createdAt: '2026-10-19 12:00:00',
    };
  }

  it('prefixes each line with its employee', () => {
    expect(formatAllSales('2026-10-19', [sale(1, 'alice_a', '111111111'), sale(2, 'bob')])).toEqual([
      '🧾 *All sales on 2026-10-19* (1/1)\n\n' +
      '#1 alice\\_a SIM x1 `111111111` 20\n' +
      '#2 bob CREDIT100 x1 20',
    ]);
  });

  it('splits long days into pages', () => {
    const sales = Array.from({ length: ALL_SALES_PAGE_SIZE + 1 }, (_, i) => sale(i + 1, 'bob'));

    const pages = formatAllSales('2026-10-19', sales);

    expect(pages).toHaveLength(2);
    expect(pages[0].split('\n')).toHaveLength(ALL_SALES_PAGE_SIZE + 2);
    expect(pages[1]).toBe(
      `🧾 *All sales on 2026-10-19* (2/2)\n\n#${ALL_SALES_PAGE_SIZE + 1} bob CREDIT100 x1 20`
    );
  });

  it('says so when the day is empty', () => {
    expect(formatAllSales('2026-10-19', [])).toEqual(['No sales recorded on 2026-10-19.']);
  });
});

describe('formatSales', () => {
  it('lists sales with their identifiers and the total amount', () => {
    const text = formatSales('alice', '2026-10-19', [
      {
        id: 4,
        employeeId: 'alice',
        reportDate: '2026-10-19',
        itemKind: 'SIM',
        unitIdentifier: '111111111',
        quantity: 1,
        contactNumber: null,
        amount: 30,
        notes: null,
        createdAt: '2026-10-19 12:00:00',
      },
      {
        id: 5,
        employeeId: 'alice',
        reportDate: '2026-10-19',
        itemKind: 'CREDIT50',
        unitIdentifier: null,
        quantity: 2,
        contactNumber: null,
        amount: 0,
        notes: 'from_row:4',
        createdAt: '2026-10-19 12:00:00',
      },
    ]);

    expect(text).toBe(
      '🧾 *Sales of alice on 2026-10-19*\n\n' +
      '#4 SIM x1 `111111111` 30\n' +
      '#5 CREDIT50 x2 0 (from\\_row:4)\n\n' +
      'Total amount: *30*'
    );
  });

  it('says so when there are none', () => {
    expect(formatSales('alice', '2026-10-19', [])).toBe('No sales recorded for alice on 2026-10-19.');
  });
});

describe('formatJournal', () => {
  it('signs deltas and names the source', () => {
    const text = formatJournal([
      {
        id: 2,
        employeeId: 'alice',
        counter: 'sim',
        delta: -1,
        reason: 'sale',
        source: 'upload',
        sourceRef: 4,
        revertRefs: null,
        createdAt: '2026-10-19 12:00:01',
      },
      {
        id: 1,
        employeeId: 'alice',
        counter: 'credit100',
        delta: 5,
        reason: 'admin-transfer',
        source: 'admin:boss',
        sourceRef: null,
        revertRefs: null,
        createdAt: '2026-10-19 12:00:00',
      },
    ]);

    expect(text).toBe(
      '2026-10-19 12:00:01 SIM -1 sale (upload)\n' +
      '2026-10-19 12:00:00 Credit 100 +5 admin-transfer (admin:boss)'
    );
  });

  it('has a placeholder for an empty journal', () => {
    expect(formatJournal([])).toBe('_No stock movements yet_');
  });
});

describe('formatBatchResult', () => {
  it('summarizes counts and describes every skipped row', () => {
    const result: BatchResult = {
      inserted: 0,
      skippedDuplicates: 2,
      skippedInsufficient: 1,
      skippedInvalid: 2,
      reverted: { saleIds: [], deltas: {} },
      skipped: [
        { index: 1, itemKind: 'SIM', reason: 'duplicate-in-batch', identifier: '111111111', firstIndex: 0 },
        {
          index: 2,
          itemKind: 'SIM',
          reason: 'duplicate-global',
          identifier: '222222222',
          conflict: { saleId: 4, employeeId: 'bob_b', reportDate: '2026-10-18' },
        },
        {
          index: 3,
          itemKind: 'CREDIT50',
          reason: 'insufficient-stock',
          counter: 'credit50',
          available: 1,
          requested: 2,
          auxiliary: false,
        },
        { index: 4, itemKind: 'gift_card', reason: 'invalid-item-kind' },
        { index: 5, itemKind: 'SIM', reason: 'invalid-quantity', requested: 0 },
      ],
    };

    expect(formatBatchResult('2026-10-19', result)).toBe([
      '✅ *Sales for 2026-10-19 applied*',
      '',
      'Inserted: *0*',
      'Duplicates skipped: 2',
      'Insufficient stock: 1',
      'Invalid rows: 2',
      '',
      'No stock available for these items.',
      '',
      'Row 2: `111111111` repeats row 1',
      'Row 3: `222222222` already sold by bob\\_b on 2026-10-18',
      'Row 4: not enough Credit 50 (available 1, requested 2)',
      'Row 5: unknown item "gift\\_card"',
      'Row 6: invalid quantity 0',
    ].join('\n'));
  });

  it('mentions a replaced upload', () => {
    const result: BatchResult = {
      inserted: 2,
      skippedDuplicates: 0,
      skippedInsufficient: 0,
      skippedInvalid: 0,
      reverted: { saleIds: [1, 2, 3], deltas: { sim: 3 } },
      skipped: [],
    };

    expect(formatBatchResult('2026-10-19', result)).toBe(
      '✅ *Sales for 2026-10-19 applied*\n\nInserted: *2*\nReplaced previous upload: 3 sale(s) reverted'
    );
  });
});

describe('formatConservationReport', () => {
  it('reports a clean audit', () => {
    expect(formatConservationReport({
      passed: true,
      checkedAt: '2026-10-19 12:00:00',
      employeesChecked: 3,
      divergences: [],
    })).toBe(
      '✅ *Audit passed*\n\n3 employee(s) checked at 2026-10-19 12:00:00 UTC.\nEvery balance matches its journal.'
    );
  });

  it('lists divergences', () => {
    expect(formatConservationReport({
      passed: false,
      checkedAt: '2026-10-19 12:00:00',
      employeesChecked: 1,
      divergences: [{ employeeId: 'alice', counter: 'swap', balance: 3, journalTotal: 2 }],
    })).toBe('🚨 *Audit found 1 divergence(s)*\n\nalice SWAP: balance 3, journal 2');
  });

  it('names the back-office pool', () => {
    expect(formatConservationReport({
      passed: false,
      checkedAt: '2026-10-19 12:00:00',
      employeesChecked: 0,
      divergences: [{ employeeId: null, counter: 'credit50', balance: 1, journalTotal: 0 }],
    })).toBe('🚨 *Audit found 1 divergence(s)*\n\nBack office Credit 50: balance 1, journal 0');
  });
});
