/**
 * SalesReconciliationEngine - ISalesReconciliationService implementation
 *
 * applyBatch(key, entries):
 *   1. validate key and batch, acquire the key lock
 *   2. BEGIN IMMEDIATE
 *   3. revert the live batch of the key from the journal
 *   4. detect duplicates, then apply rows in input order against an
 *      in-progress balance (skips are data, never exceptions)
 *   5. cross-check stored balance against the in-progress balance
 *   6. fence on the lock, COMMIT, release the lock
 *
 * Any throw inside the transaction rolls everything back, revert included.
 * Errors that are not AppErrors surface as PersistenceFailureError.
 *
 * @module packages/adapters/inventory/SalesReconciliationEngine
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type {
  IAuditJournal,
  JournalEntry,
  JournalHistoryOptions,
} from '../../core/ports/IAuditJournal.js';
import type { BackofficeStockLevel, IBackofficeStock } from '../../core/ports/IBackofficeStock.js';
import type {
  CounterValues,
  EmployeeAccount,
  IInventoryStore,
  InventoryBalance,
} from '../../core/ports/IInventoryStore.js';
import type { IKeyLockManager } from '../../core/ports/IKeyLockManager.js';
import type { ISaleLedger, SaleLineItem } from '../../core/ports/ISaleLedger.js';
import type {
  BatchResult,
  ISalesReconciliationService,
  InventorySummary,
  SkippedRow,
  StockTransferResult,
} from '../../core/ports/ISalesReconciliationService.js';
import {
  COUNTERS,
  counterFor,
  isUnitCountedKind,
  resolveItemKind,
  type Counter,
  type StockedItemKind,
} from '../../core/protocol/item-kinds.js';
import {
  isReportDate,
  lockKeyOf,
  type ReconciliationKey,
} from '../../core/protocol/reconciliation-key.js';
import {
  auxiliaryCredits,
  compileIdentifierPattern,
  resolveDeduction,
  saleBatchSchema,
  type ResolvedDeduction,
  type SaleEntry,
} from '../../core/protocol/sale-entry.js';
import {
  AppError,
  NotFoundError,
  PersistenceFailureError,
  ValidationError,
  logError,
} from '../../../utils/errors.js';
import { createChildLogger, logger } from '../../../utils/logger.js';
import { DuplicateDetector, type DuplicateCandidate } from './DuplicateDetector.js';

// =============================================================================
// Constants
// =============================================================================

/** SQLite BUSY retry backoff schedule (ms) */
const BUSY_RETRY_DELAYS = [10, 50, 200];

const DEFAULT_LOCK_TIMEOUT_MS = 15_000;
const DEFAULT_IDENTIFIER_PATTERN = '^\\d{9}$';

/** Journal `source` values */
const SOURCE_UPLOAD = 'upload';
const SOURCE_REUPLOAD = 'reupload';
const SOURCE_REVERT = 'revert';
const SOURCE_DELETE_SALE = 'delete-sale';

// =============================================================================
// Types
// =============================================================================

export interface SalesReconciliationComponents {
  store: IInventoryStore;
  ledger: ISaleLedger;
  journal: IAuditJournal;
  locks: IKeyLockManager;
  backoffice: IBackofficeStock;
}

export interface SalesReconciliationOptions {
  lockTimeoutMs?: number;
  /** SIM/SWAP identifiers matching this take part in duplicate detection */
  identifierPattern?: string | RegExp;
  now?: () => Date;
}

type PreparedRow =
  | { index: number; entry: SaleEntry; kind: null }
  | { index: number; entry: SaleEntry; kind: StockedItemKind; deduction: ResolvedDeduction };

// =============================================================================
// SalesReconciliationEngine
// =============================================================================

export class SalesReconciliationEngine implements ISalesReconciliationService {
  private db: Database.Database;
  private store: IInventoryStore;
  private ledger: ISaleLedger;
  private journal: IAuditJournal;
  private locks: IKeyLockManager;
  private backoffice: IBackofficeStock;
  private duplicates: DuplicateDetector;
  private lockTimeoutMs: number;
  private identifierPattern: RegExp;
  private now: () => Date;

  constructor(
    db: Database.Database,
    components: SalesReconciliationComponents,
    options: SalesReconciliationOptions = {},
  ) {
    this.db = db;
    this.store = components.store;
    this.ledger = components.ledger;
    this.journal = components.journal;
    this.locks = components.locks;
    this.backoffice = components.backoffice;
    this.duplicates = new DuplicateDetector(components.ledger);
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    const pattern = options.identifierPattern ?? DEFAULT_IDENTIFIER_PATTERN;
    this.identifierPattern = typeof pattern === 'string'
      ? compileIdentifierPattern(pattern)
      : compileIdentifierPattern(pattern.source);
    this.now = options.now ?? (() => new Date());
  }

  // ---------------------------------------------------------------------------
  // Batch apply / revert
  // ---------------------------------------------------------------------------

  async applyBatch(
    employeeId: string,
    reportDate: string,
    entries: readonly SaleEntry[],
  ): Promise<BatchResult> {
    const key = validateKey(employeeId, reportDate);
    const parsed = saleBatchSchema.safeParse(entries);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `Invalid sale batch at ${issue.path.join('.') || '(root)'}: ${issue.message}`,
        'entries'
      );
    }

    const log = createChildLogger({ component: 'SalesReconciliationEngine', employeeId, reportDate });
    log.info({ event: 'reconciliation.batch.started', rows: parsed.data.length }, 'Applying sales batch');

    const result = await this.runLocked(key, 'reconciliation.batch', () =>
      this.applyInTransaction(key, parsed.data, log)
    );

    log.info({
      event: 'reconciliation.batch.applied',
      inserted: result.inserted,
      skippedDuplicates: result.skippedDuplicates,
      skippedInsufficient: result.skippedInsufficient,
      skippedInvalid: result.skippedInvalid,
      revertedSales: result.reverted.saleIds.length,
    }, 'Sales batch applied');

    return result;
  }

  async revert(employeeId: string, reportDate: string): Promise<number> {
    const key = validateKey(employeeId, reportDate);

    const deleted = await this.runLocked(key, 'reconciliation.revert', () => {
      const plan = this.journal.computeRevert(key);
      if (plan.saleIds.length === 0) {
        return 0;
      }
      const count = this.journal.applyRevert(key, plan, SOURCE_REVERT);
      this.store.setUpdatedTimestamp(key.employeeId, this.now());
      return count;
    });

    logger.info({
      event: 'reconciliation.revert.applied',
      employeeId,
      reportDate,
      deleted,
    }, 'Sales reverted');

    return deleted;
  }

  async deleteSale(saleId: number): Promise<boolean> {
    if (!Number.isSafeInteger(saleId) || saleId <= 0) {
      throw new ValidationError(`Sale id must be a positive integer, got ${saleId}`, 'saleId');
    }

    const sale = this.ledger.getById(saleId);
    if (!sale) {
      return false;
    }

    const key = { employeeId: sale.employeeId, reportDate: sale.reportDate };
    const deleted = await this.runLocked(key, 'reconciliation.sale_delete', () => {
      // The key may have been re-uploaded while we waited for the lock
      if (!this.ledger.getById(saleId)) {
        return false;
      }
      const plan = this.journal.computeSaleRevert(saleId);
      this.journal.applyRevert(key, plan, SOURCE_DELETE_SALE);
      this.store.setUpdatedTimestamp(key.employeeId, this.now());
      return true;
    });

    logger.info({
      event: 'reconciliation.sale_delete.completed',
      saleId,
      employeeId: key.employeeId,
      reportDate: key.reportDate,
      deleted,
    }, 'Sale delete completed');

    return deleted;
  }

  // ---------------------------------------------------------------------------
  // Admin stock movements
  // ---------------------------------------------------------------------------

  async adjustStock(
    employeeId: string,
    counter: Counter,
    delta: number,
    actor: string,
  ): Promise<InventoryBalance> {
    if (!Number.isSafeInteger(delta) || delta === 0) {
      throw new ValidationError(`Stock delta must be a non-zero safe integer, got ${delta}`, 'delta');
    }

    const balance = await this.runWrite('inventory.adjust', () => {
      this.requireBalance(employeeId);
      this.store.adjust(employeeId, counter, delta);
      this.journal.append({
        employeeId,
        counter,
        delta,
        reason: 'admin-transfer',
        source: `admin:${actor}`,
      });
      this.store.setUpdatedTimestamp(employeeId, this.now());
      return this.requireBalance(employeeId);
    });

    logger.info({
      event: 'inventory.adjust.applied',
      employeeId,
      counter,
      delta,
      actor,
    }, 'Stock adjusted');

    return balance;
  }

  async transferStock(
    fromEmployeeId: string,
    toEmployeeId: string,
    counter: Counter,
    quantity: number,
    actor: string,
  ): Promise<StockTransferResult> {
    assertPositiveQuantity(quantity);
    if (fromEmployeeId === toEmployeeId) {
      throw new ValidationError('Cannot transfer stock to the same employee', 'toEmployeeId');
    }

    const result = await this.runWrite('inventory.transfer', () => {
      this.requireBalance(fromEmployeeId);
      this.requireBalance(toEmployeeId);

      const source = `admin:${actor}`;
      this.store.adjust(fromEmployeeId, counter, -quantity);
      this.journal.append({
        employeeId: fromEmployeeId,
        counter,
        delta: -quantity,
        reason: 'admin-transfer',
        source,
      });
      this.store.adjust(toEmployeeId, counter, quantity);
      this.journal.append({
        employeeId: toEmployeeId,
        counter,
        delta: quantity,
        reason: 'admin-transfer',
        source,
      });

      const at = this.now();
      this.store.setUpdatedTimestamp(fromEmployeeId, at);
      this.store.setUpdatedTimestamp(toEmployeeId, at);
      return {
        from: this.requireBalance(fromEmployeeId),
        to: this.requireBalance(toEmployeeId),
      };
    });

    logger.info({
      event: 'inventory.transfer.applied',
      fromEmployeeId,
      toEmployeeId,
      counter,
      quantity,
      actor,
    }, 'Stock transferred');

    return result;
  }

  // ---------------------------------------------------------------------------
  // Back-office pool
  // ---------------------------------------------------------------------------

  async addBackofficeStock(
    counter: Counter,
    quantity: number,
    actor: string,
  ): Promise<BackofficeStockLevel[]> {
    assertPositiveQuantity(quantity);

    const levels = await this.runWrite('backoffice.add', () => {
      this.backoffice.adjust(counter, quantity);
      this.journal.append({
        employeeId: null,
        counter,
        delta: quantity,
        reason: 'admin-transfer',
        source: `backoffice:${actor}`,
      });
      return this.backoffice.list();
    });

    logger.info({
      event: 'backoffice.add.applied',
      counter,
      quantity,
      actor,
    }, 'Back-office stock added');

    return levels;
  }

  async transferFromBackoffice(
    toEmployeeId: string,
    counter: Counter,
    quantity: number,
    actor: string,
  ): Promise<InventoryBalance> {
    assertPositiveQuantity(quantity);

    const balance = await this.runWrite('backoffice.transfer', () => {
      this.requireBalance(toEmployeeId);

      const source = `backoffice:${actor}`;
      this.backoffice.adjust(counter, -quantity);
      this.journal.append({
        employeeId: null,
        counter,
        delta: -quantity,
        reason: 'admin-transfer',
        source,
      });
      this.store.adjust(toEmployeeId, counter, quantity);
      this.journal.append({
        employeeId: toEmployeeId,
        counter,
        delta: quantity,
        reason: 'admin-transfer',
        source,
      });

      this.store.setUpdatedTimestamp(toEmployeeId, this.now());
      return this.requireBalance(toEmployeeId);
    });

    logger.info({
      event: 'backoffice.transfer.applied',
      toEmployeeId,
      counter,
      quantity,
      actor,
    }, 'Back-office stock transferred');

    return balance;
  }

  async listBackofficeStock(): Promise<BackofficeStockLevel[]> {
    return this.backoffice.list();
  }

  async ensureEmployee(employeeId: string, displayName?: string): Promise<EmployeeAccount> {
    return this.runWrite('inventory.ensure', () => this.store.ensure(employeeId, displayName));
  }

  // ---------------------------------------------------------------------------
  // Reads (unlocked; WAL readers never see a partial commit)
  // ---------------------------------------------------------------------------

  async getBalance(employeeId: string): Promise<InventoryBalance | null> {
    return this.store.get(employeeId);
  }

  async listSales(employeeId: string, reportDate: string): Promise<SaleLineItem[]> {
    return this.ledger.listByKey(validateKey(employeeId, reportDate));
  }

  async listSalesByDate(reportDate: string): Promise<SaleLineItem[]> {
    if (!isReportDate(reportDate)) {
      throw new ValidationError(`Report date must be YYYY-MM-DD, got "${reportDate}"`, 'reportDate');
    }
    return this.ledger.listByDate(reportDate);
  }

  async summarizeInventory(): Promise<InventorySummary> {
    return {
      balances: this.store.list(),
      totals: this.store.totals(),
    };
  }

  async getJournal(employeeId: string, options?: JournalHistoryOptions): Promise<JournalEntry[]> {
    return this.journal.history(employeeId, options);
  }

  // ---------------------------------------------------------------------------
  // Internal: batch transaction body
  // ---------------------------------------------------------------------------

  private applyInTransaction(
    key: ReconciliationKey,
    entries: SaleEntry[],
    log: Logger,
  ): BatchResult {
    this.requireBalance(key.employeeId);

    const plan = this.journal.computeRevert(key);
    if (plan.saleIds.length > 0) {
      this.journal.applyRevert(key, plan, SOURCE_REUPLOAD);
      log.info({
        event: 'reconciliation.revert.applied',
        saleIds: plan.saleIds,
        deltas: plan.deltas,
      }, 'Reverted previous batch');
    }

    const result: BatchResult = {
      inserted: 0,
      skippedDuplicates: 0,
      skippedInsufficient: 0,
      skippedInvalid: 0,
      reverted: { saleIds: plan.saleIds, deltas: plan.deltas },
      skipped: [],
    };
    const skip = (row: SkippedRow): void => {
      recordSkip(result, row);
      log.warn({ event: 'reconciliation.row.skipped', ...row }, `Skipped row ${row.index}: ${row.reason}`);
    };

    const inProgress = countersOf(this.requireBalance(key.employeeId));
    const rows = entries.map((entry, index) => this.prepareRow(entry, index));

    const candidates: DuplicateCandidate[] = [];
    for (const row of rows) {
      if (row.kind && isUnitCountedKind(row.kind) && row.deduction.trackedIdentifier) {
        candidates.push({ index: row.index, kind: row.kind, identifier: row.deduction.trackedIdentifier });
      }
    }
    const findings = this.duplicates.detect(key, candidates);

    for (const row of rows) {
      const { index, entry } = row;

      const finding = findings.get(index);
      if (finding) {
        skip(finding.reason === 'duplicate-in-batch'
          ? { index, itemKind: entry.itemKind, reason: finding.reason, identifier: finding.identifier, firstIndex: finding.firstIndex }
          : { index, itemKind: entry.itemKind, reason: finding.reason, identifier: finding.identifier, conflict: finding.conflict });
        continue;
      }

      if (row.kind === null) {
        skip({ index, itemKind: entry.itemKind, reason: 'invalid-item-kind' });
        continue;
      }

      const { kind, deduction } = row;
      if (deduction.quantity <= 0) {
        skip({ index, itemKind: entry.itemKind, reason: 'invalid-quantity', requested: deduction.quantity });
        continue;
      }

      const counter = counterFor(kind);
      if (inProgress[counter] < deduction.quantity) {
        skip({
          index,
          itemKind: entry.itemKind,
          reason: 'insufficient-stock',
          counter,
          available: inProgress[counter],
          requested: deduction.quantity,
          auxiliary: false,
        });
        continue;
      }

      const sale = this.recordSale(key, inProgress, {
        itemKind: kind,
        unitIdentifier: deduction.unitIdentifier,
        quantity: deduction.quantity,
        contactNumber: entry.contactNumber ?? null,
        amount: entry.amount,
        notes: entry.notes ?? null,
      });
      result.inserted++;

      for (const extra of auxiliaryCredits(entry, kind)) {
        const extraCounter = counterFor(extra.kind);
        if (inProgress[extraCounter] < extra.quantity) {
          skip({
            index,
            itemKind: extra.kind,
            reason: 'insufficient-stock',
            counter: extraCounter,
            available: inProgress[extraCounter],
            requested: extra.quantity,
            auxiliary: true,
          });
          continue;
        }

        this.recordSale(key, inProgress, {
          itemKind: extra.kind,
          unitIdentifier: null,
          quantity: extra.quantity,
          contactNumber: null,
          amount: 0,
          notes: `from_row:${sale.id}`,
        });
        result.inserted++;
      }
    }

    const stored = this.requireBalance(key.employeeId);
    for (const counter of COUNTERS) {
      if (stored[counter] !== inProgress[counter]) {
        throw new PersistenceFailureError(
          `Stored ${counter} for ${key.employeeId} is ${stored[counter]}, expected ${inProgress[counter]}`
        );
      }
    }
    this.store.setUpdatedTimestamp(key.employeeId, this.now());

    return result;
  }

  private prepareRow(entry: SaleEntry, index: number): PreparedRow {
    const kind = resolveItemKind(entry.itemKind);
    if (!kind) {
      return { index, entry, kind: null };
    }
    return { index, entry, kind, deduction: resolveDeduction(entry, kind, this.identifierPattern) };
  }

  /**
   * Insert the line item, deduct it from the store, journal the deduction
   * and keep the in-progress balance in step.
   */
  private recordSale(
    key: ReconciliationKey,
    inProgress: CounterValues,
    item: Omit<SaleLineItem, 'id' | 'createdAt' | 'employeeId' | 'reportDate'>,
  ): SaleLineItem {
    const sale = this.ledger.insert({ ...item, employeeId: key.employeeId, reportDate: key.reportDate });
    const counter = counterFor(item.itemKind);

    this.store.adjust(key.employeeId, counter, -item.quantity);
    this.journal.append({
      employeeId: key.employeeId,
      counter,
      delta: -item.quantity,
      reason: 'sale',
      source: SOURCE_UPLOAD,
      sourceRef: sale.id,
    });
    inProgress[counter] -= item.quantity;

    return sale;
  }

  private requireBalance(employeeId: string): InventoryBalance {
    const balance = this.store.get(employeeId);
    if (!balance) {
      throw new NotFoundError('Employee', employeeId);
    }
    return balance;
  }

  // ---------------------------------------------------------------------------
  // Internal: transactions
  // ---------------------------------------------------------------------------

  /**
   * Run `work` in one IMMEDIATE transaction under the key lock. The lock is
   * fenced before commit and always released.
   */
  private async runLocked<T>(key: ReconciliationKey, event: string, work: () => T): Promise<T> {
    const handle = await this.locks.acquire(lockKeyOf(key), this.lockTimeoutMs);
    try {
      return await this.runWrite(event, () => {
        const result = work();
        this.locks.assertHeld(handle);
        return result;
      });
    } finally {
      this.locks.release(handle);
    }
  }

  private async runWrite<T>(event: string, work: () => T): Promise<T> {
    try {
      return await this.withBusyRetry(() => this.db.transaction(work).immediate());
    } catch (err: unknown) {
      const failure = toKeyLevelError(err);
      logError(failure, { event: `${event}.failed` });
      throw failure;
    }
  }

  private async withBusyRetry<T>(fn: () => T): Promise<T> {
    for (let attempt = 0; attempt <= BUSY_RETRY_DELAYS.length; attempt++) {
      try {
        return fn();
      } catch (err: unknown) {
        const isBusy = err instanceof Error &&
          (err.message.includes('SQLITE_BUSY') || err.message.includes('database is locked'));

        if (!isBusy || attempt >= BUSY_RETRY_DELAYS.length) {
          throw err;
        }

        const delay = BUSY_RETRY_DELAYS[attempt];
        logger.warn({
          event: 'inventory.sqlite.busy_retry',
          attempt: attempt + 1,
          delayMs: delay,
        }, 'SQLite BUSY, retrying');

        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }

    // Unreachable but TypeScript needs it
    throw new Error('SQLite BUSY retry exhausted');
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validateKey(employeeId: string, reportDate: string): ReconciliationKey {
  if (employeeId.trim() === '') {
    throw new ValidationError('Employee id must not be empty', 'employeeId');
  }
  if (!isReportDate(reportDate)) {
    throw new ValidationError(`Report date must be YYYY-MM-DD, got "${reportDate}"`, 'reportDate');
  }
  return { employeeId, reportDate };
}

function assertPositiveQuantity(quantity: number): void {
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new ValidationError(`Quantity must be a positive safe integer, got ${quantity}`, 'quantity');
  }
}

function countersOf(balance: InventoryBalance): CounterValues {
  return {
    sim: balance.sim,
    swap: balance.swap,
    credit50: balance.credit50,
    credit100: balance.credit100,
  };
}

function recordSkip(result: BatchResult, row: SkippedRow): void {
  result.skipped.push(row);
  switch (row.reason) {
    case 'duplicate-in-batch':
    case 'duplicate-global':
      result.skippedDuplicates++;
      break;
    case 'insufficient-stock':
      result.skippedInsufficient++;
      break;
    case 'invalid-item-kind':
    case 'invalid-quantity':
      result.skippedInvalid++;
      break;
  }
}

function toKeyLevelError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new PersistenceFailureError(`Transaction rolled back: ${message}`, { cause: err });
}
