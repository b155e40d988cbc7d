/**
 * SqliteKeyLockManager - storage-backed IKeyLockManager
 *
 * A lock is a row in reconciliation_locks. Each acquire attempt is one
 * BEGIN IMMEDIATE transaction that first drops an expired record for the
 * key and then tries INSERT OR IGNORE; attempts repeat every
 * pollIntervalMs until the wait budget runs out.
 *
 * Records expire after ttlMs, so a key held by a process that died is
 * reclaimed by the next acquirer. The TTL must exceed the longest batch
 * transaction; assertHeld() fences a holder whose record was taken over.
 *
 * The wait budget is measured on the wall clock; record timestamps follow
 * the injected `now`.
 *
 * @module packages/adapters/inventory/SqliteKeyLockManager
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import type { IKeyLockManager, LockHandle } from '../../core/ports/IKeyLockManager.js';
import { LockLostError, LockTimeoutError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_TTL_MS = 60_000;
const DEFAULT_POLL_INTERVAL_MS = 50;

export interface KeyLockManagerOptions {
  /** Default wait for acquire() */
  timeoutMs?: number;
  /** Lifetime of a lock record */
  ttlMs?: number;
  pollIntervalMs?: number;
  /** Epoch-ms clock for record timestamps */
  now?: () => number;
}

export class SqliteKeyLockManager implements IKeyLockManager {
  private db: Database.Database;
  private timeoutMs: number;
  private ttlMs: number;
  private pollIntervalMs: number;
  private now: () => number;

  constructor(db: Database.Database, options: KeyLockManagerOptions = {}) {
    this.db = db;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  async acquire(key: string, timeoutMs: number = this.timeoutMs): Promise<LockHandle> {
    const ownerId = randomUUID();
    const startedAt = Date.now();
    let attempts = 0;

    for (;;) {
      attempts++;
      const handle = this.tryAcquire(key, ownerId);
      if (handle) {
        if (attempts > 1) {
          logger.debug({
            event: 'lock.acquired_after_wait',
            key,
            attempts,
            waitedMs: Date.now() - startedAt,
          }, 'Lock acquired after waiting');
        }
        return handle;
      }

      const waitedMs = Date.now() - startedAt;
      if (waitedMs >= timeoutMs) {
        logger.warn({ event: 'lock.timeout', key, attempts, waitedMs }, 'Lock acquisition timed out');
        throw new LockTimeoutError(key, waitedMs);
      }

      const delay = Math.min(this.pollIntervalMs, timeoutMs - waitedMs);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  release(handle: LockHandle): void {
    const result = this.db.prepare(
      `DELETE FROM reconciliation_locks WHERE lock_key = ? AND owner_id = ?`
    ).run(handle.key, handle.ownerId);

    if (result.changes === 0) {
      logger.warn({
        event: 'lock.release_not_owner',
        key: handle.key,
        ownerId: handle.ownerId,
      }, 'Lock was no longer owned at release');
    }
  }

  assertHeld(handle: LockHandle): void {
    const row = this.db.prepare(
      `SELECT owner_id, expires_at FROM reconciliation_locks WHERE lock_key = ?`
    ).get(handle.key) as { owner_id: string; expires_at: number } | undefined;

    if (!row || row.owner_id !== handle.ownerId || row.expires_at <= this.now()) {
      logger.error({
        event: 'lock.lost',
        key: handle.key,
        ownerId: handle.ownerId,
        currentOwner: row?.owner_id ?? null,
      }, 'Lock lost before commit');
      throw new LockLostError(handle.key);
    }
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  /**
   * One attempt. A busy writer counts as "not acquired"; the caller polls.
   */
  private tryAcquire(key: string, ownerId: string): LockHandle | null {
    const now = this.now();
    const expiresAt = now + this.ttlMs;

    try {
      return this.db.transaction((): LockHandle | null => {
        const reclaimed = this.db.prepare(
          `DELETE FROM reconciliation_locks WHERE lock_key = ? AND expires_at <= ?`
        ).run(key, now);

        if (reclaimed.changes > 0) {
          logger.warn({ event: 'lock.expired_reclaimed', key }, 'Reclaimed expired lock record');
        }

        const inserted = this.db.prepare(
          `INSERT OR IGNORE INTO reconciliation_locks (lock_key, owner_id, acquired_at, expires_at)
           VALUES (?, ?, ?, ?)`
        ).run(key, ownerId, now, expiresAt);

        return inserted.changes === 1
          ? { key, ownerId, acquiredAt: now, expiresAt }
          : null;
      }).immediate();
    } catch (err: unknown) {
      const isBusy = err instanceof Error &&
        (err.message.includes('SQLITE_BUSY') || err.message.includes('database is locked'));
      if (!isBusy) {
        throw err;
      }
      return null;
    }
  }
}
