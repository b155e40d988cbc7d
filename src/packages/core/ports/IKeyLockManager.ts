/**
 * IKeyLockManager - Key Lock Manager Port
 *
 * Exclusive, expiring ownership of a named key. Different keys never
 * block each other.
 *
 * @module packages/core/ports/IKeyLockManager
 */

export interface LockHandle {
  key: string;
  ownerId: string;
  /** Epoch ms */
  acquiredAt: number;
  /** Epoch ms; after this the record may be reclaimed by another owner */
  expiresAt: number;
}

export interface IKeyLockManager {
  /**
   * Wait up to `timeoutMs` for the key. Throws LockTimeoutError.
   */
  acquire(key: string, timeoutMs?: number): Promise<LockHandle>;

  /** Release the key if this handle still owns it */
  release(handle: LockHandle): void;

  /**
   * Fencing check before commit. Throws LockLostError when the record is
   * gone, expired, or owned by someone else.
   */
  assertHeld(handle: LockHandle): void;
}
