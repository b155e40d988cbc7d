/**
 * Canonical timestamp module for ledger tables.
 *
 * SQLite's `datetime('now')` returns `YYYY-MM-DD HH:MM:SS` (space-separated, no timezone).
 * Every *_at TEXT column uses this format; lock expiry uses epoch milliseconds instead.
 *
 * Do not mix ISO 8601 into these columns: the space (0x20) vs 'T' (0x54)
 * breaks chronological string ordering.
 */

/** Branded type for SQLite-format timestamps. Prevents accidental use of ISO 8601 strings. */
export type SqliteTimestamp = string & { readonly __brand: 'sqlite_ts' };

/**
 * Returns the given (or current) time in SQLite-compatible format: `YYYY-MM-DD HH:MM:SS`
 */
export function sqliteTimestamp(date?: Date): SqliteTimestamp {
  return (date ?? new Date())
    .toISOString()
    .replace('T', ' ')
    .replace(/\.\d+Z$/, '') as SqliteTimestamp;
}
