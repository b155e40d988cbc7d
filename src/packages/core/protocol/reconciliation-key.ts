/**
 * ReconciliationKey: the (employee, report date) pair that is the unit of
 * both locking and last-upload-wins replacement.
 */

export interface ReconciliationKey {
  employeeId: string;
  /** YYYY-MM-DD */
  reportDate: string;
}

const REPORT_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date written as YYYY-MM-DD
 */
export function isReportDate(value: string): boolean {
  const match = REPORT_DATE_RE.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/** Report date for "today", in UTC */
export function todayReportDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/** Name of the lock record guarding a key */
export function lockKeyOf(key: ReconciliationKey): string {
  return `sales:${key.employeeId}:${key.reportDate}`;
}
