/**
 * IConservationAuditor - Conservation Check Port
 *
 * Alert-only: compares each balance counter with the sum of its journal
 * deltas and reports differences. Never corrects anything.
 *
 * @module packages/core/ports/IConservationAuditor
 */

import type { Counter } from '../protocol/item-kinds.js';

export interface ConservationDivergence {
  /** null for the back-office pool */
  employeeId: string | null;
  counter: Counter;
  balance: number;
  journalTotal: number;
}

export interface ConservationReport {
  passed: boolean;
  checkedAt: string;
  employeesChecked: number;
  divergences: ConservationDivergence[];
}

export interface IConservationAuditor {
  /** Without an employee id the back-office pool is checked as well */
  check(employeeId?: string): Promise<ConservationReport>;
}
