/**
 * DuplicateDetector
 *
 * Identity of a unit is (item kind, identifier). Within a batch the first
 * occurrence wins. Across records, a live sale under any other key makes
 * the row a global duplicate; the key being replaced is excluded, since
 * its rows are reverted before detection runs.
 *
 * @module packages/adapters/inventory/DuplicateDetector
 */

import type { ISaleLedger, UnitSaleLocation } from '../../core/ports/ISaleLedger.js';
import type { UnitCountedKind } from '../../core/protocol/item-kinds.js';
import type { ReconciliationKey } from '../../core/protocol/reconciliation-key.js';

export interface DuplicateCandidate {
  index: number;
  kind: UnitCountedKind;
  identifier: string;
}

export type DuplicateFinding =
  | { index: number; identifier: string; reason: 'duplicate-in-batch'; firstIndex: number }
  | { index: number; identifier: string; reason: 'duplicate-global'; conflict: UnitSaleLocation };

export class DuplicateDetector {
  private ledger: ISaleLedger;

  constructor(ledger: ISaleLedger) {
    this.ledger = ledger;
  }

  /**
   * Findings keyed by row index; rows without a finding are accepted.
   */
  detect(
    key: ReconciliationKey,
    candidates: readonly DuplicateCandidate[]
  ): Map<number, DuplicateFinding> {
    const findings = new Map<number, DuplicateFinding>();
    const firstSeen = new Map<string, number>();

    for (const candidate of candidates) {
      const identity = `${candidate.kind}:${candidate.identifier}`;
      const firstIndex = firstSeen.get(identity);

      if (firstIndex !== undefined) {
        findings.set(candidate.index, {
          index: candidate.index,
          identifier: candidate.identifier,
          reason: 'duplicate-in-batch',
          firstIndex,
        });
        continue;
      }
      firstSeen.set(identity, candidate.index);

      const conflict = this.ledger.findUnit(candidate.kind, candidate.identifier, key);
      if (conflict) {
        findings.set(candidate.index, {
          index: candidate.index,
          identifier: candidate.identifier,
          reason: 'duplicate-global',
          conflict,
        });
      }
    }

    return findings;
  }
}
