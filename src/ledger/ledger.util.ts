import Decimal from 'decimal.js';
import { HoldingLedger } from './entities/holding-ledger.entity';
import { LedgerEntry } from './entities/ledger-entry.entity';
import { LotRegistrySnapshot } from '../lot-registry/entities/lot.entity';
import { sum } from '../common/utils/decimal.util';
import { isOnOrBefore } from '../common/utils/date.util';

/** Entries dated on or before `date` */
export function truncateEntries(entries: LedgerEntry[], date: Date): LedgerEntry[] {
  return entries.filter((entry) => isOnOrBefore(entry.date, date));
}

/** Share balance implied by a ledger (sum of deltas) */
export function shareBalance(entries: LedgerEntry[]): Decimal {
  return sum(entries.map((entry) => entry.shares));
}

export function lastSnapshotOnOrBefore(ledger: HoldingLedger, date: Date): LotRegistrySnapshot | undefined {
  let found: LotRegistrySnapshot | undefined;
  for (const snapshot of ledger.snapshots) {
    if (!isOnOrBefore(snapshot.date, date)) {
      break;
    }
    found = snapshot;
  }
  return found;
}
