import { LedgerEntry } from './ledger-entry.entity';
import { LotRegistrySnapshot } from '../../lot-registry/entities/lot.entity';
import { StatusInstruction } from './status-instruction.entity';

// Replayed history of one holding.
// entries[i] and snapshots[i] always share the same date.
export interface HoldingLedger {
  code: string;                       // instrument code, one holding per instrument
  replayId: string;
  replayedAt: Date;
  endDate: Date;                      // last calendar day the replay scanned
  instructions: StatusInstruction[];
  entries: LedgerEntry[];
  snapshots: LotRegistrySnapshot[];
}
