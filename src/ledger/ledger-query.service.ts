import { Injectable } from '@nestjs/common';
import { LedgerStorageService } from './ledger-storage.service';
import { HoldingLedger } from './entities/holding-ledger.entity';
import { LedgerEntry } from './entities/ledger-entry.entity';
import { LedgerEntryDto, LedgerResponseDto, LotSnapshotDto } from './dto/ledger-response.dto';
import { LotRegistrySnapshot } from '../lot-registry/entities/lot.entity';
import { totalShares } from '../lot-registry/lot-registry';
import { HoldingNotFoundException } from '../common/exceptions/ledger.exceptions';
import { toNumber } from '../common/utils/decimal.util';
import { formatDate } from '../common/utils/date.util';
import { lastSnapshotOnOrBefore, shareBalance } from './ledger.util';

export function toEntryDto(entry: LedgerEntry): LedgerEntryDto {
  return {
    date: formatDate(entry.date),
    cash: toNumber(entry.cash),
    shares: toNumber(entry.shares),
  };
}

export function toSnapshotDto(snapshot: LotRegistrySnapshot): LotSnapshotDto {
  return {
    date: formatDate(snapshot.date),
    totalShares: toNumber(totalShares(snapshot.lots)),
    lots: snapshot.lots.map((lot) => ({
      acquisitionDate: formatDate(lot.acquisitionDate),
      shares: toNumber(lot.shares),
    })),
  };
}

// Read-only access to replayed ledgers.
@Injectable()
export class LedgerQueryService {
  constructor(private readonly storage: LedgerStorageService) {}

  /**
   * @throws HoldingNotFoundException if the holding was never replayed
   */
  getHolding(code: string): HoldingLedger {
    const ledger = this.storage.getLedger(code);
    if (!ledger) {
      throw new HoldingNotFoundException(code);
    }
    return ledger;
  }

  getAllHoldings(): HoldingLedger[] {
    return this.storage.getAllLedgers();
  }

  getLedger(code: string): LedgerResponseDto {
    const ledger = this.getHolding(code);
    return {
      code: ledger.code,
      replayId: ledger.replayId,
      replayedAt: ledger.replayedAt.toISOString(),
      endDate: formatDate(ledger.endDate),
      currentShares: toNumber(shareBalance(ledger.entries)),
      entries: ledger.entries.map(toEntryDto),
      snapshots: ledger.snapshots.map(toSnapshotDto),
    };
  }

  /**
   * Lot registry as of `date` (latest snapshot on or before it).
   * Without a date, the final registry. Before the first entry, no lots.
   */
  getLots(code: string, date?: Date): LotSnapshotDto {
    const ledger = this.getHolding(code);
    const snapshot = date ? lastSnapshotOnOrBefore(ledger, date) : ledger.snapshots[ledger.snapshots.length - 1];
    if (!snapshot) {
      return { date: formatDate(date ?? ledger.endDate), totalShares: 0, lots: [] };
    }
    return toSnapshotDto(snapshot);
  }
}
