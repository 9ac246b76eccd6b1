import { Injectable } from '@nestjs/common';
import { HoldingLedger } from './entities/holding-ledger.entity';

// In-memory store of replayed ledgers, one per holding code.
@Injectable()
export class LedgerStorageService {
  private ledgers: Map<string, HoldingLedger> = new Map();

  /** Replaces any earlier replay of the same holding */
  saveLedger(ledger: HoldingLedger): HoldingLedger {
    this.ledgers.set(ledger.code, ledger);
    return ledger;
  }

  getLedger(code: string): HoldingLedger | undefined {
    return this.ledgers.get(code);
  }

  getAllLedgers(): HoldingLedger[] {
    return Array.from(this.ledgers.values());
  }

  deleteLedger(code: string): void {
    this.ledgers.delete(code);
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.ledgers.clear();
  }
}
