import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { LedgerReplayService } from './ledger-replay.service';
import { LedgerStorageService } from './ledger-storage.service';
import { HoldingLedger } from './entities/holding-ledger.entity';
import { StatusInstruction } from './entities/status-instruction.entity';
import { ReplayInstructionsDto } from './dto/replay-instructions.dto';
import { InstrumentService } from '../instrument/instrument.service';
import { HoldingNotFoundException } from '../common/exceptions/ledger.exceptions';
import { toDecimal } from '../common/utils/decimal.util';
import { formatDate, toDate, yesterday } from '../common/utils/date.util';

// Replays instruction histories and stores the resulting ledgers.
// Queries live in LedgerQueryService.
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    private readonly storage: LedgerStorageService,
    private readonly replayService: LedgerReplayService,
    private readonly instrumentService: InstrumentService,
  ) {}

  /**
   * Rebuilds the ledger of holding `code` from its full instruction list.
   * A fatal replay error leaves any previously stored ledger in place.
   */
  replayHolding(code: string, dto: ReplayInstructionsDto, now: Date = new Date()): HoldingLedger {
    const provider = this.instrumentService.getProvider(code);
    const instructions = this.toInstructions(dto);
    const endDate = dto.endDate ? toDate(dto.endDate) : yesterday(now);
    const replayId = uuidv4();

    this.logger.log(
      `Replay ${replayId} of ${code}: ${instructions.length} instructions through ${formatDate(endDate)}`,
    );
    const { entries, snapshots } = this.replayService.replay(provider, instructions, endDate);
    this.logger.log(`Replay ${replayId} of ${code} produced ${entries.length} ledger entries`);

    return this.storage.saveLedger({
      code,
      replayId,
      replayedAt: now,
      endDate,
      instructions,
      entries,
      snapshots,
    });
  }

  /** Drops the stored ledger of one holding */
  removeHolding(code: string): void {
    if (!this.storage.getLedger(code)) {
      throw new HoldingNotFoundException(code);
    }
    this.storage.deleteLedger(code);
  }

  /** Clears all ledgers - test harness only */
  clearAll(): void {
    this.storage.clearAllData();
  }

  private toInstructions(dto: ReplayInstructionsDto): StatusInstruction[] {
    try {
      return dto.instructions.map((row) => ({ date: toDate(row.date), value: toDecimal(row.value) }));
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : String(error));
    }
  }
}
