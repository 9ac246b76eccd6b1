import { Module } from '@nestjs/common';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import { LedgerQueryService } from './ledger-query.service';
import { LedgerReplayService } from './ledger-replay.service';
import { LedgerStorageService } from './ledger-storage.service';
import { InstrumentModule } from '../instrument/instrument.module';

@Module({
  imports: [InstrumentModule],
  controllers: [LedgerController],
  providers: [
    LedgerStorageService,
    LedgerReplayService,
    LedgerService,        // Mutations: replayHolding, removeHolding, clearAll
    LedgerQueryService,   // Queries: getLedger, getLots, getHolding
  ],
  exports: [LedgerService, LedgerQueryService],
})
export class LedgerModule {}
