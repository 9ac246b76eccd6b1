import { Module } from '@nestjs/common';
import { ValuationController } from './valuation.controller';
import { PortfolioController } from './portfolio.controller';
import { ValuationService } from './valuation.service';
import { LedgerModule } from '../ledger/ledger.module';
import { InstrumentModule } from '../instrument/instrument.module';
import { ConfigModule } from '../config/config.module';

@Module({
  imports: [LedgerModule, InstrumentModule, ConfigModule],
  controllers: [ValuationController, PortfolioController],
  providers: [ValuationService],
})
export class ValuationModule {}
