import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { InstrumentModule } from './instrument/instrument.module';
import { LedgerModule } from './ledger/ledger.module';
import { ValuationModule } from './valuation/valuation.module';

@Module({
  imports: [ConfigModule, InstrumentModule, LedgerModule, ValuationModule],
  controllers: [AppController],
})
export class AppModule {}
