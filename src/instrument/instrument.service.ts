import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { max, min } from 'date-fns';
import { InMemoryInstrument, InstrumentDefinition } from './in-memory-instrument';
import { InstrumentQuoteProvider } from './interfaces/instrument-provider.interface';
import { RegisterInstrumentDto } from './dto/register-instrument.dto';
import { InstrumentResponseDto } from './dto/instrument-response.dto';
import { InstrumentNotFoundException } from '../common/exceptions/ledger.exceptions';
import { toDecimal } from '../common/utils/decimal.util';
import { formatDate, toDate } from '../common/utils/date.util';

/**
 * Registry of instruments the ledgers are priced against.
 * Price tables are supplied whole through the API; no live feeds.
 */
@Injectable()
export class InstrumentService {
  private readonly logger = new Logger(InstrumentService.name);
  private instruments: Map<string, { provider: InstrumentQuoteProvider; definition: InstrumentDefinition }> =
    new Map();

  /** Registers or replaces an instrument */
  register(dto: RegisterInstrumentDto): InstrumentResponseDto {
    const definition = this.toDefinition(dto);
    this.instruments.set(definition.code, {
      provider: new InMemoryInstrument(definition),
      definition,
    });
    this.logger.log(
      `Registered ${definition.code} with ${definition.prices.length} prices and ${definition.corporateActions.length} corporate actions`,
    );
    return this.summarize(definition);
  }

  /**
   * @throws InstrumentNotFoundException if the code is unknown
   */
  getProvider(code: string): InstrumentQuoteProvider {
    const entry = this.instruments.get(code);
    if (!entry) {
      throw new InstrumentNotFoundException(code);
    }
    return entry.provider;
  }

  getInstrument(code: string): InstrumentResponseDto {
    const entry = this.instruments.get(code);
    if (!entry) {
      throw new InstrumentNotFoundException(code);
    }
    return this.summarize(entry.definition);
  }

  getAllInstruments(): InstrumentResponseDto[] {
    return Array.from(this.instruments.values()).map((entry) => this.summarize(entry.definition));
  }

  /** Clears all instruments - test harness only */
  clearAll(): void {
    this.instruments.clear();
  }

  private toDefinition(dto: RegisterInstrumentDto): InstrumentDefinition {
    try {
      return {
        code: dto.code,
        name: dto.name,
        prices: dto.prices.map((p) => ({ date: toDate(p.date), netValue: toDecimal(p.netValue) })),
        corporateActions: (dto.corporateActions ?? []).map((a) => ({
          date: toDate(a.date),
          value: a.value,
          reinvest: a.reinvest,
        })),
        lockDates: (dto.lockDates ?? []).map((d) => toDate(d)),
        buyFeeRate: toDecimal(dto.buyFeeRate ?? 0),
        redemptionFeeTiers: (dto.redemptionFeeTiers ?? []).map((t) => ({
          maxDays: t.maxDays,
          rate: toDecimal(t.rate),
        })),
      };
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : String(error));
    }
  }

  private summarize(definition: InstrumentDefinition): InstrumentResponseDto {
    const dates = definition.prices.map((p) => p.date);
    return {
      code: definition.code,
      name: definition.name,
      priceCount: definition.prices.length,
      firstPriceDate: dates.length > 0 ? formatDate(min(dates)) : null,
      lastPriceDate: dates.length > 0 ? formatDate(max(dates)) : null,
      corporateActionCount: definition.corporateActions.length,
      lockDateCount: definition.lockDates.length,
    };
  }
}
