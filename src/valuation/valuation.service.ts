import { Inject, Injectable } from '@nestjs/common';
import { LedgerQueryService } from '../ledger/ledger-query.service';
import { InstrumentService } from '../instrument/instrument.service';
import {
  costSeries,
  HoldingPosition,
  internalRateOfReturn,
  snapshotReport,
  unitCostOf,
  valueSeries,
} from './holding-valuation';
import { bottleneck, parseFrequency, tradeVolume, turnoverRate } from './valuation.util';
import { truncateEntries } from '../ledger/ledger.util';
import {
  CostSeriesResponseDto,
  PortfolioIrrResponseDto,
  RateResponseDto,
  SnapshotReportDto,
  TradeVolumeResponseDto,
  ValueSeriesResponseDto,
} from './dto/valuation-response.dto';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { toNumber } from '../common/utils/decimal.util';
import { formatDate, isAfter } from '../common/utils/date.util';

// Read-only valuation of replayed ledgers. Dates default to the end date
// of the holding's last replay.
@Injectable()
export class ValuationService {
  constructor(
    private readonly ledgerQuery: LedgerQueryService,
    private readonly instrumentService: InstrumentService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  getReport(code: string, date?: Date): SnapshotReportDto {
    const position = this.position(code);
    const asOf = date ?? position.ledger.endDate;
    const report = snapshotReport(position, asOf);

    return {
      code,
      name: position.provider.name,
      date: formatDate(asOf),
      price: toNumber(report.price),
      shares: toNumber(report.shares),
      marketValue: toNumber(report.marketValue),
      contributed: toNumber(report.contributed),
      returned: toNumber(report.returned),
      netCost: toNumber(report.netCost),
      unitCost: toNumber(report.unitCost),
      bottleneck: toNumber(report.bottleneck),
      turnoverRate: report.turnoverRate,
      realizedGain: toNumber(report.realizedGain),
      returnRate: toNumber(report.returnRate),
    };
  }

  getUnitCost(code: string, date?: Date): RateResponseDto {
    const { ledger } = this.position(code);
    const asOf = date ?? ledger.endDate;
    return { code, date: formatDate(asOf), value: toNumber(unitCostOf(truncateEntries(ledger.entries, asOf))) };
  }

  /** Peak capital at risk over the whole ledger */
  getBottleneck(code: string): RateResponseDto {
    const { ledger } = this.position(code);
    return { code, date: formatDate(ledger.endDate), value: toNumber(bottleneck(ledger.entries)) };
  }

  getTurnoverRate(code: string, date?: Date): RateResponseDto {
    const { ledger } = this.position(code);
    const asOf = date ?? ledger.endDate;
    return { code, date: formatDate(asOf), value: turnoverRate(truncateEntries(ledger.entries, asOf), asOf) };
  }

  getInternalRateOfReturn(code: string, date?: Date, guess?: number): RateResponseDto {
    const position = this.position(code);
    const asOf = date ?? position.ledger.endDate;
    return {
      code,
      date: formatDate(asOf),
      value: internalRateOfReturn([position], asOf, guess ?? this.config.irrDefaultGuess),
    };
  }

  /**
   * IRR across holdings, as if all were sold out together on `date`.
   * Without codes, every replayed holding takes part.
   */
  getPortfolioInternalRateOfReturn(date?: Date, guess?: number, codes?: string[]): PortfolioIrrResponseDto {
    const ledgers = codes && codes.length > 0
      ? codes.map((code) => this.ledgerQuery.getHolding(code))
      : this.ledgerQuery.getAllHoldings();
    const positions: HoldingPosition[] = ledgers.map((ledger) => ({
      ledger,
      provider: this.instrumentService.getProvider(ledger.code),
    }));

    const asOf =
      date ??
      positions.reduce<Date | undefined>(
        (latest, p) => (latest && !isAfter(p.ledger.endDate, latest) ? latest : p.ledger.endDate),
        undefined,
      );
    if (!asOf) {
      return { codes: [], date: '', irr: 0 };
    }

    return {
      codes: positions.map((p) => p.ledger.code),
      date: formatDate(asOf),
      irr: internalRateOfReturn(positions, asOf, guess ?? this.config.irrDefaultGuess),
    };
  }

  /**
   * @throws UnsupportedAggregationFrequencyException before touching the ledger
   */
  getTradeVolume(code: string, freq: string): TradeVolumeResponseDto {
    const frequency = parseFrequency(freq);
    const { ledger } = this.position(code);
    const volume = tradeVolume(ledger.entries, frequency);
    return {
      code,
      freq: volume.freq,
      buys: volume.buys.map((p) => ({ date: formatDate(p.date), cash: toNumber(p.cash) })),
      sells: volume.sells.map((p) => ({ date: formatDate(p.date), cash: toNumber(p.cash) })),
    };
  }

  getValueSeries(code: string, end?: Date): ValueSeriesResponseDto {
    const position = this.position(code);
    return {
      code,
      points: valueSeries(position, end ?? position.ledger.endDate).map((p) => ({
        date: formatDate(p.date),
        value: toNumber(p.value),
      })),
    };
  }

  getCostSeries(code: string, start?: Date, end?: Date): CostSeriesResponseDto {
    const position = this.position(code);
    return {
      code,
      points: costSeries(position, end ?? position.ledger.endDate, start).map((p) => ({
        date: formatDate(p.date),
        price: toNumber(p.price),
        unitCost: p.unitCost === null ? null : toNumber(p.unitCost),
      })),
    };
  }

  private position(code: string): HoldingPosition {
    return {
      ledger: this.ledgerQuery.getHolding(code),
      provider: this.instrumentService.getProvider(code),
    };
  }
}
