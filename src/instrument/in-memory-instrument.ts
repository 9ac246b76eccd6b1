import { compareAsc } from 'date-fns';
import Decimal from 'decimal.js';
import {
  CorporateAction,
  InstrumentQuoteProvider,
  PricePoint,
  Quote,
} from './interfaces/instrument-provider.interface';
import { parseCorporateAction, RawCorporateAction } from './corporate-action.parser';
import { LotRegistry } from '../lot-registry/entities/lot.entity';
import { sell } from '../lot-registry/lot-registry';
import { PriceUnavailableException } from '../common/exceptions/ledger.exceptions';
import { roundAmount, ZERO } from '../common/utils/decimal.util';
import { daysBetween, formatDate, isOnOrBefore } from '../common/utils/date.util';

// Redemption fee for lots held at most `maxDays` days.
// Lots older than every tier redeem free of charge.
export interface RedemptionFeeTier {
  maxDays: number;
  rate: Decimal;
}

export interface InstrumentDefinition {
  code: string;
  name: string;
  prices: PricePoint[];
  corporateActions: RawCorporateAction[];
  lockDates: Date[];
  buyFeeRate: Decimal;
  redemptionFeeTiers: RedemptionFeeTier[];
}

/**
 * Instrument backed by a fully loaded price table and action calendar.
 * Quotes settle on the instruction date.
 */
export class InMemoryInstrument implements InstrumentQuoteProvider {
  readonly code: string;
  readonly name: string;

  private readonly prices: PricePoint[];
  private readonly actions: Map<string, RawCorporateAction> = new Map();
  private readonly lockDates: Set<string>;
  private readonly buyFeeRate: Decimal;
  private readonly feeTiers: RedemptionFeeTier[];

  constructor(definition: InstrumentDefinition) {
    this.code = definition.code;
    this.name = definition.name;
    this.prices = [...definition.prices].sort((a, b) => compareAsc(a.date, b.date));
    definition.corporateActions.forEach((action) => {
      this.actions.set(formatDate(action.date), action);
    });
    this.lockDates = new Set(definition.lockDates.map(formatDate));
    this.buyFeeRate = definition.buyFeeRate;
    this.feeTiers = [...definition.redemptionFeeTiers].sort((a, b) => a.maxDays - b.maxDays);
  }

  /** Binary search for the last price row on or before `date` */
  priceAt(date: Date): Decimal {
    let lo = 0;
    let hi = this.prices.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (isOnOrBefore(this.prices[mid].date, date)) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    if (found < 0) {
      throw new PriceUnavailableException(this.code, formatDate(date));
    }
    return this.prices[found].netValue;
  }

  pricesBetween(start: Date, end: Date): PricePoint[] {
    return this.prices.filter(
      (p) => isOnOrBefore(start, p.date) && isOnOrBefore(p.date, end),
    );
  }

  // shares = amount / (1 + fee) / price, cash is the full amount paid
  quoteBuy(amount: Decimal, date: Date): Quote {
    const price = this.priceAt(date);
    const shares = roundAmount(amount.dividedBy(this.buyFeeRate.plus(1)).dividedBy(price));
    return { settleDate: date, cash: roundAmount(amount.negated()), shares };
  }

  // Each consumed lot pays the fee tier matching its age
  quoteRedeem(shares: Decimal, date: Date, registry: LotRegistry): Quote {
    const price = this.priceAt(date);
    const { consumed } = sell(registry, shares, date);

    const proceeds = consumed.reduce((total, lot) => {
      const rate = this.redemptionFeeRate(daysBetween(lot.acquisitionDate, date));
      return total.plus(lot.shares.times(price).times(new Decimal(1).minus(rate)));
    }, ZERO);

    return { settleDate: date, cash: roundAmount(proceeds), shares: shares.negated() };
  }

  corporateActionAt(date: Date): CorporateAction | undefined {
    const raw = this.actions.get(formatDate(date));
    return raw ? parseCorporateAction(raw) : undefined;
  }

  isLockDate(date: Date): boolean {
    return this.lockDates.has(formatDate(date));
  }

  private redemptionFeeRate(heldDays: number): Decimal {
    const tier = this.feeTiers.find((t) => heldDays <= t.maxDays);
    return tier ? tier.rate : ZERO;
  }
}
