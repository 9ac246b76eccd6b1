import Decimal from 'decimal.js';
import { HoldingLedger } from '../ledger/entities/holding-ledger.entity';
import { LedgerEntry } from '../ledger/entities/ledger-entry.entity';
import { lastSnapshotOnOrBefore, shareBalance, truncateEntries } from '../ledger/ledger.util';
import { InstrumentQuoteProvider } from '../instrument/interfaces/instrument-provider.interface';
import { bottleneck, contributedCapital, returnedCapital, toCashflows, turnoverRate } from './valuation.util';
import { Cashflow, xirr } from './xirr';
import { roundAmount, roundRate, sum, ZERO } from '../common/utils/decimal.util';
import { isOnOrBefore } from '../common/utils/date.util';

// A replayed ledger together with the instrument that prices it
export interface HoldingPosition {
  ledger: HoldingLedger;
  provider: InstrumentQuoteProvider;
}

export interface SnapshotReport {
  date: Date;
  price: Decimal;
  shares: Decimal;
  marketValue: Decimal;
  contributed: Decimal;
  returned: Decimal;
  netCost: Decimal;
  unitCost: Decimal;
  bottleneck: Decimal;
  turnoverRate: number;
  realizedGain: Decimal;
  returnRate: Decimal;      // realizedGain / bottleneck, in percent
}

export interface BriefReport {
  date: Date;
  unitValue: Decimal;
  currentShares: Decimal;
  currentValue: Decimal;
}

export interface ValuePoint {
  date: Date;
  value: Decimal;
}

export interface CostPoint {
  date: Date;
  price: Decimal;
  unitCost: Decimal | null;   // null before the first ledger entry
}

/** (paid in - received) / shares held; 0 when nothing is held */
export function unitCostOf(entries: LedgerEntry[]): Decimal {
  const shares = roundAmount(shareBalance(entries));
  if (shares.lessThanOrEqualTo(0)) {
    return ZERO;
  }
  const netInput = sum(entries.map((e) => e.cash.negated()));
  return roundRate(netInput.dividedBy(shares));
}

/**
 * Position, capital and return figures for the ledger truncated at `date`.
 * The price is the instrument's latest on or before `date`.
 */
export function snapshotReport({ ledger, provider }: HoldingPosition, date: Date): SnapshotReport {
  const price = provider.priceAt(date);
  const entries = truncateEntries(ledger.entries, date);

  const shares = roundAmount(shareBalance(entries));
  const marketValue = roundAmount(shares.times(price));
  const contributed = contributedCapital(entries);
  const returned = returnedCapital(entries);
  const peak = bottleneck(entries);
  const realizedGain = roundAmount(marketValue.plus(returned).minus(contributed));

  return {
    date,
    price,
    shares,
    marketValue,
    contributed,
    returned,
    netCost: contributed.minus(returned),
    unitCost: shares.isZero() ? ZERO : roundRate(contributed.minus(returned).dividedBy(shares)),
    bottleneck: peak,
    turnoverRate: turnoverRate(entries, date),
    realizedGain,
    returnRate: peak.greaterThan(0) ? roundRate(realizedGain.dividedBy(peak).times(100)) : ZERO,
  };
}

/** Shares and market value as of `date`, undefined before the first entry */
export function briefReport({ ledger, provider }: HoldingPosition, date: Date): BriefReport | undefined {
  const entries = truncateEntries(ledger.entries, date);
  if (entries.length === 0) {
    return undefined;
  }
  const unitValue = provider.priceAt(date);
  const currentShares = roundAmount(shareBalance(entries));
  return { date, unitValue, currentShares, currentValue: roundAmount(currentShares.times(unitValue)) };
}

/**
 * Cash received if every share held on `date` were redeemed that day,
 * quoted against the lot registry of that date.
 */
export function liquidationProceeds(position: HoldingPosition, date: Date): Decimal {
  const brief = briefReport(position, date);
  const snapshot = lastSnapshotOnOrBefore(position.ledger, date);
  if (!brief || !snapshot) {
    return ZERO;
  }
  return position.provider.quoteRedeem(brief.currentShares, date, snapshot.lots).cash;
}

/**
 * IRR of one or more holdings, virtually sold out on `date`.
 * Cash flows of all ledgers (truncated at `date`) form one series; the
 * summed liquidation proceeds are its terminal flow. 0 when no flow precedes
 * `date`.
 */
export function internalRateOfReturn(positions: HoldingPosition[], date: Date, guess: number): number {
  const flows: Cashflow[] = positions.flatMap((p) => toCashflows(truncateEntries(p.ledger.entries, date)));
  if (flows.length === 0) {
    return 0;
  }
  const proceeds = sum(positions.map((p) => liquidationProceeds(p, date)));
  flows.push({ date, amount: proceeds.toNumber() });
  return xirr(flows, guess);
}

/** Market value of the holding on every price date from its first entry to `end` */
export function valueSeries({ ledger, provider }: HoldingPosition, end: Date): ValuePoint[] {
  if (ledger.entries.length === 0) {
    return [];
  }
  let next = 0;
  let shares = ZERO;
  return provider.pricesBetween(ledger.entries[0].date, end).map((point) => {
    while (next < ledger.entries.length && isOnOrBefore(ledger.entries[next].date, point.date)) {
      shares = shares.plus(ledger.entries[next].shares);
      next++;
    }
    return { date: point.date, value: roundAmount(shares.times(point.netValue)) };
  });
}

/**
 * Price and unit cost on every price date in [start, end]. `start`
 * defaults to the first ledger date.
 */
export function costSeries({ ledger, provider }: HoldingPosition, end: Date, start?: Date): CostPoint[] {
  const first = ledger.entries[0];
  const from = start ?? first?.date;
  if (!from) {
    return [];
  }
  return provider.pricesBetween(from, end).map((point) => ({
    date: point.date,
    price: point.netValue,
    unitCost:
      first && isOnOrBefore(first.date, point.date)
        ? unitCostOf(truncateEntries(ledger.entries, point.date))
        : null,
  }));
}
