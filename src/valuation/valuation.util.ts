import { compareAsc } from 'date-fns';
import Decimal from 'decimal.js';
import { LedgerEntry } from '../ledger/entities/ledger-entry.entity';
import { Cashflow } from './xirr';
import { UnsupportedAggregationFrequencyException } from '../common/exceptions/ledger.exceptions';
import { roundAmount, sum, ZERO } from '../common/utils/decimal.util';
import { daysBetween, formatDate, isoWeekThursday, midMonth } from '../common/utils/date.util';

export enum AggregationFrequency {
  DAY = 'D',
  WEEK = 'W',
  MONTH = 'M',
}

export interface VolumePoint {
  date: Date;
  cash: Decimal;
}

export interface TradeVolume {
  freq: AggregationFrequency;
  buys: VolumePoint[];    // cash < 0
  sells: VolumePoint[];   // cash > 0, redemptions and dividends
}

/**
 * @throws UnsupportedAggregationFrequencyException for anything but D, W, M
 */
export function parseFrequency(freq: string): AggregationFrequency {
  switch (freq) {
    case AggregationFrequency.DAY:
      return AggregationFrequency.DAY;
    case AggregationFrequency.WEEK:
      return AggregationFrequency.WEEK;
    case AggregationFrequency.MONTH:
      return AggregationFrequency.MONTH;
    default:
      throw new UnsupportedAggregationFrequencyException(freq);
  }
}

/** Capital paid in, as a positive amount */
export function contributedCapital(entries: LedgerEntry[]): Decimal {
  return roundAmount(sum(entries.filter((e) => e.cash.lessThan(0)).map((e) => e.cash.negated())));
}

/** Redemptions and cash dividends received */
export function returnedCapital(entries: LedgerEntry[]): Decimal {
  return roundAmount(sum(entries.filter((e) => e.cash.greaterThan(0)).map((e) => e.cash)));
}

/**
 * Largest net amount ever simultaneously invested: the maximum over all
 * prefixes of -Σcash.
 */
export function bottleneck(entries: LedgerEntry[]): Decimal {
  if (entries.length === 0) {
    return ZERO;
  }
  let invested = ZERO;
  let max: Decimal | undefined;
  for (const entry of entries) {
    invested = invested.minus(entry.cash);
    max = max === undefined || invested.greaterThan(max) ? invested : max;
  }
  return roundAmount(max ?? ZERO);
}

/**
 * Annualized turnover: Σ|cash| / (2 × bottleneck) × 365 / elapsed days,
 * measured from the first entry to `asOf`.
 */
export function turnoverRate(entries: LedgerEntry[], asOf: Date): number {
  if (entries.length === 0) {
    return 0;
  }
  const elapsed = daysBetween(entries[0].date, asOf);
  const peak = bottleneck(entries);
  if (elapsed <= 0 || peak.lessThanOrEqualTo(0)) {
    return 0;
  }
  const traded = sum(entries.map((e) => e.cash.abs()));
  return traded.dividedBy(peak).dividedBy(2).times(365).dividedBy(elapsed).toNumber();
}

export function toCashflows(entries: LedgerEntry[]): Cashflow[] {
  return entries.map((e) => ({ date: e.date, amount: e.cash.toNumber() }));
}

/**
 * Buy and sell cash grouped per day, per ISO week (labelled with its
 * Thursday) or per month (labelled with the 15th).
 */
export function tradeVolume(entries: LedgerEntry[], freq: AggregationFrequency): TradeVolume {
  const label = (date: Date): Date => {
    switch (freq) {
      case AggregationFrequency.DAY:
        return date;
      case AggregationFrequency.WEEK:
        return isoWeekThursday(date);
      case AggregationFrequency.MONTH:
        return midMonth(date);
    }
  };

  const groups = new Map<string, VolumePoint>();
  for (const entry of entries) {
    const date = label(entry.date);
    const key = formatDate(date);
    const group = groups.get(key);
    groups.set(key, { date, cash: (group ? group.cash : ZERO).plus(entry.cash) });
  }

  const points = Array.from(groups.values()).sort((a, b) => compareAsc(a.date, b.date));
  return {
    freq,
    buys: points.filter((p) => p.cash.lessThan(0)),
    sells: points.filter((p) => p.cash.greaterThan(0)),
  };
}
