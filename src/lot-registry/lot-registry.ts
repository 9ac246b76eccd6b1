import Decimal from 'decimal.js';
import { Lot, LotRegistry, SellResult } from './entities/lot.entity';
import { InsufficientSharesException, UnrecognizedCorporateActionException } from '../common/exceptions/ledger.exceptions';
import { roundAmount, sum, ZERO } from '../common/utils/decimal.util';
import { formatDate } from '../common/utils/date.util';

// Pure FIFO lot operations. Inputs are never mutated; lots and registries
// are frozen so earlier snapshots cannot be altered through a later state.

function lot(acquisitionDate: Date, shares: Decimal): Lot {
  return Object.freeze({ acquisitionDate, shares });
}

function freeze(lots: Lot[]): LotRegistry {
  return Object.freeze(lots);
}

export const EMPTY_REGISTRY: LotRegistry = freeze([]);

/** Sum of shares across all lots */
export function totalShares(registry: LotRegistry): Decimal {
  return sum(registry.map((l) => l.shares));
}

/** Appends a lot acquired on `date` */
export function buy(registry: LotRegistry, shares: Decimal, date: Date): LotRegistry {
  return freeze([...registry, lot(date, shares)]);
}

/**
 * Removes `shares` starting from the oldest lot, splitting a lot when the
 * amount falls mid-lot.
 * @throws InsufficientSharesException when the registry holds fewer shares
 */
export function sell(registry: LotRegistry, shares: Decimal, date: Date): SellResult {
  const available = totalShares(registry);
  if (available.lessThan(shares)) {
    throw new InsufficientSharesException(shares.toString(), available.toString(), formatDate(date));
  }

  const consumed: Lot[] = [];
  const remaining: Lot[] = [];
  let toConsume = shares;

  for (const current of registry) {
    if (toConsume.lessThanOrEqualTo(0)) {
      remaining.push(current);
    } else if (current.shares.lessThanOrEqualTo(toConsume)) {
      // full lot consumption
      consumed.push(current);
      toConsume = toConsume.minus(current.shares);
    } else {
      // partial lot
      consumed.push(lot(current.acquisitionDate, toConsume));
      remaining.push(lot(current.acquisitionDate, current.shares.minus(toConsume)));
      toConsume = ZERO;
    }
  }

  return { consumed: freeze(consumed), remaining: freeze(remaining) };
}

/**
 * Scales every lot by `ratio` (share conversion) effective on `date`.
 * Acquisition dates are kept; each scaled lot is rounded to cents.
 * @throws UnrecognizedCorporateActionException for a ratio that is not positive
 */
export function split(registry: LotRegistry, ratio: Decimal, date: Date): LotRegistry {
  if (ratio.lessThanOrEqualTo(0)) {
    throw new UnrecognizedCorporateActionException(`split ratio ${ratio.toString()} on ${formatDate(date)}`);
  }
  return freeze(registry.map((l) => lot(l.acquisitionDate, roundAmount(l.shares.times(ratio)))));
}

/** Cash-only corporate actions leave lots untouched */
export function passthrough(registry: LotRegistry): LotRegistry {
  return freeze([...registry]);
}
