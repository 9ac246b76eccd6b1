import Decimal from 'decimal.js';
import { LotRegistry } from '../../lot-registry/entities/lot.entity';

export interface PricePoint {
  date: Date;
  netValue: Decimal;
}

// Settled result of a purchase or redemption, signed from the holder's side:
// purchase -> cash < 0, shares > 0; redemption -> cash > 0, shares < 0.
export interface Quote {
  settleDate: Date;
  cash: Decimal;
  shares: Decimal;
}

export enum CorporateActionKind {
  SPLIT = 'split',
  DIVIDEND = 'dividend',
}

export type CorporateAction =
  | { kind: CorporateActionKind.SPLIT; ratio: Decimal }
  | { kind: CorporateActionKind.DIVIDEND; perShareAmount: Decimal; reinvest: boolean };

/**
 * Price and quote collaborator consumed by the replay engine and valuation.
 * All data is materialized before replay; nothing here does I/O.
 */
export interface InstrumentQuoteProvider {
  readonly code: string;
  readonly name: string;

  /** Latest net asset value on or before `date` */
  priceAt(date: Date): Decimal;

  /** Price rows with start <= date <= end, ascending */
  pricesBetween(start: Date, end: Date): PricePoint[];

  quoteBuy(amount: Decimal, date: Date): Quote;

  /** Fees may depend on the ages of the lots the redemption consumes */
  quoteRedeem(shares: Decimal, date: Date, registry: LotRegistry): Quote;

  corporateActionAt(date: Date): CorporateAction | undefined;

  isLockDate(date: Date): boolean;
}
