import Decimal from 'decimal.js';

// Cash and share movement on one date, signed from the holder's side.
// cash < 0 is money paid in (purchase), cash > 0 money received.
export interface LedgerEntry {
  readonly date: Date;
  readonly cash: Decimal;
  readonly shares: Decimal;   // share-count delta, not balance
}
