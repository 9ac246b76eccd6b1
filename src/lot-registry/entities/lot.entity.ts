import Decimal from 'decimal.js';

// Shares acquired on a single date. FIFO order is by acquisitionDate only.
export interface Lot {
  readonly acquisitionDate: Date;
  readonly shares: Decimal;
}

// Outstanding lots, oldest first. Every operation returns a new registry.
export type LotRegistry = ReadonlyArray<Lot>;

// Registry state after the ledger entry with the same date
export interface LotRegistrySnapshot {
  readonly date: Date;
  readonly lots: LotRegistry;
}

export interface SellResult {
  consumed: LotRegistry;   // (partial) lots removed, oldest first
  remaining: LotRegistry;
}
