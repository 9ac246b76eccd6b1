export interface LedgerEntryDto {
  date: string;
  cash: number;
  shares: number;
}

export interface LotDto {
  acquisitionDate: string;
  shares: number;
}

export interface LotSnapshotDto {
  date: string;
  totalShares: number;
  lots: LotDto[];
}

// Replayed ledger with its parallel lot snapshots
export interface LedgerResponseDto {
  code: string;
  replayId: string;
  replayedAt: string;
  endDate: string;
  currentShares: number;
  entries: LedgerEntryDto[];
  snapshots: LotSnapshotDto[];
}
