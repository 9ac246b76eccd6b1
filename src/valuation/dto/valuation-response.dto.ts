// Point-in-time position and return figures
export interface SnapshotReportDto {
  code: string;
  name: string;
  date: string;
  price: number;
  shares: number;
  marketValue: number;       // shares × price
  contributed: number;       // total paid in
  returned: number;          // redemptions + cash dividends
  netCost: number;           // contributed - returned
  unitCost: number;
  bottleneck: number;        // peak capital at risk
  turnoverRate: number;      // annualized
  realizedGain: number;      // marketValue + returned - contributed
  returnRate: number;        // realizedGain / bottleneck, percent
}

export interface RateResponseDto {
  code: string;
  date: string;
  value: number;
}

export interface TradeVolumeResponseDto {
  code: string;
  freq: string;
  buys: { date: string; cash: number }[];
  sells: { date: string; cash: number }[];
}

export interface ValueSeriesResponseDto {
  code: string;
  points: { date: string; value: number }[];
}

export interface CostSeriesResponseDto {
  code: string;
  points: { date: string; price: number; unitCost: number | null }[];
}

export interface PortfolioIrrResponseDto {
  codes: string[];
  date: string;
  irr: number;
}
