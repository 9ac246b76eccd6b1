// Summary of a registered instrument
export interface InstrumentResponseDto {
  code: string;
  name: string;
  priceCount: number;
  firstPriceDate: string | null;
  lastPriceDate: string | null;
  corporateActionCount: number;
  lockDateCount: number;
}
