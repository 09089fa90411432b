// One holding with its quote fields and derived metrics.
// Market fields are null until a quote has been fetched.
export interface PositionResponseDto {
  index: number;
  ticker: string;
  buyPrice: number;
  shares: number;
  currentPrice: number | null;
  prevClose: number | null;
  high52w: number | null;
  low52w: number | null;
  high24h: number | null;
  low24h: number | null;
  high1w: number | null;
  low1w: number | null;
  costBasis: number;          // buyPrice * shares
  marketValue: number;        // currentPrice * shares
  dayGain: number;            // per share, vs previous close
  dayGainPercent: number;
  totalGain: number;          // whole position, vs buy price
  totalGainPercent: number;
}
