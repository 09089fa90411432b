// Whole-portfolio metrics
export interface PortfolioSummaryResponseDto {
  positionCount: number;
  totalValue: number;
  totalCost: number;
  totalGain: number;
  totalGainPercent: number;
  dayGain: number;
  dayGainPercent: number;
  loading: boolean;           // a quote fetch is in flight
  ready: boolean;             // initial load has completed
}
