import { Injectable } from '@nestjs/common';
import { toNumber, toPercent } from '../common/utils/decimal.util';
import { Position } from './entities/position.entity';
import { PortfolioSummaryResponseDto } from './dto/portfolio-summary-response.dto';
import { PositionResponseDto } from './dto/position-response.dto';
import { PortfolioService } from './portfolio.service';
import {
  costBasisTotal,
  dayGain,
  dayGainPercent,
  marketValue,
  portfolioCost,
  portfolioDayGain,
  portfolioDayGainPercent,
  portfolioGain,
  portfolioGainPercent,
  portfolioValue,
  totalGain,
  totalGainPercent,
} from './portfolio-valuation';

// Read-only views over the portfolio.
// Queries separated from mutations; metrics are derived on every call, never stored.
@Injectable()
export class PortfolioQueryService {
  constructor(private readonly portfolioService: PortfolioService) {}

  /** All positions in list order with per-position metrics */
  getPositions(): PositionResponseDto[] {
    return this.portfolioService.getPositions().map((position, index) => toPositionResponse(position, index));
  }

  /** @throws PositionIndexOutOfRangeException */
  getPosition(index: number): PositionResponseDto {
    return toPositionResponse(this.portfolioService.getPosition(index), index);
  }

  /**
   * Portfolio totals. Money values keep 8 decimal places,
   * percentages are rounded to 2.
   */
  getSummary(): PortfolioSummaryResponseDto {
    const positions = this.portfolioService.getPositions();

    return {
      positionCount: positions.length,
      totalValue: toNumber(portfolioValue(positions)),
      totalCost: toNumber(portfolioCost(positions)),
      totalGain: toNumber(portfolioGain(positions)),
      totalGainPercent: toPercent(portfolioGainPercent(positions)),
      dayGain: toNumber(portfolioDayGain(positions)),
      dayGainPercent: toPercent(portfolioDayGainPercent(positions)),
      loading: this.portfolioService.loading,
      ready: this.portfolioService.ready,
    };
  }
}

function toPositionResponse(position: Position, index: number): PositionResponseDto {
  return {
    index,
    ticker: position.ticker,
    buyPrice: position.buyPrice,
    shares: position.shares,
    currentPrice: position.currentPrice ?? null,
    prevClose: position.prevClose ?? null,
    high52w: position.high52w ?? null,
    low52w: position.low52w ?? null,
    high24h: position.high24h ?? null,
    low24h: position.low24h ?? null,
    high1w: position.high1w ?? null,
    low1w: position.low1w ?? null,
    costBasis: toNumber(costBasisTotal(position)),
    marketValue: toNumber(marketValue(position)),
    dayGain: toNumber(dayGain(position)),
    dayGainPercent: toPercent(dayGainPercent(position)),
    totalGain: toNumber(totalGain(position)),
    totalGainPercent: toPercent(totalGainPercent(position)),
  };
}
