import Decimal from 'decimal.js';
import { orZero, percentOf, sum, toDecimal } from '../common/utils/decimal.util';
import { Position } from './entities/position.entity';

// Pure gain/loss derivations. Nothing here is stored; every value is
// recomputed from the positions on demand.
//
// Absent market data counts as 0 (see currentPriceOrZero / prevCloseOrZero)
// and every ratio returns 0 for a zero denominator.

type Valued = Pick<Position, 'buyPrice' | 'shares' | 'currentPrice' | 'prevClose'>;

export function currentPriceOrZero(position: Valued): Decimal {
  return orZero(position.currentPrice);
}

export function prevCloseOrZero(position: Valued): Decimal {
  return orZero(position.prevClose);
}

// ---- per position ----

/** buyPrice × shares */
export function costBasisTotal(position: Valued): Decimal {
  return toDecimal(position.buyPrice).times(position.shares);
}

/** currentPrice × shares */
export function marketValue(position: Valued): Decimal {
  return currentPriceOrZero(position).times(position.shares);
}

/** Per-share change for the session: currentPrice − prevClose */
export function dayGain(position: Valued): Decimal {
  return currentPriceOrZero(position).minus(prevCloseOrZero(position));
}

/**
 * dayGain / prevClose × 100.
 * A missing or zero previous close yields 0.
 */
export function dayGainPercent(position: Valued): Decimal {
  if (prevCloseOrZero(position).isZero()) {
    return new Decimal(0);
  }
  const denominator = position.prevClose === undefined ? new Decimal(1) : toDecimal(position.prevClose);
  return dayGain(position).dividedBy(denominator).times(100);
}

/** (currentPrice − buyPrice) × shares */
export function totalGain(position: Valued): Decimal {
  return currentPriceOrZero(position).minus(position.buyPrice).times(position.shares);
}

export function totalGainPercent(position: Valued): Decimal {
  const buyPrice = toDecimal(position.buyPrice);
  return percentOf(currentPriceOrZero(position).minus(buyPrice), buyPrice);
}

// ---- whole portfolio ----

export function portfolioValue(positions: Valued[]): Decimal {
  return sum(positions.map(marketValue));
}

export function portfolioCost(positions: Valued[]): Decimal {
  return sum(positions.map(costBasisTotal));
}

export function portfolioGain(positions: Valued[]): Decimal {
  return portfolioValue(positions).minus(portfolioCost(positions));
}

export function portfolioGainPercent(positions: Valued[]): Decimal {
  return percentOf(portfolioGain(positions), portfolioCost(positions));
}

/** Σ (currentPrice − prevClose) × shares, each side defaulting to 0 independently */
export function portfolioDayGain(positions: Valued[]): Decimal {
  return sum(positions.map((position) => dayGain(position).times(position.shares)));
}

/** Σ prevClose × shares - the day-gain percentage base */
export function previousCloseValue(positions: Valued[]): Decimal {
  return sum(positions.map((position) => prevCloseOrZero(position).times(position.shares)));
}

export function portfolioDayGainPercent(positions: Valued[]): Decimal {
  return percentOf(portfolioDayGain(positions), previousCloseValue(positions));
}
