import { QuoteSnapshot } from '../../quote/interfaces/quote-snapshot.interface';
import { InvalidPositionException } from '../portfolio.errors';

// User-entered part of a holding - the only fields that are persisted.
export interface PositionInput {
  ticker: string;
  buyPrice: number;         // cost basis per share
  shares: number;           // whole shares
}

// A tracked holding. Market fields are filled by quote refreshes and are
// undefined until the first successful fetch.
export interface Position extends PositionInput, QuoteSnapshot {}

export const MARKET_DATA_FIELDS = [
  'currentPrice',
  'prevClose',
  'high52w',
  'low52w',
  'high24h',
  'low24h',
  'high1w',
  'low1w',
] as const satisfies ReadonlyArray<keyof QuoteSnapshot>;

/**
 * Builds a position with no market data.
 * Ticker is trimmed and upper-cased.
 * @throws InvalidPositionException on empty ticker, negative/non-finite price or non-positive/fractional shares
 */
export function createPosition(input: PositionInput): Position {
  const ticker = input.ticker.trim().toUpperCase();
  const problems: string[] = [];

  if (ticker.length === 0) {
    problems.push('ticker must not be empty');
  }
  if (!Number.isFinite(input.buyPrice) || input.buyPrice < 0) {
    problems.push(`buyPrice must be a finite number >= 0, got ${input.buyPrice}`);
  }
  if (!Number.isInteger(input.shares) || input.shares <= 0) {
    problems.push(`shares must be a positive integer, got ${input.shares}`);
  }

  if (problems.length > 0) {
    throw new InvalidPositionException(problems);
  }

  return { ticker, buyPrice: input.buyPrice, shares: input.shares };
}

/** Overwrites every market field, including ones the snapshot leaves undefined. */
export function applyQuote(position: Position, snapshot: QuoteSnapshot): void {
  for (const field of MARKET_DATA_FIELDS) {
    position[field] = snapshot[field];
  }
}

export function toPositionInput(position: Position): PositionInput {
  return { ticker: position.ticker, buyPrice: position.buyPrice, shares: position.shares };
}
