// Market-data fields returned by one refresh fetch for a ticker.
// A field is undefined when the provider does not supply it.
export interface QuoteSnapshot {
  currentPrice?: number;
  prevClose?: number;
  high52w?: number;
  low52w?: number;
  high24h?: number;   // not offered by Finnhub
  low24h?: number;    // not offered by Finnhub
  high1w?: number;    // not offered by Finnhub
  low1w?: number;     // not offered by Finnhub
}

export interface QuoteProvider {
  fetch(ticker: string): Promise<QuoteSnapshot | null>;
}
