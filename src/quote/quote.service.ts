import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import marketDataConfig from '../config/market-data.config';
import { QuoteProvider, QuoteSnapshot } from './interfaces/quote-snapshot.interface';

/**
 * Finnhub quote lookups.
 *
 * Two sequential calls per ticker: /quote for current price and previous close,
 * then /stock/metric for the 52-week range. Never rejects - every transport,
 * status or parse failure becomes a null result (quote call) or missing
 * 52-week fields (metric call).
 */
@Injectable()
export class QuoteService implements QuoteProvider {
  private readonly logger = new Logger(QuoteService.name);

  constructor(
    @Inject(marketDataConfig.KEY)
    private readonly config: ConfigType<typeof marketDataConfig>,
  ) {}

  async fetch(ticker: string): Promise<QuoteSnapshot | null> {
    // c: current price, pc: previous close
    const quote = await this.getJson('/quote', { symbol: ticker });
    if (!quote) {
      return null;
    }

    const metrics = await this.fetchMetrics(ticker);

    return {
      currentPrice: asNumber(quote.c),
      prevClose: asNumber(quote.pc),
      high52w: asNumber(metrics['52WeekHigh']),
      low52w: asNumber(metrics['52WeekLow']),
      high24h: undefined,
      low24h: undefined,
      high1w: undefined,
      low1w: undefined,
    };
  }

  /** Empty map when the metric call fails */
  private async fetchMetrics(ticker: string): Promise<Record<string, unknown>> {
    const body = await this.getJson('/stock/metric', {
      symbol: ticker,
      metric: 'all',
    });
    const metric = body?.metric;
    return isJsonObject(metric) ? metric : {};
  }

  // GET + JSON decode bounded by the configured timeout.
  // Returns null on non-2xx, network error, timeout or a body that is not a JSON object.
  private async getJson(path: string, params: Record<string, string>): Promise<Record<string, unknown> | null> {
    const url = this.buildUrl(path, params);
    const symbol = params.symbol;

    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
      if (!response.ok) {
        this.logger.warn(`GET ${path} failed for ${symbol}: HTTP ${response.status}`);
        return null;
      }

      const body: unknown = await response.json();
      if (!isJsonObject(body)) {
        this.logger.warn(`GET ${path} returned a non-object body for ${symbol}`);
        return null;
      }
      return body;
    } catch (error) {
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      this.logger.warn(`GET ${path} errored for ${symbol}: ${reason}`);
      return null;
    }
  }

  // Token travels in the query string as the provider requires; it is never logged.
  private buildUrl(path: string, params: Record<string, string>): string {
    const query = new URLSearchParams({ ...params, token: this.config.apiToken });
    return `${this.config.baseUrl}${path}?${query.toString()}`;
  }
}

function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
