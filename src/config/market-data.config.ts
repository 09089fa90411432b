import { registerAs } from '@nestjs/config';

export interface MarketDataConfig {
  baseUrl: string;
  apiToken: string;
  requestTimeoutMs: number;
}

// Finnhub credentials come from the environment, never from source.
export default registerAs('marketData', (): MarketDataConfig => ({
  baseUrl: (process.env.FINNHUB_BASE_URL ?? 'https://finnhub.io/api/v1').replace(/\/+$/, ''),
  apiToken: process.env.FINNHUB_API_TOKEN ?? '',
  requestTimeoutMs: Number(process.env.QUOTE_REQUEST_TIMEOUT_MS ?? 10000),
}));
