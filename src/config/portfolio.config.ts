import { registerAs } from '@nestjs/config';

export interface PortfolioConfig {
  stateFile: string;
  refreshIntervalMs: number;
}

export default registerAs('portfolio', (): PortfolioConfig => ({
  stateFile: process.env.PORTFOLIO_STATE_FILE ?? 'data/portfolio.json',
  refreshIntervalMs: Number(process.env.REFRESH_INTERVAL_MS ?? 60000),
}));
