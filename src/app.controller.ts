import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { PortfolioService } from './portfolio/portfolio.service';

@Controller()
export class AppController {
  constructor(private readonly portfolioService: PortfolioService) {}

  /**
   * Health check. Reports 'starting' until the persisted portfolio has
   * been loaded and its first quote refresh finished.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: this.portfolioService.ready ? 'ok' : 'starting',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'stock-portfolio-tracker',
      positions: this.portfolioService.count,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Stock Portfolio Tracker API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        positions: '/portfolio/positions',
        summary: '/portfolio/summary',
        refresh: '/portfolio/refresh',
      },
    };
  }
}
