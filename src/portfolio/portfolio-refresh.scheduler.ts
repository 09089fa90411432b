import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import portfolioConfig from '../config/portfolio.config';
import { PortfolioService } from './portfolio.service';

/**
 * Loads the portfolio on startup, then refreshes quotes on a fixed interval.
 * Ticks queue behind any running mutation; a tick is skipped while the
 * previous refresh is still pending.
 */
@Injectable()
export class PortfolioRefreshScheduler implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(PortfolioRefreshScheduler.name);
  private timer: NodeJS.Timeout | null = null;
  private pendingRefresh: Promise<void> | null = null;

  constructor(
    private readonly portfolioService: PortfolioService,
    @Inject(portfolioConfig.KEY)
    private readonly config: ConfigType<typeof portfolioConfig>,
  ) {}

  onApplicationBootstrap(): void {
    this.portfolioService.load().catch((error: unknown) => {
      this.logger.error(`Initial portfolio load failed: ${errorMessage(error)}`);
    });

    if (this.config.refreshIntervalMs > 0) {
      this.timer = setInterval(() => this.tick(), this.config.refreshIntervalMs);
      this.logger.log(`Refreshing quotes every ${this.config.refreshIntervalMs}ms`);
    } else {
      this.logger.log('Periodic quote refresh disabled');
    }
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One scheduled refresh - exposed for tests */
  tick(): Promise<void> {
    if (this.pendingRefresh) {
      return this.pendingRefresh;
    }

    this.pendingRefresh = this.portfolioService
      .refreshAll()
      .catch((error: unknown) => {
        this.logger.error(`Scheduled refresh failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.pendingRefresh = null;
      });
    return this.pendingRefresh;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
