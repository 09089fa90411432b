import { Module } from '@nestjs/common';
import { QuoteModule } from '../quote/quote.module';
import { StorageModule } from '../storage/storage.module';
import { PortfolioController } from './portfolio.controller';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioRefreshScheduler } from './portfolio-refresh.scheduler';
import { PortfolioStorageService } from './portfolio-storage.service';
import { PortfolioService } from './portfolio.service';

@Module({
  imports: [QuoteModule, StorageModule],
  controllers: [PortfolioController],
  providers: [
    PortfolioStorageService,
    PortfolioService,         // Mutations: load, add, edit, delete, refreshAll
    PortfolioQueryService,    // Queries: getPositions, getPosition, getSummary
    PortfolioRefreshScheduler,
  ],
  exports: [PortfolioService],
})
export class PortfolioModule {}
