import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { validateEnvironment } from './config/env.validation';
import marketDataConfig from './config/market-data.config';
import portfolioConfig from './config/portfolio.config';
import { PortfolioModule } from './portfolio/portfolio.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [marketDataConfig, portfolioConfig],
      validate: validateEnvironment,
    }),
    PortfolioModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
