import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BrokerageModule } from './brokerage/brokerage.module';
import { MarketDataModule } from './market-data/market-data.module';
import { PortfolioModule } from './portfolio/portfolio.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    MarketDataModule,
    BrokerageModule,
    PortfolioModule,
  ],
})
export class AppModule { }
