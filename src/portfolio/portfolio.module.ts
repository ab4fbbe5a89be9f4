import { Module } from '@nestjs/common';
import { BrokerageModule } from '../brokerage/brokerage.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';

@Module({
    imports: [BrokerageModule, MarketDataModule],
    controllers: [PortfolioController],
    providers: [PortfolioService],
})
export class PortfolioModule { }
