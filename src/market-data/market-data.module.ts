import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import axios from 'axios';
import { BrokerageModule } from '../brokerage/brokerage.module';
import { BROKERAGE_CLIENT, BrokerageClient } from '../brokerage/brokerage.types';
import { SessionService } from '../brokerage/session.service';
import { BrokerageQuoteProvider } from './brokerage-quote.provider';
import { FINNHUB_BASE_URL, FinnhubProvider } from './finnhub.provider';
import { FMP_BASE_URL, FmpProvider } from './fmp.provider';
import { PROVIDER_TIMEOUT_MS } from './market-data-provider';
import { MARKET_DATA_PROVIDERS, MarketDataProvider } from './market-data.types';
import { QuotesService } from './quotes.service';
import { StocksController } from './stocks.controller';

/**
 * Providers in priority order. Keyed providers are kept only when their key is
 * set; the brokerage provider comes last and takes calls while logged in.
 */
function createProviders(
    configService: ConfigService,
    brokerage: BrokerageClient,
    sessionService: SessionService,
): MarketDataProvider[] {
    const keyed: MarketDataProvider[] = [
        new FinnhubProvider(
            configService.get<string>('FINNHUB_API_KEY'),
            axios.create({ baseURL: FINNHUB_BASE_URL, timeout: PROVIDER_TIMEOUT_MS }),
        ),
        new FmpProvider(
            configService.get<string>('FMP_API_KEY'),
            axios.create({ baseURL: FMP_BASE_URL, timeout: PROVIDER_TIMEOUT_MS }),
        ),
    ];
    return [
        ...keyed.filter((provider) => provider.isConfigured()),
        new BrokerageQuoteProvider(brokerage, sessionService),
    ];
}

@Module({
    imports: [ConfigModule, BrokerageModule],
    controllers: [StocksController],
    providers: [
        {
            provide: MARKET_DATA_PROVIDERS,
            useFactory: createProviders,
            inject: [ConfigService, BROKERAGE_CLIENT, SessionService],
        },
        QuotesService,
    ],
    exports: [QuotesService],
})
export class MarketDataModule { }
