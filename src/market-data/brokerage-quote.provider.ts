import { ProviderUnavailableError, SymbolNotFoundError, describeError } from '../common/errors';
import { BrokerageClient, BrokerageQuote } from '../brokerage/brokerage.types';
import { SessionService } from '../brokerage/session.service';
import { ProviderRecord, MarketDataProvider, StockSearchResult } from './market-data.types';

function toRecord(quote: BrokerageQuote): ProviderRecord {
    return {
        price: quote.lastTradePrice ?? undefined,
        previousClose: quote.previousClose ?? undefined,
        bidPrice: quote.bidPrice ?? undefined,
        bidSize: quote.bidSize ?? undefined,
        askPrice: quote.askPrice ?? undefined,
        askSize: quote.askSize ?? undefined,
        afterHoursPrice: quote.afterHoursPrice ?? undefined,
        tradingHalted: quote.tradingHalted,
    };
}

/**
 * Quotes from the logged-in brokerage session. It needs no API key, so it
 * prices holdings on its own when no market data provider is configured, and
 * adds bid/ask and after-hours fields when one is.
 */
export class BrokerageQuoteProvider implements MarketDataProvider {
    readonly name = 'brokerage';
    readonly supplementsQuote = true;

    constructor(
        private readonly brokerage: BrokerageClient,
        private readonly sessionService: SessionService,
    ) { }

    isConfigured(): boolean {
        return this.sessionService.isAuthenticated();
    }

    async fetchQuote(symbol: string): Promise<ProviderRecord> {
        const quotes = await this.call(() => this.brokerage.getQuotes([symbol]));
        const quote = quotes.find((q) => q.symbol.toUpperCase() === symbol);
        if (!quote || quote.lastTradePrice === null) {
            throw new SymbolNotFoundError(symbol);
        }
        return toRecord(quote);
    }

    // The brokerage quote carries no company profile or valuation metrics
    async fetchProfile(): Promise<ProviderRecord> {
        return {};
    }

    async fetchMetrics(): Promise<ProviderRecord> {
        return {};
    }

    async search(query: string): Promise<StockSearchResult[]> {
        const instruments = await this.call(() => this.brokerage.searchInstruments(query));
        return instruments.slice(0, 10).map((instrument) => ({
            symbol: instrument.symbol,
            name: instrument.name,
            displaySymbol: instrument.symbol,
            type: instrument.type,
        }));
    }

    private async call<T>(request: () => Promise<T>): Promise<T> {
        if (!this.isConfigured()) {
            throw new ProviderUnavailableError(this.name, 'brokerage session is not logged in');
        }
        try {
            return await request();
        } catch (error) {
            throw new ProviderUnavailableError(this.name, describeError(error));
        }
    }
}
