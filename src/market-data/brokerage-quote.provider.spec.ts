import { ConfigService } from '@nestjs/config';
import { BrokerageUnavailableError, ProviderUnavailableError, SymbolNotFoundError } from '../common/errors';
import { BrokerageClient, BrokerageQuote } from '../brokerage/brokerage.types';
import { SessionService } from '../brokerage/session.service';
import { aggregatePortfolio } from '../portfolio/portfolio-aggregator';
import { BrokerageQuoteProvider } from './brokerage-quote.provider';
import { QuotesService } from './quotes.service';

const credentials = { username: 'user@example.com', password: 'test-password' };

const acmeQuote: BrokerageQuote = {
    symbol: 'ACME',
    lastTradePrice: 190.5,
    previousClose: 188,
    bidPrice: 190.4,
    bidSize: 300,
    askPrice: 190.6,
    askSize: 100,
    afterHoursPrice: null,
    tradingHalted: false,
};

function fakeBrokerage(): jest.Mocked<BrokerageClient> {
    return {
        login: jest.fn().mockResolvedValue(undefined),
        completeDeviceApproval: jest.fn().mockResolvedValue(false),
        logout: jest.fn().mockResolvedValue(undefined),
        getOpenPositions: jest.fn().mockResolvedValue([]),
        getAccountBalances: jest.fn().mockResolvedValue({ buyingPower: 0, cash: 0 }),
        getQuotes: jest.fn().mockResolvedValue([acmeQuote]),
        searchInstruments: jest.fn().mockResolvedValue([]),
    };
}

describe('BrokerageQuoteProvider', () => {
    let brokerage: jest.Mocked<BrokerageClient>;
    let session: SessionService;
    let provider: BrokerageQuoteProvider;

    beforeEach(() => {
        brokerage = fakeBrokerage();
        session = new SessionService(brokerage);
        provider = new BrokerageQuoteProvider(brokerage, session);
    });

    it('is only available while the session is logged in', async () => {
        expect(provider.isConfigured()).toBe(false);
        await expect(provider.fetchQuote('ACME')).rejects.toThrow('brokerage session is not logged in');
        expect(brokerage.getQuotes).not.toHaveBeenCalled();

        await session.login(credentials);

        expect(provider.isConfigured()).toBe(true);
    });

    it('maps a brokerage quote into a provider record', async () => {
        await session.login(credentials);

        await expect(provider.fetchQuote('ACME')).resolves.toEqual({
            price: 190.5,
            previousClose: 188,
            bidPrice: 190.4,
            bidSize: 300,
            askPrice: 190.6,
            askSize: 100,
            afterHoursPrice: undefined,
            tradingHalted: false,
        });
        expect(brokerage.getQuotes).toHaveBeenCalledWith(['ACME']);
    });

    it('reports a symbol the brokerage does not quote as not found', async () => {
        brokerage.getQuotes.mockResolvedValue([]);
        await session.login(credentials);

        await expect(provider.fetchQuote('ZZZZ')).rejects.toBeInstanceOf(SymbolNotFoundError);
    });

    it('reports a quote without a last trade price as not found', async () => {
        brokerage.getQuotes.mockResolvedValue([{ ...acmeQuote, lastTradePrice: null }]);
        await session.login(credentials);

        await expect(provider.fetchQuote('ACME')).rejects.toBeInstanceOf(SymbolNotFoundError);
    });

    it('wraps brokerage failures as ProviderUnavailable', async () => {
        brokerage.getQuotes.mockRejectedValue(new BrokerageUnavailableError('HTTP 503'));
        await session.login(credentials);

        const error = await provider.fetchQuote('ACME').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ProviderUnavailableError);
        expect(error).toHaveProperty('provider', 'brokerage');
    });

    it('searches brokerage instruments', async () => {
        brokerage.searchInstruments.mockResolvedValue([{ symbol: 'ACME', name: 'Acme', type: 'stock' }]);
        await session.login(credentials);

        await expect(provider.search('acme')).resolves.toEqual([
            { symbol: 'ACME', name: 'Acme', displaySymbol: 'ACME', type: 'stock' },
        ]);
    });

    it('prices holdings when no market data key is configured', async () => {
        await session.login(credentials);
        const quotes = new QuotesService([provider], new ConfigService());

        const snapshot = await aggregatePortfolio(
            [{ symbol: 'ACME', name: 'Acme Corp', quantity: 10, averageCost: 150 }],
            { buyingPower: 500, cash: 450 },
            quotes,
        );

        const [holding] = snapshot.holdings;
        expect(holding.quoteStatus).toBe('live');
        expect(holding.currentPrice).toBe(190.5);
        expect(holding.marketValue).toBe(1905);
        expect(holding.dayChange).toBe(2.5);
        expect(snapshot.stockValue).toBe(1905);
        expect(snapshot.totalValue).toBe(2405);
    });
});
