import { ProviderUnavailableError, SymbolNotFoundError } from '../common/errors';
import { BrokeragePosition } from '../brokerage/brokerage.types';
import { ProviderRecord, QuoteLookup, StockDetail } from '../market-data/market-data.types';
import { toStockDetail } from '../market-data/record-merge.util';
import { aggregatePortfolio, groupBySector, sectorOf } from './portfolio-aggregator';
import { Holding } from './portfolio.types';

function quotesFrom(records: Record<string, ProviderRecord | Error>): QuoteLookup {
    return {
        getQuote: async (symbol: string): Promise<StockDetail> => {
            const record = records[symbol];
            if (record === undefined) throw new SymbolNotFoundError(symbol);
            if (record instanceof Error) throw record;
            return toStockDetail(symbol, record, ['finnhub']);
        },
    };
}

const position = (symbol: string, quantity: number, averageCost: number): BrokeragePosition => ({
    symbol,
    name: null,
    quantity,
    averageCost,
});

const generatedAt = new Date('2024-03-01T15:30:00.000Z');

describe('aggregatePortfolio', () => {
    const quotes = quotesFrom({
        AAPL: { name: 'Apple Inc', price: 190, previousClose: 188, dayChange: 2, sector: 'Technology' },
        XOM: { name: 'Exxon Mobil', price: 110, previousClose: 110.5, dayChange: -0.5, sector: 'Energy' },
        GIFT: { name: 'Gifted Shares Co', price: 40 },
        DOWN: new ProviderUnavailableError('finnhub', 'rate limited'),
    });
    const positions = [
        position('AAPL', 10, 150),
        position('XOM', 20, 100),
        position('GIFT', 5, 0),
        position('BAD', 3, 50),
        position('DOWN', 1, 10),
    ];

    it('adds buying power to the market value of the holdings', async () => {
        const snapshot = await aggregatePortfolio(positions, { buyingPower: 6223.47, cash: 6000 }, quotes, generatedAt);

        expect(snapshot.stockValue).toBe(4300);
        expect(snapshot.buyingPower).toBe(6223.47);
        expect(snapshot.cash).toBe(6000);
        expect(snapshot.totalValue).toBeCloseTo(10523.47, 6);
        expect(snapshot.generatedAt).toBe('2024-03-01T15:30:00.000Z');
    });

    it('keeps the brokerage order', async () => {
        const snapshot = await aggregatePortfolio(positions, { buyingPower: 0, cash: 0 }, quotes);
        expect(snapshot.holdings.map((h) => h.symbol)).toEqual(['AAPL', 'XOM', 'GIFT', 'BAD', 'DOWN']);
    });

    it('computes gain and loss per holding', async () => {
        const { holdings } = await aggregatePortfolio(positions, { buyingPower: 0, cash: 0 }, quotes);
        const [aapl] = holdings;

        expect(aapl.name).toBe('Apple Inc');
        expect(aapl.costBasis).toBe(1500);
        expect(aapl.marketValue).toBe(1900);
        expect(aapl.gainLossAbs).toBe(400);
        expect(aapl.gainLossPct).toBeCloseTo(26.6667, 4);
        expect(aapl.allocationPct).toBeCloseTo(44.186, 3);
        expect(aapl.quoteStatus).toBe('live');
    });

    it('leaves gain and loss unavailable without a cost basis', async () => {
        const { holdings } = await aggregatePortfolio(positions, { buyingPower: 0, cash: 0 }, quotes);
        const gift = holdings[2];

        expect(gift.marketValue).toBe(200);
        expect(gift.gainLossAbs).toBeNull();
        expect(gift.gainLossPct).toBeNull();
    });

    it('flags holdings whose quote failed and counts them as zero', async () => {
        const { holdings } = await aggregatePortfolio(positions, { buyingPower: 0, cash: 0 }, quotes);
        const [bad, down] = holdings.slice(3);

        expect(bad).toEqual(expect.objectContaining({
            currentPrice: null,
            marketValue: null,
            gainLossAbs: null,
            allocationPct: 0,
            quoteStatus: 'unavailable',
            quoteError: 'SymbolNotFound',
        }));
        expect(bad.costBasis).toBe(150);
        expect(down.quoteError).toBe('ProviderUnavailable');
    });

    it('totals only holdings with a known gain', async () => {
        const snapshot = await aggregatePortfolio(positions, { buyingPower: 0, cash: 0 }, quotes);

        expect(snapshot.totalCostBasis).toBe(3500);
        expect(snapshot.totalGainLoss).toBe(600);
        expect(snapshot.totalGainLossPct).toBeCloseTo(17.142857, 5);
        expect(snapshot.todayChange).toBe(10);
    });

    it('buckets holdings by sector, largest first', async () => {
        const { sectors } = await aggregatePortfolio(positions, { buyingPower: 0, cash: 0 }, quotes);

        expect(sectors.map((s) => [s.sector, s.symbols, s.marketValue])).toEqual([
            ['Energy', ['XOM'], 2200],
            ['Technology', ['AAPL'], 1900],
            ['Unknown', ['GIFT', 'BAD', 'DOWN'], 200],
        ]);
        expect(sectors.reduce((sum, s) => sum + s.percentage, 0)).toBeCloseTo(100);
    });

    it('skips zero-quantity positions', async () => {
        const snapshot = await aggregatePortfolio([position('AAPL', 0, 150)], { buyingPower: 25, cash: 25 }, quotes);

        expect(snapshot.holdings).toEqual([]);
        expect(snapshot.sectors).toEqual([]);
        expect(snapshot.totalValue).toBe(25);
        expect(snapshot.totalGainLossPct).toBeNull();
    });

    it('looks up at most five quotes at a time', async () => {
        let inFlight = 0;
        let peak = 0;
        const symbols = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];
        const lookup: QuoteLookup = {
            getQuote: async (symbol) => {
                inFlight++;
                peak = Math.max(peak, inFlight);
                await new Promise<void>((resolve) => setImmediate(() => resolve()));
                inFlight--;
                return toStockDetail(symbol, { price: 1 }, ['finnhub']);
            },
        };

        const snapshot = await aggregatePortfolio(symbols.map((s) => position(s, 1, 1)), { buyingPower: 0, cash: 0 }, lookup);

        expect(peak).toBe(5);
        expect(snapshot.holdings.map((h) => h.symbol)).toEqual(symbols);
    });
});

describe('sector grouping', () => {
    it('sends blank and N/A sectors to Unknown', () => {
        expect(sectorOf({ sector: null })).toBe('Unknown');
        expect(sectorOf({ sector: '  ' })).toBe('Unknown');
        expect(sectorOf({ sector: 'N/A' })).toBe('Unknown');
        expect(sectorOf({ sector: 'Utilities' })).toBe('Utilities');
    });

    it('keeps first-seen order for equal values', () => {
        const holding = (symbol: string, sector: string, marketValue: number): Holding => ({
            symbol,
            name: null,
            quantity: 1,
            averageCost: 1,
            costBasis: 1,
            currentPrice: marketValue,
            previousClose: null,
            dayChange: null,
            marketValue,
            gainLossAbs: null,
            gainLossPct: null,
            allocationPct: 0,
            sector,
            industry: null,
            quoteStatus: 'live',
            quoteError: null,
        });

        const sectors = groupBySector([holding('B', 'Utilities', 50), holding('A', 'Materials', 50)], 100);

        expect(sectors.map((s) => s.sector)).toEqual(['Utilities', 'Materials']);
        expect(sectors[0].percentage).toBe(50);
    });
});
