import { Logger } from '@nestjs/common';
import { QuoteErrorKind, SymbolNotFoundError, describeError } from '../common/errors';
import { AccountBalances, BrokeragePosition } from '../brokerage/brokerage.types';
import { QuoteLookup, StockDetail } from '../market-data/market-data.types';
import { Holding, PortfolioSnapshot, SectorAllocation } from './portfolio.types';

export const UNKNOWN_SECTOR = 'Unknown';
const QUOTE_CHUNK_SIZE = 5;

const logger = new Logger('PortfolioAggregator');

type QuoteOutcome = { detail: StockDetail } | { error: QuoteErrorKind };

function percentOf(part: number, whole: number): number {
    return whole > 0 ? (part / whole) * 100 : 0;
}

/** Looks up quotes a chunk at a time; results line up with `symbols`. */
async function lookupQuotes(symbols: string[], quotes: QuoteLookup): Promise<QuoteOutcome[]> {
    const outcomes: QuoteOutcome[] = [];
    for (let i = 0; i < symbols.length; i += QUOTE_CHUNK_SIZE) {
        const chunk = symbols.slice(i, i + QUOTE_CHUNK_SIZE);
        const chunkOutcomes = await Promise.all(chunk.map(async (symbol): Promise<QuoteOutcome> => {
            try {
                return { detail: await quotes.getQuote(symbol) };
            } catch (error) {
                logger.warn(`Quote unavailable for ${symbol}: ${describeError(error)}`);
                return { error: error instanceof SymbolNotFoundError ? 'SymbolNotFound' : 'ProviderUnavailable' };
            }
        }));
        outcomes.push(...chunkOutcomes);
    }
    return outcomes;
}

export function buildHolding(position: BrokeragePosition, outcome: QuoteOutcome): Omit<Holding, 'allocationPct'> {
    const { symbol, quantity, averageCost } = position;
    const costBasis = quantity * averageCost;

    if ('error' in outcome) {
        return {
            symbol,
            name: position.name,
            quantity,
            averageCost,
            costBasis,
            currentPrice: null,
            previousClose: null,
            dayChange: null,
            marketValue: null,
            gainLossAbs: null,
            gainLossPct: null,
            sector: null,
            industry: null,
            quoteStatus: 'unavailable',
            quoteError: outcome.error,
        };
    }

    const { detail } = outcome;
    const currentPrice = detail.price;
    const marketValue = quantity * currentPrice;
    // A zero cost basis (gifted or transferred shares) has no meaningful return
    const hasCostBasis = averageCost > 0;

    return {
        symbol,
        name: position.name ?? detail.name,
        quantity,
        averageCost,
        costBasis,
        currentPrice,
        previousClose: detail.previousClose,
        dayChange: detail.dayChange,
        marketValue,
        gainLossAbs: hasCostBasis ? marketValue - costBasis : null,
        gainLossPct: hasCostBasis ? ((currentPrice - averageCost) / averageCost) * 100 : null,
        sector: detail.sector,
        industry: detail.industry,
        quoteStatus: 'live',
        quoteError: null,
    };
}

export function sectorOf(holding: Pick<Holding, 'sector'>): string {
    const sector = holding.sector?.trim();
    return sector && sector.toUpperCase() !== 'N/A' ? sector : UNKNOWN_SECTOR;
}

/**
 * One bucket per sector, every holding in exactly one of them. Buckets are
 * ordered by market value, ties keep first-seen order.
 */
export function groupBySector(holdings: Holding[], stockValue: number): SectorAllocation[] {
    const buckets = new Map<string, SectorAllocation>();
    for (const holding of holdings) {
        const sector = sectorOf(holding);
        let bucket = buckets.get(sector);
        if (!bucket) {
            bucket = { sector, symbols: [], marketValue: 0, percentage: 0 };
            buckets.set(sector, bucket);
        }
        bucket.symbols.push(holding.symbol);
        bucket.marketValue += holding.marketValue ?? 0;
    }

    return [...buckets.values()]
        .map((bucket) => ({ ...bucket, percentage: percentOf(bucket.marketValue, stockValue) }))
        .sort((a, b) => b.marketValue - a.marketValue);
}

export async function aggregatePortfolio(
    positions: BrokeragePosition[],
    balances: AccountBalances,
    quotes: QuoteLookup,
    now: Date = new Date(),
): Promise<PortfolioSnapshot> {
    const open = positions.filter((position) => position.quantity !== 0);
    const outcomes = await lookupQuotes(open.map((position) => position.symbol), quotes);
    const built = open.map((position, index) => buildHolding(position, outcomes[index]));

    const stockValue = built.reduce((sum, h) => sum + (h.marketValue ?? 0), 0);
    const holdings: Holding[] = built.map((h) => ({
        ...h,
        allocationPct: percentOf(h.marketValue ?? 0, stockValue),
    }));

    let totalCostBasis = 0;
    let totalGainLoss = 0;
    let todayChange = 0;
    for (const holding of holdings) {
        if (holding.gainLossAbs !== null) {
            totalCostBasis += holding.costBasis;
            totalGainLoss += holding.gainLossAbs;
        }
        if (holding.dayChange !== null) {
            todayChange += holding.quantity * holding.dayChange;
        }
    }

    return {
        holdings,
        sectors: groupBySector(holdings, stockValue),
        stockValue,
        buyingPower: balances.buyingPower,
        cash: balances.cash,
        totalValue: stockValue + balances.buyingPower,
        totalCostBasis,
        totalGainLoss,
        totalGainLossPct: totalCostBasis > 0 ? (totalGainLoss / totalCostBasis) * 100 : null,
        todayChange,
        generatedAt: now.toISOString(),
    };
}
