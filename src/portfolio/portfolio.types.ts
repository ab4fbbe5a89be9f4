import { QuoteErrorKind } from '../common/errors';

export type QuoteStatus = 'live' | 'unavailable';

export interface Holding {
    symbol: string;
    name: string | null;
    quantity: number;
    averageCost: number;
    costBasis: number;
    /** null when the quote lookup failed */
    currentPrice: number | null;
    previousClose: number | null;
    dayChange: number | null;
    marketValue: number | null;
    /** null ("unavailable") without a price or without a cost basis */
    gainLossAbs: number | null;
    gainLossPct: number | null;
    /** Percent of the invested (stock) value */
    allocationPct: number;
    sector: string | null;
    industry: string | null;
    quoteStatus: QuoteStatus;
    quoteError: QuoteErrorKind | null;
}

export interface SectorAllocation {
    sector: string;
    symbols: string[];
    marketValue: number;
    percentage: number;
}

export interface PortfolioSnapshot {
    holdings: Holding[];
    sectors: SectorAllocation[];
    stockValue: number;
    buyingPower: number;
    cash: number;
    /** stockValue + buyingPower */
    totalValue: number;
    totalCostBasis: number;
    totalGainLoss: number;
    totalGainLossPct: number | null;
    todayChange: number;
    generatedAt: string;
}
