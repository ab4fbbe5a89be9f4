export type ProviderName = 'finnhub' | 'fmp' | 'brokerage';

/**
 * What a single provider reported for a symbol. Every field is optional:
 * providers differ in coverage and one call rarely fills them all.
 */
export interface ProviderRecord {
    name?: string;
    price?: number;
    previousClose?: number;
    dayChange?: number;
    dayChangePct?: number;
    open?: number;
    dayHigh?: number;
    dayLow?: number;
    volume?: number;
    peRatio?: number;
    marketCap?: number;
    beta?: number;
    dividendYield?: number;
    week52High?: number;
    week52Low?: number;
    averageVolume?: number;
    sector?: string;
    industry?: string;
    bidPrice?: number;
    bidSize?: number;
    askPrice?: number;
    askSize?: number;
    afterHoursPrice?: number;
    tradingHalted?: boolean;
}

export type RecordField = keyof ProviderRecord;

export const RECORD_FIELDS = [
    'name',
    'price',
    'previousClose',
    'dayChange',
    'dayChangePct',
    'open',
    'dayHigh',
    'dayLow',
    'volume',
    'peRatio',
    'marketCap',
    'beta',
    'dividendYield',
    'week52High',
    'week52Low',
    'averageVolume',
    'sector',
    'industry',
    'bidPrice',
    'bidSize',
    'askPrice',
    'askSize',
    'afterHoursPrice',
    'tradingHalted',
] as const satisfies readonly RecordField[];

export type DetailField = Exclude<RecordField, 'price'>;

export interface StockDetail {
    symbol: string;
    name: string | null;
    price: number;
    previousClose: number | null;
    dayChange: number | null;
    dayChangePct: number | null;
    open: number | null;
    dayHigh: number | null;
    dayLow: number | null;
    volume: number | null;
    peRatio: number | null;
    marketCap: number | null;
    beta: number | null;
    dividendYield: number | null;
    week52High: number | null;
    week52Low: number | null;
    averageVolume: number | null;
    sector: string | null;
    industry: string | null;
    bidPrice: number | null;
    bidSize: number | null;
    askPrice: number | null;
    askSize: number | null;
    afterHoursPrice: number | null;
    tradingHalted: boolean | null;
    sources: ProviderName[];
    /** Fields no configured provider could resolve. */
    unavailableFields: DetailField[];
}

export interface StockSearchResult {
    symbol: string;
    name: string;
    displaySymbol: string;
    type: string;
}

export interface MarketDataProvider {
    readonly name: ProviderName;
    /** Asked for a quote even when it is not the primary, to fill trading fields. */
    readonly supplementsQuote: boolean;
    /** Whether the provider can take calls right now. */
    isConfigured(): boolean;
    /** Throws SymbolNotFoundError when the provider has no price for the symbol. */
    fetchQuote(symbol: string): Promise<ProviderRecord>;
    fetchProfile(symbol: string): Promise<ProviderRecord>;
    fetchMetrics(symbol: string): Promise<ProviderRecord>;
    search(query: string): Promise<StockSearchResult[]>;
}

/** The slice of the quote client the portfolio aggregator depends on. */
export interface QuoteLookup {
    getQuote(symbol: string): Promise<StockDetail>;
}

export const MARKET_DATA_PROVIDERS = Symbol('MARKET_DATA_PROVIDERS');
