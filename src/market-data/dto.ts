import { DetailField, StockDetail, StockSearchResult } from './market-data.types';

const FIELD_NAMES: Record<DetailField, string> = {
    name: 'name',
    previousClose: 'previous_close',
    dayChange: 'day_change',
    dayChangePct: 'day_change_pct',
    open: 'open',
    dayHigh: 'day_high',
    dayLow: 'day_low',
    volume: 'volume',
    peRatio: 'pe_ratio',
    marketCap: 'market_cap',
    beta: 'beta',
    dividendYield: 'dividend_yield',
    week52High: 'week52_high',
    week52Low: 'week52_low',
    averageVolume: 'average_volume',
    sector: 'sector',
    industry: 'industry',
    bidPrice: 'bid',
    bidSize: 'bid_size',
    askPrice: 'ask',
    askSize: 'ask_size',
    afterHoursPrice: 'after_hours_price',
    tradingHalted: 'trading_halted',
};

export interface StockDetailDto {
    symbol: string;
    name: string | null;
    price: number;
    previous_close: number | null;
    day_change: number | null;
    day_change_pct: number | null;
    open: number | null;
    day_high: number | null;
    day_low: number | null;
    volume: number | null;
    pe_ratio: number | null;
    market_cap: number | null;
    beta: number | null;
    dividend_yield: number | null;
    week52_high: number | null;
    week52_low: number | null;
    average_volume: number | null;
    sector: string | null;
    industry: string | null;
    bid: number | null;
    bid_size: number | null;
    ask: number | null;
    ask_size: number | null;
    after_hours_price: number | null;
    trading_halted: boolean | null;
    sources: string[];
    unavailable_fields: string[];
}

export interface StockSearchResultDto {
    symbol: string;
    name: string;
    display_symbol: string;
    type: string;
}

export function toStockDetailDto(detail: StockDetail): StockDetailDto {
    return {
        symbol: detail.symbol,
        name: detail.name,
        price: detail.price,
        previous_close: detail.previousClose,
        day_change: detail.dayChange,
        day_change_pct: detail.dayChangePct,
        open: detail.open,
        day_high: detail.dayHigh,
        day_low: detail.dayLow,
        volume: detail.volume,
        pe_ratio: detail.peRatio,
        market_cap: detail.marketCap,
        beta: detail.beta,
        dividend_yield: detail.dividendYield,
        week52_high: detail.week52High,
        week52_low: detail.week52Low,
        average_volume: detail.averageVolume,
        sector: detail.sector,
        industry: detail.industry,
        bid: detail.bidPrice,
        bid_size: detail.bidSize,
        ask: detail.askPrice,
        ask_size: detail.askSize,
        after_hours_price: detail.afterHoursPrice,
        trading_halted: detail.tradingHalted,
        sources: [...detail.sources],
        unavailable_fields: detail.unavailableFields.map((field) => FIELD_NAMES[field]),
    };
}

export function toSearchResultDto(result: StockSearchResult): StockSearchResultDto {
    return {
        symbol: result.symbol,
        name: result.name,
        display_symbol: result.displaySymbol,
        type: result.type,
    };
}
