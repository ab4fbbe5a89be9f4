import { AxiosInstance } from 'axios';
import { SymbolNotFoundError } from '../common/errors';
import {
    JsonObject,
    firstDefined,
    objectsIn,
    readNumber,
    readPositive,
    readString,
    toNumber,
} from '../common/payload.util';
import { HttpMarketDataProvider } from './market-data-provider';
import { ProviderRecord, StockSearchResult } from './market-data.types';

export const FMP_BASE_URL = 'https://financialmodelingprep.com/stable';

const SEARCH_LIMIT = 10;

/** "164.08-260.1" -> [164.08, 260.1] */
export function parseYearRange(range: string | undefined): [number | undefined, number | undefined] {
    const match = range?.match(/^\s*([\d.]+)\s*-\s*([\d.]+)\s*$/);
    if (!match) return [undefined, undefined];
    return [toNumber(match[1]), toNumber(match[2])];
}

/** Financial Modeling Prep, "stable" API. Every endpoint answers with an array. */
export class FmpProvider extends HttpMarketDataProvider {
    constructor(apiKey: string | undefined, http: AxiosInstance) {
        super('fmp', apiKey, http);
    }

    protected authParams(apiKey: string): Record<string, string> {
        return { apikey: apiKey };
    }

    private async first(path: string, params: Record<string, string>): Promise<JsonObject | undefined> {
        const [row] = objectsIn(await this.get(path, params));
        return row;
    }

    async fetchQuote(symbol: string): Promise<ProviderRecord> {
        const quote = await this.first('/quote', { symbol });
        const price = readPositive(quote, 'price');
        if (!quote || price === undefined) {
            throw new SymbolNotFoundError(symbol);
        }

        return {
            name: readString(quote, 'name'),
            price,
            previousClose: readPositive(quote, 'previousClose'),
            dayChange: readNumber(quote, 'change'),
            dayChangePct: readNumber(quote, 'changePercentage'),
            open: readPositive(quote, 'open'),
            dayHigh: readPositive(quote, 'dayHigh'),
            dayLow: readPositive(quote, 'dayLow'),
            volume: readNumber(quote, 'volume'),
            marketCap: readPositive(quote, 'marketCap'),
            week52High: readPositive(quote, 'yearHigh'),
            week52Low: readPositive(quote, 'yearLow'),
        };
    }

    async fetchProfile(symbol: string): Promise<ProviderRecord> {
        const profile = await this.first('/profile', { symbol });
        if (!profile) return {};

        const [week52Low, week52High] = parseYearRange(readString(profile, 'range'));
        return {
            name: readString(profile, 'companyName'),
            sector: readString(profile, 'sector'),
            industry: readString(profile, 'industry'),
            beta: readNumber(profile, 'beta'),
            marketCap: firstDefined(readPositive(profile, 'marketCap'), readPositive(profile, 'mktCap')),
            averageVolume: firstDefined(readPositive(profile, 'averageVolume'), readPositive(profile, 'volAvg')),
            week52High,
            week52Low,
        };
    }

    async fetchMetrics(symbol: string): Promise<ProviderRecord> {
        const ratios = await this.first('/ratios-ttm', { symbol });
        return {
            peRatio: readPositive(ratios, 'priceToEarningsRatioTTM'),
            dividendYield: readPositive(ratios, 'dividendYieldTTM'),
        };
    }

    async search(query: string): Promise<StockSearchResult[]> {
        const rows = objectsIn(await this.get('/search-symbol', { query }));

        const results: StockSearchResult[] = [];
        for (const row of rows.slice(0, SEARCH_LIMIT)) {
            const symbol = readString(row, 'symbol');
            if (!symbol) continue;
            results.push({
                symbol,
                name: readString(row, 'name') ?? symbol,
                displaySymbol: symbol,
                type: '',
            });
        }
        return results;
    }
}
