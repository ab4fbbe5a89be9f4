import { AxiosInstance } from 'axios';
import { ProviderUnavailableError, SymbolNotFoundError } from '../common/errors';
import {
    firstDefined,
    isObject,
    objectsIn,
    readNumber,
    readPositive,
    readString,
} from '../common/payload.util';
import { HttpMarketDataProvider } from './market-data-provider';
import { ProviderRecord, StockSearchResult } from './market-data.types';

export const FINNHUB_BASE_URL = 'https://finnhub.io/api/v1';

// Try TTM first, it's what most financial sites show
const PE_FIELDS = ['peTTM', 'peBasicExclExtraTTM', 'peNormalizedAnnual', 'peAnnual'];
const DIVIDEND_YIELD_FIELDS = ['dividendYieldIndicatedAnnual', 'currentDividendYieldTTM'];
const SEARCHABLE_TYPES = new Set(['', 'Common Stock', 'Equity', 'ETP']);
const SEARCH_LIMIT = 10;

export class FinnhubProvider extends HttpMarketDataProvider {
    constructor(apiKey: string | undefined, http: AxiosInstance) {
        super('finnhub', apiKey, http);
    }

    protected authParams(apiKey: string): Record<string, string> {
        return { token: apiKey };
    }

    async fetchQuote(symbol: string): Promise<ProviderRecord> {
        const body = await this.get('/quote', { symbol });
        if (!isObject(body)) {
            throw new ProviderUnavailableError(this.name, 'unexpected quote payload');
        }

        // Unknown symbols come back as all zeros rather than a 404
        const price = readPositive(body, 'c');
        if (price === undefined) {
            throw new SymbolNotFoundError(symbol);
        }

        return {
            price,
            previousClose: readPositive(body, 'pc'),
            dayChange: readNumber(body, 'd'),
            dayChangePct: readNumber(body, 'dp'),
            open: readPositive(body, 'o'),
            dayHigh: readPositive(body, 'h'),
            dayLow: readPositive(body, 'l'),
        };
    }

    async fetchProfile(symbol: string): Promise<ProviderRecord> {
        const profile = await this.get('/stock/profile2', { symbol });
        if (!isObject(profile)) return {};

        const marketCapMillions = readPositive(profile, 'marketCapitalization');
        return {
            name: readString(profile, 'name'),
            marketCap: marketCapMillions !== undefined ? marketCapMillions * 1_000_000 : undefined,
            // profile2 has no sector field; finnhubIndustry is the closest it offers
            sector: firstDefined(
                readString(profile, 'gicsSector'),
                readString(profile, 'sector'),
                readString(profile, 'finnhubIndustry'),
            ),
            industry: firstDefined(
                readString(profile, 'finnhubIndustry'),
                readString(profile, 'gicsSubIndustry'),
                readString(profile, 'industry'),
            ),
        };
    }

    async fetchMetrics(symbol: string): Promise<ProviderRecord> {
        const body = await this.get('/stock/metric', { symbol, metric: 'all' });
        const metric = isObject(body) ? body.metric : undefined;
        if (!isObject(metric)) return {};

        let dividendYield = firstDefined(...DIVIDEND_YIELD_FIELDS.map((field) => readPositive(metric, field)));
        // Reported as a percentage; the detail record carries a fraction
        if (dividendYield !== undefined && dividendYield > 1) {
            dividendYield = dividendYield / 100;
        }

        const averageVolumeMillions = readPositive(metric, '10DayAverageTradingVolume');

        return {
            peRatio: firstDefined(...PE_FIELDS.map((field) => readPositive(metric, field))),
            beta: readNumber(metric, 'beta'),
            dividendYield,
            week52High: readPositive(metric, '52WeekHigh'),
            week52Low: readPositive(metric, '52WeekLow'),
            averageVolume: averageVolumeMillions !== undefined
                ? Math.round(averageVolumeMillions * 1_000_000)
                : undefined,
        };
    }

    async search(query: string): Promise<StockSearchResult[]> {
        const body = await this.get('/search', { q: query });
        const items = isObject(body) ? objectsIn(body.result) : [];

        const results: StockSearchResult[] = [];
        for (const item of items) {
            const symbol = readString(item, 'symbol');
            const type = readString(item, 'type') ?? '';
            if (!symbol || !SEARCHABLE_TYPES.has(type)) continue;

            results.push({
                symbol,
                name: readString(item, 'description') ?? symbol,
                displaySymbol: readString(item, 'displaySymbol') ?? symbol,
                type,
            });
            if (results.length === SEARCH_LIMIT) break;
        }
        return results;
    }
}
