import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderUnavailableError, SymbolNotFoundError, describeError } from '../common/errors';
import {
    MARKET_DATA_PROVIDERS,
    MarketDataProvider,
    ProviderName,
    ProviderRecord,
    QuoteLookup,
    StockDetail,
    StockSearchResult,
} from './market-data.types';
import { fillMissing, hasSectorAndIndustry, toStockDetail } from './record-merge.util';

const SYMBOL_PATTERN = /^[A-Z0-9.\-^]{1,12}$/;
const DEFAULT_CACHE_TTL_MS = 60 * 1000;

/** "quote" skips the basic-financials call; the portfolio only needs price and sector. */
type LookupDepth = 'quote' | 'full';

interface CachedDetail {
    detail: StockDetail;
    storedAt: number;
}

export function normalizeSymbol(symbol: string): string {
    const normalized = symbol.trim().toUpperCase();
    if (!SYMBOL_PATTERN.test(normalized)) {
        throw new SymbolNotFoundError(normalized || symbol);
    }
    return normalized;
}

@Injectable()
export class QuotesService implements QuoteLookup {
    private readonly logger = new Logger(QuotesService.name);
    private readonly cache = new Map<string, CachedDetail>();
    private readonly cacheTtlMs: number;

    constructor(
        @Inject(MARKET_DATA_PROVIDERS) private readonly providers: MarketDataProvider[],
        configService: ConfigService,
    ) {
        const ttl = Number(configService.get<string>('QUOTE_CACHE_TTL_MS'));
        this.cacheTtlMs = Number.isFinite(ttl) && ttl >= 0 ? ttl : DEFAULT_CACHE_TTL_MS;

        if (providers.every((provider) => provider.name === 'brokerage')) {
            this.logger.warn('No market data API key configured (set FINNHUB_API_KEY or FMP_API_KEY); quotes need a brokerage login');
        }
        if (providers.length > 0) {
            this.logger.log(`Market data providers in priority order: ${providers.map((p) => p.name).join(', ')}`);
        }
    }

    getStockDetail(symbol: string): Promise<StockDetail> {
        return this.lookup(symbol, 'full');
    }

    getQuote(symbol: string): Promise<StockDetail> {
        return this.lookup(symbol, 'quote');
    }

    async searchStocks(query: string): Promise<StockSearchResult[]> {
        const trimmed = query.trim();
        if (!trimmed) return [];
        return this.primary().search(trimmed);
    }

    /** Providers able to take calls now, first one primary. */
    private available(): [MarketDataProvider, ...MarketDataProvider[]] {
        const [primary, ...secondaries] = this.providers.filter((provider) => provider.isConfigured());
        if (!primary) {
            throw new ProviderUnavailableError('none', 'no market data provider is available');
        }
        return [primary, ...secondaries];
    }

    private primary(): MarketDataProvider {
        return this.available()[0];
    }

    private async lookup(rawSymbol: string, depth: LookupDepth): Promise<StockDetail> {
        const symbol = normalizeSymbol(rawSymbol);
        const cached = this.fromCache(symbol, depth);
        if (cached) {
            this.logger.debug(`Returning cached ${depth} data for ${symbol}`);
            return cached;
        }

        const [primary, ...secondaries] = this.available();
        const sources: ProviderName[] = [primary.name];

        // The quote decides whether the symbol exists; everything after it is best effort
        let record = await primary.fetchQuote(symbol);
        record = fillMissing(record, await this.optional(primary, 'profile', () => primary.fetchProfile(symbol))).record;
        if (depth === 'full') {
            record = fillMissing(record, await this.optional(primary, 'metrics', () => primary.fetchMetrics(symbol))).record;
        }

        for (const secondary of secondaries) {
            let filled = false;
            if (secondary.supplementsQuote) {
                const merged = fillMissing(record, await this.optional(secondary, 'quote', () => secondary.fetchQuote(symbol)));
                record = merged.record;
                filled = merged.filled.length > 0;
            }
            if (!hasSectorAndIndustry(record)) {
                const merged = fillMissing(record, await this.optional(secondary, 'profile', () => secondary.fetchProfile(symbol)));
                record = merged.record;
                filled = filled || merged.filled.length > 0;
            }
            if (filled) {
                sources.push(secondary.name);
            }
        }

        const detail = toStockDetail(symbol, record, sources);
        this.cache.set(`${depth}:${symbol}`, { detail, storedAt: Date.now() });
        return detail;
    }

    private fromCache(symbol: string, depth: LookupDepth): StockDetail | undefined {
        // A full lookup answers a quote lookup too
        const keys = depth === 'quote' ? [`full:${symbol}`, `quote:${symbol}`] : [`full:${symbol}`];
        for (const key of keys) {
            const entry = this.cache.get(key);
            if (!entry) continue;
            if (Date.now() - entry.storedAt < this.cacheTtlMs) return entry.detail;
            this.cache.delete(key);
        }
        return undefined;
    }

    /** Fields beyond the quote are optional; a failure leaves them empty. */
    private async optional(
        provider: MarketDataProvider,
        what: string,
        call: () => Promise<ProviderRecord>,
    ): Promise<ProviderRecord> {
        try {
            return await call();
        } catch (error) {
            this.logger.warn(`${provider.name} ${what} unavailable: ${describeError(error)}`);
            return {};
        }
    }
}
