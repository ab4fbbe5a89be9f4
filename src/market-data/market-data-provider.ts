import { Logger } from '@nestjs/common';
import { AxiosInstance, isAxiosError } from 'axios';
import { ProviderUnavailableError, describeError } from '../common/errors';
import {
    MarketDataProvider,
    ProviderName,
    ProviderRecord,
    StockSearchResult,
} from './market-data.types';

export const PROVIDER_TIMEOUT_MS = 10_000;

/**
 * Shared HTTP plumbing for market data providers: API key handling, error
 * classification and a rate-limit circuit breaker. Calls are never retried
 * here; a failed call surfaces as ProviderUnavailableError and the browser
 * decides whether to ask again.
 */
export abstract class HttpMarketDataProvider implements MarketDataProvider {
    protected readonly logger: Logger;
    readonly supplementsQuote = false;

    private circuitOpenUntil = 0;
    private consecutiveRateLimits = 0;
    private readonly MAX_CONSECUTIVE_RATE_LIMITS = 5;
    private readonly CIRCUIT_BREAKER_DURATION = 5 * 60 * 1000; // 5 minutes

    protected constructor(
        readonly name: ProviderName,
        private readonly apiKey: string | undefined,
        private readonly http: AxiosInstance,
    ) {
        this.logger = new Logger(`MarketData:${name}`);
    }

    isConfigured(): boolean {
        return Boolean(this.apiKey);
    }

    get isLimited(): boolean {
        return Date.now() < this.circuitOpenUntil;
    }

    abstract fetchQuote(symbol: string): Promise<ProviderRecord>;
    abstract fetchProfile(symbol: string): Promise<ProviderRecord>;
    abstract fetchMetrics(symbol: string): Promise<ProviderRecord>;
    abstract search(query: string): Promise<StockSearchResult[]>;

    /** Query parameters that carry the API key. */
    protected abstract authParams(apiKey: string): Record<string, string>;

    protected async get(path: string, params: Record<string, string>): Promise<unknown> {
        if (!this.apiKey) {
            throw new ProviderUnavailableError(this.name, 'API key is not configured');
        }
        if (this.isLimited) {
            this.logger.warn(`Circuit is OPEN. Skipping ${path}`);
            throw new ProviderUnavailableError(this.name, 'rate limit circuit is open');
        }

        try {
            const response = await this.http.get<unknown>(path, {
                params: { ...params, ...this.authParams(this.apiKey) },
            });
            this.consecutiveRateLimits = 0;
            return response.data;
        } catch (error) {
            throw this.toProviderError(path, error);
        }
    }

    private toProviderError(path: string, error: unknown): ProviderUnavailableError {
        if (isAxiosError(error) && error.response) {
            const status = error.response.status;
            if (status === 429) {
                this.consecutiveRateLimits++;
                if (this.consecutiveRateLimits >= this.MAX_CONSECUTIVE_RATE_LIMITS) {
                    this.openCircuit();
                }
                this.logger.warn(`Rate limited (429) on ${path}`);
                return new ProviderUnavailableError(this.name, 'rate limited');
            }
            this.logger.error(`${path} failed with HTTP ${status}`);
            return new ProviderUnavailableError(this.name, `HTTP ${status}`);
        }
        const reason = describeError(error);
        this.logger.error(`${path} failed: ${reason}`);
        return new ProviderUnavailableError(this.name, reason);
    }

    private openCircuit() {
        this.circuitOpenUntil = Date.now() + this.CIRCUIT_BREAKER_DURATION;
        this.consecutiveRateLimits = 0;
        this.logger.error(`Circuit OPENED for ${this.CIRCUIT_BREAKER_DURATION / 1000}s after consecutive 429s.`);
    }
}
