import { Logger } from '@nestjs/common';
import { AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import {
    AuthenticationFailureError,
    BrokerageUnavailableError,
    DeviceApprovalPendingError,
    SessionExpiredError,
    describeError,
} from '../common/errors';
import {
    JsonObject,
    isObject,
    objectsIn,
    readNumber,
    readObject,
    readPositive,
    readString,
} from '../common/payload.util';
import { parseAccountProfile, parseUnifiedAccount } from './account-balances.util';
import {
    AccountBalances,
    BrokerageClient,
    BrokerageCredentials,
    BrokerageInstrument,
    BrokeragePosition,
    BrokerageQuote,
} from './brokerage.types';

export const ROBINHOOD_API_URL = 'https://api.robinhood.com';
const UNIFIED_ACCOUNT_URL = 'https://phoenix.robinhood.com/accounts/unified';
// Public client id of the brokerage's own web app
const OAUTH_CLIENT_ID = 'c82SH0WZOsabOXGP2sxqcj34FxkvfnWRZBKlBjFS';
const TOKEN_EXPIRES_IN = 24 * 60 * 60;

interface PendingApproval {
    workflowId: string;
    credentials: BrokerageCredentials;
    machineId?: string;
}

interface Instrument {
    symbol: string;
    name: string | null;
}

function bodyOf(response: AxiosResponse<unknown>): JsonObject {
    return isObject(response.data) ? response.data : {};
}

/**
 * HTTP client for the brokerage's private API: OAuth password grant bound to
 * a device token, the device-approval workflow, positions and balances.
 */
export class RobinhoodClient implements BrokerageClient {
    private readonly logger = new Logger(RobinhoodClient.name);
    private accessToken: string | null = null;
    private pending: PendingApproval | null = null;
    private readonly instruments = new Map<string, Instrument>();

    constructor(
        private readonly http: AxiosInstance,
        private readonly deviceToken: string,
    ) { }

    async login(credentials: BrokerageCredentials): Promise<void> {
        this.pending = null;
        // A new login replaces whatever session this client held
        await this.revokeToken();
        try {
            await this.requestToken(credentials);
            this.logger.log('Brokerage login successful');
        } catch (error) {
            if (error instanceof DeviceApprovalPendingError) {
                this.pending = { workflowId: error.workflowId, credentials };
                this.logger.log(`Device approval required (workflow ${error.workflowId})`);
            }
            throw error;
        }
    }

    async completeDeviceApproval(): Promise<boolean> {
        const pending = this.pending;
        if (!pending) return this.accessToken !== null;

        const machineId = pending.machineId ?? await this.startApprovalMachine(pending.workflowId);
        pending.machineId = machineId;
        const inquiryPath = `/pathfinder/inquiries/${machineId}/user_view/`;

        const inquiry = bodyOf(await this.send(() => this.http.get<unknown>(inquiryPath)));
        const challenge = readObject(readObject(inquiry, 'context'), 'sheriff_challenge');
        const challengeId = readString(challenge, 'id');
        let status = readString(challenge, 'status');

        if (status !== 'validated' && challengeId && readString(challenge, 'type') === 'prompt') {
            const prompt = bodyOf(await this.send(() => this.http.get<unknown>(`/push/${challengeId}/get_prompts_status/`)));
            status = readString(prompt, 'challenge_status');
        }
        if (status !== 'validated') {
            return false;
        }

        await this.send(() => this.http.post<unknown>(inquiryPath, {
            sequence: 0,
            user_input: { status: 'continue' },
        }));

        this.pending = null;
        try {
            await this.requestToken(pending.credentials);
        } catch (error) {
            if (error instanceof DeviceApprovalPendingError) {
                this.pending = { workflowId: error.workflowId, credentials: pending.credentials };
                return false;
            }
            throw error;
        }
        this.logger.log('Device approved, brokerage login complete');
        return true;
    }

    async logout(): Promise<void> {
        this.pending = null;
        await this.revokeToken();
    }

    async getOpenPositions(): Promise<BrokeragePosition[]> {
        const positions: BrokeragePosition[] = [];
        let url: string | undefined = '/positions/?nonzero=true';

        while (url) {
            const page = await this.authorizedGet(url);
            for (const row of objectsIn(page.results)) {
                const quantity = readNumber(row, 'quantity') ?? 0;
                const instrumentUrl = readString(row, 'instrument');
                if (quantity === 0 || !instrumentUrl) continue;

                const instrument = await this.resolveInstrument(instrumentUrl);
                if (!instrument) {
                    this.logger.warn(`Skipping position with unresolvable instrument ${instrumentUrl}`);
                    continue;
                }
                positions.push({
                    symbol: instrument.symbol,
                    name: instrument.name,
                    quantity,
                    averageCost: readNumber(row, 'average_buy_price') ?? 0,
                });
            }
            url = readString(page, 'next');
        }
        return positions;
    }

    async getAccountBalances(): Promise<AccountBalances> {
        try {
            return parseUnifiedAccount(await this.authorizedGet(UNIFIED_ACCOUNT_URL));
        } catch (error) {
            if (error instanceof SessionExpiredError) throw error;
            this.logger.warn(`Could not load unified account, falling back to account profile: ${describeError(error)}`);
        }

        const profiles = await this.authorizedGet('/accounts/');
        const [profile] = objectsIn(profiles.results);
        if (!profile) {
            throw new BrokerageUnavailableError('no brokerage account found');
        }
        return parseAccountProfile(profile);
    }

    async getQuotes(symbols: string[]): Promise<BrokerageQuote[]> {
        if (symbols.length === 0) return [];

        const body = await this.authorizedGet(`/quotes/?symbols=${symbols.map(encodeURIComponent).join(',')}`);
        const quotes: BrokerageQuote[] = [];
        for (const row of objectsIn(body.results)) {
            const symbol = readString(row, 'symbol');
            if (!symbol) continue;
            quotes.push({
                symbol,
                lastTradePrice: readPositive(row, 'last_trade_price') ?? null,
                previousClose: readPositive(row, 'previous_close') ?? null,
                bidPrice: readPositive(row, 'bid_price') ?? null,
                bidSize: readPositive(row, 'bid_size') ?? null,
                askPrice: readPositive(row, 'ask_price') ?? null,
                askSize: readPositive(row, 'ask_size') ?? null,
                afterHoursPrice: readPositive(row, 'last_extended_hours_trade_price') ?? null,
                tradingHalted: row.trading_halted === true,
            });
        }
        return quotes;
    }

    async searchInstruments(query: string): Promise<BrokerageInstrument[]> {
        const body = await this.authorizedGet(`/instruments/?query=${encodeURIComponent(query)}`);
        const instruments: BrokerageInstrument[] = [];
        for (const row of objectsIn(body.results)) {
            const symbol = readString(row, 'symbol');
            if (!symbol || row.tradeable === false) continue;
            instruments.push({
                symbol,
                name: readString(row, 'simple_name') ?? readString(row, 'name') ?? symbol,
                type: readString(row, 'type') ?? '',
            });
        }
        return instruments;
    }

    private async revokeToken(): Promise<void> {
        const token = this.accessToken;
        this.accessToken = null;
        if (!token) return;

        try {
            await this.http.post('/oauth2/revoke_token/', { client_id: OAUTH_CLIENT_ID, token });
        } catch (error) {
            this.logger.warn(`Token revocation failed: ${describeError(error)}`);
        }
    }

    private async requestToken(credentials: BrokerageCredentials): Promise<void> {
        const payload = {
            client_id: OAUTH_CLIENT_ID,
            expires_in: TOKEN_EXPIRES_IN,
            grant_type: 'password',
            scope: 'internal',
            username: credentials.username,
            password: credentials.password,
            device_token: this.deviceToken,
            challenge_type: 'sms',
            ...(credentials.mfaCode ? { mfa_code: credentials.mfaCode } : {}),
        };
        const response = await this.send(() =>
            this.http.post<unknown>('/oauth2/token/', payload, { validateStatus: () => true }),
        );
        const body = bodyOf(response);

        const token = readString(body, 'access_token');
        if (response.status === 200 && token) {
            this.accessToken = token;
            return;
        }

        const workflowId = readString(readObject(body, 'verification_workflow'), 'id');
        if (workflowId) {
            throw new DeviceApprovalPendingError(workflowId);
        }
        if (body.mfa_required === true) {
            throw new AuthenticationFailureError('An MFA code is required for this account');
        }
        if (response.status === 400 || response.status === 401) {
            throw new AuthenticationFailureError(readString(body, 'detail'));
        }
        throw new BrokerageUnavailableError(`login returned HTTP ${response.status}`);
    }

    private async startApprovalMachine(workflowId: string): Promise<string> {
        const response = await this.send(() => this.http.post<unknown>('/pathfinder/user_machine/', {
            device_id: this.deviceToken,
            flow: 'suv',
            input: { workflow_id: workflowId },
        }));
        const machineId = readString(bodyOf(response), 'id');
        if (!machineId) {
            throw new BrokerageUnavailableError('device approval workflow did not start');
        }
        return machineId;
    }

    private async resolveInstrument(url: string): Promise<Instrument | null> {
        const cached = this.instruments.get(url);
        if (cached) return cached;

        const body = await this.authorizedGet(url);
        const symbol = readString(body, 'symbol');
        if (!symbol) return null;

        const instrument = {
            symbol,
            name: readString(body, 'simple_name') ?? readString(body, 'name') ?? null,
        };
        this.instruments.set(url, instrument);
        return instrument;
    }

    private async authorizedGet(url: string): Promise<JsonObject> {
        const token = this.accessToken;
        if (!token) {
            throw new SessionExpiredError();
        }

        try {
            const response = await this.http.get<unknown>(url, {
                headers: { Authorization: `Bearer ${token}` },
            });
            return bodyOf(response);
        } catch (error) {
            if (isAxiosError(error) && (error.response?.status === 401 || error.response?.status === 403)) {
                this.accessToken = null;
                throw new SessionExpiredError();
            }
            throw new BrokerageUnavailableError(describeError(error));
        }
    }

    private async send(call: () => Promise<AxiosResponse<unknown>>): Promise<AxiosResponse<unknown>> {
        try {
            return await call();
        } catch (error) {
            throw new BrokerageUnavailableError(describeError(error));
        }
    }
}
