export interface BrokerageCredentials {
    username: string;
    password: string;
    mfaCode?: string;
}

/** One open position as the brokerage reports it, before any market data. */
export interface BrokeragePosition {
    symbol: string;
    name: string | null;
    quantity: number;
    averageCost: number;
}

/** The brokerage's own quote for a symbol; absent values are null. */
export interface BrokerageQuote {
    symbol: string;
    lastTradePrice: number | null;
    previousClose: number | null;
    bidPrice: number | null;
    bidSize: number | null;
    askPrice: number | null;
    askSize: number | null;
    afterHoursPrice: number | null;
    tradingHalted: boolean;
}

export interface BrokerageInstrument {
    symbol: string;
    name: string;
    type: string;
}

export interface AccountBalances {
    buyingPower: number;
    cash: number;
}

/**
 * The brokerage's private API. Implementations signal outcomes the way the
 * brokerage does, with exceptions:
 * - login throws AuthenticationFailureError for bad credentials and
 *   DeviceApprovalPendingError when the login must be confirmed on a device;
 * - data calls throw SessionExpiredError once the token is no longer accepted.
 */
export interface BrokerageClient {
    login(credentials: BrokerageCredentials): Promise<void>;
    /** Resolves true once a pending device approval went through and a token was issued. */
    completeDeviceApproval(): Promise<boolean>;
    logout(): Promise<void>;
    getOpenPositions(): Promise<BrokeragePosition[]>;
    getAccountBalances(): Promise<AccountBalances>;
    /** Quotes for the symbols the brokerage knows; unknown symbols are left out. */
    getQuotes(symbols: string[]): Promise<BrokerageQuote[]>;
    searchInstruments(query: string): Promise<BrokerageInstrument[]>;
}

export const BROKERAGE_CLIENT = Symbol('BROKERAGE_CLIENT');
