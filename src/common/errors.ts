import {
    BadGatewayException,
    HttpException,
    HttpStatus,
    NotFoundException,
    ServiceUnavailableException,
    UnauthorizedException,
} from '@nestjs/common';

export type QuoteErrorKind = 'ProviderUnavailable' | 'SymbolNotFound';

/** The provider answered, but it has no instrument under this symbol. */
export class SymbolNotFoundError extends NotFoundException {
    readonly kind: QuoteErrorKind = 'SymbolNotFound';

    constructor(readonly symbol: string) {
        super(`Symbol ${symbol} not found`);
    }
}

/** Upstream market data failed, was rate limited, or is not configured. */
export class ProviderUnavailableError extends ServiceUnavailableException {
    readonly kind: QuoteErrorKind = 'ProviderUnavailable';

    constructor(readonly provider: string, reason: string) {
        super(`Market data provider ${provider} unavailable: ${reason}`);
    }
}

export class AuthenticationFailureError extends UnauthorizedException {
    constructor(message = 'Invalid username or password') {
        super(message);
    }
}

/**
 * The brokerage accepted the credentials but wants the login confirmed on
 * the account holder's mobile device first.
 */
export class DeviceApprovalPendingError extends HttpException {
    constructor(readonly workflowId: string) {
        super('Approve this device in the brokerage app, then check login again.', HttpStatus.ACCEPTED);
    }
}

export class SessionExpiredError extends UnauthorizedException {
    constructor() {
        super('Not logged in. Please login again.');
    }
}

export class BrokerageUnavailableError extends BadGatewayException {
    constructor(reason: string) {
        super(`Brokerage request failed: ${reason}`);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
