import { Inject, Injectable, Logger } from '@nestjs/common';
import {
    AuthenticationFailureError,
    DeviceApprovalPendingError,
    describeError,
} from '../common/errors';
import { BROKERAGE_CLIENT, BrokerageClient, BrokerageCredentials } from './brokerage.types';

export enum LoginStatus {
    Authenticated = 'Authenticated',
    DeviceApprovalRequired = 'DeviceApprovalRequired',
    InvalidCredentials = 'InvalidCredentials',
}

type SessionState = 'logged_out' | 'pending_approval' | 'authenticated';

/**
 * The one brokerage session this server holds. Login, logout and approval
 * completion run one at a time so the token is never swapped mid-transition.
 */
@Injectable()
export class SessionService {
    private readonly logger = new Logger(SessionService.name);
    private state: SessionState = 'logged_out';
    private username: string | null = null;
    private transitions: Promise<void> = Promise.resolve();

    constructor(@Inject(BROKERAGE_CLIENT) private readonly brokerage: BrokerageClient) { }

    isAuthenticated(): boolean {
        return this.state === 'authenticated';
    }

    async login(credentials: BrokerageCredentials): Promise<LoginStatus> {
        return this.exclusive(async () => {
            if (this.state === 'authenticated' && this.username === credentials.username) {
                this.logger.log('Already logged in, skipping login');
                return LoginStatus.Authenticated;
            }

            try {
                await this.brokerage.login(credentials);
            } catch (error) {
                if (error instanceof DeviceApprovalPendingError) {
                    this.moveTo('pending_approval', credentials.username);
                    return LoginStatus.DeviceApprovalRequired;
                }
                this.moveTo('logged_out', null);
                if (error instanceof AuthenticationFailureError) {
                    this.logger.warn(`Login rejected for ${credentials.username}: ${error.message}`);
                    return LoginStatus.InvalidCredentials;
                }
                throw error;
            }

            this.moveTo('authenticated', credentials.username);
            return LoginStatus.Authenticated;
        });
    }

    async logout(): Promise<void> {
        await this.exclusive(async () => {
            if (this.state === 'logged_out') return;
            try {
                await this.brokerage.logout();
            } catch (error) {
                this.logger.warn(`Brokerage logout failed: ${describeError(error)}`);
            }
            this.moveTo('logged_out', null);
        });
    }

    /** While a device approval is pending, asks the brokerage whether it went through. */
    async checkLogin(): Promise<boolean> {
        if (this.state !== 'pending_approval') {
            return this.isAuthenticated();
        }

        return this.exclusive(async () => {
            if (this.state !== 'pending_approval') {
                return this.isAuthenticated();
            }
            try {
                if (await this.brokerage.completeDeviceApproval()) {
                    this.moveTo('authenticated', this.username);
                }
            } catch (error) {
                this.logger.warn(`Device approval check failed: ${describeError(error)}`);
                if (error instanceof AuthenticationFailureError) {
                    this.moveTo('logged_out', null);
                }
            }
            return this.isAuthenticated();
        });
    }

    /** Called when the brokerage stops accepting the session token. */
    async invalidate(): Promise<void> {
        await this.exclusive(async () => {
            if (this.state !== 'logged_out') {
                this.logger.warn('Brokerage session expired');
                this.moveTo('logged_out', null);
            }
        });
    }

    private moveTo(state: SessionState, username: string | null) {
        if (state !== this.state) {
            this.logger.log(`Session ${this.state} -> ${state}`);
        }
        this.state = state;
        this.username = username;
    }

    private exclusive<T>(transition: () => Promise<T>): Promise<T> {
        const run = this.transitions.then(transition);
        // Failures reach the caller through `run`; the queue only orders transitions
        this.transitions = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }
}
