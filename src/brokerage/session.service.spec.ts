import { Test } from '@nestjs/testing';
import {
    AuthenticationFailureError,
    BrokerageUnavailableError,
    DeviceApprovalPendingError,
} from '../common/errors';
import { BROKERAGE_CLIENT, BrokerageClient } from './brokerage.types';
import { LoginStatus, SessionService } from './session.service';

const credentials = { username: 'user@example.com', password: 'test-password' };

describe('SessionService', () => {
    let service: SessionService;
    let brokerage: jest.Mocked<BrokerageClient>;

    beforeEach(async () => {
        brokerage = {
            login: jest.fn().mockResolvedValue(undefined),
            completeDeviceApproval: jest.fn().mockResolvedValue(false),
            logout: jest.fn().mockResolvedValue(undefined),
            getOpenPositions: jest.fn().mockResolvedValue([]),
            getAccountBalances: jest.fn().mockResolvedValue({ buyingPower: 0, cash: 0 }),
            getQuotes: jest.fn().mockResolvedValue([]),
            searchInstruments: jest.fn().mockResolvedValue([]),
        };

        const moduleRef = await Test.createTestingModule({
            providers: [SessionService, { provide: BROKERAGE_CLIENT, useValue: brokerage }],
        }).compile();
        service = moduleRef.get(SessionService);
    });

    it('starts logged out', async () => {
        expect(service.isAuthenticated()).toBe(false);
        await expect(service.checkLogin()).resolves.toBe(false);
    });

    it('authenticates on a successful login', async () => {
        await expect(service.login(credentials)).resolves.toBe(LoginStatus.Authenticated);
        expect(service.isAuthenticated()).toBe(true);
        await expect(service.checkLogin()).resolves.toBe(true);
    });

    it('skips the brokerage when the same user is already logged in', async () => {
        await service.login(credentials);
        await service.login(credentials);
        expect(brokerage.login).toHaveBeenCalledTimes(1);
    });

    it('reports invalid credentials and stays logged out', async () => {
        brokerage.login.mockRejectedValue(new AuthenticationFailureError());
        await expect(service.login(credentials)).resolves.toBe(LoginStatus.InvalidCredentials);
        expect(service.isAuthenticated()).toBe(false);
    });

    it('rethrows unexpected brokerage failures', async () => {
        brokerage.login.mockRejectedValue(new BrokerageUnavailableError('socket hang up'));
        await expect(service.login(credentials)).rejects.toBeInstanceOf(BrokerageUnavailableError);
        expect(service.isAuthenticated()).toBe(false);
    });

    it('waits for device approval before authenticating', async () => {
        brokerage.login.mockRejectedValue(new DeviceApprovalPendingError('wf-1'));

        await expect(service.login(credentials)).resolves.toBe(LoginStatus.DeviceApprovalRequired);
        await expect(service.checkLogin()).resolves.toBe(false);
        await expect(service.checkLogin()).resolves.toBe(false);

        brokerage.completeDeviceApproval.mockResolvedValue(true);
        await expect(service.checkLogin()).resolves.toBe(true);
        expect(service.isAuthenticated()).toBe(true);
        expect(brokerage.completeDeviceApproval).toHaveBeenCalledTimes(3);
    });

    it('drops a pending approval the brokerage rejected', async () => {
        brokerage.login.mockRejectedValue(new DeviceApprovalPendingError('wf-1'));
        brokerage.completeDeviceApproval.mockRejectedValue(new AuthenticationFailureError());

        await service.login(credentials);
        await expect(service.checkLogin()).resolves.toBe(false);

        await service.checkLogin();
        expect(brokerage.completeDeviceApproval).toHaveBeenCalledTimes(1);
    });

    it('logs out idempotently', async () => {
        await service.login(credentials);

        await service.logout();
        await service.logout();

        expect(service.isAuthenticated()).toBe(false);
        expect(brokerage.logout).toHaveBeenCalledTimes(1);
    });

    it('logs out even when the brokerage call fails', async () => {
        brokerage.logout.mockRejectedValue(new BrokerageUnavailableError('timeout'));
        await service.login(credentials);

        await expect(service.logout()).resolves.toBeUndefined();
        expect(service.isAuthenticated()).toBe(false);
    });

    it('serializes concurrent logins', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => { release = () => resolve(); });
        brokerage.login.mockImplementationOnce(() => gate);

        const first = service.login(credentials);
        const second = service.login(credentials);
        release();

        await expect(first).resolves.toBe(LoginStatus.Authenticated);
        await expect(second).resolves.toBe(LoginStatus.Authenticated);
        expect(brokerage.login).toHaveBeenCalledTimes(1);
    });

    it('invalidates an authenticated session', async () => {
        await service.login(credentials);
        await service.invalidate();
        expect(service.isAuthenticated()).toBe(false);
    });
});
