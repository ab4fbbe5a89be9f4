import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import axios from 'axios';
import { randomUUID } from 'crypto';
import { BROKERAGE_CLIENT, BrokerageClient } from './brokerage.types';
import { ROBINHOOD_API_URL, RobinhoodClient } from './robinhood.client';
import { SessionController } from './session.controller';
import { SessionGuard } from './session.guard';
import { SessionService } from './session.service';

@Module({
    imports: [ConfigModule],
    controllers: [SessionController],
    providers: [
        {
            provide: BROKERAGE_CLIENT,
            useFactory: (configService: ConfigService): BrokerageClient =>
                new RobinhoodClient(
                    axios.create({
                        baseURL: ROBINHOOD_API_URL,
                        timeout: 10_000,
                        headers: { Accept: 'application/json' },
                    }),
                    // A fresh device token means a fresh device approval
                    configService.get<string>('BROKERAGE_DEVICE_TOKEN') ?? randomUUID(),
                ),
            inject: [ConfigService],
        },
        SessionService,
        SessionGuard,
    ],
    exports: [BROKERAGE_CLIENT, SessionService, SessionGuard],
})
export class BrokerageModule { }
