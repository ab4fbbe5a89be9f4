import { Inject, Injectable, Logger } from '@nestjs/common';
import { SessionExpiredError } from '../common/errors';
import { BROKERAGE_CLIENT, BrokerageClient } from '../brokerage/brokerage.types';
import { SessionService } from '../brokerage/session.service';
import { QuotesService } from '../market-data/quotes.service';
import { aggregatePortfolio } from './portfolio-aggregator';
import { PortfolioSnapshot } from './portfolio.types';

@Injectable()
export class PortfolioService {
    private readonly logger = new Logger(PortfolioService.name);

    constructor(
        @Inject(BROKERAGE_CLIENT) private readonly brokerage: BrokerageClient,
        private readonly sessionService: SessionService,
        private readonly quotesService: QuotesService,
    ) { }

    async getSnapshot(): Promise<PortfolioSnapshot> {
        try {
            const [positions, balances] = await Promise.all([
                this.brokerage.getOpenPositions(),
                this.brokerage.getAccountBalances(),
            ]);
            this.logger.log(`Aggregating ${positions.length} positions`);
            return await aggregatePortfolio(positions, balances, this.quotesService);
        } catch (error) {
            if (error instanceof SessionExpiredError) {
                await this.sessionService.invalidate();
            }
            throw error;
        }
    }
}
