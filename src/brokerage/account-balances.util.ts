import { JsonObject, isObject, readNumber } from '../common/payload.util';
import { AccountBalances } from './brokerage.types';

function money(obj: JsonObject | undefined, key: string): number {
    return readNumber(obj, key) ?? 0;
}

function firstNonZero(obj: JsonObject | undefined, keys: string[]): number {
    for (const key of keys) {
        const value = money(obj, key);
        if (value !== 0) return value;
    }
    return 0;
}

/** Buying power never goes negative; with none reported, positive cash stands in. */
function settle(buyingPower: number, cash: number): AccountBalances {
    let effective = buyingPower < 0 ? 0 : buyingPower;
    if (effective === 0 && cash > 0) {
        effective = cash;
    }
    return { buyingPower: effective, cash };
}

/**
 * Balances from the unified ("phoenix") account document. Buying power is the
 * cash actually sitting in the portfolio, not margin or instant deposits.
 */
export function parseUnifiedAccount(account: JsonObject): AccountBalances {
    let cash = firstNonZero(account, ['withdrawable_cash', 'uninvested_cash']);
    let buyingPower = firstNonZero(account, ['portfolio_cash', 'uninvested_cash']);

    const equities = account.equities;
    if (isObject(equities)) {
        const equitiesPortfolioCash = money(equities, 'portfolio_cash');
        const equitiesUninvested = money(equities, 'uninvested_cash');
        if (equitiesPortfolioCash > 0) {
            buyingPower = equitiesPortfolioCash;
        } else if (equitiesUninvested > 0) {
            buyingPower = equitiesUninvested;
        }
        if (cash === 0) {
            cash = money(equities, 'cash');
        }
    }

    if (buyingPower === 0) {
        buyingPower = firstNonZero(account, [
            'extended_hours_buying_power',
            'day_trade_buying_power',
            'account_buying_power',
            'buying_power',
        ]);
    }

    return settle(buyingPower, cash);
}

/** Balances from the legacy account profile, used when the unified document fails. */
export function parseAccountProfile(profile: JsonObject): AccountBalances {
    const cash = firstNonZero(profile, ['cash_available_for_withdrawal', 'cash']);
    const buyingPower = money(profile, 'portfolio_cash');
    const available = money(profile, 'cash_available_for_withdrawal');
    const balances = settle(buyingPower, available);
    return { buyingPower: balances.buyingPower, cash };
}
