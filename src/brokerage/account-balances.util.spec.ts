import { parseAccountProfile, parseUnifiedAccount } from './account-balances.util';

describe('account balances', () => {
    describe('parseUnifiedAccount', () => {
        it('uses portfolio cash as buying power', () => {
            expect(parseUnifiedAccount({
                portfolio_cash: { amount: '1250.75', currency_code: 'USD' },
                withdrawable_cash: { amount: '1000.00', currency_code: 'USD' },
                account_buying_power: { amount: '5000.00', currency_code: 'USD' },
            })).toEqual({ buyingPower: 1250.75, cash: 1000 });
        });

        it('prefers the equities section when it reports cash', () => {
            expect(parseUnifiedAccount({
                portfolio_cash: { amount: '10.00' },
                uninvested_cash: { amount: '20.00' },
                equities: { portfolio_cash: { amount: '300.00' } },
            })).toEqual({ buyingPower: 300, cash: 20 });
        });

        it('falls back through the buying power fields', () => {
            expect(parseUnifiedAccount({
                day_trade_buying_power: { amount: '0' },
                account_buying_power: { amount: '420.50' },
                buying_power: { amount: '999' },
            })).toEqual({ buyingPower: 420.5, cash: 0 });
        });

        it('never reports negative buying power and lets positive cash stand in', () => {
            expect(parseUnifiedAccount({
                buying_power: '-50',
                withdrawable_cash: '75',
            })).toEqual({ buyingPower: 75, cash: 75 });
            expect(parseUnifiedAccount({ buying_power: '-50' })).toEqual({ buyingPower: 0, cash: 0 });
        });

        it('reads cash from the equities section when the top level has none', () => {
            expect(parseUnifiedAccount({
                portfolio_cash: '40',
                equities: { cash: { amount: '55.25' } },
            })).toEqual({ buyingPower: 40, cash: 55.25 });
        });
    });

    describe('parseAccountProfile', () => {
        it('uses portfolio cash and withdrawable cash', () => {
            expect(parseAccountProfile({
                portfolio_cash: '812.40',
                cash_available_for_withdrawal: '700.00',
                cash: '812.40',
            })).toEqual({ buyingPower: 812.4, cash: 700 });
        });

        it('lets withdrawable cash stand in for missing buying power', () => {
            expect(parseAccountProfile({ portfolio_cash: '0', cash_available_for_withdrawal: '12.5' }))
                .toEqual({ buyingPower: 12.5, cash: 12.5 });
        });
    });
});
