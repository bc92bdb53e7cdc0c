// test/integration/ledger-app.test.ts
import { createLedgerApp } from '@/app';
import { ConfigService } from '@/config/environment';
import { TransactionExportRow } from '@/core/application/services/transaction-export.service';
import { RateProvider } from '@/infrastructure/rates/rate-provider';
import {
    InMemoryBudgetAlertRepository,
    InMemoryBudgetRepository,
    InMemoryCurrencyRepository,
    InMemoryTransactionRepository
} from '@test/helpers/in-memory-repositories';
import { createTestLedger } from '@test/helpers/test-ledger';

describe('Ledger app', () => {
    it('should create the configured base currency on first start', async () => {
        const currencies = new InMemoryCurrencyRepository();
        const app = createLedgerApp({
            config: new ConfigService({ NODE_ENV: 'test', BASE_CURRENCY: 'usd' }),
            repositories: {
                transactions: new InMemoryTransactionRepository(),
                currencies,
                budgets: new InMemoryBudgetRepository(),
                budgetAlerts: new InMemoryBudgetAlertRepository()
            }
        });

        await app.initialize();
        await app.initialize();

        const listed = await app.currencies.list();
        expect(listed).toHaveLength(1);
        expect(listed[0].code).toBe('USD');
        expect(listed[0].isBase).toBe(true);
        expect(listed[0].rateToBase).toBe(1);

        await app.close();
    });

    it('should run a month of bookkeeping end to end', async () => {
        const { app } = await createTestLedger();

        const provider: RateProvider = {
            name: 'fixed',
            fetchRates: async () => [
                { code: 'USD', displayName: 'US dollar', rateToBase: 25000 },
                { code: 'JPY', displayName: 'Japanese yen', rateToBase: 170, minorDigits: 0 }
            ]
        };
        await app.currencies.refreshRates(provider);

        await app.transactions.add({ amount: '15m', category: 'Salary', source: 'Bank', occurredOn: '2024-03-01' });
        await app.transactions.add({ amount: '-$40', category: 'Food', source: 'Card', occurredOn: '2024-03-05' });
        await app.transactions.add({ amount: '-¥3000', category: 'Travel', source: 'Cash', occurredOn: '2024-03-09' });
        await app.budgets.setBudget({ category: 'Food', period: 'month', limit: '800k' });

        const march = await app.aggregation.monthlySummary(2024, 3, 'VND');
        expect(march.incomeTotal).toBe(1_500_000_000);
        // 4000 cents at 25000 = 100,000,000; 3000 yen at 170 = 51,000,000
        expect(march.expenseTotal).toBe(151_000_000);
        expect(march.net).toBe(1_349_000_000);

        await expect(app.aggregation.balance({ displayCurrency: 'VND' })).resolves.toBe(1_349_000_000);

        const food = await app.budgets.checkBudget('Food', { type: 'month', year: 2024, month: 3 }, 'VND');
        expect(food.exceeded).toBe(true);
        expect(food.remaining).toBe(-20_000_000);

        const exceeded = await app.budgets.checkAll({ type: 'month', year: 2024, month: 3 }, 'USD', { recordAlerts: true });
        expect(exceeded.map(status => [status.category, status.limit, status.spent, status.display.limit, status.display.spent]))
            .toEqual([['Food', 80_000_000, 100_000_000, 3200, 4000]]);

        const [alert] = await app.budgets.unreadAlerts();
        expect(alert.message).toBe('Budget limit of 800000.00 VND exceeded for Food (1000000.00 spent)');
        await app.budgets.markAlertRead(alert.id);
        await expect(app.budgets.unreadAlerts()).resolves.toEqual([]);

        const rows: TransactionExportRow[] = [];
        for await (const row of app.exports.rows({ category: 'Travel' }, 'VND')) {
            rows.push(row);
        }
        expect(rows).toHaveLength(1);
        expect(rows[0].originalAmount).toBe('-3000');
        expect(rows[0].convertedAmountMinor).toBe(-51_000_000);
    });
});
