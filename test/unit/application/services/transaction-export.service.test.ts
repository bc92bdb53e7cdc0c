// test/unit/application/services/transaction-export.service.test.ts
import { TransactionExportRow } from '@/core/application/services/transaction-export.service';
import { UnknownCurrencyException } from '@/shared/exceptions/money.exception';
import { createTestLedger, TestLedger } from '@test/helpers/test-ledger';

describe('TransactionExportService', () => {
    let ledger: TestLedger;

    const collect = async (source: AsyncIterable<TransactionExportRow>): Promise<TransactionExportRow[]> => {
        const rows: TransactionExportRow[] = [];
        for await (const row of source) {
            rows.push(row);
        }
        return rows;
    };

    beforeEach(async () => {
        ledger = await createTestLedger();
        const store = ledger.app.transactions;

        await store.add({
            amount: '-$12.5',
            category: 'Food',
            source: 'Card',
            description: 'Lunch',
            occurredOn: '2024-03-02',
            tags: ['work', 'meal'],
            notes: 'client visit'
        });
        await store.add({ amount: '2m', category: 'Salary', source: 'Bank', occurredOn: '2024-03-01', recurrence: 'monthly' });
    });

    it('should flatten transactions in query order', async () => {
        const rows = await collect(ledger.app.exports.rows({}, 'VND'));

        expect(rows).toEqual([
            {
                id: 2,
                date: '2024-03-01',
                kind: 'income',
                category: 'Salary',
                source: 'Bank',
                description: '',
                tags: '',
                notes: '',
                recurrence: 'monthly',
                originalAmount: '2000000.00',
                originalCurrency: 'VND',
                convertedAmountMinor: 200_000_000,
                displayCurrency: 'VND'
            },
            {
                id: 1,
                date: '2024-03-02',
                kind: 'expense',
                category: 'Food',
                source: 'Card',
                description: 'Lunch',
                tags: 'work, meal',
                notes: 'client visit',
                recurrence: 'none',
                originalAmount: '-12.50',
                originalCurrency: 'USD',
                convertedAmountMinor: -30_000_000,
                displayCurrency: 'VND'
            }
        ]);
    });

    it('should apply the filter', async () => {
        const rows = await collect(ledger.app.exports.rows({ kind: 'expense' }, 'usd'));

        expect(rows.map(row => [row.id, row.convertedAmountMinor, row.displayCurrency])).toEqual([[1, -1250, 'USD']]);
    });

    it('should reject an unknown display currency', async () => {
        await expect(collect(ledger.app.exports.rows({}, 'EUR'))).rejects.toThrow(UnknownCurrencyException);
    });
});
