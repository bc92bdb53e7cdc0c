// test/unit/infrastructure/database/transaction.repository.impl.test.ts
import { buildTransactionWhere } from '@/infrastructure/database/postgres/repositories/transaction.repository.impl';
import { databaseFailure, escapeLike, oneOf, toSafeInteger } from '@/infrastructure/database/postgres/pg-helpers';
import { InfrastructureException } from '@/shared/exceptions/infrastructure.exception';
import { TRANSACTION_KINDS } from '@/shared/types/common.types';
import { ERROR_CODES } from '@/shared/types/error-codes';

describe('buildTransactionWhere', () => {
    it('should produce no conditions for an empty filter', () => {
        expect(buildTransactionWhere({}, null)).toEqual({ conditions: [], values: [] });
    });

    it('should number parameters in filter order', () => {
        const clause = buildTransactionWhere({
            dateFrom: '2024-03-01',
            dateTo: '2024-03-31',
            category: 'Food',
            kind: 'expense'
        }, null);

        expect(clause.conditions).toEqual([
            'occurred_on >= $1::date',
            'occurred_on <= $2::date',
            'category = $3',
            'kind = $4'
        ]);
        expect(clause.values).toEqual(['2024-03-01', '2024-03-31', 'Food', 'expense']);
    });

    it('should search three columns with one escaped pattern', () => {
        const clause = buildTransactionWhere({ search: '50%_off' }, null);

        expect(clause.conditions).toEqual([
            '(description ILIKE $1 OR category ILIKE $1 OR source ILIKE $1)'
        ]);
        expect(clause.values).toEqual(['%50\\%\\_off%']);
    });

    it('should filter templates without parameters', () => {
        expect(buildTransactionWhere({ recurring: true }, null).conditions).toEqual(["recurrence <> 'none'"]);
        expect(buildTransactionWhere({ recurring: false }, null).conditions).toEqual(["recurrence = 'none'"]);
    });

    it('should resume strictly after the keyset cursor', () => {
        const clause = buildTransactionWhere({ source: 'Cash' }, { occurredOn: '2024-03-15', id: 12 });

        expect(clause.conditions).toEqual([
            'source = $1',
            '(occurred_on, id) > ($2::date, $3)'
        ]);
        expect(clause.values).toEqual(['Cash', '2024-03-15', 12]);
    });
});

describe('pg helpers', () => {
    it('should escape LIKE wildcards and the escape character', () => {
        expect(escapeLike('a\\b%c_d')).toBe('a\\\\b\\%c\\_d');
    });

    it('should narrow known column values', () => {
        expect(oneOf(TRANSACTION_KINDS, 'income', 'kind')).toBe('income');
        expect(() => oneOf(TRANSACTION_KINDS, 'refund', 'kind')).toThrow('Unexpected kind value "refund"');
    });

    it('should parse BIGINT strings within the safe range', () => {
        expect(toSafeInteger('3000000', 'amount_minor')).toBe(3_000_000);
        expect(toSafeInteger(7, 'id')).toBe(7);
        expect(() => toSafeInteger('9007199254740993', 'amount_minor')).toThrow(InfrastructureException);
    });

    it('should wrap driver errors and pass ours through', () => {
        const wrapped = databaseFailure('Failed to scan transactions', new Error('connection reset'), { limit: 10 });
        const ours = new InfrastructureException('already wrapped');

        expect(wrapped).toBeInstanceOf(InfrastructureException);
        expect(wrapped).toMatchObject({
            message: 'Failed to scan transactions',
            code: ERROR_CODES.DATABASE_ERROR,
            details: { limit: 10, cause: 'connection reset' }
        });
        expect(databaseFailure('ignored', ours)).toBe(ours);
    });
});
