// src/infrastructure/database/postgres/repositories/transaction.repository.impl.ts
import { Pool } from 'pg';
import {
    TransactionCursor,
    TransactionFilter,
    TransactionRepository
} from '../../../../core/domain/repositories/transaction.repository';
import {
    NewTransaction,
    TransactionChanges,
    TransactionEntity
} from '../../../../core/domain/entities/transaction.entity';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { RECURRENCE_RULES, TRANSACTION_KINDS } from '../../../../shared/types/common.types';
import { logger } from '../../../monitoring/logger.service';
import { databaseFailure, escapeLike, oneOf, toSafeInteger } from '../pg-helpers';

interface TransactionRow {
    id: string;
    kind: string;
    amount_minor: string;
    currency_code: string;
    category: string;
    source: string;
    description: string;
    occurred_on: string;
    recurrence: string;
    tags: string[];
    notes: string | null;
    created_at: Date;
    updated_at: Date;
}

const SELECT_COLUMNS = `
    id, kind, amount_minor, currency_code, category, source, description,
    to_char(occurred_on, 'YYYY-MM-DD') AS occurred_on,
    recurrence, tags, notes, created_at, updated_at
`;

export interface WhereClause {
    conditions: string[];
    values: unknown[];
}

/**
 * SQL conditions for a transaction filter plus the keyset position,
 * with positional parameters numbered from $1.
 */
export function buildTransactionWhere(filter: TransactionFilter, after: TransactionCursor | null): WhereClause {
    const conditions: string[] = [];
    const values: unknown[] = [];

    const param = (value: unknown): string => {
        values.push(value);
        return `$${values.length}`;
    };

    if (filter.id !== undefined) conditions.push(`id = ${param(filter.id)}`);
    if (filter.date !== undefined) conditions.push(`occurred_on = ${param(filter.date)}::date`);
    if (filter.dateFrom !== undefined) conditions.push(`occurred_on >= ${param(filter.dateFrom)}::date`);
    if (filter.dateTo !== undefined) conditions.push(`occurred_on <= ${param(filter.dateTo)}::date`);
    if (filter.category !== undefined) conditions.push(`category = ${param(filter.category)}`);
    if (filter.source !== undefined) conditions.push(`source = ${param(filter.source)}`);
    if (filter.kind !== undefined) conditions.push(`kind = ${param(filter.kind)}`);
    if (filter.currencyCode !== undefined) conditions.push(`currency_code = ${param(filter.currencyCode)}`);

    if (filter.search !== undefined) {
        const pattern = param(`%${escapeLike(filter.search)}%`);
        conditions.push(
            `(description ILIKE ${pattern} OR category ILIKE ${pattern} OR source ILIKE ${pattern})`
        );
    }

    if (filter.recurring !== undefined) {
        conditions.push(filter.recurring ? `recurrence <> 'none'` : `recurrence = 'none'`);
    }

    if (after) {
        conditions.push(`(occurred_on, id) > (${param(after.occurredOn)}::date, ${param(after.id)})`);
    }

    return { conditions, values };
}

export class TransactionRepositoryImpl implements TransactionRepository {
    constructor(private readonly pool: Pool) {}

    async create(transaction: NewTransaction): Promise<TransactionEntity> {
        try {
            const query = `
                INSERT INTO transactions (
                    kind, amount_minor, currency_code, category, source,
                    description, occurred_on, recurrence, tags, notes
                )
                VALUES ($1, $2, $3, $4, $5, $6, $7::date, $8, $9, $10)
                RETURNING ${SELECT_COLUMNS}
            `;

            const result = await this.pool.query<TransactionRow>(query, [
                transaction.kind,
                transaction.amount.amountMinor,
                transaction.amount.currencyCode,
                transaction.category,
                transaction.source,
                transaction.description,
                transaction.occurredOn,
                transaction.recurrence,
                transaction.tags,
                transaction.notes ?? null
            ]);

            logger.database('Transaction inserted', { id: result.rows[0].id });
            return this.mapRowToTransaction(result.rows[0]);
        } catch (error) {
            throw databaseFailure('Failed to create transaction', error, { kind: transaction.kind });
        }
    }

    async findById(id: number): Promise<TransactionEntity | null> {
        try {
            const result = await this.pool.query<TransactionRow>(
                `SELECT ${SELECT_COLUMNS} FROM transactions WHERE id = $1`,
                [id]
            );

            if (result.rows.length === 0) {
                return null;
            }
            return this.mapRowToTransaction(result.rows[0]);
        } catch (error) {
            throw databaseFailure('Failed to find transaction by id', error, { id });
        }
    }

    async findPage(
        filter: TransactionFilter,
        after: TransactionCursor | null,
        limit: number
    ): Promise<TransactionEntity[]> {
        try {
            const { conditions, values } = buildTransactionWhere(filter, after);

            let query = `SELECT ${SELECT_COLUMNS} FROM transactions`;
            if (conditions.length > 0) {
                query += ` WHERE ${conditions.join(' AND ')}`;
            }
            values.push(limit);
            query += ` ORDER BY occurred_on ASC, id ASC LIMIT $${values.length}`;

            const result = await this.pool.query<TransactionRow>(query, values);
            return result.rows.map(row => this.mapRowToTransaction(row));
        } catch (error) {
            throw databaseFailure('Failed to scan transactions', error, { filter, after });
        }
    }

    async update(id: number, changes: TransactionChanges): Promise<TransactionEntity | null> {
        const updateFields: string[] = [];
        const values: unknown[] = [];

        const set = (column: string, value: unknown, cast = ''): void => {
            values.push(value);
            updateFields.push(`${column} = $${values.length}${cast}`);
        };

        if (changes.kind !== undefined) set('kind', changes.kind);
        if (changes.amount !== undefined) {
            set('amount_minor', changes.amount.amountMinor);
            set('currency_code', changes.amount.currencyCode);
        }
        if (changes.category !== undefined) set('category', changes.category);
        if (changes.source !== undefined) set('source', changes.source);
        if (changes.description !== undefined) set('description', changes.description);
        if (changes.occurredOn !== undefined) set('occurred_on', changes.occurredOn, '::date');
        if (changes.recurrence !== undefined) set('recurrence', changes.recurrence);
        if (changes.tags !== undefined) set('tags', changes.tags);
        if (changes.notes !== undefined) set('notes', changes.notes);

        updateFields.push('updated_at = NOW()');
        values.push(id);

        try {
            const result = await this.pool.query<TransactionRow>(
                `UPDATE transactions SET ${updateFields.join(', ')} WHERE id = $${values.length} RETURNING ${SELECT_COLUMNS}`,
                values
            );

            if (result.rows.length === 0) {
                return null;
            }
            return this.mapRowToTransaction(result.rows[0]);
        } catch (error) {
            throw databaseFailure('Failed to update transaction', error, { id });
        }
    }

    async delete(id: number): Promise<boolean> {
        try {
            const result = await this.pool.query('DELETE FROM transactions WHERE id = $1', [id]);
            return (result.rowCount ?? 0) > 0;
        } catch (error) {
            throw databaseFailure('Failed to delete transaction', error, { id });
        }
    }

    private mapRowToTransaction(row: TransactionRow): TransactionEntity {
        return new TransactionEntity({
            id: toSafeInteger(row.id, 'id'),
            kind: oneOf(TRANSACTION_KINDS, row.kind, 'kind'),
            amount: new Money(toSafeInteger(row.amount_minor, 'amount_minor'), row.currency_code.trim()),
            category: row.category,
            source: row.source,
            description: row.description,
            occurredOn: row.occurred_on,
            recurrence: oneOf(RECURRENCE_RULES, row.recurrence, 'recurrence'),
            tags: row.tags,
            notes: row.notes ?? undefined,
            createdAt: row.created_at,
            updatedAt: row.updated_at
        });
    }
}
