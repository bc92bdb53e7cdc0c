// src/infrastructure/database/postgres/repositories/budget.repository.impl.ts
import { Pool } from 'pg';
import { BudgetRepository } from '../../../../core/domain/repositories/budget.repository';
import { BudgetEntity } from '../../../../core/domain/entities/budget.entity';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { BUDGET_PERIODS, BudgetPeriodType } from '../../../../shared/types/common.types';
import { databaseFailure, oneOf, toSafeInteger } from '../pg-helpers';

interface BudgetRow {
    category: string;
    period: string;
    limit_minor: string;
    currency_code: string;
    start_date: string | null;
    end_date: string | null;
    created_at: Date;
    updated_at: Date;
}

const SELECT_COLUMNS = `category, period, limit_minor, currency_code,
    to_char(start_date, 'YYYY-MM-DD') AS start_date,
    to_char(end_date, 'YYYY-MM-DD') AS end_date,
    created_at, updated_at`;

export class BudgetRepositoryImpl implements BudgetRepository {
    constructor(private readonly pool: Pool) {}

    async save(budget: BudgetEntity): Promise<BudgetEntity> {
        try {
            const result = await this.pool.query<BudgetRow>(
                `INSERT INTO budgets (category, period, limit_minor, currency_code, start_date, end_date, created_at, updated_at)
                 VALUES ($1, $2, $3, $4, $5::date, $6::date, $7, $8)
                 ON CONFLICT (category, period) DO UPDATE SET
                     limit_minor = EXCLUDED.limit_minor,
                     currency_code = EXCLUDED.currency_code,
                     start_date = EXCLUDED.start_date,
                     end_date = EXCLUDED.end_date,
                     updated_at = EXCLUDED.updated_at
                 RETURNING ${SELECT_COLUMNS}`,
                [
                    budget.category,
                    budget.period,
                    budget.limit.amountMinor,
                    budget.currencyCode,
                    budget.startDate,
                    budget.endDate,
                    budget.createdAt,
                    budget.updatedAt
                ]
            );
            return this.mapRowToBudget(result.rows[0]);
        } catch (error) {
            throw databaseFailure('Failed to save budget', error, { category: budget.category, period: budget.period });
        }
    }

    async find(category: string, period: BudgetPeriodType): Promise<BudgetEntity | null> {
        try {
            const result = await this.pool.query<BudgetRow>(
                `SELECT ${SELECT_COLUMNS} FROM budgets WHERE category = $1 AND period = $2`,
                [category, period]
            );

            if (result.rows.length === 0) {
                return null;
            }
            return this.mapRowToBudget(result.rows[0]);
        } catch (error) {
            throw databaseFailure('Failed to find budget', error, { category, period });
        }
    }

    async findAll(period?: BudgetPeriodType): Promise<BudgetEntity[]> {
        try {
            const result = period === undefined
                ? await this.pool.query<BudgetRow>(`SELECT ${SELECT_COLUMNS} FROM budgets ORDER BY category, period`)
                : await this.pool.query<BudgetRow>(
                    `SELECT ${SELECT_COLUMNS} FROM budgets WHERE period = $1 ORDER BY category`,
                    [period]
                );
            return result.rows.map(row => this.mapRowToBudget(row));
        } catch (error) {
            throw databaseFailure('Failed to list budgets', error, { period });
        }
    }

    async delete(category: string, period: BudgetPeriodType): Promise<boolean> {
        try {
            const result = await this.pool.query(
                'DELETE FROM budgets WHERE category = $1 AND period = $2',
                [category, period]
            );
            return (result.rowCount ?? 0) > 0;
        } catch (error) {
            throw databaseFailure('Failed to delete budget', error, { category, period });
        }
    }

    private mapRowToBudget(row: BudgetRow): BudgetEntity {
        return new BudgetEntity({
            category: row.category,
            period: oneOf(BUDGET_PERIODS, row.period, 'period'),
            limit: new Money(toSafeInteger(row.limit_minor, 'limit_minor'), row.currency_code.trim()),
            startDate: row.start_date,
            endDate: row.end_date,
            createdAt: row.created_at,
            updatedAt: row.updated_at
        });
    }
}
