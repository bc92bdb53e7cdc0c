// src/infrastructure/database/postgres/repositories/budget-alert.repository.impl.ts
import { Pool } from 'pg';
import { BudgetAlertRepository } from '../../../../core/domain/repositories/budget-alert.repository';
import { BudgetAlertEntity, NewBudgetAlert } from '../../../../core/domain/entities/budget-alert.entity';
import { Money } from '../../../../core/domain/value-objects/money.vo';
import { BUDGET_PERIODS } from '../../../../shared/types/common.types';
import { databaseFailure, oneOf, toSafeInteger } from '../pg-helpers';

interface BudgetAlertRow {
    id: string;
    category: string;
    period: string;
    period_start: string;
    limit_minor: string;
    spent_minor: string;
    currency_code: string;
    message: string;
    read: boolean;
    created_at: Date;
}

const SELECT_COLUMNS = `id, category, period,
    to_char(period_start, 'YYYY-MM-DD') AS period_start,
    limit_minor, spent_minor, currency_code, message, read, created_at`;

export class BudgetAlertRepositoryImpl implements BudgetAlertRepository {
    constructor(private readonly pool: Pool) {}

    async create(alert: NewBudgetAlert): Promise<BudgetAlertEntity> {
        try {
            const result = await this.pool.query<BudgetAlertRow>(
                `INSERT INTO budget_alerts (category, period, period_start, limit_minor, spent_minor, currency_code, message)
                 VALUES ($1, $2, $3::date, $4, $5, $6, $7)
                 RETURNING ${SELECT_COLUMNS}`,
                [
                    alert.category,
                    alert.period,
                    alert.periodStart,
                    alert.limit.amountMinor,
                    alert.spent.amountMinor,
                    alert.limit.currencyCode,
                    alert.message
                ]
            );
            return this.mapRowToAlert(result.rows[0]);
        } catch (error) {
            throw databaseFailure('Failed to record budget alert', error, { category: alert.category, period: alert.period });
        }
    }

    async findUnread(): Promise<BudgetAlertEntity[]> {
        try {
            const result = await this.pool.query<BudgetAlertRow>(
                `SELECT ${SELECT_COLUMNS} FROM budget_alerts WHERE NOT read ORDER BY created_at DESC, id DESC`
            );
            return result.rows.map(row => this.mapRowToAlert(row));
        } catch (error) {
            throw databaseFailure('Failed to list budget alerts', error);
        }
    }

    async markRead(id: number): Promise<boolean> {
        try {
            const result = await this.pool.query('UPDATE budget_alerts SET read = TRUE WHERE id = $1', [id]);
            return (result.rowCount ?? 0) > 0;
        } catch (error) {
            throw databaseFailure('Failed to mark budget alert read', error, { alertId: id });
        }
    }

    private mapRowToAlert(row: BudgetAlertRow): BudgetAlertEntity {
        const currencyCode = row.currency_code.trim();
        return new BudgetAlertEntity({
            id: toSafeInteger(row.id, 'id'),
            category: row.category,
            period: oneOf(BUDGET_PERIODS, row.period, 'period'),
            periodStart: row.period_start,
            limit: new Money(toSafeInteger(row.limit_minor, 'limit_minor'), currencyCode),
            spent: new Money(toSafeInteger(row.spent_minor, 'spent_minor'), currencyCode),
            message: row.message,
            read: row.read,
            createdAt: row.created_at
        });
    }
}
