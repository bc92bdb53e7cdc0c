// src/infrastructure/database/postgres/repositories/currency.repository.impl.ts
import { Pool } from 'pg';
import { CurrencyRepository } from '../../../../core/domain/repositories/currency.repository';
import { CurrencyEntity } from '../../../../core/domain/entities/currency.entity';
import { CurrencyCode } from '../../../../shared/types/common.types';
import { withTransaction } from '../../connections';
import { logger } from '../../../monitoring/logger.service';
import { databaseFailure } from '../pg-helpers';

interface CurrencyRow {
    code: string;
    display_name: string;
    rate_to_base: number;
    minor_digits: number;
    is_base: boolean;
    updated_at: Date;
}

const SELECT_COLUMNS = 'code, display_name, rate_to_base, minor_digits, is_base, updated_at';

export class CurrencyRepositoryImpl implements CurrencyRepository {
    constructor(private readonly pool: Pool) {}

    async findByCode(code: CurrencyCode): Promise<CurrencyEntity | null> {
        try {
            const result = await this.pool.query<CurrencyRow>(
                `SELECT ${SELECT_COLUMNS} FROM currencies WHERE code = $1`,
                [code]
            );

            if (result.rows.length === 0) {
                return null;
            }
            return this.mapRowToCurrency(result.rows[0]);
        } catch (error) {
            throw databaseFailure('Failed to find currency', error, { code });
        }
    }

    async findAll(): Promise<CurrencyEntity[]> {
        try {
            const result = await this.pool.query<CurrencyRow>(
                `SELECT ${SELECT_COLUMNS} FROM currencies ORDER BY code`
            );
            return result.rows.map(row => this.mapRowToCurrency(row));
        } catch (error) {
            throw databaseFailure('Failed to list currencies', error);
        }
    }

    async upsertMany(currencies: CurrencyEntity[]): Promise<void> {
        if (currencies.length === 0) {
            return;
        }

        try {
            await withTransaction(this.pool, async client => {
                for (const currency of currencies) {
                    await client.query(
                        `INSERT INTO currencies (code, display_name, rate_to_base, minor_digits, is_base, updated_at)
                         VALUES ($1, $2, $3, $4, $5, $6)
                         ON CONFLICT (code) DO UPDATE SET
                             display_name = EXCLUDED.display_name,
                             rate_to_base = EXCLUDED.rate_to_base,
                             minor_digits = EXCLUDED.minor_digits,
                             is_base = EXCLUDED.is_base,
                             updated_at = EXCLUDED.updated_at`,
                        [
                            currency.code,
                            currency.displayName,
                            currency.rateToBase,
                            currency.minorDigits,
                            currency.isBase,
                            currency.updatedAt
                        ]
                    );
                }
            });

            logger.database('Currencies upserted', { codes: currencies.map(currency => currency.code) });
        } catch (error) {
            throw databaseFailure('Failed to upsert currencies', error, { count: currencies.length });
        }
    }

    async setBase(code: CurrencyCode, updatedAt: Date): Promise<void> {
        try {
            await withTransaction(this.pool, async client => {
                await client.query('UPDATE currencies SET is_base = FALSE WHERE is_base AND code <> $1', [code]);
                await client.query(
                    'UPDATE currencies SET is_base = TRUE, rate_to_base = 1, updated_at = $2 WHERE code = $1',
                    [code, updatedAt]
                );
            });

            logger.database('Base currency set', { code });
        } catch (error) {
            throw databaseFailure('Failed to set base currency', error, { code });
        }
    }

    private mapRowToCurrency(row: CurrencyRow): CurrencyEntity {
        return new CurrencyEntity({
            code: row.code.trim(),
            displayName: row.display_name,
            rateToBase: Number(row.rate_to_base),
            minorDigits: row.minor_digits,
            isBase: row.is_base,
            updatedAt: row.updated_at
        });
    }
}
