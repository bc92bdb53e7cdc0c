// src/core/domain/repositories/currency.repository.ts
import { CurrencyEntity } from '../entities/currency.entity';
import { CurrencyCode } from '../../../shared/types/common.types';

export interface CurrencyRepository {
    findByCode(code: CurrencyCode): Promise<CurrencyEntity | null>;
    findAll(): Promise<CurrencyEntity[]>;
    /** Writes every entry or none of them. */
    upsertMany(currencies: CurrencyEntity[]): Promise<void>;
    /** Clears the previous base flag and marks `code` as base with rate 1, atomically. */
    setBase(code: CurrencyCode, updatedAt: Date): Promise<void>;
}
