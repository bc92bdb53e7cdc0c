// src/core/domain/value-objects/rate-snapshot.vo.ts
import { CurrencyEntity } from '../entities/currency.entity';
import { CurrencyCode } from '../../../shared/types/common.types';
import { UnknownCurrencyException } from '../../../shared/exceptions/money.exception';
import { ValidationUtil } from '../../../shared/utils/validation.util';

/**
 * Immutable view of the currency table at one point in time.
 * Conversions and reports computed against the same snapshot are reproducible.
 */
export class RateSnapshot {
    private readonly currencies: ReadonlyMap<CurrencyCode, CurrencyEntity>;

    constructor(currencies: Iterable<CurrencyEntity>) {
        const byCode = new Map<CurrencyCode, CurrencyEntity>();
        for (const currency of currencies) {
            byCode.set(currency.code, currency);
        }
        this.currencies = byCode;
    }

    get baseCode(): CurrencyCode | null {
        for (const currency of this.currencies.values()) {
            if (currency.isBase) return currency.code;
        }
        return null;
    }

    has(code: string): boolean {
        return this.currencies.has(ValidationUtil.normalizeCurrencyCode(code));
    }

    find(code: string): CurrencyEntity | undefined {
        return this.currencies.get(ValidationUtil.normalizeCurrencyCode(code));
    }

    get(code: string): CurrencyEntity {
        const currency = this.find(code);
        if (!currency) {
            throw new UnknownCurrencyException(ValidationUtil.normalizeCurrencyCode(code));
        }
        return currency;
    }

    list(): CurrencyEntity[] {
        return [...this.currencies.values()].sort((a, b) => a.code.localeCompare(b.code));
    }
}
