// test/helpers/currency-fixtures.ts
import { CurrencyEntity, CurrencyProps } from '@/core/domain/entities/currency.entity';
import { RateSnapshot } from '@/core/domain/value-objects/rate-snapshot.vo';

export const RATES_UPDATED_AT = new Date('2024-03-01T00:00:00.000Z');

export const createCurrency = (
    code: string,
    rateToBase: number,
    overrides: Partial<Omit<CurrencyProps, 'code' | 'rateToBase'>> = {}
): CurrencyEntity => new CurrencyEntity({
    code,
    displayName: code,
    rateToBase,
    minorDigits: 2,
    isBase: false,
    updatedAt: RATES_UPDATED_AT,
    ...overrides
});

/**
 * Base VND; USD at 24000 VND; JPY at 160 VND with no minor unit.
 */
export const createTestSnapshot = (): RateSnapshot => new RateSnapshot([
    createCurrency('VND', 1, { isBase: true }),
    createCurrency('USD', 24000),
    createCurrency('JPY', 160, { minorDigits: 0 })
]);
