// test/unit/domain/services/currency-converter.service.test.ts
import { CurrencyConverter } from '@/core/domain/services/currency-converter.service';
import { Money } from '@/core/domain/value-objects/money.vo';
import { RateSnapshot } from '@/core/domain/value-objects/rate-snapshot.vo';
import { AmountOutOfRangeException, UnknownCurrencyException } from '@/shared/exceptions/money.exception';
import { ERROR_CODES } from '@/shared/types/error-codes';
import { createCurrency, createTestSnapshot, RATES_UPDATED_AT } from '@test/helpers/currency-fixtures';

const HOUR_MS = 60 * 60 * 1000;

describe('CurrencyConverter', () => {
    let converter: CurrencyConverter;

    beforeEach(() => {
        converter = new CurrencyConverter(createTestSnapshot());
    });

    describe('convert', () => {
        it('should convert through the base rate', () => {
            expect(converter.convert(100, 'USD', 'VND')).toBe(2_400_000);
            expect(converter.convert(2_400_000, 'VND', 'USD')).toBe(100);
        });

        it('should return the input unchanged for the same currency', () => {
            expect(converter.convert(12_345, 'USD', 'USD')).toBe(12_345);
            expect(converter.convert(-7, 'usd', 'USD')).toBe(-7);
        });

        it('should scale between different minor digits', () => {
            // 100 yen -> 16,000 dong -> 1,600,000 minor units
            expect(converter.convert(100, 'JPY', 'VND')).toBe(1_600_000);
            expect(converter.convert(1_600_000, 'VND', 'JPY')).toBe(100);
        });

        it('should round half to even', () => {
            expect(converter.convert(12_000, 'VND', 'USD')).toBe(0);
            expect(converter.convert(36_000, 'VND', 'USD')).toBe(2);
            expect(converter.convert(60_000, 'VND', 'USD')).toBe(2);
            expect(converter.convert(-36_000, 'VND', 'USD')).toBe(-2);
        });

        it('should fail for an unknown currency on either side', () => {
            expect(() => converter.convert(100, 'EUR', 'VND')).toThrow(UnknownCurrencyException);
            expect(() => converter.convert(100, 'VND', 'EUR')).toThrow('Unknown currency: EUR');
        });

        it('should fail when the result leaves the safe integer range', () => {
            let caught: unknown;
            try {
                converter.convert(Number.MAX_SAFE_INTEGER, 'USD', 'VND');
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(AmountOutOfRangeException);
            expect(caught).toMatchObject({
                code: ERROR_CODES.AMOUNT_OUT_OF_RANGE,
                details: { amountMinor: Number.MAX_SAFE_INTEGER, from: 'USD', to: 'VND' }
            });
        });
    });

    it('should convert Money values', () => {
        const converted = converter.convertMoney(new Money(250, 'USD'), 'vnd');

        expect(converted.amountMinor).toBe(6_000_000);
        expect(converted.currencyCode).toBe('VND');
    });

    describe('staleness', () => {
        const maxAgeMs = 24 * HOUR_MS;

        it('should flag rates older than the maximum age', () => {
            const now = new Date(RATES_UPDATED_AT.getTime() + 25 * HOUR_MS);

            expect(converter.isStale('USD', maxAgeMs, now)).toBe(true);
            expect(converter.isStale('USD', maxAgeMs, new Date(RATES_UPDATED_AT.getTime() + maxAgeMs))).toBe(false);
        });

        it('should never flag the base currency', () => {
            const now = new Date(RATES_UPDATED_AT.getTime() + 1000 * HOUR_MS);

            expect(converter.isStale('VND', maxAgeMs, now)).toBe(false);
        });

        it('should list stale codes once, sorted', () => {
            const now = new Date(RATES_UPDATED_AT.getTime() + 25 * HOUR_MS);
            const snapshot = new RateSnapshot([
                createCurrency('VND', 1, { isBase: true }),
                createCurrency('USD', 24000),
                createCurrency('EUR', 26000),
                createCurrency('GBP', 30000, { updatedAt: now })
            ]);

            const stale = new CurrencyConverter(snapshot).staleCodes(['usd', 'USD', 'VND', 'GBP', 'EUR'], maxAgeMs, now);

            expect(stale).toEqual(['EUR', 'USD']);
        });

        it('should still convert with stale rates', () => {
            expect(converter.convert(1, 'USD', 'VND')).toBe(24_000);
        });
    });
});
