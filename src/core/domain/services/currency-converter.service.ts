// src/core/domain/services/currency-converter.service.ts
import { RateSnapshot } from '../value-objects/rate-snapshot.vo';
import { Money } from '../value-objects/money.vo';
import { CurrencyCode } from '../../../shared/types/common.types';
import { AmountOutOfRangeException } from '../../../shared/exceptions/money.exception';
import { MoneyDecimal, roundHalfEven } from '../../../shared/utils/rounding.util';
import { ValidationUtil } from '../../../shared/utils/validation.util';

/**
 * Converts minor-unit amounts between currencies through the base rate of
 * each side. Works on a fixed snapshot; it never refreshes rates itself.
 */
export class CurrencyConverter {
    constructor(readonly snapshot: RateSnapshot) {}

    convert(amountMinor: number, fromCode: string, toCode: string): number {
        const from = this.snapshot.get(fromCode);
        const to = this.snapshot.get(toCode);

        if (from.code === to.code) {
            return amountMinor;
        }

        const converted = new MoneyDecimal(amountMinor)
            .times(from.rateToBase)
            .div(to.rateToBase)
            .times(new MoneyDecimal(10).pow(to.minorDigits - from.minorDigits));

        const rounded = roundHalfEven(converted);
        if (rounded === null) {
            throw new AmountOutOfRangeException(
                `Converted amount of ${amountMinor} ${from.code} to ${to.code} is out of range`,
                { amountMinor, from: from.code, to: to.code }
            );
        }
        return rounded;
    }

    convertMoney(money: Money, toCode: string): Money {
        const target = ValidationUtil.normalizeCurrencyCode(toCode);
        return new Money(this.convert(money.amountMinor, money.currencyCode, target), this.snapshot.get(target).code);
    }

    /**
     * Advisory only: a stale rate is still used for conversion.
     * The base currency is never stale, its rate is fixed.
     */
    isStale(code: string, maxAgeMs: number, now: Date = new Date()): boolean {
        const currency = this.snapshot.get(code);
        if (currency.isBase) return false;
        return currency.ageInMs(now) > maxAgeMs;
    }

    staleCodes(codes: Iterable<CurrencyCode>, maxAgeMs: number, now: Date = new Date()): CurrencyCode[] {
        const unique = new Set<CurrencyCode>();
        for (const code of codes) {
            unique.add(ValidationUtil.normalizeCurrencyCode(code));
        }
        return [...unique].filter(code => this.isStale(code, maxAgeMs, now)).sort();
    }
}
