// src/core/domain/value-objects/money.vo.ts
import { CurrencyCode } from '../../../shared/types/common.types';
import { AmountOutOfRangeException } from '../../../shared/exceptions/money.exception';
import { MoneyDecimal, minorUnitFactor } from '../../../shared/utils/rounding.util';
import { ValidationUtil } from '../../../shared/utils/validation.util';

/**
 * An integer amount in the minor unit of a currency.
 */
export class Money {
    readonly amountMinor: number;
    readonly currencyCode: CurrencyCode;

    constructor(amountMinor: number, currencyCode: CurrencyCode) {
        this.validateAmount(amountMinor);
        this.validateCurrency(currencyCode);

        // -0 collapses to 0
        this.amountMinor = amountMinor + 0;
        this.currencyCode = currencyCode;
    }

    static zero(currencyCode: CurrencyCode): Money {
        return new Money(0, currencyCode);
    }

    private validateAmount(amountMinor: number): void {
        if (!Number.isSafeInteger(amountMinor)) {
            throw new Error(`Minor-unit amount must be a safe integer, got ${amountMinor}`);
        }
    }

    private validateCurrency(currencyCode: CurrencyCode): void {
        if (!ValidationUtil.isValidCurrencyCode(currencyCode)) {
            throw new Error(`Invalid currency code: ${currencyCode}`);
        }
    }

    add(other: Money): Money {
        this.ensureSameCurrency(other);
        return Money.checked(this.amountMinor + other.amountMinor, this.currencyCode, 'add');
    }

    subtract(other: Money): Money {
        this.ensureSameCurrency(other);
        return Money.checked(this.amountMinor - other.amountMinor, this.currencyCode, 'subtract');
    }

    negate(): Money {
        return new Money(-this.amountMinor, this.currencyCode);
    }

    isGreaterThan(other: Money): boolean {
        this.ensureSameCurrency(other);
        return this.amountMinor > other.amountMinor;
    }

    private static checked(amountMinor: number, currencyCode: CurrencyCode, operation: string): Money {
        if (!Number.isSafeInteger(amountMinor)) {
            throw new AmountOutOfRangeException(
                `Cannot ${operation} ${currencyCode} amounts: the result is out of range`,
                { currencyCode, operation }
            );
        }
        return new Money(amountMinor, currencyCode);
    }

    private ensureSameCurrency(other: Money): void {
        if (this.currencyCode !== other.currencyCode) {
            throw new Error(`Currency mismatch: ${this.currencyCode} vs ${other.currencyCode}`);
        }
    }

    /**
     * Major-unit decimal string, e.g. 2050 with 2 digits -> "20.50".
     */
    toDecimalString(minorDigits: number): string {
        return new MoneyDecimal(this.amountMinor).div(minorUnitFactor(minorDigits)).toFixed(minorDigits);
    }

    toJSON() {
        return {
            amountMinor: this.amountMinor,
            currencyCode: this.currencyCode
        };
    }
}
