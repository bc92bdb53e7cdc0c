// src/shared/utils/rounding.util.ts
import Decimal from 'decimal.js';

/**
 * Decimal constructor used for every money computation.
 * Precision is well above what a safe integer times a rate needs.
 */
export const MoneyDecimal = Decimal.clone({
    precision: 50,
    rounding: Decimal.ROUND_HALF_EVEN
});

/**
 * Rounds to the nearest integer, ties to even.
 * Returns null when the result leaves the safe integer range.
 */
export function roundHalfEven(value: Decimal.Value): number | null {
    const rounded = new MoneyDecimal(value).toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN);

    if (rounded.abs().greaterThan(Number.MAX_SAFE_INTEGER)) {
        return null;
    }

    // -0 collapses to 0
    return rounded.toNumber() + 0;
}

export function minorUnitFactor(minorDigits: number): Decimal {
    return new MoneyDecimal(10).pow(minorDigits);
}
