// src/infrastructure/rates/rate-provider.ts
import { CurrencyCode } from '../../shared/types/common.types';

/**
 * One exchange-rate entry: base-currency units per unit of `code`.
 */
export interface RateQuote {
    code: CurrencyCode;
    rateToBase: number;
    displayName: string;
    minorDigits?: number;
}

/**
 * Source of rate snapshots, typically a remote API. Implementations reject
 * when the source cannot be reached; the caller bounds the wait.
 */
export interface RateProvider {
    readonly name: string;
    fetchRates(): Promise<RateQuote[]>;
}
