// src/shared/exceptions/money.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES } from '../types/error-codes';

export class InvalidAmountFormatException extends BaseException {
    constructor(input: string, reason: string) {
        super(`Invalid amount "${input}": ${reason}`, ERROR_CODES.INVALID_AMOUNT_FORMAT, { input, reason });
    }
}

export class UnknownCurrencySymbolException extends BaseException {
    constructor(symbol: string, mappedCode: string) {
        super(
            `Currency symbol "${symbol}" maps to ${mappedCode}, which is not configured`,
            ERROR_CODES.UNKNOWN_CURRENCY_SYMBOL,
            { symbol, mappedCode }
        );
    }
}

export class UnknownCurrencyException extends BaseException {
    constructor(code: string) {
        super(`Unknown currency: ${code}`, ERROR_CODES.UNKNOWN_CURRENCY, { currencyCode: code });
    }
}

export class InvalidRateException extends BaseException {
    constructor(code: string, rate: number, reason = 'rate must be a positive finite number') {
        super(`Invalid rate ${rate} for ${code}: ${reason}`, ERROR_CODES.INVALID_RATE, { currencyCode: code, rate });
    }
}

/**
 * A computed minor-unit amount (a conversion or a running total) left the
 * safe integer range.
 */
export class AmountOutOfRangeException extends BaseException {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, ERROR_CODES.AMOUNT_OUT_OF_RANGE, details);
    }
}
