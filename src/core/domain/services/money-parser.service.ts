// src/core/domain/services/money-parser.service.ts
import { RateSnapshot } from '../value-objects/rate-snapshot.vo';
import { CurrencyCode } from '../../../shared/types/common.types';
import {
    InvalidAmountFormatException,
    UnknownCurrencySymbolException
} from '../../../shared/exceptions/money.exception';
import { MoneyDecimal, minorUnitFactor, roundHalfEven } from '../../../shared/utils/rounding.util';
import { ValidationUtil } from '../../../shared/utils/validation.util';

export interface ParsedMoney {
    amountMinor: number;
    currencyCode: CurrencyCode;
}

export const CURRENCY_SYMBOLS: Readonly<Record<string, CurrencyCode>> = {
    '$': 'USD',
    '€': 'EUR',
    '£': 'GBP',
    '¥': 'JPY',
    '₫': 'VND'
};

export const MAGNITUDE_SUFFIXES: Readonly<Record<string, number>> = {
    k: 1_000,
    m: 1_000_000,
    b: 1_000_000_000
};

export type MoneyToken =
    | { kind: 'sign'; negative: boolean }
    | { kind: 'symbol'; symbol: string; currencyCode: CurrencyCode }
    | { kind: 'number'; literal: string }
    | { kind: 'suffix'; suffix: string; multiplier: number }
    | { kind: 'code'; currencyCode: CurrencyCode };

const isSuffix = (ch: string): boolean => Object.prototype.hasOwnProperty.call(MAGNITUDE_SUFFIXES, ch.toLowerCase());

/**
 * Splits money text into tokens. Rejects any character the grammar
 * does not know about; ordering is checked later by the parser.
 */
export function tokenizeMoney(text: string): MoneyToken[] {
    const chars = [...text];
    const tokens: MoneyToken[] = [];
    let i = 0;

    while (i < chars.length) {
        const ch = chars[i];

        if (ValidationUtil.isWhitespace(ch)) {
            i++;
            continue;
        }

        if (ch === '+' || ch === '-') {
            tokens.push({ kind: 'sign', negative: ch === '-' });
            i++;
            continue;
        }

        const symbolCode = CURRENCY_SYMBOLS[ch];
        if (symbolCode !== undefined) {
            tokens.push({ kind: 'symbol', symbol: ch, currencyCode: symbolCode });
            i++;
            continue;
        }

        if (ValidationUtil.isDigit(ch) || ch === '.') {
            let literal = '';
            while (i < chars.length && (ValidationUtil.isDigit(chars[i]) || chars[i] === '.')) {
                literal += chars[i];
                i++;
            }
            tokens.push({ kind: 'number', literal });
            continue;
        }

        if (ValidationUtil.isAsciiLetter(ch)) {
            let run = '';
            while (i < chars.length && ValidationUtil.isAsciiLetter(chars[i])) {
                run += chars[i];
                i++;
            }
            tokens.push(...letterRunTokens(text, run));
            continue;
        }

        throw new InvalidAmountFormatException(text, `unexpected character "${ch}"`);
    }

    return tokens;
}

/**
 * A letter run is a suffix ("k"), a code ("usd") or both ("kusd").
 */
function letterRunTokens(text: string, run: string): MoneyToken[] {
    if (run.length === 1 && isSuffix(run)) {
        return [suffixToken(run)];
    }
    if (run.length === 3) {
        return [{ kind: 'code', currencyCode: run.toUpperCase() }];
    }
    if (run.length === 4 && isSuffix(run[0])) {
        return [suffixToken(run[0]), { kind: 'code', currencyCode: run.slice(1).toUpperCase() }];
    }
    throw new InvalidAmountFormatException(text, `unrecognized text "${run}"`);
}

function suffixToken(letter: string): MoneyToken {
    const suffix = letter.toLowerCase();
    return { kind: 'suffix', suffix, multiplier: MAGNITUDE_SUFFIXES[suffix] };
}

function isValidNumberLiteral(literal: string): boolean {
    const parts = literal.split('.');
    if (parts.length > 2) return false;

    const [whole, fraction] = parts;
    if (fraction === undefined) return whole.length > 0;
    return fraction.length > 0;
}

/**
 * Parses free-form amounts such as "30k", "1.5m", "$20", "20USD" or
 * "-€12.50" into minor units of the resolved currency.
 *
 * Grammar: [sign] [symbol] number [suffix] [code]
 */
export class MoneyParser {
    constructor(private readonly currencies: RateSnapshot) {}

    parse(text: string, defaultCurrency: CurrencyCode): ParsedMoney {
        const tokens = tokenizeMoney(text);
        let position = 0;
        const peek = (): MoneyToken | undefined => tokens[position];

        let negative = false;
        let symbol: Extract<MoneyToken, { kind: 'symbol' }> | undefined;
        let multiplier = 1;
        let code: CurrencyCode | undefined;

        const signToken = peek();
        if (signToken?.kind === 'sign') {
            negative = signToken.negative;
            position++;
        }

        const symbolToken = peek();
        if (symbolToken?.kind === 'symbol') {
            symbol = symbolToken;
            position++;
        }

        const numberToken = peek();
        if (numberToken?.kind !== 'number') {
            throw new InvalidAmountFormatException(text, 'numeric value is missing');
        }
        if (!isValidNumberLiteral(numberToken.literal)) {
            throw new InvalidAmountFormatException(text, `malformed number "${numberToken.literal}"`);
        }
        position++;

        const suffixToken = peek();
        if (suffixToken?.kind === 'suffix') {
            multiplier = suffixToken.multiplier;
            position++;
        }

        const codeToken = peek();
        if (codeToken?.kind === 'code') {
            code = codeToken.currencyCode;
            position++;
        }

        const trailing = peek();
        if (trailing !== undefined) {
            throw new InvalidAmountFormatException(text, `unexpected ${trailing.kind} after amount`);
        }

        const currencyCode = this.resolveCurrency(text, symbol, code, defaultCurrency);
        const currency = this.currencies.get(currencyCode);

        const major = new MoneyDecimal(numberToken.literal).times(multiplier);
        if (major.isZero()) {
            throw new InvalidAmountFormatException(text, 'amount must be greater than zero');
        }

        const magnitude = roundHalfEven(major.times(minorUnitFactor(currency.minorDigits)));
        if (magnitude === null) {
            throw new InvalidAmountFormatException(text, 'amount is too large');
        }
        if (magnitude === 0) {
            throw new InvalidAmountFormatException(text, `amount is below the minor unit of ${currency.code}`);
        }

        return {
            amountMinor: negative ? -magnitude : magnitude,
            currencyCode: currency.code
        };
    }

    private resolveCurrency(
        text: string,
        symbol: Extract<MoneyToken, { kind: 'symbol' }> | undefined,
        code: CurrencyCode | undefined,
        defaultCurrency: CurrencyCode
    ): CurrencyCode {
        if (symbol) {
            if (code !== undefined && code !== symbol.currencyCode) {
                throw new InvalidAmountFormatException(
                    text,
                    `symbol ${symbol.symbol} conflicts with currency code ${code}`
                );
            }
            if (!this.currencies.has(symbol.currencyCode)) {
                throw new UnknownCurrencySymbolException(symbol.symbol, symbol.currencyCode);
            }
            return symbol.currencyCode;
        }

        return code ?? ValidationUtil.normalizeCurrencyCode(defaultCurrency);
    }
}
