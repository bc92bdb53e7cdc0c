// src/shared/utils/validation.util.ts

/**
 * Small validation helpers shared by the domain services.
 */
export class ValidationUtil {
    static isAsciiLetter(ch: string): boolean {
        return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
    }

    static isDigit(ch: string): boolean {
        return ch >= '0' && ch <= '9';
    }

    static isWhitespace(ch: string): boolean {
        return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
    }

    /**
     * Currency codes are three ASCII letters once normalized.
     */
    static normalizeCurrencyCode(code: string): string {
        return code.trim().toUpperCase();
    }

    static isValidCurrencyCode(code: string): boolean {
        return code.length === 3 && [...code].every(ch => ch >= 'A' && ch <= 'Z');
    }

    static isBlank(value: string | undefined | null): boolean {
        return value === undefined || value === null || value.trim().length === 0;
    }

    static isPositiveFinite(value: number): boolean {
        return typeof value === 'number' && Number.isFinite(value) && value > 0;
    }
}
