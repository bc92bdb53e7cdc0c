// src/shared/types/error-codes.ts

/**
 * Standardized error codes.
 * Prefix names the area, number range groups related failures.
 */
export const ERROR_CODES = {
    // Validation (1100-1199)
    VALIDATION_ERROR: 'VAL_1101',
    INVALID_DATE: 'VAL_1109',
    INVALID_AMOUNT_FORMAT: 'VAL_1111',
    AMOUNT_OUT_OF_RANGE: 'VAL_1113',

    // Transaction Errors (1300-1399)
    TRANSACTION_NOT_FOUND: 'TXN_1301',
    TRANSACTION_KIND_MISMATCH: 'TXN_1307',

    // Budget Errors (1400-1499)
    BUDGET_NOT_FOUND: 'BDG_1401',
    BUDGET_PERIOD_INVALID: 'BDG_1403',
    BUDGET_ALERT_NOT_FOUND: 'BDG_1405',

    // Currency Errors (1500-1599)
    UNKNOWN_CURRENCY: 'CUR_1501',
    UNKNOWN_CURRENCY_SYMBOL: 'CUR_1502',
    INVALID_RATE: 'CUR_1503',

    // Database Errors (1800-1899)
    DATABASE_ERROR: 'DB_1801',
    IO_TIMEOUT: 'DB_1803',
    MIGRATION_FAILED: 'DB_1807',

    // External Service Errors (1900-1999)
    PROVIDER_UNAVAILABLE: 'EXT_1907',

    // System Errors (2000-2099)
    RESOURCE_NOT_FOUND: 'SYS_2005',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Default user-facing messages
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
    [ERROR_CODES.VALIDATION_ERROR]: 'Invalid input data',
    [ERROR_CODES.INVALID_DATE]: 'Invalid calendar date',
    [ERROR_CODES.INVALID_AMOUNT_FORMAT]: 'Invalid amount format. Use numbers with k, m or b suffixes, e.g. 30k, 1.5m, $20, 20USD',
    [ERROR_CODES.AMOUNT_OUT_OF_RANGE]: 'Amount is outside the supported range',
    [ERROR_CODES.TRANSACTION_NOT_FOUND]: 'Transaction not found',
    [ERROR_CODES.TRANSACTION_KIND_MISMATCH]: 'Amount sign contradicts transaction kind',
    [ERROR_CODES.BUDGET_NOT_FOUND]: 'Budget not found',
    [ERROR_CODES.BUDGET_PERIOD_INVALID]: 'Invalid budget period',
    [ERROR_CODES.BUDGET_ALERT_NOT_FOUND]: 'Budget alert not found',
    [ERROR_CODES.UNKNOWN_CURRENCY]: 'Currency is not configured',
    [ERROR_CODES.UNKNOWN_CURRENCY_SYMBOL]: 'Currency symbol maps to no configured currency',
    [ERROR_CODES.INVALID_RATE]: 'Exchange rate must be a positive number',
    [ERROR_CODES.DATABASE_ERROR]: 'Database error',
    [ERROR_CODES.IO_TIMEOUT]: 'Storage operation timed out',
    [ERROR_CODES.MIGRATION_FAILED]: 'Could not apply database schema',
    [ERROR_CODES.PROVIDER_UNAVAILABLE]: 'Exchange rate provider is unavailable',
    [ERROR_CODES.RESOURCE_NOT_FOUND]: 'Resource not found',
};
