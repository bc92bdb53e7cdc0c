// src/shared/types/common.types.ts

/** Three-letter, upper-case currency code such as "USD". */
export type CurrencyCode = string;

/** Calendar date in `YYYY-MM-DD` form, no time component. */
export type CalendarDate = string;

export const TRANSACTION_KINDS = ['income', 'expense'] as const;
export type TransactionKind = typeof TRANSACTION_KINDS[number];

export const RECURRENCE_RULES = ['none', 'daily', 'weekly', 'monthly', 'yearly'] as const;
export type RecurrenceRule = typeof RECURRENCE_RULES[number];

export const BUDGET_PERIODS = ['month', 'year'] as const;
export type BudgetPeriodType = typeof BUDGET_PERIODS[number];

export const SUMMARY_DIMENSIONS = ['category', 'source'] as const;
export type SummaryDimension = typeof SUMMARY_DIMENSIONS[number];

export interface DateBounds {
    start: CalendarDate;
    end: CalendarDate;
}

export interface TimeoutOptions {
    timeoutMs?: number;
}
