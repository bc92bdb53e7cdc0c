// src/core/application/dtos/budget.dto.ts
import { z } from 'zod';
import { calendarDate } from './transaction.dto';
import { BUDGET_PERIODS } from '../../../shared/types/common.types';

const year = z.number().int().min(1, 'Year must be between 1 and 9999').max(9999, 'Year must be between 1 and 9999');

/**
 * `startDate` and `endDate` bound the days the budget applies to; either
 * may be omitted or null for an open side.
 */
export const setBudgetSchema = z.object({
    category: z.string().trim().min(1, 'Category is required').max(120, 'Category must be at most 120 characters'),
    period: z.enum(BUDGET_PERIODS),
    limit: z.string().trim().min(1, 'Limit is required'),
    currency: z.string().trim().min(1).optional(),
    startDate: calendarDate.nullable().optional(),
    endDate: calendarDate.nullable().optional(),
}).strict().refine(
    budget => !budget.startDate || !budget.endDate || budget.startDate <= budget.endDate,
    { message: 'endDate must not be before startDate', path: ['endDate'] }
);

export const budgetPeriodSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('month'),
        year,
        month: z.number().int().min(1, 'Month must be between 1 and 12').max(12, 'Month must be between 1 and 12')
    }).strict(),
    z.object({
        type: z.literal('year'),
        year
    }).strict()
]);

export const checkAllOptionsSchema = z.object({
    /** Store an unread alert for each exceeded budget not already alerted for this period. */
    recordAlerts: z.boolean().optional(),
}).strict();

export type SetBudgetInput = z.input<typeof setBudgetSchema>;
export type BudgetPeriod = z.output<typeof budgetPeriodSchema>;
export type CheckAllOptions = z.input<typeof checkAllOptionsSchema>;
