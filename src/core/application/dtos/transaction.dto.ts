// src/core/application/dtos/transaction.dto.ts
import { z } from 'zod';
import { RECURRENCE_RULES, TRANSACTION_KINDS } from '../../../shared/types/common.types';
import { DateUtil } from '../../../shared/utils/date.util';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { ERROR_CODES, ErrorCode } from '../../../shared/types/error-codes';

export const calendarDate = z.string()
    .trim()
    .refine(DateUtil.isValidCalendarDate, 'Date must be a real calendar date in YYYY-MM-DD form');

const label = (field: string) => z.string()
    .trim()
    .min(1, `${field} must not be empty`)
    .max(120, `${field} must be at most 120 characters`);

/**
 * Input for adding a transaction. `amount` is money text ("30k", "$20",
 * "-20USD"); `currency` is the default used when the text names none.
 */
export const addTransactionSchema = z.object({
    amount: z.string().trim().min(1, 'Amount is required'),
    kind: z.enum(TRANSACTION_KINDS).optional(),
    currency: z.string().trim().min(1).optional(),
    category: label('Category').optional(),
    source: label('Source').optional(),
    description: z.string().trim().max(500, 'Description must be less than 500 characters').optional(),
    occurredOn: calendarDate.optional(),
    recurrence: z.enum(RECURRENCE_RULES).optional(),
    tags: z.array(label('Tag')).max(20, 'At most 20 tags').optional(),
    notes: z.string().trim().max(1000, 'Notes must be less than 1000 characters').optional(),
}).strict();

export const updateTransactionSchema = addTransactionSchema
    .partial()
    .refine(fields => Object.values(fields).some(value => value !== undefined), {
        message: 'At least one field must be provided'
    })
    .refine(fields => fields.currency === undefined || fields.amount !== undefined, {
        message: 'Currency can only change together with the amount',
        path: ['currency']
    });

export const transactionFilterSchema = z.object({
    id: z.number().int().positive().optional(),
    dateFrom: calendarDate.optional(),
    dateTo: calendarDate.optional(),
    date: calendarDate.optional(),
    category: z.string().trim().optional(),
    source: z.string().trim().optional(),
    kind: z.enum(TRANSACTION_KINDS).optional(),
    currencyCode: z.string().trim().toUpperCase().optional(),
    search: z.string().trim().min(1).optional(),
    recurring: z.boolean().optional(),
}).strict().refine(
    filter => !filter.dateFrom || !filter.dateTo || filter.dateFrom <= filter.dateTo,
    { message: 'dateFrom must not be after dateTo', path: ['dateFrom'] }
);

export type AddTransactionInput = z.input<typeof addTransactionSchema>;
export type UpdateTransactionInput = z.input<typeof updateTransactionSchema>;
export type TransactionFilterInput = z.input<typeof transactionFilterSchema>;

/**
 * Parses `input` against `schema`, turning zod issues into field errors.
 */
export function validateInput<S extends z.ZodTypeAny>(
    schema: S,
    input: unknown,
    message: string,
    code: ErrorCode = ERROR_CODES.VALIDATION_ERROR
): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new ValidationException(
            message,
            result.error.issues.map(issue => ({
                field: issue.path.join('.') || 'input',
                message: issue.message
            })),
            code
        );
    }
    return result.data;
}
