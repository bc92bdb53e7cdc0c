// src/shared/exceptions/not-found.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES, ErrorCode } from '../types/error-codes';

export class NotFoundException extends BaseException {
    constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ERROR_CODES.RESOURCE_NOT_FOUND) {
        super(message, code, details);
    }

    static transaction(id: number): NotFoundException {
        return new NotFoundException(`Transaction ${id} not found`, { id }, ERROR_CODES.TRANSACTION_NOT_FOUND);
    }

    static budget(category: string, period: string): NotFoundException {
        return new NotFoundException(
            `No ${period} budget for category "${category}"`,
            { category, period },
            ERROR_CODES.BUDGET_NOT_FOUND
        );
    }

    static budgetAlert(id: number): NotFoundException {
        return new NotFoundException(`Budget alert ${id} not found`, { id }, ERROR_CODES.BUDGET_ALERT_NOT_FOUND);
    }
}
