// src/shared/exceptions/validation.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES, ErrorCode } from '../types/error-codes';

export interface FieldError {
    field: string;
    message: string;
    value?: unknown;
}

export class ValidationException extends BaseException {
    public readonly validationErrors: FieldError[];

    constructor(message: string, validationErrors: FieldError[] = [], code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
        super(message, code, { validationErrors });
        this.validationErrors = validationErrors;
    }

    static field(field: string, message: string, value?: unknown): ValidationException {
        return new ValidationException(message, [{ field, message, value }]);
    }
}
