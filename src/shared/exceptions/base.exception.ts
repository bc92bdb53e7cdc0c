// src/shared/exceptions/base.exception.ts
import { ERROR_MESSAGES, ErrorCode } from '../types/error-codes';

export abstract class BaseException extends Error {
    public readonly code: ErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(
        message: string,
        code: ErrorCode,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.details = details;

        // Maintains proper stack trace for where our error was thrown
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            summary: ERROR_MESSAGES[this.code],
            details: this.details,
        };
    }
}
