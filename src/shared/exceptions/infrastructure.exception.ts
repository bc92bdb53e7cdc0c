// src/shared/exceptions/infrastructure.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES, ErrorCode } from '../types/error-codes';

export class InfrastructureException extends BaseException {
    constructor(message: string, code: ErrorCode = ERROR_CODES.DATABASE_ERROR, details?: Record<string, unknown>) {
        super(message, code, details);
    }
}

export class IOTimeoutException extends InfrastructureException {
    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`, ERROR_CODES.IO_TIMEOUT, { operation, timeoutMs });
    }
}

export class ProviderUnavailableException extends InfrastructureException {
    constructor(message: string, cause?: unknown) {
        super(message, ERROR_CODES.PROVIDER_UNAVAILABLE, {
            cause: cause instanceof Error ? cause.message : cause
        });
    }
}
