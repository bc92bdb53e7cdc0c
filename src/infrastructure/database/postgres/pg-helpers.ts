// src/infrastructure/database/postgres/pg-helpers.ts
import { logger } from '../../monitoring/logger.service';
import { InfrastructureException } from '../../../shared/exceptions/infrastructure.exception';
import { ERROR_CODES } from '../../../shared/types/error-codes';

/**
 * Logs a driver error with its context and wraps it for the caller.
 * Exceptions that are already ours pass through untouched.
 */
export function databaseFailure(message: string, error: unknown, context: Record<string, unknown> = {}): Error {
    if (error instanceof InfrastructureException) {
        return error;
    }
    logger.error(message, error, context);
    return new InfrastructureException(message, ERROR_CODES.DATABASE_ERROR, {
        ...context,
        cause: error instanceof Error ? error.message : String(error)
    });
}

/**
 * Narrows a text column to one of `allowed`, rejecting rows the schema
 * should never have let through.
 */
export function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
        throw new InfrastructureException(`Unexpected ${column} value "${value}"`, ERROR_CODES.DATABASE_ERROR, { column, value });
    }
    return match;
}

/** BIGINT columns arrive as strings. */
export function toSafeInteger(value: string | number, column: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isSafeInteger(parsed)) {
        throw new InfrastructureException(`Column ${column} is outside the safe integer range`, ERROR_CODES.DATABASE_ERROR, { column, value });
    }
    return parsed;
}

/** Escapes LIKE wildcards so user text matches literally. */
export function escapeLike(term: string): string {
    return term.replace(/[\\%_]/g, ch => `\\${ch}`);
}
