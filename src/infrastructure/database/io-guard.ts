// src/infrastructure/database/io-guard.ts
import { LoggerService } from '../monitoring/logger.service';
import { BaseException } from '../../shared/exceptions/base.exception';
import { IOTimeoutException } from '../../shared/exceptions/infrastructure.exception';
import { withTimeout } from '../../shared/utils/timeout.util';

export type IoGuard = <T>(operation: string, promise: Promise<T>) => Promise<T>;

/**
 * Bounds a storage call by `timeoutMs`, failing with IOTimeoutException.
 * Unexpected driver errors are logged with the operation name and rethrown.
 */
export function createIoGuard(timeoutMs: number, log: LoggerService): IoGuard {
    return async <T>(operation: string, promise: Promise<T>): Promise<T> => {
        try {
            return await withTimeout(promise, timeoutMs, () => new IOTimeoutException(operation, timeoutMs));
        } catch (error) {
            if (!(error instanceof BaseException)) {
                log.error('Storage operation failed', error, { operation });
            }
            throw error;
        }
    };
}
