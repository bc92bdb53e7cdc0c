// src/infrastructure/monitoring/logger.service.ts
import pino, { Logger, LoggerOptions } from 'pino';
import { getConfig } from '../../config/environment';

export type LogContext = Record<string, unknown>;

function createPinoLogger(): Logger {
    const config = getConfig();

    const baseOptions: LoggerOptions = {
        level: config.get('LOG_LEVEL'),
        base: { service: 'ledger-core' },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label })
        },
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.isDevelopment()) {
        // pretty print for local runs
        return pino({
            ...baseOptions,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname'
                }
            }
        });
    }

    return pino(baseOptions);
}

export class LoggerService {
    private static instance: LoggerService | undefined;

    private constructor(private readonly logger: Logger) {}

    static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = new LoggerService(createPinoLogger());
        }
        return LoggerService.instance;
    }

    debug(message: string, context: LogContext = {}): void {
        this.logger.debug(context, message);
    }

    info(message: string, context: LogContext = {}): void {
        this.logger.info(context, message);
    }

    warn(message: string, context: LogContext = {}): void {
        this.logger.warn(context, message);
    }

    error(message: string, error?: unknown, context: LogContext = {}): void {
        this.logger.error({ ...context, error: LoggerService.describe(error) }, message);
    }

    database(message: string, context: LogContext = {}): void {
        this.debug(`[DATABASE] ${message}`, context);
    }

    audit(action: string, resource: string, context: LogContext = {}): void {
        this.info(`[AUDIT] ${action} on ${resource}`, {
            ...context,
            audit: { action, resource, timestamp: new Date().toISOString() }
        });
    }

    /**
     * Child logger whose lines all carry `context`, e.g. the component name.
     */
    child(context: LogContext): LoggerService {
        return new LoggerService(this.logger.child(context));
    }

    private static describe(error: unknown): LogContext | undefined {
        if (error === undefined) return undefined;
        if (error instanceof Error) {
            return { name: error.name, message: error.message, stack: error.stack };
        }
        return { message: String(error) };
    }
}

// Singleton instance
export const logger = LoggerService.getInstance();

export type { Logger } from 'pino';
