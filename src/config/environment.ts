// src/config/environment.ts
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ValidationException } from '../shared/exceptions/validation.exception';

const integer = (fallback: string) => z.string().default(fallback).transform(val => parseInt(val, 10)).pipe(z.number().int().positive());

const currencyCode = (fallback: string) => z.string()
    .default(fallback)
    .transform(val => val.trim().toUpperCase())
    .pipe(z.string().length(3, 'Currency code must have 3 letters'));

const environmentSchema = z.object({
    // Application
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    // Database - PostgreSQL
    POSTGRES_HOST: z.string().default('localhost'),
    POSTGRES_PORT: integer('5432'),
    POSTGRES_DB: z.string().default('ledger'),
    POSTGRES_USER: z.string().default('ledger'),
    POSTGRES_PASSWORD: z.string().default(''),
    POSTGRES_SSL: z.string().default('false').transform(val => val === 'true'),
    POSTGRES_MAX_CONNECTIONS: integer('10'),

    // Ledger
    BASE_CURRENCY: currencyCode('VND'),
    DEFAULT_CURRENCY: currencyCode('VND'),
    IO_TIMEOUT_MS: integer('5000'),
    RATE_PROVIDER_TIMEOUT_MS: integer('10000'),
    RATE_MAX_AGE_HOURS: integer('24'),
    QUERY_PAGE_SIZE: integer('200'),

    // Logging
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Environment = z.infer<typeof environmentSchema>;

export function parseEnvironment(env: NodeJS.ProcessEnv): Environment {
    const result = environmentSchema.safeParse(env);
    if (!result.success) {
        throw new ValidationException(
            'Invalid configuration',
            result.error.issues.map(issue => ({
                field: issue.path.join('.'),
                message: issue.message
            }))
        );
    }
    return result.data;
}

export class ConfigService {
    private static instance: ConfigService | undefined;
    private readonly config: Environment;

    constructor(env: NodeJS.ProcessEnv = process.env) {
        this.config = parseEnvironment(env);
    }

    static getInstance(): ConfigService {
        if (!ConfigService.instance) {
            loadDotenv();
            ConfigService.instance = new ConfigService();
        }
        return ConfigService.instance;
    }

    get<K extends keyof Environment>(key: K): Environment[K] {
        return this.config[key];
    }

    // Convenience methods
    isDevelopment(): boolean {
        return this.config.NODE_ENV === 'development';
    }

    isTest(): boolean {
        return this.config.NODE_ENV === 'test';
    }

    rateMaxAgeMs(): number {
        return this.config.RATE_MAX_AGE_HOURS * 60 * 60 * 1000;
    }

    getDatabaseUrl(): string {
        return `postgresql://${this.config.POSTGRES_USER}:${this.config.POSTGRES_PASSWORD}@${this.config.POSTGRES_HOST}:${this.config.POSTGRES_PORT}/${this.config.POSTGRES_DB}`;
    }
}

export const getConfig = (): ConfigService => ConfigService.getInstance();
