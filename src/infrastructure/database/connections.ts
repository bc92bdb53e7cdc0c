// src/infrastructure/database/connections.ts
import { readFile } from 'fs/promises';
import path from 'path';
import { Pool, PoolClient, PoolConfig } from 'pg';

import { ConfigService, getConfig } from '../../config/environment';
import { logger } from '../monitoring/logger.service';
import { InfrastructureException } from '../../shared/exceptions/infrastructure.exception';
import { ERROR_CODES } from '../../shared/types/error-codes';

type TransactionCallback<T> = (client: PoolClient) => Promise<T>;

/** Resolves to <root>/db/schema.sql from both src/ and dist/. */
export const SCHEMA_PATH = path.resolve(__dirname, '../../../db/schema.sql');

/**
 * PostgreSQL pool settings from configuration
 */
export const getPostgresConfig = (config: ConfigService = getConfig()): PoolConfig => ({
    host: config.get('POSTGRES_HOST'),
    port: config.get('POSTGRES_PORT'),
    database: config.get('POSTGRES_DB'),
    user: config.get('POSTGRES_USER'),
    password: config.get('POSTGRES_PASSWORD'),
    ssl: config.get('POSTGRES_SSL') ? { rejectUnauthorized: false } : false,
    max: config.get('POSTGRES_MAX_CONNECTIONS'),
    connectionTimeoutMillis: config.get('IO_TIMEOUT_MS'),
    query_timeout: config.get('IO_TIMEOUT_MS'),
    application_name: 'ledger-core',
});

export function createPool(config: ConfigService = getConfig()): Pool {
    const poolConfig = getPostgresConfig(config);
    const pool = new Pool(poolConfig);

    pool.on('error', (error) => {
        logger.error('PostgreSQL idle client error', error, { host: poolConfig.host });
    });

    logger.database('PostgreSQL pool created', {
        host: poolConfig.host,
        database: poolConfig.database,
        max: poolConfig.max
    });
    return pool;
}

/**
 * Runs `callback` inside BEGIN/COMMIT on one client, rolling back on any error.
 */
export async function withTransaction<T>(pool: Pool, callback: TransactionCallback<T>): Promise<T> {
    const client = await pool.connect();

    try {
        await client.query('BEGIN');
        const result = await callback(client);
        await client.query('COMMIT');
        return result;
    } catch (error) {
        try {
            await client.query('ROLLBACK');
        } catch (rollbackError) {
            logger.error('Rollback failed', rollbackError);
        }
        throw error;
    } finally {
        client.release();
    }
}

/**
 * Applies db/schema.sql. Safe to call on every start.
 */
export async function ensureSchema(pool: Pool, schemaPath: string = SCHEMA_PATH): Promise<void> {
    const startTime = Date.now();

    try {
        const sql = await readFile(schemaPath, 'utf8');
        await withTransaction(pool, client => client.query(sql));
    } catch (error) {
        logger.error('Failed to apply database schema', error, { schemaPath });
        throw new InfrastructureException('Failed to apply database schema', ERROR_CODES.MIGRATION_FAILED, {
            schemaPath,
            cause: error instanceof Error ? error.message : String(error)
        });
    }

    logger.database('Schema applied', { duration: `${Date.now() - startTime}ms` });
}

export async function closePool(pool: Pool): Promise<void> {
    await pool.end();
    logger.database('PostgreSQL pool closed');
}
