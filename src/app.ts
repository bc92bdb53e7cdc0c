// src/app.ts
import { Pool } from 'pg';

import { ConfigService, getConfig } from './config/environment';
import { AggregationEngine } from './core/domain/services/aggregation.service';
import { CurrencyTable } from './core/domain/services/currency-table.service';
import { TransactionStore } from './core/application/services/transaction-store.service';
import { TransactionExportService } from './core/application/services/transaction-export.service';
import { BudgetEngine } from './core/application/services/budget.service';
import { BudgetAlertRepository } from './core/domain/repositories/budget-alert.repository';
import { BudgetRepository } from './core/domain/repositories/budget.repository';
import { CurrencyRepository } from './core/domain/repositories/currency.repository';
import { TransactionRepository } from './core/domain/repositories/transaction.repository';
import { closePool, createPool, ensureSchema } from './infrastructure/database/connections';
import { BudgetAlertRepositoryImpl } from './infrastructure/database/postgres/repositories/budget-alert.repository.impl';
import { BudgetRepositoryImpl } from './infrastructure/database/postgres/repositories/budget.repository.impl';
import { CurrencyRepositoryImpl } from './infrastructure/database/postgres/repositories/currency.repository.impl';
import { TransactionRepositoryImpl } from './infrastructure/database/postgres/repositories/transaction.repository.impl';
import { logger } from './infrastructure/monitoring/logger.service';

export interface LedgerRepositories {
    transactions: TransactionRepository;
    currencies: CurrencyRepository;
    budgets: BudgetRepository;
    budgetAlerts: BudgetAlertRepository;
}

export interface LedgerAppOptions {
    config?: ConfigService;
    /** Used for every repository not given in `repositories`. Created from config when omitted. */
    pool?: Pool;
    repositories?: Partial<LedgerRepositories>;
    clock?: () => Date;
}

export interface LedgerApp {
    readonly config: ConfigService;
    readonly currencies: CurrencyTable;
    readonly transactions: TransactionStore;
    readonly aggregation: AggregationEngine;
    readonly budgets: BudgetEngine;
    readonly exports: TransactionExportService;
    /** Applies the schema (when backed by PostgreSQL) and makes sure a base currency exists. */
    initialize(): Promise<void>;
    /** Releases the pool if this app created it. */
    close(): Promise<void>;
}

/**
 * Wires the ledger components for a command surface.
 */
export function createLedgerApp(options: LedgerAppOptions = {}): LedgerApp {
    const config = options.config ?? getConfig();
    const given = options.repositories ?? {};
    const needsPool = !given.transactions || !given.currencies || !given.budgets || !given.budgetAlerts;

    const ownsPool = needsPool && !options.pool;
    const pool = needsPool ? options.pool ?? createPool(config) : undefined;

    const repositories: LedgerRepositories = {
        transactions: given.transactions ?? new TransactionRepositoryImpl(requirePool(pool)),
        currencies: given.currencies ?? new CurrencyRepositoryImpl(requirePool(pool)),
        budgets: given.budgets ?? new BudgetRepositoryImpl(requirePool(pool)),
        budgetAlerts: given.budgetAlerts ?? new BudgetAlertRepositoryImpl(requirePool(pool))
    };

    const ioTimeoutMs = config.get('IO_TIMEOUT_MS');
    const defaultCurrency = config.get('DEFAULT_CURRENCY');

    const currencies = new CurrencyTable(repositories.currencies, {
        ioTimeoutMs,
        providerTimeoutMs: config.get('RATE_PROVIDER_TIMEOUT_MS'),
        clock: options.clock
    });

    const transactions = new TransactionStore(repositories.transactions, currencies, {
        defaultCurrency,
        ioTimeoutMs,
        pageSize: config.get('QUERY_PAGE_SIZE'),
        clock: options.clock
    });

    const aggregation = new AggregationEngine(transactions, currencies);

    const budgets = new BudgetEngine(repositories.budgets, repositories.budgetAlerts, transactions, currencies, {
        defaultCurrency,
        ioTimeoutMs,
        rateMaxAgeMs: config.rateMaxAgeMs(),
        clock: options.clock
    });

    const exportService = new TransactionExportService(transactions, currencies);

    return {
        config,
        currencies,
        transactions,
        aggregation,
        budgets,
        exports: exportService,

        async initialize(): Promise<void> {
            if (pool) {
                await ensureSchema(pool);
            }

            const snapshot = await currencies.snapshot();
            if (snapshot.baseCode === null) {
                const baseCode = config.get('BASE_CURRENCY');
                if (!snapshot.has(baseCode)) {
                    await currencies.upsert(baseCode, baseCode, 1);
                }
                await currencies.setBase(baseCode);
                logger.info('Base currency initialized', { code: baseCode });
            }
        },

        async close(): Promise<void> {
            if (pool && ownsPool) {
                await closePool(pool);
            }
        }
    };
}

function requirePool(pool: Pool | undefined): Pool {
    if (!pool) {
        throw new Error('A PostgreSQL pool is required for the default repositories');
    }
    return pool;
}

export { ConfigService } from './config/environment';
export * from './shared/exceptions';
