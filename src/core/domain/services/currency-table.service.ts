// src/core/domain/services/currency-table.service.ts
import { CurrencyEntity, DEFAULT_MINOR_DIGITS } from '../entities/currency.entity';
import { CurrencyRepository } from '../repositories/currency.repository';
import { RateSnapshot } from '../value-objects/rate-snapshot.vo';
import { RateProvider, RateQuote } from '../../../infrastructure/rates/rate-provider';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { IoGuard, createIoGuard } from '../../../infrastructure/database/io-guard';
import { CurrencyCode, TimeoutOptions } from '../../../shared/types/common.types';
import { InvalidRateException, UnknownCurrencyException } from '../../../shared/exceptions/money.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { ProviderUnavailableException } from '../../../shared/exceptions/infrastructure.exception';
import { ValidationUtil } from '../../../shared/utils/validation.util';
import { withTimeout } from '../../../shared/utils/timeout.util';

export interface CurrencyTableOptions {
    /** Bound for every repository call. */
    ioTimeoutMs: number;
    /** Default bound for a provider refresh. */
    providerTimeoutMs: number;
    clock?: () => Date;
}

export interface UpsertCurrencyOptions {
    minorDigits?: number;
}

const log = logger.child({ component: 'CurrencyTable' });

/**
 * Owns the currency records and their rates to the base currency.
 *
 * Changing the base does not rewrite the other rates: after `setBase` the
 * caller must supply rates expressed against the new base.
 */
export class CurrencyTable {
    private cached: RateSnapshot | null = null;
    private readonly clock: () => Date;
    private readonly io: IoGuard;

    constructor(
        private readonly repository: CurrencyRepository,
        private readonly options: CurrencyTableOptions
    ) {
        this.clock = options.clock ?? (() => new Date());
        this.io = createIoGuard(options.ioTimeoutMs, log);
    }

    async upsert(
        code: string,
        displayName: string,
        rateToBase: number,
        options: UpsertCurrencyOptions = {}
    ): Promise<CurrencyEntity> {
        const [currency] = await this.prepare([{ code, displayName, rateToBase, minorDigits: options.minorDigits }]);

        await this.write('currencies.upsertMany', this.repository.upsertMany([currency]));

        log.info('Currency upserted', { code: currency.code, rateToBase: currency.rateToBase });
        return currency;
    }

    async get(code: string): Promise<CurrencyEntity> {
        const normalized = ValidationUtil.normalizeCurrencyCode(code);
        const currency = await this.io('currencies.findByCode', this.repository.findByCode(normalized));
        if (!currency) {
            throw new UnknownCurrencyException(normalized);
        }
        return currency;
    }

    async list(): Promise<CurrencyEntity[]> {
        const snapshot = await this.snapshot();
        return snapshot.list();
    }

    async setBase(code: string): Promise<CurrencyEntity> {
        const currency = await this.get(code);

        await this.write('currencies.setBase', this.repository.setBase(currency.code, this.clock()));

        log.warn('Base currency changed; other rates are not rewritten', { code: currency.code });
        return this.get(currency.code);
    }

    /**
     * All-or-nothing: every quote is validated before anything is written,
     * and the write itself is a single repository transaction.
     */
    async applyRateBatch(quotes: RateQuote[]): Promise<CurrencyEntity[]> {
        const seen = new Set<CurrencyCode>();
        for (const quote of quotes) {
            const code = ValidationUtil.normalizeCurrencyCode(quote.code);
            if (seen.has(code)) {
                throw ValidationException.field('code', `Duplicate currency ${code} in rate batch`, code);
            }
            seen.add(code);
        }

        const currencies = await this.prepare(quotes);
        if (currencies.length === 0) {
            return [];
        }

        await this.write('currencies.upsertMany', this.repository.upsertMany(currencies));

        log.info('Rate batch applied', { count: currencies.length });
        return currencies;
    }

    async refreshRates(provider: RateProvider, options: TimeoutOptions = {}): Promise<CurrencyEntity[]> {
        const timeoutMs = options.timeoutMs ?? this.options.providerTimeoutMs;
        let quotes: RateQuote[];

        try {
            quotes = await withTimeout(
                provider.fetchRates(),
                timeoutMs,
                () => new ProviderUnavailableException(`Rate provider ${provider.name} timed out after ${timeoutMs}ms`)
            );
        } catch (error) {
            log.error('Rate refresh failed', error, { provider: provider.name });
            if (error instanceof ProviderUnavailableException) {
                throw error;
            }
            throw new ProviderUnavailableException(`Rate provider ${provider.name} failed`, error);
        }

        return this.applyRateBatch(quotes);
    }

    /**
     * Cached until the next write made through this table, whether that
     * write succeeded, failed or timed out.
     */
    async snapshot(): Promise<RateSnapshot> {
        if (!this.cached) {
            const currencies = await this.io('currencies.findAll', this.repository.findAll());
            this.cached = new RateSnapshot(currencies);
        }
        return this.cached;
    }

    invalidate(): void {
        this.cached = null;
    }

    /**
     * A timed-out write can still land after the guard gives up, so the
     * cache is dropped both when the guard settles and when the write does.
     */
    private async write(operation: string, pending: Promise<void>): Promise<void> {
        try {
            await this.io(operation, pending.finally(() => this.invalidate()));
        } finally {
            this.invalidate();
        }
    }

    private async prepare(quotes: RateQuote[]): Promise<CurrencyEntity[]> {
        const existing = await this.snapshot();
        const updatedAt = this.clock();

        return quotes.map(quote => {
            const code = ValidationUtil.normalizeCurrencyCode(quote.code);
            if (!ValidationUtil.isValidCurrencyCode(code)) {
                throw ValidationException.field('code', 'Currency code must be three letters', quote.code);
            }
            if (ValidationUtil.isBlank(quote.displayName)) {
                throw ValidationException.field('displayName', `Display name for ${code} is required`, quote.displayName);
            }
            if (!ValidationUtil.isPositiveFinite(quote.rateToBase)) {
                throw new InvalidRateException(code, quote.rateToBase);
            }

            const current = existing.find(code);
            const isBase = current?.isBase ?? false;
            if (isBase && quote.rateToBase !== 1) {
                throw new InvalidRateException(code, quote.rateToBase, 'the base currency rate is fixed at 1');
            }

            try {
                return new CurrencyEntity({
                    code,
                    displayName: quote.displayName.trim(),
                    rateToBase: quote.rateToBase,
                    minorDigits: quote.minorDigits ?? current?.minorDigits ?? DEFAULT_MINOR_DIGITS,
                    isBase,
                    updatedAt
                });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                throw ValidationException.field('minorDigits', message, quote.minorDigits);
            }
        });
    }
}
