// src/core/domain/services/aggregation.service.ts
import { TransactionEntity } from '../entities/transaction.entity';
import { Money } from '../value-objects/money.vo';
import { RateSnapshot } from '../value-objects/rate-snapshot.vo';
import { CurrencyConverter } from './currency-converter.service';
import { TransactionFilter } from '../repositories/transaction.repository';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import {
    CalendarDate,
    CurrencyCode,
    SUMMARY_DIMENSIONS,
    SummaryDimension
} from '../../../shared/types/common.types';
import { ERROR_CODES } from '../../../shared/types/error-codes';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { DateUtil } from '../../../shared/utils/date.util';
import { ValidationUtil } from '../../../shared/utils/validation.util';

/** What the engine reads transactions from. */
export interface TransactionSource {
    query(filter?: TransactionFilter): AsyncIterable<TransactionEntity>;
}

/** What the engine reads the current rates from. */
export interface RateSnapshotSource {
    snapshot(): Promise<RateSnapshot>;
}

export interface PeriodSummary {
    currencyCode: CurrencyCode;
    incomeTotal: number;
    /** Positive magnitude. */
    expenseTotal: number;
    net: number;
    transactionCount: number;
}

export interface MonthlySummary extends PeriodSummary {
    year: number;
    month: number;
}

export interface YearlySummary extends PeriodSummary {
    year: number;
    months: MonthlySummary[];
}

export interface BalanceOptions {
    asOf?: CalendarDate;
    displayCurrency: CurrencyCode;
}

const log = logger.child({ component: 'AggregationEngine' });

/**
 * Read-only reporting over the transaction set.
 *
 * Every transaction is converted on its own into the display currency and
 * the converted values are summed. A total that leaves the safe integer range
 * fails with AmountOutOfRangeException. Rates come from the snapshot given to
 * each call, or from the current table when none is given, so a past
 * transaction's reported value follows later rate changes.
 */
export class AggregationEngine {
    constructor(
        private readonly transactions: TransactionSource,
        private readonly rates: RateSnapshotSource
    ) {}

    async summarizeBy(
        dimension: SummaryDimension,
        filter: TransactionFilter,
        displayCurrency: CurrencyCode,
        snapshot?: RateSnapshot
    ): Promise<Map<string, number>> {
        if (!SUMMARY_DIMENSIONS.includes(dimension)) {
            throw ValidationException.field('dimension', 'Dimension must be category or source', dimension);
        }

        const converter = await this.converterFor(displayCurrency, snapshot);
        const target = ValidationUtil.normalizeCurrencyCode(displayCurrency);
        const totals = new Map<string, Money>();

        for await (const transaction of this.transactions.query(filter)) {
            const key = dimension === 'category' ? transaction.category : transaction.source;
            const converted = new Money(converter.convert(transaction.signedAmountMinor, transaction.currencyCode, target), target);
            totals.set(key, (totals.get(key) ?? Money.zero(target)).add(converted));
        }

        log.debug('Summary computed', { dimension, groups: totals.size, currencyCode: target });
        return new Map([...totals].map(([key, total]) => [key, total.amountMinor]));
    }

    async monthlySummary(
        year: number,
        month: number,
        displayCurrency: CurrencyCode,
        snapshot?: RateSnapshot
    ): Promise<MonthlySummary> {
        this.assertYear(year);
        if (!Number.isInteger(month) || month < 1 || month > 12) {
            throw ValidationException.field('month', 'Month must be between 1 and 12', month);
        }

        const { start, end } = DateUtil.monthBounds(year, month);
        const totals = await this.totalsBetween(start, end, displayCurrency, snapshot);

        return { year, month, ...totals };
    }

    async yearlySummary(year: number, displayCurrency: CurrencyCode, snapshot?: RateSnapshot): Promise<YearlySummary> {
        this.assertYear(year);

        const converter = await this.converterFor(displayCurrency, snapshot);
        const target = ValidationUtil.normalizeCurrencyCode(displayCurrency);
        const { start, end } = DateUtil.yearBounds(year);

        const months: MonthlySummary[] = Array.from({ length: 12 }, (_, index) => ({
            year,
            month: index + 1,
            ...emptySummary(target)
        }));
        const total = emptySummary(target);

        for await (const transaction of this.transactions.query({ dateFrom: start, dateTo: end })) {
            const converted = converter.convert(transaction.signedAmountMinor, transaction.currencyCode, target);
            const monthIndex = Number(transaction.occurredOn.slice(5, 7)) - 1;
            accumulate(months[monthIndex], transaction, converted);
            accumulate(total, transaction, converted);
        }

        return { year, ...total, months };
    }

    /**
     * Signed sum of every transaction on or before `asOf` (all when omitted).
     */
    async balance(options: BalanceOptions, snapshot?: RateSnapshot): Promise<number> {
        if (options.asOf !== undefined && !DateUtil.isValidCalendarDate(options.asOf)) {
            const message = 'Date must be a real calendar date in YYYY-MM-DD form';
            throw new ValidationException(message, [{ field: 'asOf', message, value: options.asOf }], ERROR_CODES.INVALID_DATE);
        }

        const converter = await this.converterFor(options.displayCurrency, snapshot);
        const target = ValidationUtil.normalizeCurrencyCode(options.displayCurrency);
        const filter: TransactionFilter = options.asOf ? { dateTo: options.asOf } : {};

        let total = Money.zero(target);
        for await (const transaction of this.transactions.query(filter)) {
            total = total.add(new Money(converter.convert(transaction.signedAmountMinor, transaction.currencyCode, target), target));
        }
        return total.amountMinor;
    }

    private async totalsBetween(
        start: CalendarDate,
        end: CalendarDate,
        displayCurrency: CurrencyCode,
        snapshot?: RateSnapshot
    ): Promise<PeriodSummary> {
        const converter = await this.converterFor(displayCurrency, snapshot);
        const target = ValidationUtil.normalizeCurrencyCode(displayCurrency);
        const summary = emptySummary(target);

        for await (const transaction of this.transactions.query({ dateFrom: start, dateTo: end })) {
            accumulate(summary, transaction, converter.convert(transaction.signedAmountMinor, transaction.currencyCode, target));
        }
        return summary;
    }

    /**
     * Fails fast on an unknown display currency, before any scan starts.
     */
    private async converterFor(displayCurrency: CurrencyCode, snapshot?: RateSnapshot): Promise<CurrencyConverter> {
        const rates = snapshot ?? await this.rates.snapshot();
        rates.get(displayCurrency);
        return new CurrencyConverter(rates);
    }

    private assertYear(year: number): void {
        if (!Number.isInteger(year) || year < 1 || year > 9999) {
            throw ValidationException.field('year', 'Year must be between 1 and 9999', year);
        }
    }
}

function emptySummary(currencyCode: CurrencyCode): PeriodSummary {
    return { currencyCode, incomeTotal: 0, expenseTotal: 0, net: 0, transactionCount: 0 };
}

function accumulate(summary: PeriodSummary, transaction: TransactionEntity, convertedSigned: number): void {
    const code = summary.currencyCode;
    const amount = new Money(convertedSigned, code);
    const income = new Money(summary.incomeTotal, code);
    const expense = new Money(summary.expenseTotal, code);

    if (transaction.isIncome) {
        summary.incomeTotal = income.add(amount).amountMinor;
    } else {
        summary.expenseTotal = expense.subtract(amount).amountMinor;
    }
    summary.net = new Money(summary.incomeTotal, code).subtract(new Money(summary.expenseTotal, code)).amountMinor;
    summary.transactionCount++;
}
