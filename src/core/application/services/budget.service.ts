// src/core/application/services/budget.service.ts
import { BudgetEntity } from '../../domain/entities/budget.entity';
import { BudgetAlertEntity } from '../../domain/entities/budget-alert.entity';
import { BudgetRepository } from '../../domain/repositories/budget.repository';
import { BudgetAlertRepository } from '../../domain/repositories/budget-alert.repository';
import { RateSnapshot } from '../../domain/value-objects/rate-snapshot.vo';
import { Money } from '../../domain/value-objects/money.vo';
import { CurrencyConverter } from '../../domain/services/currency-converter.service';
import { MoneyParser } from '../../domain/services/money-parser.service';
import { RateSnapshotSource, TransactionSource } from '../../domain/services/aggregation.service';
import {
    BudgetPeriod,
    CheckAllOptions,
    SetBudgetInput,
    budgetPeriodSchema,
    checkAllOptionsSchema,
    setBudgetSchema
} from '../dtos/budget.dto';
import { validateInput } from '../dtos/transaction.dto';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { IoGuard, createIoGuard } from '../../../infrastructure/database/io-guard';
import { BUDGET_PERIODS, BudgetPeriodType, CurrencyCode, DateBounds } from '../../../shared/types/common.types';
import { ERROR_CODES } from '../../../shared/types/error-codes';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { DateUtil } from '../../../shared/utils/date.util';

export interface BudgetEngineOptions {
    /** Currency of a limit whose text names none. */
    defaultCurrency: CurrencyCode;
    ioTimeoutMs: number;
    /** Rates older than this are reported as stale. */
    rateMaxAgeMs: number;
    clock?: () => Date;
}

/** Budget figures converted for display. */
export interface DisplayFigures {
    currencyCode: CurrencyCode;
    limit: number;
    spent: number;
    remaining: number;
}

export interface BudgetStatus {
    category: string;
    period: BudgetPeriod;
    /** The budget's own currency: `limit`, `spent` and `remaining` are in it. */
    currencyCode: CurrencyCode;
    limit: number;
    /** Positive magnitude of the category's expenses in the period. */
    spent: number;
    remaining: number;
    /** `spent > limit`, on the figures above. */
    exceeded: boolean;
    /** Whether the budget's start/end window overlaps the period. */
    active: boolean;
    staleCurrencies: CurrencyCode[];
    display: DisplayFigures;
}

const log = logger.child({ component: 'BudgetEngine' });

/**
 * Spending limits per category, the checks against them and the alerts
 * those checks leave behind.
 *
 * A status is decided and reported in the budget's own currency; the
 * display currency only adds converted copies of the figures.
 */
export class BudgetEngine {
    private readonly clock: () => Date;
    private readonly io: IoGuard;

    constructor(
        private readonly repository: BudgetRepository,
        private readonly alerts: BudgetAlertRepository,
        private readonly transactions: TransactionSource,
        private readonly rates: RateSnapshotSource,
        private readonly options: BudgetEngineOptions
    ) {
        this.clock = options.clock ?? (() => new Date());
        this.io = createIoGuard(options.ioTimeoutMs, log);
    }

    async setBudget(input: SetBudgetInput): Promise<BudgetEntity> {
        const data = validateInput(setBudgetSchema, input, 'Invalid budget');

        const snapshot = await this.rates.snapshot();
        const parsed = new MoneyParser(snapshot).parse(data.limit, data.currency ?? this.options.defaultCurrency);
        if (parsed.amountMinor < 0) {
            throw ValidationException.field('limit', 'Budget limit must be positive', data.limit);
        }

        const existing = await this.io('budgets.find', this.repository.find(data.category, data.period));
        const now = this.clock();
        const budget = new BudgetEntity({
            category: data.category,
            period: data.period,
            limit: new Money(parsed.amountMinor, parsed.currencyCode),
            startDate: data.startDate ?? null,
            endDate: data.endDate ?? null,
            createdAt: existing?.createdAt ?? now,
            updatedAt: now
        });

        const saved = await this.io('budgets.save', this.repository.save(budget));
        log.info('Budget saved', {
            category: saved.category,
            period: saved.period,
            limitMinor: saved.limit.amountMinor,
            currencyCode: saved.currencyCode,
            startDate: saved.startDate,
            endDate: saved.endDate
        });
        return saved;
    }

    async listBudgets(period?: BudgetPeriodType): Promise<BudgetEntity[]> {
        if (period !== undefined) {
            this.assertPeriodType(period);
        }
        return this.io('budgets.findAll', this.repository.findAll(period));
    }

    async removeBudget(category: string, period: BudgetPeriodType): Promise<void> {
        this.assertPeriodType(period);
        const name = category.trim();

        const removed = await this.io('budgets.delete', this.repository.delete(name, period));
        if (!removed) {
            throw NotFoundException.budget(name, period);
        }

        log.audit('delete', 'budget', { category: name, period });
    }

    async checkBudget(category: string, period: BudgetPeriod, displayCurrency: CurrencyCode): Promise<BudgetStatus> {
        const target = validateInput(budgetPeriodSchema, period, 'Invalid budget period', ERROR_CODES.BUDGET_PERIOD_INVALID);
        const name = category.trim();

        const budget = await this.io('budgets.find', this.repository.find(name, target.type));
        if (!budget) {
            throw NotFoundException.budget(name, target.type);
        }

        const snapshot = await this.rates.snapshot();
        snapshot.get(displayCurrency);
        return this.evaluate(budget, target, displayCurrency, snapshot);
    }

    /**
     * Every budget of the period's type whose window overlaps the period,
     * checked against the same rates. Only the exceeded ones are returned.
     * With `recordAlerts`, each exceeded budget also leaves one unread alert
     * per period; nothing is sent.
     */
    async checkAll(period: BudgetPeriod, displayCurrency: CurrencyCode, options: CheckAllOptions = {}): Promise<BudgetStatus[]> {
        const target = validateInput(budgetPeriodSchema, period, 'Invalid budget period', ERROR_CODES.BUDGET_PERIOD_INVALID);
        const { recordAlerts = false } = validateInput(checkAllOptionsSchema, options, 'Invalid check options');
        const snapshot = await this.rates.snapshot();
        snapshot.get(displayCurrency);

        const bounds = boundsOf(target);
        const budgets = await this.io('budgets.findAll', this.repository.findAll(target.type));
        const exceeded: BudgetStatus[] = [];

        for (const budget of budgets) {
            if (!budget.isActiveDuring(bounds)) continue;

            const status = await this.evaluate(budget, target, displayCurrency, snapshot);
            if (status.exceeded) {
                exceeded.push(status);
            }
        }

        if (exceeded.length > 0) {
            log.warn('Budgets exceeded', {
                period: target,
                categories: exceeded.map(status => status.category)
            });
            if (recordAlerts) {
                await this.recordAlerts(exceeded, bounds, snapshot);
            }
        }
        return exceeded;
    }

    async unreadAlerts(): Promise<BudgetAlertEntity[]> {
        return this.io('budgetAlerts.findUnread', this.alerts.findUnread());
    }

    async markAlertRead(id: number): Promise<void> {
        if (!Number.isSafeInteger(id) || id <= 0) {
            throw ValidationException.field('id', 'Alert id must be a positive integer', id);
        }

        const marked = await this.io('budgetAlerts.markRead', this.alerts.markRead(id));
        if (!marked) {
            throw NotFoundException.budgetAlert(id);
        }
    }

    private async recordAlerts(statuses: BudgetStatus[], bounds: DateBounds, snapshot: RateSnapshot): Promise<void> {
        const unread = await this.unreadAlerts();

        for (const status of statuses) {
            const periodType = status.period.type;
            if (unread.some(alert => alert.concerns(status.category, periodType, bounds.start))) continue;

            const limit = new Money(status.limit, status.currencyCode);
            const spent = new Money(status.spent, status.currencyCode);
            const digits = snapshot.get(status.currencyCode).minorDigits;

            const alert = await this.io('budgetAlerts.create', this.alerts.create({
                category: status.category,
                period: periodType,
                periodStart: bounds.start,
                limit,
                spent,
                message: `Budget limit of ${limit.toDecimalString(digits)} ${status.currencyCode} exceeded for ${status.category}`
                    + ` (${spent.toDecimalString(digits)} spent)`
            }));
            log.info('Budget alert recorded', { alertId: alert.id, category: alert.category, period: periodType });
        }
    }

    private async evaluate(
        budget: BudgetEntity,
        period: BudgetPeriod,
        displayCurrency: CurrencyCode,
        snapshot: RateSnapshot
    ): Promise<BudgetStatus> {
        const converter = new CurrencyConverter(snapshot);
        const display = snapshot.get(displayCurrency).code;
        const bounds = boundsOf(period);

        const involved = new Set<CurrencyCode>([budget.currencyCode, display]);
        let spent = Money.zero(budget.currencyCode);

        for await (const transaction of this.transactions.query({
            category: budget.category,
            kind: 'expense',
            dateFrom: bounds.start,
            dateTo: bounds.end
        })) {
            involved.add(transaction.currencyCode);
            spent = spent.add(converter.convertMoney(transaction.amount, budget.currencyCode));
        }

        const limit = budget.limit;
        const remaining = limit.subtract(spent);

        const staleCurrencies = converter.staleCodes(involved, this.options.rateMaxAgeMs, this.clock());
        if (staleCurrencies.length > 0) {
            log.warn('Budget check used stale rates', { category: budget.category, staleCurrencies });
        }

        return {
            category: budget.category,
            period,
            currencyCode: budget.currencyCode,
            limit: limit.amountMinor,
            spent: spent.amountMinor,
            remaining: remaining.amountMinor,
            exceeded: spent.isGreaterThan(limit),
            active: budget.isActiveDuring(bounds),
            staleCurrencies,
            display: {
                currencyCode: display,
                limit: converter.convert(limit.amountMinor, budget.currencyCode, display),
                spent: converter.convert(spent.amountMinor, budget.currencyCode, display),
                remaining: converter.convert(remaining.amountMinor, budget.currencyCode, display)
            }
        };
    }

    private assertPeriodType(period: BudgetPeriodType): void {
        if (!BUDGET_PERIODS.includes(period)) {
            throw ValidationException.field('period', 'Period must be month or year', period);
        }
    }
}

function boundsOf(period: BudgetPeriod): DateBounds {
    return period.type === 'month'
        ? DateUtil.monthBounds(period.year, period.month)
        : DateUtil.yearBounds(period.year);
}
