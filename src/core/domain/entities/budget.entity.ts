// src/core/domain/entities/budget.entity.ts
import { Money } from '../value-objects/money.vo';
import {
    BUDGET_PERIODS,
    BudgetPeriodType,
    CalendarDate,
    CurrencyCode,
    DateBounds
} from '../../../shared/types/common.types';
import { DateUtil } from '../../../shared/utils/date.util';

export interface BudgetEntityProps {
    category: string;
    period: BudgetPeriodType;
    limit: Money;
    /** First day the budget applies; null means no lower bound. */
    startDate: CalendarDate | null;
    /** Last day the budget applies; null means open-ended. */
    endDate: CalendarDate | null;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Spending limit for one category over a month or a year.
 * A category has at most one budget per period type.
 */
export class BudgetEntity {
    private readonly props: BudgetEntityProps;

    constructor(props: BudgetEntityProps) {
        this.props = props;
        this.validate();
    }

    get category(): string { return this.props.category; }
    get period(): BudgetPeriodType { return this.props.period; }
    get limit(): Money { return this.props.limit; }
    get currencyCode(): CurrencyCode { return this.props.limit.currencyCode; }
    get startDate(): CalendarDate | null { return this.props.startDate; }
    get endDate(): CalendarDate | null { return this.props.endDate; }
    get createdAt(): Date { return this.props.createdAt; }
    get updatedAt(): Date { return this.props.updatedAt; }

    /**
     * True when the budget's window overlaps any day of `bounds`.
     */
    isActiveDuring(bounds: DateBounds): boolean {
        if (this.props.startDate !== null && this.props.startDate > bounds.end) return false;
        if (this.props.endDate !== null && this.props.endDate < bounds.start) return false;
        return true;
    }

    private validate(): void {
        if (this.props.category.trim().length === 0) {
            throw new Error('Budget category must not be empty');
        }
        if (!BUDGET_PERIODS.includes(this.props.period)) {
            throw new Error(`Invalid budget period: ${this.props.period}`);
        }
        if (this.props.limit.amountMinor <= 0) {
            throw new Error('Budget limit must be greater than zero');
        }
        for (const date of [this.props.startDate, this.props.endDate]) {
            if (date !== null && !DateUtil.isValidCalendarDate(date)) {
                throw new Error(`Invalid budget date: ${date}`);
            }
        }
        if (this.props.startDate !== null && this.props.endDate !== null && this.props.endDate < this.props.startDate) {
            throw new Error('Budget end date must not be before its start date');
        }
    }

    toJSON() {
        return {
            category: this.category,
            period: this.period,
            limitMinor: this.limit.amountMinor,
            currencyCode: this.currencyCode,
            startDate: this.startDate,
            endDate: this.endDate,
            createdAt: this.createdAt.toISOString(),
            updatedAt: this.updatedAt.toISOString()
        };
    }
}
