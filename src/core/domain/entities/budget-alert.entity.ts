// src/core/domain/entities/budget-alert.entity.ts
import { Money } from '../value-objects/money.vo';
import { BudgetPeriodType, CalendarDate, CurrencyCode } from '../../../shared/types/common.types';

export interface BudgetAlertEntityProps {
    id: number;
    category: string;
    period: BudgetPeriodType;
    /** First day of the checked month or year. */
    periodStart: CalendarDate;
    limit: Money;
    spent: Money;
    message: string;
    read: boolean;
    createdAt: Date;
}

export type NewBudgetAlert = Omit<BudgetAlertEntityProps, 'id' | 'read' | 'createdAt'>;

/**
 * Record of a budget found exceeded. Alerts are kept until marked read;
 * nothing is sent anywhere.
 */
export class BudgetAlertEntity {
    private readonly props: BudgetAlertEntityProps;

    constructor(props: BudgetAlertEntityProps) {
        this.props = props;
        if (props.limit.currencyCode !== props.spent.currencyCode) {
            throw new Error('Alert limit and spent must share a currency');
        }
    }

    get id(): number { return this.props.id; }
    get category(): string { return this.props.category; }
    get period(): BudgetPeriodType { return this.props.period; }
    get periodStart(): CalendarDate { return this.props.periodStart; }
    get limit(): Money { return this.props.limit; }
    get spent(): Money { return this.props.spent; }
    get currencyCode(): CurrencyCode { return this.props.limit.currencyCode; }
    get message(): string { return this.props.message; }
    get read(): boolean { return this.props.read; }
    get createdAt(): Date { return this.props.createdAt; }

    /** Same budget and same checked period. */
    concerns(category: string, period: BudgetPeriodType, periodStart: CalendarDate): boolean {
        return this.props.category === category
            && this.props.period === period
            && this.props.periodStart === periodStart;
    }

    toJSON() {
        return {
            id: this.id,
            category: this.category,
            period: this.period,
            periodStart: this.periodStart,
            limitMinor: this.limit.amountMinor,
            spentMinor: this.spent.amountMinor,
            currencyCode: this.currencyCode,
            message: this.message,
            read: this.read,
            createdAt: this.createdAt.toISOString()
        };
    }
}
