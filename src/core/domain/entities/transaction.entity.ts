// src/core/domain/entities/transaction.entity.ts
import { Money } from '../value-objects/money.vo';
import {
    CalendarDate,
    CurrencyCode,
    RECURRENCE_RULES,
    RecurrenceRule,
    TRANSACTION_KINDS,
    TransactionKind
} from '../../../shared/types/common.types';
import { DateUtil } from '../../../shared/utils/date.util';

export const DEFAULT_CATEGORY = 'Uncategorized';
export const DEFAULT_SOURCE = 'Unspecified';

export interface TransactionEntityProps {
    id: number;
    kind: TransactionKind;
    /** Unsigned magnitude; the sign comes from `kind`. */
    amount: Money;
    category: string;
    source: string;
    description: string;
    occurredOn: CalendarDate;
    recurrence: RecurrenceRule;
    tags: string[];
    notes?: string;
    createdAt: Date;
    updatedAt: Date;
}

/** Fields a caller may change after creation. */
export type TransactionChanges = Partial<Pick<TransactionEntityProps,
    'kind' | 'amount' | 'category' | 'source' | 'description' | 'occurredOn' | 'recurrence' | 'tags' | 'notes'
>>;

export type NewTransaction = Omit<TransactionEntityProps, 'id' | 'createdAt' | 'updatedAt'>;

export class TransactionEntity {
    private readonly props: TransactionEntityProps;

    constructor(props: TransactionEntityProps) {
        this.props = { ...props, tags: [...props.tags] };
        this.validate();
    }

    // Getters
    get id(): number { return this.props.id; }
    get kind(): TransactionKind { return this.props.kind; }
    get amount(): Money { return this.props.amount; }
    get amountMinor(): number { return this.props.amount.amountMinor; }
    get currencyCode(): CurrencyCode { return this.props.amount.currencyCode; }
    get category(): string { return this.props.category; }
    get source(): string { return this.props.source; }
    get description(): string { return this.props.description; }
    get occurredOn(): CalendarDate { return this.props.occurredOn; }
    get recurrence(): RecurrenceRule { return this.props.recurrence; }
    get tags(): string[] { return [...this.props.tags]; }
    get notes(): string | undefined { return this.props.notes; }
    get createdAt(): Date { return this.props.createdAt; }
    get updatedAt(): Date { return this.props.updatedAt; }

    get signedAmountMinor(): number {
        return this.props.kind === 'income' ? this.amountMinor : -this.amountMinor;
    }

    get isIncome(): boolean { return this.props.kind === 'income'; }
    get isTemplate(): boolean { return this.props.recurrence !== 'none'; }

    get nextOccurrenceOn(): CalendarDate | null {
        return DateUtil.nextOccurrence(this.props.occurredOn, this.props.recurrence);
    }

    /**
     * Returns a new entity; the current one is left untouched.
     */
    withChanges(changes: TransactionChanges, updatedAt: Date = new Date()): TransactionEntity {
        return new TransactionEntity({ ...this.props, ...changes, updatedAt });
    }

    private validate(): void {
        if (!Number.isSafeInteger(this.props.id) || this.props.id <= 0) {
            throw new Error(`Invalid transaction id: ${this.props.id}`);
        }
        if (!TRANSACTION_KINDS.includes(this.props.kind)) {
            throw new Error(`Invalid transaction kind: ${this.props.kind}`);
        }
        if (this.props.amount.amountMinor <= 0) {
            throw new Error('Transaction amount magnitude must be greater than zero');
        }
        if (this.props.category.trim().length === 0 || this.props.source.trim().length === 0) {
            throw new Error('Transaction category and source must not be empty');
        }
        if (!DateUtil.isValidCalendarDate(this.props.occurredOn)) {
            throw new Error(`Invalid transaction date: ${this.props.occurredOn}`);
        }
        if (!RECURRENCE_RULES.includes(this.props.recurrence)) {
            throw new Error(`Invalid recurrence rule: ${this.props.recurrence}`);
        }
    }

    toJSON() {
        return {
            id: this.id,
            kind: this.kind,
            amountMinor: this.amountMinor,
            signedAmountMinor: this.signedAmountMinor,
            currencyCode: this.currencyCode,
            category: this.category,
            source: this.source,
            description: this.description,
            occurredOn: this.occurredOn,
            recurrence: this.recurrence,
            nextOccurrenceOn: this.nextOccurrenceOn,
            tags: this.tags,
            notes: this.notes,
            createdAt: this.createdAt.toISOString(),
            updatedAt: this.updatedAt.toISOString()
        };
    }
}
