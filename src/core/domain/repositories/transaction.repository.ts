// src/core/domain/repositories/transaction.repository.ts
import { NewTransaction, TransactionChanges, TransactionEntity } from '../entities/transaction.entity';
import { CalendarDate, CurrencyCode, TransactionKind } from '../../../shared/types/common.types';

export interface TransactionFilter {
    id?: number;
    /** Inclusive. */
    dateFrom?: CalendarDate;
    /** Inclusive. */
    dateTo?: CalendarDate;
    date?: CalendarDate;
    category?: string;
    source?: string;
    kind?: TransactionKind;
    currencyCode?: CurrencyCode;
    /** Case-insensitive substring of description, category or source. */
    search?: string;
    /** true: templates only, false: concrete rows only. */
    recurring?: boolean;
}

/**
 * Keyset position: the scan resumes strictly after this (date, id) pair.
 */
export interface TransactionCursor {
    occurredOn: CalendarDate;
    id: number;
}

export interface TransactionRepository {
    /** Persists and assigns a fresh id; ids are never reused. */
    create(transaction: NewTransaction): Promise<TransactionEntity>;
    findById(id: number): Promise<TransactionEntity | null>;
    /** Ordered by (occurredOn, id) ascending. */
    findPage(filter: TransactionFilter, after: TransactionCursor | null, limit: number): Promise<TransactionEntity[]>;
    update(id: number, changes: TransactionChanges): Promise<TransactionEntity | null>;
    delete(id: number): Promise<boolean>;
}
