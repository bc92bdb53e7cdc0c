// src/core/application/services/transaction-store.service.ts
import {
    DEFAULT_CATEGORY,
    DEFAULT_SOURCE,
    NewTransaction,
    TransactionChanges,
    TransactionEntity
} from '../../domain/entities/transaction.entity';
import {
    TransactionCursor,
    TransactionFilter,
    TransactionRepository
} from '../../domain/repositories/transaction.repository';
import { CurrencyTable } from '../../domain/services/currency-table.service';
import { MoneyParser, ParsedMoney } from '../../domain/services/money-parser.service';
import { Money } from '../../domain/value-objects/money.vo';
import {
    AddTransactionInput,
    TransactionFilterInput,
    UpdateTransactionInput,
    addTransactionSchema,
    transactionFilterSchema,
    updateTransactionSchema,
    validateInput
} from '../dtos/transaction.dto';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { IoGuard, createIoGuard } from '../../../infrastructure/database/io-guard';
import { CurrencyCode, TransactionKind } from '../../../shared/types/common.types';
import { ERROR_CODES } from '../../../shared/types/error-codes';
import { NotFoundException } from '../../../shared/exceptions/not-found.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { DateUtil } from '../../../shared/utils/date.util';

export interface TransactionStoreOptions {
    /** Used when the amount text names no currency. */
    defaultCurrency: CurrencyCode;
    ioTimeoutMs: number;
    pageSize: number;
    clock?: () => Date;
}

const log = logger.child({ component: 'TransactionStore' });

/**
 * Owns transaction records: validation on write, lookups and filtered scans.
 *
 * Single writer per process. A scan started after a write settles sees it.
 */
export class TransactionStore {
    private readonly clock: () => Date;
    private readonly io: IoGuard;

    constructor(
        private readonly repository: TransactionRepository,
        private readonly currencies: CurrencyTable,
        private readonly options: TransactionStoreOptions
    ) {
        if (!Number.isInteger(options.pageSize) || options.pageSize <= 0) {
            throw new RangeError('pageSize must be a positive integer');
        }
        this.clock = options.clock ?? (() => new Date());
        this.io = createIoGuard(options.ioTimeoutMs, log);
    }

    async add(input: AddTransactionInput): Promise<number> {
        const data = validateInput(addTransactionSchema, input, 'Invalid transaction');

        const parsed = await this.parseAmount(data.amount, data.currency ?? this.options.defaultCurrency);
        const kind = this.resolveKind(parsed, data.kind, 'income');

        const draft: NewTransaction = {
            kind,
            amount: new Money(Math.abs(parsed.amountMinor), parsed.currencyCode),
            category: data.category ?? DEFAULT_CATEGORY,
            source: data.source ?? DEFAULT_SOURCE,
            description: data.description ?? '',
            occurredOn: data.occurredOn ?? DateUtil.today(this.clock()),
            recurrence: data.recurrence ?? 'none',
            tags: data.tags ?? [],
            notes: data.notes
        };

        const created = await this.io('transactions.create', this.repository.create(draft));

        log.info('Transaction created', {
            transactionId: created.id,
            kind: created.kind,
            amountMinor: created.amountMinor,
            currencyCode: created.currencyCode
        });

        return created.id;
    }

    async get(id: number): Promise<TransactionEntity> {
        this.assertId(id);

        const transaction = await this.io('transactions.findById', this.repository.findById(id));
        if (!transaction) {
            throw NotFoundException.transaction(id);
        }
        return transaction;
    }

    async update(id: number, fields: UpdateTransactionInput): Promise<TransactionEntity> {
        const data = validateInput(updateTransactionSchema, fields, 'Invalid transaction update');
        const existing = await this.get(id);

        const changes: TransactionChanges = {};

        if (data.amount !== undefined) {
            const parsed = await this.parseAmount(data.amount, data.currency ?? existing.currencyCode);
            changes.amount = new Money(Math.abs(parsed.amountMinor), parsed.currencyCode);
            changes.kind = this.resolveKind(parsed, data.kind, existing.kind);
        } else if (data.kind !== undefined) {
            changes.kind = data.kind;
        }

        if (data.category !== undefined) changes.category = data.category;
        if (data.source !== undefined) changes.source = data.source;
        if (data.description !== undefined) changes.description = data.description;
        if (data.occurredOn !== undefined) changes.occurredOn = data.occurredOn;
        if (data.recurrence !== undefined) changes.recurrence = data.recurrence;
        if (data.tags !== undefined) changes.tags = data.tags;
        if (data.notes !== undefined) changes.notes = data.notes;

        // entity invariants are checked before anything is written
        existing.withChanges(changes, this.clock());

        const updated = await this.io('transactions.update', this.repository.update(id, changes));
        if (!updated) {
            throw NotFoundException.transaction(id);
        }

        log.info('Transaction updated', { transactionId: id, fields: Object.keys(changes) });
        return updated;
    }

    async delete(id: number): Promise<void> {
        this.assertId(id);

        const deleted = await this.io('transactions.delete', this.repository.delete(id));
        if (!deleted) {
            throw NotFoundException.transaction(id);
        }

        log.audit('delete', 'transaction', { transactionId: id });
    }

    /**
     * Lazy scan ordered by (date, id). Each `for await` over the result starts
     * a fresh scan; breaking out early leaves nothing open.
     */
    query(filter: TransactionFilterInput = {}): AsyncIterable<TransactionEntity> {
        const criteria = validateInput(transactionFilterSchema, filter, 'Invalid transaction filter');
        return {
            [Symbol.asyncIterator]: () => this.scan(criteria)
        };
    }

    async list(filter: TransactionFilterInput = {}): Promise<TransactionEntity[]> {
        const transactions: TransactionEntity[] = [];
        for await (const transaction of this.query(filter)) {
            transactions.push(transaction);
        }
        return transactions;
    }

    search(term: string): AsyncIterable<TransactionEntity> {
        return this.query({ search: term });
    }

    private async *scan(criteria: TransactionFilter): AsyncGenerator<TransactionEntity, void, undefined> {
        let cursor: TransactionCursor | null = null;

        while (true) {
            const page: TransactionEntity[] = await this.io(
                'transactions.findPage',
                this.repository.findPage(criteria, cursor, this.options.pageSize)
            );

            yield* page;

            if (page.length < this.options.pageSize) {
                return;
            }

            const last = page[page.length - 1];
            cursor = { occurredOn: last.occurredOn, id: last.id };
        }
    }

    private async parseAmount(text: string, defaultCurrency: CurrencyCode): Promise<ParsedMoney> {
        const snapshot = await this.currencies.snapshot();
        return new MoneyParser(snapshot).parse(text, defaultCurrency);
    }

    /**
     * A leading minus means expense. An explicit kind must agree with it.
     */
    private resolveKind(parsed: ParsedMoney, requested: TransactionKind | undefined, fallback: TransactionKind): TransactionKind {
        const negative = parsed.amountMinor < 0;

        if (requested === 'income' && negative) {
            throw new ValidationException(
                'A negative amount cannot be recorded as income',
                [{ field: 'kind', message: 'Amount sign contradicts kind', value: requested }],
                ERROR_CODES.TRANSACTION_KIND_MISMATCH
            );
        }

        if (requested !== undefined) return requested;
        return negative ? 'expense' : fallback;
    }

    private assertId(id: number): void {
        if (!Number.isSafeInteger(id) || id <= 0) {
            throw ValidationException.field('id', 'Transaction id must be a positive integer', id);
        }
    }
}
