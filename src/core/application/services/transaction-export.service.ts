// src/core/application/services/transaction-export.service.ts
import { TransactionEntity } from '../../domain/entities/transaction.entity';
import { CurrencyConverter } from '../../domain/services/currency-converter.service';
import { RateSnapshotSource } from '../../domain/services/aggregation.service';
import { RateSnapshot } from '../../domain/value-objects/rate-snapshot.vo';
import { TransactionFilterInput } from '../dtos/transaction.dto';
import { TransactionStore } from './transaction-store.service';
import { CalendarDate, CurrencyCode, RecurrenceRule, TransactionKind } from '../../../shared/types/common.types';

export interface TransactionExportRow {
    id: number;
    date: CalendarDate;
    kind: TransactionKind;
    category: string;
    source: string;
    description: string;
    tags: string;
    notes: string;
    recurrence: RecurrenceRule;
    /** Signed, in the transaction's own currency. */
    originalAmount: string;
    originalCurrency: CurrencyCode;
    /** Signed, in minor units of `displayCurrency`. */
    convertedAmountMinor: number;
    displayCurrency: CurrencyCode;
}

/**
 * Flat records for spreadsheet-style renderers. Amounts are signed and
 * rendered with the currency's minor digits; every row uses one snapshot.
 */
export class TransactionExportService {
    constructor(
        private readonly transactions: Pick<TransactionStore, 'query'>,
        private readonly rates: RateSnapshotSource
    ) {}

    async *rows(
        filter: TransactionFilterInput,
        displayCurrency: CurrencyCode,
        snapshot?: RateSnapshot
    ): AsyncGenerator<TransactionExportRow, void, undefined> {
        const rates = snapshot ?? await this.rates.snapshot();
        const target = rates.get(displayCurrency).code;
        const converter = new CurrencyConverter(rates);

        for await (const transaction of this.transactions.query(filter)) {
            yield this.toRow(transaction, converter, target);
        }
    }

    private toRow(transaction: TransactionEntity, converter: CurrencyConverter, target: CurrencyCode): TransactionExportRow {
        const currency = converter.snapshot.get(transaction.currencyCode);
        const signed = transaction.isIncome ? transaction.amount : transaction.amount.negate();

        return {
            id: transaction.id,
            date: transaction.occurredOn,
            kind: transaction.kind,
            category: transaction.category,
            source: transaction.source,
            description: transaction.description,
            tags: transaction.tags.join(', '),
            notes: transaction.notes ?? '',
            recurrence: transaction.recurrence,
            originalAmount: signed.toDecimalString(currency.minorDigits),
            originalCurrency: transaction.currencyCode,
            convertedAmountMinor: converter.convert(transaction.signedAmountMinor, transaction.currencyCode, target),
            displayCurrency: target
        };
    }
}
