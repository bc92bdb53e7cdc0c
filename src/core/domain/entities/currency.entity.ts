// src/core/domain/entities/currency.entity.ts
import { CurrencyCode } from '../../../shared/types/common.types';

export const DEFAULT_MINOR_DIGITS = 2;
export const MAX_MINOR_DIGITS = 8;

/**
 * `rateToBase` is the number of base-currency units worth one unit of this
 * currency. With base VND, USD at 24000 reads "1 USD = 24000 VND".
 */
export interface CurrencyProps {
    code: CurrencyCode;
    displayName: string;
    rateToBase: number;
    minorDigits: number;
    isBase: boolean;
    updatedAt: Date;
}

export class CurrencyEntity {
    private readonly props: CurrencyProps;

    constructor(props: CurrencyProps) {
        this.props = { ...props, updatedAt: new Date(props.updatedAt) };
        this.validate();
    }

    get code(): CurrencyCode { return this.props.code; }
    get displayName(): string { return this.props.displayName; }
    get rateToBase(): number { return this.props.rateToBase; }
    get minorDigits(): number { return this.props.minorDigits; }
    get isBase(): boolean { return this.props.isBase; }
    get updatedAt(): Date { return new Date(this.props.updatedAt); }

    withChanges(changes: Partial<Omit<CurrencyProps, 'code'>>): CurrencyEntity {
        return new CurrencyEntity({ ...this.props, ...changes });
    }

    ageInMs(now: Date = new Date()): number {
        return now.getTime() - this.props.updatedAt.getTime();
    }

    private validate(): void {
        if (this.props.isBase && this.props.rateToBase !== 1) {
            throw new Error(`Base currency ${this.props.code} must have rate 1`);
        }
        if (!Number.isInteger(this.props.minorDigits)
            || this.props.minorDigits < 0
            || this.props.minorDigits > MAX_MINOR_DIGITS) {
            throw new Error(`Minor digits for ${this.props.code} must be an integer between 0 and ${MAX_MINOR_DIGITS}`);
        }
    }

    toJSON(): CurrencyProps {
        return { ...this.props, updatedAt: new Date(this.props.updatedAt) };
    }
}
