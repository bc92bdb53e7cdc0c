// test/unit/domain/services/currency-table.service.test.ts
import { CurrencyTable } from '@/core/domain/services/currency-table.service';
import { CurrencyEntity } from '@/core/domain/entities/currency.entity';
import { CurrencyRepository } from '@/core/domain/repositories/currency.repository';
import { RateProvider, RateQuote } from '@/infrastructure/rates/rate-provider';
import { InvalidRateException, UnknownCurrencyException } from '@/shared/exceptions/money.exception';
import { ValidationException } from '@/shared/exceptions/validation.exception';
import {
    IOTimeoutException,
    ProviderUnavailableException
} from '@/shared/exceptions/infrastructure.exception';
import { InMemoryCurrencyRepository } from '@test/helpers/in-memory-repositories';

const NOW = new Date('2024-04-01T12:00:00.000Z');

/** Holds every write until `release()` is called. */
class HeldWriteRepository extends InMemoryCurrencyRepository {
    holding = false;
    private gate: Promise<void> = Promise.resolve();
    private open: () => void = () => undefined;

    hold(): void {
        this.holding = true;
        this.gate = new Promise<void>(resolve => { this.open = resolve; });
    }

    release(): void {
        this.holding = false;
        this.open();
    }

    async upsertMany(currencies: CurrencyEntity[]): Promise<void> {
        if (this.holding) {
            await this.gate;
        }
        return super.upsertMany(currencies);
    }
}

const flushPending = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

const providerOf = (fetchRates: () => Promise<RateQuote[]>): RateProvider => ({
    name: 'test-provider',
    fetchRates
});

describe('CurrencyTable', () => {
    let repository: InMemoryCurrencyRepository;
    let table: CurrencyTable;

    beforeEach(async () => {
        repository = new InMemoryCurrencyRepository();
        table = new CurrencyTable(repository, { ioTimeoutMs: 1000, providerTimeoutMs: 1000, clock: () => NOW });

        await table.upsert('VND', 'Vietnamese dong', 1);
        await table.setBase('VND');
        await table.upsert('USD', 'US dollar', 24000);
    });

    describe('upsert and get', () => {
        it('should store a currency with default minor digits', async () => {
            const usd = await table.get('usd');

            expect(usd.code).toBe('USD');
            expect(usd.displayName).toBe('US dollar');
            expect(usd.rateToBase).toBe(24000);
            expect(usd.minorDigits).toBe(2);
            expect(usd.isBase).toBe(false);
            expect(usd.updatedAt).toEqual(NOW);
        });

        it('should keep minor digits and the base flag unless overridden', async () => {
            await table.upsert('JPY', 'Yen', 160, { minorDigits: 0 });
            await table.upsert('JPY', 'Japanese yen', 165);
            await table.upsert('VND', 'Dong', 1);

            const jpy = await table.get('JPY');
            const vnd = await table.get('VND');

            expect(jpy.minorDigits).toBe(0);
            expect(jpy.rateToBase).toBe(165);
            expect(vnd.isBase).toBe(true);
            expect(vnd.displayName).toBe('Dong');
        });

        it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('should reject rate %p', async (rate) => {
            await expect(table.upsert('EUR', 'Euro', rate)).rejects.toThrow(InvalidRateException);
            await expect(table.get('EUR')).rejects.toThrow(UnknownCurrencyException);
        });

        it('should reject a base rate other than 1', async () => {
            await expect(table.upsert('VND', 'Dong', 2)).rejects.toThrow('the base currency rate is fixed at 1');
        });

        it('should reject malformed codes and minor digits', async () => {
            await expect(table.upsert('US', 'Bad', 1)).rejects.toThrow(ValidationException);
            await expect(table.upsert('EUR', 'Euro', 26000, { minorDigits: 9 })).rejects.toThrow(ValidationException);
            await expect(table.upsert('EUR', '  ', 26000)).rejects.toThrow(ValidationException);
        });

        it('should fail for an unknown code', async () => {
            await expect(table.get('EUR')).rejects.toThrow('Unknown currency: EUR');
        });
    });

    it('should list currencies ordered by code', async () => {
        await table.upsert('EUR', 'Euro', 26000);

        const codes = (await table.list()).map(currency => currency.code);

        expect(codes).toEqual(['EUR', 'USD', 'VND']);
    });

    describe('setBase', () => {
        it('should move the base flag without rewriting other rates', async () => {
            const usd = await table.setBase('USD');
            const vnd = await table.get('VND');

            expect(usd.isBase).toBe(true);
            expect(usd.rateToBase).toBe(1);
            expect(vnd.isBase).toBe(false);
            expect(vnd.rateToBase).toBe(1);

            const snapshot = await table.snapshot();
            expect(snapshot.baseCode).toBe('USD');
        });
    });

    describe('applyRateBatch', () => {
        it('should apply every quote', async () => {
            const applied = await table.applyRateBatch([
                { code: 'usd', displayName: 'US dollar', rateToBase: 25000 },
                { code: 'EUR', displayName: 'Euro', rateToBase: 27000 }
            ]);

            expect(applied.map(currency => currency.code)).toEqual(['USD', 'EUR']);
            expect((await table.get('USD')).rateToBase).toBe(25000);
            expect((await table.get('EUR')).rateToBase).toBe(27000);
        });

        it('should apply nothing when one quote is invalid', async () => {
            await expect(table.applyRateBatch([
                { code: 'USD', displayName: 'US dollar', rateToBase: 25000 },
                { code: 'EUR', displayName: 'Euro', rateToBase: 0 }
            ])).rejects.toThrow(InvalidRateException);

            expect((await table.get('USD')).rateToBase).toBe(24000);
            await expect(table.get('EUR')).rejects.toThrow(UnknownCurrencyException);
        });

        it('should reject duplicate codes', async () => {
            await expect(table.applyRateBatch([
                { code: 'USD', displayName: 'US dollar', rateToBase: 25000 },
                { code: 'usd', displayName: 'US dollar', rateToBase: 26000 }
            ])).rejects.toThrow('Duplicate currency USD in rate batch');

            expect((await table.get('USD')).rateToBase).toBe(24000);
        });

        it('should leave the table unchanged when the write fails', async () => {
            repository.failNextWrite = true;

            await expect(table.applyRateBatch([
                { code: 'USD', displayName: 'US dollar', rateToBase: 25000 }
            ])).rejects.toThrow('write failed');

            expect((await table.get('USD')).rateToBase).toBe(24000);
            expect((await table.snapshot()).get('USD').rateToBase).toBe(24000);
        });

        it('should return an empty list for an empty batch', async () => {
            await expect(table.applyRateBatch([])).resolves.toEqual([]);
        });
    });

    describe('refreshRates', () => {
        it('should apply the quotes from the provider', async () => {
            const provider = providerOf(async () => [{ code: 'USD', displayName: 'US dollar', rateToBase: 25500 }]);

            await table.refreshRates(provider);

            expect((await table.get('USD')).rateToBase).toBe(25500);
        });

        it('should report a failing provider as unavailable', async () => {
            const provider = providerOf(async () => {
                throw new Error('connection refused');
            });

            await expect(table.refreshRates(provider)).rejects.toThrow(ProviderUnavailableException);
        });

        it('should give up on a provider that does not answer in time', async () => {
            const provider = providerOf(() => new Promise<RateQuote[]>(() => undefined));

            await expect(table.refreshRates(provider, { timeoutMs: 10 }))
                .rejects.toThrow('Rate provider test-provider timed out after 10ms');
        });

        it('should not wrap validation errors from the fetched batch', async () => {
            const provider = providerOf(async () => [{ code: 'USD', displayName: 'US dollar', rateToBase: -1 }]);

            await expect(table.refreshRates(provider)).rejects.toThrow(InvalidRateException);
        });
    });

    describe('snapshot', () => {
        it('should be cached until the next write', async () => {
            const first = await table.snapshot();
            const second = await table.snapshot();

            await table.upsert('USD', 'US dollar', 25000);
            const third = await table.snapshot();

            expect(second).toBe(first);
            expect(third).not.toBe(first);
            expect(first.get('USD').rateToBase).toBe(24000);
            expect(third.get('USD').rateToBase).toBe(25000);
        });

        it('should pick up a write that lands after its timeout', async () => {
            const held = new HeldWriteRepository();
            const guarded = new CurrencyTable(held, { ioTimeoutMs: 10, providerTimeoutMs: 10, clock: () => NOW });
            await guarded.upsert('VND', 'Vietnamese dong', 1);
            await guarded.setBase('VND');
            await guarded.upsert('USD', 'US dollar', 24000);
            expect((await guarded.snapshot()).get('USD').rateToBase).toBe(24000);

            held.hold();
            await expect(guarded.upsert('USD', 'US dollar', 25000)).rejects.toThrow(IOTimeoutException);
            expect((await guarded.snapshot()).get('USD').rateToBase).toBe(24000);

            held.release();
            await flushPending();

            expect((await held.findByCode('USD'))?.rateToBase).toBe(25000);
            expect((await guarded.snapshot()).get('USD').rateToBase).toBe(25000);
        });
    });

    it('should bound repository calls by the I/O timeout', async () => {
        const stalled: CurrencyRepository = {
            findByCode: () => new Promise<CurrencyEntity | null>(() => undefined),
            findAll: () => new Promise<CurrencyEntity[]>(() => undefined),
            upsertMany: async () => undefined,
            setBase: async () => undefined
        };
        const slowTable = new CurrencyTable(stalled, { ioTimeoutMs: 10, providerTimeoutMs: 10 });

        await expect(slowTable.get('USD')).rejects.toThrow(IOTimeoutException);
        await expect(slowTable.snapshot()).rejects.toThrow('currencies.findAll timed out after 10ms');
    });
});
