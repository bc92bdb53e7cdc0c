// test/unit/config/environment.test.ts
import { ConfigService, parseEnvironment } from '@/config/environment';
import { ValidationException } from '@/shared/exceptions/validation.exception';

describe('environment', () => {
    it('should apply defaults', () => {
        const env = parseEnvironment({});

        expect(env.NODE_ENV).toBe('development');
        expect(env.BASE_CURRENCY).toBe('VND');
        expect(env.DEFAULT_CURRENCY).toBe('VND');
        expect(env.IO_TIMEOUT_MS).toBe(5000);
        expect(env.RATE_PROVIDER_TIMEOUT_MS).toBe(10000);
        expect(env.RATE_MAX_AGE_HOURS).toBe(24);
        expect(env.QUERY_PAGE_SIZE).toBe(200);
        expect(env.POSTGRES_PORT).toBe(5432);
        expect(env.POSTGRES_SSL).toBe(false);
        expect(env.LOG_LEVEL).toBe('info');
    });

    it('should normalize currency codes', () => {
        expect(parseEnvironment({ BASE_CURRENCY: ' usd ' }).BASE_CURRENCY).toBe('USD');
    });

    it('should reject invalid values with the offending fields', () => {
        let caught: unknown;
        try {
            parseEnvironment({ QUERY_PAGE_SIZE: 'lots', LOG_LEVEL: 'loud', DEFAULT_CURRENCY: 'EURO' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ValidationException);
        if (caught instanceof ValidationException) {
            expect(caught.validationErrors.map(fieldError => fieldError.field).sort())
                .toEqual(['DEFAULT_CURRENCY', 'LOG_LEVEL', 'QUERY_PAGE_SIZE']);
        }
    });

    it('should reject non-positive integers', () => {
        expect(() => parseEnvironment({ IO_TIMEOUT_MS: '0' })).toThrow(ValidationException);
    });

    describe('ConfigService', () => {
        it('should expose typed values and derived settings', () => {
            const config = new ConfigService({
                NODE_ENV: 'test',
                RATE_MAX_AGE_HOURS: '2',
                POSTGRES_USER: 'ledger',
                POSTGRES_PASSWORD: 'test-secret',
                POSTGRES_HOST: 'db',
                POSTGRES_DB: 'books'
            });

            expect(config.isTest()).toBe(true);
            expect(config.isDevelopment()).toBe(false);
            expect(config.get('RATE_MAX_AGE_HOURS')).toBe(2);
            expect(config.rateMaxAgeMs()).toBe(7_200_000);
            expect(config.getDatabaseUrl()).toBe('postgresql://ledger:test-secret@db:5432/books');
        });
    });
});
