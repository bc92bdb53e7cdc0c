// test/unit/shared/utils/rounding.util.test.ts
import { minorUnitFactor, roundHalfEven } from '@/shared/utils/rounding.util';

describe('roundHalfEven', () => {
    it('should round ties to the even neighbour', () => {
        expect(roundHalfEven(0.5)).toBe(0);
        expect(roundHalfEven(1.5)).toBe(2);
        expect(roundHalfEven(2.5)).toBe(2);
        expect(roundHalfEven('3.5')).toBe(4);
        expect(roundHalfEven(-2.5)).toBe(-2);
    });

    it('should round non-ties to the nearest integer', () => {
        expect(roundHalfEven('2083.3333')).toBe(2083);
        expect(roundHalfEven('-833.6')).toBe(-834);
    });

    it('should never return negative zero', () => {
        expect(Object.is(roundHalfEven('-0.4'), 0)).toBe(true);
    });

    it('should return null outside the safe integer range', () => {
        expect(roundHalfEven(Number.MAX_SAFE_INTEGER)).toBe(Number.MAX_SAFE_INTEGER);
        expect(roundHalfEven('9007199254740992')).toBeNull();
        expect(roundHalfEven('-9007199254740992')).toBeNull();
    });
});

describe('minorUnitFactor', () => {
    it('should be ten to the power of the minor digits', () => {
        expect(minorUnitFactor(0).toNumber()).toBe(1);
        expect(minorUnitFactor(2).toNumber()).toBe(100);
        expect(minorUnitFactor(8).toNumber()).toBe(100_000_000);
    });
});
