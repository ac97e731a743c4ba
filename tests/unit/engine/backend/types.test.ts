import { describe, it, expect } from 'vitest';
import { isBounded, midpoint } from '../../../../src/engine/backend';

describe('intervals', () => {
    it('takes the midpoint', () => {
        expect(midpoint([10, 30])).toBe(20);
        expect(midpoint([0, Number.POSITIVE_INFINITY])).toBe(Number.POSITIVE_INFINITY);
    });

    it('treats infinite and saturated ends as unbounded', () => {
        expect(isBounded([0, 1])).toBe(true);
        expect(isBounded([0, Number.POSITIVE_INFINITY])).toBe(false);
        expect(isBounded([-Number.MAX_VALUE, 1])).toBe(false);
    });
});
