import { describe, it, expect } from 'vitest';
import { evaluate, holds } from '../../../../src/engine/expr';
import {
    critAngleCosineSquared,
    pythagoreanLength,
    straightLine,
    triangleArea,
} from '../../../../src/engine/physics';

describe('planar geometry', () => {
    it('accepts collinear points', () => {
        const [a, b, c] = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }];
        expect(evaluate(triangleArea(a, b, c), {})).toBe(0);
        expect(holds(straightLine(a, b, c), {})).toBe(true);
    });

    it('rejects a bent line', () => {
        const [a, b, c] = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }];
        expect(evaluate(triangleArea(a, b, c), {})).toBe(-0.5);
        expect(holds(straightLine(a, b, c), {})).toBe(false);
    });

    it('ties channel length to endpoint distance', () => {
        expect(holds(pythagoreanLength({ x: 0, y: 0 }, { x: 3, y: 4 }, 5), {})).toBe(true);
        expect(holds(pythagoreanLength({ x: 0, y: 0 }, { x: 3, y: 4 }, 6), {})).toBe(false);
    });

    it('computes the squared cosine of the angle at the middle point', () => {
        const origin = { x: 0, y: 0 };
        expect(evaluate(critAngleCosineSquared({ x: 1, y: 0 }, origin, { x: 0, y: 1 }), {})).toBe(0);
        expect(evaluate(critAngleCosineSquared({ x: 1, y: 0 }, origin, { x: 2, y: 0 }), {})).toBe(1);
        expect(evaluate(critAngleCosineSquared({ x: 1, y: 1 }, origin, { x: 1, y: 0 }), {})).toBeCloseTo(0.5, 12);
    });
});
