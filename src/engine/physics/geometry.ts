/**
 * Planar layout relations between node coordinates.
 */

import { add, div, eq, mul, pow, sub, type Expr, type Formula, type Term } from '../expr';
import type { CircuitNode } from '../graph';

export interface Point {
    x: Term;
    y: Term;
}

export function nodePoint(node: CircuitNode): Point {
    return { x: node.symbols.x, y: node.symbols.y };
}

/** (xa - xb)^2 + (ya - yb)^2 == L^2 */
export function pythagoreanLength(a: Point, b: Point, length: Term): Formula {
    const dx = sub(a.x, b.x);
    const dy = sub(a.y, b.y);
    return eq(add(pow(dx, 2), pow(dy, 2)), pow(length, 2));
}

/** Signed area of the triangle n1 n2 n3. */
export function triangleArea(n1: Point, n2: Point, n3: Point): Expr {
    return div(
        add(
            mul(n1.x, sub(n3.y, n2.y)),
            mul(n3.x, sub(n2.y, n1.y)),
            mul(n2.x, sub(n1.y, n3.y)),
        ),
        2,
    );
}

/** n1, n2 and n3 lie on one line. */
export function straightLine(n1: Point, n2: Point, n3: Point): Formula {
    return eq(triangleArea(n1, n2, n3), 0);
}

/**
 * cos^2 of the angle n1-n2-n3 by the cosine law:
 *   (a . b)^2 / (|a|^2 |b|^2), a = n1 - n2, b = n3 - n2
 */
export function critAngleCosineSquared(n1: Point, n2: Point, n3: Point): Expr {
    const ax = sub(n1.x, n2.x);
    const ay = sub(n1.y, n2.y);
    const bx = sub(n3.x, n2.x);
    const by = sub(n3.y, n2.y);
    const dotSquared = pow(add(mul(ax, bx), mul(ay, by)), 2);
    const normsSquared = mul(add(mul(ax, ax), mul(ay, ay)), add(mul(bx, bx), mul(by, by)));
    return div(dotSquared, normsSquared);
}
