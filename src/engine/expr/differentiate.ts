/**
 * Symbolic differentiation, used where a constraint asks for the
 * stationary point of a concentration profile.
 */

import { add, constant, div, isConstant, ite, mul, neg, pow, sub } from './builders';
import { dependsOn } from './evaluate';
import type { Expr } from './types';

// Zero/one elimination keeps derivatives of long products readable

function plus(a: Expr, b: Expr): Expr {
    if (isConstant(a, 0)) return b;
    if (isConstant(b, 0)) return a;
    return add(a, b);
}

function minus(a: Expr, b: Expr): Expr {
    if (isConstant(b, 0)) return a;
    if (isConstant(a, 0)) return neg(b);
    return sub(a, b);
}

function times(a: Expr, b: Expr): Expr {
    if (isConstant(a, 0) || isConstant(b, 0)) return constant(0);
    if (isConstant(a, 1)) return b;
    if (isConstant(b, 1)) return a;
    return mul(a, b);
}

export function differentiate(expr: Expr, name: string): Expr {
    switch (expr.kind) {
        case 'const':
            return constant(0);
        case 'var':
            return constant(expr.name === name ? 1 : 0);
        case 'ite':
            return ite(
                expr.condition,
                differentiate(expr.then, name),
                differentiate(expr.otherwise, name),
            );
        case 'binary': {
            const u = expr.left;
            const v = expr.right;
            const du = differentiate(u, name);
            switch (expr.op) {
                case '+':
                    return plus(du, differentiate(v, name));
                case '-':
                    return minus(du, differentiate(v, name));
                case '*':
                    return plus(times(du, v), times(u, differentiate(v, name)));
                case '/': {
                    const dv = differentiate(v, name);
                    if (isConstant(dv, 0)) return isConstant(du, 0) ? constant(0) : div(du, v);
                    return div(minus(times(du, v), times(u, dv)), pow(v, 2));
                }
                case '^': {
                    if (dependsOn(v, name)) {
                        throw new Error(`Cannot differentiate a power whose exponent depends on "${name}"`);
                    }
                    if (isConstant(du, 0)) return constant(0);
                    return times(times(v, pow(u, sub(v, 1))), du);
                }
            }
        }
    }
}
