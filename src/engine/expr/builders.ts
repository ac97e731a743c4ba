/**
 * Expression builders.
 *
 * Constant operands are folded eagerly so formulas composed from
 * literal parameters (fluid properties, junction constants) stay small.
 */

import type {
    ArithmeticOp,
    ComparisonOp,
    ComparisonFormula,
    ConstantExpr,
    Expr,
    Formula,
    IteExpr,
    Term,
    VariableExpr,
} from './types';

export function variable(name: string): VariableExpr {
    return { kind: 'var', name };
}

export function constant(value: number): ConstantExpr {
    return { kind: 'const', value };
}

export function toExpr(term: Term): Expr {
    return typeof term === 'number' ? constant(term) : term;
}

export function isConstant(expr: Expr, value?: number): expr is ConstantExpr {
    return expr.kind === 'const' && (value === undefined || expr.value === value);
}

// ─── Arithmetic ───

function fold(op: ArithmeticOp, a: number, b: number): number {
    switch (op) {
        case '+': return a + b;
        case '-': return a - b;
        case '*': return a * b;
        case '/': return a / b;
        case '^': return a ** b;
    }
}

function binary(op: ArithmeticOp, a: Term, b: Term): Expr {
    const left = toExpr(a);
    const right = toExpr(b);
    if (left.kind === 'const' && right.kind === 'const') {
        const value = fold(op, left.value, right.value);
        // Keep the division when it would fold to a non-finite literal
        if (Number.isFinite(value)) return constant(value);
    }
    return { kind: 'binary', op, left, right };
}

export function add(first: Term, ...rest: Term[]): Expr {
    return rest.reduce<Expr>((acc, t) => binary('+', acc, t), toExpr(first));
}

export function sub(a: Term, b: Term): Expr {
    return binary('-', a, b);
}

export function mul(first: Term, ...rest: Term[]): Expr {
    return rest.reduce<Expr>((acc, t) => binary('*', acc, t), toExpr(first));
}

export function div(a: Term, b: Term): Expr {
    return binary('/', a, b);
}

export function pow(base: Term, exponent: Term): Expr {
    return binary('^', base, exponent);
}

export function sqrt(x: Term): Expr {
    return pow(x, 0.5);
}

export function neg(x: Term): Expr {
    return binary('-', 0, x);
}

/** Sum of a non-empty list of terms. */
export function sum(terms: readonly Term[]): Expr {
    if (terms.length === 0) {
        throw new Error('Cannot sum an empty list of terms');
    }
    const [first, ...rest] = terms;
    return add(first, ...rest);
}

export function ite(condition: Formula, then: Term, otherwise: Term): IteExpr {
    return { kind: 'ite', condition, then: toExpr(then), otherwise: toExpr(otherwise) };
}

// ─── Comparisons ───

function compare(op: ComparisonOp, a: Term, b: Term): ComparisonFormula {
    return { kind: 'compare', op, left: toExpr(a), right: toExpr(b) };
}

export const eq = (a: Term, b: Term): ComparisonFormula => compare('==', a, b);
export const lt = (a: Term, b: Term): ComparisonFormula => compare('<', a, b);
export const le = (a: Term, b: Term): ComparisonFormula => compare('<=', a, b);
export const gt = (a: Term, b: Term): ComparisonFormula => compare('>', a, b);
export const ge = (a: Term, b: Term): ComparisonFormula => compare('>=', a, b);

export function and(...args: Formula[]): Formula {
    return { kind: 'and', args };
}
