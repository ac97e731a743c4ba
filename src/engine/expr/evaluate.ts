/**
 * Local evaluation of expressions and formulas against a concrete
 * assignment. The solver never sees this; it is used to check a
 * returned model or a hand-picked design point.
 */

import type { Assignment, Expr, Formula } from './types';

// ─── Numeric Evaluation ───

export function evaluate(expr: Expr, env: Assignment): number {
    switch (expr.kind) {
        case 'const':
            return expr.value;
        case 'var': {
            const value = env[expr.name];
            if (value === undefined) {
                throw new Error(`Unbound variable "${expr.name}"`);
            }
            return value;
        }
        case 'ite':
            return holds(expr.condition, env)
                ? evaluate(expr.then, env)
                : evaluate(expr.otherwise, env);
        case 'binary': {
            const a = evaluate(expr.left, env);
            const b = evaluate(expr.right, env);
            switch (expr.op) {
                case '+': return a + b;
                case '-': return a - b;
                case '*': return a * b;
                case '/': return a / b;
                case '^': return a ** b;
            }
        }
    }
}

/**
 * Equalities hold within a relative tolerance; orderings are exact.
 */
export function holds(formula: Formula, env: Assignment, tolerance = 1e-9): boolean {
    if (formula.kind === 'and') {
        return formula.args.every((f) => holds(f, env, tolerance));
    }

    const l = evaluate(formula.left, env);
    const r = evaluate(formula.right, env);
    switch (formula.op) {
        case '==':
            return Math.abs(l - r) <= tolerance * Math.max(1, Math.abs(l), Math.abs(r));
        case '<': return l < r;
        case '<=': return l <= r;
        case '>': return l > r;
        case '>=': return l >= r;
    }
}

// ─── Variable Collection ───

function collect(node: Expr | Formula, seen: Set<string>, out: string[]): void {
    switch (node.kind) {
        case 'const':
            return;
        case 'var':
            if (!seen.has(node.name)) {
                seen.add(node.name);
                out.push(node.name);
            }
            return;
        case 'binary':
        case 'compare':
            collect(node.left, seen, out);
            collect(node.right, seen, out);
            return;
        case 'ite':
            collect(node.condition, seen, out);
            collect(node.then, seen, out);
            collect(node.otherwise, seen, out);
            return;
        case 'and':
            for (const arg of node.args) collect(arg, seen, out);
            return;
    }
}

/** Unknown names in first-appearance order. */
export function variablesOf(...nodes: ReadonlyArray<Expr | Formula>): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const node of nodes) collect(node, seen, out);
    return out;
}

export function dependsOn(expr: Expr, name: string): boolean {
    return variablesOf(expr).includes(name);
}
