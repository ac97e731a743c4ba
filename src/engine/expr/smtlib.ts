/**
 * SMT-LIB 2 serialisation for nonlinear real arithmetic solvers.
 */

import { variablesOf } from './evaluate';
import type { Expr, Formula } from './types';

export interface SmtLibOptions {
    /** Logic declared with set-logic */
    logic?: string;
}

const SIMPLE_SYMBOL = /^[A-Za-z~!@$%^&*_+=<>.?/-][A-Za-z0-9~!@$%^&*_+=<>.?/-]*$/;

export function formatSymbol(name: string): string {
    return SIMPLE_SYMBOL.test(name) ? name : `|${name}|`;
}

/**
 * Decimal literal without exponent notation, which SMT-LIB does not accept.
 */
export function formatReal(value: number): string {
    if (!Number.isFinite(value)) {
        throw new Error(`Cannot serialise non-finite literal ${value}`);
    }
    if (value < 0) return `(- ${formatReal(-value)})`;
    if (Number.isInteger(value)) {
        return `${BigInt(value).toString()}.0`;
    }

    const text = String(value);
    const expAt = text.indexOf('e');
    if (expAt < 0) return text;

    // Shift the decimal point of the shortest round-trip digits.
    const mantissa = text.slice(0, expAt);
    const exponent = Number(text.slice(expAt + 1));
    const dot = mantissa.indexOf('.');
    const digits = mantissa.replace('.', '');
    const point = (dot < 0 ? mantissa.length : dot) + exponent;
    if (point <= 0) return `0.${'0'.repeat(-point)}${digits}`;
    if (point >= digits.length) return `${digits}${'0'.repeat(point - digits.length)}.0`;
    return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function exprToSmt(expr: Expr): string {
    switch (expr.kind) {
        case 'var':
            return formatSymbol(expr.name);
        case 'const':
            return formatReal(expr.value);
        case 'ite':
            return `(ite ${formulaToSmt(expr.condition)} ${exprToSmt(expr.then)} ${exprToSmt(expr.otherwise)})`;
        case 'binary':
            return `(${expr.op} ${exprToSmt(expr.left)} ${exprToSmt(expr.right)})`;
    }
}

export function formulaToSmt(formula: Formula): string {
    if (formula.kind === 'and') {
        if (formula.args.length === 0) return 'true';
        return `(and ${formula.args.map(formulaToSmt).join(' ')})`;
    }
    const op = formula.op === '==' ? '=' : formula.op;
    return `(${op} ${exprToSmt(formula.left)} ${exprToSmt(formula.right)})`;
}

export function toSmtLib(formulas: readonly Formula[], options: SmtLibOptions = {}): string {
    const lines = [`(set-logic ${options.logic ?? 'QF_NRA'})`];
    for (const name of variablesOf(...formulas)) {
        lines.push(`(declare-fun ${formatSymbol(name)} () Real)`);
    }
    for (const formula of formulas) {
        lines.push(`(assert ${formulaToSmt(formula)})`);
    }
    lines.push('(check-sat)', '(exit)');
    return lines.join('\n') + '\n';
}
