/**
 * Symbolic Expression Layer — Public API
 */

export type {
    ArithmeticOp,
    ComparisonOp,
    VariableExpr,
    ConstantExpr,
    BinaryExpr,
    IteExpr,
    Expr,
    Term,
    ComparisonFormula,
    ConjunctionFormula,
    Formula,
    Constraint,
    Assignment,
} from './types';

export {
    variable,
    constant,
    toExpr,
    isConstant,
    add,
    sub,
    mul,
    div,
    pow,
    sqrt,
    neg,
    sum,
    ite,
    eq,
    lt,
    le,
    gt,
    ge,
    and,
} from './builders';

export { evaluate, holds, variablesOf, dependsOn } from './evaluate';
export { differentiate } from './differentiate';
export { toSmtLib, formatReal, formatSymbol, exprToSmt, formulaToSmt } from './smtlib';
export type { SmtLibOptions } from './smtlib';
