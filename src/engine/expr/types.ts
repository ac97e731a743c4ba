/**
 * Symbolic Expression Layer — Core Types
 *
 * Terms are plain immutable objects so they can live inside
 * frozen store snapshots and be shared between constraints.
 */

// ─── Operators ───

export type ArithmeticOp = '+' | '-' | '*' | '/' | '^';

export type ComparisonOp = '==' | '<' | '<=' | '>' | '>=';

// ─── Expressions ───

export interface VariableExpr {
    readonly kind: 'var';
    readonly name: string;
}

export interface ConstantExpr {
    readonly kind: 'const';
    readonly value: number;
}

export interface BinaryExpr {
    readonly kind: 'binary';
    readonly op: ArithmeticOp;
    readonly left: Expr;
    readonly right: Expr;
}

export interface IteExpr {
    readonly kind: 'ite';
    readonly condition: Formula;
    readonly then: Expr;
    readonly otherwise: Expr;
}

export type Expr = VariableExpr | ConstantExpr | BinaryExpr | IteExpr;

/** Anything accepted where an expression is expected; numbers become constants. */
export type Term = Expr | number;

// ─── Formulas ───

export interface ComparisonFormula {
    readonly kind: 'compare';
    readonly op: ComparisonOp;
    readonly left: Expr;
    readonly right: Expr;
}

export interface ConjunctionFormula {
    readonly kind: 'and';
    readonly args: readonly Formula[];
}

export type Formula = ComparisonFormula | ConjunctionFormula;

/** A single assertion handed to the solver. */
export type Constraint = Formula;

/** Concrete assignment of unknowns, used to check constraints locally. */
export type Assignment = Readonly<Record<string, number>>;
