/**
 * Backend Adapter — Core Types
 */

/** Closed interval [lower, upper]; either end may be infinite */
export type Interval = readonly [lower: number, upper: number];

/** Unknown name -> solved interval */
export type ResultModel = Record<string, Interval>;

/** Infeasibility is a value, never an exception. */
export type SolveResult =
    | { status: 'sat'; model: ResultModel; delta: number }
    | { status: 'unsat' };

/**
 * Anything able to decide an SMT-LIB script. Failures to reach or run
 * the solver reject; an unsatisfiable script resolves to unsat.
 */
export interface SolverBackend {
    check(script: string, precision: number): Promise<SolveResult>;
}

export function midpoint([lower, upper]: Interval): number {
    return (lower + upper) / 2;
}

export function isBounded([lower, upper]: Interval): boolean {
    return Number.isFinite(lower) && Number.isFinite(upper)
        && Math.abs(lower) !== Number.MAX_VALUE && Math.abs(upper) !== Number.MAX_VALUE;
}
