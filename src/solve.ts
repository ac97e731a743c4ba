/**
 * Translates a schematic, hands the script to a solver and
 * returns its verdict.
 */

import { createHttpBackend } from './api';
import { config } from './config';
import type { SolveResult, SolverBackend } from './engine/backend';
import { ValidationError } from './engine/errors';
import { toSmtLib } from './engine/expr';
import type { Schematic } from './engine/graph';
import { translateSchematic, type Translator } from './engine/translation';

export interface SolveOptions {
    /** Defaults to the HTTP solver at SOLVER_URL */
    backend?: SolverBackend;
    /** Solver delta, defaults to SOLVER_PRECISION */
    precision?: number;
    /** Log the full SMT-LIB script before submitting it */
    debug?: boolean;
    translator?: Translator;
}

export async function solve(schematic: Schematic, options: SolveOptions = {}): Promise<SolveResult> {
    const precision = options.precision ?? config.precision;
    if (!Number.isFinite(precision) || precision <= 0) {
        throw new ValidationError(`Solver precision must be a positive number, got ${precision}`);
    }

    const constraints = translateSchematic(schematic, options.translator);
    const script = toSmtLib(constraints);
    if (options.debug) {
        console.info(`[Solver] Submitting ${constraints.length} constraints:\n${script}`);
    }

    const backend = options.backend ?? createHttpBackend();
    return backend.check(script, precision);
}
