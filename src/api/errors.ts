/**
 * Solver transport errors. Fatal: they propagate to the caller
 * unmodified and are never confused with an unsat result.
 */

export interface SolverErrorDetail {
    status: number;
    message: string;
    detail: string | null;
    code: string | null;
}

export class SolverError extends Error {
    status: number;
    detail: string | null;
    code: string | null;

    constructor(info: SolverErrorDetail) {
        super(info.message);
        this.name = 'SolverError';
        this.status = info.status;
        this.detail = info.detail;
        this.code = info.code;
    }
}
