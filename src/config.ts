/**
 * Runtime configuration, read once from the environment.
 */

// ─── Config ───

export interface SolverConfig {
    /** Base URL of the NRA solver service */
    url: string;
    timeoutMs: number;
    /** Solver delta; smaller is tighter and slower */
    precision: number;
}

export const DEFAULT_CONFIG: Readonly<SolverConfig> = {
    url: 'http://localhost:8000',
    timeoutMs: 60_000,
    precision: 0.001,
};

function positiveNumber(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SolverConfig {
    return {
        url: env.SOLVER_URL || DEFAULT_CONFIG.url,
        timeoutMs: positiveNumber(env.SOLVER_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
        precision: positiveNumber(env.SOLVER_PRECISION, DEFAULT_CONFIG.precision),
    };
}

export const config = loadConfig();
