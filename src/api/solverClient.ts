/**
 * Solver Client — Axios-based HTTP client for an NRA solver service.
 *
 * Features:
 * - Environment-based solver URL and timeout (SOLVER_URL, SOLVER_TIMEOUT_MS)
 * - POST /check with the SMT-LIB script and the solver precision
 * - Response interceptor normalising every failure into SolverError
 * - Textual interval model parsed into a ResultModel
 */

import axios, {
    type AxiosAdapter,
    type AxiosError,
    type AxiosInstance,
} from 'axios';

import { config } from '../config';
import type { SolveResult, SolverBackend } from '../engine/backend';
import { parseSolverModel } from './solverModel';
import { SolverError } from './errors';

// ─── Wire Types ───

export interface CheckRequest {
    smt2: string;
    precision: number;
}

export type CheckResponse =
    | { result: 'unsat' }
    | { result: 'delta-sat'; delta: number; model: string };

export interface HealthResponse {
    status: string;
    solver: string;
    version: string;
}

export interface SolverClientOptions {
    baseURL?: string;
    timeoutMs?: number;
    /** Custom transport; tests pass an in-process adapter */
    adapter?: AxiosAdapter;
}

// ─── Client Factory ───

function createAxiosInstance(options: SolverClientOptions): AxiosInstance {
    const instance = axios.create({
        baseURL: options.baseURL ?? config.url,
        timeout: options.timeoutMs ?? config.timeoutMs,
        headers: {
            'Content-Type': 'application/json',
        },
        adapter: options.adapter,
    });

    // ─ Response interceptor: normalize errors
    instance.interceptors.response.use(
        (response) => response,
        (error: AxiosError<{ detail?: string }>) => {
            const status = error.response?.status ?? 0;
            const detail = error.response?.data?.detail ?? null;
            const message =
                detail || error.message || `Solver request failed (${status})`;

            return Promise.reject(
                new SolverError({
                    status,
                    message,
                    detail,
                    code: error.code ?? null,
                }),
            );
        },
    );

    return instance;
}

// ─── Response Narrowing ───

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCheckResponse(data: unknown): CheckResponse {
    if (isRecord(data)) {
        if (data.result === 'unsat') return { result: 'unsat' };
        if (data.result === 'delta-sat' && typeof data.delta === 'number' && typeof data.model === 'string') {
            return { result: 'delta-sat', delta: data.delta, model: data.model };
        }
    }
    throw new SolverError({
        status: 0,
        message: 'Unexpected response from solver',
        detail: JSON.stringify(data) ?? null,
        code: 'E_BAD_RESPONSE',
    });
}

// ─── Client Class ───

export class HttpSolverBackend implements SolverBackend {
    private http: AxiosInstance;

    constructor(options: SolverClientOptions = {}) {
        this.http = createAxiosInstance(options);
    }

    // ─── Health ───

    async healthCheck(): Promise<HealthResponse> {
        const { data } = await this.http.get<HealthResponse>('/health');
        return data;
    }

    // ─── Satisfiability ───

    async check(script: string, precision: number): Promise<SolveResult> {
        const body: CheckRequest = { smt2: script, precision };
        const { data } = await this.http.post<unknown>('/check', body);
        const response = toCheckResponse(data);

        if (response.result === 'unsat') return { status: 'unsat' };
        return {
            status: 'sat',
            delta: response.delta,
            model: parseSolverModel(response.model),
        };
    }
}

export function createHttpBackend(options?: SolverClientOptions): HttpSolverBackend {
    return new HttpSolverBackend(options);
}
