export { HttpSolverBackend, createHttpBackend } from './solverClient';
export type { CheckRequest, CheckResponse, HealthResponse, SolverClientOptions } from './solverClient';
export { SolverError } from './errors';
export type { SolverErrorDetail } from './errors';
export { parseSolverModel } from './solverModel';
