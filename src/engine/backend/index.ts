export type { Interval, ResultModel, SolveResult, SolverBackend } from './types';
export { midpoint, isBounded } from './types';
