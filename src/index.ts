/**
 * Fluidic Constraints — Public API
 *
 * Build a schematic, translate it into nonlinear real-arithmetic
 * constraints and ask a solver whether a dimensioned design exists.
 *
 * Usage:
 *   const chip = createSchematic([0, 0, 10, 10]);
 *   chip.addPort('in', 'input', { pressure: 100, fluid: 'water' });
 *   chip.addPort('out', 'output');
 *   chip.addChannel('in', 'out', { length: 1, width: 0.9 });
 *   const result = await solve(chip);
 */

// ─── Errors ───
export {
    SchematicError,
    ValidationError,
    TopologyError,
    UnknownFluidError,
    UnknownAnalyteError,
} from './engine/errors';
export { SolverError } from './api';

// ─── Building ───
export * from './engine/graph';
export { lookupFluid, lookupAnalytes, fluidNames } from './engine/fluids';
export type { FluidProperties, AnalyteSet } from './engine/fluids';

// ─── Expressions & Physics ───
export * as expr from './engine/expr';
export * as physics from './engine/physics';

// ─── Validation & Translation ───
export { TopologyValidator, createValidator, validateTopology, ALL_RULES } from './engine/validation';
export type { ValidationIssue, ValidationResult, ValidatorFn, Severity } from './engine/validation';
export { Translator, translateSchematic } from './engine/translation';
export type { TranslatorOptions, NodeHandler, ChannelHandler, HandlerResult } from './engine/translation';

// ─── Solving ───
export { solve } from './solve';
export type { SolveOptions } from './solve';
export type { Interval, ResultModel, SolveResult, SolverBackend } from './engine/backend';
export { HttpSolverBackend, createHttpBackend, parseSolverModel } from './api';
export { config, loadConfig } from './config';
export type { SolverConfig } from './config';

// ─── Exports ───
export * from './export';
