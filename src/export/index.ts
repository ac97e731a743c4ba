export { toCircuitIr } from './circuitIr';
export type {
    CircuitIr,
    CircuitIrOptions,
    IrAttributes,
    IrConnection,
    IrNode,
    IrSignalType,
    IrValue,
} from './circuitIr';

export { parseParameterMapping, mapModelParameters, renderModelParameters } from './modelParameters';
export type { ParameterMapping } from './modelParameters';
