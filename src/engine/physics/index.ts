/**
 * Physics Algorithm Library — Public API
 *
 * Pure functions from named quantities to expressions and formulas.
 */

export { channelResistance, pressureFlow, outputPressure, portFlowRate } from './hydraulics';
export type { ResistanceTerms } from './hydraulics';

export { nodePoint, pythagoreanLength, triangleArea, straightLine, critAngleCosineSquared } from './geometry';
export type { Point } from './geometry';

export { dropletVolume, GUTTER_FLOW_FRACTION } from './droplets';

export {
    electricField,
    mobility,
    particleVelocity,
    erfApprox,
    concentration,
    ELECTROOSMOTIC_MOBILITY,
} from './electrophoresis';
