/**
 * Pin-or-bound: a quantity with a user literal is fixed to it,
 * otherwise it is held inside a physically sane interval.
 */

import { eq, ge, gt, le, lt, type Constraint, type Term } from '../expr';
import type { ChipBounds, CircuitNode } from '../graph';

export interface Bound {
    min: number;
    /** Omitted for quantities only bounded from below */
    max?: number;
    /** min itself is allowed */
    inclusive?: boolean;
}

export const NODE_BOUNDS = {
    /** Pa */
    pressure: { min: 1e-6, max: 1e6 },
    /** m^3/s */
    flowRate: { min: 1e-12, max: 1 },
    /** Pa*s; liquid helium is 1.58e-4 */
    viscosity: { min: 1e-4, max: 100 },
    /** kg/m^3 */
    density: { min: 500, max: 2000 },
    x: { min: 0, inclusive: true },
    y: { min: 0, inclusive: true },
} satisfies Record<string, Bound>;

export const CHANNEL_BOUNDS = {
    length: { min: 1e-9, max: 1 },
    width: { min: 1e-9, max: 0.01 },
    height: { min: 1e-9, max: 0.01 },
    /** Upper limit from 1 MPa over 1e-3 m^3/s */
    resistance: { min: 0, max: 1e9 },
} satisfies Record<string, Bound>;

export const JUNCTION_BOUNDS = {
    /** V/m */
    field: { min: 0, max: 1e6 },
    mobility: { min: 0, max: 1e10 },
    velocity: { min: 0 },
    /** s */
    time: { min: 0, max: 1e6 },
} satisfies Record<string, Bound>;

export function bounded(unknown: Term, bound: Bound): Constraint[] {
    const constraints: Constraint[] = [
        bound.inclusive ? ge(unknown, bound.min) : gt(unknown, bound.min),
    ];
    if (bound.max !== undefined) constraints.push(lt(unknown, bound.max));
    return constraints;
}

export function pinOrBound(unknown: Term, pin: number | null, bound: Bound): Constraint[] {
    return pin === null ? bounded(unknown, bound) : [eq(unknown, pin)];
}

/** xmin <= x, ymin <= y, x <= xmax, y <= ymax */
export function chipBounds(node: CircuitNode, [xmin, ymin, xmax, ymax]: ChipBounds): Constraint[] {
    const { x, y } = node.symbols;
    return [ge(x, xmin), ge(y, ymin), le(x, xmax), le(y, ymax)];
}
