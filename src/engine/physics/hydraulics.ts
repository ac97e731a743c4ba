/**
 * Hydraulic relations: channel resistance, pressure drop and port inflow.
 *
 * Units: pressure Pa, flow rate m^3/s, resistance kg/(m^4*s).
 */

import {
    div,
    eq,
    lt,
    mul,
    pow,
    sqrt,
    sub,
    sum,
    type Expr,
    type Formula,
    type Term,
} from '../expr';
import { TopologyError } from '../errors';
import { findNode, outgoingChannels, type SchematicState } from '../graph';

export interface ResistanceTerms {
    /** h < w, required for the closed form to hold; always assert it */
    precondition: Formula;
    resistance: Expr;
}

/**
 * Rectangular channel resistance:
 *   R = 12 * mu * L / (w * h^3 * (1 - 0.63 * h / w))
 */
export function channelResistance(width: Term, height: Term, viscosity: Term, length: Term): ResistanceTerms {
    const shapeFactor = sub(1, mul(0.63, div(height, width)));
    return {
        precondition: lt(height, width),
        resistance: div(mul(12, mul(viscosity, length)), mul(width, mul(pow(height, 3), shapeFactor))),
    };
}

/** p1 - p2 == Q * R */
export function pressureFlow(p1: Term, p2: Term, flowRate: Term, resistance: Term): Formula {
    return eq(sub(p1, p2), mul(flowRate, resistance));
}

/** Pressure left at the far end of a channel: P_in - R * Q */
export function outputPressure(pressureIn: Term, resistance: Term, flowRate: Term): Expr {
    return sub(pressureIn, mul(resistance, flowRate));
}

/**
 * Inflow at a port from its pressure and the cross-section it feeds:
 *   Q = A * sqrt(2 * P / rho)
 * where A is the summed cross-sectional area of every outgoing channel.
 */
export function portFlowRate(state: SchematicState, portName: string): Expr {
    const port = findNode(state, portName);
    if (!port) throw new TopologyError(`Port "${portName}" is not defined`, portName);

    const areas = outgoingChannels(state, portName).map((ch) => mul(ch.symbols.height, ch.symbols.width));
    if (areas.length === 0) {
        throw new TopologyError(`Port "${portName}" has no outgoing channel to feed`, portName);
    }
    const totalArea = areas.length === 1 ? areas[0] : sum(areas);
    return mul(totalArea, sqrt(div(mul(2, port.symbols.pressure), port.symbols.density)));
}
