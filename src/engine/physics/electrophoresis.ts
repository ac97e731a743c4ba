/**
 * Electrophoretic transport: field strength, analyte mobility and
 * velocity, and the band-broadening concentration profile used to
 * decide whether neighbouring analyte peaks can be resolved.
 */

import { add, div, mul, pow, sqrt, sub, sum, type Expr, type Term } from '../expr';
import { TopologyError } from '../errors';
import { findNode, findPath, pathChannels, type Channel, type SchematicState } from '../graph';

/** Electroosmotic mobility rule of thumb, m^2/(V*s) */
export const ELECTROOSMOTIC_MOBILITY = 1.0e8;

/**
 * Constant field between two electrical ports: E = (V_anode - V_cathode) / d,
 * d being the summed channel length of the directed path cathode -> anode.
 */
export function electricField(state: SchematicState, anode: string, cathode: string): Expr {
    const anodeNode = findNode(state, anode);
    const cathodeNode = findNode(state, cathode);
    if (!anodeNode?.electrical) {
        throw new TopologyError(`Anode "${anode}" must be an electrical port`, anode);
    }
    if (!cathodeNode?.electrical) {
        throw new TopologyError(`Cathode "${cathode}" must be an electrical port`, cathode);
    }

    const path = findPath(state, cathode, anode);
    if (!path || path.length < 2) {
        throw new TopologyError(`No path found between "${cathode}" and "${anode}"`, cathode);
    }
    const length = sum(pathChannels(state, path).map((ch) => ch.symbols.length));

    return div(sub(anodeNode.electrical.voltage, cathodeNode.electrical.voltage), length);
}

/**
 * Mobility of a spherical charged analyte in the channel's fluid:
 *   mu = q / (4 * pi * eta * r) + mu_EOF
 */
export function mobility(channel: Channel, charge: Term, radius: Term): Expr {
    const electrophoretic = div(charge, mul(4 * Math.PI, mul(channel.symbols.viscosity, radius)));
    return add(electrophoretic, ELECTROOSMOTIC_MOBILITY);
}

export function particleVelocity(mobilityTerm: Term, field: Term): Expr {
    return mul(mobilityTerm, field);
}

const ERF_COEFFICIENTS = [0.278393, 0.230389, 0.000972, 0.078108] as const;

/**
 * Quartic rational approximation of erf(x) for x >= 0:
 *   1 - (1 + a1 x + a2 x^2 + a3 x^3 + a4 x^4)^-4
 */
export function erfApprox(x: Term): Expr {
    const [a1, a2, a3, a4] = ERF_COEFFICIENTS;
    const poly = add(1, mul(a1, x), mul(a2, pow(x, 2)), mul(a3, pow(x, 3)), mul(a4, pow(x, 4)));
    return sub(1, pow(poly, -4));
}

/**
 * Concentration at position x and time t of a band of initial width W
 * travelling at velocity v with diffusivity D:
 *   C0/2 * (erf((W - x + v t) / (2 sqrt(D t))) + erf((W + x - v t) / (2 sqrt(D t))))
 */
export function concentration(
    initial: Term,
    diffusivity: Term,
    bandWidth: Term,
    velocity: Term,
    position: Term,
    time: Term,
): Expr {
    const spread = mul(2, sqrt(mul(diffusivity, time)));
    const travelled = mul(velocity, time);
    const leading = erfApprox(div(add(sub(bandWidth, position), travelled), spread));
    const trailing = erfApprox(div(sub(add(bandWidth, position), travelled), spread));
    return mul(div(initial, 2), add(leading, trailing));
}
