/**
 * Plain node, and the logic every node kind shares.
 */

import { eq, ge, type Constraint } from '../../expr';
import { incomingChannels, outgoingChannels, type CircuitNode } from '../../graph';
import { outputPressure } from '../../physics';
import { NODE_BOUNDS, pinOrBound } from '../bounds';
import type { HandlerResult, NodeHandler, TranslationContext, TraversalStep } from '../types';

/**
 * Pressure relations, pins or bounds of every node quantity, density
 * inherited from a single upstream node, electrical pins; then every
 * outgoing channel is scheduled.
 */
export function translateNodeBase(ctx: TranslationContext, node: CircuitNode): HandlerResult {
    const { symbols, pins } = node;
    const incoming = incomingChannels(ctx.state, node.name);
    const constraints: Constraint[] = [];

    // A merge node sits at the pressure every inflow implies
    for (const channel of incoming) {
        const upstream = ctx.node(channel.from);
        constraints.push(eq(
            symbols.pressure,
            outputPressure(upstream.symbols.pressure, channel.symbols.resistance, channel.symbols.flowRate),
        ));
    }

    constraints.push(
        ...pinOrBound(symbols.x, pins.x, NODE_BOUNDS.x),
        ...pinOrBound(symbols.y, pins.y, NODE_BOUNDS.y),
        ...pinOrBound(symbols.pressure, pins.pressure, NODE_BOUNDS.pressure),
        ...pinOrBound(symbols.flowRate, pins.flowRate, NODE_BOUNDS.flowRate),
        ...pinOrBound(symbols.viscosity, pins.viscosity, NODE_BOUNDS.viscosity),
        ...pinOrBound(symbols.density, pins.density, NODE_BOUNDS.density),
    );

    if (incoming.length === 1) {
        constraints.push(eq(symbols.density, ctx.node(incoming[0].from).symbols.density));
    }

    if (node.electrical) {
        const { voltage, current, pinnedVoltage, pinnedCurrent } = node.electrical;
        if (pinnedVoltage !== null) constraints.push(eq(voltage, pinnedVoltage));
        constraints.push(pinnedCurrent === null ? ge(current, 0) : eq(current, pinnedCurrent));
    }

    const next = outgoingChannels(ctx.state, node.name).map(
        (channel): TraversalStep => ({ kind: 'channel', index: channel.index }),
    );

    return { constraints, next };
}

export const nodeHandler: NodeHandler = {
    kind: 'node',
    translate: translateNodeBase,
};
