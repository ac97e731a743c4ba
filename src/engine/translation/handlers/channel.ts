/**
 * Rectangular channel: geometry, viscosity carry-over, resistance
 * and flow continuity from the upstream node.
 */

import { eq, type Constraint } from '../../expr';
import { predecessors, type Channel } from '../../graph';
import { channelResistance, nodePoint, pythagoreanLength } from '../../physics';
import { CHANNEL_BOUNDS, bounded, pinOrBound } from '../bounds';
import type { ChannelHandler, HandlerResult, TranslationContext } from '../types';

function translateRectangle(ctx: TranslationContext, channel: Channel): HandlerResult {
    const { symbols, pins } = channel;
    const from = ctx.node(channel.from);
    const to = ctx.node(channel.to);

    const constraints: Constraint[] = [
        pythagoreanLength(nodePoint(from), nodePoint(to), symbols.length),
        ...pinOrBound(symbols.length, pins.length, CHANNEL_BOUNDS.length),
        ...pinOrBound(symbols.width, pins.width, CHANNEL_BOUNDS.width),
        ...pinOrBound(symbols.height, pins.height, CHANNEL_BOUNDS.height),
        eq(symbols.viscosity, from.symbols.viscosity),
    ];

    // Viscosity carries over only into a node with a single inflow
    if (predecessors(ctx.state, to.name).length === 1) {
        constraints.push(eq(to.symbols.viscosity, symbols.viscosity));
    }

    const { precondition, resistance } = channelResistance(
        symbols.width,
        symbols.height,
        symbols.viscosity,
        symbols.length,
    );
    constraints.push(
        precondition,
        eq(symbols.resistance, resistance),
        ...bounded(symbols.resistance, CHANNEL_BOUNDS.resistance),
        eq(symbols.flowRate, from.symbols.flowRate),
    );

    return { constraints, next: [{ kind: 'node', name: to.name }] };
}

export const rectangleHandler: ChannelHandler = {
    kind: 'rectangle',
    translate: translateRectangle,
};
