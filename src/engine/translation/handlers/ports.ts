/**
 * Input and output ports: the sources and sinks of the traversal.
 */

import { eq, sum } from '../../expr';
import { TopologyError } from '../../errors';
import { incomingChannels, outgoingChannels } from '../../graph';
import { portFlowRate } from '../../physics';
import type { NodeHandler } from '../types';
import { translateNodeBase } from './node';

export const inputHandler: NodeHandler = {
    kind: 'input',
    translate(ctx, node) {
        if (incomingChannels(ctx.state, node.name).length > 0) {
            throw new TopologyError(`Cannot have channels into input port "${node.name}"`, node.name);
        }
        if (outgoingChannels(ctx.state, node.name).length === 0) {
            throw new TopologyError(`Input port "${node.name}" must have 1 or more outgoing channels`, node.name);
        }

        const result = translateNodeBase(ctx, node);
        if (node.pins.flowRate === null) {
            result.constraints.push(eq(node.symbols.flowRate, portFlowRate(ctx.state, node.name)));
        }
        return result;
    },
};

export const outputHandler: NodeHandler = {
    kind: 'output',
    translate(ctx, node) {
        if (outgoingChannels(ctx.state, node.name).length > 0) {
            throw new TopologyError(`Cannot have channels out of output port "${node.name}"`, node.name);
        }
        const incoming = incomingChannels(ctx.state, node.name);
        if (incoming.length === 0) {
            throw new TopologyError(`Output port "${node.name}" must have 1 or more incoming channels`, node.name);
        }

        const result = translateNodeBase(ctx, node);
        if (node.pins.flowRate === null) {
            result.constraints.push(eq(node.symbols.flowRate, sum(incoming.map((ch) => ch.symbols.flowRate))));
        }
        return result;
    },
};
