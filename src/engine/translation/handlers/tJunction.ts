/**
 * T-junction: droplet generation where a dispersed phase meets a
 * continuous one.
 *
 * Exactly three channels: a `continuous` and a `dispersed` inflow and
 * one `output` outflow. The continuous inflow and the outflow share a
 * cross-section and lie on one line through the junction.
 */

import { add, eq, gt, le, mul, type Constraint } from '../../expr';
import { TopologyError } from '../../errors';
import { channelLabel, connectedChannels, incomingChannels, outgoingChannels, type Channel } from '../../graph';
import { critAngleCosineSquared, dropletVolume, nodePoint, straightLine } from '../../physics';
import type { NodeHandler } from '../types';
import { translateNodeBase } from './node';

/** Corner rounding relative to the continuous channel width */
const EPSILON_WIDTH_RATIO = 0.01;

function single(channels: Channel[], junction: string, role: string): Channel {
    if (channels.length !== 1) {
        throw new TopologyError(
            `T-junction "${junction}" needs exactly one ${role} channel, found ${channels.length}`,
            junction,
        );
    }
    return channels[0];
}

export const tJunctionHandler: NodeHandler = {
    kind: 't-junction',
    translate(ctx, node) {
        const { state } = ctx;
        const name = node.name;

        const connected = connectedChannels(state, name);
        if (connected.length !== 3) {
            throw new TopologyError(`T-junction "${name}" must have 3 connections, found ${connected.length}`, name);
        }

        const incoming = incomingChannels(state, name);
        for (const channel of incoming) {
            if (channel.phase !== 'continuous' && channel.phase !== 'dispersed') {
                throw new TopologyError(
                    `Invalid phase "${channel.phase}" on T-junction inflow ${channelLabel(channel)}`,
                    name,
                );
            }
        }
        const continuous = single(incoming.filter((ch) => ch.phase === 'continuous'), name, 'continuous');
        const dispersed = single(incoming.filter((ch) => ch.phase === 'dispersed'), name, 'dispersed');
        const output = single(outgoingChannels(state, name), name, 'output');
        if (output.phase !== 'output') {
            throw new TopologyError(
                `T-junction outflow ${channelLabel(output)} must have phase "output", not "${output.phase}"`,
                name,
            );
        }

        const continuousNode = ctx.node(continuous.from);
        const dispersedNode = ctx.node(dispersed.from);
        const outputNode = ctx.node(output.to);
        const [c, j, d, o] = [continuousNode, node, dispersedNode, outputNode].map(nodePoint);

        const epsilon = ctx.local(name, 'epsilon');
        const cosSquaredCrit = Math.cos((node.junction.criticalAngle * Math.PI) / 180) ** 2;

        const result = translateNodeBase(ctx, node);
        const constraints: Constraint[] = [
            eq(continuous.symbols.width, output.symbols.width),
            eq(continuous.symbols.height, output.symbols.height),
            eq(dispersed.symbols.height, output.symbols.height),

            eq(epsilon, mul(EPSILON_WIDTH_RATIO, continuous.symbols.width)),
            gt(epsilon, 0),

            eq(continuousNode.symbols.viscosity, outputNode.symbols.viscosity),
            eq(add(continuous.symbols.flowRate, dispersed.symbols.flowRate), output.symbols.flowRate),
            straightLine(c, j, o),

            eq(output.symbols.dropletVolume, dropletVolume(
                output.symbols.height,
                output.symbols.width,
                dispersed.symbols.width,
                epsilon,
                dispersedNode.symbols.flowRate,
                continuousNode.symbols.flowRate,
            )),

            le(cosSquaredCrit, critAngleCosineSquared(c, j, d)),
            le(cosSquaredCrit, critAngleCosineSquared(c, j, o)),
            le(cosSquaredCrit, critAngleCosineSquared(o, j, d)),
        ];

        return { constraints: [...result.constraints, ...constraints], next: result.next };
    },
};
