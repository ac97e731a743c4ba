/**
 * Graph Queries — read-only traversal helpers over a schematic snapshot.
 *
 * Pure TypeScript. Channel lists are returned in insertion order so
 * traversal, and therefore constraint order, is deterministic.
 */

import type { Channel, CircuitNode, NodeKind, SchematicState } from './models';
import { channelKey } from './models';

export function findNode(state: SchematicState, name: string): CircuitNode | null {
    return Object.hasOwn(state.nodes, name) ? state.nodes[name] : null;
}

export function findChannel(state: SchematicState, from: string, to: string): Channel | null {
    const key = channelKey(from, to);
    return Object.hasOwn(state.channelIndex, key) ? state.channels[state.channelIndex[key]] : null;
}

export function outgoingChannels(state: SchematicState, name: string): Channel[] {
    return state.channels.filter((ch) => ch.from === name);
}

export function incomingChannels(state: SchematicState, name: string): Channel[] {
    return state.channels.filter((ch) => ch.to === name);
}

/** Every channel touching the node, incoming first. */
export function connectedChannels(state: SchematicState, name: string): Channel[] {
    return [...incomingChannels(state, name), ...outgoingChannels(state, name)];
}

export function successors(state: SchematicState, name: string): string[] {
    return outgoingChannels(state, name).map((ch) => ch.to);
}

export function predecessors(state: SchematicState, name: string): string[] {
    return incomingChannels(state, name).map((ch) => ch.from);
}

export function nodesOfKind(state: SchematicState, kind: NodeKind): CircuitNode[] {
    return state.nodeOrder.map((name) => state.nodes[name]).filter((node) => node.kind === kind);
}

// ─── Reachability ───

export function reachableFrom(state: SchematicState, start: string): Set<string> {
    const seen = new Set<string>([start]);
    const queue = [start];
    while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        for (const next of successors(state, current)) {
            if (!seen.has(next)) {
                seen.add(next);
                queue.push(next);
            }
        }
    }
    return seen;
}

/**
 * Directed path from start to end as a list of node names, or null.
 *
 * Depth-first with backtracking: a dead-end branch does not hide a
 * path through one of its siblings.
 */
export function findPath(state: SchematicState, start: string, end: string): string[] | null {
    const onPath = new Set<string>();

    const visit = (current: string): string[] | null => {
        if (current === end) return [current];
        onPath.add(current);
        for (const next of successors(state, current)) {
            if (onPath.has(next)) continue;
            const rest = visit(next);
            if (rest) return [current, ...rest];
        }
        onPath.delete(current);
        return null;
    };

    return visit(start);
}

/** Channels joining consecutive nodes of a path. */
export function pathChannels(state: SchematicState, path: readonly string[]): Channel[] {
    const channels: Channel[] = [];
    for (let i = 0; i + 1 < path.length; i++) {
        const ch = findChannel(state, path[i], path[i + 1]);
        if (!ch) {
            throw new Error(`No channel between "${path[i]}" and "${path[i + 1]}"`);
        }
        channels.push(ch);
    }
    return channels;
}
