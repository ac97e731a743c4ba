/**
 * Translator: schematic snapshot to constraint set.
 *
 * Validates the topology, then walks the graph from every input port
 * with an explicit worklist, dispatching each node and channel to the
 * handler registered for its kind. Elements already translated are
 * skipped. Chip-bounds constraints for every node close the set.
 *
 * Usage:
 *   const constraints = translateSchematic(schematic);
 */

import type { Constraint } from '../expr';
import { TopologyError } from '../errors';
import {
    channelLabel,
    nodesOfKind,
    type ChannelKind,
    type NodeKind,
    type Schematic,
    type SchematicState,
} from '../graph';
import { TopologyValidator } from '../validation';
import { chipBounds } from './bounds';
import { createTranslationContext } from './context';
import { DEFAULT_CHANNEL_HANDLERS, DEFAULT_NODE_HANDLERS } from './handlers';
import type { ChannelHandler, HandlerResult, NodeHandler, TraversalStep } from './types';

export interface TranslatorOptions {
    nodeHandlers?: readonly NodeHandler[];
    channelHandlers?: readonly ChannelHandler[];
    validator?: TopologyValidator;
}

// ─── Translator Class ───

export class Translator {
    private readonly nodeHandlers: ReadonlyMap<NodeKind, NodeHandler>;
    private readonly channelHandlers: ReadonlyMap<ChannelKind, ChannelHandler>;
    private readonly validator: TopologyValidator;

    constructor(options: TranslatorOptions = {}) {
        this.nodeHandlers = new Map(
            (options.nodeHandlers ?? DEFAULT_NODE_HANDLERS).map((h): [NodeKind, NodeHandler] => [h.kind, h]),
        );
        this.channelHandlers = new Map(
            (options.channelHandlers ?? DEFAULT_CHANNEL_HANDLERS).map((h): [ChannelKind, ChannelHandler] => [h.kind, h]),
        );
        this.validator = options.validator ?? new TopologyValidator();
    }

    translate(state: SchematicState): Constraint[] {
        this.checkTopology(state);

        const ctx = createTranslationContext(state);
        const constraints: Constraint[] = [];
        const visitedNodes = new Set<string>();
        const visitedChannels = new Set<number>();

        const worklist: TraversalStep[] = nodesOfKind(state, 'input').map(
            (node): TraversalStep => ({ kind: 'node', name: node.name }),
        );

        while (worklist.length > 0) {
            const step = worklist.shift();
            if (step === undefined) break;

            let result: HandlerResult;
            if (step.kind === 'node') {
                if (visitedNodes.has(step.name)) continue;
                visitedNodes.add(step.name);
                const node = ctx.node(step.name);
                result = this.nodeHandler(node.kind, node.name).translate(ctx, node);
            } else {
                if (visitedChannels.has(step.index)) continue;
                visitedChannels.add(step.index);
                const channel = state.channels[step.index];
                result = this.channelHandler(channel.kind, channelLabel(channel)).translate(ctx, channel);
            }

            constraints.push(...result.constraints);
            worklist.push(...result.next);
        }

        for (const name of state.nodeOrder) {
            constraints.push(...chipBounds(state.nodes[name], state.bounds));
        }

        return constraints;
    }

    // ─── Internals ───

    private checkTopology(state: SchematicState): void {
        const result = this.validator.validate(state);
        for (const warning of result.warnings) {
            console.warn(`[Translator] ${warning.message}`);
        }
        if (!result.isValid) {
            const [first] = result.errors;
            throw new TopologyError(first.message, first.affectedNodes[0] ?? null);
        }
    }

    private nodeHandler(kind: NodeKind, name: string): NodeHandler {
        const handler = this.nodeHandlers.get(kind);
        if (!handler) throw new TopologyError(`No handler for node kind "${kind}" of "${name}"`, name);
        return handler;
    }

    private channelHandler(kind: ChannelKind, label: string): ChannelHandler {
        const handler = this.channelHandlers.get(kind);
        if (!handler) throw new TopologyError(`No handler for channel kind "${kind}" of ${label}`, label);
        return handler;
    }
}

// ─── Schematic Entry Point ───

/**
 * Translates the schematic and closes its build phase. A schematic
 * that was already translated returns its stored constraints.
 */
export function translateSchematic(schematic: Schematic, translator: Translator = new Translator()): Constraint[] {
    const state = schematic.getState();
    if (state.translated) return state.constraints;

    const constraints = translator.translate(state);
    schematic.commitConstraints(constraints);
    return constraints;
}
