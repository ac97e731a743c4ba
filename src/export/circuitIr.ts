/**
 * Circuit IR export — solved schematic as a JSON document of typed
 * nodes and connections.
 *
 * Nodes are numbered pT0, pT1, ... in insertion order and channels
 * ch0, ch1, ...; each entry carries the solved interval of every
 * unknown it owns plus the literals the user pinned.
 */

import { isBounded, type Interval, type ResultModel } from '../engine/backend';
import {
    channelSymbolEntries,
    nodeSymbolEntries,
    type NodeKind,
    type SchematicState,
} from '../engine/graph';
import type { VariableExpr } from '../engine/expr';

// ─── IR Types ───

export type IrValue = [number, number] | number | string;

export type IrAttributes = Record<string, IrValue>;

export interface IrNode {
    type: NodeKind;
    portAttrs: string;
    attributes: IrAttributes;
}

export interface IrSignalType {
    signalType: NodeKind;
    attributes: IrAttributes;
}

export interface IrConnection {
    from: string;
    to: string;
    attributes: IrAttributes;
}

export interface CircuitIr {
    name: string;
    userDefinedTypes: Record<string, never>;
    portTypes: Record<string, IrSignalType>;
    nodeTypes: Record<string, IrSignalType>;
    constraintTypes: Record<string, never>;
    nodes: Record<string, IrNode>;
    connections: Record<string, IrConnection>;
    constraints: { chipBounds: [number, number, number, number] };
}

export interface CircuitIrOptions {
    name?: string;
}

// ─── Helpers ───

function solvedAttributes(
    entries: Array<[string, VariableExpr]>,
    model: ResultModel,
): IrAttributes {
    const attributes: IrAttributes = {};
    for (const [quantity, unknown] of entries) {
        if (!Object.hasOwn(model, unknown.name)) continue;
        const [lower, upper]: Interval = model[unknown.name];
        attributes[quantity] = [lower, upper];
    }
    return attributes;
}

function pinnedAttributes(pins: Record<string, number | null>): IrAttributes {
    const attributes: IrAttributes = {};
    for (const [quantity, value] of Object.entries(pins)) {
        if (value !== null) attributes[`pinned_${quantity}`] = value;
    }
    return attributes;
}

// ─── Export ───

export function toCircuitIr(state: SchematicState, model: ResultModel, options: CircuitIrOptions = {}): CircuitIr {
    for (const [name, interval] of Object.entries(model)) {
        if (!isBounded(interval)) {
            console.warn(`[Export] ${name} range includes inf, needs an upper bound`);
        }
    }

    const [xmin, ymin, xmax, ymax] = state.bounds;
    const ir: CircuitIr = {
        name: options.name ?? 'circuit',
        userDefinedTypes: {},
        portTypes: {},
        nodeTypes: {},
        constraintTypes: {},
        nodes: {},
        connections: {},
        constraints: { chipBounds: [xmin, ymin, xmax, ymax] },
    };

    state.nodeOrder.forEach((name, idx) => {
        const node = state.nodes[name];
        const id = `pT${idx}`;
        const attributes: IrAttributes = {
            ...(node.fluid === null ? {} : { fluid: node.fluid }),
            ...solvedAttributes(nodeSymbolEntries(node.symbols, node.electrical ?? undefined), model),
            ...pinnedAttributes({ ...node.pins }),
        };

        ir.nodes[id] = { type: node.kind, portAttrs: name, attributes };
        const entry: IrSignalType = { signalType: node.kind, attributes: { ...attributes } };
        if (node.kind === 'input' || node.kind === 'output') {
            ir.portTypes[id] = entry;
        } else {
            ir.nodeTypes[id] = entry;
        }
    });

    state.channels.forEach((channel, idx) => {
        ir.connections[`ch${idx}`] = {
            from: channel.from,
            to: channel.to,
            attributes: {
                kind: channel.kind,
                phase: channel.phase,
                ...solvedAttributes(channelSymbolEntries(channel.symbols), model),
                ...pinnedAttributes({ ...channel.pins }),
            },
        };
    });

    return ir;
}
