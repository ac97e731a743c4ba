/**
 * Circuit Graph — Core Models
 *
 * Nodes are addressed by their interned name, channels by their
 * index in the channel arena. Every physical quantity owns exactly
 * one unknown, created with its element and never replaced; pins
 * only decide whether that unknown is fixed or merely bounded.
 */

import type { Constraint, VariableExpr } from '../expr';
import type { AnalyteSet } from '../fluids';

// ─── Kinds ───

export type NodeKind = 'input' | 'output' | 'node' | 't-junction' | 'ep-cross';

export const NODE_KINDS: readonly NodeKind[] = ['input', 'output', 'node', 't-junction', 'ep-cross'];

export type PortKind = Extract<NodeKind, 'input' | 'output'>;

export const PORT_KINDS: readonly PortKind[] = ['input', 'output'];

/** Cross-section shape of a channel */
export type ChannelKind = 'rectangle';

export const CHANNEL_KINDS: readonly ChannelKind[] = ['rectangle'];

/** Role of a channel at a junction node */
export type ChannelPhase = 'continuous' | 'dispersed' | 'output' | 'tail' | 'separation' | 'none';

export const CHANNEL_PHASES: readonly ChannelPhase[] = [
    'continuous',
    'dispersed',
    'output',
    'tail',
    'separation',
    'none',
];

// ─── Node Model ───

export interface NodeSymbols {
    pressure: VariableExpr;
    flowRate: VariableExpr;
    viscosity: VariableExpr;
    density: VariableExpr;
    x: VariableExpr;
    y: VariableExpr;
}

/** User-pinned literals; null leaves the unknown bounded only */
export interface NodePins {
    pressure: number | null;
    flowRate: number | null;
    viscosity: number | null;
    density: number | null;
    x: number | null;
    y: number | null;
}

export interface ElectricalAttributes {
    voltage: VariableExpr;
    current: VariableExpr;
    pinnedVoltage: number | null;
    pinnedCurrent: number | null;
}

export interface JunctionParameters {
    /** Minimum crossing angle at a t-junction, degrees */
    criticalAngle: number;
    /** Largest allowed valley-to-peak concentration ratio (c) */
    peakRatio: number;
    /** Fraction of the concentration floor treated as negligible (p) */
    peakHeight: number;
    /** Background quality factor (qf) */
    qualityFactor: number;
}

export interface CircuitNode {
    name: string;
    kind: NodeKind;
    /** Fluid the port was seeded from; null for internal nodes */
    fluid: string | null;
    symbols: NodeSymbols;
    pins: NodePins;
    electrical: ElectricalAttributes | null;
    analytes: AnalyteSet | null;
    junction: JunctionParameters;
}

// ─── Channel Model ───

export interface ChannelSymbols {
    length: VariableExpr;
    width: VariableExpr;
    height: VariableExpr;
    flowRate: VariableExpr;
    dropletVolume: VariableExpr;
    viscosity: VariableExpr;
    resistance: VariableExpr;
    detectorPosition: VariableExpr;
}

export interface ChannelPins {
    length: number | null;
    width: number | null;
    height: number | null;
    /** Detector distance from the junction, separation channels only */
    detectorPosition: number | null;
    /** Minimum resolvable time between peaks, separation channels only */
    samplingInterval: number | null;
}

export interface Channel {
    index: number;
    from: string;
    to: string;
    kind: ChannelKind;
    phase: ChannelPhase;
    symbols: ChannelSymbols;
    pins: ChannelPins;
}

/** Ordered endpoint pair naming a channel */
export type ChannelRef = readonly [from: string, to: string];

// ─── Symbol Registry ───

export interface SymbolOwner {
    element: 'node' | 'channel' | 'junction';
    /** Node name, or "from->to" for channels */
    owner: string;
    quantity: string;
}

// ─── Schematic State ───

/** [xmin, ymin, xmax, ymax] */
export type ChipBounds = readonly [number, number, number, number];

export interface SchematicState {
    bounds: ChipBounds;
    nodes: Record<string, CircuitNode>;
    /** Node names in insertion order */
    nodeOrder: string[];
    channels: Channel[];
    /** channelKey(from, to) -> index into channels */
    channelIndex: Record<string, number>;
    symbols: Record<string, SymbolOwner>;
    /** Constraints emitted by the last translation */
    constraints: Constraint[];
    translated: boolean;
    /** Monotonic version counter */
    version: number;
}

export function channelKey(from: string, to: string): string {
    return JSON.stringify([from, to]);
}

export function channelLabel(channel: Pick<Channel, 'from' | 'to'>): string {
    return `${channel.from}->${channel.to}`;
}
