/**
 * Symbol Registry — one unknown per physical quantity per element.
 *
 * Names are "<node>_<quantity>" and "<from>_<to>_<quantity>", which
 * can collide for unlucky node names ("a_b" vs channel a->b), so every
 * name is claimed in the registry before the element is created.
 */

import { variable, type VariableExpr } from '../expr';
import { ValidationError } from '../errors';
import type {
    ChannelSymbols,
    ElectricalAttributes,
    NodeSymbols,
    SymbolOwner,
} from './models';

const NODE_KEYS = ['pressure', 'flowRate', 'viscosity', 'density', 'x', 'y'] as const;

const CHANNEL_KEYS = [
    'length',
    'width',
    'height',
    'flowRate',
    'dropletVolume',
    'viscosity',
    'resistance',
    'detectorPosition',
] as const;

export const NODE_QUANTITIES: Readonly<Record<keyof NodeSymbols, string>> = {
    pressure: 'pressure',
    flowRate: 'flow_rate',
    viscosity: 'viscosity',
    density: 'density',
    x: 'x',
    y: 'y',
};

export const CHANNEL_QUANTITIES: Readonly<Record<keyof ChannelSymbols, string>> = {
    length: 'length',
    width: 'width',
    height: 'height',
    flowRate: 'flow_rate',
    dropletVolume: 'droplet_volume',
    viscosity: 'viscosity',
    resistance: 'resistance',
    detectorPosition: 'detector_position',
};

export function symbolName(...parts: string[]): string {
    return parts.join('_');
}

export function createNodeSymbols(name: string): NodeSymbols {
    const v = (key: keyof NodeSymbols) => variable(symbolName(name, NODE_QUANTITIES[key]));
    return {
        pressure: v('pressure'),
        flowRate: v('flowRate'),
        viscosity: v('viscosity'),
        density: v('density'),
        x: v('x'),
        y: v('y'),
    };
}

export function createChannelSymbols(from: string, to: string): ChannelSymbols {
    const v = (key: keyof ChannelSymbols) => variable(symbolName(from, to, CHANNEL_QUANTITIES[key]));
    return {
        length: v('length'),
        width: v('width'),
        height: v('height'),
        flowRate: v('flowRate'),
        dropletVolume: v('dropletVolume'),
        viscosity: v('viscosity'),
        resistance: v('resistance'),
        detectorPosition: v('detectorPosition'),
    };
}

export function createElectricalSymbols(name: string): Pick<ElectricalAttributes, 'voltage' | 'current'> {
    return {
        voltage: variable(symbolName(name, 'voltage')),
        current: variable(symbolName(name, 'current')),
    };
}

// ─── Registry ───

export interface SymbolClaim extends SymbolOwner {
    name: string;
}

/** [quantity, unknown] pairs of a node, electrical quantities last. */
export function nodeSymbolEntries(
    symbols: NodeSymbols,
    electrical?: Pick<ElectricalAttributes, 'voltage' | 'current'>,
): Array<[string, VariableExpr]> {
    const entries = NODE_KEYS.map((key): [string, VariableExpr] => [NODE_QUANTITIES[key], symbols[key]]);
    if (electrical) {
        entries.push(['voltage', electrical.voltage], ['current', electrical.current]);
    }
    return entries;
}

export function channelSymbolEntries(symbols: ChannelSymbols): Array<[string, VariableExpr]> {
    return CHANNEL_KEYS.map((key): [string, VariableExpr] => [CHANNEL_QUANTITIES[key], symbols[key]]);
}

export function nodeClaims(
    name: string,
    symbols: NodeSymbols,
    electrical?: Pick<ElectricalAttributes, 'voltage' | 'current'>,
): SymbolClaim[] {
    return nodeSymbolEntries(symbols, electrical).map(([quantity, v]): SymbolClaim => ({
        name: v.name,
        element: 'node',
        owner: name,
        quantity,
    }));
}

export function channelClaims(label: string, symbols: ChannelSymbols): SymbolClaim[] {
    return channelSymbolEntries(symbols).map(([quantity, v]): SymbolClaim => ({
        name: v.name,
        element: 'channel',
        owner: label,
        quantity,
    }));
}

/** Throws when any claimed name is already owned. */
export function assertUnclaimed(
    registry: Readonly<Record<string, SymbolOwner>>,
    claims: readonly SymbolClaim[],
): void {
    for (const claim of claims) {
        if (!Object.hasOwn(registry, claim.name)) continue;
        const existing = registry[claim.name];
        throw new ValidationError(
            `Unknown "${claim.name}" for ${claim.element} "${claim.owner}" collides with ` +
            `${existing.quantity} of ${existing.element} "${existing.owner}"`,
        );
    }
}

export function registerClaims(
    registry: Record<string, SymbolOwner>,
    claims: readonly SymbolClaim[],
): void {
    for (const { name, ...owner } of claims) {
        registry[name] = owner;
    }
}
