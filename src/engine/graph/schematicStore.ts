/**
 * Schematic Store — Zustand + Immer
 *
 * Holds the circuit graph during the build phase. Every builder call
 * validates its arguments, claims its unknowns in the symbol registry
 * and commits one immer draft. Snapshots handed out by getState() are
 * frozen, so the translator only ever sees immutable values.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { produce } from 'immer';

import type { Constraint, VariableExpr } from '../expr';
import { ValidationError } from '../errors';
import { lookupAnalytes, lookupFluid, type AnalyteSet } from '../fluids';

import type {
    Channel,
    ChannelKind,
    ChannelPhase,
    ChannelPins,
    ChannelRef,
    ChipBounds,
    CircuitNode,
    JunctionParameters,
    NodeKind,
    NodePins,
    PortKind,
    SchematicState,
} from './models';
import {
    CHANNEL_KINDS,
    CHANNEL_PHASES,
    NODE_KINDS,
    PORT_KINDS,
    channelKey,
    channelLabel,
} from './models';
import {
    assertUnclaimed,
    channelClaims,
    channelSymbolEntries,
    createChannelSymbols,
    createElectricalSymbols,
    createNodeSymbols,
    nodeClaims,
    nodeSymbolEntries,
    registerClaims,
} from './symbols';
import { checkAnalytes, checkChoice, checkFluidName, checkName, checkNumber } from './paramValidation';
import { findChannel, findNode } from './queries';

// ─── Builder Options ───

export interface PortOptions {
    /** Pa */
    pressure?: number;
    /** m^3/s */
    flowRate?: number;
    /** m */
    x?: number;
    y?: number;
    fluid?: string;
    /** Overrides the fluid's viscosity, Pa*s */
    viscosity?: number;
    /** Overrides the fluid's density, kg/m^3 */
    density?: number;
    /** Overrides the fluid's analyte set */
    analytes?: AnalyteSet;
}

export interface ElectricalPortOptions extends PortOptions {
    /** V */
    voltage?: number;
    /** A */
    current?: number;
}

export interface NodeOptions {
    x?: number;
    y?: number;
    kind?: NodeKind;
    /** t-junction only, degrees */
    criticalAngle?: number;
    /** ep-cross only */
    peakRatio?: number;
    peakHeight?: number;
    qualityFactor?: number;
}

export interface ChannelOptions {
    length?: number;
    width?: number;
    height?: number;
    kind?: ChannelKind;
    phase?: ChannelPhase;
    /** separation channels only, s */
    samplingInterval?: number;
    /** separation channels only, m from the junction */
    detectorPosition?: number;
}

export const DEFAULT_JUNCTION: Readonly<JunctionParameters> = {
    criticalAngle: 0.5,
    peakRatio: 0.5,
    peakHeight: 0.1,
    qualityFactor: 0.9,
};

const EMPTY_PINS: NodePins = {
    pressure: null,
    flowRate: null,
    viscosity: null,
    density: null,
    x: null,
    y: null,
};

// ─── Initial State ───

export function checkBounds(bounds: unknown): ChipBounds {
    if (!Array.isArray(bounds) || bounds.length !== 4) {
        throw new ValidationError('Chip bounds must be [xmin, ymin, xmax, ymax]');
    }
    const [xmin, ymin, xmax, ymax] = bounds.map((v, i) =>
        checkNumber(v, 'any', 'Chip', 'bounds', String(i)) ?? Number.NaN,
    );
    if (![xmin, ymin, xmax, ymax].every(Number.isFinite)) {
        throw new ValidationError('Chip bounds must all be given');
    }
    if (xmin > xmax || ymin > ymax) {
        throw new ValidationError(`Chip bounds [${xmin}, ${ymin}, ${xmax}, ${ymax}] are inverted`);
    }
    return [xmin, ymin, xmax, ymax];
}

export function createInitialState(bounds: ChipBounds): SchematicState {
    return {
        bounds,
        nodes: {},
        nodeOrder: [],
        channels: [],
        channelIndex: {},
        symbols: {},
        constraints: [],
        translated: false,
        version: 0,
    };
}

// ─── Schematic ───

export class Schematic {
    private store: StoreApi<SchematicState>;

    constructor(bounds: ChipBounds) {
        const checked = checkBounds(bounds);
        this.store = createStore<SchematicState>()(() => createInitialState(checked));
    }

    getState(): SchematicState {
        return this.store.getState();
    }

    subscribe(listener: (state: SchematicState, prev: SchematicState) => void): () => void {
        return this.store.subscribe(listener);
    }

    // ─── Ports & Nodes ───

    addPort(name: string, kind: PortKind, options: PortOptions = {}): void {
        this.insertNode(this.buildPort(name, kind, options, false));
    }

    addElectricalPort(name: string, kind: PortKind, options: ElectricalPortOptions = {}): void {
        this.insertNode(this.buildPort(name, kind, options, true));
    }

    addNode(name: string, options: NodeOptions = {}): void {
        this.assertBuilding();
        const checkedName = checkName(name, 'Node');
        const kind = checkChoice(options.kind ?? 'node', NODE_KINDS, 'Node', checkedName, 'kind');
        if (kind === 'input' || kind === 'output') {
            throw new ValidationError(`Node "${checkedName}" cannot be of kind ${kind}; use addPort`);
        }

        const num = (value: unknown, param: string) =>
            checkNumber(value, 'positive', 'Node', checkedName, param);
        const junctionOption = (value: unknown, param: string, allowed: NodeKind): number | null => {
            const checked = num(value, param);
            if (checked !== null && kind !== allowed) {
                throw new ValidationError(`Node "${checkedName}" parameter "${param}" only applies to ${allowed} nodes`);
            }
            return checked;
        };

        const junction: JunctionParameters = {
            criticalAngle: junctionOption(options.criticalAngle, 'criticalAngle', 't-junction') ?? DEFAULT_JUNCTION.criticalAngle,
            peakRatio: junctionOption(options.peakRatio, 'peakRatio', 'ep-cross') ?? DEFAULT_JUNCTION.peakRatio,
            peakHeight: junctionOption(options.peakHeight, 'peakHeight', 'ep-cross') ?? DEFAULT_JUNCTION.peakHeight,
            qualityFactor: junctionOption(options.qualityFactor, 'qualityFactor', 'ep-cross') ?? DEFAULT_JUNCTION.qualityFactor,
        };

        this.insertNode({
            name: checkedName,
            kind,
            fluid: null,
            symbols: createNodeSymbols(checkedName),
            pins: {
                ...EMPTY_PINS,
                x: checkNumber(options.x, 'non-negative', 'Node', checkedName, 'x'),
                y: checkNumber(options.y, 'non-negative', 'Node', checkedName, 'y'),
            },
            electrical: null,
            analytes: null,
            junction,
        });
    }

    // ─── Channels ───

    addChannel(from: string, to: string, options: ChannelOptions = {}): void {
        this.assertBuilding();
        const src = checkName(from, 'Channel endpoint');
        const dst = checkName(to, 'Channel endpoint');
        const label = channelLabel({ from: src, to: dst });
        const state = this.getState();

        for (const endpoint of [src, dst]) {
            if (!findNode(state, endpoint)) {
                throw new ValidationError(`Channel ${label} references undefined node "${endpoint}"`);
            }
        }
        if (src === dst) {
            throw new ValidationError(`Channel ${label} cannot start and end at the same node`);
        }
        if (findChannel(state, src, dst)) {
            throw new ValidationError(`Channel already exists between "${src}" and "${dst}"`);
        }

        const kind = checkChoice(options.kind ?? 'rectangle', CHANNEL_KINDS, 'Channel', label, 'kind');
        const phase = checkChoice(options.phase ?? 'none', CHANNEL_PHASES, 'Channel', label, 'phase');
        const num = (value: unknown, param: string) =>
            checkNumber(value, 'positive', 'Channel', label, param);

        const samplingInterval = num(options.samplingInterval, 'samplingInterval');
        const detectorPosition = num(options.detectorPosition, 'detectorPosition');
        if ((samplingInterval !== null || detectorPosition !== null) && phase !== 'separation') {
            throw new ValidationError(`Channel ${label} detector parameters only apply to separation channels`);
        }

        const pins: ChannelPins = {
            length: num(options.length, 'length'),
            width: num(options.width, 'width'),
            height: num(options.height, 'height'),
            detectorPosition,
            samplingInterval,
        };
        const symbols = createChannelSymbols(src, dst);
        const claims = channelClaims(label, symbols);
        assertUnclaimed(state.symbols, claims);

        this.store.setState(
            produce((draft: SchematicState) => {
                const index = draft.channels.length;
                const channel: Channel = { index, from: src, to: dst, kind, phase, symbols, pins };
                draft.channels.push(channel);
                draft.channelIndex[channelKey(src, dst)] = index;
                registerClaims(draft.symbols, claims);
                draft.version++;
            }),
        );
    }

    // ─── Attribute Lookup ───

    /**
     * The unknown for a quantity of a node ("pressure", "flow_rate", ...)
     * or of a channel named by its endpoint pair.
     */
    attribute(ref: string | ChannelRef, quantity: string): VariableExpr {
        const state = this.getState();

        if (typeof ref === 'string') {
            const node = findNode(state, ref);
            if (!node) throw new ValidationError(`Node "${ref}" is not defined`);
            const entry = nodeSymbolEntries(node.symbols, node.electrical ?? undefined)
                .find(([q]) => q === quantity);
            if (!entry) throw new ValidationError(`Node "${ref}" has no attribute "${quantity}"`);
            return entry[1];
        }

        const [from, to] = ref;
        const channel = findChannel(state, from, to);
        if (!channel) throw new ValidationError(`Channel ${from}->${to} is not defined`);
        const entry = channelSymbolEntries(channel.symbols).find(([q]) => q === quantity);
        if (!entry) throw new ValidationError(`Channel ${from}->${to} has no attribute "${quantity}"`);
        return entry[1];
    }

    // ─── Translation Lifecycle ───

    /** Stores the translated constraint set and closes the build phase. */
    commitConstraints(constraints: readonly Constraint[]): void {
        this.store.setState(
            produce((draft: SchematicState) => {
                draft.constraints = [...constraints];
                draft.translated = true;
                draft.version++;
            }),
        );
    }

    // ─── Internals ───

    private assertBuilding(): void {
        if (this.getState().translated) {
            throw new ValidationError('Schematic is read-only once it has been translated');
        }
    }

    private buildPort(name: string, kind: PortKind, options: ElectricalPortOptions, electrical: boolean): CircuitNode {
        this.assertBuilding();
        const component = electrical ? 'Electrical port' : 'Port';
        const checkedName = checkName(name, component);
        const checkedKind = checkChoice(kind, PORT_KINDS, component, checkedName, 'kind');
        const fluidName = checkFluidName(options.fluid, component, checkedName);
        const fluid = lookupFluid(fluidName);
        const num = (value: unknown, rule: 'positive' | 'non-negative', param: string) =>
            checkNumber(value, rule, component, checkedName, param);

        const voltage = checkNumber(options.voltage, 'any', component, checkedName, 'voltage');
        const current = num(options.current, 'non-negative', 'current');
        if (!electrical && (voltage !== null || current !== null)) {
            throw new ValidationError(`${component} "${checkedName}" cannot carry voltage or current; use addElectricalPort`);
        }

        return {
            name: checkedName,
            kind: checkedKind,
            fluid: fluidName,
            symbols: createNodeSymbols(checkedName),
            pins: {
                pressure: num(options.pressure, 'positive', 'pressure'),
                flowRate: num(options.flowRate, 'positive', 'flowRate'),
                viscosity: num(options.viscosity, 'positive', 'viscosity') ?? fluid.viscosity,
                density: num(options.density, 'positive', 'density') ?? fluid.density,
                x: num(options.x, 'non-negative', 'x'),
                y: num(options.y, 'non-negative', 'y'),
            },
            electrical: electrical
                ? { ...createElectricalSymbols(checkedName), pinnedVoltage: voltage, pinnedCurrent: current }
                : null,
            analytes: checkAnalytes(options.analytes, component, checkedName) ?? lookupAnalytes(fluid.analyteRef),
            junction: { ...DEFAULT_JUNCTION },
        };
    }

    private insertNode(node: CircuitNode): void {
        this.assertBuilding();
        const state = this.getState();
        if (findNode(state, node.name)) {
            throw new ValidationError(`Must provide a unique name; "${node.name}" already exists`);
        }
        const claims = nodeClaims(node.name, node.symbols, node.electrical ?? undefined);
        assertUnclaimed(state.symbols, claims);

        this.store.setState(
            produce((draft: SchematicState) => {
                draft.nodes[node.name] = node;
                draft.nodeOrder.push(node.name);
                registerClaims(draft.symbols, claims);
                draft.version++;
            }),
        );
    }
}

export function createSchematic(bounds: ChipBounds): Schematic {
    return new Schematic(bounds);
}
