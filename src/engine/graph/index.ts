/**
 * Circuit Graph — Public API
 *
 * Re-exports models, the schematic store, the symbol registry and
 * read-only graph queries.
 */

// ─── Models ───
export type {
    NodeKind,
    PortKind,
    ChannelKind,
    ChannelPhase,
    NodeSymbols,
    NodePins,
    ElectricalAttributes,
    JunctionParameters,
    CircuitNode,
    ChannelSymbols,
    ChannelPins,
    Channel,
    ChannelRef,
    SymbolOwner,
    ChipBounds,
    SchematicState,
} from './models';
export { NODE_KINDS, PORT_KINDS, CHANNEL_KINDS, CHANNEL_PHASES, channelKey, channelLabel } from './models';

// ─── Store ───
export { Schematic, createSchematic, createInitialState, checkBounds, DEFAULT_JUNCTION } from './schematicStore';
export type { PortOptions, ElectricalPortOptions, NodeOptions, ChannelOptions } from './schematicStore';

// ─── Symbols ───
export {
    symbolName,
    nodeSymbolEntries,
    channelSymbolEntries,
    NODE_QUANTITIES,
    CHANNEL_QUANTITIES,
} from './symbols';

// ─── Queries ───
export {
    findNode,
    findChannel,
    outgoingChannels,
    incomingChannels,
    connectedChannels,
    successors,
    predecessors,
    nodesOfKind,
    reachableFrom,
    findPath,
    pathChannels,
} from './queries';
