/**
 * Translation Engine — Core Types
 *
 * Handlers are pure: they read the frozen schematic snapshot and
 * return the constraints for one element plus the elements the
 * traversal should visit next.
 */

import type { Constraint, VariableExpr } from '../expr';
import type { Channel, ChannelKind, CircuitNode, NodeKind, SchematicState } from '../graph';

// ─── Traversal ───

export type TraversalStep =
    | { kind: 'node'; name: string }
    | { kind: 'channel'; index: number };

export interface HandlerResult {
    constraints: Constraint[];
    next: TraversalStep[];
}

// ─── Context ───

export interface TranslationContext {
    state: SchematicState;
    /** Node by name; a dangling reference is a TopologyError */
    node(name: string): CircuitNode;
    /**
     * Unknown local to a junction, named "<junction>_<quantity>".
     * A name already owned by an element or another junction is a
     * TopologyError.
     */
    local(junction: string, quantity: string): VariableExpr;
}

// ─── Handlers ───

export interface NodeHandler {
    kind: NodeKind;
    translate(ctx: TranslationContext, node: CircuitNode): HandlerResult;
}

export interface ChannelHandler {
    kind: ChannelKind;
    translate(ctx: TranslationContext, channel: Channel): HandlerResult;
}
