/**
 * Translation context over one schematic snapshot.
 */

import { variable, type VariableExpr } from '../expr';
import { TopologyError } from '../errors';
import { findNode, symbolName, type CircuitNode, type SchematicState, type SymbolOwner } from '../graph';
import type { TranslationContext } from './types';

export function createTranslationContext(state: SchematicState): TranslationContext {
    const locals = new Map<string, SymbolOwner>();

    const describe = (owner: SymbolOwner) => `${owner.quantity} of ${owner.element} "${owner.owner}"`;

    return {
        state,

        node(name: string): CircuitNode {
            const node = findNode(state, name);
            if (!node) throw new TopologyError(`Node "${name}" is not defined`, name);
            return node;
        },

        local(junction: string, quantity: string): VariableExpr {
            const name = symbolName(junction, quantity);
            const owner: SymbolOwner = { element: 'junction', owner: junction, quantity };

            const existing = Object.hasOwn(state.symbols, name) ? state.symbols[name] : locals.get(name);
            if (existing) {
                if (existing.element === 'junction' && existing.owner === junction && existing.quantity === quantity) {
                    return variable(name);
                }
                throw new TopologyError(
                    `Unknown "${name}" for junction "${junction}" collides with ${describe(existing)}`,
                    junction,
                );
            }

            locals.set(name, owner);
            return variable(name);
        },
    };
}
