/**
 * Topology Validation — Core Types
 *
 * Pure TypeScript. Rules read a frozen schematic snapshot.
 */

import type { CircuitNode, SchematicState } from '../graph';
import { connectedChannels, nodesOfKind } from '../graph';

// ─── Validation Issue ───

export type Severity = 'error' | 'warning';

export interface ValidationIssue {
    id: string;
    type: string;
    severity: Severity;
    message: string;
    affectedNodes: string[];
    suggestion?: string;
}

// ─── Validator Function Signature ───

export type ValidatorFn = (
    ctx: ValidationContext,
) => ValidationIssue[];

// ─── Validation Context ───

/**
 * Read-only context passed to every rule.
 * Pre-computed lookups avoid redundant computation across rules.
 */
export interface ValidationContext {
    state: SchematicState;
    inputs: CircuitNode[];
    outputs: CircuitNode[];
    /** Number of channels touching each node */
    degree: Map<string, number>;
}

// ─── Validation Result ───

export interface ValidationResult {
    issues: ValidationIssue[];
    errors: ValidationIssue[];
    warnings: ValidationIssue[];
    isValid: boolean;
}

// ─── Helpers ───

export function buildContext(state: SchematicState): ValidationContext {
    const degree = new Map<string, number>();
    for (const name of state.nodeOrder) {
        degree.set(name, connectedChannels(state, name).length);
    }

    return {
        state,
        inputs: nodesOfKind(state, 'input'),
        outputs: nodesOfKind(state, 'output'),
        degree,
    };
}

let issueCounter = 0;

export function makeIssueId(prefix: string): string {
    return `${prefix}_${++issueCounter}`;
}

export function resetIssueCounter(): void {
    issueCounter = 0;
}
