/**
 * Rule 2 — Unreachable Output
 *
 * Every input must drain into at least one output port along
 * directed channels.
 */

import { reachableFrom } from '../../graph';
import type { ValidationContext, ValidationIssue } from '../types';
import { makeIssueId } from '../types';

export function checkUnreachableOutput(
    ctx: ValidationContext,
): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const outputNames = new Set(ctx.outputs.map((n) => n.name));

    for (const input of ctx.inputs) {
        const reachable = reachableFrom(ctx.state, input.name);
        const drains = [...reachable].some((name) => outputNames.has(name));
        if (drains) continue;

        issues.push({
            id: makeIssueId('NOOUT'),
            type: 'unreachable_output',
            severity: 'error',
            message: outputNames.size === 0
                ? `Schematic input ${input.name} has no output`
                : `No output is reachable from input ${input.name}`,
            affectedNodes: [input.name],
            suggestion: 'Connect the input to an output port through channels',
        });
    }

    return issues;
}
