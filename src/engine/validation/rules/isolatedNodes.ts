/**
 * Rule 3 — Isolated Nodes
 *
 * A node without channels only receives chip-bounds constraints.
 */

import type { ValidationContext, ValidationIssue } from '../types';
import { makeIssueId } from '../types';

export function checkIsolatedNodes(
    ctx: ValidationContext,
): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const name of ctx.state.nodeOrder) {
        if ((ctx.degree.get(name) ?? 0) > 0) continue;
        issues.push({
            id: makeIssueId('ISO'),
            type: 'isolated_node',
            severity: 'warning',
            message: `Node ${name} is not connected to any channel`,
            affectedNodes: [name],
            suggestion: `Connect ${name} or remove it`,
        });
    }

    return issues;
}
