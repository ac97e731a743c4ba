/**
 * Rule 1 — Missing Input
 *
 * Traversal starts at input ports; without one nothing is translated.
 */

import type { ValidationContext, ValidationIssue } from '../types';
import { makeIssueId } from '../types';

export function checkMissingInput(
    ctx: ValidationContext,
): ValidationIssue[] {
    if (ctx.inputs.length > 0) return [];

    return [{
        id: makeIssueId('NOIN'),
        type: 'missing_input',
        severity: 'error',
        message: 'Schematic has no input',
        affectedNodes: [],
        suggestion: 'Add a port of kind "input" where fluid enters the chip',
    }];
}
