/**
 * Topology Validation — Main Runner
 *
 * Runs every rule against a schematic snapshot before translation.
 * Snapshots are immutable, so a repeated call with the same snapshot
 * returns the cached result.
 *
 * Usage:
 *   const validator = createValidator();
 *   const result = validator.validate(schematic.getState());
 */

import type { SchematicState } from '../graph';
import type { ValidationIssue, ValidationResult, ValidatorFn } from './types';
import { buildContext, resetIssueCounter } from './types';

import {
    checkMissingInput,
    checkUnreachableOutput,
    checkIsolatedNodes,
} from './rules';

// ─── Default Rule Registry ───

export const ALL_RULES: ValidatorFn[] = [
    checkMissingInput,
    checkUnreachableOutput,
    checkIsolatedNodes,
];

// ─── Validator Class ───

export class TopologyValidator {
    private rules: ValidatorFn[];
    private prevState: SchematicState | null = null;
    private prevResult: ValidationResult | null = null;

    constructor(rules: ValidatorFn[] = ALL_RULES) {
        this.rules = rules;
    }

    validate(state: SchematicState): ValidationResult {
        // Fast path: same frozen snapshot
        if (this.prevState === state && this.prevResult !== null) {
            return this.prevResult;
        }

        resetIssueCounter();
        const ctx = buildContext(state);
        const allIssues: ValidationIssue[] = [];

        for (const rule of this.rules) {
            allIssues.push(...rule(ctx));
        }

        const result: ValidationResult = {
            issues: allIssues,
            errors: allIssues.filter((i) => i.severity === 'error'),
            warnings: allIssues.filter((i) => i.severity === 'warning'),
            isValid: allIssues.every((i) => i.severity !== 'error'),
        };

        this.prevState = state;
        this.prevResult = result;

        return result;
    }

    /**
     * Run a single rule against a snapshot (for selective checks).
     */
    runRule(state: SchematicState, rule: ValidatorFn): ValidationIssue[] {
        return rule(buildContext(state));
    }

    reset(): void {
        this.prevState = null;
        this.prevResult = null;
        resetIssueCounter();
    }
}

// ─── Factory ───

export function createValidator(rules?: ValidatorFn[]): TopologyValidator {
    return new TopologyValidator(rules);
}

// ─── One-Shot Convenience ───

export function validateTopology(state: SchematicState): ValidationResult {
    return new TopologyValidator().validate(state);
}

// ─── Re-exports ───

export type {
    ValidationIssue,
    ValidationResult,
    ValidatorFn,
    ValidationContext,
    Severity,
} from './types';

export {
    checkMissingInput,
    checkUnreachableOutput,
    checkIsolatedNodes,
} from './rules';
