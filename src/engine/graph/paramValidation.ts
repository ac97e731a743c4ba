/**
 * Builder Argument Validation
 *
 * Builder calls may come from untyped callers (JSON, scripts), so
 * every argument is checked at runtime before anything is created.
 */

import { ValidationError } from '../errors';
import type { AnalyteSet } from '../fluids';

export type NumberRule = 'any' | 'non-negative' | 'positive';

const UNQUOTABLE = /[|\\]/;

export function checkName(value: unknown, component: string): string {
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ValidationError(`${component} name must be a non-empty string`);
    }
    if (UNQUOTABLE.test(value)) {
        throw new ValidationError(`${component} name "${value}" must not contain "|" or "\\"`);
    }
    return value;
}

/** Returns null for an omitted value. */
export function checkNumber(
    value: unknown,
    rule: NumberRule,
    component: string,
    name: string,
    param: string,
): number | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ValidationError(`${component} "${name}" parameter "${param}" must be a finite number`);
    }
    if (rule === 'non-negative' && value < 0) {
        throw new ValidationError(`${component} "${name}" parameter "${param}" must be >= 0`);
    }
    if (rule === 'positive' && value <= 0) {
        throw new ValidationError(`${component} "${name}" parameter "${param}" must be > 0`);
    }
    return value;
}

/** Case-insensitive match against a closed set of choices. */
export function checkChoice<T extends string>(
    value: unknown,
    choices: readonly T[],
    component: string,
    name: string,
    param: string,
): T {
    const normalized = typeof value === 'string' ? value.toLowerCase() : null;
    const match = choices.find((choice) => choice === normalized);
    if (match === undefined) {
        throw new ValidationError(
            `${component} "${name}" ${param} must be one of: ${choices.join(', ')}`,
        );
    }
    return match;
}

/** An omitted fluid falls back to the registry's default entry. */
export function checkFluidName(value: unknown, component: string, name: string): string {
    if (value === undefined || value === null) return 'default';
    if (typeof value !== 'string') {
        throw new ValidationError(`${component} "${name}" parameter "fluid" must be a string`);
    }
    return value;
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((n) => typeof n === 'number' && Number.isFinite(n));
}

/**
 * Element types and signs; equal lengths are a topology concern
 * checked when an electrophoretic cross consumes the set. Charges may
 * take either sign, every other column must be > 0.
 */
export function checkAnalytes(value: unknown, component: string, name: string): AnalyteSet | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== 'object') {
        throw new ValidationError(`${component} "${name}" analytes must be an object of number arrays`);
    }
    const source: object = value;
    const read = (field: keyof AnalyteSet, rule: NumberRule): number[] => {
        const arr: unknown = Object.getOwnPropertyDescriptor(source, field)?.value;
        if (!isNumberArray(arr)) {
            throw new ValidationError(`${component} "${name}" analytes.${field} must be an array of finite numbers`);
        }
        if (rule === 'positive' && arr.some((n) => n <= 0)) {
            throw new ValidationError(`${component} "${name}" analytes.${field} must all be > 0`);
        }
        return [...arr];
    };
    return {
        diffusivities: read('diffusivities', 'positive'),
        initialConcentrations: read('initialConcentrations', 'positive'),
        charges: read('charges', 'any'),
        radii: read('radii', 'positive'),
    };
}
