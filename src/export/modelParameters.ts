/**
 * Physical-modelling parameter export.
 *
 * A mapping text names, per line, a solved unknown and the model
 * parameter it feeds ("in_out_width : channel.width"). Each mapped
 * unknown contributes the midpoint of its interval.
 */

import { isBounded, midpoint, type ResultModel } from '../engine/backend';
import { ValidationError } from '../engine/errors';

/** unknown name -> model parameter name */
export type ParameterMapping = Record<string, string>;

export function parseParameterMapping(text: string): ParameterMapping {
    const mapping: ParameterMapping = {};

    text.split(/\r?\n/).forEach((raw, idx) => {
        const line = raw.replace(/\s+/g, '');
        if (line === '') return;

        const [unknown, parameter, ...rest] = line.split(':');
        if (!unknown || !parameter || rest.length > 0) {
            throw new ValidationError(`Mapping line ${idx + 1} must read "unknown : parameter", got "${raw.trim()}"`);
        }
        mapping[unknown] = parameter;
    });

    return mapping;
}

/** Parameter values in the order the model lists its unknowns. */
export function mapModelParameters(model: ResultModel, mapping: ParameterMapping): Map<string, number> {
    const values = new Map<string, number>();

    for (const [unknown, interval] of Object.entries(model)) {
        if (!Object.hasOwn(mapping, unknown)) continue;
        if (!isBounded(interval)) {
            console.warn(`[Export] ${unknown} range is unbounded; ${mapping[unknown]} left out`);
            continue;
        }
        values.set(mapping[unknown], midpoint(interval));
    }

    return values;
}

export function renderModelParameters(values: ReadonlyMap<string, number>): string {
    return [...values].map(([parameter, value]) => `${parameter} = ${value}\n`).join('');
}
