/**
 * Textual interval model, one unknown per line:
 *
 *   in_pressure : [100, 100]
 *   |a b_length| : [-inf, 0.25]
 */

import type { Interval, ResultModel } from '../engine/backend';
import { SolverError } from './errors';

const MODEL_LINE = /^\s*(\|[^|]*\||[^\s:]+)\s*:\s*\[\s*([^,\]]+?)\s*,\s*([^\]]+?)\s*\]\s*$/;

function parseBound(text: string, line: string): number {
    const lowered = text.toLowerCase();
    if (lowered === 'inf' || lowered === '+inf') return Number.POSITIVE_INFINITY;
    if (lowered === '-inf') return Number.NEGATIVE_INFINITY;

    const value = Number(text);
    if (Number.isNaN(value)) {
        throw new SolverError({
            status: 0,
            message: `Malformed bound "${text}" in solver model`,
            detail: line,
            code: 'E_BAD_MODEL',
        });
    }
    return value;
}

export function parseSolverModel(text: string): ResultModel {
    const model: ResultModel = {};

    for (const line of text.split(/\r?\n/)) {
        if (line.trim() === '') continue;

        const match = MODEL_LINE.exec(line);
        if (!match) {
            throw new SolverError({
                status: 0,
                message: 'Malformed line in solver model',
                detail: line,
                code: 'E_BAD_MODEL',
            });
        }

        const [, rawName, lower, upper] = match;
        const name = rawName.startsWith('|') ? rawName.slice(1, -1) : rawName;
        const interval: Interval = [parseBound(lower, line), parseBound(upper, line)];
        model[name] = interval;
    }

    return model;
}
