import { describe, it, expect } from 'vitest';
import { createSchematic } from '../../../../src/engine/graph';
import { checkIsolatedNodes, createValidator, validateTopology } from '../../../../src/engine/validation';
import { singleChannel } from '../../fixtures';

describe('TopologyValidator', () => {
    it('accepts a connected schematic', () => {
        const result = validateTopology(singleChannel().getState());
        expect(result.isValid).toBe(true);
        expect(result.issues).toEqual([]);
    });

    it('reports a schematic without inputs', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addPort('out', 'output');

        const result = validateTopology(chip.getState());
        expect(result.isValid).toBe(false);
        expect(result.errors[0]).toMatchObject({
            id: 'NOIN_1',
            type: 'missing_input',
            message: 'Schematic has no input',
        });
    });

    it('reports an input with no output anywhere', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addPort('in', 'input');
        chip.addNode('mid');
        chip.addChannel('in', 'mid');

        const [error] = validateTopology(chip.getState()).errors;
        expect(error.type).toBe('unreachable_output');
        expect(error.message).toBe('Schematic input in has no output');
        expect(error.affectedNodes).toEqual(['in']);
    });

    it('reports an input that cannot reach the output', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addPort('in', 'input');
        chip.addNode('mid');
        chip.addPort('out', 'output');
        chip.addChannel('in', 'mid');
        chip.addChannel('out', 'mid');

        const [error] = validateTopology(chip.getState()).errors;
        expect(error.message).toBe('No output is reachable from input in');
    });

    it('warns about isolated nodes without failing', () => {
        const chip = singleChannel();
        chip.addNode('lonely');

        const result = validateTopology(chip.getState());
        expect(result.isValid).toBe(true);
        expect(result.warnings).toHaveLength(1);
        expect(result.warnings[0]).toMatchObject({
            id: 'ISO_1',
            severity: 'warning',
            message: 'Node lonely is not connected to any channel',
            affectedNodes: ['lonely'],
        });
    });

    it('returns the cached result for the same snapshot', () => {
        const chip = singleChannel();
        const validator = createValidator();
        const first = validator.validate(chip.getState());

        expect(validator.validate(chip.getState())).toBe(first);

        chip.addNode('extra');
        expect(validator.validate(chip.getState())).not.toBe(first);
    });

    it('runs a single rule on demand', () => {
        const chip = singleChannel();
        chip.addNode('a');
        chip.addNode('b');

        const issues = createValidator([]).runRule(chip.getState(), checkIsolatedNodes);
        expect(issues.map((i) => i.affectedNodes[0])).toEqual(['a', 'b']);
    });
});
