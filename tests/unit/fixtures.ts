import { formulaToSmt, type Constraint, type Expr } from '../../src/engine/expr';
import type { AnalyteSet } from '../../src/engine/fluids';
import { createSchematic, type Schematic } from '../../src/engine/graph';

/** in (pressure 100, water) -> out, one 1 m x 0.9 m channel. */
export function singleChannel(): Schematic {
    const chip = createSchematic([0, 0, 10, 10]);
    chip.addPort('in', 'input', { pressure: 100, fluid: 'water' });
    chip.addPort('out', 'output');
    chip.addChannel('in', 'out', { length: 1, width: 0.9 });
    return chip;
}

/** Oil (continuous) and water (dispersed) meeting at tj, droplets leave to drops. */
export function tJunction(criticalAngle?: number): Schematic {
    const chip = createSchematic([0, 0, 1, 1]);
    chip.addPort('oil', 'input', { pressure: 2000, fluid: 'mineraloil' });
    chip.addPort('water', 'input', { pressure: 2000, fluid: 'water' });
    chip.addNode('tj', { kind: 't-junction', criticalAngle });
    chip.addPort('drops', 'output');
    chip.addChannel('oil', 'tj', { phase: 'continuous' });
    chip.addChannel('water', 'tj', { phase: 'dispersed' });
    chip.addChannel('tj', 'drops', { phase: 'output' });
    return chip;
}

export interface EpCrossOptions {
    samplingInterval?: number;
    sampleFluid?: string;
    analytes?: AnalyteSet;
}

/**
 * Electrophoretic cross ep fed by a cathode (tail) and a sample port,
 * draining to waste and to the anode (separation).
 */
export function epCross(options: EpCrossOptions = {}): Schematic {
    const chip = createSchematic([0, 0, 1, 1]);
    chip.addElectricalPort('cathode', 'input', { voltage: 0, fluid: 'water' });
    chip.addPort('sample', 'input', {
        fluid: options.sampleFluid ?? 'buffered-sample',
        analytes: options.analytes,
    });
    chip.addNode('ep', { kind: 'ep-cross' });
    chip.addPort('waste', 'output');
    chip.addElectricalPort('anode', 'output', { voltage: 300 });
    chip.addChannel('cathode', 'ep', { phase: 'tail' });
    chip.addChannel('sample', 'ep');
    chip.addChannel('ep', 'waste');
    chip.addChannel('ep', 'anode', {
        phase: 'separation',
        samplingInterval: 'samplingInterval' in options ? options.samplingInterval : 0.5,
        detectorPosition: 0.02,
    });
    return chip;
}

/** Right-hand side of the first "name == ..." constraint. */
export function definitionOf(constraints: readonly Constraint[], name: string): Expr {
    for (const c of constraints) {
        if (c.kind === 'compare' && c.op === '==' && c.left.kind === 'var' && c.left.name === name) {
            return c.right;
        }
    }
    throw new Error(`No definition of ${name}`);
}

export function smtLines(constraints: readonly Constraint[]): string[] {
    return constraints.map(formulaToSmt);
}
