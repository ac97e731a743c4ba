import { describe, it, expect } from 'vitest';
import { formatReal, variablesOf } from '../../../../src/engine/expr';
import { createSchematic, type SchematicState } from '../../../../src/engine/graph';
import { Translator } from '../../../../src/engine/translation';
import { epCross, smtLines } from '../../fixtures';

describe('Electrophoretic cross', () => {
    const constraints = new Translator().translate(epCross().getState());
    const lines = smtLines(constraints);

    it('applies the field between cathode and anode along the separation path', () => {
        expect(lines).toContain('(= ep_E (/ (- anode_voltage cathode_voltage) (+ cathode_ep_length ep_anode_length)))');
        expect(lines).toContain('(= cathode_voltage 0.0)');
        expect(lines).toContain('(= anode_voltage 300.0)');
        expect(lines).toContain('(>= cathode_current 0.0)');
    });

    it('keeps the detector on the separation channel', () => {
        expect(lines).toContain('(= ep_anode_detector_position 0.02)');
        expect(lines).toContain('(<= ep_anode_detector_position ep_anode_length)');
    });

    it('shares cross-sections between opposite arms', () => {
        expect(lines).toContain('(= cathode_ep_width ep_anode_width)');
        expect(lines).toContain('(= sample_ep_width ep_waste_width)');
        expect(lines).toContain('(= sample_ep_height ep_anode_height)');
    });

    it('times each analyte peak at the detector', () => {
        expect(lines).toContain('(= ep_t_peak_0 (/ ep_anode_detector_position ep_v_0))');
        expect(lines).toContain('(= ep_v_3 (* ep_mu_3 ep_E))');
        expect(lines).toContain('(= ep_sigma0 (/ sample_ep_width 4.71))');
    });

    it('separates neighbouring peaks by the sampling interval', () => {
        expect(lines).toContain('(< (+ ep_t_peak_0 0.5) ep_t_min_0)');
        expect(lines).toContain('(< (+ ep_t_min_0 0.5) ep_t_peak_1)');
        expect(lines).toContain('(< (+ ep_t_min_2 0.5) ep_t_peak_3)');
    });

    it('places one valley between each pair of analytes', () => {
        const unknowns = variablesOf(...constraints);
        expect(unknowns).toContain('ep_t_min_2');
        expect(unknowns).not.toContain('ep_t_min_3');
        expect(lines.filter((l) => l.startsWith('(= (ite '))).toHaveLength(3);
    });

    it('adds the background of the remaining analytes to each valley', () => {
        const background = `(* ${formatReal(((4 - 2) * (1 - 0.9)) / (4 - 3))} ep_C_negligible)`;
        expect(lines.filter((l) => l.startsWith('(<= (/ ') && l.includes(background))).toHaveLength(6);
        expect(lines).toContain('(= ep_C_negligible (* 0.1 ep_C_floor))');
    });

    it('omits the background term for two analytes', () => {
        const pair = epCross({
            analytes: {
                diffusivities: [0.1, 0.1],
                initialConcentrations: [0.2, 0.2],
                charges: [-1, -2],
                radii: [0.05, 0.05],
            },
        });
        const pairLines = smtLines(new Translator().translate(pair.getState()));

        expect(pairLines.filter((l) => l.startsWith('(<= (/ '))).toHaveLength(2);
        expect(pairLines.filter((l) => l.startsWith('(<= (/ ') && l.includes('ep_C_negligible'))).toEqual([]);
    });
});

describe('Electrophoretic cross topology errors', () => {
    const translate = (state: SchematicState) =>
        () => new Translator().translate(state);

    it('needs a sampling interval on the separation channel', () => {
        expect(translate(epCross({ samplingInterval: undefined }).getState())).toThrow(
            'Separation channel of "ep" has no samplingInterval',
        );
    });

    it('needs analytes at the injection port', () => {
        expect(translate(epCross({ sampleFluid: 'water' }).getState())).toThrow(
            'No analytes defined at injection port "sample" of "ep"',
        );
    });

    it('needs analyte arrays of equal length', () => {
        const chip = epCross({
            analytes: {
                diffusivities: [0.1, 0.1],
                initialConcentrations: [0.2, 0.2],
                charges: [-1],
                radii: [0.05, 0.05],
            },
        });
        expect(translate(chip.getState())).toThrow('Expecting 2 values, found 1 for charges at "sample"');
    });

    it('needs four connections', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addElectricalPort('cathode', 'input', { voltage: 0 });
        chip.addPort('sample', 'input', { fluid: 'buffered-sample' });
        chip.addNode('ep', { kind: 'ep-cross' });
        chip.addElectricalPort('anode', 'output', { voltage: 300 });
        chip.addChannel('cathode', 'ep', { phase: 'tail' });
        chip.addChannel('sample', 'ep');
        chip.addChannel('ep', 'anode', { phase: 'separation', samplingInterval: 0.5 });

        expect(translate(chip.getState())).toThrow('Electrophoretic cross "ep" must have 4 connections, found 3');
    });

    it('needs one injection from an input port', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addElectricalPort('cathode', 'input', { voltage: 0 });
        chip.addPort('sample', 'input', { fluid: 'buffered-sample' });
        chip.addNode('relay');
        chip.addNode('ep', { kind: 'ep-cross' });
        chip.addPort('waste', 'output');
        chip.addElectricalPort('anode', 'output', { voltage: 300 });
        chip.addChannel('cathode', 'ep', { phase: 'tail' });
        chip.addChannel('sample', 'relay');
        chip.addChannel('relay', 'ep');
        chip.addChannel('ep', 'waste');
        chip.addChannel('ep', 'anode', { phase: 'separation', samplingInterval: 0.5 });

        expect(translate(chip.getState())).toThrow(
            'Electrophoretic cross "ep" needs exactly one injection (from an input port) channel, found 0',
        );
    });
});
