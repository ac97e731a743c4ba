import { describe, it, expect, vi } from 'vitest';
import { createSchematic, type NodeOptions, type PortOptions } from '../../../../src/engine/graph';
import { UnknownFluidError, ValidationError } from '../../../../src/engine/errors';
import { singleChannel } from '../../fixtures';

describe('Schematic', () => {
    it('validates the chip bounds', () => {
        expect(() => createSchematic([0, 0, -1, 10])).toThrow('Chip bounds [0, 0, -1, 10] are inverted');
        expect(createSchematic([0, 0, 10, 10]).getState().bounds).toEqual([0, 0, 10, 10]);
    });

    it('seeds port pins from the fluid', () => {
        const chip = singleChannel();
        const port = chip.getState().nodes.in;

        expect(port.kind).toBe('input');
        expect(port.fluid).toBe('water');
        expect(port.pins).toEqual({
            pressure: 100,
            flowRate: null,
            viscosity: 0.001,
            density: 999.87,
            x: null,
            y: null,
        });
        expect(port.symbols.flowRate).toEqual({ kind: 'var', name: 'in_flow_rate' });
    });

    it('lets explicit values override fluid defaults', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addPort('in', 'input', { fluid: 'water', viscosity: 0.00089 });
        expect(chip.getState().nodes.in.pins.viscosity).toBe(0.00089);
    });

    it('treats a pinned zero coordinate as pinned', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addNode('n', { x: 0, y: 0 });
        expect(chip.getState().nodes.n.pins.x).toBe(0);
    });

    it('rejects duplicate names', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addPort('in', 'input');
        expect(() => chip.addPort('in', 'output')).toThrow(ValidationError);
        expect(() => chip.addNode('in')).toThrow('Must provide a unique name; "in" already exists');
    });

    it('rejects unknown fluids', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        expect(() => chip.addPort('in', 'input', { fluid: 'mercury' })).toThrow(UnknownFluidError);
    });

    it('rejects malformed arguments from untyped callers', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        const badKind: NodeOptions = JSON.parse('{"kind": "blob"}');
        const badPressure: PortOptions = JSON.parse('{"pressure": "high"}');

        expect(() => chip.addNode('n', badKind)).toThrow(
            'Node "n" kind must be one of: input, output, node, t-junction, ep-cross',
        );
        expect(() => chip.addPort('p', 'input', badPressure)).toThrow(
            'Port "p" parameter "pressure" must be a finite number',
        );
        expect(() => chip.addPort('a|b', 'input')).toThrow('Port name "a|b" must not contain "|" or "\\"');

        const badFluid: PortOptions = JSON.parse('{"fluid": 42}');
        expect(() => chip.addPort('q', 'input', badFluid)).toThrow(
            'Port "q" parameter "fluid" must be a string',
        );
    });

    it('requires positive analyte properties but lets charges take either sign', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        const analytes = {
            diffusivities: [0.1, 0.1],
            initialConcentrations: [0.2, 0],
            charges: [-1, -2],
            radii: [0.05, 0.05],
        };

        expect(() => chip.addPort('s', 'input', { analytes })).toThrow(
            'Port "s" analytes.initialConcentrations must all be > 0',
        );
        expect(() => chip.addPort('r', 'input', { analytes: { ...analytes, radii: [0.05, -0.05] } })).toThrow(
            'Port "r" analytes.radii must all be > 0',
        );

        chip.addPort('t', 'input', { analytes: { ...analytes, initialConcentrations: [0.2, 0.3] } });
        expect(chip.getState().nodes.t.analytes?.charges).toEqual([-1, -2]);
    });

    it('accepts kinds case-insensitively', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        const options: NodeOptions = JSON.parse('{"kind": "T-Junction"}');
        chip.addNode('tj', options);
        expect(chip.getState().nodes.tj.kind).toBe('t-junction');
    });

    it('keeps ports out of addNode and junction options on their own kind', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        expect(() => chip.addNode('p', { kind: 'input' })).toThrow('Node "p" cannot be of kind input; use addPort');
        expect(() => chip.addNode('n', { criticalAngle: 1 })).toThrow(
            'Node "n" parameter "criticalAngle" only applies to t-junction nodes',
        );
        chip.addNode('ep', { kind: 'ep-cross', peakRatio: 0.3 });
        expect(chip.getState().nodes.ep.junction).toEqual({
            criticalAngle: 0.5,
            peakRatio: 0.3,
            peakHeight: 0.1,
            qualityFactor: 0.9,
        });
    });

    it('keeps voltage and current on electrical ports', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        const withVoltage: PortOptions = JSON.parse('{"voltage": 5}');
        expect(() => chip.addPort('p', 'input', withVoltage)).toThrow(
            'Port "p" cannot carry voltage or current; use addElectricalPort',
        );

        chip.addElectricalPort('anode', 'output', { voltage: 300 });
        const { electrical } = chip.getState().nodes.anode;
        expect(electrical?.pinnedVoltage).toBe(300);
        expect(electrical?.pinnedCurrent).toBeNull();
        expect(chip.attribute('anode', 'voltage')).toEqual({ kind: 'var', name: 'anode_voltage' });
    });

    it('validates channel endpoints', () => {
        const chip = singleChannel();
        expect(() => chip.addChannel('a', 'out')).toThrow('Channel a->out references undefined node "a"');
        expect(() => chip.addChannel('in', 'in')).toThrow('Channel in->in cannot start and end at the same node');
        expect(() => chip.addChannel('in', 'out')).toThrow('Channel already exists between "in" and "out"');
        expect(() => chip.addChannel('out', 'in', { width: -1 })).toThrow(
            'Channel "out->in" parameter "width" must be > 0',
        );
    });

    it('keeps detector parameters on separation channels', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addNode('a');
        chip.addNode('b');
        expect(() => chip.addChannel('a', 'b', { samplingInterval: 1 })).toThrow(
            'Channel a->b detector parameters only apply to separation channels',
        );
        expect(() => chip.addChannel('a', 'b', { phase: 'separation', detectorPosition: 0 })).toThrow(
            'Channel "a->b" parameter "detectorPosition" must be > 0',
        );
    });

    it('claims every unknown name once', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        chip.addNode('a_b');
        chip.addNode('a');
        chip.addNode('b');
        expect(() => chip.addChannel('a', 'b')).toThrow(
            'Unknown "a_b_flow_rate" for channel "a->b" collides with flow_rate of node "a_b"',
        );
        expect(chip.getState().symbols.a_b_x).toEqual({ element: 'node', owner: 'a_b', quantity: 'x' });
    });

    it('resolves attributes of nodes and channels', () => {
        const chip = singleChannel();
        expect(chip.attribute('in', 'pressure')).toEqual({ kind: 'var', name: 'in_pressure' });
        expect(chip.attribute(['in', 'out'], 'resistance')).toEqual({ kind: 'var', name: 'in_out_resistance' });
        expect(() => chip.attribute('in', 'voltage')).toThrow('Node "in" has no attribute "voltage"');
        expect(() => chip.attribute(['out', 'in'], 'length')).toThrow('Channel out->in is not defined');
    });

    it('publishes frozen snapshots and counts versions', () => {
        const chip = createSchematic([0, 0, 1, 1]);
        const listener = vi.fn();
        chip.subscribe(listener);

        chip.addNode('a');
        chip.addNode('b');

        const state = chip.getState();
        expect(state.version).toBe(2);
        expect(state.nodeOrder).toEqual(['a', 'b']);
        expect(Object.isFrozen(state.nodes.a)).toBe(true);
        expect(listener).toHaveBeenCalledTimes(2);
    });

    it('becomes read-only once constraints are committed', () => {
        const chip = singleChannel();
        chip.commitConstraints([]);
        expect(chip.getState().translated).toBe(true);
        expect(() => chip.addNode('late')).toThrow('Schematic is read-only once it has been translated');
    });
});
