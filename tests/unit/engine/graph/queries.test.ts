import { describe, it, expect } from 'vitest';
import {
    connectedChannels,
    createSchematic,
    findChannel,
    findNode,
    findPath,
    pathChannels,
    predecessors,
    reachableFrom,
    successors,
} from '../../../../src/engine/graph';

function branchingGraph() {
    const chip = createSchematic([0, 0, 1, 1]);
    for (const name of ['a', 'dead', 'b', 'c', 'lone']) chip.addNode(name);
    chip.addChannel('a', 'dead');
    chip.addChannel('a', 'b');
    chip.addChannel('b', 'c');
    return chip.getState();
}

describe('graph queries', () => {
    it('finds nodes and channels by name', () => {
        const state = branchingGraph();
        expect(findNode(state, 'b')?.kind).toBe('node');
        expect(findNode(state, 'constructor')).toBeNull();
        expect(findChannel(state, 'a', 'b')?.index).toBe(1);
        expect(findChannel(state, 'b', 'a')).toBeNull();
    });

    it('lists neighbours in insertion order', () => {
        const state = branchingGraph();
        expect(successors(state, 'a')).toEqual(['dead', 'b']);
        expect(predecessors(state, 'c')).toEqual(['b']);
        expect(connectedChannels(state, 'b').map((ch) => [ch.from, ch.to])).toEqual([
            ['a', 'b'],
            ['b', 'c'],
        ]);
    });

    it('collects reachable nodes', () => {
        const state = branchingGraph();
        expect([...reachableFrom(state, 'a')].sort()).toEqual(['a', 'b', 'c', 'dead']);
        expect([...reachableFrom(state, 'lone')]).toEqual(['lone']);
    });

    it('backtracks out of dead ends when searching for a path', () => {
        const state = branchingGraph();
        const path = findPath(state, 'a', 'c');
        expect(path).toEqual(['a', 'b', 'c']);
        expect(pathChannels(state, path ?? []).map((ch) => ch.index)).toEqual([1, 2]);
    });

    it('follows channel direction', () => {
        const state = branchingGraph();
        expect(findPath(state, 'c', 'a')).toBeNull();
        expect(findPath(state, 'a', 'a')).toEqual(['a']);
    });
});
