import assert from 'node:assert/strict';
import test from 'node:test';
import { createMindmapGraphStore } from '../src/store/mindmapStore.ts';

test('addNode records nodes in first-insertion order', () => {
    const store = createMindmapGraphStore();
    const graph = store.getState();

    graph.addNode('root', 'Root', { fillColor: '#f0f8ff', shape: 'box' });
    graph.addNode('root_A', 'A', { fillColor: '#ff6b6b' });

    assert.deepEqual(store.getState().getGraph().nodes, [
        { id: 'root', label: 'Root', style: 'filled', fillColor: '#f0f8ff', shape: 'box' },
        { id: 'root_A', label: 'A', style: 'filled', fillColor: '#ff6b6b' },
    ]);
});

test('addNode is a no-op for an identical node', () => {
    const store = createMindmapGraphStore();
    store.getState().addNode('a', 'A', { fillColor: '#ff6b6b' });
    const before = store.getState().nodes;

    store.getState().addNode('a', 'A', { fillColor: '#ff6b6b' });

    assert.equal(store.getState().nodes, before);
    assert.deepEqual(store.getState().nodeOrder, ['a']);
});

test('re-adding a node id updates it in place', () => {
    const store = createMindmapGraphStore();
    const graph = store.getState();
    graph.addNode('a', 'A', { fillColor: '#ff6b6b' });
    graph.addNode('b', 'B', { fillColor: '#ff6b6b' });

    graph.addNode('a', 'A', { fillColor: '#ff9e9e' });

    assert.deepEqual(store.getState().nodeOrder, ['a', 'b']);
    assert.equal(store.getState().nodes.a.fillColor, '#ff9e9e');
});

test('addEdge stores a repeated edge once', () => {
    const store = createMindmapGraphStore();
    const graph = store.getState();

    graph.addEdge('root', 'root_A');
    graph.addEdge('root', 'root_A');
    graph.addEdge('root_A', 'root_A_x');

    assert.deepEqual(store.getState().edges, [
        { fromId: 'root', toId: 'root_A' },
        { fromId: 'root_A', toId: 'root_A_x' },
    ]);
});

test('addEdge checks repeats against the edges currently in state', () => {
    const store = createMindmapGraphStore();
    store.getState().addEdge('a', 'b');

    store.setState({ edges: [] });
    store.getState().addEdge('a', 'b');
    store.getState().addEdge('a', 'b');

    assert.deepEqual(store.getState().getGraph(), {
        nodes: [],
        edges: [{ fromId: 'a', toId: 'b' }],
    });
});
