/**
 * Graph assembly: root node, one palette color per top-level branch,
 * then the structure walker for everything below.
 */
import { SchemaError } from '../errors';
import type { MindmapConfig } from '../config/mindmapConfig';
import { createMindmapGraphStore } from '../store/mindmapStore';
import type { DocumentValue, MindmapGraph } from '../types/mindmap';
import { addNodes, childNodeId } from './walker';

export type AssemblyOptions = Pick<MindmapConfig, 'root' | 'palette' | 'childLightenFactor'>;

/**
 * Build the full mindmap graph for a parsed document.
 *
 * The document's top level must be a mapping; anything else (including an
 * empty document) is a `SchemaError` raised before any branch is added.
 */
export function buildMindmapGraph(
    document: DocumentValue | null,
    options: AssemblyOptions,
): MindmapGraph {
    if (!document || document.kind !== 'mapping') {
        const found = document ? `a ${document.kind}` : 'an empty document';
        throw new SchemaError(`Top-level mindmap document must be a mapping, found ${found}`);
    }

    const { root, palette, childLightenFactor } = options;
    const store = createMindmapGraphStore();
    const graph = store.getState();

    graph.addNode(root.id, root.label, { fillColor: root.fillColor, shape: 'box' });

    document.entries.forEach((entry, index) => {
        const color = palette[index % palette.length];
        const nodeId = childNodeId(root.id, entry.key);

        graph.addNode(nodeId, entry.key, { fillColor: color });
        graph.addEdge(root.id, nodeId);

        if (entry.value) {
            addNodes(graph, nodeId, entry.value, color, childLightenFactor);
        }
    });

    return store.getState().getGraph();
}
