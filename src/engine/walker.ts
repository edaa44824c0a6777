/**
 * Structure walker: projects a document subtree into graph nodes and edges.
 *
 * Color steps one lighten factor per mapping level. Sequences are
 * transparent: their container items are walked under the same parent and
 * color, and their scalar items hang directly off that parent.
 */
import { lighten } from './color';
import { formatScalarValue } from './scalar';
import type { DocumentValue, GraphBuilder, ScalarValue } from '../types/mindmap';

/** How far each level below a top-level branch moves toward white. */
export const CHILD_LIGHTEN_FACTOR = 0.35;

/** Spaces become underscores; nothing else is touched. */
export function sanitizeNodeId(id: string): string {
    return id.replaceAll(' ', '_');
}

export function childNodeId(parentId: string, segment: string): string {
    return sanitizeNodeId(`${parentId}_${segment}`);
}

export function formatScalar(scalar: ScalarValue): string {
    return formatScalarValue(scalar.value);
}

function addLeaf(
    graph: GraphBuilder,
    parentId: string,
    scalar: ScalarValue,
    color: string,
): void {
    const label = formatScalar(scalar);
    const nodeId = childNodeId(parentId, label);
    graph.addNode(nodeId, label, { fillColor: color });
    graph.addEdge(parentId, nodeId);
}

/**
 * Recursively add `value` beneath `parentId`.
 *
 * The parent node itself must already exist; only descendants are added.
 */
export function addNodes(
    graph: GraphBuilder,
    parentId: string,
    value: DocumentValue,
    parentColor: string,
    lightenFactor = CHILD_LIGHTEN_FACTOR,
): void {
    const childColor = lighten(parentColor, lightenFactor);

    switch (value.kind) {
        case 'mapping':
            for (const entry of value.entries) {
                const nodeId = childNodeId(parentId, entry.key);
                graph.addNode(nodeId, entry.key, { fillColor: childColor });
                graph.addEdge(parentId, nodeId);
                if (entry.value) {
                    addNodes(graph, nodeId, entry.value, childColor, lightenFactor);
                }
            }
            return;

        case 'sequence':
            for (const item of value.items) {
                if (item.kind === 'scalar') {
                    addLeaf(graph, parentId, item, childColor);
                } else {
                    addNodes(graph, parentId, item, parentColor, lightenFactor);
                }
            }
            return;

        case 'scalar':
            addLeaf(graph, parentId, value, childColor);
            return;
    }
}
