/**
 * Zustand store — the graph builder the structure walker writes into.
 *
 * One store is created per render and owned by the pipeline; the walker
 * only sees its `GraphBuilder` actions. Insertion is idempotent: a node id
 * keeps its first position, and a repeated edge is stored once; both
 * checks read the store state itself.
 */
import { createStore } from 'zustand/vanilla';
import type {
    GraphBuilder,
    GraphEdge,
    GraphNode,
    MindmapGraph,
    NodeAttributes,
} from '../types/mindmap';

export interface MindmapGraphState {
    /** All nodes, keyed by ID. */
    nodes: Record<string, GraphNode>;
    /** Node IDs in first-insertion order. */
    nodeOrder: string[];
    /** Edges in insertion order, without repeats. */
    edges: GraphEdge[];
}

export interface MindmapGraphActions extends GraphBuilder {
    /** Ordered snapshot for serialization. */
    getGraph: () => MindmapGraph;
}

export type MindmapGraphStore = MindmapGraphState & MindmapGraphActions;

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

function sameNode(node: GraphNode, label: string, attributes: NodeAttributes): boolean {
    return (
        node.label === label &&
        node.fillColor === attributes.fillColor &&
        node.shape === attributes.shape
    );
}

/* ------------------------------------------------------------------ */
/*  Store definition                                                  */
/* ------------------------------------------------------------------ */

export function createMindmapGraphStore() {
    return createStore<MindmapGraphStore>()((set, get) => {
        return {
            // --- Initial state ---
            nodes: {},
            nodeOrder: [],
            edges: [],

            // --- Actions ---

            addNode(id, label, attributes) {
                set((state) => {
                    const existing = state.nodes[id];
                    if (existing && sameNode(existing, label, attributes)) return state;

                    const node: GraphNode = { id, label, style: 'filled', ...attributes };
                    return {
                        nodes: { ...state.nodes, [id]: node },
                        // Re-declaring a node updates it in place, as DOT does.
                        nodeOrder: existing ? state.nodeOrder : [...state.nodeOrder, id],
                    };
                });
            },

            addEdge(fromId, toId) {
                set((state) => {
                    const exists = state.edges.some(
                        (edge) => edge.fromId === fromId && edge.toId === toId,
                    );
                    if (exists) return state;
                    return { edges: [...state.edges, { fromId, toId }] };
                });
            },

            getGraph() {
                const { nodes, nodeOrder, edges } = get();
                return {
                    nodes: nodeOrder.map((id) => nodes[id]),
                    edges: [...edges],
                };
            },
        };
    });
}
