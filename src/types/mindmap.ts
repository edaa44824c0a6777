/**
 * Core types for the mindmap renderer.
 *
 * Design: the parsed document tree is the source of truth.
 * The graph (nodes + edges) is derived from it once, then handed
 * to the rendering engine. Nothing flows back into the document.
 */

/* ------------------------------------------------------------------ */
/*  Document model                                                    */
/* ------------------------------------------------------------------ */

/**
 * A terminal value: a leaf of the mindmap.
 * Integers are `bigint`; `number` always means a float.
 */
export interface ScalarValue {
    kind: 'scalar';
    value: string | number | bigint | boolean;
}

/** One key of a mapping. `value` is null for keys with no children. */
export interface MappingEntry {
    key: string;
    value: DocumentValue | null;
}

/** Ordered key/value pairs. Every key becomes a node. */
export interface MappingValue {
    kind: 'mapping';
    entries: MappingEntry[];
}

/** Ordered items. A sequence never introduces a node level of its own. */
export interface SequenceValue {
    kind: 'sequence';
    items: DocumentValue[];
}

export type DocumentValue = MappingValue | SequenceValue | ScalarValue;

/* ------------------------------------------------------------------ */
/*  Graph model                                                       */
/* ------------------------------------------------------------------ */

/** Only the root is boxed; unset means the engine default. */
export type NodeShape = 'box';

export interface NodeAttributes {
    fillColor: string;
    shape?: NodeShape;
}

/** A single node of the rendered graph. */
export interface GraphNode extends NodeAttributes {
    id: string;
    label: string;
    style: 'filled';
}

/** Directed parent → child edge. */
export interface GraphEdge {
    fromId: string;
    toId: string;
}

/** Ordered snapshot of a built graph, ready for serialization. */
export interface MindmapGraph {
    nodes: GraphNode[];
    edges: GraphEdge[];
}

/**
 * The narrow surface the structure walker writes through.
 * The graph store satisfies it; so can any test double.
 */
export interface GraphBuilder {
    addNode: (id: string, label: string, attributes: NodeAttributes) => void;
    addEdge: (fromId: string, toId: string) => void;
}

/** Output encodings requested from the rendering engine. */
export type OutputFormat = 'png' | 'svg';
