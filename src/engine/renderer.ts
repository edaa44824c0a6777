/**
 * Renderer: converts the built graph into DOT source for Graphviz.
 *
 * Output is deterministic: graph attributes in the order given, then every
 * node in insertion order, then every edge in insertion order.
 */
import type { GraphEdge, GraphNode, MindmapGraph } from '../types/mindmap';

export interface DotOptions {
    graphName: string;
    graphAttributes: Record<string, string>;
}

/* ------------------------------------------------------------------ */
/*  Identifier quoting                                                */
/* ------------------------------------------------------------------ */

const DOT_KEYWORDS = new Set(['node', 'edge', 'graph', 'digraph', 'subgraph', 'strict']);
const BARE_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NUMERAL_PATTERN = /^-?(\.[0-9]+|[0-9]+(\.[0-9]*)?)$/;

/** Emit `value` as a DOT ID, quoting only when it cannot stand bare. */
export function quoteDotId(value: string): string {
    if (BARE_ID_PATTERN.test(value) && !DOT_KEYWORDS.has(value.toLowerCase())) {
        return value;
    }
    if (NUMERAL_PATTERN.test(value)) {
        return value;
    }
    const escaped = value
        .replaceAll('\\', '\\\\')
        .replaceAll('"', '\\"')
        .replaceAll('\n', '\\n');
    return `"${escaped}"`;
}

function formatAttributes(attributes: ReadonlyArray<readonly [string, string]>): string {
    return attributes.map(([key, value]) => `${key}=${quoteDotId(value)}`).join(' ');
}

/* ------------------------------------------------------------------ */
/*  Statement factories                                               */
/* ------------------------------------------------------------------ */

function nodeStatement(node: GraphNode): string {
    const attributes: Array<readonly [string, string]> = [['label', node.label]];
    if (node.shape) attributes.push(['shape', node.shape]);
    attributes.push(['style', node.style], ['fillcolor', node.fillColor]);
    return `\t${quoteDotId(node.id)} [${formatAttributes(attributes)}]`;
}

function edgeStatement(edge: GraphEdge): string {
    return `\t${quoteDotId(edge.fromId)} -> ${quoteDotId(edge.toId)}`;
}

/* ------------------------------------------------------------------ */
/*  Main render function                                              */
/* ------------------------------------------------------------------ */

export function toDot(graph: MindmapGraph, options: DotOptions): string {
    const lines = [`digraph ${quoteDotId(options.graphName)} {`];

    const graphAttributes = Object.entries(options.graphAttributes);
    if (graphAttributes.length > 0) {
        lines.push(`\tgraph [${formatAttributes(graphAttributes)}]`);
    }

    for (const node of graph.nodes) {
        lines.push(nodeStatement(node));
    }
    for (const edge of graph.edges) {
        lines.push(edgeStatement(edge));
    }

    lines.push('}');
    return `${lines.join('\n')}\n`;
}
