/**
 * The whole program: load document → build graph → render images.
 */
import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { MindmapConfig } from './config/mindmapConfig';
import { buildMindmapGraph } from './engine/assemble';
import { parseMindmapDocument } from './engine/document';
import { renderMindmap } from './engine/export';
import { createGraphvizEngine, type RenderEngine } from './engine/graphviz';
import { MissingInputError } from './errors';
import { createLogger, type Logger } from './logging/logger';
import type { MindmapGraph } from './types/mindmap';

export interface RunMindmapDependencies {
    /** Defaults to Graphviz WASM, loaded only once the graph is built. */
    engine?: RenderEngine;
    logger?: Logger;
}

export interface MindmapRunResult {
    graph: MindmapGraph;
    outputPaths: string[];
}

const MISSING_PATH_CODES = new Set(['ENOENT', 'ENOTDIR']);

async function isFile(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isFile();
    } catch (error) {
        if (error instanceof Error && 'code' in error && MISSING_PATH_CODES.has(String(error.code))) {
            return false;
        }
        throw error;
    }
}

export async function runMindmap(
    config: MindmapConfig,
    dependencies: RunMindmapDependencies = {},
): Promise<MindmapRunResult> {
    const logger = dependencies.logger ?? createLogger(config.logLevel);
    const inputPath = resolve(config.workingDirectory, config.inputPath);

    if (!(await isFile(inputPath))) {
        throw new MissingInputError(inputPath);
    }

    logger.info({ path: inputPath }, 'Loading mindmap document');
    const document = parseMindmapDocument(await readFile(inputPath, 'utf8'));

    const graph = buildMindmapGraph(document, config);
    logger.info(
        { nodes: graph.nodes.length, edges: graph.edges.length },
        'Assembled mindmap graph',
    );

    const engine = dependencies.engine ?? (await createGraphvizEngine());
    const outputPaths = await renderMindmap(graph, {
        engine,
        logger,
        graphName: config.graphName,
        graphAttributes: config.graphAttributes,
        outputDirectory: resolve(config.workingDirectory, config.outputDirectory),
        outputBaseName: config.outputBaseName,
        formats: config.formats,
        cleanup: config.cleanup,
    });

    return { graph, outputPaths };
}
