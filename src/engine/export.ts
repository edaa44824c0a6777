/**
 * Rendering driver: hands the graph to a `RenderEngine` once per output
 * format and writes `<base>.<format>` beside the intermediate DOT source.
 */
import { rm, writeFile, mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Logger } from '../logging/logger';
import { RenderError, errorMessage } from '../errors';
import type { MindmapGraph, OutputFormat } from '../types/mindmap';
import type { RenderEngine } from './graphviz';
import { toDot, type DotOptions } from './renderer';

export interface RenderMindmapOptions extends DotOptions {
    engine: RenderEngine;
    /** Directory for the outputs; created if missing. */
    outputDirectory: string;
    outputBaseName: string;
    formats: readonly OutputFormat[];
    /** Remove the intermediate DOT file after each render. */
    cleanup: boolean;
    logger: Logger;
}

async function renderFormat(
    engine: RenderEngine,
    dotSource: string,
    format: OutputFormat,
): Promise<Uint8Array> {
    try {
        return await engine.render(dotSource, format);
    } catch (error) {
        if (error instanceof RenderError) throw error;
        throw new RenderError(`Rendering ${format} failed: ${errorMessage(error)}`, { cause: error });
    }
}

/** Render every requested format; resolves to the written paths in order. */
export async function renderMindmap(
    graph: MindmapGraph,
    options: RenderMindmapOptions,
): Promise<string[]> {
    const { engine, formats, cleanup, logger } = options;
    const directory = resolve(options.outputDirectory);
    const sourcePath = join(directory, options.outputBaseName);
    const dotSource = toDot(graph, options);

    await mkdir(directory, { recursive: true });

    const written: string[] = [];
    for (const format of formats) {
        await writeFile(sourcePath, dotSource, 'utf8');
        try {
            const output = await renderFormat(engine, dotSource, format);
            const outputPath = `${sourcePath}.${format}`;
            await writeFile(outputPath, output);
            written.push(outputPath);
            logger.info({ format, path: outputPath }, 'Wrote mindmap image');
        } finally {
            if (cleanup) {
                await rm(sourcePath, { force: true });
                logger.debug({ path: sourcePath }, 'Removed intermediate DOT source');
            }
        }
    }
    return written;
}
