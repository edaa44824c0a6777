import { Graphviz } from '@hpcc-js/wasm-graphviz';
import sharp from 'sharp';
import { RenderError, errorMessage } from '../errors';
import type { OutputFormat } from '../types/mindmap';

/** Anything that can lay out and draw DOT source. */
export interface RenderEngine {
    render: (dotSource: string, format: OutputFormat) => Promise<Uint8Array>;
}

/** The slice of the Graphviz WASM module the engine calls. */
export type GraphvizLayout = Pick<Graphviz, 'dot'>;

async function loadEngine(load: () => Promise<GraphvizLayout>): Promise<GraphvizLayout> {
    try {
        return await load();
    } catch (error) {
        throw new RenderError(`Graphviz could not be loaded: ${errorMessage(error)}`, { cause: error });
    }
}

/**
 * Graphviz compiled to WebAssembly, so no `dot` binary is needed on PATH.
 *
 * Graphviz only emits SVG here; PNG output is that SVG rasterized by sharp.
 */
export async function createGraphvizEngine(
    load: () => Promise<GraphvizLayout> = () => Graphviz.load(),
): Promise<RenderEngine> {
    const graphviz = await loadEngine(load);

    const layoutSvg = (dotSource: string): string => {
        try {
            return graphviz.dot(dotSource, 'svg');
        } catch (error) {
            throw new RenderError(`Graphviz layout failed: ${errorMessage(error)}`, { cause: error });
        }
    };

    return {
        async render(dotSource, format) {
            const svg = layoutSvg(dotSource);
            if (format === 'svg') {
                return Buffer.from(svg, 'utf8');
            }
            return sharp(Buffer.from(svg, 'utf8')).png().toBuffer();
        },
    };
}
