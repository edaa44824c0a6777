export { hexToRgb, lighten, rgbToHex, type Rgb } from './engine/color';
export { parseMindmapDocument } from './engine/document';
export { addNodes, childNodeId, formatScalar, sanitizeNodeId, CHILD_LIGHTEN_FACTOR } from './engine/walker';
export { buildMindmapGraph, type AssemblyOptions } from './engine/assemble';
export { quoteDotId, toDot, type DotOptions } from './engine/renderer';
export { createGraphvizEngine, type RenderEngine } from './engine/graphviz';
export { renderMindmap, type RenderMindmapOptions } from './engine/export';
export {
    DEFAULT_PALETTE,
    MindmapConfigSchema,
    resolveMindmapConfig,
    type MindmapConfig,
    type MindmapConfigInput,
} from './config/mindmapConfig';
export { createMindmapGraphStore, type MindmapGraphStore } from './store/mindmapStore';
export { createLogger } from './logging/logger';
export { runMindmap, type MindmapRunResult, type RunMindmapDependencies } from './pipeline';
export * from './errors';
export type * from './types/mindmap';
