/**
 * Render configuration.
 *
 * Defaults reproduce the fixed behaviour of the command: read
 * `mindmap.yaml`, write `mindmap_output.png` and `mindmap_output.svg`.
 * Overrides are accepted from code only (library callers and tests).
 */
import { z } from 'zod';
import { ConfigError } from '../errors';
import { hexToRgb, rgbToHex } from '../engine/color';
import { CHILD_LIGHTEN_FACTOR } from '../engine/walker';

export const DEFAULT_PALETTE: readonly [string, ...string[]] = [
    '#ff6b6b', // red
    '#4dabf7', // blue
    '#51cf66', // green
    '#ffa94d', // orange
    '#845ef7', // purple
    '#f06595', // pink
    '#20c997', // teal
];

export const DEFAULT_ROOT = {
    id: 'Life_Systems',
    label: 'Life Systems Master Map',
    fillColor: '#f0f8ff',
} as const;

export const DEFAULT_GRAPH_ATTRIBUTES = {
    rankdir: 'LR',
    fontsize: '12',
    fontname: 'Helvetica',
} as const;

/** Accepts `rrggbb` or `#RRGGBB`; always yields lowercase `#rrggbb`. */
const HexColorSchema = z
    .string()
    .regex(/^#?[0-9a-fA-F]{6}$/, 'must be a 6-digit hex color')
    .transform((color) => rgbToHex(hexToRgb(color)));

const RootSchema = z.object({
    id: z.string().min(1),
    label: z.string(),
    fillColor: HexColorSchema,
});

export const MindmapConfigSchema = z.object({
    workingDirectory: z.string().min(1).default(() => process.cwd()),
    inputPath: z.string().min(1).default('mindmap.yaml'),
    outputDirectory: z.string().min(1).default('.'),
    outputBaseName: z.string().min(1).default('mindmap_output'),
    formats: z.array(z.enum(['png', 'svg'])).nonempty().default((): ['png' | 'svg', ...('png' | 'svg')[]] => ['png', 'svg']),
    /** Remove the intermediate DOT source after each render. */
    cleanup: z.boolean().default(true),
    graphName: z.string().min(1).default('MindMap'),
    graphAttributes: z.record(z.string(), z.string()).default(() => ({ ...DEFAULT_GRAPH_ATTRIBUTES })),
    root: RootSchema.default(() => ({ ...DEFAULT_ROOT })),
    palette: z.array(HexColorSchema).nonempty().default((): [string, ...string[]] => [...DEFAULT_PALETTE]),
    childLightenFactor: z.number().min(0).max(1).default(CHILD_LIGHTEN_FACTOR),
    logLevel: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default('info'),
});

export type MindmapConfig = z.infer<typeof MindmapConfigSchema>;
export type MindmapConfigInput = z.input<typeof MindmapConfigSchema>;

export function resolveMindmapConfig(overrides: MindmapConfigInput = {}): MindmapConfig {
    const result = MindmapConfigSchema.safeParse(overrides);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }
    return result.data;
}
