/**
 * Hex color helpers. Colors travel as `#rrggbb` strings and are only
 * unpacked into channels long enough to blend them toward white.
 */
import { FormatError } from '../errors';

export type Rgb = readonly [r: number, g: number, b: number];

const HEX_COLOR_PATTERN = /^[0-9a-fA-F]{6}$/;

/** Parse `#rrggbb` (the `#` is optional) into channel integers. */
export function hexToRgb(color: string): Rgb {
    const hex = color.startsWith('#') ? color.slice(1) : color;
    if (!HEX_COLOR_PATTERN.test(hex)) {
        throw new FormatError(`Expected a 6-digit hex color, got "${color}"`);
    }
    return [
        Number.parseInt(hex.slice(0, 2), 16),
        Number.parseInt(hex.slice(2, 4), 16),
        Number.parseInt(hex.slice(4, 6), 16),
    ];
}

function toChannelHex(channel: number): string {
    if (!Number.isFinite(channel)) {
        throw new FormatError(`Color channel must be a finite number, got ${channel}`);
    }
    const clamped = Math.min(255, Math.max(0, Math.trunc(channel)));
    return clamped.toString(16).padStart(2, '0');
}

/** Format channels as lowercase `#rrggbb`, clamping each to [0, 255]. */
export function rgbToHex([r, g, b]: Rgb): string {
    return `#${toChannelHex(r)}${toChannelHex(g)}${toChannelHex(b)}`;
}

/**
 * Blend a color toward white.
 *
 * Each channel moves `factor` of the way to 255 and is truncated, not
 * rounded: `lighten('#000000')` is `#3f3f3f`.
 */
export function lighten(color: string, factor = 0.25): string {
    if (!(factor >= 0 && factor <= 1)) {
        throw new FormatError(`Lighten factor must be within [0, 1], got ${factor}`);
    }
    const [r, g, b] = hexToRgb(color);
    const blend = (channel: number): number => Math.trunc(channel + (255 - channel) * factor);
    return rgbToHex([blend(r), blend(g), blend(b)]);
}
