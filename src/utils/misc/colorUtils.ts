// src/utils/misc/colorUtils.ts

import type { RgbaColor } from '../../@types';

/**
 * Parses `#rgb`, `#rrggbb` or `#rrggbbaa` (the `#` is optional). Alpha defaults to opaque.
 */
export function parseHexColor(hex: string): RgbaColor {
    let normalized = hex.trim().replace(/^#/, '').toLowerCase();
    if (/^[0-9a-f]{3}$/.test(normalized)) {
        normalized = normalized
            .split('')
            .map((digit) => digit + digit)
            .join('');
    }
    if (!/^[0-9a-f]{6}([0-9a-f]{2})?$/.test(normalized)) {
        throw new Error(`Invalid hex color "${hex}"`);
    }
    return {
        r: parseInt(normalized.slice(0, 2), 16),
        g: parseInt(normalized.slice(2, 4), 16),
        b: parseInt(normalized.slice(4, 6), 16),
        a: normalized.length === 8 ? parseInt(normalized.slice(6, 8), 16) : 255,
    };
}

export function toHexColor(color: RgbaColor): string {
    const hex = [color.r, color.g, color.b, ...(color.a === 255 ? [] : [color.a])]
        .map((channel) => channel.toString(16).padStart(2, '0'))
        .join('');
    return `#${hex}`;
}
