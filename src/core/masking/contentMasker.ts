// src/core/masking/contentMasker.ts

import type { ColorKey, RasterImage } from '../../@types';

/**
 * Checks whether an RGB triple lies within a key's tolerance, using the largest per-channel difference.
 */
export function matchesColorKey(r: number, g: number, b: number, key: ColorKey): boolean {
    const distance = Math.max(Math.abs(r - key.color.r), Math.abs(g - key.color.g), Math.abs(b - key.color.b));
    return distance <= key.tolerance;
}

/**
 * Color-key matting. Any pixel matching at least one key gets alpha 0; its RGB stays as it was so that
 * later stages (or an undo in the caller) still have the original color. The boundary is hard; smoothing
 * belongs to the edge refiner.
 *
 * @param image - Source raster, left untouched.
 * @param keys - Keys whose removed sets are unioned. An empty list returns the input.
 * @return A new raster with keyed pixels made transparent.
 */
export function applyColorKeys(image: RasterImage, keys: readonly ColorKey[]): RasterImage {
    if (keys.length === 0) {
        return image;
    }
    const data = new Uint8Array(image.data);
    for (let i = 0; i < data.length; i += 4) {
        const r = data[i];
        const g = data[i + 1];
        const b = data[i + 2];
        if (keys.some((key) => matchesColorKey(r, g, b, key))) {
            data[i + 3] = 0;
        }
    }
    return { width: image.width, height: image.height, data };
}
