// src/core/morphology/alphaMorphology.ts

import type { AlphaMask, MorphologySpec, RasterImage } from '../../@types';
import { getAlphaMask, withAlphaMask } from '../../utils/raster/rasterUtils';

/*
 * Every grow/shrink in the project goes through this file. The structuring element is the
 * (2r+1) x (2r+1) square centered on the pixel, clipped to the image, applied as two 1-D passes.
 */

function assertRadius(radius: number): void {
    if (!Number.isInteger(radius) || radius < 0) {
        throw new Error(`Morphology radius must be a non-negative integer, got ${radius}`);
    }
}

function rankPass(
    source: Uint8Array,
    width: number,
    height: number,
    radius: number,
    horizontal: boolean,
    pickMax: boolean,
): Uint8Array {
    const out = new Uint8Array(source.length);
    const lineCount = horizontal ? height : width;
    const lineLength = horizontal ? width : height;
    const step = horizontal ? 1 : width;
    for (let line = 0; line < lineCount; line++) {
        const base = horizontal ? line * width : line;
        for (let pos = 0; pos < lineLength; pos++) {
            const from = Math.max(0, pos - radius);
            const to = Math.min(lineLength - 1, pos + radius);
            let best = source[base + from * step];
            for (let k = from + 1; k <= to; k++) {
                const value = source[base + k * step];
                if (pickMax ? value > best : value < best) {
                    best = value;
                }
            }
            out[base + pos * step] = best;
        }
    }
    return out;
}

function rankFilter(mask: AlphaMask, radius: number, pickMax: boolean): AlphaMask {
    assertRadius(radius);
    if (radius === 0) {
        return mask;
    }
    const rows = rankPass(mask.data, mask.width, mask.height, radius, true, pickMax);
    const data = rankPass(rows, mask.width, mask.height, radius, false, pickMax);
    return { width: mask.width, height: mask.height, data };
}

/**
 * Dilates the mask: each pixel takes the maximum alpha within `radius`.
 */
export function expand(mask: AlphaMask, radius: number): AlphaMask {
    return rankFilter(mask, radius, true);
}

/**
 * Erodes the mask: each pixel takes the minimum alpha within `radius`.
 */
export function choke(mask: AlphaMask, radius: number): AlphaMask {
    return rankFilter(mask, radius, false);
}

/**
 * Dilates a raster's alpha plane. Pixels that were fully transparent and become visible borrow the
 * color of the pixel that supplied their new alpha, so the grown rim matches the content.
 */
export function expandRaster(image: RasterImage, radius: number): RasterImage {
    assertRadius(radius);
    if (radius === 0) {
        return image;
    }
    const { width, height } = image;
    const pixelCount = width * height;
    const rowMax = new Uint8Array(pixelCount);
    const rowSource = new Int32Array(pixelCount);

    for (let y = 0; y < height; y++) {
        const base = y * width;
        for (let x = 0; x < width; x++) {
            const from = Math.max(0, x - radius);
            const to = Math.min(width - 1, x + radius);
            let bestIndex = base + from;
            let best = image.data[bestIndex * 4 + 3];
            for (let k = from + 1; k <= to; k++) {
                const value = image.data[(base + k) * 4 + 3];
                if (value > best) {
                    best = value;
                    bestIndex = base + k;
                }
            }
            rowMax[base + x] = best;
            rowSource[base + x] = bestIndex;
        }
    }

    const data = new Uint8Array(image.data);
    for (let x = 0; x < width; x++) {
        for (let y = 0; y < height; y++) {
            const from = Math.max(0, y - radius);
            const to = Math.min(height - 1, y + radius);
            let best = rowMax[from * width + x];
            let bestIndex = rowSource[from * width + x];
            for (let k = from + 1; k <= to; k++) {
                const value = rowMax[k * width + x];
                if (value > best) {
                    best = value;
                    bestIndex = rowSource[k * width + x];
                }
            }
            const offset = (y * width + x) * 4;
            if (image.data[offset + 3] === 0 && best > 0) {
                const sourceOffset = bestIndex * 4;
                data[offset] = image.data[sourceOffset];
                data[offset + 1] = image.data[sourceOffset + 1];
                data[offset + 2] = image.data[sourceOffset + 2];
            }
            data[offset + 3] = best;
        }
    }
    return { width, height, data };
}

export function chokeRaster(image: RasterImage, radius: number): RasterImage {
    assertRadius(radius);
    if (radius === 0) {
        return image;
    }
    return withAlphaMask(image, choke(getAlphaMask(image), radius));
}

/**
 * Shape weight: negative values thin the artwork, positive values embolden it.
 */
export function applyShapeWeight(image: RasterImage, spec: MorphologySpec): RasterImage {
    if (spec.shapeWeight < 0) {
        return chokeRaster(image, -spec.shapeWeight);
    }
    if (spec.shapeWeight > 0) {
        return expandRaster(image, spec.shapeWeight);
    }
    return image;
}
