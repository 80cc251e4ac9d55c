// src/utils/raster/rasterUtils.ts

import type { AlphaMask, BoundingBox, RasterImage, RgbaColor } from '../../@types';

const TRANSPARENT: RgbaColor = { r: 0, g: 0, b: 0, a: 0 };

/**
 * Creates a raster filled with a single color, transparent black unless given.
 */
export function createRaster(width: number, height: number, fill: RgbaColor = TRANSPARENT): RasterImage {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new Error(`Invalid raster dimensions ${width}x${height}`);
    }
    const data = new Uint8Array(width * height * 4);
    if (fill.r !== 0 || fill.g !== 0 || fill.b !== 0 || fill.a !== 0) {
        for (let i = 0; i < data.length; i += 4) {
            data[i] = fill.r;
            data[i + 1] = fill.g;
            data[i + 2] = fill.b;
            data[i + 3] = fill.a;
        }
    }
    return { width, height, data };
}

/**
 * Wraps existing RGBA bytes, checking that the length matches the dimensions.
 */
export function rasterFromBytes(width: number, height: number, bytes: Uint8Array): RasterImage {
    if (bytes.length !== width * height * 4) {
        throw new Error(`Expected ${width * height * 4} RGBA bytes for ${width}x${height}, got ${bytes.length}`);
    }
    return { width, height, data: bytes };
}

export function cloneRaster(image: RasterImage): RasterImage {
    return { width: image.width, height: image.height, data: new Uint8Array(image.data) };
}

export function getAlphaMask(image: RasterImage): AlphaMask {
    const data = new Uint8Array(image.width * image.height);
    for (let i = 0, j = 3; i < data.length; i++, j += 4) {
        data[i] = image.data[j];
    }
    return { width: image.width, height: image.height, data };
}

/**
 * Returns a copy of the raster whose alpha plane is replaced by the mask.
 */
export function withAlphaMask(image: RasterImage, mask: AlphaMask): RasterImage {
    if (mask.width !== image.width || mask.height !== image.height) {
        throw new Error(
            `Mask ${mask.width}x${mask.height} does not match raster ${image.width}x${image.height}`,
        );
    }
    const data = new Uint8Array(image.data);
    for (let i = 0, j = 3; i < mask.data.length; i++, j += 4) {
        data[j] = mask.data[i];
    }
    return { width: image.width, height: image.height, data };
}

/**
 * Adds a fully transparent border of `pad` pixels on every side.
 */
export function padRaster(image: RasterImage, pad: number): RasterImage {
    if (pad <= 0) {
        return image;
    }
    const padded = createRaster(image.width + pad * 2, image.height + pad * 2);
    blitRaster(image, padded.data, padded.width, pad, pad);
    return padded;
}

export function cropRaster(image: RasterImage, box: BoundingBox): RasterImage {
    const { left, top, width, height } = box;
    if (left < 0 || top < 0 || width <= 0 || height <= 0 || left + width > image.width || top + height > image.height) {
        throw new Error(
            `Crop box ${width}x${height}+${left}+${top} lies outside ${image.width}x${image.height}`,
        );
    }
    const data = new Uint8Array(width * height * 4);
    const rowBytes = width * 4;
    for (let y = 0; y < height; y++) {
        const srcStart = ((top + y) * image.width + left) * 4;
        data.set(image.data.subarray(srcStart, srcStart + rowBytes), y * rowBytes);
    }
    return { width, height, data };
}

/**
 * Copies `source` into a destination RGBA buffer at (x, y), clipping whatever falls outside.
 */
export function blitRaster(source: RasterImage, target: Uint8Array, targetWidth: number, x: number, y: number): void {
    const targetHeight = target.length / 4 / targetWidth;
    const fromX = Math.max(0, -x);
    const fromY = Math.max(0, -y);
    const toX = Math.min(source.width, targetWidth - x);
    const toY = Math.min(source.height, targetHeight - y);
    if (toX <= fromX || toY <= fromY) {
        return;
    }
    const rowBytes = (toX - fromX) * 4;
    for (let sy = fromY; sy < toY; sy++) {
        const srcStart = (sy * source.width + fromX) * 4;
        const dstStart = ((sy + y) * targetWidth + fromX + x) * 4;
        target.set(source.data.subarray(srcStart, srcStart + rowBytes), dstStart);
    }
}

/**
 * Smallest box containing every pixel with alpha > 0, or null when nothing is visible.
 */
export function findVisibleBounds(image: RasterImage): BoundingBox | null {
    let minX = image.width;
    let minY = image.height;
    let maxX = -1;
    let maxY = -1;
    for (let y = 0; y < image.height; y++) {
        for (let x = 0; x < image.width; x++) {
            if (image.data[(y * image.width + x) * 4 + 3] > 0) {
                if (x < minX) minX = x;
                if (x > maxX) maxX = x;
                if (y < minY) minY = y;
                if (y > maxY) maxY = y;
            }
        }
    }
    if (maxX < 0) {
        return null;
    }
    return { left: minX, top: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}

export function isFullyOpaque(image: RasterImage): boolean {
    for (let i = 3; i < image.data.length; i += 4) {
        if (image.data[i] !== 255) return false;
    }
    return true;
}

export function isFullyTransparent(image: RasterImage): boolean {
    for (let i = 3; i < image.data.length; i += 4) {
        if (image.data[i] !== 0) return false;
    }
    return true;
}

export function rastersEqual(a: RasterImage, b: RasterImage): boolean {
    if (a.width !== b.width || a.height !== b.height || a.data.length !== b.data.length) {
        return false;
    }
    for (let i = 0; i < a.data.length; i++) {
        if (a.data[i] !== b.data[i]) return false;
    }
    return true;
}

/**
 * Porter-Duff source-over of `top` onto `bottom`, both with straight alpha.
 * Pixels that end up fully transparent are written as transparent black.
 */
export function compositeOver(top: RasterImage, bottom: RasterImage): RasterImage {
    if (top.width !== bottom.width || top.height !== bottom.height) {
        throw new Error(
            `Cannot composite ${top.width}x${top.height} over ${bottom.width}x${bottom.height}`,
        );
    }
    const out = new Uint8Array(top.data.length);
    for (let i = 0; i < out.length; i += 4) {
        const sa = top.data[i + 3] / 255;
        const da = bottom.data[i + 3] / 255;
        const outA = sa + da * (1 - sa);
        if (outA === 0) {
            continue;
        }
        const bottomWeight = da * (1 - sa);
        for (let c = 0; c < 3; c++) {
            out[i + c] = Math.round((top.data[i + c] * sa + bottom.data[i + c] * bottomWeight) / outA);
        }
        out[i + 3] = Math.round(outA * 255);
    }
    return { width: top.width, height: top.height, data: out };
}

/**
 * Piecewise-linear levels curve on the alpha plane: below `low` becomes 0, above `high` becomes 255,
 * values in between are stretched linearly (truncated).
 */
export function remapAlpha(image: RasterImage, low: number, high: number): RasterImage {
    const lut = buildLevelsTable(low, high);
    const data = new Uint8Array(image.data);
    for (let i = 3; i < data.length; i += 4) {
        data[i] = lut[data[i]];
    }
    return { width: image.width, height: image.height, data };
}

export function buildLevelsTable(low: number, high: number): Uint8Array {
    const lut = new Uint8Array(256);
    for (let x = 0; x < 256; x++) {
        if (x < low) {
            lut[x] = 0;
        } else if (x > high || high <= low) {
            lut[x] = 255;
        } else {
            lut[x] = Math.trunc(((x - low) / (high - low)) * 255);
        }
    }
    return lut;
}

/**
 * Hard alpha threshold: alpha >= threshold becomes 255, everything else 0.
 */
export function thresholdAlpha(image: RasterImage, threshold: number): RasterImage {
    const data = new Uint8Array(image.data);
    for (let i = 3; i < data.length; i += 4) {
        data[i] = data[i] >= threshold ? 255 : 0;
    }
    return { width: image.width, height: image.height, data };
}

/**
 * ITU-R 601-2 luma, rounded the way 8-bit image libraries round it.
 */
export function toGrayscale(image: RasterImage): Uint8Array {
    const gray = new Uint8Array(image.width * image.height);
    for (let i = 0, j = 0; i < gray.length; i++, j += 4) {
        gray[i] = (image.data[j] * 19595 + image.data[j + 1] * 38470 + image.data[j + 2] * 7471 + 0x8000) >> 16;
    }
    return gray;
}
