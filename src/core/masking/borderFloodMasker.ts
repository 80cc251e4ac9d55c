// src/core/masking/borderFloodMasker.ts

import type { BorderFloodMaskingSpec, ILogger, RasterImage } from '../../@types';
import { SeedMode } from '../../@types';
import { config } from '../../config';
import { padRaster } from '../../utils/raster/rasterUtils';
import { autoCrop } from './autoCropper';

function similar(data: Uint8Array, a: number, b: number, tolerance: number): boolean {
    const ia = a * 4;
    const ib = b * 4;
    if (data[ia + 3] === 0 && data[ib + 3] === 0) {
        return true;
    }
    const distance = Math.max(
        Math.abs(data[ia] - data[ib]),
        Math.abs(data[ia + 1] - data[ib + 1]),
        Math.abs(data[ia + 2] - data[ib + 2]),
        Math.abs(data[ia + 3] - data[ib + 3]),
    );
    return distance <= tolerance;
}

/**
 * Pixel indices the flood starts from.
 */
export function collectSeeds(width: number, height: number, seedMode: SeedMode): number[] {
    if (seedMode === SeedMode.Corners) {
        return [0, width - 1, (height - 1) * width, height * width - 1];
    }
    const seeds: number[] = [];
    for (let x = 0; x < width; x++) {
        seeds.push(x, (height - 1) * width + x);
    }
    for (let y = 1; y < height - 1; y++) {
        seeds.push(y * width, y * width + width - 1);
    }
    return seeds;
}

/**
 * Marks the background component: seeds plus every pixel reachable through 4-connected steps where
 * each step joins two pixels within `tolerance` of each other.
 *
 * Breadth-first with a preallocated queue; a pixel is flagged when queued, so none is queued twice.
 */
export function findBackgroundComponent(image: RasterImage, tolerance: number, seedMode: SeedMode): Uint8Array {
    const { width, height, data } = image;
    const visited = new Uint8Array(width * height);
    const queue = new Int32Array(width * height);
    let head = 0;
    let tail = 0;

    for (const seed of collectSeeds(width, height, seedMode)) {
        if (!visited[seed]) {
            visited[seed] = 1;
            queue[tail++] = seed;
        }
    }

    while (head < tail) {
        const pos = queue[head++];
        const cx = pos % width;
        const cy = (pos - cx) / width;

        if (cy > 0 && !visited[pos - width] && similar(data, pos, pos - width, tolerance)) {
            visited[pos - width] = 1;
            queue[tail++] = pos - width;
        }
        if (cy < height - 1 && !visited[pos + width] && similar(data, pos, pos + width, tolerance)) {
            visited[pos + width] = 1;
            queue[tail++] = pos + width;
        }
        if (cx > 0 && !visited[pos - 1] && similar(data, pos, pos - 1, tolerance)) {
            visited[pos - 1] = 1;
            queue[tail++] = pos - 1;
        }
        if (cx < width - 1 && !visited[pos + 1] && similar(data, pos, pos + 1, tolerance)) {
            visited[pos + 1] = 1;
            queue[tail++] = pos + 1;
        }
    }
    return visited;
}

/**
 * Clears the background connected to the image border. Background-colored pixels enclosed by the
 * artwork are not reachable and stay opaque.
 */
export function floodFillFromBorder(image: RasterImage, tolerance: number, seedMode: SeedMode): RasterImage {
    const background = findBackgroundComponent(image, tolerance, seedMode);
    const data = new Uint8Array(image.data);
    for (let i = 0; i < background.length; i++) {
        if (background[i]) {
            data[i * 4 + 3] = 0;
        }
    }
    return { width: image.width, height: image.height, data };
}

/**
 * Border-flood masking mode, including edge protection and the optional crop afterwards.
 */
export function applyBorderFlood(image: RasterImage, spec: BorderFloodMaskingSpec, logger?: ILogger): RasterImage {
    let working = image;
    if (spec.edgeProtectPad) {
        working = padRaster(working, config.masking.edgeProtectPad);
        logger?.debug(`Edge protection added ${config.masking.edgeProtectPad}px transparent border.`);
    }
    working = floodFillFromBorder(working, spec.tolerance, spec.seedMode);
    if (spec.autoCropAfter) {
        working = autoCrop(working, config.masking.autoCropPadding);
    }
    return working;
}
