// src/core/export/sizeExporter.ts

import type { IExportOptions, IExportRequest, RasterImage, UnsharpMaskParams } from '../../@types';
import { AlphaVariant } from '../../@types';
import { config } from '../../config';
import { resampleRaster, unsharpMask } from '../../utils/imageProcessing/sharpSpecific';
import { createRaster, blitRaster, thresholdAlpha } from '../../utils/raster/rasterUtils';
import os from 'node:os';
import pLimit from 'p-limit';

export type ExportPreset = keyof typeof config.export.presets | 'all';

export class ExportCancelledError extends Error {
    constructor() {
        super('Export was cancelled');
        this.name = 'ExportCancelledError';
    }
}

/**
 * Sizes for a platform preset; `all` is the sorted union of every preset.
 */
export function presetSizes(preset: ExportPreset): number[] {
    if (preset === 'all') {
        const { windows, mac, web } = config.export.presets;
        return [...new Set([...windows, ...mac, ...web])].sort((a, b) => a - b);
    }
    return [...config.export.presets[preset]];
}

/**
 * Sharpening applied after downscaling to small sizes, or null where the resample alone looks right.
 */
export function sharpenParamsForSize(size: number): UnsharpMaskParams | null {
    const tier = config.export.sharpenTiers.find((candidate) => size <= candidate.maxSize);
    if (!tier) {
        return null;
    }
    return { radius: tier.radius, percent: tier.percent, threshold: tier.threshold };
}

/**
 * Centers the raster on a transparent square as large as its longer side.
 */
export function padToSquare(image: RasterImage): RasterImage {
    if (image.width === image.height) {
        return image;
    }
    const side = Math.max(image.width, image.height);
    const square = createRaster(side, side);
    blitRaster(
        image,
        square.data,
        side,
        Math.floor((side - image.width) / 2),
        Math.floor((side - image.height) / 2),
    );
    return square;
}

/**
 * One export size: square it, Lanczos-resample, sharpen small sizes, optionally binarize alpha.
 */
export async function renderSize(
    master: RasterImage,
    size: number,
    alphaVariant: AlphaVariant = AlphaVariant.Full,
): Promise<RasterImage> {
    let image = await resampleRaster(padToSquare(master), size, size, 'lanczos3');
    const sharpen = sharpenParamsForSize(size);
    if (sharpen) {
        image = await unsharpMask(image, sharpen);
    }
    if (alphaVariant === AlphaVariant.Binary) {
        image = thresholdAlpha(image, config.export.binaryAlphaThreshold);
    }
    return image;
}

export function defaultExportConcurrency(): number {
    return Math.max(1, os.cpus().length - 1);
}

/**
 * Produces every requested size from one processed master. Each size is an independent resample run on
 * a bounded pool. When `signal` aborts, work still queued is skipped, finished sizes are dropped and the
 * returned promise rejects with `ExportCancelledError`; a partial map is never returned.
 *
 * @param master - Processed icon master.
 * @param request - Sizes, alpha variant, pool size and an optional abort signal.
 * @param options - Optional logger and per-size completion callback.
 * @return Map from size to its raster, in the order the sizes were requested.
 */
export async function exportSizes(
    master: RasterImage,
    request: IExportRequest,
    options: IExportOptions = {},
): Promise<Map<number, RasterImage>> {
    const { signal, alphaVariant = AlphaVariant.Full } = request;
    const sizes = [...new Set(request.sizes)];
    for (const size of sizes) {
        if (!Number.isInteger(size) || size <= 0) {
            throw new Error(`Export size must be a positive integer, got ${size}`);
        }
    }
    if (signal?.aborted) {
        throw new ExportCancelledError();
    }

    const concurrency = Math.max(1, request.concurrency ?? defaultExportConcurrency());
    const limit = pLimit(concurrency);
    options.logger?.debug(`Exporting ${sizes.length} size(s) with ${concurrency} worker(s).`);

    const results = await Promise.all(
        sizes.map((size) =>
            limit(async () => {
                if (signal?.aborted) {
                    return null;
                }
                const image = await renderSize(master, size, alphaVariant);
                if (signal?.aborted) {
                    return null;
                }
                options.onSizeDone?.(size);
                return { size, image };
            }),
        ),
    );

    if (signal?.aborted) {
        throw new ExportCancelledError();
    }
    const exported = new Map<number, RasterImage>();
    for (const entry of results) {
        if (entry) {
            exported.set(entry.size, entry.image);
        }
    }
    return exported;
}
