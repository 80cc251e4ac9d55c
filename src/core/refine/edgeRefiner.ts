// src/core/refine/edgeRefiner.ts

import type { EdgeRefineSpec, ILogger, RasterImage } from '../../@types';
import { config } from '../../config';
import { blurAlpha, unsharpMask } from '../../utils/imageProcessing/sharpSpecific';
import { remapAlpha, thresholdAlpha } from '../../utils/raster/rasterUtils';

/**
 * Debris cleanup. The alpha plane is blurred by `blurRadius` (skipped at 0), then remapped linearly from
 * `[threshold, threshold + 80]` onto `[0, 255]`. Alpha at or below `threshold` becomes 0 and alpha at or
 * above `threshold + 80` becomes 255.
 */
export async function cleanEdges(image: RasterImage, threshold: number, blurRadius: number): Promise<RasterImage> {
    const blurred = blurRadius > 0 ? await blurAlpha(image, blurRadius) : image;
    return remapAlpha(blurred, threshold, threshold + config.edgeRefine.rampWidth);
}

/**
 * Corner sharpness around a neutral 50: lower values round corners (alpha blur, then a hard cut at the
 * midpoint), higher values sharpen the whole image with an unsharp mask.
 */
export async function applyCornerSharpness(image: RasterImage, value: number): Promise<RasterImage> {
    const { neutralCornerSharpness, roundingThreshold, cornerUnsharp } = config.edgeRefine;
    if (value < neutralCornerSharpness) {
        const radius = (neutralCornerSharpness - value) / 10;
        const blurred = await blurAlpha(image, radius);
        return thresholdAlpha(blurred, roundingThreshold);
    }
    if (value > neutralCornerSharpness) {
        const amount = (value - neutralCornerSharpness) * 2;
        return unsharpMask(image, {
            radius: cornerUnsharp.radius,
            percent: Math.trunc(amount * 2),
            threshold: cornerUnsharp.threshold,
        });
    }
    return image;
}

/**
 * Final crispness pass for the pixel grid; 0 leaves the image alone.
 */
export async function applyResolutionSnap(image: RasterImage, value: number): Promise<RasterImage> {
    if (value <= 0) {
        return image;
    }
    const { snapUnsharp } = config.edgeRefine;
    return unsharpMask(image, {
        radius: snapUnsharp.radius,
        percent: Math.trunc(value * 1.5),
        threshold: snapUnsharp.threshold,
    });
}

export async function refineEdges(image: RasterImage, spec: EdgeRefineSpec, logger?: ILogger): Promise<RasterImage> {
    logger?.debug(`Cleaning edges (threshold ${spec.debrisThreshold}, blur ${spec.smoothBlurRadius}).`);
    const cleaned = await cleanEdges(image, spec.debrisThreshold, spec.smoothBlurRadius);
    const shaped = await applyCornerSharpness(cleaned, spec.cornerSharpness);
    return applyResolutionSnap(shaped, spec.resolutionSnap);
}
