// src/core/polish/liquidPolisher.ts

import type { ILogger, LiquidPolishSpec, RasterImage } from '../../@types';
import { config } from '../../config';
import { gaussianBlurRaster, resampleRaster } from '../../utils/imageProcessing/sharpSpecific';
import { remapAlpha } from '../../utils/raster/rasterUtils';

/**
 * Blur sigma in supersampled pixels for an intensity between 0 and 1.
 */
export function liquidBlurSigma(intensity: number): number {
    return config.liquidPolish.blurBase + intensity * config.liquidPolish.blurSpan;
}

/**
 * "Liquid" smoothing: supersample, melt with a Gaussian blur, harden only the alpha with a steep
 * levels curve, then come back down. The boundary is re-binarized at four times the resolution,
 * which rounds off stair-steps.
 *
 * @param image - Raster to polish.
 * @param spec - Intensity in [0, 1]; 0 returns the input untouched.
 * @param logger - Optional logger for debug output.
 * @return The polished raster, same size as the input.
 */
export async function liquidPolish(image: RasterImage, spec: LiquidPolishSpec, logger?: ILogger): Promise<RasterImage> {
    if (spec.intensity <= 0) {
        return image;
    }
    const { supersampleFactor, levelsLow, levelsHigh } = config.liquidPolish;
    const sigma = liquidBlurSigma(spec.intensity);
    logger?.debug(`Liquid polish at ${supersampleFactor}x with sigma ${sigma}.`);

    const supersampled = await resampleRaster(
        image,
        image.width * supersampleFactor,
        image.height * supersampleFactor,
        'cubic',
    );
    const melted = await gaussianBlurRaster(supersampled, sigma);
    const hardened = remapAlpha(melted, levelsLow, levelsHigh);
    return resampleRaster(hardened, image.width, image.height, 'lanczos3');
}
