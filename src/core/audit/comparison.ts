// src/core/audit/comparison.ts

import type { MetricsComparison, QualityMetrics, RasterImage } from '../../@types';
import { resampleRaster } from '../../utils/imageProcessing/sharpSpecific';
import { analyzeMetrics } from './qualityAuditor';
import _ from 'lodash';

/**
 * Signed differences, yours minus reference.
 */
export function compareMetrics(yours: QualityMetrics, reference: QualityMetrics): MetricsComparison {
    return {
        yours,
        reference,
        sharpnessDiff: _.round(yours.sharpness - reference.sharpness, 1),
        contrastDiff: _.round(yours.contrast - reference.contrast, 1),
        brightnessDiff: _.round(yours.brightness - reference.brightness, 1),
        paletteSizeDiff: yours.paletteSize - reference.paletteSize,
    };
}

/**
 * Scores an image against a reference icon. The reference is resampled to the image's size first so
 * both are measured on the same pixel grid.
 */
export async function auditAgainstReference(image: RasterImage, reference: RasterImage): Promise<MetricsComparison> {
    const aligned = await resampleRaster(reference, image.width, image.height, 'lanczos3');
    return compareMetrics(analyzeMetrics(image), analyzeMetrics(aligned));
}
