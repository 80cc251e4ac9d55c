// src/core/masking/autoCropper.ts

import type { RasterImage } from '../../@types';
import { cropRaster, findVisibleBounds, padRaster } from '../../utils/raster/rasterUtils';

/**
 * Crops to the bounding box of visible pixels and re-pads with `padding` transparent pixels per side.
 * An image without a single visible pixel comes back unchanged, so the result is never empty.
 * Running it twice with the same padding gives the same bytes as running it once.
 */
export function autoCrop(image: RasterImage, padding: number): RasterImage {
    if (!Number.isInteger(padding) || padding < 0) {
        throw new Error(`Crop padding must be a non-negative integer, got ${padding}`);
    }
    const bounds = findVisibleBounds(image);
    if (!bounds) {
        return image;
    }
    return padRaster(cropRaster(image, bounds), padding);
}
