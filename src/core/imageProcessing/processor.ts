// src/core/imageProcessing/processor.ts

import type { RasterImage } from '../../@types';
import { SharpImageProcessor } from './strategies/SharpImageProcessor';

/**
 * Decodes an image file into an RGBA raster.
 *
 * @param imagePath - The file to load.
 * @param density - Rasterization DPI for vector inputs.
 * @return The decoded raster.
 */
export async function loadImageData(imagePath: string, density?: number): Promise<RasterImage> {
    return new SharpImageProcessor(density).loadImageData(imagePath);
}

/**
 * Writes a raster to a PNG file.
 *
 * @param image - The raster to write.
 * @param outputPngPath - The path where the PNG file will be saved.
 */
export async function writeImageData(image: RasterImage, outputPngPath: string): Promise<void> {
    await new SharpImageProcessor().writeImageData(image, outputPngPath);
}
