// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ImageProcessor, RasterImage } from '../../../@types';
import { config } from '../../../config';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * @param density - DPI used when the input is a vector format (SVG); raster inputs ignore it.
     */
    constructor(private readonly density: number = 300) {}

    /**
     * Decodes any format libvips reads into straight-alpha sRGB RGBA bytes.
     *
     * @param imagePath - The file path of the image.
     * @return The decoded raster.
     */
    public async loadImageData(imagePath: string): Promise<RasterImage> {
        const { data, info } = await sharp(imagePath, { density: this.density })
            .toColourspace('srgb')
            .ensureAlpha()
            .raw()
            .toBuffer({ resolveWithObject: true });
        if (info.channels !== 4) {
            throw new Error(`Expected 4 channels after decoding "${imagePath}", got ${info.channels}`);
        }
        return { width: info.width, height: info.height, data: new Uint8Array(data) };
    }

    /**
     * Writes a raster as an RGBA PNG.
     *
     * @param image - The raster to encode.
     * @param outputPngPath - The path where the PNG file will be saved.
     */
    public async writeImageData(image: RasterImage, outputPngPath: string): Promise<void> {
        await sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
            raw: {
                width: image.width,
                height: image.height,
                channels: 4,
            },
        })
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toFile(outputPngPath);
    }
}
