// src/utils/imageProcessing/sharpSpecific.ts

import type { RasterImage, UnsharpMaskParams } from '../../@types';
import sharp from 'sharp';
import { config } from '../../config';

export type ResampleKernel = 'cubic' | 'lanczos3';

function toBuffer(bytes: Uint8Array): Buffer {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Resamples an RGBA raster to exactly `width` x `height`. libvips premultiplies alpha while filtering,
 * so transparent pixels do not bleed their hidden color into the result.
 *
 * @param image - Source raster.
 * @param width - Output width in pixels.
 * @param height - Output height in pixels.
 * @param kernel - `cubic` for smooth enlargement, `lanczos3` for high quality reduction.
 * @return The resampled raster.
 */
export async function resampleRaster(
    image: RasterImage,
    width: number,
    height: number,
    kernel: ResampleKernel = 'lanczos3',
): Promise<RasterImage> {
    if (width === image.width && height === image.height) {
        return image;
    }
    const { data, info } = await sharp(toBuffer(image.data), {
        raw: { width: image.width, height: image.height, channels: 4 },
    })
        .resize(width, height, { fit: 'fill', kernel })
        .raw()
        .toBuffer({ resolveWithObject: true });
    if (info.channels !== 4 || info.width !== width || info.height !== height) {
        throw new Error(`Unexpected resample output ${info.width}x${info.height}x${info.channels}`);
    }
    return { width, height, data: new Uint8Array(data) };
}

/**
 * Gaussian blur of a single 8-bit plane.
 */
export async function blurPlane(plane: Uint8Array, width: number, height: number, sigma: number): Promise<Uint8Array> {
    const data = await sharp(toBuffer(plane), { raw: { width, height, channels: 1 } })
        .blur(Math.max(sigma, config.edgeRefine.minBlurSigma))
        .extractChannel(0)
        .raw()
        .toBuffer();
    return new Uint8Array(data);
}

async function blurRgb(image: RasterImage, sigma: number): Promise<Uint8Array> {
    const pixelCount = image.width * image.height;
    const rgb = new Uint8Array(pixelCount * 3);
    for (let i = 0, j = 0; i < pixelCount; i++, j += 4) {
        rgb[i * 3] = image.data[j];
        rgb[i * 3 + 1] = image.data[j + 1];
        rgb[i * 3 + 2] = image.data[j + 2];
    }
    const { data, info } = await sharp(toBuffer(rgb), { raw: { width: image.width, height: image.height, channels: 3 } })
        .blur(Math.max(sigma, config.edgeRefine.minBlurSigma))
        .raw()
        .toBuffer({ resolveWithObject: true });
    if (info.channels !== 3) {
        throw new Error(`Unexpected blur output with ${info.channels} channels`);
    }
    return new Uint8Array(data);
}

/**
 * Blurs only the alpha plane; color bytes are copied through.
 */
export async function blurAlpha(image: RasterImage, sigma: number): Promise<RasterImage> {
    const pixelCount = image.width * image.height;
    const alpha = new Uint8Array(pixelCount);
    for (let i = 0; i < pixelCount; i++) {
        alpha[i] = image.data[i * 4 + 3];
    }
    const blurred = await blurPlane(alpha, image.width, image.height, sigma);
    const data = new Uint8Array(image.data);
    for (let i = 0; i < pixelCount; i++) {
        data[i * 4 + 3] = blurred[i];
    }
    return { width: image.width, height: image.height, data };
}

/**
 * Blurs all four channels independently (no premultiplication), matching a per-band Gaussian filter.
 */
export async function gaussianBlurRaster(image: RasterImage, sigma: number): Promise<RasterImage> {
    const [rgb, withBlurredAlpha] = await Promise.all([blurRgb(image, sigma), blurAlpha(image, sigma)]);
    const data = withBlurredAlpha.data;
    const pixelCount = image.width * image.height;
    for (let i = 0; i < pixelCount; i++) {
        data[i * 4] = rgb[i * 3];
        data[i * 4 + 1] = rgb[i * 3 + 1];
        data[i * 4 + 2] = rgb[i * 3 + 2];
    }
    return { width: image.width, height: image.height, data };
}

/**
 * Classic unsharp mask on every channel: where the difference to the blurred copy reaches
 * `threshold`, it is added back scaled by `percent`.
 */
export async function unsharpMask(image: RasterImage, params: UnsharpMaskParams): Promise<RasterImage> {
    if (params.percent <= 0) {
        return image;
    }
    const blurred = await gaussianBlurRaster(image, params.radius);
    const data = new Uint8Array(image.data.length);
    const gain = params.percent / 100;
    for (let i = 0; i < data.length; i++) {
        const original = image.data[i];
        const diff = original - blurred.data[i];
        if (Math.abs(diff) >= params.threshold) {
            data[i] = Math.min(255, Math.max(0, Math.round(original + diff * gain)));
        } else {
            data[i] = original;
        }
    }
    return { width: image.width, height: image.height, data };
}
