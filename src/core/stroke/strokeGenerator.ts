// src/core/stroke/strokeGenerator.ts

import type { AlphaMask, RasterImage, StrokeSpec } from '../../@types';
import { StrokeAlignment } from '../../@types';
import { compositeOver, getAlphaMask } from '../../utils/raster/rasterUtils';
import { choke, expand } from '../morphology/alphaMorphology';

interface StrokeMasks {
    outer: AlphaMask;
    inner: AlphaMask;
}

function buildMasks(mask: AlphaMask, width: number, alignment: StrokeAlignment): StrokeMasks {
    switch (alignment) {
        case StrokeAlignment.Outside:
            return { outer: expand(mask, width), inner: mask };
        case StrokeAlignment.Inside:
            return { outer: mask, inner: choke(mask, width) };
        case StrokeAlignment.Center: {
            const half = Math.max(1, Math.floor(width / 2));
            return { outer: expand(mask, half), inner: choke(mask, half) };
        }
    }
}

/**
 * Band between the two masks: max(0, outer - inner) per pixel.
 */
export function strokeBand(mask: AlphaMask, width: number, alignment: StrokeAlignment): AlphaMask {
    const { outer, inner } = buildMasks(mask, width, alignment);
    const data = new Uint8Array(mask.data.length);
    for (let i = 0; i < data.length; i++) {
        data[i] = Math.max(0, outer.data[i] - inner.data[i]);
    }
    return { width: mask.width, height: mask.height, data };
}

/**
 * Draws a flat-colored outline along the alpha boundary.
 * `Outside` sits behind the artwork; `Center` and `Inside` are painted over it.
 *
 * @param image - Raster to outline.
 * @param spec - Stroke color, width and alignment.
 * @return The outlined raster, or the input when the width is not positive.
 */
export function applyStroke(image: RasterImage, spec: StrokeSpec): RasterImage {
    if (spec.widthPx <= 0) {
        return image;
    }
    const band = strokeBand(getAlphaMask(image), spec.widthPx, spec.alignment);
    const { r, g, b, a } = spec.color;
    const layer = new Uint8Array(image.data.length);
    for (let i = 0, j = 0; i < band.data.length; i++, j += 4) {
        layer[j] = r;
        layer[j + 1] = g;
        layer[j + 2] = b;
        layer[j + 3] = Math.round((band.data[i] * a) / 255);
    }
    const strokeLayer: RasterImage = { width: image.width, height: image.height, data: layer };
    return spec.alignment === StrokeAlignment.Outside
        ? compositeOver(image, strokeLayer)
        : compositeOver(strokeLayer, image);
}
