// src/core/masking/index.ts

import type { ILogger, MaskingSpec, RasterImage } from '../../@types';
import { MaskingMode } from '../../@types';
import { config } from '../../config';
import { padRaster } from '../../utils/raster/rasterUtils';
import { autoCrop } from './autoCropper';
import { applyBorderFlood } from './borderFloodMasker';
import { applyColorKeys } from './contentMasker';

export { autoCrop } from './autoCropper';
export { applyBorderFlood, findBackgroundComponent, floodFillFromBorder } from './borderFloodMasker';
export { applyColorKeys, matchesColorKey } from './contentMasker';

/**
 * Runs the selected masking mode. The modes are mutually exclusive.
 *
 * @param image - Source raster.
 * @param spec - Masking mode and its parameters.
 * @param logger - Optional logger for debug output.
 * @return The isolated content.
 */
export function applyMasking(image: RasterImage, spec: MaskingSpec, logger?: ILogger): RasterImage {
    switch (spec.mode) {
        case MaskingMode.None:
            return image;
        case MaskingMode.AutoCrop: {
            const working = spec.edgeProtectPad ? padRaster(image, config.masking.edgeProtectPad) : image;
            return autoCrop(working, spec.padding);
        }
        case MaskingMode.ColorKey: {
            logger?.debug(`Keying out ${spec.keys.length} color(s).`);
            const keyed = applyColorKeys(image, spec.keys);
            return spec.autoCropAfter ? autoCrop(keyed, config.masking.autoCropPadding) : keyed;
        }
        case MaskingMode.BorderFlood:
            logger?.debug(`Flooding background from ${spec.seedMode} with tolerance ${spec.tolerance}.`);
            return applyBorderFlood(image, spec, logger);
    }
}
