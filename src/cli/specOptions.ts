// src/cli/specOptions.ts

import type { CompositionSpec, FitMode, IconSpecSet, MaskingSpec, RgbaColor, SeedMode, StrokeAlignment } from '../@types';
import { MaskingMode } from '../@types';
import { applySmartCleanup } from '../core/audit/fixes';
import {
    createAutoCropMasking,
    createBorderFloodMasking,
    createColorKey,
    createColorKeyMasking,
    createCompositionSpec,
    createEdgeRefineSpec,
    createIconSpecSet,
    createLiquidPolishSpec,
    createMorphologySpec,
    createNoMasking,
    createSafeMarginComposition,
    createStrokeSpec,
} from '../core/specs/specFactory';

/**
 * Spec-related flags of the `render` command, as commander hands them over. Anything left out takes
 * the factory default.
 */
export interface SpecCliOptions {
    mask?: MaskingMode;
    keyColor?: RgbaColor[];
    tolerance?: number;
    seed?: SeedMode;
    autocropAfter?: boolean;
    edgeProtect?: boolean;
    padding?: number;
    fit?: FitMode;
    scale?: number;
    safeMargin?: boolean;
    size?: number;
    shapeWeight?: number;
    strokeColor?: RgbaColor;
    strokeWidth?: number;
    strokeAlign?: StrokeAlignment;
    liquid?: number;
    debris?: number;
    smooth?: number;
    corner?: number;
    snap?: number;
    smartCleanup?: boolean;
}

function buildMasking(options: SpecCliOptions): MaskingSpec {
    const mode = options.mask ?? MaskingMode.None;
    switch (mode) {
        case MaskingMode.None:
            return createNoMasking();
        case MaskingMode.AutoCrop:
            return createAutoCropMasking({ padding: options.padding, edgeProtectPad: options.edgeProtect });
        case MaskingMode.ColorKey:
            return createColorKeyMasking({
                keys: (options.keyColor ?? []).map((color) => createColorKey(color, options.tolerance)),
                autoCropAfter: options.autocropAfter,
            });
        case MaskingMode.BorderFlood:
            return createBorderFloodMasking({
                tolerance: options.tolerance,
                seedMode: options.seed,
                autoCropAfter: options.autocropAfter,
                edgeProtectPad: options.edgeProtect,
            });
    }
}

function buildComposition(options: SpecCliOptions): CompositionSpec {
    if (options.safeMargin) {
        return createSafeMarginComposition(options.size);
    }
    return createCompositionSpec({ fitMode: options.fit, scale: options.scale, targetSize: options.size });
}

/**
 * Turns parsed CLI flags into a validated spec set. Throws `SpecValidationError` on out-of-range values.
 */
export function buildSpecSet(options: SpecCliOptions): IconSpecSet {
    const specs = createIconSpecSet({
        masking: buildMasking(options),
        composition: buildComposition(options),
        morphology: createMorphologySpec(options.shapeWeight),
        stroke: options.strokeColor
            ? createStrokeSpec({ color: options.strokeColor, widthPx: options.strokeWidth, alignment: options.strokeAlign })
            : null,
        liquidPolish: createLiquidPolishSpec(options.liquid),
        edgeRefine: createEdgeRefineSpec({
            debrisThreshold: options.debris,
            smoothBlurRadius: options.smooth,
            cornerSharpness: options.corner,
            resolutionSnap: options.snap,
        }),
    });
    return options.smartCleanup ? applySmartCleanup(specs) : specs;
}
