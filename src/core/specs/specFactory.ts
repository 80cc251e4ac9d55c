// src/core/specs/specFactory.ts

import type {
    AutoCropMaskingSpec,
    BorderFloodMaskingSpec,
    Color,
    ColorKey,
    ColorKeyMaskingSpec,
    CompositionSpec,
    EdgeRefineSpec,
    IconSpecSet,
    LiquidPolishSpec,
    MaskingSpec,
    MorphologySpec,
    NoMaskingSpec,
    RgbaColor,
    StrokeSpec,
} from '../../@types';
import { FitMode, MaskingMode, SeedMode, StrokeAlignment } from '../../@types';
import { config } from '../../config';
import { SpecValidationError } from './specValidationError';

function assertFinite(field: string, value: number): void {
    if (!Number.isFinite(value)) {
        throw new SpecValidationError(field, `expected a finite number, got ${value}`);
    }
}

function assertRange(field: string, value: number, min: number, max: number): void {
    assertFinite(field, value);
    if (value < min || value > max) {
        throw new SpecValidationError(field, `${value} is outside [${min}, ${max}]`);
    }
}

function assertIntegerRange(field: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value)) {
        throw new SpecValidationError(field, `expected an integer, got ${value}`);
    }
    assertRange(field, value, min, max);
}

function assertOneOf(field: string, value: string, allowed: readonly string[]): void {
    if (!allowed.includes(value)) {
        throw new SpecValidationError(field, `"${value}" is not one of ${allowed.join(', ')}`);
    }
}

function validateColor(field: string, color: Color): Color {
    assertIntegerRange(`${field}.r`, color.r, 0, 255);
    assertIntegerRange(`${field}.g`, color.g, 0, 255);
    assertIntegerRange(`${field}.b`, color.b, 0, 255);
    return Object.freeze({ r: color.r, g: color.g, b: color.b });
}

export function createColorKey(color: Color, tolerance: number = config.masking.defaultTolerance): ColorKey {
    assertIntegerRange('tolerance', tolerance, 0, 255);
    return Object.freeze({ color: validateColor('keyColor', color), tolerance });
}

export function createNoMasking(): NoMaskingSpec {
    return Object.freeze({ mode: MaskingMode.None });
}

export function createAutoCropMasking(
    options: { padding?: number; edgeProtectPad?: boolean } = {},
): AutoCropMaskingSpec {
    const padding = options.padding ?? config.masking.autoCropPadding;
    assertIntegerRange('padding', padding, 0, Number.MAX_SAFE_INTEGER);
    return Object.freeze({
        mode: MaskingMode.AutoCrop,
        padding,
        edgeProtectPad: options.edgeProtectPad ?? false,
    });
}

export function createColorKeyMasking(options: {
    keys: readonly ColorKey[];
    autoCropAfter?: boolean;
}): ColorKeyMaskingSpec {
    if (options.keys.length === 0) {
        throw new SpecValidationError('keys', 'at least one color key is required');
    }
    const keys = options.keys.map((key) => createColorKey(key.color, key.tolerance));
    return Object.freeze({
        mode: MaskingMode.ColorKey,
        keys: Object.freeze(keys),
        autoCropAfter: options.autoCropAfter ?? false,
    });
}

export function createBorderFloodMasking(
    options: { tolerance?: number; seedMode?: SeedMode; autoCropAfter?: boolean; edgeProtectPad?: boolean } = {},
): BorderFloodMaskingSpec {
    const tolerance = options.tolerance ?? config.masking.defaultTolerance;
    const seedMode = options.seedMode ?? SeedMode.Corners;
    assertIntegerRange('tolerance', tolerance, 0, 255);
    assertOneOf('seedMode', seedMode, Object.values(SeedMode));
    return Object.freeze({
        mode: MaskingMode.BorderFlood,
        tolerance,
        seedMode,
        autoCropAfter: options.autoCropAfter ?? false,
        edgeProtectPad: options.edgeProtectPad ?? false,
    });
}

export function createCompositionSpec(options: Partial<CompositionSpec> = {}): CompositionSpec {
    const fitMode = options.fitMode ?? FitMode.Contain;
    const scale = options.scale ?? 1;
    const targetSize = options.targetSize ?? config.composition.defaultTargetSize;
    assertOneOf('fitMode', fitMode, Object.values(FitMode));
    assertRange('scale', scale, config.composition.minScale, config.composition.maxScale);
    assertIntegerRange('targetSize', targetSize, 1, Number.MAX_SAFE_INTEGER);
    return Object.freeze({ fitMode, scale, targetSize });
}

/**
 * Contain fit at 90%, leaving a transparent margin around the artwork.
 */
export function createSafeMarginComposition(targetSize: number = config.composition.defaultTargetSize): CompositionSpec {
    return createCompositionSpec({ fitMode: FitMode.Contain, scale: config.composition.safeMarginScale, targetSize });
}

export function createStrokeSpec(options: {
    color: RgbaColor;
    widthPx?: number;
    alignment?: StrokeAlignment;
}): StrokeSpec {
    const widthPx = options.widthPx ?? 10;
    const alignment = options.alignment ?? StrokeAlignment.Outside;
    const { r, g, b } = validateColor('strokeColor', options.color);
    assertIntegerRange('strokeColor.a', options.color.a, 0, 255);
    assertIntegerRange('widthPx', widthPx, config.stroke.minWidth, config.stroke.maxWidth);
    assertOneOf('alignment', alignment, Object.values(StrokeAlignment));
    return Object.freeze({ color: Object.freeze({ r, g, b, a: options.color.a }), widthPx, alignment });
}

export function createMorphologySpec(shapeWeight: number = 0): MorphologySpec {
    const limit = config.morphology.maxShapeWeight;
    assertIntegerRange('shapeWeight', shapeWeight, -limit, limit);
    return Object.freeze({ shapeWeight });
}

export function createLiquidPolishSpec(intensity: number = 0): LiquidPolishSpec {
    assertRange('intensity', intensity, 0, 1);
    return Object.freeze({ intensity });
}

export function createEdgeRefineSpec(options: Partial<EdgeRefineSpec> = {}): EdgeRefineSpec {
    const {
        debrisThreshold = config.edgeRefine.defaultDebrisThreshold,
        smoothBlurRadius = config.edgeRefine.defaultSmoothBlurRadius,
        cornerSharpness = config.edgeRefine.neutralCornerSharpness,
        resolutionSnap = 0,
    } = options;
    assertRange('debrisThreshold', debrisThreshold, 0, config.edgeRefine.maxDebrisThreshold);
    assertRange('smoothBlurRadius', smoothBlurRadius, 0, config.edgeRefine.maxBlurSigma);
    assertRange('cornerSharpness', cornerSharpness, 0, 100);
    assertRange('resolutionSnap', resolutionSnap, 0, 100);
    return Object.freeze({ debrisThreshold, smoothBlurRadius, cornerSharpness, resolutionSnap });
}

/**
 * Builds a complete spec set; anything not given takes its neutral default (no masking, contain fit at
 * the default size, no shape change, no stroke, no polish, default edge cleanup).
 */
export function createIconSpecSet(
    options: {
        masking?: MaskingSpec;
        composition?: CompositionSpec;
        morphology?: MorphologySpec;
        stroke?: StrokeSpec | null;
        liquidPolish?: LiquidPolishSpec;
        edgeRefine?: EdgeRefineSpec;
    } = {},
): IconSpecSet {
    return Object.freeze({
        masking: options.masking ?? createNoMasking(),
        composition: options.composition ?? createCompositionSpec(),
        morphology: options.morphology ?? createMorphologySpec(),
        stroke: options.stroke ?? null,
        liquidPolish: options.liquidPolish ?? createLiquidPolishSpec(),
        edgeRefine: options.edgeRefine ?? createEdgeRefineSpec(),
    });
}
