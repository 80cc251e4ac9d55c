// tests/specFactory.test.ts
import { FitMode, MaskingMode, SeedMode, StrokeAlignment } from '../src/@types';
import {
    createBorderFloodMasking,
    createColorKey,
    createColorKeyMasking,
    createCompositionSpec,
    createEdgeRefineSpec,
    createIconSpecSet,
    createLiquidPolishSpec,
    createMorphologySpec,
    createStrokeSpec,
} from '../src/core/specs/specFactory';
import { SpecValidationError } from '../src/core/specs/specValidationError';
import { BLUE } from './helpers/rasterFixtures';

describe('Spec factories', () => {
    it('should build a neutral spec set by default', () => {
        expect(createIconSpecSet()).toEqual({
            masking: { mode: MaskingMode.None },
            composition: { fitMode: FitMode.Contain, scale: 1, targetSize: 1024 },
            morphology: { shapeWeight: 0 },
            stroke: null,
            liquidPolish: { intensity: 0 },
            edgeRefine: { debrisThreshold: 10, smoothBlurRadius: 1, cornerSharpness: 50, resolutionSnap: 0 },
        });
    });

    it('should freeze what it builds', () => {
        const specs = createIconSpecSet();
        expect(Object.isFrozen(specs)).toBe(true);
        expect(Object.isFrozen(specs.composition)).toBe(true);
    });

    it('should default border flood to corner seeds and tolerance 30', () => {
        expect(createBorderFloodMasking()).toEqual({
            mode: MaskingMode.BorderFlood,
            tolerance: 30,
            seedMode: SeedMode.Corners,
            autoCropAfter: false,
            edgeProtectPad: false,
        });
    });

    it('should default the stroke to 10px outside', () => {
        expect(createStrokeSpec({ color: BLUE })).toEqual({ color: BLUE, widthPx: 10, alignment: StrokeAlignment.Outside });
    });

    it('should reject a stroke width outside 1-50', () => {
        expect(() => createStrokeSpec({ color: BLUE, widthPx: 0 })).toThrow('Invalid widthPx: 0 is outside [1, 50]');
        expect(() => createStrokeSpec({ color: BLUE, widthPx: 51 })).toThrow(SpecValidationError);
    });

    it('should reject a scale outside 0.5-1.5', () => {
        expect(() => createCompositionSpec({ scale: 2 })).toThrow('Invalid scale: 2 is outside [0.5, 1.5]');
    });

    it('should reject fractional shape weight', () => {
        expect(() => createMorphologySpec(1.5)).toThrow('Invalid shapeWeight: expected an integer, got 1.5');
        expect(() => createMorphologySpec(-11)).toThrow('Invalid shapeWeight: -11 is outside [-10, 10]');
    });

    it('should reject liquid intensity above 1', () => {
        expect(() => createLiquidPolishSpec(1.2)).toThrow('Invalid intensity: 1.2 is outside [0, 1]');
    });

    it('should reject an empty color key list', () => {
        expect(() => createColorKeyMasking({ keys: [] })).toThrow(
            'Invalid keys: at least one color key is required',
        );
    });

    it('should reject key colors outside the byte range', () => {
        expect(() => createColorKey({ r: 256, g: 0, b: 0 })).toThrow('Invalid keyColor.r: 256 is outside [0, 255]');
    });

    it('should reject a debris threshold above 50', () => {
        expect(() => createEdgeRefineSpec({ debrisThreshold: 60 })).toThrow(
            'Invalid debrisThreshold: 60 is outside [0, 50]',
        );
    });

    it('should reject a smoothing radius the blur cannot take', () => {
        expect(() => createEdgeRefineSpec({ smoothBlurRadius: 2000 })).toThrow(
            'Invalid smoothBlurRadius: 2000 is outside [0, 1000]',
        );
        expect(createEdgeRefineSpec({ smoothBlurRadius: 1000 }).smoothBlurRadius).toBe(1000);
    });

    it('should reject an unknown fit mode', () => {
        const fromUntypedInput: { fitMode?: FitMode } = JSON.parse('{"fitMode":"stretch"}');
        expect(() => createCompositionSpec(fromUntypedInput)).toThrow(
            'Invalid fitMode: "stretch" is not one of contain, cover',
        );
    });

    it('should name the failing field on the error', () => {
        try {
            createCompositionSpec({ targetSize: 0 });
            throw new Error('expected a validation error');
        } catch (error) {
            expect(error).toBeInstanceOf(SpecValidationError);
            if (error instanceof SpecValidationError) {
                expect(error.field).toBe('targetSize');
                expect(error.name).toBe('SpecValidationError');
            }
        }
    });
});
