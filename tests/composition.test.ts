// tests/composition.test.ts
import { FitMode } from '../src/@types';
import { composeOnSquare, computePlacement, computeVisibleSpan } from '../src/core/composition/compositionEngine';
import { createCompositionSpec, createSafeMarginComposition } from '../src/core/specs/specFactory';
import { createRaster } from '../src/utils/raster/rasterUtils';
import { alphaAt, pixelAt, RED, setPixel } from './helpers/rasterFixtures';

describe('Composition engine', () => {
    describe('computePlacement', () => {
        it('should fit the longer side and center the shorter one for contain', () => {
            const spec = createCompositionSpec({ targetSize: 100 });
            expect(computePlacement(200, 100, spec)).toEqual({
                contentWidth: 100,
                contentHeight: 50,
                offsetX: 0,
                offsetY: 25,
            });
        });

        it('should fill the canvas and center the overflow for cover', () => {
            const spec = createCompositionSpec({ fitMode: FitMode.Cover, targetSize: 100 });
            expect(computePlacement(200, 100, spec)).toEqual({
                contentWidth: 200,
                contentHeight: 100,
                offsetX: -50,
                offsetY: 0,
            });
        });

        it('should leave a margin at the safe-margin scale', () => {
            expect(computePlacement(100, 100, createSafeMarginComposition(100))).toEqual({
                contentWidth: 90,
                contentHeight: 90,
                offsetX: 5,
                offsetY: 5,
            });
        });

        it('should never shrink content below one pixel', () => {
            const spec = createCompositionSpec({ targetSize: 10 });
            expect(computePlacement(1000, 1, spec)).toMatchObject({ contentWidth: 10, contentHeight: 1 });
        });
    });

    describe('computeVisibleSpan', () => {
        it('should keep the whole axis when the content fits', () => {
            expect(computeVisibleSpan(200, 100, 0, 100)).toEqual({
                sourceStart: 0,
                sourceLength: 200,
                drawLength: 100,
                drawOffset: 0,
            });
        });

        it('should keep only the source pixels behind the canvas for cover', () => {
            expect(computeVisibleSpan(2000, 64000, -31968, 64)).toEqual({
                sourceStart: 999,
                sourceLength: 2,
                drawLength: 64,
                drawOffset: 0,
            });
        });
    });

    describe('composeOnSquare', () => {
        it('should produce a transparent square canvas with the content centered', async () => {
            const image = createRaster(20, 10, RED);
            const result = await composeOnSquare(image, createCompositionSpec({ targetSize: 16 }));
            expect([result.width, result.height]).toEqual([16, 16]);
            expect(alphaAt(result, 8, 0)).toBe(0);
            expect(alphaAt(result, 8, 3)).toBe(0);
            expect(alphaAt(result, 8, 12)).toBe(0);
            expect(alphaAt(result, 8, 8)).toBeGreaterThanOrEqual(250);
            expect(pixelAt(result, 8, 8).r).toBeGreaterThanOrEqual(250);
        });

        it('should cut the centered window out of wide content for cover', async () => {
            const image = createRaster(20, 10);
            for (let x = 0; x < 20; x++) {
                for (let y = 0; y < 10; y++) {
                    setPixel(image, x, y, { r: x * 10, g: 0, b: 0, a: 255 });
                }
            }
            const result = await composeOnSquare(image, createCompositionSpec({ fitMode: FitMode.Cover, targetSize: 10 }));
            expect([result.width, result.height]).toEqual([10, 10]);
            expect(pixelAt(result, 0, 0)).toEqual({ r: 50, g: 0, b: 0, a: 255 });
            expect(pixelAt(result, 9, 9)).toEqual({ r: 140, g: 0, b: 0, a: 255 });
        });

        it('should leave the corners transparent when cover is scaled down', async () => {
            const image = createRaster(10, 10, RED);
            const spec = createCompositionSpec({ fitMode: FitMode.Cover, scale: 0.5, targetSize: 10 });
            const result = await composeOnSquare(image, spec);
            expect(alphaAt(result, 0, 0)).toBe(0);
            expect(alphaAt(result, 9, 9)).toBe(0);
        });

        it('should cover with an extreme aspect ratio without resampling the overflow', async () => {
            const image = createRaster(2000, 2, RED);
            const spec = createCompositionSpec({ fitMode: FitMode.Cover, targetSize: 64 });
            expect(computePlacement(2000, 2, spec)).toEqual({
                contentWidth: 64000,
                contentHeight: 64,
                offsetX: -31968,
                offsetY: 0,
            });
            const result = await composeOnSquare(image, spec);
            expect([result.width, result.height]).toEqual([64, 64]);
            expect(pixelAt(result, 32, 32).r).toBeGreaterThanOrEqual(250);
            expect(alphaAt(result, 32, 32)).toBeGreaterThanOrEqual(250);
            expect(alphaAt(result, 0, 0)).toBeGreaterThanOrEqual(250);
        });
    });
});
