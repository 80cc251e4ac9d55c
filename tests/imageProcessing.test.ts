// tests/imageProcessing.test.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { loadImageData, writeImageData } from '../src/core/imageProcessing/processor';
import { rastersEqual } from '../src/utils/raster/rasterUtils';
import { blockOnTransparent, pixelAt } from './helpers/rasterFixtures';

describe('Image processing', () => {
    let testDir: string;

    beforeAll(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'icon-matte-'));
    });

    afterAll(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('should write and read back the same RGBA bytes', async () => {
        const image = blockOnTransparent(12, 9, { left: 2, top: 3, right: 7, bottom: 6 }, { r: 10, g: 200, b: 30, a: 180 });
        const file = path.join(testDir, 'roundtrip.png');
        await writeImageData(image, file);
        expect(rastersEqual(await loadImageData(file), image)).toBe(true);
    });

    it('should add an opaque alpha channel to RGB inputs', async () => {
        const file = path.join(testDir, 'rgb.png');
        await sharp({ create: { width: 3, height: 2, channels: 3, background: { r: 40, g: 50, b: 60 } } })
            .png()
            .toFile(file);
        const image = await loadImageData(file);
        expect([image.width, image.height]).toEqual([3, 2]);
        expect(pixelAt(image, 2, 1)).toEqual({ r: 40, g: 50, b: 60, a: 255 });
    });

    it('should fail for a missing file', async () => {
        await expect(loadImageData(path.join(testDir, 'missing.png'))).rejects.toThrow();
    });
});
