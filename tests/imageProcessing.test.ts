// tests/imageProcessing.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { parseIcon, readBitmapInfoHeader } from '../src/core/container/parseIcon';
import { convert } from '../src/core/converter';
import { DecodeError } from '../src/core/errors';
import { createVariants } from '../src/core/imageProcessing/processor';
import { RgbaImage } from '../src/core/imageProcessing/RgbaImage';
import { SharpImageProcessor } from '../src/core/imageProcessing/strategies/SharpImageProcessor';
import { MockLogger } from './helpers/mockLogger';

describe('Sharp image processor', () => {
    const processor = new SharpImageProcessor();
    let workDir: string;

    beforeAll(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ico-forge-sharp-'));
    });

    afterAll(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    it('should decode RGBA PNG files without loss', async () => {
        const pngPath = path.join(workDir, 'rgba.png');
        const pixels = Buffer.from([
            255, 0, 0, 255,    0, 255, 0, 128,
            0, 0, 255, 0,      12, 34, 56, 78,
        ]);
        await sharp(pixels, { raw: { width: 2, height: 2, channels: 4 } }).png().toFile(pngPath);

        const image = await processor.loadImage(pngPath);
        expect(image.width).toBe(2);
        expect(image.height).toBe(2);
        expect(image.pixelAt(0, 0)).toEqual({ r: 0xffff, g: 0, b: 0, a: 0xffff });
        expect(image.pixelAt(1, 1)).toEqual({ r: 12 * 0x101, g: 34 * 0x101, b: 56 * 0x101, a: 78 * 0x101 });
    });

    it('should add an opaque alpha channel to RGB files', async () => {
        const pngPath = path.join(workDir, 'rgb.png');
        await sharp(Buffer.from([10, 20, 30]), { raw: { width: 1, height: 1, channels: 3 } }).png().toFile(pngPath);

        const image = await processor.loadImage(pngPath);
        expect(image.pixelAt(0, 0)).toEqual({ r: 10 * 0x101, g: 20 * 0x101, b: 30 * 0x101, a: 0xffff });
    });

    it('should raise a DecodeError for files that are not images', async () => {
        const textPath = path.join(workDir, 'fake.png');
        fs.writeFileSync(textPath, 'plain text');
        await expect(processor.loadImage(textPath)).rejects.toThrow(DecodeError);
    });

    it('should resize to exact square variants', async () => {
        const source = RgbaImage.solid(20, 10, [200, 100, 50, 255]);
        const variants = await createVariants(source, [16, 48], processor);
        expect(variants.map((variant) => [variant.width, variant.height])).toEqual([
            [16, 16],
            [48, 48],
        ]);
        expect(variants[1].pixelAt(24, 24).a).toBe(0xffff);
    });

    it('should convert a PNG file into an icon end to end', async () => {
        const pngPath = path.join(workDir, 'logo.png');
        await sharp({ create: { width: 64, height: 64, channels: 4, background: { r: 255, g: 0, b: 0, alpha: 1 } } })
            .png()
            .toFile(pngPath);

        const outputFile = path.join(workDir, 'logo.ico');
        const result = await convert({ inputFile: pngPath, outputFile, processor, logger: new MockLogger(), verbose: false });

        expect(result.byteLength).toBe(448342);
        const { header, entries, images } = parseIcon(fs.readFileSync(outputFile));
        expect(header.count).toBe(6);
        expect(entries.map((entry) => entry.width)).toEqual([16, 32, 48, 64, 128, 0]);
        expect(readBitmapInfoHeader(images[5])).toMatchObject({ width: 256, height: 512, bitCount: 32 });
    });
});
