// tests/inspect.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describeIcon } from '../src/cli/inspect';
import { serializeIcon } from '../src/core/container/iconContainer';
import { DecodeError } from '../src/core/errors';
import { RgbaImage } from '../src/core/imageProcessing/RgbaImage';

describe('describeIcon', () => {
    let workDir: string;

    beforeAll(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ico-forge-inspect-'));
    });

    afterAll(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    it('should list every directory entry', async () => {
        const iconPath = path.join(workDir, 'test.ico');
        fs.writeFileSync(
            iconPath,
            serializeIcon([RgbaImage.solid(16, 16, [9, 9, 9, 255]), RgbaImage.solid(256, 256, [9, 9, 9, 255])]),
        );

        expect(await describeIcon(iconPath)).toEqual([
            'test.ico: 2 images',
            '  #0 16x16 32bpp 1320 bytes @ 38 (DIB 16x32, compression 0)',
            '  #1 256x256 32bpp 327720 bytes @ 1358 (DIB 256x512, compression 0)',
        ]);
    });

    it('should reject files that are not icons', async () => {
        const bogus = path.join(workDir, 'bogus.ico');
        fs.writeFileSync(bogus, 'not an icon at all');
        await expect(describeIcon(bogus)).rejects.toThrow(DecodeError);
    });
});
