// tests/parseIcon.test.ts

import { serializeIcon } from '../src/core/container/iconContainer';
import { entryDimension, parseIcon, readBitmapInfoHeader } from '../src/core/container/parseIcon';
import { DecodeError } from '../src/core/errors';
import { RgbaImage } from '../src/core/imageProcessing/RgbaImage';

describe('Icon reader', () => {
    const icon = serializeIcon([RgbaImage.solid(16, 16, [0, 128, 0, 255])]);

    it('should return views covering each entry', () => {
        const { entries, images } = parseIcon(icon);
        expect(entries).toHaveLength(1);
        expect(images[0].length).toBe(entries[0].bytesInRes);
        expect(images[0].byteOffset - icon.byteOffset).toBe(22);
    });

    it('should reject data shorter than the header', () => {
        expect(() => parseIcon(Buffer.from([0, 0, 1]))).toThrow(DecodeError);
    });

    it('should reject a non-zero reserved field', () => {
        const copy = Buffer.from(icon);
        copy.writeUInt16LE(1, 0);
        expect(() => parseIcon(copy)).toThrow('reserved field must be 0');
    });

    it('should reject cursor files', () => {
        const copy = Buffer.from(icon);
        copy.writeUInt16LE(2, 2);
        expect(() => parseIcon(copy)).toThrow('unsupported type 2');
    });

    it('should reject a truncated directory', () => {
        expect(() => parseIcon(icon.subarray(0, 10))).toThrow(DecodeError);
    });

    it('should reject entries pointing past the end', () => {
        expect(() => parseIcon(icon.subarray(0, icon.length - 1))).toThrow(DecodeError);
    });

    it('should reject bitmap blobs shorter than the info header', () => {
        expect(() => readBitmapInfoHeader(Buffer.alloc(39))).toThrow(DecodeError);
    });

    it('should read the 0 sentinel back as 256', () => {
        expect(entryDimension(0)).toBe(256);
        expect(entryDimension(48)).toBe(48);
    });
});
