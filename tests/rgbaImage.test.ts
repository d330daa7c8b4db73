// tests/rgbaImage.test.ts

import { DecodeError } from '../src/core/errors';
import { RgbaImage } from '../src/core/imageProcessing/RgbaImage';

describe('RgbaImage', () => {
    it('should widen 8-bit samples so the high byte is the original value', () => {
        const image = RgbaImage.fromRgba8(1, 1, new Uint8Array([0x00, 0x7f, 0x80, 0xff]));
        expect(image.pixelAt(0, 0)).toEqual({ r: 0x0000, g: 0x7f7f, b: 0x8080, a: 0xffff });
    });

    it('should return the original 8-bit samples from toRgba8', () => {
        const data = new Uint8Array([1, 2, 3, 4, 250, 251, 252, 253]);
        const image = RgbaImage.fromRgba8(2, 1, data);
        expect([...image.toRgba8()]).toEqual([...data]);
    });

    it('should address pixels row-major', () => {
        const image = RgbaImage.fromRgba8(2, 2, new Uint8Array([
            1, 0, 0, 0, 2, 0, 0, 0,
            3, 0, 0, 0, 4, 0, 0, 0,
        ]));
        expect(image.pixelAt(1, 0).r).toBe(2 * 0x101);
        expect(image.pixelAt(0, 1).r).toBe(3 * 0x101);
    });

    it('should fill solid images with one colour', () => {
        const image = RgbaImage.solid(3, 3, [255, 0, 0, 255]);
        expect(image.pixelAt(2, 2)).toEqual({ r: 0xffff, g: 0, b: 0, a: 0xffff });
    });

    it('should reject sample buffers that do not match the dimensions', () => {
        expect(() => RgbaImage.fromRgba8(2, 2, new Uint8Array(12))).toThrow(DecodeError);
        expect(() => RgbaImage.fromRgba16(0, 1, new Uint16Array(0))).toThrow(DecodeError);
    });

    it('should reject coordinates outside the image', () => {
        const image = RgbaImage.solid(2, 2, [0, 0, 0, 0]);
        expect(() => image.pixelAt(2, 0)).toThrow(RangeError);
        expect(() => image.pixelAt(0, -1)).toThrow(RangeError);
    });
});
