// src/core/imageProcessing/RgbaImage.ts

import type { IPixel16, IRasterImage } from '../../@types';
import { DecodeError } from '../errors';

const CHANNELS = 4;

/**
 * Immutable RGBA raster holding 16-bit samples in row-major order.
 */
export class RgbaImage implements IRasterImage {
    private constructor(
        readonly width: number,
        readonly height: number,
        private readonly samples: Uint16Array,
    ) {}

    /**
     * Wraps 8-bit RGBA samples. Each sample is widened with `v * 0x101`, so taking the
     * high byte of a channel gives the original value back.
     */
    static fromRgba8(width: number, height: number, data: Uint8Array): RgbaImage {
        RgbaImage.assertGeometry(width, height, data.length);
        const samples = new Uint16Array(data.length);
        for (let i = 0; i < data.length; i++) {
            samples[i] = data[i] * 0x101;
        }
        return new RgbaImage(width, height, samples);
    }

    static fromRgba16(width: number, height: number, data: Uint16Array): RgbaImage {
        RgbaImage.assertGeometry(width, height, data.length);
        return new RgbaImage(width, height, Uint16Array.from(data));
    }

    /**
     * Builds a single-colour image from 8-bit channel values.
     */
    static solid(width: number, height: number, rgba: readonly [number, number, number, number]): RgbaImage {
        const data = new Uint8Array(width * height * CHANNELS);
        for (let i = 0; i < data.length; i += CHANNELS) {
            data.set(rgba, i);
        }
        return RgbaImage.fromRgba8(width, height, data);
    }

    pixelAt(x: number, y: number): IPixel16 {
        if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
            throw new RangeError(`Pixel (${x}, ${y}) is outside a ${this.width}x${this.height} image`);
        }
        const i = (y * this.width + x) * CHANNELS;
        return {
            r: this.samples[i],
            g: this.samples[i + 1],
            b: this.samples[i + 2],
            a: this.samples[i + 3],
        };
    }

    /**
     * Returns the high byte of every sample, as raw RGBA for image libraries.
     */
    toRgba8(): Buffer {
        const out = Buffer.alloc(this.samples.length);
        for (let i = 0; i < this.samples.length; i++) {
            out[i] = this.samples[i] >> 8;
        }
        return out;
    }

    private static assertGeometry(width: number, height: number, length: number): void {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new DecodeError(`Invalid image dimensions ${width}x${height}`);
        }
        if (length !== width * height * CHANNELS) {
            throw new DecodeError(
                `Expected ${width * height * CHANNELS} RGBA samples for ${width}x${height}, got ${length}`,
            );
        }
    }
}
